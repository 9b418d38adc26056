import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import type { CalibrationCache } from "./calibrationCache.js";
import { CalibrationUnavailableError } from "./errors.js";

export interface SessionInfo {
  sessionKey: number;
  sessionName: string;
  location: string;
  countryName: string;
  year: number | null;
}

export interface DriverInfo {
  driverNumber: number;
  acronym: string;
  fullName: string | null;
}

export interface TimedLap {
  lapNumber: number;
  lapTime: number | null;
  pitOut: boolean;
}

export interface LapDataSource {
  getSession(sessionKey: number): Promise<SessionInfo>;
  getDrivers(sessionKey: number): Promise<DriverInfo[]>;
  getLaps(sessionKey: number, driverNumber: number): Promise<TimedLap[]>;
  getPitLaps(sessionKey: number, driverNumber: number): Promise<number[]>;
}

const SessionRowSchema = z.object({
  session_key: z.number().int(),
  session_name: z.string(),
  location: z.string(),
  country_name: z.string(),
  year: z.number().int().nullish()
});

const DriverRowSchema = z.object({
  driver_number: z.number().int(),
  name_acronym: z.string(),
  full_name: z.string().nullish()
});

const LapRowSchema = z.object({
  lap_number: z.number().int(),
  lap_duration: z.number().positive().nullish(),
  is_pit_out_lap: z.boolean().nullish()
});

const PitRowSchema = z.object({
  lap_number: z.number().int()
});

type FetchFn = (url: string) => Promise<Response>;

export interface LapDataClientOptions {
  baseUrl: string;
  cache: CalibrationCache;
  cacheTtlSeconds: number;
  fetchFn?: FetchFn;
  log?: FastifyBaseLogger;
}

export class LapDataClient implements LapDataSource {
  private readonly baseUrl: string;
  private readonly cache: CalibrationCache;
  private readonly cacheTtlSeconds: number;
  private readonly fetchFn: FetchFn;
  private readonly log: FastifyBaseLogger | undefined;

  constructor(options: LapDataClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.cache = options.cache;
    this.cacheTtlSeconds = options.cacheTtlSeconds;
    this.fetchFn = options.fetchFn ?? ((url) => fetch(url));
    this.log = options.log;
  }

  private async fetchRows<T extends z.ZodTypeAny>(path: string, rowSchema: T): Promise<z.infer<T>[]> {
    const schema = z.array(rowSchema);
    const cached = schema.safeParse(await this.cache.get(path));
    this.log?.debug({ event: "calibration.cache", cache: this.cache.kind, path, hit: cached.success }, "calibration_event");
    if (cached.success) {
      return cached.data;
    }

    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}${path}`);
    } catch (error) {
      throw new CalibrationUnavailableError("unreachable", `Lap data source unreachable for ${path}.`, {
        cause: error
      });
    }
    if (!res.ok) {
      throw new CalibrationUnavailableError("bad_status", `Lap data source answered ${res.status} for ${path}.`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new CalibrationUnavailableError("malformed_payload", `Lap data for ${path} is not JSON.`, {
        cause: error
      });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new CalibrationUnavailableError("malformed_payload", `Unexpected lap data shape for ${path}.`, {
        cause: parsed.error
      });
    }
    await this.cache.set(path, parsed.data, this.cacheTtlSeconds);
    return parsed.data;
  }

  async getSession(sessionKey: number): Promise<SessionInfo> {
    const rows = await this.fetchRows(`/v1/sessions?session_key=${sessionKey}`, SessionRowSchema);
    const row = rows[0];
    if (!row) {
      throw new CalibrationUnavailableError("unknown_session", `Session ${sessionKey} not found.`);
    }
    return {
      sessionKey: row.session_key,
      sessionName: row.session_name,
      location: row.location,
      countryName: row.country_name,
      year: row.year ?? null
    };
  }

  async getDrivers(sessionKey: number): Promise<DriverInfo[]> {
    const rows = await this.fetchRows(`/v1/drivers?session_key=${sessionKey}`, DriverRowSchema);
    return rows
      .map((row) => ({
        driverNumber: row.driver_number,
        acronym: row.name_acronym,
        fullName: row.full_name ?? null
      }))
      .sort((a, b) => a.driverNumber - b.driverNumber);
  }

  async getLaps(sessionKey: number, driverNumber: number): Promise<TimedLap[]> {
    const rows = await this.fetchRows(
      `/v1/laps?session_key=${sessionKey}&driver_number=${driverNumber}`,
      LapRowSchema
    );
    return rows.map((row) => ({
      lapNumber: row.lap_number,
      lapTime: row.lap_duration ?? null,
      pitOut: row.is_pit_out_lap ?? false
    }));
  }

  async getPitLaps(sessionKey: number, driverNumber: number): Promise<number[]> {
    const rows = await this.fetchRows(
      `/v1/pit?session_key=${sessionKey}&driver_number=${driverNumber}`,
      PitRowSchema
    );
    return rows.map((row) => row.lap_number);
  }
}
