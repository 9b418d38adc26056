import type { CalibrationSeeds, RaceConfiguration } from "../sim/types/config";
import type { RaceOutcome } from "../sim/types/race";
import type { MonteCarloSummary } from "../sim/systems/monteCarloSystem";
import type { StrategyGridResult } from "../sim/systems/strategySystem";

export interface TrackConstants {
  venue: string | null;
  pitLoss: number;
  degFactor: number;
}

export interface SimulateRaceResponse {
  seed: number;
  config: RaceConfiguration;
  outcome: RaceOutcome;
}

export interface MonteCarloResponse {
  seed: number;
  config: RaceConfiguration;
  summary: MonteCarloSummary;
}

export interface OptimizeStrategyResponse {
  seed: number;
  config: RaceConfiguration;
  runsPerCell: number;
  result: StrategyGridResult;
}

export interface SessionDriver {
  driverNumber: number;
  acronym: string;
  fullName: string | null;
}

export interface SessionCalibrationResponse {
  summary: {
    baseLap: number;
    lapStd: number;
    totalLaps: number;
    pitLaps: number[];
    driver: string;
    event: string;
  };
  track: TrackConstants;
  seeds: CalibrationSeeds;
  config: RaceConfiguration;
}

export class SimulationApiError extends Error {
  readonly status: number;
  readonly payload: unknown;

  constructor(status: number, payload: unknown) {
    super(`Simulation API error ${status}`);
    this.status = status;
    this.payload = payload;
  }
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export class SimulationApiClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = normalizeBaseUrl(baseUrl);
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const init: { method: string; headers?: Record<string, string>; body?: string } = { method };
    if (body !== undefined) {
      init.headers = { "Content-Type": "application/json" };
      init.body = JSON.stringify(body);
    }
    const res = await fetch(`${this.baseUrl}${path}`, init);

    const text = await res.text();
    let payload: unknown = {};
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = { raw: text };
      }
    }
    if (!res.ok) {
      throw new SimulationApiError(res.status, payload);
    }
    return payload as T;
  }

  simulateRace(config: RaceConfiguration, seed?: number): Promise<SimulateRaceResponse> {
    return this.request("POST", "/api/v1/races", { config, ...(seed !== undefined ? { seed } : {}) });
  }

  runMonteCarlo(config: RaceConfiguration, simulations: number, seed?: number): Promise<MonteCarloResponse> {
    return this.request("POST", "/api/v1/monte-carlo", {
      config,
      simulations,
      ...(seed !== undefined ? { seed } : {})
    });
  }

  optimizeStrategy(config: RaceConfiguration, runsPerCell?: number, seed?: number): Promise<OptimizeStrategyResponse> {
    return this.request("POST", "/api/v1/strategies/optimize", {
      config,
      ...(runsPerCell !== undefined ? { runsPerCell } : {}),
      ...(seed !== undefined ? { seed } : {})
    });
  }

  getTrackConstants(venue: string): Promise<TrackConstants> {
    return this.request("GET", `/api/v1/calibration/tracks?venue=${encodeURIComponent(venue)}`);
  }

  async listSessionDrivers(sessionKey: number): Promise<SessionDriver[]> {
    const res = await this.request<{ sessionKey: number; drivers: SessionDriver[] }>(
      "GET",
      `/api/v1/calibration/sessions/${sessionKey}/drivers`
    );
    return res.drivers;
  }

  calibrateSession(sessionKey: number, driverNumber: number): Promise<SessionCalibrationResponse> {
    return this.request("GET", `/api/v1/calibration/sessions/${sessionKey}/drivers/${driverNumber}`);
  }
}
