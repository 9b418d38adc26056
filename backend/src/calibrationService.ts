import type { FastifyBaseLogger } from "fastify";
import {
  applyCalibration,
  DEFAULT_RACE_CONFIG,
  RaceConfigError,
  type CalibrationSeeds,
  type RaceConfiguration
} from "../../src/sim/index.js";
import { CalibrationUnavailableError } from "./errors.js";
import type { DriverInfo, LapDataSource } from "./lapDataClient.js";
import { summarizeSessionLaps, type SessionSummary } from "./sessionSummary.js";
import { lookupTrackConstants, type TrackConstants } from "./trackConstants.js";

export interface SessionCalibration {
  summary: SessionSummary;
  track: TrackConstants;
  seeds: CalibrationSeeds;
  config: Readonly<RaceConfiguration>;
}

function calibratedConfig(seeds: CalibrationSeeds, sessionKey: number, driverNumber: number) {
  try {
    return applyCalibration(DEFAULT_RACE_CONFIG, seeds);
  } catch (error) {
    if (error instanceof RaceConfigError) {
      throw new CalibrationUnavailableError(
        "malformed_payload",
        `Lap data for driver ${driverNumber} in session ${sessionKey} gives an invalid configuration: ${error.issues.join("; ")}`,
        { cause: error }
      );
    }
    throw error;
  }
}

export class CalibrationService {
  constructor(
    private readonly source: LapDataSource,
    private readonly log: FastifyBaseLogger
  ) {}

  trackConstants(venue: string): TrackConstants {
    return lookupTrackConstants(venue);
  }

  async listDrivers(sessionKey: number): Promise<DriverInfo[]> {
    return this.source.getDrivers(sessionKey);
  }

  async calibrateSession(sessionKey: number, driverNumber: number): Promise<SessionCalibration> {
    const [session, drivers] = await Promise.all([
      this.source.getSession(sessionKey),
      this.source.getDrivers(sessionKey)
    ]);
    const driver = drivers.find((d) => d.driverNumber === driverNumber);
    if (!driver) {
      throw new CalibrationUnavailableError(
        "unknown_driver",
        `Driver ${driverNumber} did not take part in session ${sessionKey}.`
      );
    }

    const [laps, pitLaps] = await Promise.all([
      this.source.getLaps(sessionKey, driverNumber),
      this.source.getPitLaps(sessionKey, driverNumber)
    ]);
    const summary = summarizeSessionLaps(laps, pitLaps, driver.acronym, session.location);
    const track = lookupTrackConstants(session.location);
    const seeds: CalibrationSeeds = {
      baseLap: summary.baseLap,
      lapStd: summary.lapStd,
      laps: summary.totalLaps,
      pitLoss: track.pitLoss,
      degFactor: track.degFactor
    };
    const config = calibratedConfig(seeds, sessionKey, driverNumber);
    this.log.info(
      { event: "calibration.session", sessionKey, driverNumber, venue: track.venue, laps: laps.length },
      "calibration_event"
    );
    return { summary, track, seeds, config };
  }
}
