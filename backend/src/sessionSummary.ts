import { median, sampleStd } from "../../src/sim/systems/statsSystem.js";
import { CalibrationUnavailableError } from "./errors.js";
import type { TimedLap } from "./lapDataClient.js";

export const FALLBACK_LAP_STD = 0.5;

export interface SessionSummary {
  baseLap: number;
  lapStd: number;
  totalLaps: number;
  pitLaps: number[];
  driver: string;
  event: string;
}

export function summarizeSessionLaps(
  laps: readonly TimedLap[],
  pitInLaps: readonly number[],
  driver: string,
  event: string
): SessionSummary {
  const timed = laps.filter((lap): lap is TimedLap & { lapTime: number } => lap.lapTime !== null);
  if (timed.length === 0) {
    throw new CalibrationUnavailableError("no_timed_laps", `No timed laps for ${driver} at ${event}.`);
  }

  const pitIn = new Set(pitInLaps);
  const clean = timed.filter((lap) => !lap.pitOut && !pitIn.has(lap.lapNumber));
  const representative = clean.length > 0 ? clean : timed;
  const times = representative.map((lap) => lap.lapTime);

  return {
    baseLap: median(times),
    lapStd: times.length > 1 ? sampleStd(times) : FALLBACK_LAP_STD,
    totalLaps: timed.reduce((max, lap) => Math.max(max, lap.lapNumber), 0),
    pitLaps: Array.from(pitIn).sort((a, b) => a - b),
    driver,
    event
  };
}
