import type { TyreCompound } from "./config";

export type RaceStatus = "FINISHED" | "DNF";

export interface LapRecord {
  lap: number;
  lapTime: number;
  power: number;
  rpm: number;
  temperature: number;
  engineDeg: number;
  fuelPenalty: number;
  tyreDeg: number;
  safetyCar: boolean;
}

export interface TyreState {
  compound: TyreCompound;
  stintLap: number;
}

export interface SafetyCarState {
  active: boolean;
  lapsRemaining: number;
}

export interface RaceState {
  lap: number;
  engineDeg: number;
  tyre: TyreState;
  safetyCar: SafetyCarState;
  totalTime: number;
  laps: Readonly<LapRecord>[];
}

interface RaceOutcomeBase {
  totalTime: number;
  laps: readonly Readonly<LapRecord>[];
}

export type RaceOutcome =
  | (RaceOutcomeBase & { status: "FINISHED"; dnfLap: null })
  | (RaceOutcomeBase & { status: "DNF"; dnfLap: number });
