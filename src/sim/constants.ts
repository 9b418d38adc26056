import type { RaceConfiguration, TyreCompound } from "./types/config";

export const ENGINE_BASE_POWER_HP = 1000;
export const ENGINE_REFERENCE_POWER_HP = 900;
export const ENGINE_POWER_LAP_FACTOR = 0.002;
export const ENGINE_REFERENCE_RPM = 15000;
export const ENGINE_BASE_WEAR_RATE = 0.0001;
export const ENGINE_WEAR_NOISE_STD = 0.0002;

export const FUEL_BURN_RATE_KG = 2.1;
export const FUEL_SECONDS_PER_KG = 0.03;

export const TYRE_CLIFF_SCALE = 0.15;
export const TYRE_CLIFF_GROWTH = 1.2;

export const SAFETY_CAR_LAP_DELTA = 30;
export const SAFETY_CAR_START_LAPS = 3;
export const SAFETY_CAR_FINAL_LAPS = 5;
export const SAFETY_CAR_START_PROBABILITY = 0.035;
export const SAFETY_CAR_FINAL_PROBABILITY = 0.02;
export const SAFETY_CAR_BASE_PROBABILITY = 0.012;
export const SAFETY_CAR_MIN_LAPS = 3;
export const SAFETY_CAR_MAX_LAPS = 6;

export const HISTOGRAM_BINS = 40;
export const DEFAULT_RUNS_PER_CELL = 50;
export const PIT_WINDOW_MIN_LAP = 5;
export const PIT_WINDOW_STRIDE = 2;

export interface CompoundProfile {
  gripBonus: number;
  baseDeg: number;
  cliffLap: number;
}

export const COMPOUND_TABLE: Readonly<Record<TyreCompound, CompoundProfile>> = {
  soft: { gripBonus: -0.8, baseDeg: 0.03, cliffLap: 12 },
  medium: { gripBonus: 0, baseDeg: 0.018, cliffLap: 22 },
  hard: { gripBonus: 0.5, baseDeg: 0.01, cliffLap: 35 }
};

export const DEFAULT_RACE_CONFIG: Readonly<RaceConfiguration> = Object.freeze({
  baseLap: 90,
  lapStd: 0.5,
  laps: 50,
  pitLap: 25,
  pitLoss: 22,
  engineStress: 1,
  reliability: 0.98,
  fuelLoad: 100,
  tyreCompound: "medium",
  enableSafetyCar: true,
  degFactor: 1
});
