import { ENGINE_POWER_LAP_FACTOR, ENGINE_REFERENCE_POWER_HP, SAFETY_CAR_LAP_DELTA } from "../constants";
import { normal, type RandomSource } from "../random";
import type { RaceConfiguration } from "../types/config";
import type { LapRecord, RaceOutcome, RaceState } from "../types/race";
import { createRaceConfig } from "../../validation/raceConfigValidation";
import {
  advanceEngineDegradation,
  enginePower,
  engineFailureProbability,
  sampleEngineTelemetry
} from "./engineSystem";
import { fuelPenalty } from "./fuelSystem";
import { advanceSafetyCar, createSafetyCarState } from "./safetyCarSystem";
import { advanceStint, createTyreState, resetStint, tyreDegradation } from "./tyreSystem";

export type LapStepResult =
  | { type: "completed"; record: Readonly<LapRecord> }
  | { type: "dnf"; lap: number };

export interface LapTimeTerms {
  fuelPenalty: number;
  tyrePenalty: number;
  gripBonus: number;
  power: number;
}

export function createRaceState(config: RaceConfiguration): RaceState {
  return {
    lap: 0,
    engineDeg: 0,
    tyre: createTyreState(config.tyreCompound),
    safetyCar: createSafetyCarState(),
    totalTime: 0,
    laps: []
  };
}

export function composeLapTime(baseLap: number, terms: LapTimeTerms, noise: number): number {
  return (
    baseLap +
    terms.fuelPenalty +
    terms.tyrePenalty +
    terms.gripBonus -
    (terms.power - ENGINE_REFERENCE_POWER_HP) * ENGINE_POWER_LAP_FACTOR +
    noise
  );
}

export function stepLap(state: RaceState, config: RaceConfiguration, rng: RandomSource): LapStepResult {
  const lap = state.lap + 1;
  state.lap = lap;
  const stintLap = advanceStint(state.tyre);

  const safetyCar = advanceSafetyCar(state.safetyCar, lap, config.laps, config.enableSafetyCar, rng);

  // Failure risk uses the wear carried into the lap.
  const degEnteringLap = state.engineDeg;
  const { rpm, throttle, temperature } = sampleEngineTelemetry(degEnteringLap, rng);
  const power = enginePower(throttle, rpm, degEnteringLap);
  const fuel = fuelPenalty(lap, config.fuelLoad);
  const tyre = tyreDegradation(stintLap, state.tyre.compound, config.degFactor);

  let lapTime = safetyCar
    ? config.baseLap + SAFETY_CAR_LAP_DELTA
    : composeLapTime(
        config.baseLap,
        { fuelPenalty: fuel, tyrePenalty: tyre.penalty, gripBonus: tyre.gripBonus, power },
        normal(rng, 0, config.lapStd)
      );

  if (rng.next() < engineFailureProbability(config.reliability, degEnteringLap)) {
    return { type: "dnf", lap };
  }

  if (lap === config.pitLap) {
    lapTime += config.pitLoss;
    resetStint(state.tyre);
  }

  state.engineDeg = advanceEngineDegradation(degEnteringLap, config.engineStress, lap, config.laps, rng);
  state.totalTime += lapTime;

  const record: Readonly<LapRecord> = Object.freeze({
    lap,
    lapTime,
    power,
    rpm,
    temperature,
    engineDeg: state.engineDeg,
    fuelPenalty: fuel,
    tyreDeg: tyre.penalty,
    safetyCar
  });
  state.laps.push(record);
  return { type: "completed", record };
}

export function runRace(config: RaceConfiguration, rng: RandomSource): RaceOutcome {
  const state = createRaceState(config);
  while (state.lap < config.laps) {
    const step = stepLap(state, config, rng);
    if (step.type === "dnf") {
      return { status: "DNF", dnfLap: step.lap, totalTime: state.totalTime, laps: [...state.laps] };
    }
  }
  return { status: "FINISHED", dnfLap: null, totalTime: state.totalTime, laps: [...state.laps] };
}

export function simulateRace(input: RaceConfiguration, rng: RandomSource): RaceOutcome {
  return runRace(createRaceConfig(input), rng);
}
