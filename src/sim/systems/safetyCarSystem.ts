import {
  SAFETY_CAR_BASE_PROBABILITY,
  SAFETY_CAR_FINAL_LAPS,
  SAFETY_CAR_FINAL_PROBABILITY,
  SAFETY_CAR_MAX_LAPS,
  SAFETY_CAR_MIN_LAPS,
  SAFETY_CAR_START_LAPS,
  SAFETY_CAR_START_PROBABILITY
} from "../constants";
import { randomInt, type RandomSource } from "../random";
import type { SafetyCarState } from "../types/race";

export function createSafetyCarState(): SafetyCarState {
  return { active: false, lapsRemaining: 0 };
}

export function safetyCarProbability(lap: number, totalLaps: number): number {
  if (lap <= SAFETY_CAR_START_LAPS) return SAFETY_CAR_START_PROBABILITY;
  if (lap >= totalLaps - SAFETY_CAR_FINAL_LAPS) return SAFETY_CAR_FINAL_PROBABILITY;
  return SAFETY_CAR_BASE_PROBABILITY;
}

export function safetyCarDuration(rng: RandomSource): number {
  return randomInt(rng, SAFETY_CAR_MIN_LAPS, SAFETY_CAR_MAX_LAPS);
}

/**
 * Start-of-lap transition. Returns whether the safety car is out for this lap.
 * The deployment lap counts against the drawn duration, so the flag clears on
 * the lap the counter reaches zero.
 */
export function advanceSafetyCar(
  state: SafetyCarState,
  lap: number,
  totalLaps: number,
  enabled: boolean,
  rng: RandomSource
): boolean {
  if (enabled && !state.active && rng.next() < safetyCarProbability(lap, totalLaps)) {
    state.active = true;
    state.lapsRemaining = safetyCarDuration(rng);
  }
  if (state.active) {
    state.lapsRemaining -= 1;
    if (state.lapsRemaining <= 0) {
      state.active = false;
      state.lapsRemaining = 0;
    }
  }
  return state.active;
}
