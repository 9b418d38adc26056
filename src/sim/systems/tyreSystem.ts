import { COMPOUND_TABLE, TYRE_CLIFF_GROWTH, TYRE_CLIFF_SCALE } from "../constants";
import type { TyreCompound } from "../types/config";
import type { TyreState } from "../types/race";

export interface TyreDegradation {
  penalty: number;
  gripBonus: number;
}

export function tyreDegradation(stintLap: number, compound: TyreCompound, degFactor: number): TyreDegradation {
  const { gripBonus, baseDeg, cliffLap } = COMPOUND_TABLE[compound];
  const slope = baseDeg * degFactor;
  if (stintLap <= cliffLap) {
    return { penalty: slope * stintLap, gripBonus };
  }
  const overCliff = stintLap - cliffLap;
  const cliffPenalty = TYRE_CLIFF_SCALE * degFactor * (TYRE_CLIFF_GROWTH ** overCliff - 1);
  return { penalty: slope * cliffLap + cliffPenalty, gripBonus };
}

export function createTyreState(compound: TyreCompound): TyreState {
  return { compound, stintLap: 0 };
}

export function advanceStint(tyre: TyreState): number {
  tyre.stintLap += 1;
  return tyre.stintLap;
}

export function resetStint(tyre: TyreState, compound: TyreCompound | null = null) {
  tyre.stintLap = 0;
  if (compound) {
    tyre.compound = compound;
  }
}
