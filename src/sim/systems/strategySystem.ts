import { DEFAULT_RUNS_PER_CELL, PIT_WINDOW_MIN_LAP, PIT_WINDOW_STRIDE } from "../constants";
import { createRandomSource, deriveSeed } from "../random";
import { TYRE_COMPOUNDS, type RaceConfiguration, type TyreCompound } from "../types/config";
import { createRaceConfig, RaceConfigError } from "../../validation/raceConfigValidation";
import type { ProgressListener } from "./monteCarloSystem";
import { runRace } from "./raceSystem";
import { mean } from "./statsSystem";

export interface StrategyOptions {
  seed: number;
  runsPerCell?: number;
  compounds?: readonly TyreCompound[];
  onProgress?: ProgressListener;
}

export interface PitWindow {
  first: number;
  last: number;
}

export interface StrategyCell {
  compound: TyreCompound;
  pitLap: number;
  expectedTime: number;
  finished: number;
  runs: number;
}

export interface StrategyCandidate {
  compound: TyreCompound;
  pitLap: number;
}

export type StrategyGridResult =
  | { status: "ok"; grid: StrategyCell[]; best: StrategyCell; dropped: StrategyCandidate[] }
  | { status: "no_viable_strategy"; grid: []; best: null; dropped: StrategyCandidate[] };

export function pitWindow(laps: number): PitWindow {
  return {
    first: Math.max(PIT_WINDOW_MIN_LAP, Math.floor(laps * 0.2)),
    last: Math.min(laps - PIT_WINDOW_MIN_LAP, Math.floor(laps * 0.8))
  };
}

export function candidatePitLaps(laps: number): number[] {
  const { first, last } = pitWindow(laps);
  const out: number[] = [];
  for (let lap = first; lap <= last; lap += PIT_WINDOW_STRIDE) {
    out.push(lap);
  }
  return out;
}

export function selectBestCell(grid: readonly StrategyCell[]): StrategyCell | null {
  let best: StrategyCell | null = null;
  for (const cell of grid) {
    if (!best || cell.expectedTime < best.expectedTime) {
      best = cell;
    }
  }
  return best;
}

export function evaluateStrategyCell(
  config: RaceConfiguration,
  candidate: StrategyCandidate,
  runsPerCell: number,
  seed: number
): StrategyCell | null {
  const cellConfig: RaceConfiguration = {
    ...config,
    tyreCompound: candidate.compound,
    pitLap: candidate.pitLap,
    enableSafetyCar: false
  };
  const times: number[] = [];
  for (let run = 0; run < runsPerCell; run += 1) {
    const rng = createRandomSource(deriveSeed(seed, `${candidate.compound}:${candidate.pitLap}:${run}`));
    const outcome = runRace(cellConfig, rng);
    if (outcome.status === "FINISHED") {
      times.push(outcome.totalTime);
    }
  }
  if (times.length === 0) return null;
  return { ...candidate, expectedTime: mean(times), finished: times.length, runs: runsPerCell };
}

export function optimizeStrategy(input: RaceConfiguration, options: StrategyOptions): StrategyGridResult {
  const { seed, runsPerCell = DEFAULT_RUNS_PER_CELL, compounds = TYRE_COMPOUNDS, onProgress } = options;
  if (!Number.isInteger(runsPerCell) || runsPerCell < 1) {
    throw new RaceConfigError([`runsPerCell: must be a positive integer, got ${runsPerCell}`]);
  }
  const config = createRaceConfig(input);
  const pitLaps = candidatePitLaps(config.laps);
  const candidates: StrategyCandidate[] = compounds.flatMap((compound) =>
    pitLaps.map((pitLap) => ({ compound, pitLap }))
  );

  const grid: StrategyCell[] = [];
  const dropped: StrategyCandidate[] = [];
  candidates.forEach((candidate, index) => {
    const cell = evaluateStrategyCell(config, candidate, runsPerCell, seed);
    if (cell) {
      grid.push(cell);
    } else {
      dropped.push(candidate);
    }
    onProgress?.(index + 1, candidates.length);
  });

  const best = selectBestCell(grid);
  if (!best) {
    return { status: "no_viable_strategy", grid: [], best: null, dropped };
  }
  return { status: "ok", grid, best, dropped };
}
