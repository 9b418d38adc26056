import { HISTOGRAM_BINS } from "../constants";
import { createRandomSource, deriveSeed } from "../random";
import type { RaceConfiguration } from "../types/config";
import type { RaceOutcome } from "../types/race";
import { createRaceConfig, RaceConfigError } from "../../validation/raceConfigValidation";
import { runRace } from "./raceSystem";
import { describeDistribution, histogram, mean, type DistributionStats, type HistogramBin } from "./statsSystem";

export type ProgressListener = (completed: number, total: number) => void;

export interface MonteCarloOptions {
  simulations: number;
  seed: number;
  histogramBins?: number;
  onProgress?: ProgressListener;
}

export interface MonteCarloRun {
  simId: number;
  lapsCompleted: number;
  finished: boolean;
  totalTime: number | null;
  avgLapTime: number | null;
  safetyCarLaps: number;
}

interface MonteCarloSummaryBase {
  simulations: number;
  finished: number;
  finishRate: number;
  finishingTimes: number[];
  runs: MonteCarloRun[];
}

export type MonteCarloSummary =
  | (MonteCarloSummaryBase & { status: "ok"; stats: DistributionStats; histogram: HistogramBin[] })
  | (MonteCarloSummaryBase & { status: "all_dnf"; stats: null; histogram: [] });

export function summarizeRun(simId: number, outcome: RaceOutcome): MonteCarloRun {
  const finished = outcome.status === "FINISHED";
  return {
    simId,
    lapsCompleted: outcome.status === "DNF" ? outcome.dnfLap : outcome.laps.length,
    finished,
    totalTime: finished ? outcome.totalTime : null,
    avgLapTime: finished ? mean(outcome.laps.map((lap) => lap.lapTime)) : null,
    safetyCarLaps: outcome.laps.filter((lap) => lap.safetyCar).length
  };
}

export function progressInterval(total: number): number {
  return Math.max(1, Math.floor(total / 10));
}

export function runMonteCarlo(input: RaceConfiguration, options: MonteCarloOptions): MonteCarloSummary {
  const { simulations, seed, histogramBins = HISTOGRAM_BINS, onProgress } = options;
  if (!Number.isInteger(simulations) || simulations < 1) {
    throw new RaceConfigError([`simulations: must be a positive integer, got ${simulations}`]);
  }
  const config = createRaceConfig(input);
  const interval = progressInterval(simulations);

  const runs: MonteCarloRun[] = [];
  const finishingTimes: number[] = [];
  for (let i = 0; i < simulations; i += 1) {
    const outcome = runRace(config, createRandomSource(deriveSeed(seed, i)));
    runs.push(summarizeRun(i, outcome));
    if (outcome.status === "FINISHED") {
      finishingTimes.push(outcome.totalTime);
    }
    const completed = i + 1;
    if (onProgress && (completed % interval === 0 || completed === simulations)) {
      onProgress(completed, simulations);
    }
  }

  const base: MonteCarloSummaryBase = {
    simulations,
    finished: finishingTimes.length,
    finishRate: finishingTimes.length / simulations,
    finishingTimes,
    runs
  };
  const stats = describeDistribution(finishingTimes);
  if (!stats) {
    return { ...base, status: "all_dnf", stats: null, histogram: [] };
  }
  return { ...base, status: "ok", stats, histogram: histogram(finishingTimes, histogramBins) };
}
