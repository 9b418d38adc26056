import type { MonteCarloSummary } from "../../src/sim/systems/monteCarloSystem.js";
import type { StrategyGridResult } from "../../src/sim/systems/strategySystem.js";
import type { RaceConfiguration } from "../../src/sim/types/config.js";
import type { RaceOutcome } from "../../src/sim/types/race.js";
import type { CalibrationFailureReason } from "./errors.js";

export type SimulationKind = "race" | "monte_carlo" | "strategy";

export interface RaceResponse {
  seed: number;
  config: RaceConfiguration;
  outcome: RaceOutcome;
}

export interface MonteCarloResponse {
  seed: number;
  config: RaceConfiguration;
  summary: MonteCarloSummary;
}

export interface StrategyResponse {
  seed: number;
  config: RaceConfiguration;
  runsPerCell: number;
  result: StrategyGridResult;
}

export type ErrorResponse =
  | { error: "invalid_configuration"; issues: string[] }
  | { error: "invalid_request"; issues: string[] }
  | { error: "calibration_unavailable"; reason: CalibrationFailureReason; message: string }
  | { error: string };
