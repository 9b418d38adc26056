import { describe, expect, it, vi } from "vitest";
import { DEFAULT_RACE_CONFIG } from "../constants";
import type { RaceConfiguration } from "../types/config";
import { RaceConfigError } from "../../validation/raceConfigValidation";
import {
  candidatePitLaps,
  evaluateStrategyCell,
  optimizeStrategy,
  pitWindow,
  selectBestCell,
  type StrategyCell
} from "./strategySystem";

function makeConfig(overrides: Partial<RaceConfiguration> = {}): RaceConfiguration {
  return { ...DEFAULT_RACE_CONFIG, laps: 30, pitLap: 15, reliability: 1, ...overrides };
}

function cell(compound: StrategyCell["compound"], pitLap: number, expectedTime: number): StrategyCell {
  return { compound, pitLap, expectedTime, finished: 1, runs: 1 };
}

describe("pit window", () => {
  it("clips the window to 20-80 % of the race and five laps from either end", () => {
    expect(pitWindow(50)).toEqual({ first: 10, last: 40 });
    expect(pitWindow(30)).toEqual({ first: 6, last: 24 });
    expect(pitWindow(10)).toEqual({ first: 5, last: 5 });
  });

  it("samples pit laps at stride two", () => {
    expect(candidatePitLaps(30)).toEqual([6, 8, 10, 12, 14, 16, 18, 20, 22, 24]);
    expect(candidatePitLaps(10)).toEqual([5]);
    expect(candidatePitLaps(8)).toEqual([]);
  });
});

describe("selectBestCell", () => {
  it("picks the minimum and keeps the first of equal cells", () => {
    const grid = [cell("soft", 10, 4500), cell("medium", 12, 4400), cell("hard", 14, 4400)];
    expect(selectBestCell(grid)).toBe(grid[1]);
    expect(selectBestCell([])).toBeNull();
  });
});

describe("evaluateStrategyCell", () => {
  it("averages finishing runs and drops a cell with none", () => {
    const config = makeConfig();
    const viable = evaluateStrategyCell(config, { compound: "hard", pitLap: 12 }, 4, 1);
    expect(viable?.runs).toBe(4);
    expect(viable?.compound).toBe("hard");
    expect(viable?.pitLap).toBe(12);
    expect(evaluateStrategyCell(makeConfig({ reliability: 0 }), { compound: "hard", pitLap: 12 }, 4, 1)).toBeNull();
  });
});

describe("optimizeStrategy", () => {
  it("searches every compound and pit lap and returns the fastest cell", () => {
    const result = optimizeStrategy(makeConfig(), { seed: 77, runsPerCell: 5 });
    expect(result.status).toBe("ok");
    if (result.status === "ok") {
      expect(result.grid.length + result.dropped.length).toBe(30);
      for (const other of result.grid) {
        expect(result.best.expectedTime).toBeLessThanOrEqual(other.expectedTime);
      }
    }
  });

  it("is deterministic for a fixed seed", () => {
    const a = optimizeStrategy(makeConfig(), { seed: 9, runsPerCell: 3 });
    const b = optimizeStrategy(makeConfig(), { seed: 9, runsPerCell: 3 });
    expect(a).toEqual(b);
  });

  it("ignores the configured safety car setting", () => {
    const withCar = optimizeStrategy(makeConfig({ enableSafetyCar: true }), { seed: 21, runsPerCell: 3 });
    const withoutCar = optimizeStrategy(makeConfig({ enableSafetyCar: false }), { seed: 21, runsPerCell: 3 });
    expect(withCar).toEqual(withoutCar);
  });

  it("reports no viable strategy when every cell retires", () => {
    const result = optimizeStrategy(makeConfig({ reliability: 0 }), { seed: 1, runsPerCell: 2 });
    expect(result.status).toBe("no_viable_strategy");
    expect(result.best).toBeNull();
    expect(result.grid).toEqual([]);
    expect(result.dropped).toHaveLength(30);
  });

  it("reports no viable strategy for a race too short for a pit window", () => {
    const result = optimizeStrategy(makeConfig({ laps: 8, pitLap: 4 }), { seed: 1, runsPerCell: 2 });
    expect(result).toEqual({ status: "no_viable_strategy", grid: [], best: null, dropped: [] });
  });

  it("restricts the search to the requested compounds and reports progress", () => {
    const onProgress = vi.fn();
    const result = optimizeStrategy(makeConfig(), { seed: 2, runsPerCell: 2, compounds: ["medium"], onProgress });
    expect(result.status).toBe("ok");
    if (result.status === "ok") {
      expect(result.grid.every((c) => c.compound === "medium")).toBe(true);
    }
    expect(onProgress).toHaveBeenCalledTimes(10);
    expect(onProgress).toHaveBeenLastCalledWith(10, 10);
  });

  it("rejects a non-positive run count", () => {
    expect(() => optimizeStrategy(makeConfig(), { seed: 1, runsPerCell: 0 })).toThrow(RaceConfigError);
  });
});
