import { describe, expect, it } from "vitest";
import { applyCalibration } from "./calibration";
import { DEFAULT_RACE_CONFIG } from "./constants";
import { RaceConfigError } from "../validation/raceConfigValidation";

describe("applyCalibration", () => {
  it("copies calibration numbers into a new configuration", () => {
    const config = applyCalibration(DEFAULT_RACE_CONFIG, {
      baseLap: 91.4,
      lapStd: 0.7,
      laps: 52,
      pitLoss: 23,
      degFactor: 1.1
    });
    expect(config).toEqual({
      ...DEFAULT_RACE_CONFIG,
      baseLap: 91.4,
      lapStd: 0.7,
      laps: 52,
      pitLoss: 23,
      degFactor: 1.1
    });
    expect(DEFAULT_RACE_CONFIG.laps).toBe(50);
  });

  it("keeps configured values for missing seeds", () => {
    expect(applyCalibration(DEFAULT_RACE_CONFIG, {})).toEqual(DEFAULT_RACE_CONFIG);
  });

  it("moves the pit lap to mid-race when the race gets shorter", () => {
    const config = applyCalibration({ ...DEFAULT_RACE_CONFIG, pitLap: 45 }, { laps: 31 });
    expect(config.pitLap).toBe(15);
  });

  it("keeps the pit lap on track for a one-lap race", () => {
    const config = applyCalibration(DEFAULT_RACE_CONFIG, { laps: 1 });
    expect(config.laps).toBe(1);
    expect(config.pitLap).toBe(1);
  });

  it("rejects seeds that break the configuration", () => {
    expect(() => applyCalibration(DEFAULT_RACE_CONFIG, { baseLap: -1 })).toThrow(RaceConfigError);
  });
});
