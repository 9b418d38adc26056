import { describe, expect, it } from "vitest";
import { DEFAULT_RACE_CONFIG } from "../sim/constants";
import { raceConfigSchema } from "./raceConfigSchema";

describe("raceConfigSchema", () => {
  it("accepts the default configuration", () => {
    expect(raceConfigSchema.safeParse(DEFAULT_RACE_CONFIG).success).toBe(true);
  });

  it("fails when a field is missing", () => {
    const { tyreCompound: _omitted, ...rest } = DEFAULT_RACE_CONFIG;
    expect(raceConfigSchema.safeParse(rest).success).toBe(false);
  });

  it("accepts the pit lap on either boundary", () => {
    expect(raceConfigSchema.safeParse({ ...DEFAULT_RACE_CONFIG, pitLap: 1 }).success).toBe(true);
    expect(raceConfigSchema.safeParse({ ...DEFAULT_RACE_CONFIG, pitLap: 50 }).success).toBe(true);
  });
});
