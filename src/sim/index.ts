export * from "./constants";
export * from "./random";
export * from "./calibration";
export * from "./types/config";
export * from "./types/race";
export * from "./systems/engineSystem";
export * from "./systems/fuelSystem";
export * from "./systems/tyreSystem";
export * from "./systems/safetyCarSystem";
export * from "./systems/raceSystem";
export * from "./systems/statsSystem";
export * from "./systems/monteCarloSystem";
export * from "./systems/strategySystem";
export * from "../validation/raceConfigSchema";
export * from "../validation/raceConfigValidation";
