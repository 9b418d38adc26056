export const TYRE_COMPOUNDS = ["soft", "medium", "hard"] as const;

export type TyreCompound = (typeof TYRE_COMPOUNDS)[number];

export interface RaceConfiguration {
  baseLap: number;
  lapStd: number;
  laps: number;
  pitLap: number;
  pitLoss: number;
  engineStress: number;
  reliability: number;
  fuelLoad: number;
  tyreCompound: TyreCompound;
  enableSafetyCar: boolean;
  degFactor: number;
}

export interface CalibrationSeeds {
  baseLap?: number;
  lapStd?: number;
  laps?: number;
  pitLoss?: number;
  degFactor?: number;
}
