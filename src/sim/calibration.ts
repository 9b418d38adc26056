import type { CalibrationSeeds, RaceConfiguration } from "./types/config";
import { createRaceConfig } from "../validation/raceConfigValidation";

function pitLapFits(pitLap: number, laps: number): boolean {
  return pitLap >= 1 && pitLap <= laps;
}

export function applyCalibration(
  config: RaceConfiguration,
  seeds: CalibrationSeeds
): Readonly<RaceConfiguration> {
  const laps = seeds.laps ?? config.laps;
  return createRaceConfig({
    ...config,
    baseLap: seeds.baseLap ?? config.baseLap,
    lapStd: seeds.lapStd ?? config.lapStd,
    laps,
    pitLap: pitLapFits(config.pitLap, laps) ? config.pitLap : Math.max(1, Math.floor(laps / 2)),
    pitLoss: seeds.pitLoss ?? config.pitLoss,
    degFactor: seeds.degFactor ?? config.degFactor
  });
}
