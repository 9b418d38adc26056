import { z } from "zod";
import { TYRE_COMPOUNDS } from "../sim/types/config";

export const tyreCompoundSchema = z.enum(TYRE_COMPOUNDS);

export const raceConfigSchema = z
  .object({
    baseLap: z.number().finite().positive(),
    lapStd: z.number().finite().min(0),
    laps: z.number().int().positive(),
    pitLap: z.number().int(),
    pitLoss: z.number().finite().positive(),
    engineStress: z.number().min(0.5).max(2),
    reliability: z.number().min(0).max(1),
    fuelLoad: z.number().finite().min(0),
    tyreCompound: tyreCompoundSchema,
    enableSafetyCar: z.boolean(),
    degFactor: z.number().finite().positive()
  })
  .superRefine((config, ctx) => {
    if (config.pitLap < 1 || config.pitLap > config.laps) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pitLap"],
        message: `pit lap ${config.pitLap} must fall within [1, ${config.laps}]`
      });
    }
  });

export type RaceConfigSchema = z.infer<typeof raceConfigSchema>;
