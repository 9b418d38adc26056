import { z } from "zod";

const ConfigSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  REDIS_URL: z.string().default("redis://redis:6379"),
  CALIBRATION_BASE_URL: z.string().url().default("https://api.openf1.org"),
  CALIBRATION_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  MAX_SIMULATIONS: z.coerce.number().int().positive().default(20000),
  MAX_RUNS_PER_CELL: z.coerce.number().int().positive().default(500),
  DEFAULT_RUNS_PER_CELL: z.coerce.number().int().positive().default(50)
});

export type BackendConfig = z.infer<typeof ConfigSchema>;

type ProcessEnv = Record<string, string | undefined>;

export function loadConfig(env: ProcessEnv = process.env): BackendConfig {
  return ConfigSchema.parse(env);
}
