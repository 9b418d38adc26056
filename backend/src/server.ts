import Fastify, { type FastifyBaseLogger } from "fastify";
import { randomInt } from "node:crypto";
import { pathToFileURL } from "node:url";
import { createClient } from "redis";
import { z, ZodError } from "zod";
import {
  COMPOUND_TABLE,
  createRaceConfig,
  createRandomSource,
  DEFAULT_RACE_CONFIG,
  formatIssue,
  optimizeStrategy,
  RaceConfigError,
  runMonteCarlo,
  runRace,
  type RaceConfiguration
} from "../../src/sim/index.js";
import { CalibrationService } from "./calibrationService.js";
import { MemoryCalibrationCache, RedisCalibrationCache, type CalibrationCache } from "./calibrationCache.js";
import { loadConfig, type BackendConfig } from "./config.js";
import { ApiError, CalibrationUnavailableError } from "./errors.js";
import { LapDataClient, type LapDataSource } from "./lapDataClient.js";
import { listTrackConstants } from "./trackConstants.js";
import type { ErrorResponse, MonteCarloResponse, RaceResponse, SimulationKind, StrategyResponse } from "./types.js";

const API_V1_PREFIX = "/api/v1";
const MAX_SEED = 0x1_0000_0000;

type RedisClient = ReturnType<typeof createClient>;

type CreateAppOptions = {
  logger?: boolean;
  calibrationCache?: CalibrationCache;
  redis?: RedisClient | null;
  lapDataSource?: LapDataSource;
  seedSource?: () => number;
};

const ConfigPatchSchema = z.record(z.unknown());

const SeedSchema = z.number().int().min(0).max(MAX_SEED - 1);

const RaceRequestSchema = z.object({
  config: ConfigPatchSchema.optional(),
  seed: SeedSchema.optional()
});

const TrackQuerySchema = z.object({
  venue: z.string().min(1)
});

const SessionPathSchema = z.object({
  sessionKey: z.coerce.number().int().positive()
});

const SessionDriverPathSchema = SessionPathSchema.extend({
  driverNumber: z.coerce.number().int().positive()
});

function resolveConfig(patch: Record<string, unknown> | undefined): Readonly<RaceConfiguration> {
  return createRaceConfig({ ...DEFAULT_RACE_CONFIG, ...(patch ?? {}) });
}

async function createCalibrationCache(
  redisUrl: string,
  log: FastifyBaseLogger
): Promise<{ calibrationCache: CalibrationCache; redis: RedisClient | null }> {
  const redis = createClient({
    url: redisUrl,
    socket: {
      connectTimeout: 2000,
      reconnectStrategy: (retries: number) => (retries >= 3 ? new Error("Redis unavailable.") : 200)
    }
  });
  redis.on("error", (error: unknown) => {
    log.warn({ event: "redis.error", err: error }, "calibration_cache_event");
  });
  try {
    await redis.connect();
    return { calibrationCache: new RedisCalibrationCache(redis), redis };
  } catch (error) {
    log.warn({ event: "redis.fallback", err: error }, "calibration_cache_event");
    if (redis.isOpen) {
      await redis.disconnect();
    }
    return { calibrationCache: new MemoryCalibrationCache(), redis: null };
  }
}

export async function createApp(config: BackendConfig, options: CreateAppOptions = {}) {
  const app = Fastify({ logger: options.logger === false ? false : { level: config.LOG_LEVEL } });
  const { calibrationCache, redis } = options.calibrationCache
    ? { calibrationCache: options.calibrationCache, redis: options.redis ?? null }
    : await createCalibrationCache(config.REDIS_URL, app.log);
  const lapDataSource =
    options.lapDataSource ??
    new LapDataClient({
      baseUrl: config.CALIBRATION_BASE_URL,
      cache: calibrationCache,
      cacheTtlSeconds: config.CALIBRATION_CACHE_TTL_SECONDS,
      log: app.log
    });
  const calibration = new CalibrationService(lapDataSource, app.log);
  const nextSeed = options.seedSource ?? (() => randomInt(0, MAX_SEED));

  const MonteCarloRequestSchema = RaceRequestSchema.extend({
    simulations: z.number().int().min(1).max(config.MAX_SIMULATIONS).default(2000)
  });

  const StrategyRequestSchema = RaceRequestSchema.extend({
    runsPerCell: z.number().int().min(1).max(config.MAX_RUNS_PER_CELL).default(config.DEFAULT_RUNS_PER_CELL)
  });

  function logSimulation(kind: SimulationKind, context: Record<string, unknown>) {
    app.log.info({ event: `simulation.${kind}`, ...context }, "simulation_event");
  }

  app.setErrorHandler((error, _request, reply) => {
    let body: ErrorResponse;
    if (error instanceof RaceConfigError) {
      body = { error: "invalid_configuration", issues: error.issues };
      return reply.code(400).send(body);
    }
    if (error instanceof ZodError) {
      body = { error: "invalid_request", issues: error.issues.map(formatIssue) };
      return reply.code(400).send(body);
    }
    if (error instanceof CalibrationUnavailableError) {
      app.log.warn({ event: "calibration.unavailable", reason: error.reason, err: error }, "calibration_event");
      body = { error: "calibration_unavailable", reason: error.reason, message: error.message };
      return reply.code(503).send(body);
    }
    if (error instanceof ApiError) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.code ?? "bad_request" });
    }
    app.log.error(error);
    return reply.code(500).send({ error: "internal_error" });
  });

  app.get("/health", async () => ({
    ok: true,
    redis: redis?.isReady ?? false,
    cache: calibrationCache.kind
  }));

  app.get(`${API_V1_PREFIX}/defaults`, async () => ({
    config: DEFAULT_RACE_CONFIG,
    compounds: COMPOUND_TABLE,
    tracks: listTrackConstants()
  }));

  app.post(`${API_V1_PREFIX}/races`, async (request): Promise<RaceResponse> => {
    const body = RaceRequestSchema.parse(request.body ?? {});
    const raceConfig = resolveConfig(body.config);
    const seed = body.seed ?? nextSeed();
    const startedAt = performance.now();
    const outcome = runRace(raceConfig, createRandomSource(seed));
    logSimulation("race", {
      seed,
      status: outcome.status,
      dnfLap: outcome.dnfLap,
      elapsedMs: Math.round(performance.now() - startedAt)
    });
    return { seed, config: raceConfig, outcome };
  });

  app.post(`${API_V1_PREFIX}/monte-carlo`, async (request): Promise<MonteCarloResponse> => {
    const body = MonteCarloRequestSchema.parse(request.body ?? {});
    const raceConfig = resolveConfig(body.config);
    const seed = body.seed ?? nextSeed();
    const startedAt = performance.now();
    const summary = runMonteCarlo(raceConfig, {
      simulations: body.simulations,
      seed,
      onProgress: (completed, total) => {
        request.log.debug({ event: "simulation.monte_carlo.progress", completed, total }, "simulation_event");
      }
    });
    logSimulation("monte_carlo", {
      seed,
      simulations: summary.simulations,
      finished: summary.finished,
      status: summary.status,
      elapsedMs: Math.round(performance.now() - startedAt)
    });
    return { seed, config: raceConfig, summary };
  });

  app.post(`${API_V1_PREFIX}/strategies/optimize`, async (request): Promise<StrategyResponse> => {
    const body = StrategyRequestSchema.parse(request.body ?? {});
    const raceConfig = resolveConfig(body.config);
    const seed = body.seed ?? nextSeed();
    const startedAt = performance.now();
    const result = optimizeStrategy(raceConfig, { seed, runsPerCell: body.runsPerCell });
    logSimulation("strategy", {
      seed,
      runsPerCell: body.runsPerCell,
      cells: result.grid.length,
      dropped: result.dropped.length,
      status: result.status,
      elapsedMs: Math.round(performance.now() - startedAt)
    });
    return { seed, config: raceConfig, runsPerCell: body.runsPerCell, result };
  });

  app.get(`${API_V1_PREFIX}/calibration/tracks`, async (request) => {
    const query = TrackQuerySchema.parse(request.query);
    return calibration.trackConstants(query.venue);
  });

  app.get(`${API_V1_PREFIX}/calibration/sessions/:sessionKey/drivers`, async (request) => {
    const params = SessionPathSchema.parse(request.params);
    const drivers = await calibration.listDrivers(params.sessionKey);
    if (drivers.length === 0) {
      throw new ApiError(404, `Session ${params.sessionKey} has no drivers.`);
    }
    return { sessionKey: params.sessionKey, drivers };
  });

  app.get(`${API_V1_PREFIX}/calibration/sessions/:sessionKey/drivers/:driverNumber`, async (request) => {
    const params = SessionDriverPathSchema.parse(request.params);
    return calibration.calibrateSession(params.sessionKey, params.driverNumber);
  });

  app.addHook("onClose", async () => {
    if (redis) {
      await redis.disconnect();
    }
  });

  return app;
}

async function bootstrap() {
  const config = loadConfig();
  const app = await createApp(config);
  await app.listen({ host: config.HOST, port: config.PORT });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  bootstrap().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
