import {
  ENGINE_BASE_POWER_HP,
  ENGINE_BASE_WEAR_RATE,
  ENGINE_REFERENCE_RPM,
  ENGINE_WEAR_NOISE_STD
} from "../constants";
import { normal, uniform, type RandomSource } from "../random";

export interface EngineTelemetry {
  rpm: number;
  throttle: number;
  temperature: number;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function enginePower(throttlePct: number, rpm: number, degradation: number): number {
  return ENGINE_BASE_POWER_HP * (throttlePct / 100) * (rpm / ENGINE_REFERENCE_RPM) * (1 - degradation);
}

export function engineWearIncrement(stress: number, lap: number, totalLaps: number): number {
  const stressFactor = 1 + (stress - 1) * 0.5;
  // Wear accelerates as the race goes on.
  const progressFactor = 1 + (lap / totalLaps) * 0.5;
  return ENGINE_BASE_WEAR_RATE * stressFactor * progressFactor;
}

export function advanceEngineDegradation(
  current: number,
  stress: number,
  lap: number,
  totalLaps: number,
  rng: RandomSource
): number {
  const wear = engineWearIncrement(stress, lap, totalLaps);
  return clamp01(current + wear + normal(rng, 0, ENGINE_WEAR_NOISE_STD));
}

export function sampleEngineTelemetry(degradation: number, rng: RandomSource): EngineTelemetry {
  const rpm = normal(rng, 12000, 400);
  const throttle = uniform(rng, 85, 100);
  const temperature = 90 + degradation * 220 + normal(rng, 0, 1.5);
  return { rpm, throttle, temperature };
}

export function engineFailureProbability(reliability: number, degradation: number): number {
  return (1 - reliability) * (1 + degradation * 10);
}
