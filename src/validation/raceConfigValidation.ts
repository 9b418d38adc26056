import type { ZodIssue } from "zod";
import type { RaceConfiguration } from "../sim/types/config";
import { raceConfigSchema } from "./raceConfigSchema";

export class RaceConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid race configuration: ${issues.join("; ")}`);
    this.name = "RaceConfigError";
    this.issues = issues;
  }
}

export function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join(".");
  return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
}

export function validateRaceConfig(input: unknown): string[] {
  const res = raceConfigSchema.safeParse(input);
  return res.success ? [] : res.error.issues.map(formatIssue);
}

export function createRaceConfig(input: unknown): Readonly<RaceConfiguration> {
  const res = raceConfigSchema.safeParse(input);
  if (!res.success) {
    throw new RaceConfigError(res.error.issues.map(formatIssue));
  }
  return Object.freeze({ ...res.data });
}
