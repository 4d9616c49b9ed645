import { z } from "zod";
import type { ScoringStrategy } from "./types";

export const DEFAULT_MODEL_SERVICE_URL = "http://risk-model-svc:5000/predict";

/**
 * Process-wide settings, read once at startup and never mutated.
 */
export type AppConfig = Readonly<{
  nodeEnv: "development" | "production" | "test";
  port: number;
  strategy: ScoringStrategy;
  modelServiceUrl: string;
  modelServiceTimeoutMs: number;
}>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SCORING_STRATEGY: z.enum(["rule-based", "remote"]).optional(),
  USE_MODEL_REGISTRY: z.string().optional(),
  MODEL_SERVICE_URL: z.string().url().default(DEFAULT_MODEL_SERVICE_URL),
  MODEL_SERVICE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1)
    .max(30000)
    .default(5000),
});

/**
 * Interprets an environment variable as a boolean (`1`, `true`, `yes`).
 */
function envFlag(value: string | undefined): boolean {
  if (!value) return false;
  const v = value.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

/**
 * Parses and validates the environment.
 *
 * `SCORING_STRATEGY` wins over the older `USE_MODEL_REGISTRY` toggle. Blank
 * variables count as unset. Throws `ConfigError` listing every bad variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1].trim() !== ""
    )
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const e = parsed.data;
  const strategy: ScoringStrategy =
    e.SCORING_STRATEGY ??
    (envFlag(e.USE_MODEL_REGISTRY) ? "remote" : "rule-based");

  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    strategy,
    modelServiceUrl: e.MODEL_SERVICE_URL,
    modelServiceTimeoutMs: e.MODEL_SERVICE_TIMEOUT_MS,
  });
}
