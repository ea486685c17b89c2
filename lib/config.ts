import { z } from "zod";
import { DEFAULT_TILE_CACHE_DIR } from "./paths";

export const DEFAULT_RETRY_COUNT = 3;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 60;
export const DEFAULT_USER_AGENT = "web-tile-source/0.1";
export const DEFAULT_CACHE_MAX_ENTRIES = 512;
/** Longest delay a Node timer accepts, in whole seconds. */
export const MAX_REQUEST_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

export class TileSourceConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TileSourceConfigError";
  }
}

const retryCountSchema = z.number().int().min(1);
const requestTimeoutSecondsSchema = z.number().positive().max(MAX_REQUEST_TIMEOUT_SECONDS);

export const retryBudgetSchema = z.object({
  retryCount: retryCountSchema,
  requestTimeoutSeconds: requestTimeoutSecondsSchema,
});

export type RetryBudget = z.infer<typeof retryBudgetSchema>;

export type TileEnvConfig = {
  retryCount: number;
  requestTimeoutSeconds: number;
  userAgent: string;
  cacheDir: string;
  cacheMaxEntries: number;
};

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function numberFromEnv(env: Env, name: string, schema: z.ZodType<number>, fallback: number): number {
  const raw = envValue(env, name);
  if (raw === undefined) return fallback;
  const parsed = schema.safeParse(Number(raw));
  if (!parsed.success) {
    console.warn(`[tile-config] Ignoring invalid ${name}=${JSON.stringify(raw)}, using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}

export function loadTileEnvConfig(env: Env = process.env): TileEnvConfig {
  return {
    retryCount: numberFromEnv(env, "TILE_RETRY_COUNT", retryCountSchema, DEFAULT_RETRY_COUNT),
    requestTimeoutSeconds: numberFromEnv(
      env,
      "TILE_REQUEST_TIMEOUT_SECONDS",
      requestTimeoutSecondsSchema,
      DEFAULT_REQUEST_TIMEOUT_SECONDS,
    ),
    userAgent: envValue(env, "TILE_USER_AGENT") ?? DEFAULT_USER_AGENT,
    cacheDir: envValue(env, "TILE_CACHE_DIR") ?? DEFAULT_TILE_CACHE_DIR,
    cacheMaxEntries: numberFromEnv(
      env,
      "TILE_CACHE_MAX_ENTRIES",
      z.number().int().min(1),
      DEFAULT_CACHE_MAX_ENTRIES,
    ),
  };
}

function describeIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`).join("; ");
}

/** Explicit options win over the environment; bad explicit values are programmer errors. */
export function resolveRetryBudget(
  options: { retryCount?: number; requestTimeoutSeconds?: number },
  env: TileEnvConfig = loadTileEnvConfig(),
): RetryBudget {
  const parsed = retryBudgetSchema.safeParse({
    retryCount: options.retryCount ?? env.retryCount,
    requestTimeoutSeconds: options.requestTimeoutSeconds ?? env.requestTimeoutSeconds,
  });
  if (!parsed.success) {
    throw new TileSourceConfigError(`Invalid retry budget: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function perAttemptTimeoutMs(budget: RetryBudget) {
  return (budget.requestTimeoutSeconds * 1000) / budget.retryCount;
}
