import "dotenv/config";
import { z } from "zod";

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: int(3000, 1),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  CACHE_TTL_MS: int(300_000, 1),
  CACHE_PARTIAL_TTL_MS: int(30_000, 1),
  CACHE_MAX_ENTRIES: int(1_000, 1),

  MIN_CONNECTION_MINUTES: int(45),
  MAX_LAYOVER_MINUTES: int(240),
  DEFAULT_MAX_CONNECTIONS: int(1),
  MAX_CONNECTIONS_LIMIT: int(2),
  MAX_ITINERARIES: int(100, 1),
  STORE_TIMEOUT_MS: int(5_000, 1),

  PAST_GRACE_DAYS: int(1),
  MAX_ADVANCE_DAYS: int(365, 1),
  MAX_RANGE_DAYS: int(31, 1),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env["NODE_ENV"];
  host: string;
  port: number;
  logLevel: Env["LOG_LEVEL"];
  cache: { ttlMs: number; partialTtlMs: number; maxEntries: number };
  resolver: {
    minConnectionMinutes: number;
    maxLayoverMinutes: number;
    defaultMaxConnections: number;
    maxItineraries: number;
    storeTimeoutMs: number;
  };
  validation: {
    pastGraceDays: number;
    maxAdvanceDays: number;
    maxRangeDays: number;
    defaultMaxConnections: number;
    maxConnectionsLimit: number;
  };
}

/** Parse the environment (defaults for anything unset). Throws listing every bad variable. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const e = parsed.data;
  if (e.DEFAULT_MAX_CONNECTIONS > e.MAX_CONNECTIONS_LIMIT) {
    throw new Error("Invalid environment configuration: DEFAULT_MAX_CONNECTIONS exceeds MAX_CONNECTIONS_LIMIT");
  }
  if (e.MIN_CONNECTION_MINUTES > e.MAX_LAYOVER_MINUTES) {
    throw new Error("Invalid environment configuration: MIN_CONNECTION_MINUTES exceeds MAX_LAYOVER_MINUTES");
  }

  return {
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    cache: { ttlMs: e.CACHE_TTL_MS, partialTtlMs: e.CACHE_PARTIAL_TTL_MS, maxEntries: e.CACHE_MAX_ENTRIES },
    resolver: {
      minConnectionMinutes: e.MIN_CONNECTION_MINUTES,
      maxLayoverMinutes: e.MAX_LAYOVER_MINUTES,
      defaultMaxConnections: e.DEFAULT_MAX_CONNECTIONS,
      maxItineraries: e.MAX_ITINERARIES,
      storeTimeoutMs: e.STORE_TIMEOUT_MS,
    },
    validation: {
      pastGraceDays: e.PAST_GRACE_DAYS,
      maxAdvanceDays: e.MAX_ADVANCE_DAYS,
      maxRangeDays: e.MAX_RANGE_DAYS,
      defaultMaxConnections: e.DEFAULT_MAX_CONNECTIONS,
      maxConnectionsLimit: e.MAX_CONNECTIONS_LIMIT,
    },
  };
}
