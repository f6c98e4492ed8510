import { z } from "zod";
import type { LogLevel } from "./lib/logger";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  REDIS_URL: optionalString,
  REDIS_HOST: optionalString,
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: optionalString,
  REDIS_DB: z.coerce.number().int().min(0).default(0),

  SAUCENAO_API_KEY: optionalString,
  SAUCENAO_MIN_SIMILARITY: z.coerce.number().min(0).max(100).default(80),

  NOT_FOUND_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24),
  MAX_RESULTS_PER_SEARCH: z.coerce.number().int().positive().default(20),
  RESOLVER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  HIT_CHANNEL_CAPACITY: z.coerce.number().int().positive().default(32),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),

  USER_AGENT: z.string().default("reverse_image_search_bot/3.0"),
  BROWSER_USER_AGENT: z
    .string()
    .default("Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36"),
});

export interface RedisSettings {
  url?: string;
  host?: string;
  port: number;
  password?: string;
  database: number;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  redis: RedisSettings | null;
  saucenao: {
    apiKey?: string;
    minSimilarity: number;
  };
  search: {
    notFoundTtlSeconds: number;
    maxResults: number;
    resolverConcurrency: number;
    hitChannelCapacity: number;
  };
  http: {
    timeoutMs: number;
    userAgent: string;
    browserUserAgent: string;
  };
}

/**
 * Parse configuration from the environment. Throws with every invalid
 * variable listed when the environment does not validate.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  const values = parsed.data;

  const redisConfigured = values.REDIS_URL !== undefined || values.REDIS_HOST !== undefined;

  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    redis: redisConfigured
      ? {
          url: values.REDIS_URL,
          host: values.REDIS_HOST,
          port: values.REDIS_PORT,
          password: values.REDIS_PASSWORD,
          database: values.REDIS_DB,
        }
      : null,
    saucenao: {
      apiKey: values.SAUCENAO_API_KEY,
      minSimilarity: values.SAUCENAO_MIN_SIMILARITY,
    },
    search: {
      notFoundTtlSeconds: values.NOT_FOUND_TTL_SECONDS,
      maxResults: values.MAX_RESULTS_PER_SEARCH,
      resolverConcurrency: values.RESOLVER_CONCURRENCY,
      hitChannelCapacity: values.HIT_CHANNEL_CAPACITY,
    },
    http: {
      timeoutMs: values.HTTP_TIMEOUT_MS,
      userAgent: values.USER_AGENT,
      browserUserAgent: values.BROWSER_USER_AGENT,
    },
  };
}
