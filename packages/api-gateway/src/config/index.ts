import { z } from "zod";

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, key: string, defaultValue = ""): string {
  const val = env[key];
  return val === undefined || val === "" ? defaultValue : val;
}

const PositiveInt = z.coerce.number().int().positive();

function intEnv(env: Env, key: string, defaultValue: number): number {
  const parsed = PositiveInt.safeParse(optionalEnv(env, key, String(defaultValue)));
  if (!parsed.success) throw new Error(`Invalid ${key}: expected a positive integer, got "${env[key] ?? ""}"`);
  return parsed.data;
}

const EnvNameSchema = z.enum(["development", "test", "staging", "production"]).catch("development");

export interface Config {
  readonly env: z.infer<typeof EnvNameSchema>;
  readonly port: number;
  readonly host: string;
  readonly logLevel: string;

  // Inference runtime
  readonly ollamaHost: string;
  readonly defaultModel: string;
  readonly generationTimeoutMs: number;
  readonly inferenceMaxAttempts: number;
  readonly maxTokensCeiling: number;

  // Curation: a curator service URL, or empty for in-process curation with curatorModel
  readonly curatorUrl: string;
  /** How long the gateway waits on the curator service per request */
  readonly curatorTimeoutMs: number;
  readonly curatorModel: string;
  readonly curationCacheTtlMs: number;
  readonly curationCacheMaxEntries: number;

  // Empty disables note writing and listing
  readonly vaultPath: string;

  readonly statusPollIntervalMs: number;

  // Rate limiting uses Redis if configured, memory otherwise
  readonly redisUrl: string;
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;
}

export function loadConfig(env: Env = process.env): Config {
  const defaultModel = optionalEnv(env, "DEFAULT_MODEL", "llama3.1:8b");

  return {
    env: EnvNameSchema.parse(env["NODE_ENV"]),
    port: intEnv(env, "PORT", 3001),
    host: optionalEnv(env, "HOST", "0.0.0.0"),
    logLevel: optionalEnv(env, "LOG_LEVEL", "info"),

    ollamaHost: optionalEnv(env, "OLLAMA_HOST", "http://localhost:11434"),
    defaultModel,
    generationTimeoutMs: intEnv(env, "GENERATION_TIMEOUT_MS", 120_000),
    inferenceMaxAttempts: intEnv(env, "INFERENCE_MAX_ATTEMPTS", 3),
    maxTokensCeiling: intEnv(env, "MAX_TOKENS_CEILING", 4096),

    curatorUrl: optionalEnv(env, "CURATOR_URL"),
    curatorTimeoutMs: intEnv(env, "CURATOR_TIMEOUT_MS", 30_000),
    curatorModel: optionalEnv(env, "CURATOR_MODEL", defaultModel),
    curationCacheTtlMs: intEnv(env, "CURATION_CACHE_TTL_MS", 15 * 60 * 1000),
    curationCacheMaxEntries: intEnv(env, "CURATION_CACHE_MAX_ENTRIES", 256),

    vaultPath: optionalEnv(env, "VAULT_PATH"),

    statusPollIntervalMs: intEnv(env, "STATUS_POLL_INTERVAL_MS", 30_000),

    redisUrl: optionalEnv(env, "REDIS_URL"),
    rateLimitMax: intEnv(env, "RATE_LIMIT_MAX", 100),
    rateLimitWindowMs: intEnv(env, "RATE_LIMIT_WINDOW_MS", 60_000),
  };
}
