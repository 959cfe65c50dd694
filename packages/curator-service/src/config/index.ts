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

export interface Config {
  readonly port: number;
  readonly host: string;
  readonly logLevel: string;
  readonly ollamaHost: string;
  readonly curatorModel: string;
  /** Per attempt; attempts × timeout must stay under the gateway's CURATOR_TIMEOUT_MS */
  readonly curationTimeoutMs: number;
  /** Separate from the gateway's INFERENCE_MAX_ATTEMPTS, which a shared .env also sets */
  readonly curationMaxAttempts: number;
  readonly curationCacheTtlMs: number;
  readonly curationCacheMaxEntries: number;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    port: intEnv(env, "PORT", 5001),
    host: optionalEnv(env, "HOST", "0.0.0.0"),
    logLevel: optionalEnv(env, "LOG_LEVEL", "info"),
    ollamaHost: optionalEnv(env, "OLLAMA_HOST", "http://localhost:11434"),
    curatorModel: optionalEnv(env, "CURATOR_MODEL", optionalEnv(env, "DEFAULT_MODEL", "llama3.1:8b")),
    curationTimeoutMs: intEnv(env, "CURATION_TIMEOUT_MS", 25_000),
    curationMaxAttempts: intEnv(env, "CURATION_MAX_ATTEMPTS", 1),
    curationCacheTtlMs: intEnv(env, "CURATION_CACHE_TTL_MS", 15 * 60 * 1000),
    curationCacheMaxEntries: intEnv(env, "CURATION_CACHE_MAX_ENTRIES", 256),
  };
}
