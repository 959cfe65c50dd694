/**
 * Inference runtime client — fetch-based, no SDK dependency.
 *
 * Talks to an Ollama-compatible HTTP API:
 *   GET  /api/version   liveness probe
 *   GET  /api/tags      installed models
 *   POST /api/generate  non-streaming completion
 *
 * Every failure leaves this module as an InferenceError whose `kind` and
 * `retryable` flag are already decided, so callers never look at HTTP detail.
 */

import { z } from "zod";
import { isRetryable, makeErrorInfo } from "@studyforge/shared-types";
import type { ErrorInfo, ErrorKind } from "@studyforge/shared-types";
import { DEFAULT_RETRY_POLICY, withRetry, sleep as defaultSleep } from "./retry.js";
import type { RetryPolicy, SleepFn } from "./retry.js";
import { createLogger, type BaseLogger } from "./logger.js";

export class InferenceError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(kind: ErrorKind, message: string, statusCode?: number) {
    super(message);
    this.name = "InferenceError";
    this.kind = kind;
    this.retryable = isRetryable(kind);
    if (statusCode !== undefined) this.statusCode = statusCode;
  }

  toInfo(): ErrorInfo {
    return makeErrorInfo(this.kind, this.message);
  }
}

// ─── Config ───────────────────────────────────────────────────────────────────

export interface InferenceClientConfig {
  baseUrl: string;
  defaultModel: string;
  /** Per-attempt timeout for generation */
  timeoutMs: number;
  /** Timeout for version and model-list calls */
  probeTimeoutMs: number;
  /** Hard ceiling on num_predict regardless of caller input */
  maxTokensCeiling: number;
  defaultTemperature: number;
  defaultTopP: number;
  defaultMaxTokens: number;
  retry: RetryPolicy;
}

export const DEFAULT_CONFIG: InferenceClientConfig = {
  baseUrl: process.env["OLLAMA_HOST"] ?? "http://localhost:11434",
  defaultModel: process.env["DEFAULT_MODEL"] ?? "llama3.1:8b",
  timeoutMs: 120_000,
  probeTimeoutMs: 5_000,
  maxTokensCeiling: 4096,
  defaultTemperature: 0.7,
  defaultTopP: 0.9,
  defaultMaxTokens: 1024,
  retry: DEFAULT_RETRY_POLICY,
};

export type FetchFn = typeof globalThis.fetch;

export interface InferenceClientDeps {
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  random?: () => number;
  logger?: BaseLogger;
}

export interface GenerateOptions {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  /** Overrides the configured per-attempt timeout */
  timeoutMs?: number;
}

export interface GenerateOutput {
  content: string;
  /** Completion tokens reported by the runtime */
  tokenCount: number;
  promptTokens: number;
  model: string;
}

export interface SamplingParams {
  temperature: number;
  topP: number;
  maxTokens: number;
}

export interface ClientMetrics {
  requests: number;
  retries: number;
  failures: number;
  promptTokens: number;
  completionTokens: number;
}

// ─── Wire schemas ─────────────────────────────────────────────────────────────

const VersionSchema = z.object({ version: z.string() });

const TagsSchema = z.object({
  models: z.array(z.object({ name: z.string().min(1) })),
});

const GenerateResponseSchema = z.object({
  response: z.string(),
  eval_count: z.number().int().nonnegative().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
});

const ErrorBodySchema = z.object({ error: z.string() });

// ─── Client ───────────────────────────────────────────────────────────────────

export class InferenceClient {
  readonly config: InferenceClientConfig;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly log: BaseLogger;
  private metrics: ClientMetrics = emptyMetrics();

  constructor(config: Partial<InferenceClientConfig> = {}, deps: InferenceClientDeps = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config, baseUrl: (config.baseUrl ?? DEFAULT_CONFIG.baseUrl).replace(/\/+$/, "") };
    this.fetchFn = deps.fetchFn ?? globalThis.fetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.log = deps.logger ?? createLogger("inference-client");
  }

  /** True when the runtime answers its version probe; never throws */
  async testConnection(): Promise<boolean> {
    try {
      await this.getVersion();
      return true;
    } catch (err) {
      this.log.debug({ err, baseUrl: this.config.baseUrl }, "Inference runtime probe failed");
      return false;
    }
  }

  async getVersion(): Promise<string> {
    const response = await this.send("/api/version", { method: "GET" }, this.config.probeTimeoutMs, "UpstreamError");
    const data = await this.readJson(response, VersionSchema, "UpstreamError", "/api/version", this.config.probeTimeoutMs);
    return data.version;
  }

  /** Names of installed models. Not retried: callers poll this. */
  async listModels(): Promise<Set<string>> {
    const response = await this.send("/api/tags", { method: "GET" }, this.config.probeTimeoutMs, "UpstreamError");
    const data = await this.readJson(response, TagsSchema, "UpstreamError", "/api/tags", this.config.probeTimeoutMs);
    return new Set(data.models.map((m) => m.name));
  }

  async generate(prompt: string, model: string = this.config.defaultModel, options: GenerateOptions = {}): Promise<GenerateOutput> {
    const sampling = this.resolveSampling(options);
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const body = JSON.stringify({
      model,
      prompt,
      stream: false,
      options: {
        temperature: sampling.temperature,
        top_p: sampling.topP,
        num_predict: sampling.maxTokens,
      },
    });

    this.metrics.requests++;

    try {
      const data = await withRetry(
        async () => {
          const response = await this.send(
            "/api/generate",
            { method: "POST", headers: { "Content-Type": "application/json" }, body },
            timeoutMs,
            "ModelNotFound",
          );
          return this.readJson(response, GenerateResponseSchema, "InvalidResponse", "/api/generate", timeoutMs);
        },
        {
          policy: this.config.retry,
          shouldRetry: (err) => err instanceof InferenceError && err.retryable,
          sleep: this.sleep,
          random: this.random,
          onRetry: (err, attempt, delayMs) => {
            this.metrics.retries++;
            this.log.warn(
              { model, attempt, maxAttempts: this.config.retry.maxAttempts, delayMs: Math.round(delayMs), kind: err instanceof InferenceError ? err.kind : undefined },
              "Generation attempt failed, retrying",
            );
          },
        },
      );

      const promptTokens = data.prompt_eval_count ?? 0;
      const tokenCount = data.eval_count ?? 0;
      this.metrics.promptTokens += promptTokens;
      this.metrics.completionTokens += tokenCount;
      return { content: data.response, tokenCount, promptTokens, model };
    } catch (err) {
      this.metrics.failures++;
      const error = err instanceof InferenceError
        ? err
        : new InferenceError("UpstreamError", err instanceof Error ? err.message : String(err));
      this.log.error({ model, kind: error.kind, statusCode: error.statusCode }, error.message);
      throw error;
    }
  }

  /** Clamp caller sampling options into the ranges the runtime is sent */
  resolveSampling(options: GenerateOptions = {}): SamplingParams {
    const maxTokens = finiteOr(options.maxTokens, this.config.defaultMaxTokens);
    return {
      temperature: clamp(finiteOr(options.temperature, this.config.defaultTemperature), 0, 1),
      topP: clamp(finiteOr(options.topP, this.config.defaultTopP), 0, 1),
      maxTokens: clamp(Math.round(maxTokens), 1, this.config.maxTokensCeiling),
    };
  }

  getMetrics(): Readonly<ClientMetrics> {
    return { ...this.metrics };
  }

  resetMetrics(): void {
    this.metrics = emptyMetrics();
  }

  // ─── Transport ──────────────────────────────────────────────────────────────

  private async send(path: string, init: RequestInit, timeoutMs: number, notFoundKind: ErrorKind): Promise<Response> {
    const url = `${this.config.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      throw this.classifyFetchError(err, path, timeoutMs);
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw classifyStatus(response.status, detail, path, notFoundKind);
    }
    return response;
  }

  private async readJson<T>(
    response: Response,
    schema: z.ZodType<T>,
    invalidKind: ErrorKind,
    path: string,
    timeoutMs: number,
  ): Promise<T> {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw this.classifyFetchError(err, path, timeoutMs);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new InferenceError(invalidKind, `Inference runtime returned non-JSON from ${path}: ${text.slice(0, 200)}`);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
      throw new InferenceError(invalidKind, `Unexpected payload from ${path} at ${where}: ${issue?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  private classifyFetchError(err: unknown, path: string, timeoutMs: number): InferenceError {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      return new InferenceError("Timeout", `Inference runtime did not answer ${path} within ${timeoutMs} ms`);
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new InferenceError("NetworkUnavailable", `Cannot reach the inference runtime at ${this.config.baseUrl}: ${reason}`);
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function classifyStatus(status: number, detail: string, path: string, notFoundKind: ErrorKind = "ModelNotFound"): InferenceError {
  if (status === 404) {
    const message = notFoundKind === "ModelNotFound"
      ? `Model not found on the inference runtime: ${detail}`
      : `Inference runtime has no ${path} endpoint: ${detail}`;
    return new InferenceError(notFoundKind, message, status);
  }
  if (status === 408 || status === 504) {
    return new InferenceError("Timeout", `Inference runtime timed out on ${path} (HTTP ${status})`, status);
  }
  if (status === 502 || status === 503) {
    return new InferenceError("NetworkUnavailable", `Inference runtime unavailable (HTTP ${status}): ${detail}`, status);
  }
  return new InferenceError("UpstreamError", `Inference runtime error ${status} on ${path}: ${detail}`, status);
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  const parsed = ErrorBodySchema.safeParse(parseJsonOrUndefined(text));
  if (parsed.success) return parsed.data.error;
  return text.trim().slice(0, 200) || response.statusText || "no detail";
}

function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function emptyMetrics(): ClientMetrics {
  return { requests: 0, retries: 0, failures: 0, promptTokens: 0, completionTokens: 0 };
}
