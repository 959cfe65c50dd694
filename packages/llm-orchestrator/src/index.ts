/**
 * @studyforge/llm-orchestrator — Public API surface
 */
export { InferenceClient, InferenceError, DEFAULT_CONFIG, classifyStatus } from "./client.js";
export type {
  InferenceClientConfig, InferenceClientDeps, FetchFn, GenerateOptions, GenerateOutput, SamplingParams, ClientMetrics,
} from "./client.js";
export { withRetry, computeBackoff, DEFAULT_RETRY_POLICY } from "./retry.js";
export type { RetryPolicy, RetryOptions, SleepFn } from "./retry.js";
export { CurationCache, curationKey, DEFAULT_CACHE_CONFIG } from "./cache.js";
export type { CurationCacheConfig } from "./cache.js";
export { PromptCurator } from "./curator.js";
export type { PromptCuratorOptions } from "./curator.js";
export { RemoteCurationBackend, ModelCurationBackend, CurateResponseSchema } from "./curation-backends.js";
export type { RemoteCurationConfig, CurateResponse } from "./curation-backends.js";
export { ModelCatalog, modelMatches } from "./models.js";
export type { ModelCatalogOptions } from "./models.js";
export { GenerationOrchestrator, PipelineRun, IllegalTransitionError, canTransition } from "./orchestrator.js";
export type { OrchestratorOptions, RunOptions } from "./orchestrator.js";
export { StatusAggregator, summarizeReadiness, initialSnapshot, DEFAULT_POLL_INTERVAL_MS, UNCHECKED_ISSUE } from "./status.js";
export type { StatusAggregatorOptions } from "./status.js";
export { planPrompt, buildCurationPrompt, extractRefinedPrompt, CURATION_SAMPLING } from "./prompts/index.js";
export { createLogger } from "./logger.js";
export type { BaseLogger } from "./logger.js";
export { CurationError } from "./types.js";
export type { PromptPlan, SamplingDefaults, CurationOutcome, CurationBackend, VaultProbeTarget } from "./types.js";
