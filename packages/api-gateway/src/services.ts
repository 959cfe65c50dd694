/**
 * Wires the orchestration core from config. Each process builds one set;
 * route plugins receive it through their options.
 */
import {
  InferenceClient, PromptCurator, CurationCache, RemoteCurationBackend, ModelCurationBackend,
  ModelCatalog, GenerationOrchestrator, StatusAggregator, DEFAULT_RETRY_POLICY,
} from "@studyforge/llm-orchestrator";
import type { BaseLogger, CurationBackend, FetchFn, SleepFn } from "@studyforge/llm-orchestrator";
import { FileSystemVault } from "@studyforge/vault";
import type { Config } from "./config/index.js";

export interface GatewayServices {
  client: InferenceClient;
  catalog: ModelCatalog;
  curator: PromptCurator;
  orchestrator: GenerationOrchestrator;
  aggregator: StatusAggregator;
  vault: FileSystemVault | null;
}

/** Test seams; production passes none */
export interface ServiceDeps {
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  logger?: BaseLogger;
}

export function createServices(config: Config, deps: ServiceDeps = {}): GatewayServices {
  const { fetchFn, sleep, logger } = deps;

  const client = new InferenceClient(
    {
      baseUrl: config.ollamaHost,
      defaultModel: config.defaultModel,
      timeoutMs: config.generationTimeoutMs,
      maxTokensCeiling: config.maxTokensCeiling,
      retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: config.inferenceMaxAttempts },
    },
    { fetchFn, sleep, logger },
  );

  const backend: CurationBackend = config.curatorUrl
    ? new RemoteCurationBackend({ baseUrl: config.curatorUrl, timeoutMs: config.curatorTimeoutMs }, fetchFn)
    : new ModelCurationBackend(client, config.curatorModel);

  const curator = new PromptCurator(backend, {
    cache: new CurationCache({ ttlMs: config.curationCacheTtlMs, maxEntries: config.curationCacheMaxEntries }),
    logger,
  });

  const catalog = new ModelCatalog(client);
  const vault = config.vaultPath ? new FileSystemVault({ rootPath: config.vaultPath, logger }) : null;

  // In-process curation runs on the same runtime, so its model is required too
  const requiredModels = config.curatorUrl ? [config.defaultModel] : [config.defaultModel, config.curatorModel];

  return {
    client,
    catalog,
    curator,
    vault,
    orchestrator: new GenerationOrchestrator({ client, curator, catalog, logger }),
    aggregator: new StatusAggregator({
      client,
      curator,
      vault,
      catalog,
      requiredModels,
      intervalMs: config.statusPollIntervalMs,
      logger,
    }),
  };
}
