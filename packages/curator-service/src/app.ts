/**
 * Curator service
 *
 * POST /api/curate  { prompt, instruction? } → { refined_prompt, curated, reason?, ... }
 * GET  /healthz     → 200 while the service runs; inference state is reported, not enforced
 *
 * A curation that cannot reach the model still answers 200 with the original
 * prompt and `curated: false`, so callers never block on this service.
 */

import Fastify from "fastify";
import { z } from "zod";
import {
  InferenceClient, PromptCurator, CurationCache, ModelCurationBackend, modelMatches, DEFAULT_RETRY_POLICY,
} from "@studyforge/llm-orchestrator";
import type { BaseLogger, FetchFn } from "@studyforge/llm-orchestrator";
import type { Config } from "./config/index.js";

export const MAX_PROMPT_LENGTH = 10_000;

const CurateBodySchema = z.object(
  {
    prompt: z
      .string({ required_error: "Missing required field 'prompt'", invalid_type_error: "Field 'prompt' must be a string" })
      .max(MAX_PROMPT_LENGTH, "Field 'prompt' too long (max 10,000 characters)")
      .refine((p) => p.trim().length > 0, "Field 'prompt' cannot be empty"),
    instruction: z.string({ invalid_type_error: "Field 'instruction' must be a string" }).default(""),
  },
  { required_error: "Request body must be a JSON object", invalid_type_error: "Request body must be a JSON object" },
);

export interface CuratorDeps {
  fetchFn?: FetchFn;
  logger?: BaseLogger;
}

export async function buildApp(config: Config, deps: CuratorDeps = {}) {
  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    bodyLimit: 128 * 1024,
  });

  const client = new InferenceClient(
    {
      baseUrl: config.ollamaHost,
      defaultModel: config.curatorModel,
      timeoutMs: config.curationTimeoutMs,
      retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: config.curationMaxAttempts },
    },
    { fetchFn: deps.fetchFn, logger: deps.logger },
  );
  const curator = new PromptCurator(new ModelCurationBackend(client, config.curatorModel), {
    cache: new CurationCache({ ttlMs: config.curationCacheTtlMs, maxEntries: config.curationCacheMaxEntries }),
    logger: deps.logger,
  });

  fastify.post("/api/curate", async (req, reply) => {
    const parsed = CurateBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues[0]?.message ?? "Invalid request" });
    }

    const prompt = parsed.data.prompt.trim();
    const instruction = parsed.data.instruction.trim();
    req.log.info({ chars: prompt.length, withInstruction: instruction.length > 0 }, "Curation request");

    const outcome = await curator.curate(prompt, instruction);
    return reply.send({
      refined_prompt: outcome.prompt,
      curated: outcome.curated,
      ...(outcome.reason ? { reason: outcome.reason } : {}),
      from_cache: outcome.fromCache,
      curator_model: config.curatorModel,
      original_length: prompt.length,
      refined_length: outcome.prompt.length,
    });
  });

  fastify.get("/healthz", async (_req, reply) => {
    const inferenceReachable = await client.testConnection();
    let modelInstalled: boolean | null = null;
    if (inferenceReachable) {
      try {
        modelInstalled = modelMatches(await client.listModels(), config.curatorModel);
      } catch (err) {
        fastify.log.warn({ err }, "Could not list models");
      }
    }
    return reply.send({
      status: inferenceReachable && modelInstalled === true ? "ok" : "degraded",
      service: "curator-service",
      curatorModel: config.curatorModel,
      inferenceReachable,
      modelInstalled,
    });
  });

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) fastify.log.error({ err: error, requestId: request.id }, "Unhandled error");
    void reply.code(statusCode).send({ error: statusCode >= 500 ? "Internal server error" : error.message });
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send({ error: `${request.method} ${request.url} not found` });
  });

  return fastify;
}
