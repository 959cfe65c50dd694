/**
 * GET /v1/status   → { snapshot, readiness }; ?refresh=true re-runs every check first
 * GET /v1/models   → installed models, straight from the runtime
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { InferenceError, summarizeReadiness } from "@studyforge/llm-orchestrator";
import { ok, fail, HTTP_STATUS_BY_KIND } from "./envelope.js";
import type { RouteOptions } from "./envelope.js";

const StatusQuerySchema = z.object({
  refresh: z.enum(["true", "false"]).default("false"),
});

export async function statusRoutes(fastify: FastifyInstance, { services }: RouteOptions): Promise<void> {
  const { aggregator, catalog, client } = services;

  fastify.get("/v1/status", async (req, reply) => {
    const query = StatusQuerySchema.safeParse(req.query);
    if (!query.success) return reply.code(400).send(fail("BAD_REQUEST", "refresh must be true or false", req.id));

    const snapshot = query.data.refresh === "true" ? await aggregator.refresh() : aggregator.getStatus();
    return reply.send(ok({ snapshot, readiness: summarizeReadiness(snapshot) }, req.id));
  });

  fastify.get("/v1/models", async (req, reply) => {
    try {
      const models = await catalog.refresh();
      return reply.send(ok({ models: [...models].sort(), defaultModel: client.config.defaultModel }, req.id));
    } catch (err) {
      if (!(err instanceof InferenceError)) throw err;
      return reply.code(HTTP_STATUS_BY_KIND[err.kind]).send(fail(err.kind, err.message, req.id));
    }
  });
}
