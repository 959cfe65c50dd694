/**
 * StudyForge generation routes
 *
 * Each route builds one GenerationRequest from the flat body, runs it through
 * the orchestrator and, when asked, writes a successful result to the vault.
 *
 * POST /v1/generate/quiz         → { result, note }
 * POST /v1/generate/study-plan   → { result, note }
 * POST /v1/generate/code         → { result, note }
 * POST /v1/generate/generic      → { result, note }
 *
 * Failed results still carry the result body; the HTTP status follows its error kind.
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import { buildGenerationRequest, RequestValidationError } from "@studyforge/shared-types";
import type { GenerationKind, GenerationRequest, GenerationResult } from "@studyforge/shared-types";
import type { NoteInput, WriteNoteResult } from "@studyforge/vault";
import { ok, fail, HTTP_STATUS_BY_KIND } from "./envelope.js";
import type { RouteOptions } from "./envelope.js";

const ROUTE_KINDS: ReadonlyArray<readonly [string, GenerationKind]> = [
  ["quiz", "quiz"],
  ["study-plan", "study_plan"],
  ["code", "code"],
  ["generic", "generic"],
];

/** Gateway-level fields; the kind schemas ignore them */
const GatewayOptionsSchema = z.object({
  saveToVault: z.boolean().default(false),
  model: z.string().trim().min(1).max(200).optional(),
});

const GENERATION_RATE = {
  max: 10,
  timeWindow: 60_000,
  keyGenerator: (r: FastifyRequest) => `generate:${r.ip}`,
};

export async function generateRoutes(fastify: FastifyInstance, { services }: RouteOptions): Promise<void> {
  const { orchestrator, vault } = services;

  for (const [segment, kind] of ROUTE_KINDS) {
    fastify.post(`/v1/generate/${segment}`, { config: { rateLimit: GENERATION_RATE } }, async (req, reply) => {
      const options = GatewayOptionsSchema.safeParse(req.body ?? {});
      if (!options.success) {
        const first = options.error.issues[0];
        return reply.code(400).send(fail("BAD_REQUEST", first ? `${first.path.join(".")}: ${first.message}` : "Invalid body", req.id));
      }

      let request: GenerationRequest;
      try {
        request = buildGenerationRequest(kind, req.body ?? {});
      } catch (err) {
        if (!(err instanceof RequestValidationError)) throw err;
        return reply.code(400).send(fail("BAD_REQUEST", err.message, req.id));
      }

      const { saveToVault, model } = options.data;
      const result = await orchestrator.run(request, model ? { model } : {});

      let note: WriteNoteResult | null = null;
      if (result.success && saveToVault) {
        note = vault
          ? await vault.writeNote(noteFromResult(request, result))
          : { success: false, error: "Vault not configured (set VAULT_PATH)" };
      }

      if (!result.error) return reply.send(ok({ result, note }, req.id));
      return reply
        .code(HTTP_STATUS_BY_KIND[result.error.kind])
        .send(fail(result.error.kind, result.error.message, req.id, { result, note }));
    });
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function noteFromResult(request: GenerationRequest, result: GenerationResult): NoteInput {
  const metadata: Record<string, string | number | boolean> = {
    model: result.modelUsed,
    tokens: result.tokenCount,
    curated: result.curation.applied,
  };
  const tags: string[] = [request.kind];

  switch (request.kind) {
    case "quiz":
      metadata["difficulty"] = request.parameters.difficulty;
      metadata["questions"] = request.parameters.questionCount;
      tags.push(request.parameters.difficulty);
      break;
    case "study_plan":
      metadata["difficulty"] = request.parameters.difficulty;
      metadata["duration"] = request.parameters.duration;
      tags.push(request.parameters.difficulty);
      break;
    case "code":
      metadata["module"] = request.parameters.moduleName;
      break;
    case "generic":
      break;
  }

  return {
    title: request.kind === "code" ? request.parameters.moduleName : request.subject,
    body: result.content,
    folderHint: request.kind,
    tags,
    metadata,
  };
}
