/**
 * Curation backends.
 *
 *   RemoteCurationBackend — a curator service reached over HTTP
 *                           (POST /api/curate, GET /healthz)
 *   ModelCurationBackend  — runs the curation meta-prompt on an inference
 *                           client directly; this is what the curator service
 *                           itself uses
 */

import { z } from "zod";
import type { InferenceClient, FetchFn } from "./client.js";
import { CurationError } from "./types.js";
import type { CurationBackend } from "./types.js";
import { modelMatches } from "./models.js";
import { buildCurationPrompt, extractRefinedPrompt, CURATION_SAMPLING } from "./prompts/curation.js";

// ─── Remote ───────────────────────────────────────────────────────────────────

export const CurateResponseSchema = z.object({
  refined_prompt: z.string(),
  curated: z.boolean(),
  reason: z.string().optional(),
});

export type CurateResponse = z.infer<typeof CurateResponseSchema>;

export interface RemoteCurationConfig {
  baseUrl: string;
  timeoutMs: number;
  probeTimeoutMs: number;
}

export class RemoteCurationBackend implements CurationBackend {
  readonly name = "remote";
  readonly config: RemoteCurationConfig;
  private readonly fetchFn: FetchFn;

  constructor(config: Partial<RemoteCurationConfig> & { baseUrl: string }, fetchFn: FetchFn = globalThis.fetch) {
    this.config = {
      timeoutMs: 30_000,
      probeTimeoutMs: 5_000,
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ""),
    };
    this.fetchFn = fetchFn;
  }

  async refine(rawPrompt: string, instruction: string): Promise<string> {
    const response = await this.fetchFn(`${this.config.baseUrl}/api/curate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ prompt: rawPrompt, instruction }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      throw new CurationError(`Curator service returned HTTP ${response.status}`);
    }

    const parsed = CurateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CurationError("Curator service returned an unexpected payload");
    }
    if (!parsed.data.curated) {
      throw new CurationError(`Curator service fell back to the raw prompt${parsed.data.reason ? `: ${parsed.data.reason}` : ""}`);
    }
    return parsed.data.refined_prompt;
  }

  async probe(): Promise<boolean> {
    const response = await this.fetchFn(`${this.config.baseUrl}/healthz`, {
      method: "GET",
      signal: AbortSignal.timeout(this.config.probeTimeoutMs),
    });
    return response.ok;
  }
}

// ─── Model ────────────────────────────────────────────────────────────────────

export class ModelCurationBackend implements CurationBackend {
  readonly name = "model";

  constructor(
    private readonly client: InferenceClient,
    readonly model: string,
  ) {}

  async refine(rawPrompt: string, instruction: string): Promise<string> {
    const output = await this.client.generate(buildCurationPrompt(rawPrompt, instruction), this.model, CURATION_SAMPLING);
    return extractRefinedPrompt(output.content);
  }

  /** Up only while the runtime lists the curation model, not merely answers */
  async probe(): Promise<boolean> {
    return modelMatches(await this.client.listModels(), this.model);
  }
}
