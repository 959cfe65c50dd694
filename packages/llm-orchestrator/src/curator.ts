/**
 * PromptCurator — refines raw prompts before generation.
 *
 * Lookup order: cache (exact key), then one shared in-flight call per key,
 * then the backend. Any failure degrades to the raw prompt with
 * `curated: false`; nothing is cached for a failed call and nothing is thrown.
 */

import { CurationCache, curationKey } from "./cache.js";
import { CurationError } from "./types.js";
import type { CurationBackend, CurationOutcome } from "./types.js";
import { createLogger, type BaseLogger } from "./logger.js";

export interface PromptCuratorOptions {
  cache?: CurationCache;
  logger?: BaseLogger;
}

export class PromptCurator {
  readonly backend: CurationBackend;
  readonly cache: CurationCache;
  private readonly log: BaseLogger;
  private readonly inflight = new Map<string, Promise<string>>();

  constructor(backend: CurationBackend, options: PromptCuratorOptions = {}) {
    this.backend = backend;
    this.cache = options.cache ?? new CurationCache();
    this.log = options.logger ?? createLogger("prompt-curator");
  }

  async curate(rawPrompt: string, instruction = ""): Promise<CurationOutcome> {
    const hit = this.cache.get(rawPrompt, instruction);
    if (hit) {
      return { prompt: hit.refinedPrompt, curated: true, fromCache: true };
    }

    const key = curationKey(rawPrompt, instruction);
    let pending = this.inflight.get(key);
    if (!pending) {
      pending = this.refineAndStore(rawPrompt, instruction).finally(() => {
        this.inflight.delete(key);
      });
      this.inflight.set(key, pending);
    }

    try {
      const refined = await pending;
      return { prompt: refined, curated: true, fromCache: false };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn({ backend: this.backend.name, reason }, "Prompt curation failed, using the raw prompt");
      return { prompt: rawPrompt, curated: false, fromCache: false, reason };
    }
  }

  /** The curator's own liveness, independent of the inference runtime probe */
  async healthCheck(): Promise<boolean> {
    try {
      return await this.backend.probe();
    } catch (err) {
      this.log.debug({ err, backend: this.backend.name }, "Curator probe failed");
      return false;
    }
  }

  private async refineAndStore(rawPrompt: string, instruction: string): Promise<string> {
    const refined = (await this.backend.refine(rawPrompt, instruction)).trim();
    if (refined.length === 0) {
      throw new CurationError("Curation returned an empty prompt");
    }
    this.cache.set(rawPrompt, instruction, refined);
    return refined;
  }
}
