/**
 * Curation cache — bounded, in-process.
 *
 * Key strategy:
 *   sha256(JSON.stringify([rawPrompt, instruction]))
 *
 * Expiry is lazy: an entry older than `ttlMs` is dropped when it is looked
 * up, never by a background sweep. Size is bounded by `maxEntries`; the
 * oldest insertion is evicted first. Entries are frozen before they are
 * stored, so a reader never sees one half-built.
 */

import { createHash } from "node:crypto";
import type { CurationEntry } from "@studyforge/shared-types";

export interface CurationCacheConfig {
  ttlMs: number;
  maxEntries: number;
}

export const DEFAULT_CACHE_CONFIG: CurationCacheConfig = {
  ttlMs: 15 * 60 * 1000,
  maxEntries: 256,
};

export function curationKey(rawPrompt: string, instruction: string): string {
  return createHash("sha256").update(JSON.stringify([rawPrompt, instruction])).digest("hex");
}

export class CurationCache {
  readonly config: CurationCacheConfig;
  // Map iteration order is insertion order, which gives oldest-first eviction.
  private readonly store = new Map<string, CurationEntry>();
  private readonly now: () => number;

  constructor(config: Partial<CurationCacheConfig> = {}, now: () => number = Date.now) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
    this.now = now;
  }

  get(rawPrompt: string, instruction: string): CurationEntry | null {
    const key = curationKey(rawPrompt, instruction);
    const entry = this.store.get(key);
    if (!entry) return null;
    if (this.now() - entry.createdAt >= this.config.ttlMs) {
      this.store.delete(key);
      return null;
    }
    return entry;
  }

  set(rawPrompt: string, instruction: string, refinedPrompt: string): CurationEntry {
    const key = curationKey(rawPrompt, instruction);
    const entry: CurationEntry = Object.freeze({ rawPrompt, instruction, refinedPrompt, createdAt: this.now() });

    // Re-inserting moves the key to the newest position.
    this.store.delete(key);
    this.store.set(key, entry);

    while (this.store.size > this.config.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
    return entry;
  }

  delete(rawPrompt: string, instruction: string): boolean {
    return this.store.delete(curationKey(rawPrompt, instruction));
  }

  clear(): void {
    this.store.clear();
  }

  /** Entries currently held, expired ones included until looked up */
  get size(): number {
    return this.store.size;
  }
}
