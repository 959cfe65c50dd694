/**
 * ModelCatalog — shared, read-mostly view of the models the runtime has.
 *
 * Written by the status poller (update) or on demand (refresh); read by every
 * pipeline run (peek). Each update swaps in a new set; none is mutated.
 */

import type { InferenceClient } from "./client.js";

export interface ModelCatalogOptions {
  /** How long a loaded list counts as fresh */
  ttlMs?: number;
  now?: () => number;
}

export class ModelCatalog {
  private models: ReadonlySet<string> | null = null;
  private loadedAt = 0;
  private inflight: Promise<ReadonlySet<string>> | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly client: Pick<InferenceClient, "listModels">,
    options: ModelCatalogOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  /** The fresh model set, or null when nothing fresh is known */
  peek(): ReadonlySet<string> | null {
    if (!this.models || this.now() - this.loadedAt >= this.ttlMs) return null;
    return this.models;
  }

  update(models: Iterable<string>): void {
    this.models = new Set(models);
    this.loadedAt = this.now();
  }

  /** Reload from the runtime; concurrent callers share one call */
  refresh(): Promise<ReadonlySet<string>> {
    if (!this.inflight) {
      this.inflight = this.client
        .listModels()
        .then((models) => {
          this.update(models);
          return this.models ?? models;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight;
  }

  /** null when availability is unknown */
  has(model: string): boolean | null {
    const models = this.peek();
    return models ? modelMatches(models, model) : null;
  }
}

/** "llama3" matches an installed "llama3:latest" and the other way round */
export function modelMatches(available: ReadonlySet<string>, requested: string): boolean {
  if (available.has(requested)) return true;
  if (!requested.includes(":")) return available.has(`${requested}:latest`);
  if (requested.endsWith(":latest")) return available.has(requested.slice(0, -":latest".length));
  return false;
}
