/**
 * StatusAggregator — fuses three independent health signals into one
 * immutable HealthSnapshot.
 *
 * Inference, curator and vault checks run concurrently and a snapshot is only
 * published once all three have answered. Issues are listed in the fixed
 * order inference, curator, vault so consecutive polls diff cleanly.
 * Nothing in here throws: a failing dependency becomes `false` plus an issue.
 */

import type { HealthSnapshot, Readiness } from "@studyforge/shared-types";
import type { InferenceClient } from "./client.js";
import type { PromptCurator } from "./curator.js";
import { modelMatches, type ModelCatalog } from "./models.js";
import type { VaultProbeTarget } from "./types.js";
import { createLogger, type BaseLogger } from "./logger.js";

export const DEFAULT_POLL_INTERVAL_MS = 30_000;

export const UNCHECKED_ISSUE = "status has not been checked yet";

export interface StatusAggregatorOptions {
  client: InferenceClient;
  curator?: PromptCurator | null;
  vault?: VaultProbeTarget | null;
  /** Receives the model list on every successful inference check */
  catalog?: ModelCatalog | null;
  /** Models the deployment needs; each missing one is reported */
  requiredModels?: string[];
  intervalMs?: number;
  now?: () => Date;
  logger?: BaseLogger;
}

interface InferenceCheck {
  reachable: boolean;
  models: string[];
  issues: string[];
}

interface SimpleCheck {
  ok: boolean;
  issue?: string;
}

export function initialSnapshot(): HealthSnapshot {
  return freezeSnapshot({
    inferenceReachable: false,
    curatorReachable: false,
    vaultWritable: false,
    modelsAvailable: [],
    issues: [UNCHECKED_ISSUE],
    checkedAt: null,
  });
}

export class StatusAggregator {
  private snapshot: HealthSnapshot = initialSnapshot();
  private inflight: Promise<HealthSnapshot> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly client: InferenceClient;
  private readonly curator: PromptCurator | null;
  private readonly vault: VaultProbeTarget | null;
  private readonly catalog: ModelCatalog | null;
  private readonly requiredModels: string[];
  private readonly intervalMs: number;
  private readonly now: () => Date;
  private readonly log: BaseLogger;

  constructor(options: StatusAggregatorOptions) {
    this.client = options.client;
    this.curator = options.curator ?? null;
    this.vault = options.vault ?? null;
    this.catalog = options.catalog ?? null;
    this.requiredModels = [...new Set(options.requiredModels ?? [])];
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger("status");
  }

  /** The last published snapshot */
  getStatus(): HealthSnapshot {
    return this.snapshot;
  }

  /** Run every check and publish the result; overlapping calls share one run */
  refresh(): Promise<HealthSnapshot> {
    if (!this.inflight) {
      this.inflight = this.check().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Publish a first snapshot now, then poll on the interval */
  start(): Promise<HealthSnapshot> {
    if (!this.timer) {
      this.timer = setInterval(() => {
        this.refresh().catch((err: unknown) => this.log.error({ err }, "Status poll failed"));
      }, this.intervalMs);
      this.timer.unref();
    }
    return this.refresh();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get polling(): boolean {
    return this.timer !== null;
  }

  // ─── Checks ─────────────────────────────────────────────────────────────────

  private async check(): Promise<HealthSnapshot> {
    const [inference, curator, vault] = await Promise.all([
      this.checkInference(),
      this.checkCurator(),
      this.checkVault(),
    ]);

    const issues = [...inference.issues];
    if (curator.issue) issues.push(curator.issue);
    if (vault.issue) issues.push(vault.issue);

    const next = freezeSnapshot({
      inferenceReachable: inference.reachable,
      curatorReachable: curator.ok,
      vaultWritable: vault.ok,
      modelsAvailable: inference.models,
      issues,
      checkedAt: this.now().toISOString(),
    });

    if (inference.models.length > 0) this.catalog?.update(inference.models);

    const changed = next.issues.join("\n") !== this.snapshot.issues.join("\n");
    this.snapshot = next;
    if (changed) {
      this.log.info({ issues: next.issues, models: next.modelsAvailable.length }, "Health status changed");
    }
    return next;
  }

  private async checkInference(): Promise<InferenceCheck> {
    const baseUrl = this.client.config.baseUrl;
    const reachable = await this.client.testConnection();
    if (!reachable) {
      return { reachable: false, models: [], issues: [`Inference runtime not reachable at ${baseUrl}`] };
    }

    let installed: Set<string>;
    try {
      installed = await this.client.listModels();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { reachable: true, models: [], issues: [`Inference runtime returned an invalid model list: ${reason}`] };
    }

    const models = [...installed].sort();
    if (models.length === 0) {
      return { reachable: true, models, issues: ["No models installed on the inference runtime"] };
    }

    const issues = this.requiredModels
      .filter((m) => !modelMatches(installed, m))
      .map((m) => `Model "${m}" is not installed`);
    return { reachable: true, models, issues };
  }

  private async checkCurator(): Promise<SimpleCheck> {
    if (!this.curator) return { ok: false, issue: "Prompt curator not configured" };
    const ok = await this.curator.healthCheck();
    return ok ? { ok } : { ok, issue: `Prompt curator (${this.curator.backend.name}) not reachable` };
  }

  private async checkVault(): Promise<SimpleCheck> {
    if (!this.vault) return { ok: false, issue: "Vault not configured (set VAULT_PATH)" };
    try {
      const probe = await this.vault.probe();
      return probe.writable ? { ok: true } : { ok: false, issue: `Vault not writable: ${probe.detail ?? "unknown reason"}` };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { ok: false, issue: `Vault not writable: ${reason}` };
    }
  }
}

// ─── Readiness ────────────────────────────────────────────────────────────────

/**
 * unavailable — nothing can be generated (runtime down, or no models)
 * degraded    — generation works but something else reported an issue
 * ready       — every check passed
 */
export function summarizeReadiness(snapshot: HealthSnapshot): Readiness {
  if (snapshot.checkedAt === null) return "unavailable";
  if (!snapshot.inferenceReachable || snapshot.modelsAvailable.length === 0) return "unavailable";
  return snapshot.issues.length === 0 ? "ready" : "degraded";
}

function freezeSnapshot(s: {
  inferenceReachable: boolean;
  curatorReachable: boolean;
  vaultWritable: boolean;
  modelsAvailable: string[];
  issues: string[];
  checkedAt: string | null;
}): HealthSnapshot {
  return Object.freeze({
    ...s,
    modelsAvailable: Object.freeze([...new Set(s.modelsAvailable)].sort()),
    issues: Object.freeze([...s.issues]),
  });
}
