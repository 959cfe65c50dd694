/**
 * @studyforge/llm-orchestrator — Type definitions
 */
import type { GenerationKind } from "@studyforge/shared-types";

// ─── Prompts ──────────────────────────────────────────────────────────────────

export interface SamplingDefaults {
  temperature: number;
  maxTokens: number;
}

/** Everything the orchestrator needs to run one request's generation step */
export interface PromptPlan {
  kind: GenerationKind;
  prompt: string;
  /** Passed to the curator alongside the raw prompt */
  curationInstruction: string;
  sampling: SamplingDefaults;
}

// ─── Curation ─────────────────────────────────────────────────────────────────

export interface CurationOutcome {
  /** The prompt to send: refined when `curated`, otherwise the raw prompt */
  prompt: string;
  curated: boolean;
  fromCache: boolean;
  /** Why the raw prompt was kept */
  reason?: string;
}

/** Where refinement actually happens: a remote curator service or a local model */
export interface CurationBackend {
  readonly name: string;
  /** Returns the refined prompt or throws */
  refine(rawPrompt: string, instruction: string): Promise<string>;
  /** The backend's own liveness probe */
  probe(): Promise<boolean>;
}

export class CurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CurationError";
  }
}

// ─── Status ───────────────────────────────────────────────────────────────────

/** The part of a vault writer the status check needs */
export interface VaultProbeTarget {
  probe(): Promise<{ writable: boolean; detail?: string }>;
}
