/**
 * GenerationOrchestrator — one explicit state machine per request.
 *
 *   Received ─▶ Curating ─▶ Generating ─▶ Validating ─▶ Succeeded
 *       │  └──────────────────▲   │              │
 *       └──▶ Failed ◀─────────────┴──────────────┘
 *
 * Curating is skipped when the request opts out or no curator is wired in,
 * and its failures only annotate the result. The client owns retries; a
 * generation error here goes straight to Failed with the client's ErrorInfo.
 * A validation failure is Failed/ValidationFailed with the content attached.
 */

import { performance } from "node:perf_hooks";
import {
  buildQuizRequest, buildStudyPlanRequest, buildCodeRequest, buildGenericRequest, makeErrorInfo,
} from "@studyforge/shared-types";
import type {
  GenerationRequest, GenerationResult, PipelineState, ErrorInfo, ContentValidation, CurationNote,
  QuizRequestInput, StudyPlanRequestInput, CodeRequestInput, GenericRequestInput,
} from "@studyforge/shared-types";
import { validateContent } from "@studyforge/validation";
import { InferenceError } from "./client.js";
import type { InferenceClient, GenerateOutput } from "./client.js";
import type { PromptCurator } from "./curator.js";
import { modelMatches, type ModelCatalog } from "./models.js";
import { planPrompt } from "./prompts/index.js";
import { createLogger, type BaseLogger } from "./logger.js";

// ─── State machine ────────────────────────────────────────────────────────────

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  Received: ["Curating", "Generating", "Failed"],
  Curating: ["Generating"],
  Generating: ["Validating", "Failed"],
  Validating: ["Succeeded", "Failed"],
  Succeeded: [],
  Failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: PipelineState, readonly to: PipelineState) {
    super(`Illegal pipeline transition ${from} → ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Tracks one request's position; terminal states accept no further moves */
export class PipelineRun {
  private current: PipelineState = "Received";
  private readonly history: PipelineState[] = ["Received"];

  get state(): PipelineState {
    return this.current;
  }

  get transitions(): PipelineState[] {
    return [...this.history];
  }

  moveTo(next: PipelineState): void {
    if (!canTransition(this.current, next)) throw new IllegalTransitionError(this.current, next);
    this.current = next;
    this.history.push(next);
  }
}

// ─── Orchestrator ─────────────────────────────────────────────────────────────

export interface OrchestratorOptions {
  client: InferenceClient;
  curator?: PromptCurator | null;
  catalog?: ModelCatalog | null;
  /** Generation model; defaults to the client's default model */
  model?: string;
  logger?: BaseLogger;
}

export interface RunOptions {
  model?: string;
  timeoutMs?: number;
}

function notValidated(): ContentValidation {
  return { valid: false, issues: [] };
}

const KIND_LABEL: Record<GenerationRequest["kind"], string> = {
  quiz: "quiz",
  study_plan: "study plan",
  code: "code module",
  generic: "content",
};

export class GenerationOrchestrator {
  readonly model: string;
  private readonly client: InferenceClient;
  private readonly curator: PromptCurator | null;
  private readonly catalog: ModelCatalog | null;
  private readonly log: BaseLogger;

  constructor(options: OrchestratorOptions) {
    this.client = options.client;
    this.curator = options.curator ?? null;
    this.catalog = options.catalog ?? null;
    this.model = options.model ?? options.client.config.defaultModel;
    this.log = options.logger ?? createLogger("orchestrator");
  }

  async generateQuiz(input: QuizRequestInput, options?: RunOptions): Promise<GenerationResult> {
    return this.run(buildQuizRequest(input), options);
  }

  async generateStudyPlan(input: StudyPlanRequestInput, options?: RunOptions): Promise<GenerationResult> {
    return this.run(buildStudyPlanRequest(input), options);
  }

  async generateCode(input: CodeRequestInput, options?: RunOptions): Promise<GenerationResult> {
    return this.run(buildCodeRequest(input), options);
  }

  async generateGeneric(input: GenericRequestInput, options?: RunOptions): Promise<GenerationResult> {
    return this.run(buildGenericRequest(input), options);
  }

  /** False only when a fresh catalog, re-read once from the runtime, still lacks the model */
  private async modelMayBeInstalled(model: string): Promise<boolean> {
    const known = this.catalog?.peek() ?? null;
    if (!this.catalog || !known || known.size === 0 || modelMatches(known, model)) return true;
    try {
      const fresh = await this.catalog.refresh();
      return fresh.size === 0 || modelMatches(fresh, model);
    } catch (err) {
      this.log.debug({ err, model }, "Model list refresh failed, leaving the check to generation");
      return true;
    }
  }

  /**
   * Runs one request to a terminal state; resolves with a result even on failure.
   * The kind wrappers above reject only for input that fails request validation.
   */
  async run(request: GenerationRequest, options: RunOptions = {}): Promise<GenerationResult> {
    const startedAt = performance.now();
    const pipeline = new PipelineRun();
    const model = options.model ?? this.model;
    const plan = planPrompt(request);

    const finish = (
      fields: { content: string; tokenCount: number; validation: ContentValidation; error?: ErrorInfo },
      curation: CurationNote,
    ): GenerationResult => {
      const result: GenerationResult = {
        success: pipeline.state === "Succeeded",
        state: pipeline.state === "Succeeded" ? "Succeeded" : "Failed",
        kind: request.kind,
        content: fields.content,
        modelUsed: model,
        tokenCount: fields.tokenCount,
        validation: fields.validation,
        ...(fields.error ? { error: fields.error } : {}),
        curation,
        transitions: pipeline.transitions,
        durationMs: Math.round(performance.now() - startedAt),
      };
      const logFields = { kind: request.kind, model, state: result.state, durationMs: result.durationMs, curated: curation.applied };
      if (result.error) this.log.warn({ ...logFields, errorKind: result.error.kind }, result.error.message);
      else this.log.info({ ...logFields, tokenCount: result.tokenCount }, "Generation succeeded");
      return result;
    };

    // Received: fail fast when the catalog knows the model is absent
    if (!(await this.modelMayBeInstalled(model))) {
      pipeline.moveTo("Failed");
      return finish(
        { content: "", tokenCount: 0, validation: notValidated(), error: makeErrorInfo("ModelNotFound", `Model "${model}" is not installed on the inference runtime.`) },
        { applied: false, fromCache: false, reason: "not attempted" },
      );
    }

    // Curating
    let prompt = plan.prompt;
    let curation: CurationNote;
    if (request.useCuration && this.curator) {
      pipeline.moveTo("Curating");
      const outcome = await this.curator.curate(plan.prompt, plan.curationInstruction);
      prompt = outcome.prompt;
      curation = {
        applied: outcome.curated,
        fromCache: outcome.fromCache,
        ...(outcome.reason ? { reason: outcome.reason } : {}),
      };
    } else {
      curation = {
        applied: false,
        fromCache: false,
        reason: request.useCuration ? "no curator configured" : "curation disabled for this request",
      };
    }

    // Generating
    pipeline.moveTo("Generating");
    let output: GenerateOutput;
    try {
      output = await this.client.generate(prompt, model, {
        ...plan.sampling,
        ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      });
    } catch (err) {
      const error = err instanceof InferenceError
        ? err.toInfo()
        : makeErrorInfo("UpstreamError", err instanceof Error ? err.message : String(err));
      pipeline.moveTo("Failed");
      return finish({ content: "", tokenCount: 0, validation: notValidated(), error }, curation);
    }

    // Validating
    pipeline.moveTo("Validating");
    const content = output.content.trim();
    const validation = validateContent(request, content);
    if (!validation.valid) {
      pipeline.moveTo("Failed");
      const error = makeErrorInfo(
        "ValidationFailed",
        `The generated ${KIND_LABEL[request.kind]} failed validation: ${validation.detail ?? "unknown problem"}`,
      );
      return finish({ content, tokenCount: output.tokenCount, validation, error }, curation);
    }

    pipeline.moveTo("Succeeded");
    return finish({ content, tokenCount: output.tokenCount, validation }, curation);
  }
}
