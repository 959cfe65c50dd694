/**
 * StudyForge data model
 *
 * Shared by the orchestrator, the validation engine, the vault writer and
 * both HTTP services. Requests and results are request-scoped; the health
 * snapshot and curation entries are process-wide and immutable once built.
 */

// ─── Generation requests ─────────────────────────────────────────────────────

export type GenerationKind = "quiz" | "study_plan" | "code" | "generic";

export type Difficulty = "beginner" | "intermediate" | "advanced";

interface RequestBase {
  /** Topic of the artifact; for code requests, the functionality to implement */
  subject: string;
  /** Run the prompt through the curator before generation */
  useCuration: boolean;
}

export interface QuizParameters {
  difficulty: Difficulty;
  /** Exact number of questions the quiz must contain */
  questionCount: number;
}

export interface StudyPlanParameters {
  difficulty: Difficulty;
  /** Free-form duration, e.g. "2 hours" or "45 minutes" */
  duration: string;
  objectives: string[];
}

export interface CodeParameters {
  /** Identifier used as the module's file name */
  moduleName: string;
  includeTests: boolean;
}

export interface GenericParameters {
  instruction?: string;
}

export interface QuizRequest extends RequestBase {
  kind: "quiz";
  parameters: QuizParameters;
}

export interface StudyPlanRequest extends RequestBase {
  kind: "study_plan";
  parameters: StudyPlanParameters;
}

export interface CodeRequest extends RequestBase {
  kind: "code";
  parameters: CodeParameters;
}

export interface GenericRequest extends RequestBase {
  kind: "generic";
  parameters: GenericParameters;
}

export type GenerationRequest = QuizRequest | StudyPlanRequest | CodeRequest | GenericRequest;

/** Narrow a GenerationRequest by its kind */
export type RequestOfKind<K extends GenerationKind> = Extract<GenerationRequest, { kind: K }>;

// ─── Errors ──────────────────────────────────────────────────────────────────

export type ErrorKind =
  | "NetworkUnavailable"
  | "Timeout"
  | "ModelNotFound"
  | "InvalidResponse"
  | "ValidationFailed"
  | "UpstreamError";

/** What a caller should do next about a failed request */
export type ErrorRemedy = "retry_now" | "retry_later" | "fix_configuration" | "review_content";

export interface ErrorInfo {
  kind: ErrorKind;
  /** Human-readable, independent of `kind` */
  message: string;
  retryable: boolean;
  remedy: ErrorRemedy;
}

// ─── Generation results ──────────────────────────────────────────────────────

export type PipelineState =
  | "Received"
  | "Curating"
  | "Generating"
  | "Validating"
  | "Succeeded"
  | "Failed";

export type TerminalState = Extract<PipelineState, "Succeeded" | "Failed">;

export type ValidationSeverity = "error" | "warning";

export interface ValidationIssue {
  /** Rule identifier, e.g. "QUIZ_001" */
  ruleId: string;
  severity: ValidationSeverity;
  message: string;
}

export interface ContentValidation {
  valid: boolean;
  /** First blocking problem, phrased for a person */
  detail?: string;
  issues: ValidationIssue[];
}

export interface CurationNote {
  /** True when the prompt sent to the model is the curated one */
  applied: boolean;
  fromCache: boolean;
  /** Why curation was skipped or fell back */
  reason?: string;
}

export interface GenerationResult {
  success: boolean;
  state: TerminalState;
  kind: GenerationKind;
  /** Model output; kept on validation failures so it can be corrected by hand */
  content: string;
  modelUsed: string;
  tokenCount: number;
  validation: ContentValidation;
  /** Present exactly when `success` is false */
  error?: ErrorInfo;
  curation: CurationNote;
  /** Every state the pipeline passed through, in order */
  transitions: PipelineState[];
  durationMs: number;
}

// ─── Curation ────────────────────────────────────────────────────────────────

export interface CurationEntry {
  readonly rawPrompt: string;
  readonly instruction: string;
  readonly refinedPrompt: string;
  /** Epoch milliseconds */
  readonly createdAt: number;
}

// ─── Health ──────────────────────────────────────────────────────────────────

export interface HealthSnapshot {
  readonly inferenceReachable: boolean;
  readonly curatorReachable: boolean;
  readonly vaultWritable: boolean;
  /** Sorted, without duplicates */
  readonly modelsAvailable: readonly string[];
  /** Built in a fixed order: inference, curator, vault */
  readonly issues: readonly string[];
  /** ISO 8601; null until the first check completes */
  readonly checkedAt: string | null;
}

export type Readiness = "ready" | "degraded" | "unavailable";
