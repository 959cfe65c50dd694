/**
 * Request construction.
 *
 * Callers send flat bodies; each builder validates one against its kind's
 * schema and returns the tagged GenerationRequest variant. Nothing downstream
 * re-checks parameters, so every request in the system went through here.
 */
import { z } from "zod";
import type {
  GenerationKind, GenerationRequest, QuizRequest, StudyPlanRequest, CodeRequest, GenericRequest,
} from "./schema.js";

export const MAX_SUBJECT_LENGTH = 500;
export const MAX_QUESTION_COUNT = 50;
export const MAX_OBJECTIVES = 20;

export class RequestValidationError extends Error {
  readonly issues: string[];
  constructor(kind: GenerationKind, issues: string[]) {
    super(`Invalid ${kind} request: ${issues.join("; ")}`);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

// ─── Schemas ─────────────────────────────────────────────────────────────────

export const DifficultySchema = z.enum(["beginner", "intermediate", "advanced"]);

const subject = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} cannot be empty`)
    .max(MAX_SUBJECT_LENGTH, `${field} must be at most ${MAX_SUBJECT_LENGTH} characters`);

const useCuration = z.boolean().default(true);

export const QuizInputSchema = z.object({
  subject: subject("subject"),
  difficulty: DifficultySchema.default("intermediate"),
  questionCount: z
    .number()
    .int("questionCount must be an integer")
    .min(1, "questionCount must be at least 1")
    .max(MAX_QUESTION_COUNT, `questionCount must be at most ${MAX_QUESTION_COUNT}`)
    .default(10),
  useCuration,
});

export const StudyPlanInputSchema = z.object({
  subject: subject("subject"),
  difficulty: DifficultySchema.default("intermediate"),
  duration: z.string().trim().min(1, "duration cannot be empty").max(100).default("2 hours"),
  objectives: z
    .array(z.string().max(300))
    .max(MAX_OBJECTIVES, `at most ${MAX_OBJECTIVES} objectives`)
    .default([])
    .transform((items) => items.map((o) => o.trim()).filter((o) => o.length > 0)),
  useCuration,
});

export const CodeInputSchema = z.object({
  functionality: subject("functionality"),
  moduleName: z
    .string()
    .trim()
    .regex(/^[A-Za-z_][A-Za-z0-9_]{0,63}$/, "moduleName must be an identifier (letters, digits, underscore)")
    .default("study_utils"),
  includeTests: z.boolean().default(true),
  useCuration,
});

export const GenericInputSchema = z.object({
  subject: subject("subject"),
  instruction: z.string().trim().max(2000).optional(),
  useCuration,
});

export type QuizRequestInput = z.input<typeof QuizInputSchema>;
export type StudyPlanRequestInput = z.input<typeof StudyPlanInputSchema>;
export type CodeRequestInput = z.input<typeof CodeInputSchema>;
export type GenericRequestInput = z.input<typeof GenericInputSchema>;

// ─── Builders ────────────────────────────────────────────────────────────────

function parseOrThrow<T extends z.ZodTypeAny>(kind: GenerationKind, schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new RequestValidationError(
      kind,
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)),
    );
  }
  return parsed.data;
}

export function buildQuizRequest(input: unknown): QuizRequest {
  const body = parseOrThrow("quiz", QuizInputSchema, input);
  return {
    kind: "quiz",
    subject: body.subject,
    useCuration: body.useCuration,
    parameters: { difficulty: body.difficulty, questionCount: body.questionCount },
  };
}

export function buildStudyPlanRequest(input: unknown): StudyPlanRequest {
  const body = parseOrThrow("study_plan", StudyPlanInputSchema, input);
  return {
    kind: "study_plan",
    subject: body.subject,
    useCuration: body.useCuration,
    parameters: { difficulty: body.difficulty, duration: body.duration, objectives: body.objectives },
  };
}

export function buildCodeRequest(input: unknown): CodeRequest {
  const body = parseOrThrow("code", CodeInputSchema, input);
  return {
    kind: "code",
    subject: body.functionality,
    useCuration: body.useCuration,
    parameters: { moduleName: body.moduleName, includeTests: body.includeTests },
  };
}

export function buildGenericRequest(input: unknown): GenericRequest {
  const body = parseOrThrow("generic", GenericInputSchema, input);
  return {
    kind: "generic",
    subject: body.subject,
    useCuration: body.useCuration,
    parameters: body.instruction ? { instruction: body.instruction } : {},
  };
}

export function buildGenerationRequest(kind: GenerationKind, input: unknown): GenerationRequest {
  switch (kind) {
    case "quiz": return buildQuizRequest(input);
    case "study_plan": return buildStudyPlanRequest(input);
    case "code": return buildCodeRequest(input);
    case "generic": return buildGenericRequest(input);
  }
}
