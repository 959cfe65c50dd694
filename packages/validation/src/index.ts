/**
 * @studyforge/validation — Content validation engine
 *
 * Runs once per generation, after the model answers and before a result is
 * reported as Succeeded. Checks are structural, never semantic:
 *
 *   1. All kinds   — content is non-empty
 *   2. Quiz        — answers marker present, question count matches the request
 *   3. Study plan  — timed blocks present and in order
 *   4. Code        — the module parses as TypeScript
 */
import ts from "typescript";
import type {
  GenerationRequest, QuizRequest, StudyPlanRequest, CodeRequest,
  ContentValidation, ValidationIssue,
} from "@studyforge/shared-types";

export const ANSWERS_MARKER = "---ANSWERS---";
export const MIN_TIME_BLOCKS = 2;

const ANSWERS_MARKER_RE = /^\s*-{3,}\s*ANSWERS\s*-{3,}\s*$/im;
const QUESTION_MARKER_RE = /^\s*(?:#{1,6}\s*)?(?:\*\*)?(?:Question|Q)\s*(\d+)\s*(?:\*\*)?\s*[:.)]/gim;
const TIME_BLOCK_RE = /\b(\d{1,2}):([0-5]\d)\s*[-–—]\s*(\d{1,2}):([0-5]\d)\b/g;
const FENCED_BLOCK_RE = /```[\w+-]*[^\S\n]*\n([\s\S]*?)```/;

type RawIssue = ValidationIssue;

/**
 * Validate generated content against the structural rule for its request kind.
 */
export function validateContent(request: GenerationRequest, content: string): ContentValidation {
  const issues: RawIssue[] = [];

  if (content.trim().length === 0) {
    issues.push({ ruleId: "CONTENT_001", severity: "error", message: "The model returned no content." });
    return toValidation(issues);
  }

  switch (request.kind) {
    case "quiz":
      issues.push(...validateQuiz(request, content));
      break;
    case "study_plan":
      issues.push(...validateStudyPlan(request, content));
      break;
    case "code":
      issues.push(...validateCode(request, content));
      break;
    case "generic":
      break;
  }

  return toValidation(issues);
}

// ─── Quiz ─────────────────────────────────────────────────────────────────────

export function validateQuiz(request: QuizRequest, content: string): RawIssue[] {
  const issues: RawIssue[] = [];
  const marker = ANSWERS_MARKER_RE.exec(content);

  if (!marker) {
    issues.push({
      ruleId: "QUIZ_001",
      severity: "error",
      message: `The quiz has no "${ANSWERS_MARKER}" section.`,
    });
  }

  const questionSection = marker ? content.slice(0, marker.index) : content;
  const found = countQuestions(questionSection);
  const expected = request.parameters.questionCount;
  if (found !== expected) {
    issues.push({
      ruleId: "QUIZ_002",
      severity: "error",
      message: `Expected ${expected} questions, found ${found}.`,
    });
  }

  return issues;
}

/** Number of distinct "Question N" markers */
export function countQuestions(text: string): number {
  const numbers = new Set<number>();
  for (const match of text.matchAll(QUESTION_MARKER_RE)) {
    numbers.add(Number(match[1]));
  }
  return numbers.size;
}

// ─── Study plan ───────────────────────────────────────────────────────────────

export interface TimeBlock {
  startMinutes: number;
  endMinutes: number;
  label: string;
}

export function validateStudyPlan(_request: StudyPlanRequest, content: string): RawIssue[] {
  const issues: RawIssue[] = [];
  const blocks = extractTimeBlocks(content);

  if (blocks.length < MIN_TIME_BLOCKS) {
    issues.push({
      ruleId: "PLAN_001",
      severity: "error",
      message: `Expected at least ${MIN_TIME_BLOCKS} time blocks (e.g. "0:00-0:15"), found ${blocks.length}.`,
    });
    return issues;
  }

  for (let i = 1; i < blocks.length; i++) {
    const prev = blocks[i - 1];
    const curr = blocks[i];
    if (prev && curr && curr.startMinutes < prev.startMinutes) {
      issues.push({
        ruleId: "PLAN_002",
        severity: "warning",
        message: `Time block ${curr.label} starts before the preceding block ${prev.label}.`,
      });
    }
  }

  return issues;
}

export function extractTimeBlocks(text: string): TimeBlock[] {
  const blocks: TimeBlock[] = [];
  for (const m of text.matchAll(TIME_BLOCK_RE)) {
    blocks.push({
      startMinutes: Number(m[1]) * 60 + Number(m[2]),
      endMinutes: Number(m[3]) * 60 + Number(m[4]),
      label: m[0],
    });
  }
  return blocks;
}

// ─── Code ─────────────────────────────────────────────────────────────────────

export function validateCode(request: CodeRequest, content: string): RawIssue[] {
  const issues: RawIssue[] = [];
  const source = extractCode(content);
  const fileName = `${request.parameters.moduleName}.ts`;

  const syntaxErrors = findSyntaxErrors(source, fileName);
  if (syntaxErrors.length > 0) {
    for (const message of syntaxErrors) {
      issues.push({ ruleId: "CODE_001", severity: "error", message });
    }
    return issues;
  }

  if (!hasExports(source, fileName)) {
    issues.push({
      ruleId: "CODE_002",
      severity: "warning",
      message: `Module "${request.parameters.moduleName}" exports nothing.`,
    });
  }

  return issues;
}

/** Pull the first fenced block out of a model answer, or return the answer as-is */
export function extractCode(content: string): string {
  const fenced = FENCED_BLOCK_RE.exec(content);
  return (fenced?.[1] ?? content).trim();
}

/** Syntactic diagnostics only, formatted as "Line N: message" */
export function findSyntaxErrors(source: string, fileName = "module.ts"): string[] {
  const output = ts.transpileModule(source, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.ESNext },
  });

  return (output.diagnostics ?? []).map((d) => {
    const text = ts.flattenDiagnosticMessageText(d.messageText, "\n");
    if (d.file && d.start !== undefined) {
      const { line } = d.file.getLineAndCharacterOfPosition(d.start);
      return `Line ${line + 1}: ${text}`;
    }
    return text;
  });
}

function hasExports(source: string, fileName: string): boolean {
  const file = ts.createSourceFile(fileName, source, ts.ScriptTarget.ES2022, false, ts.ScriptKind.TS);
  return file.statements.some((s) =>
    ts.isExportDeclaration(s) ||
    ts.isExportAssignment(s) ||
    (ts.canHaveModifiers(s) && (ts.getModifiers(s) ?? []).some((m) => m.kind === ts.SyntaxKind.ExportKeyword)),
  );
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function toValidation(issues: RawIssue[]): ContentValidation {
  const firstError = issues.find((i) => i.severity === "error");
  return {
    valid: firstError === undefined,
    ...(firstError ? { detail: firstError.message } : {}),
    issues,
  };
}
