/**
 * Content validation tests
 * Self-contained test runner — no external test framework dependencies.
 */

import {
  validateContent, countQuestions, extractTimeBlocks, extractCode, findSyntaxErrors,
} from "../index.js";
import {
  buildQuizRequest, buildStudyPlanRequest, buildCodeRequest, buildGenericRequest,
  FIXTURE_QUIZ_OUTPUT, FIXTURE_STUDY_PLAN_OUTPUT, FIXTURE_CODE_OUTPUT, FIXTURE_BROKEN_CODE_OUTPUT,
} from "@studyforge/shared-types";

// ─── Mini test runner ─────────────────────────────────────────────────────────

let passed = 0; let failed = 0;
const failures: string[] = [];

function test(name: string, fn: () => void): void {
  try { fn(); passed++; console.log(`  ✓ ${name}`); }
  catch (e: unknown) {
    failed++;
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`  ✗ ${name}\n    ${msg}`);
    failures.push(`${name}: ${msg}`);
  }
}

function eq<T>(actual: T, expected: T, msg?: string): void {
  if (actual !== expected) throw new Error(msg ?? `Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
}

function ok(val: unknown, msg?: string): void {
  if (!val) throw new Error(msg ?? `Expected truthy, got ${JSON.stringify(val)}`);
}

function deepEq<T>(actual: T, expected: T, msg?: string): void {
  if (JSON.stringify(actual) !== JSON.stringify(expected))
    throw new Error(msg ?? `Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
}

const quiz3 = buildQuizRequest({ subject: "Photosynthesis", questionCount: 3 });
const plan = buildStudyPlanRequest({ subject: "Linear Algebra" });
const code = buildCodeRequest({ functionality: "flashcard shuffling", moduleName: "flashcards" });
const generic = buildGenericRequest({ subject: "Summarise the causes of the French Revolution" });

// ─── All kinds ────────────────────────────────────────────────────────────────

console.log("\n── All kinds ──");

test("blank content fails with CONTENT_001", () => {
  const v = validateContent(generic, "   \n ");
  eq(v.valid, false);
  eq(v.issues[0]?.ruleId, "CONTENT_001");
  eq(v.detail, "The model returned no content.");
});

test("generic content only needs to be non-empty", () => {
  const v = validateContent(generic, "The estates system, fiscal crisis and bread prices.");
  eq(v.valid, true);
  eq(v.issues.length, 0);
  eq(v.detail, undefined);
});

// ─── Quiz ─────────────────────────────────────────────────────────────────────

console.log("\n── Quiz ──");

test("fixture quiz with 3 questions passes", () => {
  const v = validateContent(quiz3, FIXTURE_QUIZ_OUTPUT);
  eq(v.valid, true, JSON.stringify(v.issues));
});

test("answer lines after the marker are not counted as questions", () => {
  eq(countQuestions(FIXTURE_QUIZ_OUTPUT.split("---ANSWERS---")[0] ?? ""), 3);
});

test("question count mismatch fails with QUIZ_002", () => {
  const quiz5 = buildQuizRequest({ subject: "Photosynthesis", questionCount: 5 });
  const v = validateContent(quiz5, FIXTURE_QUIZ_OUTPUT);
  eq(v.valid, false);
  deepEq(v.issues.map((i) => i.ruleId), ["QUIZ_002"]);
  eq(v.detail, "Expected 5 questions, found 3.");
});

test("missing answers marker fails with QUIZ_001 first", () => {
  const text = "Question 1: What is 2 + 2?\nQuestion 2: What is 3 + 3?\nQuestion 3: What is 4 + 4?";
  const v = validateContent(quiz3, text);
  eq(v.valid, false);
  deepEq(v.issues.map((i) => i.ruleId), ["QUIZ_001"]);
  eq(v.detail, 'The quiz has no "---ANSWERS---" section.');
});

test("markdown-styled question headings are recognised", () => {
  eq(countQuestions("### Question 1: A\n**Q2.** B\nQ 3) C\n1. not a question"), 3);
});

// ─── Study plan ───────────────────────────────────────────────────────────────

console.log("\n── Study plan ──");

test("fixture study plan passes", () => {
  const v = validateContent(plan, FIXTURE_STUDY_PLAN_OUTPUT);
  eq(v.valid, true, JSON.stringify(v.issues));
  eq(v.issues.length, 0);
});

test("time blocks are parsed into minutes", () => {
  const blocks = extractTimeBlocks("0:55-1:30 - Practice");
  eq(blocks.length, 1);
  eq(blocks[0]?.startMinutes, 55);
  eq(blocks[0]?.endMinutes, 90);
});

test("a plan without time blocks fails with PLAN_001", () => {
  const v = validateContent(plan, "Read chapter one, then do the exercises.");
  eq(v.valid, false);
  eq(v.issues[0]?.ruleId, "PLAN_001");
  eq(v.detail, 'Expected at least 2 time blocks (e.g. "0:00-0:15"), found 0.');
});

test("out-of-order blocks only warn", () => {
  const v = validateContent(plan, "0:30-0:45 - Review\n0:00-0:30 - Reading");
  eq(v.valid, true);
  deepEq(v.issues.map((i) => `${i.ruleId}:${i.severity}`), ["PLAN_002:warning"]);
});

// ─── Code ─────────────────────────────────────────────────────────────────────

console.log("\n── Code ──");

test("fenced code is extracted without the prose around it", () => {
  const src = extractCode(FIXTURE_CODE_OUTPUT);
  ok(src.startsWith("export interface Flashcard {"), src.slice(0, 40));
  ok(src.endsWith("return copy;\n}"), src.slice(-20));
});

test("unfenced content is used as-is", () => {
  eq(extractCode("  export const x = 1;\n"), "export const x = 1;");
});

test("fixture module parses and exports", () => {
  const v = validateContent(code, FIXTURE_CODE_OUTPUT);
  eq(v.valid, true, JSON.stringify(v.issues));
  eq(v.issues.length, 0);
});

test("broken module fails with CODE_001 and a line number", () => {
  const v = validateContent(code, FIXTURE_BROKEN_CODE_OUTPUT);
  eq(v.valid, false);
  eq(v.issues[0]?.ruleId, "CODE_001");
  ok(/^Line \d+: /.test(v.detail ?? ""), `detail: ${v.detail}`);
});

test("valid source has no syntax errors", () => {
  deepEq(findSyntaxErrors("const a: number = 1;\nexport { a };"), []);
});

test("module without exports warns with CODE_002", () => {
  const v = validateContent(code, "const hidden = 1;");
  eq(v.valid, true);
  deepEq(v.issues.map((i) => i.ruleId), ["CODE_002"]);
});

// ─── Results ──────────────────────────────────────────────────────────────────

console.log(`\n${"═".repeat(55)}`);
console.log(`Validation Tests: ${passed} passed, ${failed} failed`);
if (failures.length > 0) {
  console.error("\nFailed:");
  failures.forEach(f => console.error(`  ✗ ${f}`));
  throw new Error("Tests failed");
}
