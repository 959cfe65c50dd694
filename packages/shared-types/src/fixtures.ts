/**
 * Fixture model outputs for the validation tests.
 *
 *   1. Quiz       — three questions followed by the answers section
 *   2. Study plan — four timed blocks in ascending order
 *   3. Code       — a fenced TypeScript module that compiles
 *   4. Broken code — an unterminated parameter list
 */

// ─── Fixture 1: Quiz (3 questions) ──────────────────────────────────────────

export const FIXTURE_QUIZ_OUTPUT = `# Diagnostic Quiz: Photosynthesis

## Section A: Multiple choice

Question 1: Which organelle hosts the light-dependent reactions?
a) Mitochondrion
b) Chloroplast
c) Ribosome

Question 2: Which gas is released as a by-product of photolysis?

## Section B: Short answer

Question 3: Explain the role of chlorophyll in capturing light energy.

---ANSWERS---

Question 1: b) Chloroplast. The thylakoid membranes hold both photosystems.
Question 2: Oxygen, from the splitting of water.
Question 3: Chlorophyll absorbs red and blue light and passes the energy to the reaction centres.`;

// ─── Fixture 2: Study plan (4 blocks) ────────────────────────────────────────

export const FIXTURE_STUDY_PLAN_OUTPUT = `# Study Plan: Linear Algebra

0:00-0:15 - Warm-up: review vector addition and scalar multiplication
0:15-0:45 - Reading: matrix multiplication, worked examples
0:45-0:55 - Break
0:55-1:30 - Practice: ten problems on determinants, then self-check`;

// ─── Fixture 3: Code (valid) ─────────────────────────────────────────────────

export const FIXTURE_CODE_OUTPUT = [
  "Here is the module:",
  "",
  "```typescript",
  "export interface Flashcard {",
  "  front: string;",
  "  back: string;",
  "}",
  "",
  "export function shuffle<T>(items: readonly T[]): T[] {",
  "  const copy = [...items];",
  "  for (let i = copy.length - 1; i > 0; i--) {",
  "    const j = Math.floor(Math.random() * (i + 1));",
  "    [copy[i], copy[j]] = [copy[j], copy[i]];",
  "  }",
  "  return copy;",
  "}",
  "```",
].join("\n");

// ─── Fixture 4: Code (does not parse) ────────────────────────────────────────

export const FIXTURE_BROKEN_CODE_OUTPUT = [
  "```ts",
  "export function score(answers: string[] {",
  "  return answers.length;",
  "}",
  "```",
].join("\n");
