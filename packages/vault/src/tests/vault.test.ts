/**
 * Vault tests
 * Self-contained test runner — writes into a fresh temp directory.
 */

import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { pino } from "pino";
import { FileSystemVault, safeTitle, formatStamp, resolveFolder, renderNote, isNoteFilename } from "../index.js";

// ─── Mini test runner ─────────────────────────────────────────────────────────

let passed = 0; let failed = 0;
const failures: string[] = [];

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try { await fn(); passed++; console.log(`  ✓ ${name}`); }
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

const silent = pino({ level: "silent" });
const fixedNow = () => new Date("2026-03-04T05:06:07.000Z");
const root = await mkdtemp(path.join(os.tmpdir(), "studyforge-vault-"));
const vault = new FileSystemVault({ rootPath: root, now: fixedNow, logger: silent });

// ─── Helpers ──────────────────────────────────────────────────────────────────

console.log("\n── Helpers ──");

await test("safeTitle drops punctuation and joins words with underscores", () => {
  eq(safeTitle("Cell Biology: Mitosis & Meiosis!"), "Cell_Biology_Mitosis_Meiosis");
});

await test("safeTitle caps the length at 50 characters", () => {
  eq(safeTitle("a".repeat(80)).length, 50);
});

await test("safeTitle falls back to untitled", () => {
  eq(safeTitle("?!/"), "untitled");
});

await test("formatStamp renders UTC as YYYYMMDD_HHMMSS", () => {
  eq(formatStamp(fixedNow()), "20260304_050607");
});

await test("folder hints map request kinds to folders", () => {
  eq(resolveFolder("quiz"), "Quizzes");
  eq(resolveFolder("study_plan"), "StudyPlans");
  eq(resolveFolder("CodeModules"), "CodeModules");
  eq(resolveFolder("elsewhere"), "general");
  eq(resolveFolder(undefined), "general");
});

await test("frontmatter quotes titles and tags", () => {
  const text = renderNote({ title: 'Say "hi"', body: "Body\n\n", tags: ["quiz"], metadata: { questions: 3 } }, "Quizzes", fixedNow());
  eq(text, [
    "---",
    'title: "Say \\"hi\\""',
    'type: "Quizzes"',
    "created: 2026-03-04T05:06:07.000Z",
    'tags: ["studyforge", "quiz"]',
    "questions: 3",
    "---",
    "",
    '# Say "hi"',
    "",
    "Body",
    "",
  ].join("\n"));
});

// ─── Writing notes ────────────────────────────────────────────────────────────

console.log("\n── Writing notes ──");

await test("quiz notes land in Quizzes with a prefixed, stamped filename", async () => {
  const result = await vault.writeNote({ title: "Photosynthesis", body: "Question 1: ...", folderHint: "quiz" });
  ok(result.success, JSON.stringify(result));
  if (!result.success) return;
  eq(result.filename, "Quiz_Photosynthesis_20260304_050607.md");
  eq(result.path, path.join(root, "StudyForge", "Quizzes", "Quiz_Photosynthesis_20260304_050607.md"));
  const text = await readFile(result.path, "utf-8");
  ok(text.endsWith("# Photosynthesis\n\nQuestion 1: ...\n"), text);
});

await test("a name collision gets a numeric suffix instead of overwriting", async () => {
  const result = await vault.writeNote({ title: "Photosynthesis", body: "second", folderHint: "quiz" });
  ok(result.success);
  if (!result.success) return;
  eq(result.filename, "Quiz_Photosynthesis_20260304_050607_2.md");
});

await test("general notes land at the app directory root", async () => {
  const result = await vault.writeNote({ title: "Loose note", body: "text" });
  ok(result.success);
  if (!result.success) return;
  eq(result.path, path.join(root, "StudyForge", "Note_Loose_note_20260304_050607.md"));
});

await test("listNotes filters by folder", async () => {
  const quizzes = await vault.listNotes("Quizzes");
  eq(quizzes.length, 2);
  ok(quizzes.every((n) => n.folder === "Quizzes"));
  eq((await vault.listNotes()).length, 3);
  eq((await vault.listNotes("StudyPlans")).length, 0);
});

await test("readNote returns a listed note's text", async () => {
  const note = await vault.readNote("general", "Note_Loose_note_20260304_050607.md");
  ok(note !== null);
  if (!note) return;
  eq(note.folder, "general");
  eq(note.path, path.join(root, "StudyForge", "Note_Loose_note_20260304_050607.md"));
  ok(note.content.endsWith("# Loose note\n\ntext\n"), note.content);
  eq(note.size, Buffer.byteLength(note.content, "utf-8"));
});

await test("readNote is null for a note in another folder or a missing file", async () => {
  eq(await vault.readNote("StudyPlans", "Note_Loose_note_20260304_050607.md"), null);
  eq(await vault.readNote("Quizzes", "Quiz_Nothing_20260304_050607.md"), null);
});

await test("readNote refuses names that leave the folder", async () => {
  await writeFile(path.join(root, "outside.md"), "secret");
  eq(await vault.readNote("Quizzes", "../../outside.md"), null);
  eq(await vault.readNote("general", "../outside.md"), null);
  eq(await vault.readNote("general", "Quizzes/Quiz_Photosynthesis_20260304_050607.md"), null);
});

await test("only bare, visible .md names count as note filenames", () => {
  eq(isNoteFilename("Quiz_Cells_20260304_050607.md"), true);
  eq(isNoteFilename("notes.txt"), false);
  eq(isNoteFilename(".write-probe-1.md"), false);
  eq(isNoteFilename("a\\b.md"), false);
  eq(isNoteFilename("a/b.md"), false);
});

await test("a write into an unusable root reports failure instead of throwing", async () => {
  const blocker = path.join(root, "not-a-dir");
  await writeFile(blocker, "x");
  const broken = new FileSystemVault({ rootPath: blocker, now: fixedNow, logger: silent });
  const result = await broken.writeNote({ title: "x", body: "y" });
  eq(result.success, false);
});

// ─── Probe ────────────────────────────────────────────────────────────────────

console.log("\n── Probe ──");

await test("probe reports a writable vault and leaves no marker behind", async () => {
  const fresh = await mkdtemp(path.join(os.tmpdir(), "studyforge-probe-"));
  const probeVault = new FileSystemVault({ rootPath: fresh, logger: silent });
  const probe = await probeVault.probe();
  eq(probe.writable, true);
  eq((await readdir(probeVault.appPath)).length, 0);
  await rm(fresh, { recursive: true, force: true });
});

await test("probe reports an unwritable vault with a detail", async () => {
  const blocker = path.join(root, "probe-blocker");
  await writeFile(blocker, "x");
  const probe = await new FileSystemVault({ rootPath: blocker, logger: silent }).probe();
  eq(probe.writable, false);
  ok((probe.detail ?? "").length > 0);
});

await rm(root, { recursive: true, force: true });

// ─── Results ──────────────────────────────────────────────────────────────────

console.log(`\n${"═".repeat(55)}`);
console.log(`Vault Tests: ${passed} passed, ${failed} failed`);
if (failures.length > 0) {
  console.error("\nFailed:");
  failures.forEach(f => console.error(`  ✗ ${f}`));
  throw new Error("Tests failed");
}
