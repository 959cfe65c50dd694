/**
 * GenerationOrchestrator tests
 *
 * Uses scripted fetch — zero network calls.
 * Tests:
 *   - Every run ends in exactly one of Succeeded / Failed, with the transitions recorded
 *   - Curation is skipped on request, degrades when the curator is down, hits the cache
 *   - Generation errors pass through with their kind; no second retry layer
 *   - Validation failures keep the content
 *   - The model catalog short-circuits unknown models
 */

import {
  GenerationOrchestrator, InferenceClient, PromptCurator, RemoteCurationBackend, ModelCatalog,
  PipelineRun, IllegalTransitionError, canTransition,
} from "../index.js";
import type { CurationBackend } from "../index.js";
import {
  FIXTURE_QUIZ_OUTPUT, FIXTURE_STUDY_PLAN_OUTPUT, FIXTURE_CODE_OUTPUT, FIXTURE_BROKEN_CODE_OUTPUT,
  RequestValidationError,
} from "@studyforge/shared-types";
import type { GenerationResult } from "@studyforge/shared-types";
import {
  createRunner, eq, ok, deepEq, rejection, silentLogger, scriptedFetch, optionOf, fieldOf,
  generated, TIMEOUT,
} from "./harness.js";
import type { Route } from "./harness.js";

const { test, section, finish } = createRunner("Orchestrator Tests");

class FakeBackend implements CurationBackend {
  readonly name = "fake";
  calls = 0;
  constructor(private readonly impl: (raw: string) => Promise<string>) {}
  refine(raw: string): Promise<string> {
    this.calls++;
    return this.impl(raw);
  }
  async probe(): Promise<boolean> {
    return true;
  }
}

interface SetupOptions {
  curator?: PromptCurator | null;
  catalog?: ModelCatalog | null;
  model?: string;
}

function setup(routes: Record<string, Route>, opts: SetupOptions = {}) {
  const stub = scriptedFetch(routes);
  const client = new InferenceClient(
    {
      baseUrl: "http://ollama.test",
      defaultModel: "llama3:latest",
      retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 },
    },
    { fetchFn: stub.fetchFn, sleep: async () => undefined, logger: silentLogger },
  );
  const orchestrator = new GenerationOrchestrator({
    client,
    curator: opts.curator ?? null,
    catalog: opts.catalog ?? null,
    ...(opts.model ? { model: opts.model } : {}),
    logger: silentLogger,
  });
  return { stub, client, orchestrator };
}

function fakeCurator(impl: (raw: string) => Promise<string> = async () => "CURATED PROMPT") {
  const backend = new FakeBackend(impl);
  return { backend, curator: new PromptCurator(backend, { logger: silentLogger }) };
}

function downCurator(): PromptCurator {
  return new PromptCurator(new RemoteCurationBackend({ baseUrl: "http://curator.test" }, scriptedFetch({}).fetchFn), { logger: silentLogger });
}

/** success, state and error must agree; content with an error only on ValidationFailed */
function assertConsistent(r: GenerationResult): void {
  eq(r.state, r.success ? "Succeeded" : "Failed");
  eq(r.error === undefined, r.success, "error is present exactly when the run failed");
  eq(r.transitions[0], "Received");
  eq(r.transitions[r.transitions.length - 1], r.state);
  if (r.error && r.content.length > 0) eq(r.error.kind, "ValidationFailed");
}

const quizInput = { subject: "Photosynthesis", questionCount: 3 };

// ─── Happy paths ──────────────────────────────────────────────────────────────

section("Happy paths");

await test("a curated quiz passes through every state", async () => {
  const { curator } = fakeCurator();
  const { orchestrator, stub } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { curator });
  const r = await orchestrator.generateQuiz(quizInput);
  assertConsistent(r);
  eq(r.success, true);
  deepEq(r.transitions, ["Received", "Curating", "Generating", "Validating", "Succeeded"]);
  eq(r.kind, "quiz");
  eq(r.content, FIXTURE_QUIZ_OUTPUT);
  eq(r.modelUsed, "llama3:latest");
  eq(r.tokenCount, 42);
  eq(r.validation.valid, true);
  deepEq(r.curation, { applied: true, fromCache: false });
  eq(fieldOf(stub.calls[0], "prompt"), "CURATED PROMPT");
});

await test("quiz sampling defaults reach the runtime", async () => {
  const { orchestrator, stub } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) });
  await orchestrator.generateQuiz({ ...quizInput, useCuration: false });
  eq(optionOf(stub.calls[0], "temperature"), 0.6);
  eq(optionOf(stub.calls[0], "num_predict"), 2000);
});

await test("a study plan with ordered time blocks succeeds", async () => {
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_STUDY_PLAN_OUTPUT) });
  const r = await orchestrator.generateStudyPlan({ subject: "Linear Algebra", duration: "90 minutes", useCuration: false });
  assertConsistent(r);
  eq(r.success, true);
});

await test("a code module that parses succeeds with code sampling", async () => {
  const { orchestrator, stub } = setup({ "POST /api/generate": generated(FIXTURE_CODE_OUTPUT) });
  const r = await orchestrator.generateCode({ functionality: "flashcard shuffling", moduleName: "flashcards", useCuration: false });
  assertConsistent(r);
  eq(r.success, true);
  eq(optionOf(stub.calls[0], "temperature"), 0.3);
  eq(optionOf(stub.calls[0], "num_predict"), 3000);
});

await test("generic content only needs to be non-empty", async () => {
  const { orchestrator } = setup({ "POST /api/generate": generated("  The Krebs cycle, in brief.  ") });
  const r = await orchestrator.generateGeneric({ subject: "Explain the Krebs cycle", useCuration: false });
  eq(r.success, true);
  eq(r.content, "The Krebs cycle, in brief.");
});

// ─── Curation ─────────────────────────────────────────────────────────────────

section("Curation");

await test("useCuration=false skips Curating and never calls the curator", async () => {
  const { backend, curator } = fakeCurator();
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { curator });
  const r = await orchestrator.generateQuiz({ ...quizInput, useCuration: false });
  deepEq(r.transitions, ["Received", "Generating", "Validating", "Succeeded"]);
  eq(backend.calls, 0);
  deepEq(r.curation, { applied: false, fromCache: false, reason: "curation disabled for this request" });
});

await test("an unreachable curator does not abort generation", async () => {
  const { orchestrator, stub } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { curator: downCurator() });
  const r = await orchestrator.generateQuiz(quizInput);
  assertConsistent(r);
  eq(r.success, true);
  deepEq(r.transitions, ["Received", "Curating", "Generating", "Validating", "Succeeded"]);
  deepEq(r.curation, { applied: false, fromCache: false, reason: "fetch failed" });
  const sent = fieldOf(stub.calls[0], "prompt");
  ok(typeof sent === "string" && sent.startsWith('Create a diagnostic quiz on "Photosynthesis" at intermediate level'), String(sent));
});

await test("without a curator the result says so", async () => {
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) });
  const r = await orchestrator.generateQuiz(quizInput);
  deepEq(r.transitions, ["Received", "Generating", "Validating", "Succeeded"]);
  eq(r.curation.reason, "no curator configured");
});

await test("a repeated request is served from the curation cache", async () => {
  const { backend, curator } = fakeCurator();
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { curator });
  await orchestrator.generateQuiz(quizInput);
  const second = await orchestrator.generateQuiz(quizInput);
  eq(backend.calls, 1);
  deepEq(second.curation, { applied: true, fromCache: true });
});

// ─── Failures ─────────────────────────────────────────────────────────────────

section("Failures");

await test("exhausted timeouts fail with the client's Timeout, retried only by the client", async () => {
  const { orchestrator, stub } = setup({ "POST /api/generate": TIMEOUT });
  const r = await orchestrator.generateQuiz({ ...quizInput, useCuration: false });
  assertConsistent(r);
  eq(r.success, false);
  eq(r.error?.kind, "Timeout");
  eq(r.error?.retryable, true);
  eq(r.error?.remedy, "retry_now");
  eq(r.content, "");
  deepEq(r.transitions, ["Received", "Generating", "Failed"]);
  eq(stub.count("POST /api/generate"), 3);
});

await test("a missing model fails at once with ModelNotFound", async () => {
  const { orchestrator, stub } = setup({ "POST /api/generate": { status: 404, body: { error: "model 'ghost' not found" } } }, { model: "ghost" });
  const r = await orchestrator.generateQuiz({ ...quizInput, useCuration: false });
  assertConsistent(r);
  eq(r.error?.kind, "ModelNotFound");
  eq(r.error?.retryable, false);
  eq(r.modelUsed, "ghost");
  eq(stub.count("POST /api/generate"), 1);
});

await test("unparsable code fails validation but keeps the content", async () => {
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_BROKEN_CODE_OUTPUT) });
  const r = await orchestrator.generateCode({ functionality: "scoring", moduleName: "scoring", useCuration: false });
  assertConsistent(r);
  eq(r.state, "Failed");
  eq(r.error?.kind, "ValidationFailed");
  eq(r.error?.remedy, "review_content");
  eq(r.content, FIXTURE_BROKEN_CODE_OUTPUT);
  eq(r.validation.valid, false);
  deepEq(r.transitions, ["Received", "Generating", "Validating", "Failed"]);
  ok(r.error?.message.startsWith("The generated code module failed validation: Line "), r.error?.message);
});

await test("a quiz with the wrong question count fails validation", async () => {
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) });
  const r = await orchestrator.generateQuiz({ subject: "Photosynthesis", questionCount: 5, useCuration: false });
  eq(r.error?.message, "The generated quiz failed validation: Expected 5 questions, found 3.");
  eq(r.tokenCount, 42);
});

await test("an empty answer fails validation", async () => {
  const { orchestrator } = setup({ "POST /api/generate": generated("   ") });
  const r = await orchestrator.generateGeneric({ subject: "anything", useCuration: false });
  eq(r.error?.kind, "ValidationFailed");
  eq(r.validation.issues[0]?.ruleId, "CONTENT_001");
});

await test("invalid input is rejected before a pipeline starts", async () => {
  const { orchestrator, stub } = setup({ "POST /api/generate": generated("x") });
  const err = await rejection(orchestrator.generateQuiz({ subject: "  " }));
  ok(err instanceof RequestValidationError);
  eq(stub.calls.length, 0);
});

// ─── Model catalog ────────────────────────────────────────────────────────────

section("Model catalog");

await test("a model absent from a fresh catalog and a re-read fails before any generation", async () => {
  let listings = 0;
  const catalog = new ModelCatalog({ listModels: async () => { listings++; return new Set(["mistral:7b"]); } });
  catalog.update(["mistral:7b"]);
  const { orchestrator, stub } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { catalog });
  const r = await orchestrator.generateQuiz(quizInput);
  assertConsistent(r);
  eq(r.error?.kind, "ModelNotFound");
  deepEq(r.transitions, ["Received", "Failed"]);
  eq(listings, 1);
  eq(stub.calls.length, 0);
});

await test("a model pulled since the last poll is found by re-reading the catalog", async () => {
  const catalog = new ModelCatalog({ listModels: async () => new Set(["mistral:7b", "llama3:latest"]) });
  catalog.update(["mistral:7b"]);
  const { orchestrator, stub } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { catalog });
  const r = await orchestrator.generateQuiz({ ...quizInput, useCuration: false });
  eq(r.success, true);
  eq(catalog.has("llama3:latest"), true);
  eq(stub.count("POST /api/generate"), 1);
});

await test("a failed catalog re-read leaves the decision to generation", async () => {
  const catalog = new ModelCatalog({ listModels: async () => { throw new Error("runtime busy"); } });
  catalog.update(["mistral:7b"]);
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { catalog });
  eq((await orchestrator.generateQuiz({ ...quizInput, useCuration: false })).success, true);
});

await test("a tag-less model name matches :latest in the catalog", async () => {
  const catalog = new ModelCatalog({ listModels: async () => new Set<string>() });
  catalog.update(["llama3:latest"]);
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { catalog, model: "llama3" });
  eq((await orchestrator.generateQuiz({ ...quizInput, useCuration: false })).success, true);
});

await test("a stale catalog is ignored", async () => {
  let clock = 0;
  const catalog = new ModelCatalog({ listModels: async () => new Set<string>() }, { ttlMs: 10, now: () => clock });
  catalog.update(["mistral:7b"]);
  clock = 20;
  const { orchestrator } = setup({ "POST /api/generate": generated(FIXTURE_QUIZ_OUTPUT) }, { catalog });
  eq((await orchestrator.generateQuiz({ ...quizInput, useCuration: false })).success, true);
});

await test("concurrent catalog refreshes share one listing", async () => {
  let calls = 0;
  const catalog = new ModelCatalog({ listModels: async () => { calls++; return new Set(["a:1"]); } });
  const [x, y] = await Promise.all([catalog.refresh(), catalog.refresh()]);
  eq(calls, 1);
  eq(x, y);
  eq(catalog.has("a:1"), true);
  eq(catalog.has("b"), false);
});

// ─── State machine ────────────────────────────────────────────────────────────

section("State machine");

await test("illegal transitions throw", () => {
  const run = new PipelineRun();
  let thrown: unknown = null;
  try { run.moveTo("Validating"); } catch (e) { thrown = e; }
  ok(thrown instanceof IllegalTransitionError);
  eq(run.state, "Received");
});

await test("terminal states accept nothing", () => {
  const run = new PipelineRun();
  run.moveTo("Failed");
  for (const next of ["Received", "Curating", "Generating", "Validating", "Succeeded", "Failed"] as const) {
    eq(canTransition("Failed", next), false);
    eq(canTransition("Succeeded", next), false);
  }
});

await test("curation cannot fail a run", () => {
  eq(canTransition("Curating", "Failed"), false);
  eq(canTransition("Curating", "Generating"), true);
});

await test("independent requests run concurrently with their own state", async () => {
  const { orchestrator } = setup({
    "POST /api/generate": (call) => {
      const prompt = fieldOf(call, "prompt");
      return typeof prompt === "string" && prompt.includes("Question N:")
        ? generated(FIXTURE_QUIZ_OUTPUT)
        : generated(FIXTURE_BROKEN_CODE_OUTPUT);
    },
  });
  const [quiz, code] = await Promise.all([
    orchestrator.generateQuiz({ ...quizInput, useCuration: false }),
    orchestrator.generateCode({ functionality: "x", useCuration: false }),
  ]);
  eq(quiz.state, "Succeeded");
  eq(code.state, "Failed");
});

finish();
