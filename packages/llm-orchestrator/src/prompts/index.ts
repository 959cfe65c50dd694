import type { GenerationRequest } from "@studyforge/shared-types";
import type { PromptPlan } from "../types.js";
import { planQuiz } from "./quiz.js";
import { planStudyPlan } from "./study-plan.js";
import { planCode } from "./code.js";
import { planGeneric } from "./generic.js";

export { buildQuizPrompt, QUIZ_SAMPLING, QUIZ_CURATION_INSTRUCTION } from "./quiz.js";
export { buildStudyPlanPrompt, STUDY_PLAN_SAMPLING, STUDY_PLAN_CURATION_INSTRUCTION } from "./study-plan.js";
export { buildCodePrompt, CODE_SAMPLING, CODE_CURATION_INSTRUCTION } from "./code.js";
export { buildGenericPrompt, GENERIC_SAMPLING, GENERIC_CURATION_INSTRUCTION } from "./generic.js";
export { buildCurationPrompt, extractRefinedPrompt, CURATION_SAMPLING, REFINED_PROMPT_CUE } from "./curation.js";

/** Prompt, curation instruction and sampling defaults for one request */
export function planPrompt(req: GenerationRequest): PromptPlan {
  switch (req.kind) {
    case "quiz": return planQuiz(req);
    case "study_plan": return planStudyPlan(req);
    case "code": return planCode(req);
    case "generic": return planGeneric(req);
  }
}
