/**
 * Kind: study_plan
 *
 * The plan is a timeline of "H:MM-H:MM" blocks; an empty objective list is
 * replaced with three generic objectives so the model still has targets.
 */

import type { StudyPlanRequest } from "@studyforge/shared-types";
import type { PromptPlan } from "../types.js";

export const STUDY_PLAN_SAMPLING = { temperature: 0.5, maxTokens: 2500 } as const;

export const STUDY_PLAN_CURATION_INSTRUCTION =
  "Optimize this prompt for creating effective, engaging study plans. Keep the H:MM-H:MM time block format.";

export function formatObjectives(req: StudyPlanRequest): string {
  const objectives = req.parameters.objectives.length > 0
    ? req.parameters.objectives
    : [`Master the core concepts of ${req.subject}`, "Apply the knowledge in practice", "Build a strong foundation for further study"];
  return objectives.map((o) => `- ${o}`).join("\n");
}

export function buildStudyPlanPrompt(req: StudyPlanRequest): string {
  const { difficulty, duration } = req.parameters;
  return `Create a ${duration} study plan for "${req.subject}" at ${difficulty} level.

Requirements:
- Break the session into time blocks, each starting on its own line with exact timing in H:MM-H:MM form (e.g. "0:00-0:15 - Introduction")
- List the blocks in chronological order, starting at 0:00
- Vary the activities: reading, hands-on practice, review and breaks
- Add progress checkpoints and self-assessment moments
- Use active learning techniques and spaced repetition
- Format as clear markdown

Subject: ${req.subject}
Duration: ${duration}
Level: ${difficulty}

Learning objectives:
${formatObjectives(req)}`;
}

export function planStudyPlan(req: StudyPlanRequest): PromptPlan {
  return {
    kind: "study_plan",
    prompt: buildStudyPlanPrompt(req),
    curationInstruction: STUDY_PLAN_CURATION_INSTRUCTION,
    sampling: { ...STUDY_PLAN_SAMPLING },
  };
}
