/**
 * Kind: quiz
 *
 * Prompt strategy:
 *  - States the exact question count twice, since validation counts markers
 *  - Fixes the "Question N:" heading form the validator recognises
 *  - Requires the answers section after the "---ANSWERS---" marker
 */

import type { QuizRequest } from "@studyforge/shared-types";
import type { PromptPlan } from "../types.js";

export const QUIZ_SAMPLING = { temperature: 0.6, maxTokens: 2000 } as const;

export const QUIZ_CURATION_INSTRUCTION =
  "Optimize this prompt for generating high-quality educational quizzes. Keep the exact question count, the 'Question N:' headings and the ---ANSWERS--- marker.";

export function buildQuizPrompt(req: QuizRequest): string {
  const { difficulty, questionCount } = req.parameters;
  return `Create a diagnostic quiz on "${req.subject}" at ${difficulty} level with exactly ${questionCount} questions.

Requirements:
- Mix multiple choice, short answer and essay questions
- Cover fundamental concepts and practical applications
- Start every question on its own line as "Question N:" numbered from 1 to ${questionCount}
- After the last question, write a line containing only "---ANSWERS---"
- Below that marker, give a detailed answer explanation for every question, in the same order
- Keep questions challenging but fair for ${difficulty} learners

Subject: ${req.subject}
Difficulty: ${difficulty}
Number of questions: ${questionCount}`;
}

export function planQuiz(req: QuizRequest): PromptPlan {
  return {
    kind: "quiz",
    prompt: buildQuizPrompt(req),
    curationInstruction: QUIZ_CURATION_INSTRUCTION,
    sampling: { ...QUIZ_SAMPLING },
  };
}
