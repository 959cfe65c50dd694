/**
 * Kind: generic — free-form educational content
 */

import type { GenericRequest } from "@studyforge/shared-types";
import type { PromptPlan } from "../types.js";

export const GENERIC_SAMPLING = { temperature: 0.7, maxTokens: 2000 } as const;

export const GENERIC_CURATION_INSTRUCTION =
  "Optimize this prompt for clear, accurate educational content.";

export function buildGenericPrompt(req: GenericRequest): string {
  const instruction = req.parameters.instruction;
  return instruction
    ? `${instruction}\n\nTopic: ${req.subject}`
    : req.subject;
}

export function planGeneric(req: GenericRequest): PromptPlan {
  return {
    kind: "generic",
    prompt: buildGenericPrompt(req),
    curationInstruction: GENERIC_CURATION_INSTRUCTION,
    sampling: { ...GENERIC_SAMPLING },
  };
}
