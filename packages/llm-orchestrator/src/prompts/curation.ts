/**
 * Curation meta-prompt
 *
 * Wraps a raw generation prompt in instructions for the curation model. The
 * model is asked to answer after a "REFINED PROMPT:" cue; some models echo
 * the cue back, so extraction keeps only what follows its last occurrence.
 */

export const REFINED_PROMPT_CUE = "REFINED PROMPT:";

export const CURATION_SAMPLING = { temperature: 0.3, maxTokens: 2048 } as const;

export function buildCurationPrompt(rawPrompt: string, instruction: string): string {
  if (instruction.trim()) {
    return `You are a prompt curator. Your task is to refine and improve prompts for better clarity and effectiveness.

INSTRUCTION: ${instruction.trim()}

ORIGINAL PROMPT:
${rawPrompt}

Keep every concrete requirement of the original (counts, formats, markers, names). Reply with the refined prompt only.

${REFINED_PROMPT_CUE}`;
  }

  return `You are a prompt curator. Your task is to refine and improve prompts for better clarity, specificity, and effectiveness while keeping the original intent.

ORIGINAL PROMPT:
${rawPrompt}

Provide a refined version that is more specific and better structured. Keep every concrete requirement of the original. Reply with the refined prompt only.

${REFINED_PROMPT_CUE}`;
}

export function extractRefinedPrompt(modelOutput: string): string {
  const idx = modelOutput.lastIndexOf(REFINED_PROMPT_CUE);
  const text = idx >= 0 ? modelOutput.slice(idx + REFINED_PROMPT_CUE.length) : modelOutput;
  return text.trim();
}
