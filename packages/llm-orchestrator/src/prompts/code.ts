/**
 * Kind: code
 *
 * Generated modules are TypeScript and must arrive in a single fenced block,
 * which is what the validator extracts and parses.
 */

import type { CodeRequest } from "@studyforge/shared-types";
import type { PromptPlan } from "../types.js";

export const CODE_SAMPLING = { temperature: 0.3, maxTokens: 3000 } as const;

export const CODE_CURATION_INSTRUCTION =
  "Optimize this prompt for generating high-quality, educational TypeScript code. Keep the module name and the single fenced code block requirement.";

export function buildCodePrompt(req: CodeRequest): string {
  const { moduleName, includeTests } = req.parameters;
  const tests = includeTests
    ? "- After the module code, in the same code block, add unit tests written with node:test and node:assert"
    : "- Do not include tests";

  return `Create a complete TypeScript module named "${moduleName}" that provides ${req.subject}.

Requirements:
- Return the whole module in ONE fenced code block marked \`\`\`typescript
- Export every public function, class and type
- Add TSDoc comments to exported declarations
- Use explicit types on exported signatures
- Validate inputs and throw Error subclasses with clear messages
- Keep it practical for students and educators
${tests}

Module name: ${moduleName}
Functionality: ${req.subject}`;
}

export function planCode(req: CodeRequest): PromptPlan {
  return {
    kind: "code",
    prompt: buildCodePrompt(req),
    curationInstruction: CODE_CURATION_INSTRUCTION,
    sampling: { ...CODE_SAMPLING },
  };
}
