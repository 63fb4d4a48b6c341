/**
 * Follow-up prompt sent when a stage response failed schema validation.
 * Quotes the rejected output and the exact validation problems so the model
 * can correct them without regenerating unrelated content.
 */
export function buildRepairPrompt(input: { originalPrompt: string; rawOutput: string; errors: string; schemaHint: string; attempt: number }): string {
  const rejected = input.rawOutput.length > 4000 ? `${input.rawOutput.slice(0, 4000)}...[truncated]` : input.rawOutput;

  return `${input.originalPrompt}

---
ATTENTION: YOUR PREVIOUS RESPONSE (ATTEMPT ${input.attempt}) WAS REJECTED.

Rejected response:
${rejected}

Validation errors:
${input.errors}

Return the corrected response. It must be ONLY valid JSON matching exactly:
${input.schemaHint}
---`;
}
