import { ContextBuilder } from '../context-builder';
import type { CompletenessCheckInput } from '../schemas';

export const COMPLETENESS_SCHEMA_HINT = `{
  "complete": true,
  "missingElements": [
    { "file": "path of the affected file, if any", "description": "what is missing or wrong" }
  ]
}`;

export function buildCompletenessPrompt(input: CompletenessCheckInput): string {
  return `ACT AS: Code Reviewer
TASK: Verify that the generated project is complete.

### REQUIREMENTS
${ContextBuilder.requirements(input.requirements)}

### PROJECT STRUCTURE
${ContextBuilder.manifest(input.manifest)}

### SOURCE FILES
${ContextBuilder.files(input.files)}

### EXECUTION LOG
${ContextBuilder.executionLog(input.executionLog)}

### INSTRUCTIONS
Check every requirement against the code: imports, dependencies, function implementations,
error handling. Report each gap as one missing element, naming the file it belongs to.
Placeholders, "TODO" bodies and functions referenced but never defined are gaps.
Set "complete" to true only when there are no gaps.

### OUTPUT FORMAT
Return ONLY valid JSON. No markdown. No explanation.
${COMPLETENESS_SCHEMA_HINT}
`;
}
