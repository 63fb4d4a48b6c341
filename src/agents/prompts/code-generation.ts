import { ContextBuilder, languageFor } from '../context-builder';
import type { GenerateFileInput, RegenerateInput, RegenerationTarget } from '../schemas';

export const GENERATE_FILE_SCHEMA_HINT = `{
  "path": "the exact path requested",
  "content": "the COMPLETE file content"
}`;

export const REGENERATE_SCHEMA_HINT = `{
  "files": [
    { "path": "one of the target paths", "content": "the COMPLETE corrected file content" }
  ]
}`;

export const getFileGenerationPrompt = (input: GenerateFileInput): string => {
  const language = languageFor(input.target.path);
  const previous =
    input.previousContent !== undefined
      ? `\n### CURRENT CONTENT OF THIS FILE\nThe file already exists. Update it to satisfy the requirements; keep what still applies.\n--- FILE: ${input.target.path} ---\n${input.previousContent}\n--- END FILE ---\n`
      : '';

  return `ACT AS: Senior Software Engineer
TASK: Write the file \`${input.target.path}\` (${language}).

### REQUEST
${input.task}

### REQUIREMENTS
${ContextBuilder.requirements(input.requirements)}

### DESIGN
${ContextBuilder.design(input.design)}

### PROJECT STRUCTURE
${ContextBuilder.manifest(input.manifest)}

### THIS FILE
Purpose: ${input.target.purpose}
Type: ${input.target.type}
${previous}
### CRITICAL RULES
1. "path" must be exactly "${input.target.path}".
2. "content" is the complete, runnable file: all imports, all functions, no placeholders.
3. Only reference other files that appear in the project structure above.

### OUTPUT FORMAT
Return ONLY valid JSON. No markdown. No explanation.
${GENERATE_FILE_SCHEMA_HINT}
`;
};

function formatTarget(target: RegenerationTarget): string {
  const reason = target.reason === 'execution_failure' ? 'fails when the project is executed' : 'is missing required elements';
  const details = target.details.length > 0 ? target.details.map((d) => `  - ${d}`).join('\n') : '  - (no further details)';
  const content = target.currentContent !== undefined ? `--- FILE: ${target.path} ---\n${target.currentContent}\n--- END FILE ---` : `(file ${target.path} has no content yet)`;
  return `#### ${target.path} (${reason})\n${details}\n${content}`;
}

export const getRegenerationPrompt = (input: RegenerateInput): string => {
  const targetPaths = input.targets.map((t) => t.path);

  return `ACT AS: Senior Software Engineer
TASK: Fix ONLY the files listed below so the project becomes complete and runs.

### REQUIREMENTS
${ContextBuilder.requirements(input.requirements)}

### DESIGN
${ContextBuilder.design(input.design)}

### PROJECT STRUCTURE
${ContextBuilder.manifest(input.manifest)}

### EXECUTION LOG
${ContextBuilder.executionLog(input.executionLog)}

### FILES TO FIX
${input.targets.map(formatTarget).join('\n\n')}

### CRITICAL RULES
1. Return only files from this list: ${targetPaths.join(', ')}.
2. Each "content" is the COMPLETE corrected file, not a diff.
3. Address every listed problem. Do not rename files.

### OUTPUT FORMAT
Return ONLY valid JSON. No markdown. No explanation.
${REGENERATE_SCHEMA_HINT}
`;
};
