import { ContextBuilder } from '../context-builder';
import { FILE_TYPES } from '../schemas';
import type { DesignInput, RequirementsInput, StructureInput } from '../schemas';

export const REQUIREMENTS_SCHEMA_HINT = `{
  "requirements": ["short, testable requirement statement"],
  "dependencies": ["requirement B depends on requirement A"]
}`;

export const DESIGN_SCHEMA_HINT = `{
  "architecture": "overview of the system architecture",
  "components": ["main component"],
  "dataModels": ["data model"],
  "apiEndpoints": ["endpoint, if applicable"],
  "dependencies": ["library or tool needed"]
}`;

export const STRUCTURE_SCHEMA_HINT = `{
  "description": "what the files are for",
  "files": [
    { "path": "relative/path/file.ext", "purpose": "what this file contains", "type": "${FILE_TYPES.join(' | ')}" }
  ]
}`;

export function buildRequirementsPrompt(input: RequirementsInput): string {
  const history = ContextBuilder.conversation(input.conversation);
  const historySection = history ? `\n### EARLIER CONVERSATION\n${history}\n` : '';

  return `ACT AS: Software Requirements Analyst
TASK: Extract the requirements for the software described below.
${historySection}
### REQUEST
${input.task}

### INSTRUCTIONS
- Keep requirements minimal: only what is essential to accomplish the request.
- Each requirement is one short, verifiable statement.
- List dependencies between requirements when one cannot be built without another.
- When an earlier conversation exists, the request refines that project: keep the earlier
  requirements that still apply and add or change only what the request asks for.

### OUTPUT FORMAT
Return ONLY valid JSON. No markdown. No explanation.
${REQUIREMENTS_SCHEMA_HINT}
`;
}

export function buildDesignPrompt(input: DesignInput): string {
  return `ACT AS: Software Architect
TASK: Create a simple, high-level design that satisfies these requirements.

### REQUEST
${input.task}

### REQUIREMENTS
${ContextBuilder.requirements(input.requirements)}

### INSTRUCTIONS
Focus on simplicity. Describe the architecture, the main components, the data models,
API endpoints (only if the software exposes any) and the libraries needed.

### OUTPUT FORMAT
Return ONLY valid JSON. No markdown. No explanation.
${DESIGN_SCHEMA_HINT}
`;
}

export function buildStructurePrompt(input: StructureInput): string {
  const existing = input.existingFiles.length > 0 ? `\n### FILES THAT ALREADY EXIST\n${input.existingFiles.map((f) => `- ${f}`).join('\n')}\nKeep the paths of existing files that are still needed.\n` : '';

  return `ACT AS: Senior Software Engineer
TASK: Propose a minimal project structure for this design.

### REQUIREMENTS
${ContextBuilder.requirements(input.requirements)}

### DESIGN
${ContextBuilder.design(input.design)}
${existing}
### INSTRUCTIONS
- Only the essential files. Each file is generated separately, so every file must stand on its own.
- Include at least one test file so the project can be verified automatically.
- Include the dependency manifest the language needs (requirements.txt, package.json, ...) when
  third-party libraries are used.
- Paths are relative to the project root, use "/" and never contain "..".
- "type" must be one of: ${FILE_TYPES.join(', ')}.

### OUTPUT FORMAT
Return ONLY valid JSON. No markdown. No explanation.
${STRUCTURE_SCHEMA_HINT}
`;
}
