import { ContextBuilder } from '../context-builder';
import type { DocumentationInput, DocumentationOutput } from '../schemas';

export const DOCUMENTATION_SCHEMA_HINT = `{
  "overview": "project name and one-paragraph overview",
  "installation": "installation steps (markdown)",
  "usage": "usage instructions (markdown)",
  "fileDescriptions": { "path/of/file": "what it contains" }
}`;

export function buildDocumentationPrompt(input: DocumentationInput): string {
  return `ACT AS: Technical Writer
TASK: Document this software project.

### REQUEST
${input.task}

### REQUIREMENTS
${ContextBuilder.requirements(input.requirements)}

### DESIGN
${ContextBuilder.design(input.design)}

### FILES
${ContextBuilder.manifest(input.manifest)}

### OUTPUT FORMAT
Return ONLY valid JSON. No markdown fences around it. No explanation.
${DOCUMENTATION_SCHEMA_HINT}
`;
}

/** Renders documentation output as a README */
export function renderReadme(doc: DocumentationOutput): string {
  const sections = [`# ${doc.overview}`, `## Installation\n${doc.installation}`, `## Usage\n${doc.usage}`];
  const files = Object.entries(doc.fileDescriptions);
  if (files.length > 0) {
    sections.push(`## File Structure\n${files.map(([file, description]) => `- \`${file}\`: ${description}`).join('\n')}`);
  }
  return `${sections.join('\n\n')}\n`;
}
