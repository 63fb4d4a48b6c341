import type { ConversationTurn, DesignOutput, ManifestEntry, RequirementsOutput } from './schemas';

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  py: 'python',
  js: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',
  ts: 'typescript',
  tsx: 'typescript',
  html: 'html',
  css: 'css',
  java: 'java',
  c: 'c',
  cpp: 'cpp',
  cs: 'csharp',
  go: 'go',
  rs: 'rust',
  php: 'php',
  rb: 'ruby',
  swift: 'swift',
  kt: 'kotlin',
  json: 'json',
  md: 'markdown',
  toml: 'toml',
  yaml: 'yaml',
  yml: 'yaml',
};

/** Language label for a project path, derived from its extension */
export function languageFor(filePath: string): string {
  const base = filePath.split('/').pop() ?? filePath;
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return 'text';
  return LANGUAGE_BY_EXTENSION[base.slice(dot + 1).toLowerCase()] ?? 'text';
}

/**
 * Renders workflow state fragments into the plain-text sections the stage
 * prompts embed.
 */
export class ContextBuilder {
  static requirements(requirements: RequirementsOutput): string {
    const lines = requirements.requirements.map((r) => `- ${r}`);
    if (requirements.dependencies.length > 0) {
      lines.push('', 'Dependencies between requirements:', ...requirements.dependencies.map((d) => `- ${d}`));
    }
    return lines.join('\n');
  }

  static design(design: DesignOutput): string {
    const list = (items: string[]): string => (items.length > 0 ? items.map((i) => `  - ${i}`).join('\n') : '  (none)');
    return [
      `Architecture: ${design.architecture}`,
      `Components:\n${list(design.components)}`,
      `Data models:\n${list(design.dataModels)}`,
      `API endpoints:\n${list(design.apiEndpoints)}`,
      `Dependencies:\n${list(design.dependencies)}`,
    ].join('\n');
  }

  static manifest(manifest: ManifestEntry[]): string {
    return manifest.map((f) => `- ${f.path} [${f.type}]: ${f.purpose}`).join('\n');
  }

  static files(files: Record<string, string>): string {
    const entries = Object.entries(files);
    if (entries.length === 0) {
      return '(no files generated yet)';
    }
    return entries.map(([filePath, content]) => `--- FILE: ${filePath} ---\n${content}\n--- END FILE ---`).join('\n\n');
  }

  static conversation(turns: ConversationTurn[]): string {
    if (turns.length === 0) return '';
    return turns.map((t) => `${t.role === 'user' ? 'USER' : 'AGENT'}: ${t.content}`).join('\n');
  }

  /** Keeps the tail of long execution logs, where failures are reported */
  static executionLog(log: string | undefined, maxChars = 6000): string {
    if (!log) return '(execution was not attempted)';
    if (log.length <= maxChars) return log;
    return `...[truncated ${log.length - maxChars} chars]\n${log.slice(log.length - maxChars)}`;
  }
}
