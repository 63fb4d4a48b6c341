import fs from 'fs/promises';
import path from 'path';
import type { WorkflowResult } from './workflow';
import { WorkflowError } from './errors';

export interface WrittenArtifacts {
  outputDir: string;
  files: string[];
  documentation?: string;
  historyFile: string;
  summaryFile: string;
}

/** Resolves a project path under `root`, refusing anything that escapes it */
export function resolveInside(root: string, relative: string): string {
  const base = path.resolve(root);
  const target = path.resolve(base, relative);
  if (target !== base && !target.startsWith(`${base}${path.sep}`)) {
    throw new WorkflowError(`Refusing to write outside the output directory: ${relative}`);
  }
  return target;
}

export function renderSummary(result: WorkflowResult, documentationFile?: string): string {
  const lines = ['# Workflow Summary', '', `- Run: ${result.runId}`, `- Status: ${result.status}`, `- Final state: ${result.finalState}`];

  const verification = result.verification;
  if (verification) {
    const label = verification.passed ? 'passed' : verification.exhausted ? 'iteration budget exhausted (last regeneration unverified)' : 'not passed';
    lines.push(`- Verification: ${label} after ${verification.iterations} iteration(s)`);
  }
  if (result.failure) {
    lines.push(`- Failed stage: ${result.failure.stage} (${result.failure.kind})`, `- Error: ${result.failure.message}`);
  }

  lines.push('', '## Files', '');
  const paths = Object.keys(result.files).sort();
  lines.push(...(paths.length > 0 ? paths.map((p) => `- ${p}`) : ['(none)']));
  if (documentationFile) {
    lines.push('', `Documentation: ${documentationFile}`);
  }
  return `${lines.join('\n')}\n`;
}

/**
 * First candidate no generated file already uses (case-insensitive). When
 * every candidate is taken, the last one gets a numeric suffix.
 */
export function pickFreeName(candidates: string[], taken: ReadonlySet<string>): string {
  const free = candidates.find((name) => !taken.has(name.toLowerCase()));
  if (free) return free;

  const last = candidates[candidates.length - 1] ?? 'artifact';
  const ext = path.extname(last);
  const stem = last.slice(0, last.length - ext.length);
  for (let n = 2; ; n++) {
    const name = `${stem}-${n}${ext}`;
    if (!taken.has(name.toLowerCase())) return name;
  }
}

/**
 * Writes a run's durable output: the generated files, the verification
 * history, the documentation and a summary.
 */
export class ArtifactStore {
  async write(outputDir: string, result: WorkflowResult): Promise<WrittenArtifacts> {
    const root = path.resolve(outputDir);
    const entries = Object.entries(result.files);

    // Resolve everything first so a bad path writes nothing
    const targets = entries.map(([relative, content]) => ({ relative, absolute: resolveInside(root, relative), content }));

    await fs.mkdir(root, { recursive: true });
    for (const file of targets) {
      await fs.mkdir(path.dirname(file.absolute), { recursive: true });
      await fs.writeFile(file.absolute, file.content, 'utf-8');
    }

    // Run artifacts never overwrite a generated file
    const taken = new Set(targets.map((t) => path.relative(root, t.absolute).split(path.sep).join('/').toLowerCase()));
    const claim = (candidates: string[]): string => {
      const name = pickFreeName(candidates, taken);
      taken.add(name.toLowerCase());
      return name;
    };

    const historyFile = path.join(root, claim(['verification-history.json']));
    await fs.writeFile(historyFile, JSON.stringify(result.verificationHistory, null, 2), 'utf-8');

    let documentation: string | undefined;
    const readme = result.state.documentation?.readme;
    if (readme !== undefined) {
      documentation = claim(['README.md', 'PROJECT_OVERVIEW.md']);
      await fs.writeFile(path.join(root, documentation), readme, 'utf-8');
    }

    const summaryFile = path.join(root, claim(['workflow-summary.md']));
    await fs.writeFile(summaryFile, renderSummary(result, documentation), 'utf-8');

    return { outputDir: root, files: targets.map((t) => t.relative), documentation, historyFile, summaryFile };
  }
}
