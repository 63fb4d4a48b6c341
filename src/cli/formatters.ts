import chalk from 'chalk';
import type { WorkflowRunResult } from '../orchestrator/engine';
import type { FileChange } from '../orchestrator/interactive';
import type { State } from '../orchestrator/states';
import type { VerificationReport } from '../orchestrator/workflow-state';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── State progress ──────────────────────────────────────────────────────

const STATE_LABELS: Record<State, string> = {
  Start: 'Starting...',
  RequirementsAnalysis: 'Analyzing requirements...',
  Design: 'Designing architecture...',
  StructureProposal: 'Planning project structure...',
  CodeGeneration: 'Generating code...',
  CompletenessVerification: 'Verifying completeness...',
  Documentation: 'Writing documentation...',
  Done: 'Done',
  Failed: 'Failed',
};

export function formatStateTransition(from: State, to: State): string {
  const label = from === to ? 'Retrying verification...' : STATE_LABELS[to];
  return chalk.cyan(`  [${from} -> ${to}] ${label}`);
}

// ── Verbose interim output ──────────────────────────────────────────────

export function formatVerboseSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

export function formatVerificationHistory(history: readonly VerificationReport[]): string {
  if (!history.length) return formatVerboseSection('Verification', '  (no verification reports)');
  const lines = history.map((report) => {
    const files = report.failingFiles.length ? ` -> ${report.failingFiles.join(', ')}` : '';
    return `  #${report.iteration} ${report.status}${files}`;
  });
  return formatVerboseSection('Verification', lines.join('\n'));
}

// ── Changes ─────────────────────────────────────────────────────────────

const CHANGE_MARKS: Record<FileChange['kind'], string> = {
  added: chalk.green('A'),
  modified: chalk.yellow('M'),
  removed: chalk.red('D'),
  unchanged: ' ',
};

export function formatFileChanges(changes: FileChange[]): string {
  const touched = changes.filter((c) => c.kind !== 'unchanged');
  if (!touched.length) return formatInfo('(no file changes)');
  return touched
    .map((c) => {
      const counts = `${chalk.green(`+${c.added}`)} ${chalk.red(`-${c.removed}`)}`;
      return `  ${CHANGE_MARKS[c.kind]} ${c.path} ${counts}`;
    })
    .join('\n');
}

// ── Final result ────────────────────────────────────────────────────────

export function formatWorkflowResult(result: WorkflowRunResult, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (result.status === 'done' && result.verification?.exhausted) {
    lines.push(chalk.yellow.bold('Workflow finished; verification budget exhausted.'));
  } else if (result.status === 'done') {
    lines.push(chalk.green.bold('Workflow completed successfully.'));
  } else {
    lines.push(chalk.red.bold('Workflow failed.'));
  }

  lines.push(formatInfo(`Run ID:    ${result.runId}`));
  lines.push(formatInfo(`State:     ${result.finalState}`));
  lines.push(formatInfo(`Files:     ${Object.keys(result.files).length}`));
  if (result.verification) {
    lines.push(formatInfo(`Verified:  ${result.verification.passed ? 'yes' : 'no'} (${result.verification.iterations} iteration(s))`));
  }
  lines.push(formatInfo(`Duration:  ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.failure) {
    lines.push(formatError(`Error: [${result.failure.kind}] ${result.failure.stage}: ${result.failure.message}`));
    if (opts?.verbose) {
      lines.push(formatInfo(`Details: ${result.failure.diagnostic}`));
    }
  }

  if (result.artifacts) {
    lines.push(chalk.green.bold(`  Output: ${result.artifacts.outputDir}`));
  }

  return lines.join('\n');
}
