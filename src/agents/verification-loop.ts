import type { StageExecutor } from './stage-executor';
import { attributeFailures } from './failure-attribution';
import type { MissingElement, RegenerationTarget } from './schemas';
import type { ExecutionOutcome, SandboxExecutionClient } from '../testing/types';
import { wasExecuted } from '../testing/execution-client';
import { isNoTestsCollected } from '../testing/project-detector';
import { createVerificationReport } from '../orchestrator/workflow-state';
import type { VerificationReport, VerificationStatus, WorkflowState } from '../orchestrator/workflow-state';
import { throwIfAborted, WorkflowError } from '../orchestrator/errors';
import type { WorkflowLogger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

export interface VerificationLoopOptions {
  maxIterations: number;
  executionTimeoutMs?: number;
  /** Overrides the detected run command */
  commandHint?: string;
  logger?: WorkflowLogger;
}

export interface VerificationRunOptions {
  signal?: AbortSignal;
  /** Called after each merged regeneration, before the next check */
  onRegenerate?: (iteration: number, targets: RegenerationTarget[]) => Promise<void> | void;
}

export interface VerificationOutcome {
  outcome: 'passed' | 'iteration_budget_exhausted';
  /** Checks performed */
  iterations: number;
  /** Regenerations merged */
  regenerations: number;
  history: VerificationReport[];
}

export function formatExecutionLog(outcome: ExecutionOutcome): string {
  const status = outcome.timedOut ? `${outcome.exitStatus} (timed out)` : String(outcome.exitStatus);
  return [`$ ${outcome.command}`, `exit status: ${status}`, '--- stdout ---', outcome.stdout.trimEnd(), '--- stderr ---', outcome.stderr.trimEnd()].join('\n');
}

/**
 * Bounded check-and-regenerate cycle over the generated files. Each
 * iteration runs the project, asks for a completeness check, records one
 * report and, unless it passed, merges a targeted regeneration.
 */
export class CompletenessVerificationLoop {
  private maxIterations: number;
  private executionTimeoutMs: number;
  private logger: WorkflowLogger;

  constructor(
    private executor: StageExecutor,
    private sandbox: SandboxExecutionClient,
    private options: VerificationLoopOptions,
  ) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
      throw new Error(`maxIterations must be a positive integer, got ${options.maxIterations}`);
    }
    this.maxIterations = options.maxIterations;
    this.executionTimeoutMs = options.executionTimeoutMs ?? 120_000;
    this.logger = options.logger ?? silentLogger;
  }

  async run(state: WorkflowState, options: VerificationRunOptions = {}): Promise<VerificationOutcome> {
    const { requirements, design } = state;
    if (!requirements || !design) {
      throw new WorkflowError('Verification needs requirements and a design');
    }
    if (this.maxIterations > state.maxIterations - state.verificationHistory.length) {
      throw new WorkflowError(`Verification budget (${this.maxIterations}) exceeds the room left in the run's history`);
    }

    const history: VerificationReport[] = [];
    state.resetIterations();

    for (let i = 1; i <= this.maxIterations; i++) {
      throwIfAborted(options.signal);

      const files = { ...state.generatedFiles };
      const execution = await this.sandbox.execute({ files, commandHint: this.options.commandHint, timeoutMs: this.executionTimeoutMs, signal: options.signal });
      const executed = wasExecuted(execution);
      const executionLog = executed ? formatExecutionLog(execution) : undefined;
      // Attribution reads the program's output only; the command line names files that need not have failed
      const programOutput = executed ? [execution.stdout, execution.stderr].join('\n') : undefined;
      const noTests = executed && isNoTestsCollected(execution);
      const executionFailed = executed && !noTests && (execution.timedOut || execution.exitStatus !== 0);

      const check = await this.executor.run('completeness_check', { requirements, manifest: [...state.fileManifest], files, executionLog }, { signal: options.signal });

      const missingElements: MissingElement[] = [...check.parsed.missingElements];
      if (noTests) {
        missingElements.push({ description: 'pytest collected no tests; add test cases that exercise the requirements' });
      }

      const status: VerificationStatus = executionFailed ? 'execution_error' : missingElements.length > 0 || !check.parsed.complete ? 'incomplete' : 'pass';

      let targets: RegenerationTarget[] = [];
      if (status !== 'pass') {
        const previous = history[history.length - 1];
        const attribution = attributeFailures(state.manifestPaths, {
          executionFailed,
          executionLog: programOutput,
          missingElements,
          previousExecutionFailures: previous?.status === 'execution_error' ? previous.failingFiles : [],
        });
        targets = attribution.targets.length > 0 ? attribution.targets : state.manifestPaths.map((path): RegenerationTarget => ({ path, reason: 'missing_elements', details: ['the completeness check reported the project incomplete'] }));
      }

      const report = createVerificationReport({
        iteration: i,
        status,
        missingElements,
        failingFiles: targets.map((t) => t.path),
        executionLog,
      });
      state.appendReport(report);
      history.push(report);

      this.logger.info(`Verification iteration ${i}/${this.maxIterations}: ${status}`, { failingFiles: report.failingFiles.length, missing: missingElements.length });

      if (status === 'pass') {
        return { outcome: 'passed', iterations: i, regenerations: i - 1, history };
      }

      const withContent = targets.map((t) => ({ ...t, currentContent: state.generatedFiles[t.path] }));
      const regeneration = await this.executor.run('regenerate', { requirements, design, manifest: [...state.fileManifest], targets: withContent, executionLog }, { signal: options.signal });

      state.mergeFiles(regeneration.parsed.files);
      state.incrementIteration();
      this.logger.debug('Merged regenerated files', { iteration: i, files: regeneration.parsed.files.map((f) => f.path) });

      await options.onRegenerate?.(i, withContent);
    }

    this.logger.warn(`Verification budget of ${this.maxIterations} iteration(s) exhausted; keeping the last regeneration unverified`);
    return { outcome: 'iteration_budget_exhausted', iterations: this.maxIterations, regenerations: this.maxIterations, history };
  }
}
