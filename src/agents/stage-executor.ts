import type { LlmCollaborator } from './llm-collaborator';
import type { StageId, StageInputs, StageOutputs } from './schemas';
import { STAGE_CONTRACTS, validateStageOutput } from './output-contract';
import type { StageContract } from './output-contract';
import { buildRepairPrompt } from './prompts/repair';
import { CollaboratorUnavailableError, OutputValidationError, StageValidationExhaustedError, throwIfAborted, WorkflowCancelledError, WorkflowError } from '../orchestrator/errors';
import { TimeoutError, withTimeout } from '../utils/timeout';
import type { WorkflowLogger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

export interface StageResult<T> {
  stage: StageId;
  rawText: string;
  parsed: T;
  /** Requests issued for the stage, first request included */
  validationAttempts: number;
}

export interface StageExecutorOptions {
  maxRepairAttempts?: number;
  timeoutMs?: number;
  logger?: WorkflowLogger;
}

export interface StageRunOptions {
  signal?: AbortSignal;
}

/**
 * Runs one stage against the LLM and returns schema-valid output, or throws.
 * Holds no per-run state, so one instance can serve concurrent runs.
 */
export class StageExecutor {
  readonly maxRepairAttempts: number;
  private timeoutMs: number;
  private logger: WorkflowLogger;

  constructor(
    private llm: LlmCollaborator,
    options: StageExecutorOptions = {},
  ) {
    this.maxRepairAttempts = options.maxRepairAttempts ?? 2;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.logger = options.logger ?? silentLogger;

    if (!Number.isInteger(this.maxRepairAttempts) || this.maxRepairAttempts < 0) {
      throw new Error(`maxRepairAttempts must be a non-negative integer, got ${this.maxRepairAttempts}`);
    }
  }

  async run<S extends StageId>(stage: S, input: StageInputs[S], options: StageRunOptions = {}): Promise<StageResult<StageOutputs[S]>> {
    const contract: StageContract<S> = STAGE_CONTRACTS[stage];
    const originalPrompt = contract.buildPrompt(input);
    const maxAttempts = this.maxRepairAttempts + 1;

    let prompt = originalPrompt;
    let lastRaw = '';
    let lastError: OutputValidationError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfAborted(options.signal);

      lastRaw = await this.request(stage, prompt, contract.schemaHint, options.signal);
      const outcome = validateStageOutput(stage, lastRaw, input);

      if (outcome.kind === 'valid') {
        this.logger.debug('Stage output accepted', { stage, attempt });
        return { stage, rawText: lastRaw, parsed: outcome.value, validationAttempts: attempt };
      }

      lastError = outcome.error;
      this.logger.debug('Stage output rejected', { stage, attempt, issues: outcome.error.issues.length });

      prompt = buildRepairPrompt({
        originalPrompt,
        rawOutput: lastRaw,
        errors: outcome.error.describe(),
        schemaHint: contract.schemaHint,
        attempt,
      });
    }

    if (!lastError) {
      throw new WorkflowError(`Stage "${stage}" made no attempts`);
    }

    this.logger.warn('Stage output invalid after all repair attempts', { stage, attempts: maxAttempts });
    throw new StageValidationExhaustedError(stage, lastError, lastRaw, maxAttempts);
  }

  private async request(stage: StageId, prompt: string, schemaHint: string, signal?: AbortSignal): Promise<string> {
    try {
      return await withTimeout(this.llm.complete(prompt, schemaHint, { signal }), this.timeoutMs, `LLM did not answer stage "${stage}" within ${this.timeoutMs}ms`);
    } catch (err) {
      if (signal?.aborted || err instanceof WorkflowCancelledError) {
        throw new WorkflowCancelledError();
      }
      if (err instanceof CollaboratorUnavailableError) {
        throw err;
      }
      if (err instanceof TimeoutError) {
        throw new CollaboratorUnavailableError('llm', err.message, undefined, err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new CollaboratorUnavailableError('llm', `LLM request for stage "${stage}" failed: ${reason}`, undefined, err);
    }
  }
}
