import crypto from 'crypto';
import { StateMachine } from './state-machine';
import { StateStore } from './state-store';
import type { FailureReport, StageState, State } from './states';
import { isStageState } from './states';
import { SUCCESS_TRIGGERS } from './transitions';
import type { AgentCoordinator } from './agent-coordinator';
import type { StateChangeEvent } from './events';
import { FailureClassifier } from './recovery';
import { WorkflowState } from './workflow-state';
import type { VerificationReport } from './workflow-state';
import type { ConversationTurn } from '../agents/schemas';
import { throwIfAborted } from './errors';
import type { WorkflowLogger } from '../utils/logger';
import { ConsoleWorkflowLogger } from '../utils/logger';

// ── Options ─────────────────────────────────────────────────────────────

export interface WorkflowOptions {
  /** Pre-configured coordinator with registered stage handlers */
  coordinator: AgentCoordinator;
  /** Bound on verification reports per run */
  maxIterations: number;
  /** Directory for per-run state files; persistence is off when omitted */
  stateDir?: string;
  /** Logger implementation (defaults to ConsoleWorkflowLogger) */
  logger?: WorkflowLogger;
  /** Observer for every state change of every run */
  onTransition?: (event: StateChangeEvent) => void;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
  conversation?: ConversationTurn[];
  priorFiles?: Record<string, string>;
}

// ── Result ──────────────────────────────────────────────────────────────

export type WorkflowStatus = 'done' | 'failed';

export interface VerificationSummary {
  passed: boolean;
  /** Budget ran out; the last regenerated files are unverified */
  exhausted: boolean;
  iterations: number;
}

export interface WorkflowResult {
  status: WorkflowStatus;
  runId: string;
  finalState: State;
  state: WorkflowState;
  files: Record<string, string>;
  verificationHistory: VerificationReport[];
  verification?: VerificationSummary;
  failure?: FailureReport;
  durationMs: number;
}

// ── Orchestrator ────────────────────────────────────────────────────────

/**
 * WorkflowOrchestrator drives one run from `Start` to `Done` or `Failed`.
 *
 * Stages run strictly in sequence; each handler's success fires the
 * stage's trigger, any throw is classified and fires `FAIL`. The only
 * repeated stage work happens inside the verification self-loop.
 */
export class WorkflowOrchestrator {
  private coordinator: AgentCoordinator;
  private classifier = new FailureClassifier();

  constructor(private options: WorkflowOptions) {
    this.coordinator = options.coordinator;
  }

  async run(task: string, runOptions: RunOptions = {}): Promise<WorkflowResult> {
    const startTime = Date.now();
    const runId = runOptions.runId ?? crypto.randomUUID();
    const logger = this.options.logger ?? new ConsoleWorkflowLogger(runId);

    const state = new WorkflowState(task, {
      maxIterations: this.options.maxIterations,
      conversation: runOptions.conversation,
      priorFiles: runOptions.priorFiles,
    });
    const machine = new StateMachine(state, {
      runId,
      store: this.options.stateDir ? new StateStore(this.options.stateDir, runId) : undefined,
    });
    machine.events.onTransition((event) => {
      logger.debug('State transition', { from: event.from, to: event.to, trigger: event.trigger });
    });
    if (this.options.onTransition) {
      machine.events.onTransition(this.options.onTransition);
    }

    logger.info('Starting workflow', { runId, task: task.length > 80 ? `${task.slice(0, 80)}...` : task });

    const outcome: { failure?: FailureReport } = {};
    const fail = async (error: unknown, stage: State): Promise<void> => {
      const failure = this.classifier.classify(error, stage);
      logger.error(`Failed: ${stage}`, { kind: failure.kind, error: failure.message });
      const persistError = await machine.fail(failure);
      if (persistError) {
        logger.warn('Could not persist the failed state', { error: persistError.message });
      }
      outcome.failure = persistError ? { ...failure, diagnostic: `${failure.diagnostic}\n\nRun state could not be persisted: ${persistError.message}` } : failure;
    };

    try {
      throwIfAborted(runOptions.signal);
      await machine.transition('START');
    } catch (error) {
      await fail(error, 'Start');
    }

    let current = machine.getState();
    while (isStageState(current)) {
      try {
        await this.executeStage(current, state, machine, runOptions.signal, logger);
      } catch (error) {
        await fail(error, current);
      }
      current = machine.getState();
    }

    return this.buildResult({ runId, machine, state, failure: outcome.failure, startTime, logger });
  }

  // ── Stage Execution ─────────────────────────────────────────────────

  private async executeStage(stage: StageState, state: WorkflowState, machine: StateMachine, signal: AbortSignal | undefined, logger: WorkflowLogger): Promise<void> {
    throwIfAborted(signal);
    logger.info(`Executing: ${stage}`);
    const stageStart = Date.now();

    await this.coordinator.execute(stage, state, {
      signal,
      loopBack: () => machine.transition('VERIFY_RETRY'),
    });

    logger.info(`Completed: ${stage} (${Date.now() - stageStart}ms)`);
    await machine.transition(SUCCESS_TRIGGERS[stage]);
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private buildResult(params: { runId: string; machine: StateMachine; state: WorkflowState; failure?: FailureReport; startTime: number; logger: WorkflowLogger }): WorkflowResult {
    const { runId, machine, state, failure, startTime, logger } = params;
    const history = [...state.verificationHistory];
    const finalState = machine.getState();

    const result: WorkflowResult = {
      status: finalState === 'Done' ? 'done' : 'failed',
      runId,
      finalState,
      state,
      files: { ...state.generatedFiles },
      verificationHistory: history,
      durationMs: Date.now() - startTime,
    };

    const last = history[history.length - 1];
    if (last) {
      const passed = last.status === 'pass';
      result.verification = { passed, exhausted: !passed && history.length >= state.maxIterations, iterations: history.length };
    }
    if (failure) {
      result.failure = failure;
    }

    logger.info('Workflow result', { status: result.status, finalState, iterations: history.length, durationMs: result.durationMs });
    return result;
  }
}
