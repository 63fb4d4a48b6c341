import type { FailureReport, State } from './states';
import { isTerminalState } from './states';
import { WORKFLOW_GRAPH } from './transitions';
import type { Trigger, WorkflowGraph } from './transitions';
import { StateMachineEvents } from './events';
import type { StateStore } from './state-store';
import { transitionGuards } from './guards';
import type { Guard } from './guards';
import type { WorkflowState } from './workflow-state';
import { GuardRejectedError, WorkflowError } from './errors';

export interface StateMachineOptions {
  runId: string;
  /** Persists every transition when set */
  store?: StateStore;
  graph?: WorkflowGraph;
  guards?: Partial<Record<State, Guard>>;
}

/**
 * Walks a WorkflowGraph for one run. The machine owns the current state;
 * the WorkflowState it guards is mirrored through `setStage`.
 */
export class StateMachine {
  private state: State;
  private history: State[] = [];
  private runId: string;
  private store?: StateStore;
  private graph: WorkflowGraph;
  private guards: Partial<Record<State, Guard>>;

  public events = new StateMachineEvents();

  constructor(
    private workflowState: WorkflowState,
    options: StateMachineOptions,
  ) {
    this.runId = options.runId;
    this.store = options.store;
    this.graph = options.graph ?? WORKFLOW_GRAPH;
    this.guards = options.guards ?? transitionGuards;
    this.state = this.graph.entry;
  }

  getState(): State {
    return this.state;
  }

  getHistory(): State[] {
    return [...this.history];
  }

  getRunId(): string {
    return this.runId;
  }

  isTerminal(): boolean {
    return isTerminalState(this.state);
  }

  /**
   * Persists the move first; the machine only advances once the record is
   * written, so a failed save leaves it in `fromState`.
   */
  async transition(trigger: Trigger, payload?: { error?: FailureReport }): Promise<void> {
    const fromState = this.state;

    if (isTerminalState(fromState)) {
      throw new WorkflowError(`Invalid transition: state [${fromState}] is terminal`);
    }

    const nextState = this.graph.transitions[fromState][trigger];
    if (!nextState) {
      throw new WorkflowError(`Invalid transition: Trigger [${trigger}] is not valid from state [${fromState}]`);
    }

    const guard = this.guards[nextState];
    if (guard && !guard.check(this.workflowState)) {
      throw new GuardRejectedError(nextState, `missing ${guard.requires}`);
    }

    const updatedAt = new Date().toISOString();
    this.workflowState.setStage(nextState);
    try {
      await this.persist(nextState, fromState, updatedAt, payload?.error);
    } catch (error) {
      this.workflowState.setStage(fromState);
      throw error;
    }
    this.commit(fromState, nextState, trigger, updatedAt);
  }

  /**
   * Moves to `Failed` from any non-terminal state. The move happens even
   * when the record cannot be written; the write error is returned instead.
   */
  async fail(failure: FailureReport): Promise<Error | undefined> {
    const fromState = this.state;
    if (isTerminalState(fromState)) {
      throw new WorkflowError(`Invalid transition: state [${fromState}] is terminal`);
    }

    const nextState = this.graph.transitions[fromState].FAIL ?? 'Failed';
    const updatedAt = new Date().toISOString();
    this.workflowState.setStage(nextState);

    let persistError: Error | undefined;
    try {
      await this.persist(nextState, fromState, updatedAt, failure);
    } catch (error) {
      persistError = error instanceof Error ? error : new Error(String(error));
    }
    this.commit(fromState, nextState, 'FAIL', updatedAt);
    return persistError;
  }

  private async persist(nextState: State, fromState: State, updatedAt: string, error?: FailureReport): Promise<void> {
    if (!this.store) return;
    await this.store.save({
      runId: this.runId,
      currentState: nextState,
      updatedAt,
      history: [...this.history, fromState],
      state: this.workflowState.snapshot(),
      error,
    });
  }

  private commit(fromState: State, nextState: State, trigger: Trigger, updatedAt: string): void {
    this.history.push(fromState);
    this.state = nextState;

    this.events.emitTransition({
      from: fromState,
      to: nextState,
      trigger,
      runId: this.runId,
      version: this.workflowState.version,
      timestamp: updatedAt,
    });
  }
}
