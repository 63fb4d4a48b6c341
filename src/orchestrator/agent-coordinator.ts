import type { StageState } from './states';
import type { WorkflowState } from './workflow-state';

export interface StageContext {
  signal?: AbortSignal;
  /** Records one pass around the verification self-loop */
  loopBack(): Promise<void>;
}

/**
 * A handler executed when the workflow enters a stage. It changes the
 * run's WorkflowState only through the state's named operations.
 */
export type StageHandler = (state: WorkflowState, context: StageContext) => Promise<void>;

/**
 * AgentCoordinator maps each stage to the handler that carries it out.
 * Handlers are registered externally, with real collaborators in production
 * or scripted ones in tests, so the coordinator depends on none of them.
 */
export class AgentCoordinator {
  private handlers = new Map<StageState, StageHandler>();

  registerHandler(stage: StageState, handler: StageHandler): void {
    this.handlers.set(stage, handler);
  }

  hasHandler(stage: StageState): boolean {
    return this.handlers.has(stage);
  }

  /** @throws Error if no handler is registered for the stage */
  async execute(stage: StageState, state: WorkflowState, context: StageContext): Promise<void> {
    const handler = this.handlers.get(stage);
    if (!handler) {
      throw new Error(`No handler registered for state: ${stage}`);
    }
    await handler(state, context);
  }

  getRegisteredStages(): StageState[] {
    return [...this.handlers.keys()];
  }
}
