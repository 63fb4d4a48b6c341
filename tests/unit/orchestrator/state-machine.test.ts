/* eslint-disable @typescript-eslint/unbound-method */
import { StateMachine } from '../../../src/orchestrator/state-machine';
import { StateStore } from '../../../src/orchestrator/state-store';
import { WorkflowState } from '../../../src/orchestrator/workflow-state';
import { GuardRejectedError } from '../../../src/orchestrator/errors';
import type { StateChangeEvent } from '../../../src/orchestrator/events';
import type { Trigger } from '../../../src/orchestrator/transitions';

// Mock dependencies
jest.mock('../../../src/orchestrator/state-store');

describe('StateMachine', () => {
  let machine: StateMachine;
  let workflowState: WorkflowState;
  let mockStore: StateStore;
  const RUN_ID = 'test-run-123';

  beforeEach(() => {
    jest.clearAllMocks();
    mockStore = new StateStore('state', RUN_ID);
    workflowState = new WorkflowState('build a calculator', { maxIterations: 2 });
    machine = new StateMachine(workflowState, { runId: RUN_ID, store: mockStore });
  });

  describe('Core Transitions (Happy Path)', () => {
    it('should start at Start and move along the transition table', async () => {
      expect(machine.getState()).toBe('Start');

      await machine.transition('START');

      expect(machine.getState()).toBe('RequirementsAnalysis');
      expect(machine.getHistory()).toEqual(['Start']);
      expect(workflowState.stage).toBe('RequirementsAnalysis');
    });

    it('should persist every transition', async () => {
      await machine.transition('START');

      expect(mockStore.save).toHaveBeenCalledWith(
        expect.objectContaining({
          runId: RUN_ID,
          currentState: 'RequirementsAnalysis',
          history: ['Start'],
        }),
      );
    });

    it('should walk the whole pipeline including the verification self-loop', async () => {
      const unguarded = new StateMachine(workflowState, { runId: RUN_ID, guards: {} });
      const triggers: Trigger[] = ['START', 'REQUIREMENTS_OK', 'DESIGN_OK', 'STRUCTURE_OK', 'CODE_OK', 'VERIFY_RETRY', 'VERIFY_RETRY', 'VERIFY_OK', 'DOCS_OK'];

      for (const trigger of triggers) {
        await unguarded.transition(trigger);
      }

      expect(unguarded.getState()).toBe('Done');
      expect(unguarded.isTerminal()).toBe(true);
      expect(unguarded.getHistory()).toEqual([
        'Start',
        'RequirementsAnalysis',
        'Design',
        'StructureProposal',
        'CodeGeneration',
        'CompletenessVerification',
        'CompletenessVerification',
        'CompletenessVerification',
        'Documentation',
      ]);
    });
  });

  describe('Invalid Transitions', () => {
    it('should reject a trigger the current state does not accept', async () => {
      await expect(machine.transition('DESIGN_OK')).rejects.toThrow('Invalid transition: Trigger [DESIGN_OK] is not valid from state [Start]');
      expect(machine.getState()).toBe('Start');
      expect(mockStore.save).not.toHaveBeenCalled();
    });

    it('should reject any trigger from a terminal state', async () => {
      await machine.transition('FAIL');

      expect(machine.isTerminal()).toBe(true);
      await expect(machine.transition('START')).rejects.toThrow('Invalid transition: state [Failed] is terminal');
    });
  });

  describe('Guards', () => {
    it('should reject entering a stage whose precondition fails', async () => {
      const empty = new StateMachine(new WorkflowState('   ', { maxIterations: 1 }), { runId: RUN_ID });

      const error = await empty.transition('START').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(GuardRejectedError);
      expect(error).toHaveProperty('message', 'Transition to [RequirementsAnalysis] rejected by guard logic: missing a non-empty task');
      expect(empty.getState()).toBe('Start');
    });

    it('should not guard the move to Failed', async () => {
      await machine.transition('START');
      await machine.transition('FAIL', { error: { kind: 'Unexpected', stage: 'RequirementsAnalysis', message: 'boom', diagnostic: 'boom' } });

      expect(machine.getState()).toBe('Failed');
      expect(mockStore.save).toHaveBeenLastCalledWith(expect.objectContaining({ currentState: 'Failed', error: expect.objectContaining({ message: 'boom' }) }));
    });
  });

  describe('Persistence Failures', () => {
    it('should stay in the current state when the transition cannot be saved', async () => {
      jest.mocked(mockStore.save).mockRejectedValueOnce(new Error('disk full'));

      await expect(machine.transition('START')).rejects.toThrow('disk full');

      expect(machine.getState()).toBe('Start');
      expect(machine.getHistory()).toEqual([]);
      expect(workflowState.stage).toBe('Start');
    });

    it('should reach Failed even when the failure record cannot be saved', async () => {
      await machine.transition('START');
      jest.mocked(mockStore.save).mockRejectedValueOnce(new Error('disk full'));

      const persistError = await machine.fail({ kind: 'Unexpected', stage: 'RequirementsAnalysis', message: 'boom', diagnostic: 'boom' });

      expect(persistError?.message).toBe('disk full');
      expect(machine.getState()).toBe('Failed');
      expect(machine.getHistory()).toEqual(['Start', 'RequirementsAnalysis']);
      expect(workflowState.stage).toBe('Failed');
    });

    it('should return nothing from fail when the record is saved', async () => {
      const persistError = await machine.fail({ kind: 'Cancelled', stage: 'Start', message: 'stop', diagnostic: 'stop' });

      expect(persistError).toBeUndefined();
      expect(mockStore.save).toHaveBeenCalledWith(expect.objectContaining({ currentState: 'Failed', history: ['Start'] }));
    });
  });

  describe('Events', () => {
    it('should emit each transition with the state version', async () => {
      const events: StateChangeEvent[] = [];
      const unsubscribe = machine.events.onTransition((event) => events.push(event));

      await machine.transition('START');
      unsubscribe();
      await machine.transition('FAIL');

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ from: 'Start', to: 'RequirementsAnalysis', trigger: 'START', runId: RUN_ID, version: workflowState.version - 1 });
    });
  });
});
