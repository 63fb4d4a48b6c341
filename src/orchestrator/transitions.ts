import { TERMINAL_STATES } from './states';
import type { StageState, State, TerminalState } from './states';

export type Trigger = 'START' | 'REQUIREMENTS_OK' | 'DESIGN_OK' | 'STRUCTURE_OK' | 'CODE_OK' | 'VERIFY_RETRY' | 'VERIFY_OK' | 'DOCS_OK' | 'FAIL';

export type TransitionTable = Record<State, Partial<Record<Trigger, State>>>;

/**
 * Forward-only pipeline plus the verification self-loop. `FAIL` leads to
 * `Failed` from every non-terminal state.
 */
export const transitions: TransitionTable = {
  Start: { START: 'RequirementsAnalysis', FAIL: 'Failed' },
  RequirementsAnalysis: { REQUIREMENTS_OK: 'Design', FAIL: 'Failed' },
  Design: { DESIGN_OK: 'StructureProposal', FAIL: 'Failed' },
  StructureProposal: { STRUCTURE_OK: 'CodeGeneration', FAIL: 'Failed' },
  CodeGeneration: { CODE_OK: 'CompletenessVerification', FAIL: 'Failed' },
  CompletenessVerification: { VERIFY_RETRY: 'CompletenessVerification', VERIFY_OK: 'Documentation', FAIL: 'Failed' },
  Documentation: { DOCS_OK: 'Done', FAIL: 'Failed' },
  Done: {},
  Failed: {},
};

/** Trigger fired when a stage's handler completes */
export const SUCCESS_TRIGGERS: Record<StageState, Trigger> = {
  RequirementsAnalysis: 'REQUIREMENTS_OK',
  Design: 'DESIGN_OK',
  StructureProposal: 'STRUCTURE_OK',
  CodeGeneration: 'CODE_OK',
  CompletenessVerification: 'VERIFY_OK',
  Documentation: 'DOCS_OK',
};

export interface WorkflowGraph {
  states: State[];
  transitions: TransitionTable;
  entry: State;
  terminals: TerminalState[];
}

/** The declared state machine, independent of anything that walks it */
export const WORKFLOW_GRAPH: WorkflowGraph = {
  states: ['Start', 'RequirementsAnalysis', 'Design', 'StructureProposal', 'CodeGeneration', 'CompletenessVerification', 'Documentation', 'Done', 'Failed'],
  transitions,
  entry: 'Start',
  terminals: TERMINAL_STATES,
};
