export type StageState = 'RequirementsAnalysis' | 'Design' | 'StructureProposal' | 'CodeGeneration' | 'CompletenessVerification' | 'Documentation';

export type TerminalState = 'Done' | 'Failed';

export type State = 'Start' | StageState | TerminalState;

/** Stage states in pipeline order */
export const STAGE_STATES: StageState[] = ['RequirementsAnalysis', 'Design', 'StructureProposal', 'CodeGeneration', 'CompletenessVerification', 'Documentation'];

export const TERMINAL_STATES: TerminalState[] = ['Done', 'Failed'];

export function isStageState(state: State): state is StageState {
  return STAGE_STATES.some((s) => s === state);
}

export function isTerminalState(state: State): state is TerminalState {
  return TERMINAL_STATES.some((s) => s === state);
}

export type FailureKind = 'StageValidationExhausted' | 'CollaboratorUnavailable' | 'Cancelled' | 'GuardRejected' | 'InvalidState' | 'Unexpected';

/** Why a run ended in `Failed`, and where */
export interface FailureReport {
  kind: FailureKind;
  stage: State;
  message: string;
  /** Last structured diagnostic: validation description, raw output, or collaborator detail */
  diagnostic: string;
}
