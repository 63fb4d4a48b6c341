import type { State } from './states';
import type { WorkflowState } from './workflow-state';

export interface Guard {
  /** Precondition named in the rejection when `check` fails */
  requires: string;
  check: (state: Readonly<WorkflowState>) => boolean;
}

// Preconditions for entering each state
export const transitionGuards: Partial<Record<State, Guard>> = {
  RequirementsAnalysis: {
    requires: 'a non-empty task',
    check: (s) => s.taskQuery.trim().length > 0,
  },
  Design: {
    requires: 'requirements',
    check: (s) => !!s.requirements && s.requirements.requirements.length > 0,
  },
  StructureProposal: {
    requires: 'a design',
    check: (s) => !!s.design,
  },
  CodeGeneration: {
    requires: 'a file manifest',
    check: (s) => s.fileManifest.length > 0,
  },
  CompletenessVerification: {
    requires: 'generated files for every manifest entry',
    check: (s) => s.fileManifest.length > 0 && s.fileManifest.every((entry) => s.generatedFiles[entry.path] !== undefined),
  },
  Documentation: {
    requires: 'at least one verification report',
    check: (s) => s.verificationHistory.length > 0,
  },
};
