import type { StageId } from '../agents/schemas';

export type OutputIssueKind = 'malformed_json' | 'missing' | 'wrong_type' | 'constraint';

export interface OutputIssue {
  path: string;
  kind: OutputIssueKind;
  message: string;
}

const ISSUE_LABELS: Record<OutputIssueKind, string> = {
  malformed_json: 'malformed JSON',
  missing: 'missing field',
  wrong_type: 'wrong type',
  constraint: 'constraint violation',
};

/** A stage output that does not conform to its schema. Recovered by repair attempts. */
export class OutputValidationError extends Error {
  constructor(
    public readonly stage: StageId,
    public readonly issues: OutputIssue[],
  ) {
    super(`Invalid ${stage} output: ${issues.length} issue(s)`);
    this.name = 'OutputValidationError';
  }

  /** One line per issue, in a form a repair prompt can quote verbatim */
  describe(): string {
    return this.issues.map((issue) => `- ${issue.path}: ${ISSUE_LABELS[issue.kind]}: ${issue.message}`).join('\n');
  }
}

export class WorkflowError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkflowError';
  }
}

export class StageValidationExhaustedError extends WorkflowError {
  constructor(
    public readonly stage: StageId,
    public readonly validationError: OutputValidationError,
    public readonly lastRawOutput: string,
    public readonly attempts: number,
  ) {
    super(`Stage "${stage}" output still invalid after ${attempts} attempt(s)`);
    this.name = 'StageValidationExhaustedError';
  }
}

export type Collaborator = 'llm' | 'sandbox';

export class CollaboratorUnavailableError extends WorkflowError {
  constructor(
    public readonly collaborator: Collaborator,
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'CollaboratorUnavailableError';
  }
}

export class WorkflowCancelledError extends WorkflowError {
  constructor(message = 'Workflow cancelled') {
    super(message);
    this.name = 'WorkflowCancelledError';
  }
}

export class GuardRejectedError extends WorkflowError {
  constructor(
    public readonly target: string,
    public readonly reason: string,
  ) {
    super(`Transition to [${target}] rejected by guard logic: ${reason}`);
    this.name = 'GuardRejectedError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new WorkflowCancelledError();
  }
}
