import type { FailureKind, FailureReport, State } from './states';
import { CollaboratorUnavailableError, GuardRejectedError, StageValidationExhaustedError, WorkflowCancelledError, WorkflowError } from './errors';

const RAW_OUTPUT_LIMIT = 2000;

/**
 * FailureClassifier turns whatever a stage threw into the report a
 * `Failed` run carries. No orchestrator-level retry exists: local recovery
 * belongs to the stage executor (format errors) and the verification loop
 * (execution errors), so everything reaching here is terminal.
 */
export class FailureClassifier {
  classify(error: unknown, stage: State): FailureReport {
    if (error instanceof StageValidationExhaustedError) {
      const raw = error.lastRawOutput.length > RAW_OUTPUT_LIMIT ? `${error.lastRawOutput.slice(0, RAW_OUTPUT_LIMIT)}...[truncated]` : error.lastRawOutput;
      return this.report('StageValidationExhausted', stage, error.message, `${error.validationError.describe()}\n\nLast raw output:\n${raw || '(empty)'}`);
    }

    if (error instanceof CollaboratorUnavailableError) {
      const status = error.status !== undefined ? ` (status ${error.status})` : '';
      return this.report('CollaboratorUnavailable', stage, error.message, `${error.collaborator} collaborator unavailable${status}: ${error.message}`);
    }

    if (error instanceof WorkflowCancelledError) {
      return this.report('Cancelled', stage, error.message, `Cancelled during ${stage}; the last fully merged state was kept`);
    }

    if (error instanceof GuardRejectedError) {
      return this.report('GuardRejected', stage, error.message, `Cannot enter ${error.target}: ${error.reason}`);
    }

    if (error instanceof WorkflowError) {
      return this.report('InvalidState', stage, error.message, error.stack ?? error.message);
    }

    const message = error instanceof Error ? error.message : String(error);
    const diagnostic = error instanceof Error && error.stack ? error.stack : message;
    return this.report('Unexpected', stage, message || 'Unknown error', diagnostic || 'Unknown error');
  }

  private report(kind: FailureKind, stage: State, message: string, diagnostic: string): FailureReport {
    return { kind, stage, message, diagnostic };
  }
}
