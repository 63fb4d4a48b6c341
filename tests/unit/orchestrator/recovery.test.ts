import { describe, it, expect } from '@jest/globals';
import { FailureClassifier } from '../../../src/orchestrator/recovery';
import {
  CollaboratorUnavailableError,
  GuardRejectedError,
  OutputValidationError,
  StageValidationExhaustedError,
  WorkflowCancelledError,
  WorkflowError,
} from '../../../src/orchestrator/errors';

describe('FailureClassifier', () => {
  const classifier = new FailureClassifier();

  it('reports exhausted validation with the issues and the last raw output', () => {
    const validation = new OutputValidationError('design', [{ path: 'architecture', kind: 'missing', message: 'required string is absent' }]);
    const report = classifier.classify(new StageValidationExhaustedError('design', validation, '{"components":[]}', 3), 'Design');

    expect(report).toEqual({
      kind: 'StageValidationExhausted',
      stage: 'Design',
      message: 'Stage "design" output still invalid after 3 attempt(s)',
      diagnostic: '- architecture: missing field: required string is absent\n\nLast raw output:\n{"components":[]}',
    });
  });

  it('truncates a long raw output and marks an empty one', () => {
    const validation = new OutputValidationError('design', [{ path: '(root)', kind: 'malformed_json', message: 'x' }]);

    const long = classifier.classify(new StageValidationExhaustedError('design', validation, 'a'.repeat(2500), 3), 'Design');
    const empty = classifier.classify(new StageValidationExhaustedError('design', validation, '', 3), 'Design');

    expect(long.diagnostic.endsWith(`${'a'.repeat(2000)}...[truncated]`)).toBe(true);
    expect(empty.diagnostic.endsWith('Last raw output:\n(empty)')).toBe(true);
  });

  it('reports an unavailable collaborator with its status', () => {
    const report = classifier.classify(new CollaboratorUnavailableError('llm', 'Gemini API error 503', 503), 'CodeGeneration');

    expect(report.kind).toBe('CollaboratorUnavailable');
    expect(report.diagnostic).toBe('llm collaborator unavailable (status 503): Gemini API error 503');
  });

  it('reports cancellation', () => {
    const report = classifier.classify(new WorkflowCancelledError(), 'CompletenessVerification');

    expect(report).toEqual({
      kind: 'Cancelled',
      stage: 'CompletenessVerification',
      message: 'Workflow cancelled',
      diagnostic: 'Cancelled during CompletenessVerification; the last fully merged state was kept',
    });
  });

  it('reports a guard rejection', () => {
    const report = classifier.classify(new GuardRejectedError('Documentation', 'missing at least one verification report'), 'CompletenessVerification');

    expect(report.kind).toBe('GuardRejected');
    expect(report.diagnostic).toBe('Cannot enter Documentation: missing at least one verification report');
  });

  it('reports other workflow errors as invalid state', () => {
    expect(classifier.classify(new WorkflowError('Missing design'), 'StructureProposal').kind).toBe('InvalidState');
  });

  it('reports anything else as unexpected', () => {
    const report = classifier.classify('plain string', 'Design');

    expect(report).toEqual({ kind: 'Unexpected', stage: 'Design', message: 'plain string', diagnostic: 'plain string' });
  });
});
