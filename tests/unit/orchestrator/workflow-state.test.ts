import { describe, it, expect } from '@jest/globals';
import { createVerificationReport, WorkflowState } from '../../../src/orchestrator/workflow-state';
import { WorkflowError } from '../../../src/orchestrator/errors';
import { DESIGN, REQUIREMENTS, STRUCTURE } from '../../helpers/fakes';

function withManifest(maxIterations = 2): WorkflowState {
  const state = new WorkflowState('build a calculator', { maxIterations });
  state.setManifest(STRUCTURE.files);
  return state;
}

describe('WorkflowState', () => {
  it('rejects a non-positive iteration budget', () => {
    expect(() => new WorkflowState('task', { maxIterations: 0 })).toThrow(WorkflowError);
  });

  it('bumps the version on every named operation', () => {
    const state = new WorkflowState('task', { maxIterations: 1 });
    expect(state.version).toBe(0);

    state.setRequirements(REQUIREMENTS);
    state.setDesign(DESIGN);
    state.setStage('Design');

    expect(state.version).toBe(3);
  });

  it('sets requirements and design once', () => {
    const state = new WorkflowState('task', { maxIterations: 1 });
    state.setRequirements(REQUIREMENTS);
    state.setDesign(DESIGN);

    expect(() => state.setRequirements(REQUIREMENTS)).toThrow('Requirements are already set for this run');
    expect(() => state.setDesign(DESIGN)).toThrow('Design is already set; use reviseDesign to replace it');

    state.reviseDesign({ ...DESIGN, architecture: 'layered' });
    expect(state.design?.architecture).toBe('layered');
  });

  it('stores copies of what it is given', () => {
    const requirements = { requirements: ['a'], dependencies: [] };
    const state = new WorkflowState('task', { maxIterations: 1 });
    state.setRequirements(requirements);

    requirements.requirements.push('b');

    expect(state.requirements?.requirements).toEqual(['a']);
  });

  describe('mergeFiles', () => {
    it('replaces named files and leaves the rest untouched', () => {
      const state = withManifest();
      state.mergeFiles({ 'calculator.py': 'v1', 'test_calculator.py': 't1' });

      state.mergeFiles([{ path: 'calculator.py', content: 'v2' }]);

      expect(state.generatedFiles).toEqual({ 'calculator.py': 'v2', 'test_calculator.py': 't1' });
    });

    it('rejects the whole set when any path is outside the manifest', () => {
      const state = withManifest();
      state.mergeFiles({ 'calculator.py': 'v1' });
      const before = state.version;

      expect(() => state.mergeFiles({ 'calculator.py': 'v2', 'extra.py': 'x' })).toThrow('Cannot merge files outside the manifest: extra.py');
      expect(state.generatedFiles).toEqual({ 'calculator.py': 'v1' });
      expect(state.version).toBe(before);
    });

    it('yields the same files when the same set is merged twice', () => {
      const state = withManifest();
      state.mergeFiles({ 'calculator.py': 'v1' });
      state.mergeFiles({ 'calculator.py': 'v1' });

      expect(state.generatedFiles).toEqual({ 'calculator.py': 'v1' });
    });

    it('does not change a reference taken before the merge', () => {
      const state = withManifest();
      state.mergeFiles({ 'calculator.py': 'v1' });
      const earlier = state.generatedFiles;

      state.mergeFiles({ 'calculator.py': 'v2' });

      expect(earlier['calculator.py']).toBe('v1');
    });
  });

  it('refuses a manifest that would orphan generated files', () => {
    const state = withManifest();
    state.mergeFiles({ 'calculator.py': 'v1' });

    expect(() => state.setManifest([{ path: 'main.py', purpose: 'entry', type: 'source' }])).toThrow('Manifest would orphan generated files: calculator.py');
  });

  it('caps the verification history at maxIterations', () => {
    const state = withManifest(1);
    const report = createVerificationReport({ iteration: 1, status: 'pass', missingElements: [], failingFiles: [] });

    state.appendReport(report);

    expect(() => state.appendReport(report)).toThrow('Verification history is full (1 report(s))');
  });

  it('freezes verification reports', () => {
    const report = createVerificationReport({ iteration: 1, status: 'incomplete', missingElements: [{ description: 'x' }], failingFiles: ['a.py'], timestamp: '2026-01-01T00:00:00.000Z' });

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.failingFiles)).toBe(true);
    expect(Object.isFrozen(report.missingElements[0])).toBe(true);
    expect(report.timestamp).toBe('2026-01-01T00:00:00.000Z');
    expect('executionLog' in report).toBe(false);
  });

  it('tracks loop iterations', () => {
    const state = withManifest();
    state.incrementIteration();
    state.incrementIteration();
    expect(state.iterationCount).toBe(2);

    state.resetIterations();
    expect(state.iterationCount).toBe(0);
  });

  it('round-trips through a snapshot', () => {
    const state = withManifest();
    state.setRequirements(REQUIREMENTS);
    state.mergeFiles({ 'calculator.py': 'v1' });
    state.appendReport(createVerificationReport({ iteration: 1, status: 'pass', missingElements: [], failingFiles: [] }));
    state.setStage('Documentation');

    const restored = WorkflowState.fromSnapshot(state.snapshot());

    expect(restored.snapshot()).toEqual(state.snapshot());
    expect(restored.version).toBe(state.version);
  });

  it('keeps prior files apart from generated files', () => {
    const state = new WorkflowState('task', { maxIterations: 1, priorFiles: { 'old.py': 'x' } });

    expect(state.priorFiles).toEqual({ 'old.py': 'x' });
    expect(state.generatedFiles).toEqual({});
  });
});
