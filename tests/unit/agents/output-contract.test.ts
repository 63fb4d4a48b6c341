import { describe, it, expect } from '@jest/globals';
import { extractJsonObject, formatIssuePath, validateStageOutput } from '../../../src/agents/output-contract';
import type { GenerateFileInput, ManifestEntry, RegenerateInput } from '../../../src/agents/schemas';
import { DESIGN, REQUIREMENTS } from '../../helpers/fakes';

const target: ManifestEntry = { path: 'calculator.py', purpose: 'arithmetic', type: 'source' };

const generateInput: GenerateFileInput = {
  task: 'build a calculator',
  requirements: REQUIREMENTS,
  design: DESIGN,
  manifest: [target],
  target,
};

describe('validateStageOutput', () => {
  it('accepts a conforming response and fills defaults', () => {
    const outcome = validateStageOutput('requirements', '{"requirements":["add numbers"]}');

    expect(outcome).toEqual({ kind: 'valid', value: { requirements: ['add numbers'], dependencies: [] } });
  });

  it('accepts JSON wrapped in a markdown fence', () => {
    const outcome = validateStageOutput('requirements', '```json\n{"requirements":["a"],"dependencies":["b"]}\n```');

    expect(outcome.kind).toBe('valid');
  });

  it('reports malformed JSON at the root', () => {
    const outcome = validateStageOutput('design', 'not json at all');

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.stage).toBe('design');
    expect(outcome.error.issues).toHaveLength(1);
    expect(outcome.error.issues[0]?.path).toBe('(root)');
    expect(outcome.error.issues[0]?.kind).toBe('malformed_json');
  });

  it('reports a missing required field by path', () => {
    const outcome = validateStageOutput('requirements', '{}');

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.issues).toEqual([{ path: 'requirements', kind: 'missing', message: 'required array is absent' }]);
    expect(outcome.error.describe()).toBe('- requirements: missing field: required array is absent');
  });

  it('reports a wrong type by path', () => {
    const outcome = validateStageOutput('requirements', '{"requirements":"add numbers"}');

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.issues).toEqual([{ path: 'requirements', kind: 'wrong_type', message: 'expected array, received string' }]);
  });

  it('rejects duplicate manifest paths', () => {
    const raw = JSON.stringify({
      description: 'x',
      files: [
        { path: 'a.py', purpose: 'one', type: 'source' },
        { path: 'a.py', purpose: 'two', type: 'source' },
      ],
    });
    const outcome = validateStageOutput('structure', raw);

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.issues).toEqual([{ path: 'files[1].path', kind: 'constraint', message: 'duplicate path "a.py"' }]);
  });

  it('rejects manifest paths that climb out of the project', () => {
    const raw = JSON.stringify({ description: 'x', files: [{ path: '../evil.py', purpose: 'p', type: 'source' }] });
    const outcome = validateStageOutput('structure', raw);

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.issues).toEqual([{ path: 'files[0].path', kind: 'constraint', message: 'path must not contain ".." segments' }]);
  });

  it('rejects a generated file for a path other than the one requested', () => {
    const outcome = validateStageOutput('generate_file', '{"path":"other.py","content":""}', generateInput);

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.issues).toEqual([{ path: 'path', kind: 'constraint', message: 'expected "calculator.py" but got "other.py"' }]);
  });

  it('skips request-dependent checks when no input is given', () => {
    const outcome = validateStageOutput('generate_file', '{"path":"other.py","content":""}');

    expect(outcome.kind).toBe('valid');
  });

  it('rejects a completeness check that is complete yet lists missing elements', () => {
    const outcome = validateStageOutput('completeness_check', '{"complete":true,"missingElements":[{"description":"no tests"}]}');

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.issues[0]).toEqual({ path: 'complete', kind: 'constraint', message: 'is true but missingElements is not empty' });
  });

  it('applies the completeness invariant whether or not the request is given', () => {
    const raw = '{"complete":true,"missingElements":[{"file":"calculator.py","description":"subtract() is missing"}]}';

    const withoutInput = validateStageOutput('completeness_check', raw);
    const withInput = validateStageOutput('completeness_check', raw, { requirements: REQUIREMENTS, manifest: [target], files: { 'calculator.py': '' } });

    for (const outcome of [withoutInput, withInput]) {
      expect(outcome.kind).toBe('invalid');
      if (outcome.kind !== 'invalid') return;
      expect(outcome.error.issues).toEqual([{ path: 'complete', kind: 'constraint', message: 'is true but missingElements is not empty' }]);
    }
  });

  it('rejects regenerated files outside the requested targets', () => {
    const input: RegenerateInput = {
      requirements: REQUIREMENTS,
      design: DESIGN,
      manifest: [target],
      targets: [{ path: 'calculator.py', reason: 'missing_elements', details: [] }],
    };
    const outcome = validateStageOutput('regenerate', '{"files":[{"path":"calculator.py","content":"a"},{"path":"main.py","content":"b"}]}', input);

    expect(outcome.kind).toBe('invalid');
    if (outcome.kind !== 'invalid') return;
    expect(outcome.error.issues).toEqual([{ path: 'files[1].path', kind: 'constraint', message: '"main.py" is not one of the files to fix (calculator.py)' }]);
  });

  it('returns the same outcome for the same input', () => {
    const first = validateStageOutput('design', '{"architecture":""}');
    const second = validateStageOutput('design', '{"architecture":""}');

    expect(first.kind).toBe('invalid');
    if (first.kind !== 'invalid' || second.kind !== 'invalid') return;
    expect(second.error.issues).toEqual(first.error.issues);
  });
});

describe('extractJsonObject', () => {
  it('keeps the outermost object from surrounding prose', () => {
    expect(extractJsonObject('Sure! Here it is: {"a":{"b":1}} Hope that helps.')).toBe('{"a":{"b":1}}');
  });

  it('returns text without braces unchanged', () => {
    expect(extractJsonObject('  nothing here  ')).toBe('nothing here');
  });
});

describe('formatIssuePath', () => {
  it('joins keys with dots and indexes with brackets', () => {
    expect(formatIssuePath(['files', 0, 'path'])).toBe('files[0].path');
    expect(formatIssuePath([])).toBe('(root)');
  });
});
