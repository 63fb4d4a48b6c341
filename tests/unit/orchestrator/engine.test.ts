import { describe, it, expect } from '@jest/globals';
import { AutobuildEngine } from '../../../src/orchestrator/engine';
import { ConfigValidationError } from '../../../src/config/validator';
import { defaults } from '../../../src/config/defaults';
import { FakeSandboxClient, ScriptedLlm } from '../../helpers/fakes';

describe('AutobuildEngine', () => {
  it('refuses to build collaborators without credentials', () => {
    expect(() => AutobuildEngine.fromConfig(defaults)).toThrow(ConfigValidationError);
  });

  it('builds from a configuration with both keys', () => {
    const config = { ...defaults, llm: { ...defaults.llm, api_key: 'test-secret' }, sandbox: { ...defaults.sandbox, api_key: 'test-secret' } };

    expect(AutobuildEngine.fromConfig(config)).toBeInstanceOf(AutobuildEngine);
  });

  it('compiles the graph without calling any collaborator', () => {
    const llm = new ScriptedLlm();
    const sandbox = new FakeSandboxClient();
    const engine = new AutobuildEngine({ llm, sandbox }, { maxIterations: 3 });

    const compiled = engine.compile('build a calculator');

    expect(compiled.graph.nodes).toHaveLength(7);
    expect(llm.calls).toHaveLength(0);
    expect(sandbox.requests).toHaveLength(0);
  });
});
