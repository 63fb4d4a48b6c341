import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { executeCompileCommand } from '../../../src/cli/commands/compile';
import { createProgram } from '../../../src/cli/index';

describe('executeCompileCommand', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('prints the graph without any credentials', async () => {
    const compiled = await executeCompileCommand('build a calculator', {});

    expect(compiled.graph.nodes).toHaveLength(7);
    expect(logSpy).toHaveBeenCalledWith(compiled.mermaid);
  });

  it('writes the mermaid and JSON descriptions when asked', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'autobuild-graph-'));
    try {
      const compiled = await executeCompileCommand('build a calculator', { out: dir });

      expect(await fs.readFile(path.join(dir, 'workflow-graph.mmd'), 'utf-8')).toBe(compiled.mermaid);
      const json: unknown = JSON.parse(await fs.readFile(path.join(dir, 'workflow-graph.json'), 'utf-8'));
      expect(json).toMatchObject({ task: 'build a calculator', graph: { entry: 'Start', terminals: ['Done', 'Failed'] } });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects an empty task', async () => {
    await expect(executeCompileCommand(' ', {})).rejects.toThrow('Task description must not be empty');
  });
});

describe('createProgram', () => {
  it('registers the three modes', () => {
    const names = createProgram().commands.map((c) => c.name());

    expect(names).toEqual(expect.arrayContaining(['run', 'chat', 'compile']));
  });
});
