import fs from 'fs/promises';
import path from 'path';
import { Command } from 'commander';
import { compileWorkflow } from '../../orchestrator/graph';
import type { CompiledWorkflow } from '../../orchestrator/graph';
import { formatInfo, formatStep, formatSuccess } from '../formatters';
import { validateRunOptions } from '../validators/run';

export type CompileCommandOptions = {
  out?: string;
};

export function registerCompileCommand(program: Command): void {
  program
    .command('compile')
    .description('Print the workflow graph for a task without running any stage')
    .argument('<task>', 'What would be built')
    .option('-o, --out <dir>', 'Write workflow-graph.mmd and workflow-graph.json here')
    .action(async (task: string, options: CompileCommandOptions) => {
      await executeCompileCommand(task, options);
    });
}

/** Needs no configuration or credentials: compiling never reaches a collaborator */
export async function executeCompileCommand(task: string, options: CompileCommandOptions): Promise<CompiledWorkflow> {
  const input = validateRunOptions(task, { out: options.out });
  const compiled = compileWorkflow(input.task);

  console.log(formatStep(`Workflow graph for: ${compiled.task}`));
  console.log(formatInfo(`${compiled.graph.nodes.length} nodes, ${compiled.graph.edges.length} edges`));
  console.log(compiled.mermaid);

  if (input.outputDir) {
    const dir = path.resolve(input.outputDir);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, 'workflow-graph.mmd'), compiled.mermaid, 'utf-8');
    await fs.writeFile(path.join(dir, 'workflow-graph.json'), JSON.stringify({ task: compiled.task, graph: compiled.graph }, null, 2), 'utf-8');
    console.log(formatSuccess(`Graph written to ${dir}`));
  }

  return compiled;
}
