import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import { AutobuildEngine } from '../../orchestrator/engine';
import type { WorkflowRunResult } from '../../orchestrator/engine';
import type { StateChangeEvent } from '../../orchestrator/events';
import type { WorkflowLogger } from '../../utils/logger';
import { CLIWorkflowLogger } from '../logger';
import { formatError, formatInfo, formatStateTransition, formatStep, formatVerificationHistory, formatWarning, formatWorkflowResult } from '../formatters';
import { validateRunOptions } from '../validators/run';
import type { RunCommandOptions } from '../validators/run';

export type EngineFactory = (config: Config, options: { logger: WorkflowLogger; onTransition: (event: StateChangeEvent) => void }) => AutobuildEngine;

export const defaultEngineFactory: EngineFactory = (config, options) => AutobuildEngine.fromConfig(config, options);

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Build a project from a task description, unattended')
    .argument('<task>', 'What to build')
    .option('-o, --out <dir>', 'Directory for the generated project')
    .option('--max-iterations <n>', 'Verification iteration budget')
    .option('--verbose', 'Show detailed output')
    .action(async (task: string, options: RunCommandOptions) => {
      const result = await executeRunCommand(task, { ...options, verbose: options.verbose || program.opts().verbose === true });
      if (result.status === 'failed') process.exitCode = 1;
    });
}

/**
 * Executes `autobuild run`. The first Ctrl+C cancels the run (the sandbox
 * is torn down and the run ends Failed); a second one exits hard.
 */
export async function executeRunCommand(task: string, options: RunCommandOptions, createEngine: EngineFactory = defaultEngineFactory): Promise<WorkflowRunResult> {
  const input = validateRunOptions(task, options);
  const controller = new AbortController();

  const onSigint = (): void => {
    if (controller.signal.aborted) {
      console.log(formatError('\nForce exit.'));
      process.exit(130);
    }
    console.log(formatWarning('\nCtrl+C received. Cancelling...'));
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    const config = loadConfig({
      workflow: input.maxIterations !== undefined ? { max_iterations: input.maxIterations } : {},
      output: input.outputDir ? { dir: input.outputDir } : {},
    });

    console.log('');
    console.log(formatStep(`Building: ${input.task}`));
    console.log(formatInfo(`output:         ${config.output.dir}`));
    console.log(formatInfo(`max iterations: ${config.workflow.max_iterations}`));
    console.log('');

    const engine = createEngine(config, {
      logger: new CLIWorkflowLogger(input.verbose),
      onTransition: (event) => console.log(formatStateTransition(event.from, event.to)),
    });

    const result = await engine.runWorkflow(input.task, { outputDir: config.output.dir, signal: controller.signal });

    if (input.verbose) {
      console.log(formatVerificationHistory(result.verificationHistory));
    }
    console.log(formatWorkflowResult(result, { verbose: input.verbose }));
    return result;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
