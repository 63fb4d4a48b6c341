import chalk from 'chalk';
import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import { ArtifactStore } from '../../orchestrator/artifact-store';
import type { InteractiveSession } from '../../orchestrator/interactive';
import { CLIWorkflowLogger } from '../logger';
import { formatError, formatFileChanges, formatInfo, formatStateTransition, formatStep, formatSuccess } from '../formatters';
import { EXIT_WORDS, inquirerChatPrompts } from '../prompts';
import type { ChatPrompts } from '../prompts';
import { defaultEngineFactory } from './run';
import type { EngineFactory } from './run';

export type ChatCommandOptions = {
  out?: string;
  verbose?: boolean;
};

export function registerChatCommand(program: Command): void {
  program
    .command('chat')
    .description('Build a project turn by turn, confirming each change')
    .option('-o, --out <dir>', 'Directory the confirmed project is written to')
    .option('--verbose', 'Show detailed output')
    .action(async (options: ChatCommandOptions) => {
      const config = loadConfig(options.out ? { output: { dir: options.out } } : {});
      const verbose = Boolean(options.verbose) || program.opts().verbose === true;
      await executeChatCommand(config, verbose);
    });
}

export async function executeChatCommand(config: Config, verbose: boolean, createEngine: EngineFactory = defaultEngineFactory, prompts: ChatPrompts = inquirerChatPrompts): Promise<number> {
  const engine = createEngine(config, {
    logger: new CLIWorkflowLogger(verbose),
    onTransition: (event) => {
      if (verbose) console.log(formatStateTransition(event.from, event.to));
    },
  });
  return runChatLoop(engine.startSession(), prompts, { outputDir: config.output.dir });
}

/**
 * Reads messages until an exit word. Each turn's changes are shown as
 * per-file line counts; kept turns are written to `outputDir`.
 */
export async function runChatLoop(session: InteractiveSession, prompts: ChatPrompts, options: { outputDir: string; artifacts?: ArtifactStore }): Promise<number> {
  const artifacts = options.artifacts ?? new ArtifactStore();
  let kept = 0;

  console.log(formatStep('Describe what to build. Type "exit" to quit.'));

  for (;;) {
    const message = await prompts.askMessage();
    if (EXIT_WORDS.includes(message.toLowerCase())) break;

    const turn = await session.handleTurn(message);
    console.log(`${chalk.bold('Agent:')} ${turn.reply}`);

    if (turn.result.status !== 'done') {
      if (turn.result.failure) console.log(formatError(turn.result.failure.diagnostic));
      session.discard();
      continue;
    }

    console.log(formatFileChanges(turn.changes));

    if (await prompts.confirmChanges()) {
      session.confirm();
      const written = await artifacts.write(options.outputDir, turn.result);
      kept += 1;
      console.log(formatSuccess(`Saved to ${written.outputDir}`));
    } else {
      session.discard();
      console.log(formatInfo('Changes discarded.'));
    }
  }

  return kept;
}
