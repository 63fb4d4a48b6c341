#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';
import { formatError } from './formatters';

export function createProgram(): Command {
  const program = new Command();
  program.name('autobuild').description('Turn a task description into a verified code project').version('0.1.0').option('--verbose', 'Show detailed output');
  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(formatError(err instanceof Error ? err.message : String(err)));
      process.exitCode = 1;
    });
}
