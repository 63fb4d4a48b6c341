import { Command } from 'commander';
import { registerRunCommand } from './run';
import { registerChatCommand } from './chat';
import { registerCompileCommand } from './compile';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerChatCommand(program);
  registerCompileCommand(program);
}
