import { Command } from 'commander';
import { registerRunCommand } from './run';
import { registerResumeCommand } from './resume';
import { registerInteractiveCommand } from './interactive';
import { registerStatusCommand } from './status';
import { registerHistoryCommand } from './history';
import { registerConfigCommand } from './config';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerResumeCommand(program);
  registerInteractiveCommand(program);
  registerStatusCommand(program);
  registerHistoryCommand(program);
  registerConfigCommand(program);
}
