import { Command } from 'commander';
import { registerStartCommands } from './start';
import { registerStatusCommand } from './status';
import { registerHistoryCommands } from './history';
import { registerRetrievalCommand } from './retrieval';
import { registerModelsCommand } from './models';
import { registerConfigCommand } from './config';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerStartCommands(program);
  registerStatusCommand(program);
  registerHistoryCommands(program);
  registerRetrievalCommand(program);
  registerModelsCommand(program);
  registerConfigCommand(program);
}
