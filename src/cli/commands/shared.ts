import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import { ConfigError } from '../../config/validator';
import { errorMessage } from '../../orchestrator/logger';
import { TaskStateStore } from '../../orchestrator/state-store';
import { formatError } from '../formatters';

export function isVerbose(program: Command): boolean {
  return program.opts().verbose === true;
}

/** Prints a failure the way every command reports one and marks the exit code */
export function reportFailure(error: unknown): void {
  console.error(formatError(errorMessage(error)));
  if (error instanceof ConfigError) {
    error.issues.forEach((issue) => console.error(formatError(`  - ${issue}`)));
  }
  process.exitCode = 1;
}

export function openStateStore(config: Config = loadConfig()): TaskStateStore {
  return new TaskStateStore(config.storage.states_dir);
}
