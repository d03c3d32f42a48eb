import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { toStatusSummary } from '../../orchestrator/task-state';
import type { TaskState } from '../../orchestrator/task-state';
import { HistoryStore } from '../history-store';
import { formatError, formatInfo, formatPlan, formatStatusSummary, formatSuccess } from '../formatters';
import type { StatusCommandOptions } from '../types';
import { openStateStore, reportFailure } from './shared';

async function resolveState(history: HistoryStore, taskId?: string): Promise<TaskState | null> {
  if (taskId) {
    return history.detail(taskId);
  }

  const latest = await history.latest();
  return latest ? history.detail(latest.taskId) : null;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status [taskId]')
    .description('Show the stage and progress of a session (latest when no id is given)')
    .option('--json', 'Output status as JSON', false)
    .action(async (taskId: string | undefined, options: StatusCommandOptions) => {
      try {
        const history = new HistoryStore(openStateStore(loadConfig()));
        const state = await resolveState(history, taskId);

        if (!state) {
          console.log(formatInfo(taskId ? `No session found for ${taskId}` : 'No sessions found.'));
          process.exitCode = taskId ? 1 : 0;
          return;
        }

        const summary = toStatusSummary(state);
        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        console.log(formatSuccess('Session status'));
        console.log(formatStatusSummary(summary));
        console.log(formatInfo(`task:       ${state.originalTask}`));
        if (state.subtasks.length) {
          console.log(formatPlan(state.subtasks));
        }
        const lastError = state.errors[state.errors.length - 1];
        if (lastError) {
          console.log(formatError(`last error: ${lastError.type} - ${lastError.description}`));
        }
      } catch (err) {
        reportFailure(err);
      }
    });
}
