import { Command } from 'commander';
import path from 'path';
import { createTwoFilesPatch } from 'diff';
import { loadConfig } from '../../config/loader';
import type { TaskState } from '../../orchestrator/task-state';
import { toStatusSummary } from '../../orchestrator/task-state';
import { HistoryStore } from '../history-store';
import { formatDiffBlock, formatError, formatInfo, formatPlan, formatStatusSummary, formatSuccess, formatVerboseSection } from '../formatters';
import type { ListCommandOptions, ShowCommandOptions } from '../types';
import { parseDate, parsePositiveInt, parseStatus } from '../validators/options';
import { openStateStore, reportFailure } from './shared';

// ── list ────────────────────────────────────────────────────────────────

async function showList(history: HistoryStore, options: ListCommandOptions): Promise<void> {
  const entries = await history.list({
    status: parseStatus(options.status),
    from: parseDate(options.from),
    to: parseDate(options.to),
    limit: parsePositiveInt(options.limit, '--limit'),
  });

  if (options.export) {
    await history.exportToFile(entries, path.resolve(process.cwd(), options.export));
  }

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (!entries.length) {
    console.log(formatInfo('No sessions found.'));
    return;
  }

  console.log(formatSuccess('Sessions'));
  for (const e of entries) {
    const task = e.task.length > 50 ? `${e.task.slice(0, 47)}...` : e.task;
    console.log(formatInfo(`${e.updatedAt} ${e.taskId} ${e.status} ${e.progressPercent.toFixed(0)}% ${task}`));
  }

  if (options.export) {
    console.log(formatInfo(`exported: ${options.export}`));
  }
}

// ── show ────────────────────────────────────────────────────────────────

function renderHistory(state: TaskState, withDiff: boolean): void {
  if (!state.codeHistory.length) {
    console.log(formatInfo('No revisions recorded.'));
    return;
  }

  state.codeHistory.forEach((revision, i) => {
    console.log(formatInfo(`${i + 1}. ${revision.timestamp} [${revision.modelUsed}] ${revision.subtask}`));
    if (withDiff) {
      const patch = createTwoFilesPatch(`rev${i}`, `rev${i + 1}`, revision.previousCode, revision.newCode);
      console.log(formatDiffBlock(patch));
    }
  });
}

function showDetail(state: TaskState, options: ShowCommandOptions): void {
  if (options.json) {
    console.log(JSON.stringify(state, null, 2));
    return;
  }

  console.log(formatSuccess('Session details'));
  console.log(formatStatusSummary(toStatusSummary(state)));
  console.log(formatInfo(`task:       ${state.originalTask}`));
  console.log(formatInfo(`models:     ${state.modelsUsed.join(', ') || '-'}`));
  if (state.savedFile) console.log(formatInfo(`saved:      ${state.savedFile}`));
  if (state.subtasks.length) console.log(formatPlan(state.subtasks));

  if (options.history || options.diff) {
    renderHistory(state, options.diff === true);
  }

  if (options.errors) {
    if (!state.errors.length) console.log(formatInfo('No errors recorded.'));
    for (const e of state.errors) {
      const feedback = e.userFeedback ? ` (${e.userFeedback})` : '';
      console.log(formatError(`${e.timestamp} ${e.type}${feedback}: ${e.description}`));
    }
  }

  if (options.code) {
    console.log(formatVerboseSection('Current code', state.currentCode || '(empty)'));
  }
}

export function registerHistoryCommands(program: Command): void {
  program
    .command('list')
    .alias('history')
    .description('List stored sessions, newest first')
    .option('--status <status>', 'Filter by stage (e.g. COMPLETED, FAILED)')
    .option('--from <date>', 'Filter by updatedAt >= date (ISO string)')
    .option('--to <date>', 'Filter by updatedAt <= date (ISO string)')
    .option('--limit <n>', 'Limit number of results')
    .option('--export <file>', 'Export results to JSON file')
    .option('--json', 'Output as JSON', false)
    .action(async (options: ListCommandOptions) => {
      try {
        await showList(new HistoryStore(openStateStore(loadConfig())), options);
      } catch (err) {
        reportFailure(err);
      }
    });

  program
    .command('show <taskId>')
    .alias('load')
    .description('Load a stored session and show its details')
    .option('--code', 'Print the current program', false)
    .option('--history', 'List every code revision', false)
    .option('--diff', 'Show a diff for every code revision', false)
    .option('--errors', 'List recorded errors', false)
    .option('--json', 'Output the full record as JSON', false)
    .action(async (taskId: string, options: ShowCommandOptions) => {
      try {
        const state = await new HistoryStore(openStateStore(loadConfig())).detail(taskId);
        if (!state) {
          console.error(formatError(`No session found for ${taskId}`));
          process.exitCode = 1;
          return;
        }
        showDetail(state, options);
      } catch (err) {
        reportFailure(err);
      }
    });
}
