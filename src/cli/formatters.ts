import chalk from 'chalk';
import type { TaskStatus } from '../orchestrator/states';
import type { StatusSummary, TaskState } from '../orchestrator/task-state';
import type { SubtaskCompletedEvent } from '../orchestrator/events';
import type { CodeIssue } from '../agents/types';
import type { RetrievalHit } from '../retrieval/types';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Stage progress ──────────────────────────────────────────────────────

const STAGE_LABELS: Record<TaskStatus, string> = {
  PENDING: 'Waiting to start',
  PLANNING: 'Planning subtasks...',
  CODING: 'Generating and validating code...',
  TESTING: 'Running final validation...',
  FIXING: 'Applying final fix...',
  COMPLETED: 'Done',
  FAILED: 'Failed',
};

export function formatStageChange(from: TaskStatus, to: TaskStatus): string {
  return chalk.cyan(`  [${from} -> ${to}] ${STAGE_LABELS[to]}`);
}

export function formatSubtaskResult(event: SubtaskCompletedEvent): string {
  const mark = event.executionSuccess ? chalk.green('ok') : chalk.red('failed');
  const fix = event.fixApplied ? chalk.yellow(' (fixed)') : '';
  return `  ${chalk.bold(`${event.index + 1}/${event.total}`)} ${event.subtask} ${mark}${fix}${event.issues ? chalk.gray(` ${event.issues} issue(s)`) : ''}`;
}

// ── Sections ────────────────────────────────────────────────────────────

export function formatVerboseSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

export function formatPlan(subtasks: readonly string[]): string {
  const lines = subtasks.map((s, i) => `  ${i + 1}. ${s}`);
  return formatVerboseSection('Plan', lines.join('\n') || '  (empty)');
}

export function formatIssues(issues: readonly CodeIssue[]): string {
  if (!issues.length) return formatInfo('No issues found.');
  return issues.map((issue) => (issue.severity === 'critical' ? formatError : formatWarning)(`[${issue.severity}] ${issue.type}: ${issue.description}`)).join('\n');
}

export function formatDiffBlock(patch: string): string {
  return patch
    .split('\n')
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      return line;
    })
    .join('\n');
}

export function formatHits(hits: readonly RetrievalHit[]): string {
  if (!hits.length) return formatInfo('No matches.');
  return hits
    .map((hit, i) => {
      const head = chalk.bold(`${i + 1}. ${hit.metadata.category}/${hit.metadata.id}`) + chalk.gray(` ${hit.metadata.type} similarity=${hit.similarity.toFixed(3)}`);
      const preview = hit.text.length > 160 ? `${hit.text.slice(0, 160)}...` : hit.text;
      return `${head}\n${formatInfo(preview.replace(/\n/g, ' '))}`;
    })
    .join('\n');
}

// ── Session ─────────────────────────────────────────────────────────────

export function formatStatusSummary(summary: StatusSummary): string {
  return [
    formatInfo(`taskId:     ${summary.taskId}`),
    formatInfo(`stage:      ${summary.stage}`),
    formatInfo(`validation: ${summary.validationStatus}`),
    formatInfo(`progress:   ${summary.progressPercent.toFixed(0)}% (${Math.min(summary.subtaskIndex + 1, summary.totalSubtasks)}/${summary.totalSubtasks})`),
    formatInfo(`subtask:    ${summary.currentSubtask || '-'}`),
    formatInfo(`errors:     ${summary.errorCount}`),
    formatInfo(`code:       ${summary.codeLength} chars`),
    formatInfo(`updatedAt:  ${summary.updatedAt}`),
  ].join('\n');
}

export function formatSessionResult(state: TaskState, durationMs?: number): string {
  const lines: string[] = [''];

  if (state.status === 'COMPLETED') {
    lines.push(chalk.green.bold('Session completed successfully.'));
  } else if (state.status === 'FAILED') {
    lines.push(chalk.red.bold('Session failed.'));
  } else {
    lines.push(chalk.yellow.bold(`Session stopped in ${state.status}.`));
  }

  lines.push(formatInfo(`Task ID:    ${state.taskId}`));
  lines.push(formatInfo(`Validation: ${state.validationStatus}`));
  lines.push(formatInfo(`Revisions:  ${state.codeHistory.length}`));
  lines.push(formatInfo(`Errors:     ${state.errors.length}`));
  lines.push(formatInfo(`Runs:       ${state.metrics.executionsSucceeded}/${state.metrics.executionsAttempted} succeeded`));
  if (durationMs !== undefined) {
    lines.push(formatInfo(`Duration:   ${(durationMs / 1000).toFixed(1)}s`));
  }
  if (state.savedFile) {
    lines.push(chalk.green.bold(`  Saved: ${state.savedFile}`));
  }

  return lines.join('\n');
}
