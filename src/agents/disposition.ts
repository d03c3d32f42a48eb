import type { CodeIssue, ExecutionOutcome } from './types';

export const DISPOSITIONS = ['auto_fix', 'manual_review', 'skip', 'cancel'] as const;
export type Disposition = (typeof DISPOSITIONS)[number];

/** What the fixer reports back: a chosen disposition, or `success` when none was needed */
export type FixOutcome = Disposition | 'success';

export const DISPOSITION_MENU: ReadonlyArray<{ key: string; disposition: Disposition; label: string }> = [
  { key: '1', disposition: 'auto_fix', label: 'Fix automatically' },
  { key: '2', disposition: 'manual_review', label: 'Show the code for manual review' },
  { key: '3', disposition: 'skip', label: 'Skip fixing' },
  { key: '4', disposition: 'cancel', label: 'Cancel the session' },
];

/** Menu key or disposition name; anything else means auto_fix */
export function parseDisposition(input: string): Disposition {
  const value = input.trim().toLowerCase();
  const entry = DISPOSITION_MENU.find((item) => item.key === value || item.disposition === value);
  return entry ? entry.disposition : 'auto_fix';
}

export interface DispositionRequest {
  taskDescription: string;
  code: string;
  issues: CodeIssue[];
  execution: ExecutionOutcome;
  summary: string;
}

export interface DispositionProvider {
  choose(request: DispositionRequest): Promise<Disposition>;
}

/** Non-interactive provider that always answers the same way */
export class AutoDispositionProvider implements DispositionProvider {
  constructor(private disposition: Disposition = 'auto_fix') {}

  async choose(): Promise<Disposition> {
    return this.disposition;
  }
}

export function summarizeIssues(issues: CodeIssue[], execution: ExecutionOutcome): string {
  const lines = [execution.success ? 'Execution succeeded' : `Execution failed${execution.timedOut ? ' (timeout)' : ''}`];
  for (const issue of issues) {
    lines.push(`- [${issue.severity}] ${issue.type}: ${issue.description}`);
  }
  return lines.join('\n');
}
