export const TASK_STATUSES = ['PENDING', 'PLANNING', 'CODING', 'TESTING', 'FIXING', 'COMPLETED', 'FAILED'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const VALIDATION_STATUSES = ['NOT_STARTED', 'PENDING', 'PASSED', 'FAILED'] as const;
export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];

export type TerminalStatus = 'COMPLETED' | 'FAILED';
export type ActiveStatus = Exclude<TaskStatus, TerminalStatus>;

/** Forward edges of the session lifecycle. FAILED is reachable from every active status. */
export const STATUS_TRANSITIONS = {
  PENDING: ['PLANNING'],
  PLANNING: ['CODING'],
  CODING: ['TESTING'],
  TESTING: ['FIXING', 'COMPLETED'],
  FIXING: ['COMPLETED'],
  COMPLETED: [],
  FAILED: [],
} as const satisfies Record<TaskStatus, readonly TaskStatus[]>;

export type NextStatus<S extends TaskStatus> = (typeof STATUS_TRANSITIONS)[S][number] | (S extends TerminalStatus ? never : 'FAILED');

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return status === 'COMPLETED' || status === 'FAILED';
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  if (isTerminal(from)) return false;
  if (to === 'FAILED') return true;
  const allowed: readonly TaskStatus[] = STATUS_TRANSITIONS[from];
  return allowed.includes(to);
}
