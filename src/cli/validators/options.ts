import { TASK_STATUSES, TaskStatus } from '../../orchestrator/states';
import { RETRIEVAL_CATEGORIES, RetrievalCategory, isRetrievalCategory } from '../../retrieval/types';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function parseDate(input: string | undefined): Date | undefined {
  if (!input) return undefined;
  const d = new Date(input);
  if (!Number.isFinite(d.getTime())) {
    throw new ValidationError(`Invalid date: "${input}". Expected an ISO date string`);
  }
  return d;
}

/** Positive integer, or undefined when absent */
export function parsePositiveInt(input: string | undefined, flag: string): number | undefined {
  if (input === undefined) return undefined;
  const n = Number(input);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`${flag} must be a positive integer`);
  }
  return n;
}

export function parseStatus(input: string | undefined): TaskStatus | undefined {
  if (!input) return undefined;
  const upper = input.toUpperCase();
  const status = TASK_STATUSES.find((s) => s === upper);
  if (!status) {
    throw new ValidationError(`Invalid status: "${input}". Expected one of ${TASK_STATUSES.join(', ')}`);
  }
  return status;
}

export function parseCategory(input: string | undefined): RetrievalCategory | undefined {
  if (!input) return undefined;
  if (!isRetrievalCategory(input)) {
    throw new ValidationError(`Invalid category: "${input}". Expected one of ${RETRIEVAL_CATEGORIES.join(', ')}`);
  }
  return input;
}

export function parseTags(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}
