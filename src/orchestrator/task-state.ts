import crypto from 'crypto';
import type { TaskStatus, ValidationStatus } from './states';

export interface CodeRevision {
  timestamp: string;
  subtask: string;
  previousCode: string;
  newCode: string;
  modelUsed: string;
}

export interface ErrorRecord {
  type: string;
  description: string;
  codeContext: string;
  timestamp: string;
  userFeedback?: string;
}

export interface ExecutionMetrics {
  executionsAttempted: number;
  executionsSucceeded: number;
  retrievalSearches: number;
}

/**
 * Immutable snapshot of one synthesis session. Every helper below returns a
 * new snapshot; nothing mutates in place.
 */
export interface TaskState<S extends TaskStatus = TaskStatus> {
  readonly taskId: string;
  readonly originalTask: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly status: S;
  readonly validationStatus: ValidationStatus;
  readonly subtasks: readonly string[];
  readonly currentSubtaskIndex: number;
  readonly planExhausted: boolean;
  readonly currentCode: string;
  readonly codeHistory: readonly CodeRevision[];
  readonly errors: readonly ErrorRecord[];
  readonly modelsUsed: readonly string[];
  readonly metrics: ExecutionMetrics;
  readonly savedFile?: string;
}

export interface StatusSummary {
  taskId: string;
  stage: TaskStatus;
  validationStatus: ValidationStatus;
  progressPercent: number;
  currentSubtask: string;
  subtaskIndex: number;
  totalSubtasks: number;
  errorCount: number;
  codeLength: number;
  updatedAt: string;
}

export interface NewError {
  type: string;
  description: string;
  codeContext?: string;
  userFeedback?: string;
}

export interface SubtaskOutcome {
  newCode: string;
  modelUsed: string;
  errors?: NewError[];
  executionAttempted?: boolean;
  executionSucceeded?: boolean;
}

const CODE_CONTEXT_CHARS = 500;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** `task_YYYYMMDD_HHMMSS_<8 hex>` in local time */
export function generateTaskId(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const suffix = crypto.randomUUID().replace(/-/g, '').slice(0, 8);
  return `task_${date}_${time}_${suffix}`;
}

export const TASK_ID_PATTERN = /^task_\d{8}_\d{6}_[0-9a-f]{8}$/;

/** updatedAt never moves backwards, even if the wall clock does */
export function touch(previous: string, now: Date): string {
  const next = now.toISOString();
  return next > previous ? next : previous;
}

export function createTaskState(originalTask: string, options: { taskId?: string; now?: Date } = {}): TaskState<'PENDING'> {
  const task = originalTask.trim();
  if (!task) {
    throw new TypeError('Task description must not be empty');
  }
  const now = options.now ?? new Date();
  const stamp = now.toISOString();
  return {
    taskId: options.taskId ?? generateTaskId(now),
    originalTask: task,
    createdAt: stamp,
    updatedAt: stamp,
    status: 'PENDING',
    validationStatus: 'NOT_STARTED',
    subtasks: [],
    currentSubtaskIndex: 0,
    planExhausted: false,
    currentCode: '',
    codeHistory: [],
    errors: [],
    modelsUsed: [],
    metrics: { executionsAttempted: 0, executionsSucceeded: 0, retrievalSearches: 0 },
  };
}

/** Writes the plan once; a second call is a programming error */
export function setPlan<S extends TaskStatus>(state: TaskState<S>, subtasks: readonly string[], now: Date = new Date()): TaskState<S> {
  if (state.subtasks.length > 0) {
    throw new Error(`Plan for ${state.taskId} is already set`);
  }
  const plan = subtasks.map((s) => s.trim()).filter((s) => s.length > 0);
  return { ...state, subtasks: plan, currentSubtaskIndex: 0, planExhausted: plan.length === 0, updatedAt: touch(state.updatedAt, now) };
}

/** Revision source for fixes applied without a model call; not listed in modelsUsed */
export const MECHANICAL_FIX = 'mechanical';

export function appendRevision<S extends TaskStatus>(state: TaskState<S>, revision: { subtask: string; newCode: string; modelUsed: string }, now: Date = new Date()): TaskState<S> {
  const entry: CodeRevision = {
    timestamp: now.toISOString(),
    subtask: revision.subtask,
    previousCode: state.currentCode,
    newCode: revision.newCode,
    modelUsed: revision.modelUsed,
  };
  const known = revision.modelUsed === MECHANICAL_FIX || state.modelsUsed.includes(revision.modelUsed);
  const modelsUsed = known ? state.modelsUsed : [...state.modelsUsed, revision.modelUsed];
  return { ...state, currentCode: revision.newCode, codeHistory: [...state.codeHistory, entry], modelsUsed, updatedAt: touch(state.updatedAt, now) };
}

export function recordError<S extends TaskStatus>(state: TaskState<S>, error: NewError, now: Date = new Date()): TaskState<S> {
  const entry: ErrorRecord = {
    type: error.type,
    description: error.description,
    codeContext: (error.codeContext ?? '').slice(-CODE_CONTEXT_CHARS),
    timestamp: now.toISOString(),
    ...(error.userFeedback !== undefined ? { userFeedback: error.userFeedback } : {}),
  };
  return { ...state, errors: [...state.errors, entry], updatedAt: touch(state.updatedAt, now) };
}

export function recordExecution<S extends TaskStatus>(state: TaskState<S>, succeeded: boolean): TaskState<S> {
  return {
    ...state,
    metrics: {
      ...state.metrics,
      executionsAttempted: state.metrics.executionsAttempted + 1,
      executionsSucceeded: state.metrics.executionsSucceeded + (succeeded ? 1 : 0),
    },
  };
}

export function setRetrievalSearches<S extends TaskStatus>(state: TaskState<S>, count: number): TaskState<S> {
  return { ...state, metrics: { ...state.metrics, retrievalSearches: count } };
}

/** Advances past the current subtask; the index stays on the last entry once the plan is exhausted */
export function advanceSubtask<S extends TaskStatus>(state: TaskState<S>, now: Date = new Date()): TaskState<S> {
  if (state.planExhausted) return state;
  const last = state.subtasks.length - 1;
  if (state.currentSubtaskIndex >= last) {
    return { ...state, planExhausted: true, updatedAt: touch(state.updatedAt, now) };
  }
  return { ...state, currentSubtaskIndex: state.currentSubtaskIndex + 1, updatedAt: touch(state.updatedAt, now) };
}

/**
 * Applies one coder/fixer cycle for the current subtask: revision, errors,
 * execution counters and index advance, in that order.
 */
export function completeSubtask<S extends TaskStatus>(state: TaskState<S>, outcome: SubtaskOutcome, now: Date = new Date()): TaskState<S> {
  const subtask = currentSubtask(state);
  let next = appendRevision(state, { subtask, newCode: outcome.newCode, modelUsed: outcome.modelUsed }, now);
  for (const error of outcome.errors ?? []) {
    next = recordError(next, { ...error, codeContext: error.codeContext ?? outcome.newCode }, now);
  }
  if (outcome.executionAttempted) {
    next = recordExecution(next, outcome.executionSucceeded ?? false);
  }
  return advanceSubtask(next, now);
}

export function setValidation<S extends TaskStatus>(state: TaskState<S>, validationStatus: ValidationStatus, now: Date = new Date()): TaskState<S> {
  return { ...state, validationStatus, updatedAt: touch(state.updatedAt, now) };
}

export function setSavedFile<S extends TaskStatus>(state: TaskState<S>, savedFile: string): TaskState<S> {
  return { ...state, savedFile };
}

// ── Derived values ──────────────────────────────────────────────────────

export function currentSubtask(state: TaskState): string {
  if (state.planExhausted) return '';
  return state.subtasks[state.currentSubtaskIndex] ?? '';
}

/** Share of the plan before the current index; stays below 100 once the last subtask is done */
export function progressPercentage(state: TaskState): number {
  const total = state.subtasks.length;
  if (total === 0) return 0;
  return Math.min(100, Math.max(0, (state.currentSubtaskIndex / total) * 100));
}

export function toStatusSummary(state: TaskState): StatusSummary {
  return {
    taskId: state.taskId,
    stage: state.status,
    validationStatus: state.validationStatus,
    progressPercent: progressPercentage(state),
    currentSubtask: currentSubtask(state),
    subtaskIndex: state.currentSubtaskIndex,
    totalSubtasks: state.subtasks.length,
    errorCount: state.errors.length,
    codeLength: state.currentCode.length,
    updatedAt: state.updatedAt,
  };
}

/** Narrows a snapshot whose status is only known at run time */
export function isAt<S extends TaskStatus>(state: TaskState, status: S): state is TaskState<S> {
  return state.status === status;
}
