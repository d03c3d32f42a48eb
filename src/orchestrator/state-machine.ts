import { ActiveStatus, NextStatus, TaskStatus, canTransition, isTerminal } from './states';
import { TaskState, touch } from './task-state';

export class InvalidTransitionError extends Error {
  constructor(
    public from: TaskStatus,
    public to: TaskStatus,
  ) {
    super(`Invalid transition: [${from}] -> [${to}]`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Moves a session to its next status.
 *
 * The type parameters reject illegal edges when the current status is known
 * statically; the runtime check covers snapshots whose status is only known
 * as a union (for example, ones loaded from disk).
 */
export function transition<S extends TaskStatus, T extends NextStatus<S>>(state: TaskState<S>, to: T, now: Date = new Date()): TaskState<T> {
  if (!canTransition(state.status, to)) {
    throw new InvalidTransitionError(state.status, to);
  }
  return { ...state, status: to, updatedAt: touch(state.updatedAt, now) };
}

export function markFailed<S extends ActiveStatus>(state: TaskState<S>, now: Date = new Date()): TaskState<'FAILED'> {
  return transition<ActiveStatus, 'FAILED'>(state, 'FAILED', now);
}

/** FAILED for any active snapshot; terminal snapshots come back unchanged */
export function failIfActive(state: TaskState, now: Date = new Date()): TaskState {
  if (isTerminal(state.status)) return state;
  return { ...state, status: 'FAILED', updatedAt: touch(state.updatedAt, now) };
}
