import type { WorkflowLogger } from './logger';
import { errorMessage, silentLogger } from './logger';
import type { TaskStateStore } from './state-store';
import { StatusSummary, TaskState, generateTaskId, toStatusSummary } from './task-state';
import type { PipelineResult, SynthesisPipeline } from './workflow';

export class SessionBusyError extends Error {
  constructor(public activeTaskId: string) {
    super(`Session ${activeTaskId} is still running`);
    this.name = 'SessionBusyError';
  }
}

interface ActiveSession {
  taskId: string;
  done: Promise<PipelineResult>;
}

/**
 * Control surface for presentation layers. At most one session runs at a
 * time; a second start while one is active is rejected.
 */
export class SessionController {
  private active: ActiveSession | null = null;

  constructor(
    private pipeline: SynthesisPipeline,
    private store: TaskStateStore,
    private logger: WorkflowLogger = silentLogger,
  ) {}

  /** Persists a new session, starts it in the background and returns its id */
  async start(taskDescription: string): Promise<string> {
    this.assertIdle();
    const taskId = generateTaskId();
    const created = this.pipeline.create(taskDescription, { taskId });
    this.track(
      taskId,
      created.then((state) => this.pipeline.execute(state)),
    );
    await created;
    return taskId;
  }

  /** Continues a stored session in the background */
  async resume(taskId: string): Promise<string> {
    this.assertIdle();
    // the slot is claimed before the load so overlapping calls see it taken
    const loaded = this.store.load(taskId);
    this.track(
      taskId,
      loaded.then((state) => {
        if (!state) throw new Error(`No stored session for ${taskId}`);
        return this.pipeline.execute(state);
      }),
    );
    if (!(await loaded)) {
      throw new Error(`No stored session for ${taskId}`);
    }
    return taskId;
  }

  /** Resolves when the session finishes; a stored session resolves immediately */
  async wait(taskId: string): Promise<TaskState | null> {
    if (this.active?.taskId === taskId) {
      const result = await this.active.done;
      return result.state;
    }
    return this.store.load(taskId);
  }

  async status(taskId: string): Promise<StatusSummary | null> {
    const state = await this.store.load(taskId);
    return state ? toStatusSummary(state) : null;
  }

  async list(): Promise<string[]> {
    return this.store.list();
  }

  async load(taskId: string): Promise<TaskState | null> {
    return this.store.load(taskId);
  }

  activeTaskId(): string | null {
    return this.active?.taskId ?? null;
  }

  private assertIdle(): void {
    if (this.active) {
      throw new SessionBusyError(this.active.taskId);
    }
  }

  private track(taskId: string, run: Promise<PipelineResult>): void {
    const done = run.finally(() => {
      if (this.active?.taskId === taskId) this.active = null;
    });
    this.active = { taskId, done };
    void done.catch((error: unknown) => {
      this.logger.error('Background session failed', { taskId, error: errorMessage(error) });
    });
  }
}
