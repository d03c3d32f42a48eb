import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { TASK_STATUSES, VALIDATION_STATUSES } from './states';
import type { TaskState } from './task-state';
import type { WorkflowLogger } from './logger';
import { errorMessage, silentLogger } from './logger';

const TaskStateSchema = z.object({
  taskId: z.string().regex(/^[\w.-]+$/),
  originalTask: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  status: z.enum(TASK_STATUSES),
  validationStatus: z.enum(VALIDATION_STATUSES),
  subtasks: z.array(z.string()),
  currentSubtaskIndex: z.number().int().min(0),
  planExhausted: z.boolean(),
  currentCode: z.string(),
  codeHistory: z.array(
    z.object({
      timestamp: z.string(),
      subtask: z.string(),
      previousCode: z.string(),
      newCode: z.string(),
      modelUsed: z.string(),
    }),
  ),
  errors: z.array(
    z.object({
      type: z.string(),
      description: z.string(),
      codeContext: z.string(),
      timestamp: z.string(),
      userFeedback: z.string().optional(),
    }),
  ),
  modelsUsed: z.array(z.string()),
  metrics: z.object({
    executionsAttempted: z.number().int().min(0),
    executionsSucceeded: z.number().int().min(0),
    retrievalSearches: z.number().int().min(0),
  }),
  savedFile: z.string().optional(),
});

/**
 * One pretty-printed JSON file per task under `rootDir`.
 * A missing or unreadable record loads as null.
 */
export class TaskStateStore {
  constructor(
    private rootDir: string,
    private logger: WorkflowLogger = silentLogger,
  ) {}

  private statePath(taskId: string): string {
    if (!/^[\w.-]+$/.test(taskId) || taskId.startsWith('.')) {
      throw new Error(`Invalid task id: ${taskId}`);
    }
    return path.join(this.rootDir, `${taskId}.json`);
  }

  async save(state: TaskState): Promise<void> {
    const file = this.statePath(state.taskId);
    await fs.mkdir(this.rootDir, { recursive: true });
    await fs.writeFile(file, JSON.stringify(state, null, 2), 'utf-8');
  }

  async load(taskId: string): Promise<TaskState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.statePath(taskId), 'utf-8');
    } catch {
      return null;
    }

    try {
      const parsed = TaskStateSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.error(`Stored state for ${taskId} is invalid`, { issue: parsed.error.issues[0]?.message });
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.error(`Stored state for ${taskId} is not valid JSON`, { error: errorMessage(error) });
      return null;
    }
  }

  /** Task ids with a stored record, sorted */
  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && e.name.endsWith('.json'))
        .map((e) => e.name.slice(0, -'.json'.length))
        .sort();
    } catch {
      return [];
    }
  }
}
