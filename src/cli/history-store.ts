import fs from 'fs/promises';
import path from 'path';
import type { TaskStatus } from '../orchestrator/states';
import type { TaskStateStore } from '../orchestrator/state-store';
import type { TaskState } from '../orchestrator/task-state';
import { progressPercentage } from '../orchestrator/task-state';

export type HistoryFilter = {
  status?: TaskStatus;
  from?: Date;
  to?: Date;
  limit?: number;
};

export type HistoryEntrySummary = {
  taskId: string;
  status: TaskStatus;
  validationStatus: TaskState['validationStatus'];
  task: string;
  updatedAt: string;
  progressPercent: number;
  revisions: number;
  errors: number;
  savedFile?: string;
};

/** Read-side view over stored sessions for the list/show commands */
export class HistoryStore {
  constructor(private store: TaskStateStore) {}

  private toSummary(state: TaskState): HistoryEntrySummary {
    return {
      taskId: state.taskId,
      status: state.status,
      validationStatus: state.validationStatus,
      task: state.originalTask,
      updatedAt: state.updatedAt,
      progressPercent: progressPercentage(state),
      revisions: state.codeHistory.length,
      errors: state.errors.length,
      savedFile: state.savedFile,
    };
  }

  private matchesFilter(summary: HistoryEntrySummary, filter: HistoryFilter): boolean {
    if (filter.status && summary.status !== filter.status) return false;

    const updatedAtMs = Date.parse(summary.updatedAt);
    if (Number.isFinite(updatedAtMs)) {
      if (filter.from && updatedAtMs < filter.from.getTime()) return false;
      if (filter.to && updatedAtMs > filter.to.getTime()) return false;
    }

    return true;
  }

  async list(filter: HistoryFilter = {}): Promise<HistoryEntrySummary[]> {
    const taskIds = await this.store.list();
    const states = await Promise.all(taskIds.map((id) => this.store.load(id)));

    const summaries = states
      .filter((s): s is TaskState => s !== null)
      .map((s) => this.toSummary(s))
      .filter((s) => this.matchesFilter(s, filter))
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt) || b.taskId.localeCompare(a.taskId));

    if (filter.limit && filter.limit > 0) {
      return summaries.slice(0, filter.limit);
    }

    return summaries;
  }

  async latest(): Promise<HistoryEntrySummary | null> {
    const list = await this.list({ limit: 1 });
    return list[0] ?? null;
  }

  async detail(taskId: string): Promise<TaskState | null> {
    return this.store.load(taskId);
  }

  async exportToFile(entries: HistoryEntrySummary[], filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(entries, null, 2), 'utf8');
  }
}
