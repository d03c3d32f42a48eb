import { EventEmitter } from 'events';
import type { TaskStatus } from './states';

export interface StageChangeEvent {
  taskId: string;
  from: TaskStatus;
  to: TaskStatus;
  timestamp: string;
}

export interface SubtaskCompletedEvent {
  taskId: string;
  index: number;
  total: number;
  subtask: string;
  executionSuccess: boolean;
  fixApplied: boolean;
  issues: number;
}

export class PipelineEvents extends EventEmitter {
  emitStageChange(event: StageChangeEvent): void {
    this.emit('stageChange', event);
  }

  emitSubtaskCompleted(event: SubtaskCompletedEvent): void {
    this.emit('subtaskCompleted', event);
  }

  onStageChange(listener: (event: StageChangeEvent) => void): this {
    return this.on('stageChange', listener);
  }

  onSubtaskCompleted(listener: (event: SubtaskCompletedEvent) => void): this {
    return this.on('subtaskCompleted', listener);
  }
}
