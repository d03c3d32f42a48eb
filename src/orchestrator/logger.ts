import type { LogLevel } from '../config/validator';

// ── Logger ──────────────────────────────────────────────────────────────

/** Logger interface shared by the pipeline and every agent */
export interface WorkflowLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Default console-based logger with task-id prefix */
export class ConsoleWorkflowLogger implements WorkflowLogger {
  private prefix: string;
  private threshold: number;

  constructor(taskId?: string, level: LogLevel = 'info') {
    this.prefix = taskId ? `[codesmith:${taskId.slice(-8)}]` : '[codesmith]';
    this.threshold = LEVEL_RANK[level];
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('info')) console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('warn')) console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('error')) console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('debug')) console.debug(this.format('DEBUG', message, data));
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }

  private format(level: string, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${level.padEnd(5)} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

/** Logger that drops everything */
export const silentLogger: WorkflowLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
