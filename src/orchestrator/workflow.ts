import fs from 'fs/promises';
import path from 'path';
import type { AnalysisResult } from '../agents/fixer';
import type { DispositionProvider } from '../agents/disposition';
import type { TargetProfile } from '../agents/profiles';
import { pygameProfile } from '../agents/profiles';
import { PipelineEvents } from './events';
import type { WorkflowLogger } from './logger';
import { ConsoleWorkflowLogger, errorMessage } from './logger';
import { failIfActive, markFailed, transition } from './state-machine';
import type { TaskStateStore } from './state-store';
import type { ActiveStatus, TaskStatus } from './states';
import { isTerminal } from './states';
import { MECHANICAL_FIX, TaskState, advanceSubtask, appendRevision, completeSubtask, createTaskState, currentSubtask, isAt, recordError, recordExecution, setPlan, setRetrievalSearches, setSavedFile, setValidation } from './task-state';

// ── Agent seams ─────────────────────────────────────────────────────────

export interface PlanningAgent {
  readonly modelId: string;
  decompose(taskDescription: string): Promise<string[]>;
}

export interface CodingAgent {
  readonly modelId: string;
  generate(currentCode: string, modification: string, temperature?: number, maxTokens?: number): Promise<string>;
}

export interface RepairAgent {
  readonly modelId: string;
  analyzeCode(code: string, taskDescription: string, provider: DispositionProvider): Promise<AnalysisResult>;
}

// ── Options ─────────────────────────────────────────────────────────────

export interface SynthesisPipelineOptions {
  planner: PlanningAgent;
  coder: CodingAgent;
  fixer: RepairAgent;
  store: TaskStateStore;
  /** Answers the fixer's disposition requests */
  dispositions: DispositionProvider;
  /** Directory the final program is exported to; export is skipped when omitted */
  outputDir?: string;
  profile?: TargetProfile;
  /** Logger implementation (defaults to ConsoleWorkflowLogger) */
  logger?: WorkflowLogger;
  /** Running count of retrieval searches, recorded per session */
  searchCounter?: { readonly searchCount: number };
  /** Coder sampling for subtasks */
  coderTemperature?: number;
  coderMaxTokens?: number;
  events?: PipelineEvents;
}

export interface PipelineResult {
  state: TaskState;
  durationMs: number;
}

const FINAL_PASS_LABEL = 'final validation';

// ── Pipeline ────────────────────────────────────────────────────────────

/**
 * SynthesisPipeline drives one task from request to terminal status:
 * plan, then coder + fixer per subtask, then one final validation pass.
 *
 * State is persisted after every stage boundary, so `resume()` can pick up
 * a session from whatever status was last stored. A subtask whose code
 * fails validation does not stop the session.
 */
export class SynthesisPipeline {
  readonly events: PipelineEvents;
  private logger: WorkflowLogger;
  private profile: TargetProfile;
  private latest: TaskState | null = null;
  private searchBase = 0;
  private searchPrior = 0;

  constructor(private options: SynthesisPipelineOptions) {
    this.logger = options.logger ?? new ConsoleWorkflowLogger();
    this.profile = options.profile ?? pygameProfile;
    this.events = options.events ?? new PipelineEvents();
  }

  // ── Public API ──────────────────────────────────────────────────────

  /** Creates and persists a PENDING session without running it */
  async create(taskDescription: string, opts: { taskId?: string } = {}): Promise<TaskState<'PENDING'>> {
    const state = createTaskState(taskDescription, { taskId: opts.taskId });
    await this.options.store.save(state);
    this.logger.info('Session created', { taskId: state.taskId, task: state.originalTask });
    return state;
  }

  async run(taskDescription: string, opts: { taskId?: string } = {}): Promise<PipelineResult> {
    const state = await this.create(taskDescription, opts);
    return this.execute(state);
  }

  /** Continues a stored session from its last persisted status */
  async resume(taskId: string): Promise<PipelineResult> {
    const state = await this.options.store.load(taskId);
    if (!state) {
      throw new Error(`No stored session for ${taskId}`);
    }
    this.logger.info('Resuming session', { taskId, status: state.status });
    return this.execute(state);
  }

  /**
   * Drives `state` until it reaches COMPLETED or FAILED. Unexpected errors
   * mark the session FAILED, persist it, and are rethrown.
   */
  async execute(initial: TaskState): Promise<PipelineResult> {
    const started = Date.now();
    this.latest = initial;
    this.searchBase = this.options.searchCounter?.searchCount ?? 0;
    this.searchPrior = initial.metrics.retrievalSearches;

    try {
      let state = initial;
      while (!isTerminal(state.status)) {
        state = await this.step(state);
      }
      this.logger.info('Session finished', { taskId: state.taskId, status: state.status, validation: state.validationStatus, durationMs: Date.now() - started });
      return { state, durationMs: Date.now() - started };
    } catch (error) {
      const last = this.latest ?? initial;
      this.logger.error('Session failed', { taskId: last.taskId, error: errorMessage(error) });
      const failed = recordError(failIfActive(last), { type: 'session_error', description: errorMessage(error), codeContext: last.currentCode });
      await this.persist(failed, last.status);
      throw error;
    }
  }

  // ── Stages ──────────────────────────────────────────────────────────

  private async step(state: TaskState): Promise<TaskState> {
    if (isAt(state, 'PENDING')) {
      return this.persist(transition(state, 'PLANNING'), state.status);
    }
    if (isAt(state, 'PLANNING')) {
      return this.plan(state);
    }
    if (isAt(state, 'CODING')) {
      return this.code(state);
    }
    if (isAt(state, 'TESTING')) {
      return this.finalPass(state);
    }
    if (isAt(state, 'FIXING')) {
      return this.finalize(state);
    }
    throw new Error(`No stage handler for status ${state.status}`);
  }

  private async plan(state: TaskState<'PLANNING'>): Promise<TaskState> {
    const planned = state.subtasks.length > 0 ? state : setPlan(state, await this.options.planner.decompose(state.originalTask));
    this.logger.info(`Plan ready: ${planned.subtasks.length} subtask(s)`, { subtasks: planned.subtasks });
    return this.persist(transition(planned, 'CODING'), state.status);
  }

  /** One coder + fixer cycle for the current subtask, or the move to TESTING once the plan is done */
  private async code(state: TaskState<'CODING'>): Promise<TaskState> {
    const subtask = currentSubtask(state);
    if (!subtask) {
      return this.persist(setValidation(transition(state, 'TESTING'), 'PENDING'), state.status);
    }

    const index = state.currentSubtaskIndex;
    const total = state.subtasks.length;
    this.logger.info(`Subtask ${index + 1}/${total}: ${subtask}`);

    let result: AnalysisResult;
    let generated: string;
    try {
      generated = await this.options.coder.generate(state.currentCode, subtask, this.options.coderTemperature ?? 0.2, this.options.coderMaxTokens ?? 1000);
      result = await this.options.fixer.analyzeCode(generated, state.originalTask, this.options.dispositions);
    } catch (error) {
      this.logger.error(`Subtask ${index + 1} failed`, { error: errorMessage(error) });
      const recorded = recordError(state, { type: 'execution_error', description: errorMessage(error), codeContext: state.currentCode });
      return this.persist(advanceSubtask(recorded), state.status);
    }

    const next = completeSubtask(state, {
      newCode: result.fixApplied ? result.fixedCode : generated,
      modelUsed: this.options.coder.modelId,
      errors: result.errorsDetected.map((issue) => ({ type: issue.type, description: issue.description, userFeedback: result.userFeedback })),
      executionAttempted: true,
      executionSucceeded: result.executionSuccess,
    });

    this.events.emitSubtaskCompleted({
      taskId: state.taskId,
      index,
      total,
      subtask,
      executionSuccess: result.executionSuccess,
      fixApplied: result.fixApplied,
      issues: result.errorsDetected.length,
    });

    if (result.userFeedback === 'cancel') {
      return this.cancel(next);
    }
    return this.persist(next, state.status);
  }

  private async finalPass(state: TaskState<'TESTING'>): Promise<TaskState> {
    if (!state.currentCode.trim()) {
      this.logger.warn('No code to validate');
      const failed = recordError(setValidation(state, 'FAILED'), { type: 'empty_code', description: 'No code was produced' });
      return this.persist(markFailed(failed), state.status);
    }

    this.logger.info('Final validation pass');
    const result = await this.options.fixer.analyzeCode(state.currentCode, state.originalTask, this.options.dispositions);

    let next: TaskState<'TESTING'> = recordExecution(state, result.executionSuccess);
    for (const issue of result.errorsDetected) {
      next = recordError(next, { type: issue.type, description: issue.description, codeContext: state.currentCode, userFeedback: result.userFeedback });
    }
    next = setValidation(next, result.executionSuccess ? 'PASSED' : 'FAILED');

    if (result.userFeedback === 'cancel') {
      return this.cancel(next);
    }

    if (result.fixApplied) {
      const fixing = transition(appendRevision(next, { subtask: FINAL_PASS_LABEL, newCode: result.fixedCode, modelUsed: result.repairedBy ?? MECHANICAL_FIX }), 'FIXING');
      return this.persist(fixing, state.status);
    }
    return this.finalize(next);
  }

  private async finalize(state: TaskState<'TESTING' | 'FIXING'>): Promise<TaskState> {
    const exported = await this.export(state);
    const done = exported.validationStatus === 'PASSED' ? transition(exported, 'COMPLETED') : markFailed(exported);
    return this.persist(done, state.status);
  }

  private async cancel<S extends ActiveStatus>(state: TaskState<S>): Promise<TaskState> {
    this.logger.warn('Session cancelled by operator', { taskId: state.taskId });
    const cancelled = recordError(state, { type: 'cancelled', description: 'Session cancelled at the disposition prompt', codeContext: state.currentCode, userFeedback: 'cancel' });
    return this.persist(markFailed(cancelled), state.status);
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private async export<S extends TaskStatus>(state: TaskState<S>): Promise<TaskState<S>> {
    const dir = this.options.outputDir;
    if (!dir || !state.currentCode.trim()) return state;

    const file = path.join(dir, `${slugify(state.originalTask)}_${state.taskId.replace(/^task_/, '')}${this.profile.fileExtension}`);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(file, state.currentCode, 'utf-8');
    this.logger.info(`Program saved to ${file}`);
    return setSavedFile(state, file);
  }

  private async persist<S extends TaskStatus>(state: TaskState<S>, from: TaskStatus): Promise<TaskState<S>> {
    const counter = this.options.searchCounter;
    const withSearches = counter ? setRetrievalSearches(state, this.searchPrior + counter.searchCount - this.searchBase) : state;
    await this.options.store.save(withSearches);
    this.latest = withSearches;

    if (from !== withSearches.status) {
      this.logger.debug('Stage transition', { from, to: withSearches.status });
      this.events.emitStageChange({ taskId: withSearches.taskId, from, to: withSearches.status, timestamp: withSearches.updatedAt });
    }
    return withSearches;
  }
}

export function slugify(text: string, maxLength = 40): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, maxLength)
    .replace(/_+$/g, '');
  return slug || 'program';
}
