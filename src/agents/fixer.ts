import type { InferenceClient } from '../ollama/types';
import type { Retriever } from '../retrieval/types';
import type { CodeSandbox } from '../testing/types';
import type { WorkflowLogger } from '../orchestrator/logger';
import { errorMessage, silentLogger } from '../orchestrator/logger';
import { extractCode } from './code-extraction';
import { Disposition, DispositionProvider, DispositionRequest, FixOutcome, summarizeIssues } from './disposition';
import { ErrorAnalyzer } from './error-analyzer';
import type { TargetProfile } from './profiles';
import { pygameProfile } from './profiles';
import { getRepairPrompt, getRepairSystemPrompt } from './prompts/repair';
import { sanitize } from './sanitizer';
import { StaticAnalyzer } from './static-analyzer';
import type { CodeIssue, ExecutionOutcome } from './types';

export interface AnalysisResult {
  executionSuccess: boolean;
  errorsDetected: CodeIssue[];
  fixedCode: string;
  /** fixedCode !== the code that was analyzed */
  fixApplied: boolean;
  userFeedback: FixOutcome;
  execution: ExecutionOutcome;
  /** Model id when fixedCode came from a model repair; null for mechanical or no repair */
  repairedBy: string | null;
}

interface Repair {
  code: string;
  repairedBy: string | null;
}

export type AnalysisStep =
  | { kind: 'done'; result: AnalysisResult }
  | {
      kind: 'awaiting_disposition';
      request: DispositionRequest;
      resume(disposition: Disposition): Promise<AnalysisResult>;
    };

export interface CodeFixerOptions {
  model: string;
  profile?: TargetProfile;
  timeoutSeconds?: number;
  /** Seconds after which a still-running program counts as healthy; 0 disables */
  smokeSeconds?: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Validate-and-repair cycle: static checklist, sandboxed run, runtime
 * classification, then a disposition and the matching repair.
 *
 * `start()` stops at the disposition point and hands back a request plus a
 * `resume()` continuation, so callers decide how the choice is made.
 * Nothing here throws once the cycle has started.
 */
export class CodeFixer {
  private profile: TargetProfile;
  private staticAnalyzer: StaticAnalyzer;
  private errorAnalyzer: ErrorAnalyzer;

  constructor(
    private client: InferenceClient,
    private retriever: Retriever,
    private sandbox: CodeSandbox,
    private options: CodeFixerOptions,
    private logger: WorkflowLogger = silentLogger,
  ) {
    this.profile = options.profile ?? pygameProfile;
    this.staticAnalyzer = new StaticAnalyzer(this.profile);
    this.errorAnalyzer = new ErrorAnalyzer(retriever, logger);
  }

  get modelId(): string {
    return this.options.model;
  }

  async start(code: string, taskDescription: string): Promise<AnalysisStep> {
    const staticIssues = this.staticAnalyzer.analyze(code);
    const execution = await this.execute(code);
    const runtimeIssues = execution.success ? [] : await this.errorAnalyzer.analyze(execution.output);
    const issues = [...staticIssues, ...runtimeIssues];

    this.logger.info(`Analysis: ${execution.success ? 'run ok' : 'run failed'}, ${issues.length} issue(s)`, { types: issues.map((i) => i.type) });

    if (execution.success && issues.length === 0) {
      return { kind: 'done', result: this.result(code, { code: sanitize(code, this.profile), repairedBy: null }, issues, execution, 'success') };
    }

    const request: DispositionRequest = { taskDescription, code, issues, execution, summary: summarizeIssues(issues, execution) };
    return {
      kind: 'awaiting_disposition',
      request,
      resume: async (disposition: Disposition) => {
        const repair = await this.repair(code, issues, runtimeIssues, disposition, taskDescription);
        return this.result(code, repair, issues, execution, disposition);
      },
    };
  }

  /** Runs the whole cycle, asking `provider` at the disposition point */
  async analyzeCode(code: string, taskDescription: string, provider: DispositionProvider): Promise<AnalysisResult> {
    const step = await this.start(code, taskDescription);
    if (step.kind === 'done') return step.result;

    let disposition: Disposition = 'auto_fix';
    try {
      disposition = await provider.choose(step.request);
    } catch (error) {
      this.logger.warn('Disposition provider failed, defaulting to auto_fix', { error: errorMessage(error) });
    }
    return step.resume(disposition);
  }

  /** Sanitized, time-boxed run of the program */
  async execute(code: string): Promise<ExecutionOutcome> {
    const timeoutSeconds = this.options.timeoutSeconds ?? 30;
    const smokeSeconds = this.options.smokeSeconds ?? 0;
    const source = sanitize(code, this.profile);
    const runnable = smokeSeconds > 0 ? this.profile.withSmokeWindow(source, smokeSeconds) : source;
    const started = Date.now();

    try {
      const run = await this.sandbox.run({ source: runnable, timeoutSeconds, fileExtension: this.profile.fileExtension });
      const success = run.exitCode === 0 && !run.timedOut;
      const captured = run.stderr.trim() ? run.stderr : run.stdout;
      const output = run.timedOut ? [`Timeout: program ran for more than ${timeoutSeconds} seconds`, captured.trim()].filter(Boolean).join('\n') : captured;
      return { success, exitCode: run.exitCode, timedOut: run.timedOut, output, durationMs: run.durationMs };
    } catch (error) {
      this.logger.error(`Sandbox ${this.sandbox.name} failed`, { error: errorMessage(error) });
      return { success: false, exitCode: null, timedOut: false, output: `Execution error: ${errorMessage(error)}`, durationMs: Date.now() - started };
    }
  }

  // ── Repair ──────────────────────────────────────────────────────────

  private async repair(code: string, issues: CodeIssue[], runtimeIssues: CodeIssue[], disposition: Disposition, taskDescription: string): Promise<Repair> {
    if (disposition === 'skip' || disposition === 'cancel' || issues.length === 0) {
      return { code: sanitize(code, this.profile), repairedBy: null };
    }

    const mechanical: Repair = { code: this.applyMechanicalFixes(sanitize(code, this.profile)), repairedBy: null };
    if (disposition !== 'auto_fix') return mechanical;

    const remaining = [...this.staticAnalyzer.analyze(mechanical.code), ...runtimeIssues];
    if (!remaining.some((issue) => issue.severity === 'critical')) return mechanical;

    const repaired = await this.escalate(mechanical.code, remaining, taskDescription);
    return repaired === null ? mechanical : { code: repaired, repairedBy: this.options.model };
  }

  /** Inserts a missing import and init call right after the declaration or import line, once */
  applyMechanicalFixes(code: string): string {
    const { importLine, initCall, encodingDeclaration } = this.profile;
    let lines = code.split('\n');

    if (!lines.some((line) => isImportLine(line, importLine))) {
      const at = lines[0]?.trim() === encodingDeclaration ? 1 : 0;
      lines = [...lines.slice(0, at), importLine, ...lines.slice(at)];
    }

    if (!code.includes(initCall)) {
      const index = lines.findIndex((line) => isImportLine(line, importLine));
      const indent = /^\s*/.exec(lines[index] ?? '')?.[0] ?? '';
      lines = [...lines.slice(0, index + 1), `${indent}${initCall}`, ...lines.slice(index + 1)];
    }

    return lines.join('\n');
  }

  /** Model-repaired code, or null when the model gave nothing usable */
  private async escalate(code: string, issues: CodeIssue[], taskDescription: string): Promise<string | null> {
    const solutions: string[] = [];
    for (const issue of issues.slice(0, 2)) {
      if (issue.ragContext) {
        solutions.push(issue.ragContext);
        continue;
      }
      const hits = await this.retriever.search(issue.type, 'error_patterns', 1);
      if (hits[0]) solutions.push(hits[0].text);
    }

    try {
      const reply = await this.client.generate({
        model: this.options.model,
        system: getRepairSystemPrompt(this.profile, taskDescription, issues, solutions),
        prompt: getRepairPrompt(this.profile, code),
        temperature: this.options.temperature ?? 0.3,
        maxTokens: this.options.maxTokens ?? 1500,
      });
      const repaired = extractCode(reply.response, this.profile.fenceLanguages);
      if (!repaired) {
        this.logger.warn('Repair reply contained no code, keeping mechanical fix');
        return null;
      }
      this.logger.info(`Model repair produced ${repaired.length} chars`);
      return sanitize(repaired, this.profile);
    } catch (error) {
      this.logger.error('Model repair failed, keeping mechanical fix', { error: errorMessage(error) });
      return null;
    }
  }

  private result(code: string, repair: Repair, issues: CodeIssue[], execution: ExecutionOutcome, userFeedback: FixOutcome): AnalysisResult {
    return {
      executionSuccess: execution.success,
      errorsDetected: issues,
      fixedCode: repair.code,
      fixApplied: repair.code !== code,
      userFeedback,
      execution,
      repairedBy: repair.repairedBy,
    };
  }
}

function isImportLine(line: string, importLine: string): boolean {
  const trimmed = line.trim();
  return trimmed === importLine || trimmed.startsWith(`${importLine} `) || trimmed.startsWith(`${importLine},`);
}
