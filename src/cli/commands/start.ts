import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { AutoDispositionProvider } from '../../agents/disposition';
import type { DispositionProvider } from '../../agents/disposition';
import { createRuntime } from '../../orchestrator/runtime';
import type { Runtime } from '../../orchestrator/runtime';
import { errorMessage } from '../../orchestrator/logger';
import { CLIWorkflowLogger } from '../cli-logger';
import { InquirerDispositionProvider, promptForTask } from '../prompts';
import { formatInfo, formatPlan, formatSessionResult, formatStageChange, formatStep, formatSubtaskResult, formatWarning } from '../formatters';
import type { StartCommandOptions } from '../types';
import { ValidationError } from '../validators/options';
import { isVerbose, reportFailure } from './shared';

function parseSmoke(input: string | undefined): number | undefined {
  if (input === undefined) return undefined;
  const n = Number(input);
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError('--smoke must be a non-negative integer');
  }
  return n;
}

// ── Preparation ─────────────────────────────────────────────────────────

async function prepare(runtime: Runtime, seed: boolean): Promise<void> {
  const { config, client, retrieval } = runtime;
  const models = [...new Set(Object.values(config.ollama.models))];

  try {
    const available = await client.checkModelsAvailable(models);
    const missing = models.filter((m) => !available[m]);
    if (missing.length) {
      console.log(formatWarning(`Models not pulled on the server: ${missing.join(', ')}`));
    }
  } catch (error) {
    console.log(formatWarning(`Could not reach Ollama at ${config.ollama.base_url}: ${errorMessage(error)}`));
  }

  if (!seed) return;
  try {
    const added = await retrieval.seed(config.retrieval.knowledge_dir);
    if (added) console.log(formatInfo(`Seeded retrieval index with ${added} examples`));
  } catch (error) {
    console.log(formatWarning(`Retrieval index unavailable, continuing without examples: ${errorMessage(error)}`));
  }
}

function attachProgress(runtime: Runtime): void {
  runtime.pipeline.events.onStageChange((event) => {
    if (event.from !== event.to) console.log(formatStageChange(event.from, event.to));
  });
  runtime.pipeline.events.onSubtaskCompleted((event) => {
    console.log(formatSubtaskResult(event));
  });
}

// ── Execution ───────────────────────────────────────────────────────────

async function runSession(runtime: Runtime, launch: () => Promise<string>): Promise<void> {
  const started = Date.now();
  const taskId = await launch();
  console.log(formatInfo(`Task ID: ${taskId}`));

  const state = await runtime.sessions.wait(taskId);
  if (!state) {
    throw new Error(`Session ${taskId} was not stored`);
  }

  if (state.subtasks.length) {
    console.log(formatPlan(state.subtasks));
  }
  console.log(formatSessionResult(state, Date.now() - started));
  if (state.status !== 'COMPLETED') {
    process.exitCode = 1;
  }
}

function buildRuntime(program: Command, options: StartCommandOptions): Runtime {
  const config = loadConfig();
  const dispositions: DispositionProvider = options.auto ? new AutoDispositionProvider() : new InquirerDispositionProvider();
  const runtime = createRuntime(config, {
    logger: new CLIWorkflowLogger(isVerbose(program)),
    dispositions,
    smokeSeconds: parseSmoke(options.smoke),
  });
  attachProgress(runtime);
  return runtime;
}

export function registerStartCommands(program: Command): void {
  program
    .command('start [task...]')
    .description('Plan, generate and validate a program for a natural-language task')
    .option('--auto', 'Repair failures automatically without asking', false)
    .option('--smoke <seconds>', 'Seconds a program may run before it counts as healthy (0 disables)')
    .option('--no-seed', 'Do not seed the retrieval index before starting')
    .action(async (words: string[], options: StartCommandOptions) => {
      try {
        const task = words.join(' ').trim() || (await promptForTask());
        const runtime = buildRuntime(program, options);
        console.log(formatStep(`Starting: ${task}`));
        await prepare(runtime, options.seed !== false);
        await runSession(runtime, () => runtime.sessions.start(task));
      } catch (err) {
        reportFailure(err);
      }
    });

  program
    .command('resume <taskId>')
    .description('Continue a stored session from its last saved stage')
    .option('--auto', 'Repair failures automatically without asking', false)
    .option('--smoke <seconds>', 'Seconds a program may run before it counts as healthy (0 disables)')
    .option('--no-seed', 'Do not seed the retrieval index before resuming')
    .action(async (taskId: string, options: StartCommandOptions) => {
      try {
        const runtime = buildRuntime(program, options);
        console.log(formatStep(`Resuming ${taskId}`));
        await prepare(runtime, options.seed !== false);
        await runSession(runtime, () => runtime.sessions.resume(taskId));
      } catch (err) {
        reportFailure(err);
      }
    });
}
