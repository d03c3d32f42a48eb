/**
 * End-to-end session with the real agents. Inference, embeddings and
 * program execution are scripted in process.
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { TaskPlanner } from '../../../src/agents/planner';
import { CodeGenerator } from '../../../src/agents/coder';
import { CodeFixer } from '../../../src/agents/fixer';
import { AutoDispositionProvider } from '../../../src/agents/disposition';
import { defaults } from '../../../src/config/defaults';
import { RetrievalIndex } from '../../../src/retrieval/retrieval-index';
import { MemoryVectorStore } from '../../../src/retrieval/vector-store';
import { TaskStateStore } from '../../../src/orchestrator/state-store';
import { SynthesisPipeline } from '../../../src/orchestrator/workflow';
import { FakeSandbox, KeywordEmbedder, ScriptedClient, WORKING_PROGRAM, mockLogger } from '../../helpers/fakes';

const TASK = 'Create a window with a blue background';
const PLAN_REPLY = ['1. Initialize pygame and open a window', '2. Fill the background with blue', '3. Keep the window open until it is closed'].join('\n');
const fenced = (code: string) => '```python\n' + code + '\n```';

describe('SynthesisPipeline with real agents', () => {
  let dir: string;
  let index: RetrievalIndex;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'codesmith-e2e-'));
    index = new RetrievalIndex(new MemoryVectorStore(), new KeywordEmbedder(['window', 'blue', 'snake']));
    await index.add('Plan: open a window and fill it blue', { id: 'blue_window', category: 'task_plans', tags: [], type: 'example' });
    await index.add('Plan: move a snake across a grid', { id: 'snake', category: 'task_plans', tags: [], type: 'example' });
    await index.add('screen.fill((0, 0, 255))  # blue window', { id: 'fill', category: 'code_templates', tags: ['basic'], type: 'template' });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function pipelineWith(client: ScriptedClient, sandbox: FakeSandbox) {
    const logger = mockLogger();
    const store = new TaskStateStore(path.join(dir, 'states'));
    const pipeline = new SynthesisPipeline({
      planner: new TaskPlanner(client, index, { model: 'planner-test' }, logger),
      coder: new CodeGenerator(client, index, { model: 'coder-test' }, logger),
      fixer: new CodeFixer(
        client,
        index,
        sandbox,
        { model: 'fixer-test', timeoutSeconds: defaults.sandbox.timeout_seconds, smokeSeconds: defaults.sandbox.smoke_seconds },
        logger,
      ),
      store,
      dispositions: new AutoDispositionProvider(),
      outputDir: path.join(dir, 'out'),
      logger,
      searchCounter: index,
    });
    return { pipeline, store };
  }

  it('should plan, code, validate and export a working program', async () => {
    const client = new ScriptedClient([PLAN_REPLY, fenced(WORKING_PROGRAM), fenced(WORKING_PROGRAM), fenced(WORKING_PROGRAM)]);
    const sandbox = new FakeSandbox([{ exitCode: 0 }]);
    const { pipeline, store } = pipelineWith(client, sandbox);

    const { state } = await pipeline.run(TASK);

    expect(state.status).toBe('COMPLETED');
    expect(state.validationStatus).toBe('PASSED');
    expect(state.subtasks).toEqual(['Initialize pygame and open a window', 'Fill the background with blue', 'Keep the window open until it is closed']);
    expect(state.currentCode).toBe(WORKING_PROGRAM);
    expect(state.metrics).toEqual({ executionsAttempted: 4, executionsSucceeded: 4, retrievalSearches: 8 });
    expect(sandbox.requests).toHaveLength(4);
    expect(client.requests[0]?.prompt).toContain('--- EXAMPLE 1 (example) ---\nPlan: open a window and fill it blue\n--- END EXAMPLE ---');

    expect(state.savedFile).toBeDefined();
    await expect(fs.readFile(state.savedFile ?? '', 'utf-8')).resolves.toBe(WORKING_PROGRAM);
    await expect(store.load(state.taskId)).resolves.toEqual(state);
  });

  it('should repair a missing init call mechanically and record the issue', async () => {
    const withoutInit = WORKING_PROGRAM.replace('pygame.init()\n', '');
    const client = new ScriptedClient([PLAN_REPLY, fenced(withoutInit), fenced(WORKING_PROGRAM), fenced(WORKING_PROGRAM)]);
    const { pipeline } = pipelineWith(client, new FakeSandbox([{ exitCode: 0 }]));

    const { state } = await pipeline.run(TASK);

    expect(state.status).toBe('COMPLETED');
    expect(state.codeHistory[0]?.newCode).toBe(WORKING_PROGRAM);
    expect(state.errors.map((e) => [e.type, e.userFeedback])).toEqual([['missing_init', 'auto_fix']]);
    expect(client.requests).toHaveLength(4);
  });

  it('should fail a program that hangs with a timeout issue', async () => {
    const client = new ScriptedClient([PLAN_REPLY, fenced(WORKING_PROGRAM), fenced(WORKING_PROGRAM), fenced(WORKING_PROGRAM)]);
    const sandbox = new FakeSandbox([{ exitCode: null, timedOut: true }]);
    const { pipeline } = pipelineWith(client, sandbox);

    const { state } = await pipeline.run(TASK);

    expect(state.status).toBe('FAILED');
    expect(state.validationStatus).toBe('FAILED');
    expect(state.errors.map((e) => e.type)).toEqual(Array(4).fill('black_screen_or_timeout'));
    expect(state.errors[3]?.description).toBe(
      'Black screen or timeout (the program produced no output or never finished): Timeout: program ran for more than 30 seconds',
    );
    expect(sandbox.requests[0]?.source).toBe(WORKING_PROGRAM);
  });

  it('should fail the session when the final program never runs', async () => {
    const client = new ScriptedClient([PLAN_REPLY, fenced(WORKING_PROGRAM), fenced(WORKING_PROGRAM), fenced(WORKING_PROGRAM)]);
    const { pipeline } = pipelineWith(client, new FakeSandbox([{ exitCode: 1, stderr: "NameError: name 'clock' is not defined" }]));

    const { state } = await pipeline.run(TASK);

    expect(state.status).toBe('FAILED');
    expect(state.validationStatus).toBe('FAILED');
    expect(state.metrics.executionsSucceeded).toBe(0);
    expect(state.errors.filter((e) => e.type === 'name_error')).toHaveLength(4);
  });
});
