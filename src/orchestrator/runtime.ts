import type { Config } from '../config/validator';
import { OllamaClient } from '../ollama/client';
import { OllamaEmbeddingProvider } from '../retrieval/embeddings';
import { JsonVectorStore } from '../retrieval/vector-store';
import { RetrievalIndex } from '../retrieval/retrieval-index';
import { createSandbox } from '../testing';
import type { CodeSandbox } from '../testing/types';
import { getProfile } from '../agents/profiles';
import { TaskPlanner } from '../agents/planner';
import { CodeGenerator } from '../agents/coder';
import { CodeFixer } from '../agents/fixer';
import type { DispositionProvider } from '../agents/disposition';
import { AutoDispositionProvider } from '../agents/disposition';
import type { WorkflowLogger } from './logger';
import { ConsoleWorkflowLogger } from './logger';
import { TaskStateStore } from './state-store';
import { SynthesisPipeline } from './workflow';
import { SessionController } from './session-controller';

export interface RuntimeOverrides {
  logger?: WorkflowLogger;
  dispositions?: DispositionProvider;
  sandbox?: CodeSandbox;
  /** Seconds a program may keep running before it counts as healthy (0 disables) */
  smokeSeconds?: number;
}

export interface Runtime {
  config: Config;
  logger: WorkflowLogger;
  client: OllamaClient;
  retrieval: RetrievalIndex;
  store: TaskStateStore;
  sandbox: CodeSandbox;
  planner: TaskPlanner;
  coder: CodeGenerator;
  fixer: CodeFixer;
  pipeline: SynthesisPipeline;
  sessions: SessionController;
}

export function createOllamaClient(config: Config, logger: WorkflowLogger): OllamaClient {
  return new OllamaClient(
    {
      baseUrl: config.ollama.base_url,
      timeoutMs: config.ollama.timeout_ms,
      maxRetries: config.ollama.max_retries,
      backoffBaseMs: config.ollama.backoff_base_ms,
      logRequests: config.logging.level === 'debug',
    },
    logger,
  );
}

export function createRetrievalIndex(config: Config, client: OllamaClient, logger: WorkflowLogger): RetrievalIndex {
  const embedder = new OllamaEmbeddingProvider(client, config.retrieval.embedding_model);
  return new RetrievalIndex(new JsonVectorStore(config.retrieval.store_path), embedder, logger, config.retrieval.top_k);
}

/**
 * Builds every collaborator once, from configuration, and wires them
 * together by constructor injection.
 */
export function createRuntime(config: Config, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? new ConsoleWorkflowLogger(undefined, config.logging.level);
  const profile = getProfile(config.profile);

  const client = createOllamaClient(config, logger);
  const retrieval = createRetrievalIndex(config, client, logger);
  const store = new TaskStateStore(config.storage.states_dir, logger);
  const sandbox = overrides.sandbox ?? createSandbox(config.sandbox);
  const models = config.ollama.models;

  const planner = new TaskPlanner(client, retrieval, { model: models.planner }, logger);
  const coder = new CodeGenerator(client, retrieval, { model: models.coder, profile }, logger);
  const fixer = new CodeFixer(
    client,
    retrieval,
    sandbox,
    {
      model: models.fixer,
      profile,
      timeoutSeconds: config.sandbox.timeout_seconds,
      smokeSeconds: overrides.smokeSeconds ?? config.sandbox.smoke_seconds,
    },
    logger,
  );

  const pipeline = new SynthesisPipeline({
    planner,
    coder,
    fixer,
    store,
    dispositions: overrides.dispositions ?? new AutoDispositionProvider(),
    outputDir: config.storage.output_dir,
    profile,
    logger,
    searchCounter: retrieval,
  });

  const sessions = new SessionController(pipeline, store, logger);

  return { config, logger, client, retrieval, store, sandbox, planner, coder, fixer, pipeline, sessions };
}
