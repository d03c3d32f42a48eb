export { loadConfig, redactConfig, CONFIG_FILE } from './config/loader';
export { ConfigSchema, ConfigError } from './config/validator';
export type { Config, LogLevel, ModelRole } from './config/validator';

export { OllamaClient } from './ollama/client';
export { InferenceError, InferenceTimeoutError, InferenceResponseError } from './ollama/errors';
export type { InferenceClient, GenerateRequest, GenerateResponse } from './ollama/types';

export { RetrievalIndex } from './retrieval/retrieval-index';
export { MemoryVectorStore, JsonVectorStore } from './retrieval/vector-store';
export { OllamaEmbeddingProvider, cosineSimilarity, normalizeEmbedding } from './retrieval/embeddings';
export type { EmbeddingProvider } from './retrieval/embeddings';
export type { RetrievalCategory, RetrievalHit, RetrievalMetadata, Retriever } from './retrieval/types';

export { TaskPlanner } from './agents/planner';
export { CodeGenerator } from './agents/coder';
export { CodeFixer } from './agents/fixer';
export type { AnalysisResult, AnalysisStep } from './agents/fixer';
export { AutoDispositionProvider, DISPOSITIONS, parseDisposition } from './agents/disposition';
export type { Disposition, DispositionProvider, DispositionRequest } from './agents/disposition';
export { pygameProfile, getProfile } from './agents/profiles';
export type { TargetProfile } from './agents/profiles';
export { sanitize } from './agents/sanitizer';
export { StaticAnalyzer } from './agents/static-analyzer';
export { ErrorAnalyzer } from './agents/error-analyzer';
export type { CodeIssue, ExecutionOutcome } from './agents/types';

export { createSandbox, LocalProcessSandbox, E2BSandbox, SandboxError } from './testing';
export type { CodeSandbox, SandboxRunRequest, SandboxRunResult } from './testing';

export { TASK_STATUSES, VALIDATION_STATUSES, STATUS_TRANSITIONS, canTransition, isTerminal } from './orchestrator/states';
export type { TaskStatus, ValidationStatus } from './orchestrator/states';
export * from './orchestrator/task-state';
export { transition, markFailed, InvalidTransitionError } from './orchestrator/state-machine';
export { TaskStateStore } from './orchestrator/state-store';
export { SynthesisPipeline } from './orchestrator/workflow';
export type { PipelineResult, SynthesisPipelineOptions } from './orchestrator/workflow';
export { SessionController, SessionBusyError } from './orchestrator/session-controller';
export { PipelineEvents } from './orchestrator/events';
export { createRuntime } from './orchestrator/runtime';
export type { Runtime } from './orchestrator/runtime';
export { ConsoleWorkflowLogger } from './orchestrator/logger';
export type { WorkflowLogger } from './orchestrator/logger';
