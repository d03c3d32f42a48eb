import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const ModelsSchema = z.object({
  planner: z.string().min(1),
  coder: z.string().min(1),
  fixer: z.string().min(1),
  default: z.string().min(1),
});

export const ConfigSchema = z.object({
  ollama: z.object({
    base_url: z.string().url(),
    timeout_ms: z.number().int().positive(),
    max_retries: z.number().int().min(1),
    backoff_base_ms: z.number().int().min(0),
    models: ModelsSchema,
  }),
  retrieval: z.object({
    store_path: z.string().min(1),
    knowledge_dir: z.string().min(1),
    embedding_model: z.string().min(1),
    top_k: z.number().int().positive(),
  }),
  sandbox: z.object({
    provider: z.enum(['local', 'e2b']),
    interpreter: z.string().min(1),
    timeout_seconds: z.number().positive(),
    smoke_seconds: z.number().min(0),
    env: z.record(z.string()),
    e2b_api_key: z.string().optional(),
    e2b_template: z.string().min(1),
  }),
  storage: z.object({
    states_dir: z.string().min(1),
    output_dir: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
  }),
  profile: z.enum(['pygame']),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ModelRole = keyof z.infer<typeof ModelsSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
