import { z } from 'zod';

export interface GenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerateResponse {
  response: string;
  done: boolean;
  model: string;
  promptEvalCount?: number;
  evalCount?: number;
  totalDurationNs?: number;
}

/** Anything that turns a prompt into text. The pipeline only depends on this. */
export interface InferenceClient {
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

export interface OllamaClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Delay before the second attempt; doubles on each further attempt */
  backoffBaseMs?: number;
  logRequests?: boolean;
}

// Wire shapes
export const GenerateWireSchema = z.object({
  model: z.string(),
  response: z.string(),
  done: z.boolean(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  total_duration: z.number().optional(),
});

export const EmbeddingWireSchema = z.object({
  embedding: z.array(z.number()),
});

export const TagsWireSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});
