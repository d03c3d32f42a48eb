import axios, { AxiosInstance } from 'axios';
import type { ZodType } from 'zod';
import { EmbeddingWireSchema, GenerateRequest, GenerateResponse, GenerateWireSchema, InferenceClient, OllamaClientOptions, TagsWireSchema } from './types';
import { InferenceError, InferenceResponseError, InferenceTimeoutError } from './errors';
import { Backoff } from './backoff';
import type { WorkflowLogger } from '../orchestrator/logger';
import { silentLogger } from '../orchestrator/logger';

/**
 * HTTP client for a local Ollama server.
 *
 * Every call is retried up to `maxRetries` times with exponential backoff;
 * only the last failure surfaces, as an InferenceError.
 */
export class OllamaClient implements InferenceClient {
  private axiosInstance: AxiosInstance;
  private timeoutMs: number;
  private maxRetries: number;
  private backoffBaseMs: number;

  constructor(
    options: OllamaClientOptions = {},
    private logger: WorkflowLogger = silentLogger,
  ) {
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.axiosInstance = axios.create({
      baseURL: options.baseUrl ?? 'http://localhost:11434',
      timeout: this.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });

    if (options.logRequests) {
      this.axiosInstance.interceptors.request.use((config) => {
        this.logger.debug(`[Ollama] ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      });
    }
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const payload = {
      model: request.model,
      prompt: request.prompt,
      system: request.system ?? '',
      stream: false,
      options: {
        temperature: request.temperature ?? 0.7,
        num_predict: request.maxTokens ?? 2048,
      },
    };

    const started = Date.now();
    const data = await this.withRetries(`generate(${request.model})`, () => this.post('/api/generate', payload, GenerateWireSchema));
    this.logger.debug('Generation finished', { model: data.model, ms: Date.now() - started, evalCount: data.eval_count });

    return {
      response: data.response,
      done: data.done,
      model: data.model,
      promptEvalCount: data.prompt_eval_count,
      evalCount: data.eval_count,
      totalDurationNs: data.total_duration,
    };
  }

  async embed(model: string, text: string): Promise<number[]> {
    const data = await this.withRetries(`embed(${model})`, () => this.post('/api/embeddings', { model, prompt: text }, EmbeddingWireSchema));
    return data.embedding;
  }

  async listModels(): Promise<string[]> {
    const data = await this.withRetries('tags', async () => {
      const { data: raw } = await this.axiosInstance.get<unknown>('/api/tags');
      return parseWire(TagsWireSchema, raw);
    });
    return data.models.map((m) => m.name);
  }

  /**
   * Reports, per model id, whether the server has it pulled.
   * An unreachable server reports every model as unavailable.
   */
  async checkModelsAvailable(models: string[]): Promise<Record<string, boolean>> {
    let installed: string[] = [];
    try {
      installed = await this.listModels();
    } catch (error) {
      this.logger.warn('Could not list models', { error: error instanceof Error ? error.message : String(error) });
    }
    const result: Record<string, boolean> = {};
    for (const model of models) {
      result[model] = installed.some((name) => name === model || name === `${model}:latest`);
    }
    return result;
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async post<T>(url: string, body: object, schema: ZodType<T>): Promise<T> {
    const { data } = await this.axiosInstance.post<unknown>(url, body);
    return parseWire(schema, data);
  }

  private async withRetries<T>(label: string, call: () => Promise<T>): Promise<T> {
    let lastError: InferenceError = new InferenceError(`${label} was not attempted`);

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        return await call();
      } catch (error) {
        lastError = this.toInferenceError(error);
        this.logger.warn(`Attempt ${attempt + 1}/${this.maxRetries} failed: ${label}`, { error: lastError.message });
        if (attempt < this.maxRetries - 1) {
          await Backoff.sleep(Backoff.delayFor(attempt, this.backoffBaseMs));
        }
      }
    }

    this.logger.error(`All ${this.maxRetries} attempts failed: ${label}`);
    throw lastError;
  }

  private toInferenceError(error: unknown): InferenceError {
    if (error instanceof InferenceError) return error;
    if (!(error instanceof Error)) return new InferenceError(String(error), undefined, error);

    const code = 'code' in error ? error.code : undefined;
    if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
      return new InferenceTimeoutError(this.timeoutMs, error);
    }

    const response = 'response' in error ? error.response : undefined;
    if (response && typeof response === 'object' && 'status' in response && typeof response.status === 'number') {
      return new InferenceResponseError(response.status, error.message, error);
    }

    return new InferenceError(`Inference request failed: ${error.message}`, undefined, error);
  }
}

function parseWire<T>(schema: ZodType<T>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new InferenceError(`Unexpected response shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}
