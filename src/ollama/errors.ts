export class InferenceError extends Error {
  constructor(
    message: string,
    public status?: number,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'InferenceError';
  }
}

export class InferenceTimeoutError extends InferenceError {
  constructor(timeoutMs: number, originalError?: unknown) {
    super(`Inference request timed out after ${timeoutMs}ms`, undefined, originalError);
    this.name = 'InferenceTimeoutError';
  }
}

export class InferenceResponseError extends InferenceError {
  constructor(status: number, detail: string, originalError?: unknown) {
    super(`Inference service responded with ${status}: ${detail}`, status, originalError);
    this.name = 'InferenceResponseError';
  }
}
