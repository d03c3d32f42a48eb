import type { OllamaClient } from '../ollama/client';

export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

/**
 * Embeddings from an Ollama embedding model (`/api/embeddings`), normalized
 * to unit length so cosine similarity reduces to a dot product.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private client: Pick<OllamaClient, 'embed'>,
    readonly model: string,
  ) {}

  async embed(text: string): Promise<number[]> {
    const vector = await this.client.embed(this.model, text);
    if (vector.length === 0) {
      throw new Error(`Embedding model ${this.model} returned an empty vector`);
    }
    return normalizeEmbedding(vector);
  }
}

export function normalizeEmbedding(vec: number[]): number[] {
  const sanitized = vec.map((v) => (Number.isFinite(v) ? v : 0));
  const magnitude = Math.sqrt(sanitized.reduce((sum, v) => sum + v * v, 0));
  if (magnitude < 1e-10) return sanitized;
  return sanitized.map((v) => v / magnitude);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const va = a[i] ?? 0;
    const vb = b[i] ?? 0;
    dot += va * vb;
    normA += va * va;
    normB += vb * vb;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
