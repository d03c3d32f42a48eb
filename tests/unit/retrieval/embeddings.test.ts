import { OllamaEmbeddingProvider, cosineSimilarity, normalizeEmbedding } from '../../../src/retrieval/embeddings';

describe('embeddings', () => {
  describe('normalizeEmbedding', () => {
    it('should scale a vector to unit length', () => {
      const [x, y] = normalizeEmbedding([3, 4]);
      expect(x).toBeCloseTo(0.6);
      expect(y).toBeCloseTo(0.8);
    });

    it('should leave a zero vector alone and zero out non-finite values', () => {
      expect(normalizeEmbedding([0, 0])).toEqual([0, 0]);
      expect(normalizeEmbedding([Number.NaN, 2])).toEqual([0, 1]);
    });
  });

  describe('cosineSimilarity', () => {
    it('should score identical directions 1 and orthogonal ones 0', () => {
      expect(cosineSimilarity([1, 1], [2, 2])).toBeCloseTo(1);
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('should score mismatched or empty vectors 0', () => {
      expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
      expect(cosineSimilarity([], [])).toBe(0);
    });
  });

  describe('OllamaEmbeddingProvider', () => {
    it('should request the configured model and normalize the result', async () => {
      const client = { embed: jest.fn().mockResolvedValue([0, 5]) };
      const provider = new OllamaEmbeddingProvider(client, 'nomic-embed-text');

      expect(await provider.embed('hello')).toEqual([0, 1]);
      expect(client.embed).toHaveBeenCalledWith('nomic-embed-text', 'hello');
    });

    it('should reject an empty vector', async () => {
      const provider = new OllamaEmbeddingProvider({ embed: jest.fn().mockResolvedValue([]) }, 'nomic-embed-text');
      await expect(provider.embed('hello')).rejects.toThrow('Embedding model nomic-embed-text returned an empty vector');
    });
  });
});
