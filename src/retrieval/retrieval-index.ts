import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { EmbeddingProvider } from './embeddings';
import { cosineSimilarity } from './embeddings';
import type { VectorStore } from './vector-store';
import { RETRIEVAL_CATEGORIES, RetrievalCategory, RetrievalHit, RetrievalInfo, RetrievalMetadata, RetrievalRecord, Retriever } from './types';
import type { WorkflowLogger } from '../orchestrator/logger';
import { errorMessage, silentLogger } from '../orchestrator/logger';

const SeedFileSchema = z.array(
  z.object({
    id: z.string().min(1),
    text: z.string().min(1),
    metadata: z.object({
      tags: z.array(z.string()),
      type: z.string(),
    }),
  }),
);

export interface SeedOptions {
  /** Re-embed and overwrite even when the store already has records */
  force?: boolean;
}

/**
 * Similarity search over curated examples (task plans, code templates,
 * error patterns). Search never throws: any failure yields no hits.
 */
export class RetrievalIndex implements Retriever {
  private searches = 0;

  /** Searches issued since construction */
  get searchCount(): number {
    return this.searches;
  }

  constructor(
    private store: VectorStore,
    private embedder: EmbeddingProvider,
    private logger: WorkflowLogger = silentLogger,
    private defaultTopK = 3,
  ) {}

  async search(queryText: string, category?: RetrievalCategory, topK: number = this.defaultTopK): Promise<RetrievalHit[]> {
    this.searches += 1;
    if (topK <= 0) return [];

    try {
      const records = (await this.store.all()).filter((r) => !category || r.category === category);
      if (records.length === 0) return [];

      const query = await this.embedder.embed(queryText);
      const hits = records.map((record) => ({
        text: record.text,
        metadata: toMetadata(record),
        similarity: cosineSimilarity(query, record.embedding),
      }));

      // Array.prototype.sort is stable: equal scores keep insertion order
      hits.sort((a, b) => b.similarity - a.similarity);
      const top = hits.slice(0, topK);

      this.logger.debug('Retrieval search', { category: category ?? 'all', hits: top.length, best: top[0]?.similarity });
      return top;
    } catch (error) {
      this.logger.error('Retrieval search failed', { category: category ?? 'all', error: errorMessage(error) });
      return [];
    }
  }

  /** Embed and store one example; re-adding the same (category, id) overwrites it */
  async add(text: string, metadata: RetrievalMetadata): Promise<void> {
    const embedding = await this.embedder.embed(text);
    await this.store.upsert([{ ...metadata, tags: [...metadata.tags], text, embedding }]);
    this.logger.debug('Added retrieval document', { category: metadata.category, id: metadata.id });
  }

  /**
   * Load `<category>.json` files from a knowledge directory.
   * Skipped when the store already holds records unless `force` is set.
   * Returns the number of records written.
   */
  async seed(dir: string, options: SeedOptions = {}): Promise<number> {
    if (!options.force && (await this.store.count()) > 0) {
      this.logger.debug('Retrieval store already seeded');
      return 0;
    }

    const records: RetrievalRecord[] = [];
    for (const category of RETRIEVAL_CATEGORIES) {
      const file = path.join(dir, `${category}.json`);
      let raw: string;
      try {
        raw = await fs.readFile(file, 'utf-8');
      } catch {
        this.logger.warn(`Seed file not found: ${file}`);
        continue;
      }

      const parsed = SeedFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.error(`Invalid seed file: ${file}`, { issue: parsed.error.issues[0]?.message });
        continue;
      }

      for (const entry of parsed.data) {
        const embedding = await this.embedder.embed(entry.text);
        records.push({ id: entry.id, category, tags: entry.metadata.tags, type: entry.metadata.type, text: entry.text, embedding });
      }
      this.logger.info(`Loaded ${parsed.data.length} examples into ${category}`);
    }

    if (records.length > 0) {
      await this.store.upsert(records);
    }
    return records.length;
  }

  async info(): Promise<RetrievalInfo> {
    const records = await this.store.all();
    const categories: Record<RetrievalCategory, number> = { task_plans: 0, code_templates: 0, error_patterns: 0 };
    for (const record of records) {
      categories[record.category] += 1;
    }
    return { totalDocuments: records.length, categories, searches: this.searches };
  }
}

function toMetadata(record: RetrievalRecord): RetrievalMetadata {
  return { id: record.id, category: record.category, tags: [...record.tags], type: record.type };
}
