import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { RETRIEVAL_CATEGORIES, RetrievalRecord, recordKey } from './types';

export interface VectorStore {
  /** All records in insertion order */
  all(): Promise<RetrievalRecord[]>;
  /** Insert or overwrite by (category, id); an overwrite keeps the original position */
  upsert(records: RetrievalRecord[]): Promise<void>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

export class MemoryVectorStore implements VectorStore {
  protected records = new Map<string, RetrievalRecord>();

  async all(): Promise<RetrievalRecord[]> {
    await this.ready();
    return [...this.records.values()];
  }

  async upsert(records: RetrievalRecord[]): Promise<void> {
    await this.ready();
    for (const record of records) {
      this.records.set(recordKey(record), record);
    }
    await this.flush();
  }

  async count(): Promise<number> {
    await this.ready();
    return this.records.size;
  }

  async clear(): Promise<void> {
    await this.ready();
    this.records.clear();
    await this.flush();
  }

  protected async ready(): Promise<void> {}

  protected async flush(): Promise<void> {}
}

const RecordFileSchema = z.object({
  version: z.literal(1),
  records: z.array(
    z.object({
      id: z.string(),
      category: z.enum(RETRIEVAL_CATEGORIES),
      tags: z.array(z.string()),
      type: z.string(),
      text: z.string(),
      embedding: z.array(z.number()),
    }),
  ),
});

/**
 * Vector store persisted as a single JSON file. The file is read once,
 * lazily, and rewritten after every upsert.
 */
export class JsonVectorStore extends MemoryVectorStore {
  private loaded = false;

  constructor(private filePath: string) {
    super();
  }

  protected async ready(): Promise<void> {
    if (this.loaded) return;

    const raw = await this.readFile();
    if (raw !== null) {
      const parsed = RecordFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        throw new Error(`Vector store ${this.filePath} is corrupt: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      for (const record of parsed.data.records) {
        this.records.set(recordKey(record), record);
      }
    }
    this.loaded = true;
  }

  private async readFile(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      // fs errors can come from another realm, so match the shape rather than the class
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  protected async flush(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const body = { version: 1, records: [...this.records.values()] };
    await fs.writeFile(this.filePath, JSON.stringify(body), 'utf-8');
  }
}
