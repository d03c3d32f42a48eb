export const RETRIEVAL_CATEGORIES = ['task_plans', 'code_templates', 'error_patterns'] as const;
export type RetrievalCategory = (typeof RETRIEVAL_CATEGORIES)[number];

export interface RetrievalMetadata {
  id: string;
  category: RetrievalCategory;
  tags: string[];
  type: string;
}

export interface RetrievalRecord extends RetrievalMetadata {
  text: string;
  embedding: number[];
}

export interface RetrievalHit {
  text: string;
  metadata: RetrievalMetadata;
  /** 1 - cosine distance; higher is closer */
  similarity: number;
}

export interface RetrievalInfo {
  totalDocuments: number;
  categories: Record<RetrievalCategory, number>;
  searches: number;
}

/** Read-only search surface handed to the agents */
export interface Retriever {
  search(queryText: string, category?: RetrievalCategory, topK?: number): Promise<RetrievalHit[]>;
}

export function isRetrievalCategory(value: string): value is RetrievalCategory {
  return RETRIEVAL_CATEGORIES.some((category) => category === value);
}

export function recordKey(metadata: Pick<RetrievalMetadata, 'category' | 'id'>): string {
  return `${metadata.category}_${metadata.id}`;
}
