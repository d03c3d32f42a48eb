import type { RetrievalHit } from '../retrieval/types';

export interface GroundingSection {
  title: string;
  hits: RetrievalHit[];
  /** Per-hit character budget */
  maxChars: number;
}

export class ContextBuilder {
  /**
   * Formats retrieved examples as prompt context. Returns an empty string
   * when nothing was retrieved, so prompts can fall back to their defaults.
   */
  static build(sections: GroundingSection[]): string {
    const parts: string[] = [];

    for (const section of sections) {
      if (section.hits.length === 0) continue;
      const body = section.hits
        .map((hit, i) => {
          const tags = hit.metadata.tags.length ? ` [${hit.metadata.tags.join(', ')}]` : '';
          return `--- EXAMPLE ${i + 1} (${hit.metadata.type}${tags}) ---\n${truncate(hit.text, section.maxChars)}\n--- END EXAMPLE ---`;
        })
        .join('\n\n');
      parts.push(`${section.title}:\n${body}`);
    }

    return parts.join('\n\n').trim();
  }
}

export function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}
