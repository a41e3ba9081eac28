export type IndexedChunk = {
  id: string;
  documentId: string;
  content: string;
  sourcepages: string;
  storageUrl: string;
  section: string | null;
  model: string;
  vector: number[];
};

export type SearchHit = {
  id: string;
  content: string;
  sourcepages: string;
  storageUrl: string;
  score: number;
};

/**
 * Target of the IndexUpload activity. `upsert` is keyed by chunk id so a
 * repeated upload of the same document overwrites instead of duplicating.
 */
export interface SearchIndex {
  upsert(indexName: string, chunks: IndexedChunk[]): Promise<number>;
  search(indexName: string, vector: number[], top: number): Promise<SearchHit[]>;
}

export function sourcePage(documentId: string, pageNumber: number): string {
  return `${documentId}#page=${pageNumber}`;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB) + 1e-10);
}

export function rankChunks(chunks: Iterable<IndexedChunk>, vector: number[], top: number): SearchHit[] {
  const scored: SearchHit[] = [];
  for (const chunk of chunks) {
    scored.push({
      id: chunk.id,
      content: chunk.content,
      sourcepages: chunk.sourcepages,
      storageUrl: chunk.storageUrl,
      score: Number(cosineSimilarity(chunk.vector, vector).toFixed(4)),
    });
  }
  scored.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
  return scored.slice(0, Math.max(1, top));
}

export class InMemorySearchIndex implements SearchIndex {
  private readonly indexes = new Map<string, Map<string, IndexedChunk>>();

  async upsert(indexName: string, chunks: IndexedChunk[]): Promise<number> {
    const index = this.indexes.get(indexName) ?? new Map<string, IndexedChunk>();
    for (const chunk of chunks) {
      index.set(chunk.id, structuredClone(chunk));
    }
    this.indexes.set(indexName, index);
    return chunks.length;
  }

  async search(indexName: string, vector: number[], top: number): Promise<SearchHit[]> {
    const index = this.indexes.get(indexName);
    if (!index) {
      return [];
    }
    return rankChunks(index.values(), vector, top);
  }

  size(indexName: string): number {
    return this.indexes.get(indexName)?.size ?? 0;
  }
}
