import { eq, sql } from 'drizzle-orm';
import { indexDocuments } from '../../schema/index-documents';
import type { Database } from '../db';
import {
  rankChunks,
  type IndexedChunk,
  type SearchHit,
  type SearchIndex,
} from '../ingestion/adapters/search-index';

/**
 * Search index on `app.index_documents`. Vectors are stored as jsonb and
 * ranked in process.
 */
export class PostgresSearchIndex implements SearchIndex {
  constructor(private readonly db: Database) {}

  async upsert(indexName: string, chunks: IndexedChunk[]): Promise<number> {
    if (chunks.length === 0) {
      return 0;
    }

    const now = new Date();
    await this.db
      .insert(indexDocuments)
      .values(
        chunks.map((chunk) => ({
          id: `${indexName}/${chunk.id}`,
          index_name: indexName,
          chunk_id: chunk.id,
          document_id: chunk.documentId,
          content: chunk.content,
          sourcepages: chunk.sourcepages,
          storage_url: chunk.storageUrl,
          section: chunk.section,
          embedding_model: chunk.model,
          embedding_dim: chunk.vector.length,
          embedding: chunk.vector,
          created_at: now,
          updated_at: now,
        }))
      )
      .onConflictDoUpdate({
        target: indexDocuments.id,
        set: {
          content: sql`excluded.content`,
          sourcepages: sql`excluded.sourcepages`,
          storage_url: sql`excluded.storage_url`,
          section: sql`excluded.section`,
          embedding_model: sql`excluded.embedding_model`,
          embedding_dim: sql`excluded.embedding_dim`,
          embedding: sql`excluded.embedding`,
          updated_at: now,
        },
      });

    return chunks.length;
  }

  async search(indexName: string, vector: number[], top: number): Promise<SearchHit[]> {
    const rows = await this.db.select().from(indexDocuments).where(eq(indexDocuments.index_name, indexName));

    return rankChunks(
      rows.map((row) => ({
        id: row.chunk_id,
        documentId: row.document_id,
        content: row.content,
        sourcepages: row.sourcepages,
        storageUrl: row.storage_url,
        section: row.section,
        model: row.embedding_model,
        vector: row.embedding,
      })),
      vector,
      top
    );
  }
}
