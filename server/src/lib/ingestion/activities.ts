import fs from 'fs-extra';
import { ActivityError } from '../errors';
import type { ActivityHandlers } from '../orchestration/activities';
import { chunkId } from '../orchestration/types';
import type { LocalBlobStorage } from './blob-storage';
import { chunkDocument } from './adapters/chunker';
import type { EmbeddingGenerator } from './adapters/embedding-generator';
import { sourcePage, type IndexedChunk, type SearchIndex } from './adapters/search-index';
import { extractTextFromFile } from './text-extraction';

export interface IngestionDependencies {
  storage: LocalBlobStorage;
  embeddings: EmbeddingGenerator;
  searchIndex: SearchIndex;
  chunkOverlap: number;
}

/**
 * Binds the engine's activity contracts to the local blob container, the
 * configured embedding provider and the search index.
 */
export function createIngestionActivities(deps: IngestionDependencies): ActivityHandlers {
  const { storage, embeddings, searchIndex, chunkOverlap } = deps;

  return {
    listDocuments: (prefix, cursor) => storage.listPage(prefix, cursor),

    async extract(blobRef) {
      const filePath = storage.resolveBlob(blobRef);
      if (!(await fs.pathExists(filePath))) {
        throw ActivityError.permanent(`Blob ${blobRef} not found`);
      }

      const startedMs = Date.now();
      const extracted = await extractTextFromFile(filePath);
      console.log(
        `[ingestion][timing] phase=extract blob="${blobRef}" pages=${extracted.pages.length} durationMs=${Date.now() - startedMs}`
      );
      return { blobRef, ...extracted };
    },

    async chunk(text, maxChunkSize) {
      return chunkDocument(text, { maxChunkSize, overlap: chunkOverlap });
    },

    async embed(chunk, signal) {
      const result = await embeddings.embed(chunk.text, signal);
      return { chunkId: chunkId(chunk), model: result.model, vector: result.vector };
    },

    async indexUpload(indexName, entries) {
      const chunks: IndexedChunk[] = entries.map(({ chunk, embedding }) => ({
        id: embedding.chunkId,
        documentId: chunk.documentId,
        content: chunk.text,
        sourcepages: sourcePage(chunk.documentId, chunk.pageNumber),
        storageUrl: storage.storageUrl(chunk.documentId),
        section: chunk.section ?? null,
        model: embedding.model,
        vector: embedding.vector,
      }));
      const uploaded = await searchIndex.upsert(indexName, chunks);
      return { indexName, uploaded };
    },
  };
}
