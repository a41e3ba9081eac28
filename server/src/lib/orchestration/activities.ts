import type {
  ActivityRequest,
  ActivityResult,
  ChunkRecord,
  DocumentPage,
  DocumentText,
  EmbeddingVector,
  IndexAck,
  IndexEntry,
} from './types';

/**
 * External collaborators the engine drives. One handler per activity kind;
 * handlers may throw {@link ActivityError} to state whether a failure is retryable.
 */
export interface ActivityHandlers {
  listDocuments(prefix: string, cursor: string | null, signal: AbortSignal): Promise<DocumentPage>;
  extract(blobRef: string, signal: AbortSignal): Promise<DocumentText>;
  chunk(text: DocumentText, maxChunkSize: number, signal: AbortSignal): Promise<ChunkRecord[]>;
  embed(chunk: ChunkRecord, signal: AbortSignal): Promise<EmbeddingVector>;
  indexUpload(indexName: string, entries: IndexEntry[], signal: AbortSignal): Promise<IndexAck>;
}

export async function runActivity(
  handlers: ActivityHandlers,
  request: ActivityRequest,
  signal: AbortSignal
): Promise<ActivityResult> {
  switch (request.kind) {
    case 'listDocuments':
      return {
        kind: 'listDocuments',
        page: await handlers.listDocuments(request.prefix, request.cursor, signal),
      };
    case 'extract':
      return { kind: 'extract', text: await handlers.extract(request.blobRef, signal) };
    case 'chunk':
      return {
        kind: 'chunk',
        chunks: await handlers.chunk(request.text, request.maxChunkSize, signal),
      };
    case 'embed':
      return { kind: 'embed', embedding: await handlers.embed(request.chunk, signal) };
    case 'indexUpload':
      return {
        kind: 'indexUpload',
        ack: await handlers.indexUpload(request.indexName, request.entries, signal),
      };
  }
}
