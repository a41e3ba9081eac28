import type { ErrorKind } from '../errors';

export const DOCUMENT_STAGES = [
  'listed',
  'extracting',
  'extracted',
  'chunking',
  'chunked',
  'embedding',
  'embedded',
  'indexing',
  'indexed',
  'failed',
] as const;

export type DocumentStage = (typeof DOCUMENT_STAGES)[number];

export const TERMINAL_STAGES: ReadonlySet<DocumentStage> = new Set(['indexed', 'failed']);

export function isTerminalStage(stage: DocumentStage): boolean {
  return TERMINAL_STAGES.has(stage);
}

/**
 * Position of a stage in the forward order. `failed` ranks last so a
 * failure is always a forward move.
 */
export function stageRank(stage: DocumentStage): number {
  return DOCUMENT_STAGES.indexOf(stage);
}

export const JOB_STATUSES = ['running', 'completed', 'failed', 'cancelled'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export function isTerminalJobStatus(status: JobStatus): boolean {
  return status !== 'running';
}

export const ACTIVITY_KINDS = ['listDocuments', 'extract', 'chunk', 'embed', 'indexUpload'] as const;

export type ActivityKind = (typeof ACTIVITY_KINDS)[number];

export type DocumentText = {
  blobRef: string;
  contentType: string;
  pages: string[];
};

export type ChunkRecord = {
  documentId: string;
  sequence: number;
  text: string;
  startOffset: number;
  endOffset: number;
  pageNumber: number;
  section?: string;
};

export type EmbeddingVector = {
  chunkId: string;
  model: string;
  vector: number[];
};

export type IndexEntry = {
  chunk: ChunkRecord;
  embedding: EmbeddingVector;
};

export type IndexAck = {
  indexName: string;
  uploaded: number;
};

export type DocumentPage = {
  documents: string[];
  nextCursor: string | null;
};

export function chunkId(chunk: Pick<ChunkRecord, 'documentId' | 'sequence'>): string {
  return `${chunk.documentId}#${chunk.sequence}`;
}

export type ActivityRequest =
  | { kind: 'listDocuments'; prefix: string; cursor: string | null }
  | { kind: 'extract'; blobRef: string }
  | { kind: 'chunk'; text: DocumentText; maxChunkSize: number }
  | { kind: 'embed'; chunk: ChunkRecord }
  | { kind: 'indexUpload'; indexName: string; entries: IndexEntry[] };

export type ActivityResult =
  | { kind: 'listDocuments'; page: DocumentPage }
  | { kind: 'extract'; text: DocumentText }
  | { kind: 'chunk'; chunks: ChunkRecord[] }
  | { kind: 'embed'; embedding: EmbeddingVector }
  | { kind: 'indexUpload'; ack: IndexAck };

export type ActivityOutcome =
  | { outcome: 'completed'; result: ActivityResult }
  | { outcome: 'retrying'; error: string; retryAfterMs: number }
  | { outcome: 'failed'; error: string; errorKind: ErrorKind; exhausted: boolean };

export type ReplayEvent =
  | {
      type: 'job-started';
      jobId: string;
      indexName: string;
      sourcePrefixes: string[];
      documentRefs?: string[];
      createdAt: string;
    }
  | { type: 'job-cancelled'; reason: string }
  | { type: 'job-finished'; status: JobStatus }
  | { type: 'stage'; stage: DocumentStage; error?: string; failedStage?: DocumentStage }
  | ({ type: 'activity'; activityId: string; activity: ActivityKind; attempt: number } & ActivityOutcome);

export type ReplayEntry = {
  instanceId: string;
  sequence: number;
  recordedAt: string;
  event: ReplayEvent;
};

export type RetryCounts = Partial<Record<ActivityKind, number>>;

export type JobRecord = {
  jobId: string;
  indexName: string;
  sourcePrefixes: string[];
  status: JobStatus;
  total: number;
  succeeded: number;
  failed: number;
  pending: number;
  listingComplete: boolean;
  error: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
};

export type DocumentRecord = {
  jobId: string;
  instanceId: string;
  documentId: string;
  ordinal: number;
  stage: DocumentStage;
  retries: RetryCounts;
  lastError: string | null;
  failedStage: DocumentStage | null;
  updatedAt: string;
};

export type StatusRecord = JobRecord & {
  documents: DocumentRecord[];
};
