import {
  isTerminalJobStatus,
  isTerminalStage,
  stageRank,
  type DocumentRecord,
  type JobRecord,
  type JobStatus,
  type StatusRecord,
} from './types';

/**
 * Externally queryable projection of job and document state.
 *
 * Implementations must ignore a document write that would move its stage
 * backwards (or touch a terminal document) and must keep terminal job
 * records unchanged.
 */
export interface StatusStore {
  putJob(record: JobRecord): Promise<void>;
  putDocument(record: DocumentRecord): Promise<void>;
  get(jobId: string): Promise<StatusRecord | null>;
  listJobs(filter?: { status?: JobStatus }): Promise<JobRecord[]>;
}

export function acceptsDocumentUpdate(current: DocumentRecord | undefined, next: DocumentRecord): boolean {
  if (!current) {
    return true;
  }

  if (isTerminalStage(current.stage)) {
    return false;
  }

  return stageRank(next.stage) >= stageRank(current.stage);
}

export function acceptsJobUpdate(current: JobRecord | undefined): boolean {
  return !current || !isTerminalJobStatus(current.status);
}

type StoredJob = {
  job: JobRecord;
  documents: Map<string, DocumentRecord>;
};

export class InMemoryStatusStore implements StatusStore {
  private readonly jobs = new Map<string, StoredJob>();

  async putJob(record: JobRecord): Promise<void> {
    const stored = this.jobs.get(record.jobId);
    if (!acceptsJobUpdate(stored?.job)) {
      return;
    }

    this.jobs.set(record.jobId, {
      job: structuredClone(record),
      documents: stored?.documents ?? new Map(),
    });
  }

  async putDocument(record: DocumentRecord): Promise<void> {
    const stored = this.jobs.get(record.jobId);
    if (!stored) {
      throw new Error(`Cannot record document ${record.documentId} for unknown job ${record.jobId}`);
    }

    if (!acceptsDocumentUpdate(stored.documents.get(record.instanceId), record)) {
      return;
    }

    stored.documents.set(record.instanceId, structuredClone(record));
  }

  async get(jobId: string): Promise<StatusRecord | null> {
    const stored = this.jobs.get(jobId);
    if (!stored) {
      return null;
    }

    const documents = Array.from(stored.documents.values())
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((document) => structuredClone(document));

    return { ...structuredClone(stored.job), documents };
  }

  async listJobs(filter: { status?: JobStatus } = {}): Promise<JobRecord[]> {
    return Array.from(this.jobs.values())
      .map((stored) => stored.job)
      .filter((job) => !filter.status || job.status === filter.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((job) => structuredClone(job));
  }
}
