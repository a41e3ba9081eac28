import { and, asc, desc, eq, lte, notInArray, sql } from 'drizzle-orm';
import { documentTasks, type DocumentTask } from '../../schema/document-tasks';
import { indexingJobs, type IndexingJob } from '../../schema/indexing-jobs';
import type { Database } from '../db';
import type { StatusStore } from '../orchestration/status-store';
import {
  stageRank,
  TERMINAL_STAGES,
  type DocumentRecord,
  type JobRecord,
  type JobStatus,
  type StatusRecord,
} from '../orchestration/types';

function toJobRecord(row: IndexingJob): JobRecord {
  return {
    jobId: row.job_id,
    indexName: row.index_name,
    sourcePrefixes: row.source_prefixes,
    status: row.status,
    total: row.total,
    succeeded: row.succeeded,
    failed: row.failed,
    pending: row.pending,
    listingComplete: row.listing_complete,
    error: row.error,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    completedAt: row.completed_at?.toISOString() ?? null,
  };
}

function toDocumentRecord(row: DocumentTask): DocumentRecord {
  return {
    jobId: row.job_id,
    instanceId: row.instance_id,
    documentId: row.document_id,
    ordinal: row.ordinal,
    stage: row.stage,
    retries: row.retries,
    lastError: row.last_error,
    failedStage: row.failed_stage,
    updatedAt: row.updated_at.toISOString(),
  };
}

/**
 * Status projection on `app.indexing_jobs` and `app.document_tasks`. The
 * monotonic-stage and terminal-job rules are enforced in the upsert itself
 * so concurrent writers cannot regress a row.
 */
export class PostgresStatusStore implements StatusStore {
  constructor(private readonly db: Database) {}

  async putJob(record: JobRecord): Promise<void> {
    const values = {
      index_name: record.indexName,
      source_prefixes: record.sourcePrefixes,
      status: record.status,
      total: record.total,
      succeeded: record.succeeded,
      failed: record.failed,
      pending: record.pending,
      listing_complete: record.listingComplete,
      error: record.error,
      updated_at: new Date(record.updatedAt),
      completed_at: record.completedAt ? new Date(record.completedAt) : null,
    };

    await this.db
      .insert(indexingJobs)
      .values({ job_id: record.jobId, created_at: new Date(record.createdAt), ...values })
      .onConflictDoUpdate({
        target: indexingJobs.job_id,
        set: values,
        setWhere: eq(indexingJobs.status, 'running'),
      });
  }

  async putDocument(record: DocumentRecord): Promise<void> {
    const values = {
      stage: record.stage,
      stage_rank: stageRank(record.stage),
      retries: record.retries,
      last_error: record.lastError,
      failed_stage: record.failedStage,
      updated_at: new Date(record.updatedAt),
    };

    await this.db
      .insert(documentTasks)
      .values({
        instance_id: record.instanceId,
        job_id: record.jobId,
        document_id: record.documentId,
        ordinal: record.ordinal,
        ...values,
      })
      .onConflictDoUpdate({
        target: documentTasks.instance_id,
        set: values,
        setWhere: and(
          notInArray(documentTasks.stage, Array.from(TERMINAL_STAGES)),
          lte(documentTasks.stage_rank, sql`excluded.stage_rank`)
        ),
      });
  }

  async get(jobId: string): Promise<StatusRecord | null> {
    const [job] = await this.db.select().from(indexingJobs).where(eq(indexingJobs.job_id, jobId)).limit(1);
    if (!job) {
      return null;
    }

    const documents = await this.db
      .select()
      .from(documentTasks)
      .where(eq(documentTasks.job_id, jobId))
      .orderBy(asc(documentTasks.ordinal));

    return { ...toJobRecord(job), documents: documents.map(toDocumentRecord) };
  }

  async listJobs(filter: { status?: JobStatus } = {}): Promise<JobRecord[]> {
    const rows = await this.db
      .select()
      .from(indexingJobs)
      .where(filter.status ? eq(indexingJobs.status, filter.status) : undefined)
      .orderBy(desc(indexingJobs.created_at));
    return rows.map(toJobRecord);
  }
}
