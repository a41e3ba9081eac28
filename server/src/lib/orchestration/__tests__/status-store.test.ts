import { describe, expect, it } from 'vitest';
import { InMemoryStatusStore, acceptsDocumentUpdate } from '../status-store';
import type { DocumentRecord, DocumentStage, JobRecord } from '../types';

function job(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    jobId: 'job-1',
    indexName: 'test-index',
    sourcePrefixes: ['docs/'],
    status: 'running',
    total: 0,
    succeeded: 0,
    failed: 0,
    pending: 0,
    listingComplete: false,
    error: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    completedAt: null,
    ...overrides,
  };
}

function document(stage: DocumentStage, overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    jobId: 'job-1',
    instanceId: 'job-1:doc:0',
    documentId: 'docs/a.txt',
    ordinal: 0,
    stage,
    retries: {},
    lastError: null,
    failedStage: null,
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('acceptsDocumentUpdate', () => {
  it('accepts forward and same-stage writes only', () => {
    expect(acceptsDocumentUpdate(undefined, document('chunking'))).toBe(true);
    expect(acceptsDocumentUpdate(document('chunking'), document('chunking'))).toBe(true);
    expect(acceptsDocumentUpdate(document('chunking'), document('embedding'))).toBe(true);
    expect(acceptsDocumentUpdate(document('chunking'), document('extracted'))).toBe(false);
    expect(acceptsDocumentUpdate(document('indexed'), document('failed'))).toBe(false);
  });
});

describe('InMemoryStatusStore', () => {
  it('ignores a document write that moves backwards', async () => {
    const store = new InMemoryStatusStore();
    await store.putJob(job());
    await store.putDocument(document('embedding'));
    await store.putDocument(document('chunked'));

    expect((await store.get('job-1'))?.documents.map((entry) => entry.stage)).toEqual(['embedding']);
  });

  it('lets same-stage writes update retry counts', async () => {
    const store = new InMemoryStatusStore();
    await store.putJob(job());
    await store.putDocument(document('embedding'));
    await store.putDocument(document('embedding', { retries: { embed: 1 } }));

    expect((await store.get('job-1'))?.documents[0].retries).toEqual({ embed: 1 });
  });

  it('keeps a terminal job record unchanged', async () => {
    const store = new InMemoryStatusStore();
    await store.putJob(job({ status: 'completed', succeeded: 2, total: 2 }));
    await store.putJob(job({ status: 'running', succeeded: 1, total: 2 }));

    expect(await store.get('job-1')).toMatchObject({ status: 'completed', succeeded: 2 });
  });

  it('returns documents ordered by ordinal', async () => {
    const store = new InMemoryStatusStore();
    await store.putJob(job());
    await store.putDocument(document('listed', { instanceId: 'job-1:doc:1', documentId: 'docs/b.txt', ordinal: 1 }));
    await store.putDocument(document('listed'));

    expect((await store.get('job-1'))?.documents.map((entry) => entry.documentId)).toEqual([
      'docs/a.txt',
      'docs/b.txt',
    ]);
  });

  it('throws for a document of an unknown job and returns null for an unknown id', async () => {
    const store = new InMemoryStatusStore();

    await expect(store.putDocument(document('listed'))).rejects.toThrow(
      'Cannot record document docs/a.txt for unknown job job-1'
    );
    expect(await store.get('missing')).toBeNull();
  });

  it('lists jobs newest first and filters by status', async () => {
    const store = new InMemoryStatusStore();
    await store.putJob(job({ jobId: 'old', createdAt: '2026-01-01T00:00:00.000Z' }));
    await store.putJob(job({ jobId: 'new', createdAt: '2026-01-02T00:00:00.000Z', status: 'failed' }));

    expect((await store.listJobs()).map((entry) => entry.jobId)).toEqual(['new', 'old']);
    expect((await store.listJobs({ status: 'running' })).map((entry) => entry.jobId)).toEqual(['old']);
  });
});
