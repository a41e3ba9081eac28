import { posix } from 'node:path';
import fs from 'fs-extra';
import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { AppError, InvalidConfigurationError, NotFoundError, toErrorMessage } from './lib/errors';
import { chunkDocument } from './lib/ingestion/adapters/chunker';
import type { EmbeddingGenerator } from './lib/ingestion/adapters/embedding-generator';
import type { LocalBlobStorage } from './lib/ingestion/blob-storage';
import { extractTextFromFile } from './lib/ingestion/text-extraction';
import type { SearchService } from './lib/ingestion/search';
import type { OrchestrationEngine } from './lib/orchestration/engine';

export interface AppDependencies {
  engine: OrchestrationEngine;
  search: SearchService;
  embeddings: EmbeddingGenerator;
  storage: LocalBlobStorage;
}

const ERROR_STATUSES = [400, 404, 409, 422, 500, 502, 503] as const;

type ErrorStatus = (typeof ERROR_STATUSES)[number];

const DEFAULT_DIRECT_CHUNK_SIZE = 512;
const DEFAULT_DIRECT_CHUNK_OVERLAP = 128;

function isErrorStatus(code: number): code is ErrorStatus {
  return ERROR_STATUSES.some((status) => status === code);
}

function errorStatus(error: unknown): ErrorStatus {
  if (error instanceof AppError && isErrorStatus(error.statusCode)) {
    return error.statusCode;
  }
  return 500;
}

function respondWithError(c: Context, label: string, error: unknown) {
  const status = errorStatus(error);
  if (status >= 500) {
    console.error(`[api] ${label} error:`, error);
    return c.json({ error: `${label} failed`, details: toErrorMessage(error) }, status);
  }
  return c.json({ error: toErrorMessage(error) }, status);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (error) {
    throw new InvalidConfigurationError(`Request body must be valid JSON: ${toErrorMessage(error)}`);
  }
}

async function readJsonObject(c: Context): Promise<Record<string, unknown>> {
  const body = await readJson(c);
  if (!isRecord(body)) {
    throw new InvalidConfigurationError('Request body must be a JSON object');
  }
  return body;
}

function parseFlag(value: string | undefined): boolean {
  return value !== undefined && ['true', '1'].includes(value.toLowerCase());
}

function parseOptionalInt(name: string, value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidConfigurationError(`${name} must be a non-negative integer`);
  }
  return parsed;
}

function optionalString(name: string, value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidConfigurationError(`${name} must be a string`);
  }
  return value;
}

/** Path inside the container, as carried in a blob event subject after `/blobs/`. */
export function extractBlobPath(subject: string): string {
  const marker = '/blobs/';
  const index = subject.indexOf(marker);
  return index >= 0 ? subject.slice(index + marker.length) : subject;
}

type BlobEventResult =
  | { kind: 'validation'; validationCode: string }
  | { kind: 'started'; jobId: string }
  | { kind: 'skipped'; reason: string };

export function createApp(deps: AppDependencies) {
  const { engine, search, embeddings, storage } = deps;
  const app = new Hono();

  app.use('*', logger());
  app.use('*', cors());

  app.get('/', (c) => c.json({ status: 'ok', message: 'API is running' }));

  const api = new Hono();

  api.post('/index', async (c) => {
    try {
      const body = await readJsonObject(c);
      const jobId = await engine.startJob({
        sourcePrefixes: body.prefix_list,
        indexName: body.index_name ?? engine.config.indexName,
      });
      return c.json({ jobId, status: 'running', statusUrl: `/api/status?id=${encodeURIComponent(jobId)}` }, 202);
    } catch (error) {
      return respondWithError(c, 'Index request', error);
    }
  });

  const statusHandler = async (c: Context, jobId: string | undefined) => {
    try {
      if (!jobId) {
        return c.json({ jobs: await engine.listJobs() });
      }

      const status = await engine.getStatus(jobId);
      const historyEvents = parseFlag(c.req.query('show_history')) ? await engine.getHistory(jobId) : null;
      return c.json({ ...status, historyEvents });
    } catch (error) {
      return respondWithError(c, 'Status request', error);
    }
  };

  api.get('/status', (c) => statusHandler(c, c.req.query('id')));
  api.get('/status/:id', (c) => statusHandler(c, c.req.param('id')));

  api.post('/cancel', async (c) => {
    try {
      const jobId = c.req.query('id');
      if (!jobId) {
        return c.json({ error: 'Query parameter "id" is required' }, 400);
      }
      return c.json(await engine.cancelJob(jobId), 202);
    } catch (error) {
      return respondWithError(c, 'Cancel request', error);
    }
  });

  api.get('/search', async (c) => {
    const query = c.req.query('q');
    if (!query) {
      return c.json({ error: "Please provide a search query using the 'q' parameter." }, 400);
    }

    try {
      const results = await search.search({
        query,
        indexName: c.req.query('index_name') || undefined,
        top: parseOptionalInt('top', c.req.query('top')),
      });
      return c.json({ results });
    } catch (error) {
      return respondWithError(c, 'Search', error);
    }
  });

  api.post('/events/blob-created', async (c) => {
    try {
      const body = await readJson(c);
      const events = Array.isArray(body) ? body : [body];
      const results: BlobEventResult[] = [];

      for (const event of events) {
        if (!isRecord(event)) {
          results.push({ kind: 'skipped', reason: 'Event is not an object' });
          continue;
        }

        const data: Record<string, unknown> = isRecord(event.data) ? event.data : {};
        if (event.eventType === 'Microsoft.EventGrid.SubscriptionValidationEvent') {
          if (typeof data.validationCode === 'string') {
            results.push({ kind: 'validation', validationCode: data.validationCode });
          }
          continue;
        }

        if (data.api !== 'PutBlob' || typeof event.subject !== 'string') {
          console.log(`[api] Skipping blob event api=${String(data.api)}`);
          results.push({ kind: 'skipped', reason: 'Event is not a PutBlob' });
          continue;
        }

        const blobPath = extractBlobPath(event.subject);
        const jobId = await engine.startDocumentJob(blobPath);
        console.log(`[api] Started indexing job=${jobId} for blob="${blobPath}"`);
        results.push({ kind: 'started', jobId });
      }

      const validation = results.find((result) => result.kind === 'validation');
      if (validation?.kind === 'validation') {
        return c.json({ validationResponse: validation.validationCode });
      }

      const jobIds = results.flatMap((result) => (result.kind === 'started' ? [result.jobId] : []));
      const skipped = results.length - jobIds.length;
      return c.json({ jobIds, skipped }, jobIds.length > 0 ? 202 : 200);
    } catch (error) {
      return respondWithError(c, 'Blob event', error);
    }
  });

  api.get('/orchestration_health', async (c) => {
    const healthy = await engine.checkHealth();
    return healthy ? c.text('Healthy', 200) : c.text('Unhealthy', 503);
  });

  api.post('/v1/document/extract', async (c) => {
    try {
      let blobRef: string;
      let filename: string;
      if ((c.req.header('content-type') ?? '').includes('multipart/form-data')) {
        const form = await c.req.parseBody();
        const document = form.document;
        if (!(document instanceof File)) {
          return c.json({ error: 'No document provided' }, 400);
        }
        blobRef = await storage.saveUpload(document.name, new Uint8Array(await document.arrayBuffer()));
        filename = document.name;
      } else {
        const body = await readJsonObject(c);
        const documentUrl = optionalString('document_url', body.document_url);
        if (!documentUrl) {
          return c.json({ error: 'Document URL required' }, 400);
        }
        blobRef = storage.toBlobRef(documentUrl);
        filename = posix.basename(blobRef);
      }

      const filePath = storage.resolveBlob(blobRef);
      if (!(await fs.pathExists(filePath))) {
        throw new NotFoundError(`Blob ${blobRef} not found`);
      }

      const { pages } = await extractTextFromFile(filePath);
      return c.json({
        pages,
        filename,
        page_count: pages.length,
        total_text_length: pages.reduce((total, page) => total + page.length, 0),
      });
    } catch (error) {
      return respondWithError(c, 'Document extraction', error);
    }
  });

  api.post('/v1/text/chunk', async (c) => {
    try {
      const body = await readJsonObject(c);
      if (typeof body.text !== 'string') {
        return c.json({ error: 'Text content required' }, 400);
      }

      const chunkSize = parseOptionalInt('chunk_size', body.chunk_size) ?? DEFAULT_DIRECT_CHUNK_SIZE;
      if (chunkSize < 1) {
        return c.json({ error: 'chunk_size must be positive' }, 400);
      }

      const chunks = chunkDocument(
        {
          blobRef: optionalString('filename', body.filename) ?? 'user_text.txt',
          contentType: 'text/plain',
          pages: [body.text],
        },
        {
          maxChunkSize: chunkSize,
          overlap: parseOptionalInt('chunk_overlap', body.chunk_overlap) ?? DEFAULT_DIRECT_CHUNK_OVERLAP,
        }
      );
      return c.json({ chunks, chunk_count: chunks.length });
    } catch (error) {
      return respondWithError(c, 'Text chunking', error);
    }
  });

  api.post('/v1/embeddings/generate', async (c) => {
    try {
      const body = await readJsonObject(c);
      const texts = body.texts;
      if (!Array.isArray(texts) || !texts.every((text): text is string => typeof text === 'string')) {
        return c.json({ error: 'Text array required' }, 400);
      }

      const results: Array<{ text: string; embedding: number[]; dimensions: number; model: string }> = [];
      for (const text of texts) {
        const result = await embeddings.embed(text);
        results.push({ text, embedding: result.vector, dimensions: result.dimensions, model: result.model });
      }
      return c.json({ embeddings: results, provider: embeddings.id });
    } catch (error) {
      return respondWithError(c, 'Embedding generation', error);
    }
  });

  api.post('/v1/pipeline/process', async (c) => {
    try {
      const body = await readJsonObject(c);
      const documentUrl = optionalString('document_url', body.document_url);
      if (!documentUrl) {
        return c.json({ error: 'Document URL required' }, 400);
      }

      const jobId = await engine.startDocumentJob(
        storage.toBlobRef(documentUrl),
        optionalString('index_name', body.index_name) ?? engine.config.indexName
      );
      return c.json(
        { job_id: jobId, status: 'running', status_url: `/api/v1/jobs/${encodeURIComponent(jobId)}` },
        202
      );
    } catch (error) {
      return respondWithError(c, 'Pipeline processing', error);
    }
  });

  api.get('/v1/jobs/:jobId', async (c) => {
    try {
      const status = await engine.getStatus(c.req.param('jobId'));
      return c.json({
        job_id: status.jobId,
        status: status.status,
        created_time: status.createdAt,
        last_updated: status.updatedAt,
        ...(status.status === 'completed' ? { result: 'Document successfully processed and indexed' } : {}),
        ...(status.status === 'failed' ? { error: status.error } : {}),
      });
    } catch (error) {
      return respondWithError(c, 'Job status', error);
    }
  });

  app.route('/api', api);

  return app;
}
