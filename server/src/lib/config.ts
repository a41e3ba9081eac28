import { resolve } from 'node:path';
import { getDatabaseUrl, getEnv, getIntEnv } from './env';
import type { EngineConfig } from './orchestration/engine';

export const EMBEDDING_PROVIDERS = ['deterministic-emb-v1', 'ollama-emb-v1'] as const;

export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

export type StateBackend = 'memory' | 'postgres';

export interface AppConfig extends EngineConfig {
  port: number;
  sourceContainer: string;
  blobStorageRoot: string;
  listPageSize: number;
  chunkOverlap: number;
  embeddingProvider: EmbeddingProvider;
  ollamaBaseUrl: string;
  ollamaEmbeddingModel: string;
  stateBackend: StateBackend;
  databaseUrl: string | undefined;
}

function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return EMBEDDING_PROVIDERS.some((provider) => provider === value);
}

function requirePositive(name: string, value: number): number {
  if (value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Builds the immutable configuration threaded into the engine and adapters.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): Readonly<AppConfig> {
  const embeddingProvider = getEnv('EMBEDDING_PROVIDER', 'deterministic-emb-v1', source);
  if (!isEmbeddingProvider(embeddingProvider)) {
    throw new Error(
      `Unknown embedding provider "${embeddingProvider}". Expected one of: ${EMBEDDING_PROVIDERS.join(', ')}`
    );
  }

  const databaseUrl = getDatabaseUrl(source);
  const backend = getEnv('STATE_BACKEND', databaseUrl ? 'postgres' : 'memory', source);
  if (backend !== 'memory' && backend !== 'postgres') {
    throw new Error(`STATE_BACKEND must be "memory" or "postgres", got "${backend}"`);
  }
  if (backend === 'postgres' && !databaseUrl) {
    throw new Error('STATE_BACKEND=postgres requires DATABASE_URL');
  }

  const maxChunkSize = requirePositive('MAX_CHUNK_SIZE', getIntEnv('MAX_CHUNK_SIZE', 1_000, source));
  const chunkOverlap = Math.max(0, getIntEnv('CHUNK_OVERLAP', 100, source));

  return Object.freeze({
    parallelism: requirePositive('BLOB_AMOUNT_PARALLEL', getIntEnv('BLOB_AMOUNT_PARALLEL', 20, source)),
    maxRetryAttempts: requirePositive('MAX_RETRY_ATTEMPTS', getIntEnv('MAX_RETRY_ATTEMPTS', 5, source)),
    retryBaseDelayMs: Math.max(0, getIntEnv('RETRY_BASE_DELAY_MS', 1_000, source)),
    retryMaxDelayMs: Math.max(0, getIntEnv('RETRY_MAX_DELAY_MS', 30_000, source)),
    indexName: getEnv('SEARCH_INDEX_NAME', 'default-index', source),
    maxChunkSize,
    chunkOverlap: Math.min(chunkOverlap, maxChunkSize - 1),
    port: getIntEnv('PORT', 8787, source),
    sourceContainer: getEnv('BLOB_CONTAINER_NAME', 'source', source),
    blobStorageRoot: resolve(getEnv('BLOB_STORAGE_ROOT', './storage', source)),
    listPageSize: requirePositive('LIST_PAGE_SIZE', getIntEnv('LIST_PAGE_SIZE', 100, source)),
    embeddingProvider,
    ollamaBaseUrl: getEnv('OLLAMA_BASE_URL', 'http://127.0.0.1:11434', source),
    ollamaEmbeddingModel: getEnv('OLLAMA_EMBEDDING_MODEL', 'mxbai-embed-large', source),
    stateBackend: backend,
    databaseUrl,
  });
}
