import type { AppConfig } from './config';
import { getDatabase } from './db';
import { createIngestionActivities } from './ingestion/activities';
import { createEmbeddingGenerator, type EmbeddingGenerator } from './ingestion/adapters/embedding-generator';
import { InMemorySearchIndex, type SearchIndex } from './ingestion/adapters/search-index';
import { LocalBlobStorage } from './ingestion/blob-storage';
import { createSearchService, type SearchService } from './ingestion/search';
import { OrchestrationEngine } from './orchestration/engine';
import { InMemoryReplayLog, type ReplayLog } from './orchestration/replay-log';
import { InMemoryStatusStore, type StatusStore } from './orchestration/status-store';
import { PostgresReplayLog } from './persistence/postgres-replay-log';
import { PostgresSearchIndex } from './persistence/postgres-search-index';
import { PostgresStatusStore } from './persistence/postgres-status-store';

export interface Services {
  engine: OrchestrationEngine;
  search: SearchService;
  embeddings: EmbeddingGenerator;
  storage: LocalBlobStorage;
}

type StateStores = {
  replayLog: ReplayLog;
  statusStore: StatusStore;
  searchIndex: SearchIndex;
};

async function createStateStores(config: Readonly<AppConfig>): Promise<StateStores> {
  if (config.stateBackend === 'postgres' && config.databaseUrl) {
    const db = await getDatabase(config.databaseUrl);
    return {
      replayLog: new PostgresReplayLog(db),
      statusStore: new PostgresStatusStore(db),
      searchIndex: new PostgresSearchIndex(db),
    };
  }

  return {
    replayLog: new InMemoryReplayLog(),
    statusStore: new InMemoryStatusStore(),
    searchIndex: new InMemorySearchIndex(),
  };
}

/**
 * Wires the engine, its activity handlers and the search service from one config.
 */
export async function createServices(config: Readonly<AppConfig>): Promise<Services> {
  const stores = await createStateStores(config);
  const storage = new LocalBlobStorage({
    root: config.blobStorageRoot,
    container: config.sourceContainer,
    pageSize: config.listPageSize,
  });
  await storage.ensureContainer();

  const embeddings = createEmbeddingGenerator(config.embeddingProvider, {
    ollama: { baseUrl: config.ollamaBaseUrl, model: config.ollamaEmbeddingModel },
  });

  const engine = new OrchestrationEngine({
    config,
    handlers: createIngestionActivities({
      storage,
      embeddings,
      searchIndex: stores.searchIndex,
      chunkOverlap: config.chunkOverlap,
    }),
    replayLog: stores.replayLog,
    statusStore: stores.statusStore,
  });

  return {
    engine,
    search: createSearchService({
      embeddings,
      searchIndex: stores.searchIndex,
      defaultIndexName: config.indexName,
    }),
    embeddings,
    storage,
  };
}
