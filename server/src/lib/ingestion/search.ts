import { InvalidConfigurationError } from '../errors';
import type { EmbeddingGenerator } from './adapters/embedding-generator';
import type { SearchHit, SearchIndex } from './adapters/search-index';

export const DEFAULT_SEARCH_TOP = 5;
const MAX_SEARCH_TOP = 50;

export type SearchRequest = {
  query: string;
  indexName?: string;
  top?: number;
};

export interface SearchService {
  search(request: SearchRequest): Promise<SearchHit[]>;
}

/**
 * Embeds the query with the indexing provider and ranks stored chunks against it.
 */
export function createSearchService(deps: {
  embeddings: EmbeddingGenerator;
  searchIndex: SearchIndex;
  defaultIndexName: string;
}): SearchService {
  return {
    async search({ query, indexName, top }) {
      const trimmed = query.trim();
      if (!trimmed) {
        throw new InvalidConfigurationError('Search query must not be empty');
      }

      const limit = Math.max(1, Math.min(MAX_SEARCH_TOP, top ?? DEFAULT_SEARCH_TOP));
      const { vector } = await deps.embeddings.embed(trimmed);
      return deps.searchIndex.search(indexName ?? deps.defaultIndexName, vector, limit);
    },
  };
}
