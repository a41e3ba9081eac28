import { describe, expect, it } from 'vitest';
import { cosineSimilarity, InMemorySearchIndex, sourcePage, type IndexedChunk } from '../adapters/search-index';

function chunk(id: string, vector: number[], content = `content of ${id}`): IndexedChunk {
  return {
    id,
    documentId: 'docs/a.txt',
    content,
    sourcepages: sourcePage('docs/a.txt', 1),
    storageUrl: 'file:///storage/source/docs/a.txt',
    section: null,
    model: 'deterministic-emb-v1',
    vector,
  };
}

describe('InMemorySearchIndex', () => {
  it('ranks chunks by cosine similarity', async () => {
    const index = new InMemorySearchIndex();
    await index.upsert('test-index', [chunk('docs/a.txt#0', [1, 0]), chunk('docs/a.txt#1', [0, 1])]);

    const hits = await index.search('test-index', [1, 0], 2);

    expect(hits).toEqual([
      {
        id: 'docs/a.txt#0',
        content: 'content of docs/a.txt#0',
        sourcepages: 'docs/a.txt#page=1',
        storageUrl: 'file:///storage/source/docs/a.txt',
        score: 1,
      },
      {
        id: 'docs/a.txt#1',
        content: 'content of docs/a.txt#1',
        sourcepages: 'docs/a.txt#page=1',
        storageUrl: 'file:///storage/source/docs/a.txt',
        score: 0,
      },
    ]);
  });

  it('overwrites chunks with the same id', async () => {
    const index = new InMemorySearchIndex();
    await index.upsert('test-index', [chunk('docs/a.txt#0', [1, 0], 'old')]);
    await index.upsert('test-index', [chunk('docs/a.txt#0', [1, 0], 'new')]);

    expect(index.size('test-index')).toBe(1);
    const [hit] = await index.search('test-index', [1, 0], 5);
    expect(hit.content).toBe('new');
  });

  it('keeps indexes apart', async () => {
    const index = new InMemorySearchIndex();
    await index.upsert('first', [chunk('docs/a.txt#0', [1, 0])]);

    await expect(index.search('second', [1, 0], 5)).resolves.toEqual([]);
  });

  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 1], [1, 1])).toBeCloseTo(1, 8);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1, 8);
  });
});
