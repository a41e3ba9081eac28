import { describe, expect, it } from 'vitest';
import { chunkDocument } from '../adapters/chunker';
import type { DocumentText } from '../../orchestration/types';

function document(pages: string[]): DocumentText {
  return { blobRef: 'docs/sample.md', contentType: 'text/markdown', pages };
}

describe('chunkDocument', () => {
  it('cuts overlapping fixed-size windows with contiguous sequences', () => {
    const chunks = chunkDocument(document(['abcdefghij']), { maxChunkSize: 4, overlap: 1 });

    expect(chunks.map((chunk) => chunk.text)).toEqual(['abcd', 'defg', 'ghij']);
    expect(chunks.map((chunk) => chunk.sequence)).toEqual([0, 1, 2]);
    expect(chunks.map((chunk) => [chunk.startOffset, chunk.endOffset])).toEqual([
      [0, 4],
      [3, 7],
      [6, 10],
    ]);
    expect(chunks.every((chunk) => chunk.documentId === 'docs/sample.md' && chunk.pageNumber === 1)).toBe(true);
  });

  it('reports UTF-8 byte offsets across pages', () => {
    const chunks = chunkDocument(document(['héllo', 'wörld']), { maxChunkSize: 10, overlap: 0 });

    expect(chunks).toEqual([
      {
        documentId: 'docs/sample.md',
        sequence: 0,
        text: 'héllo',
        startOffset: 0,
        endOffset: 6,
        pageNumber: 1,
      },
      {
        documentId: 'docs/sample.md',
        sequence: 1,
        text: 'wörld',
        startOffset: 8,
        endOffset: 14,
        pageNumber: 2,
      },
    ]);
  });

  it('tracks the nearest markdown heading as the section', () => {
    const chunks = chunkDocument(document(['# Intro\naaaa\n## Next\nbbbb', 'tail']), {
      maxChunkSize: 13,
      overlap: 0,
    });

    expect(chunks.map((chunk) => [chunk.text, chunk.section])).toEqual([
      ['# Intro\naaaa\n', 'Intro'],
      ['## Next\nbbbb', 'Next'],
      ['tail', 'Next'],
    ]);
  });

  it('skips whitespace-only windows without leaving sequence gaps', () => {
    const chunks = chunkDocument(document(['   ', 'text']), { maxChunkSize: 10, overlap: 0 });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ sequence: 0, text: 'text', pageNumber: 2, startOffset: 5, endOffset: 9 });
  });

  it('returns no chunks for a document without text', () => {
    expect(chunkDocument(document(['', ' \n ']), { maxChunkSize: 10, overlap: 2 })).toEqual([]);
  });
});
