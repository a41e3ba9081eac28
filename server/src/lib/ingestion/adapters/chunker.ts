import type { ChunkRecord, DocumentText } from '../../orchestration/types';

export const PAGE_SEPARATOR = '\n\n';

export interface ChunkerOptions {
  maxChunkSize: number;
  overlap: number;
}

type Heading = {
  index: number;
  title: string;
};

const HEADING_PATTERN = /^#{1,6}[ \t]+(.+?)[ \t#]*$/gm;

function findHeadings(page: string): Heading[] {
  const headings: Heading[] = [];
  for (const match of page.matchAll(HEADING_PATTERN)) {
    if (match.index !== undefined) {
      headings.push({ index: match.index, title: match[1].trim() });
    }
  }
  return headings;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Moves a cut point off the middle of a surrogate pair. */
function safeBoundary(text: string, index: number): number {
  if (index > 0 && index < text.length && isHighSurrogate(text.charCodeAt(index - 1))) {
    return index + 1;
  }
  return index;
}

/**
 * Fixed-size windows with overlap, cut per page so every chunk keeps its page
 * number. Offsets are UTF-8 byte offsets into the pages joined by
 * {@link PAGE_SEPARATOR}. Whitespace-only windows are dropped; sequence
 * numbers stay contiguous.
 */
export function chunkDocument(document: DocumentText, options: ChunkerOptions): ChunkRecord[] {
  const size = Math.max(1, options.maxChunkSize);
  const step = Math.max(1, size - Math.max(0, options.overlap));
  const separatorBytes = Buffer.byteLength(PAGE_SEPARATOR);

  const chunks: ChunkRecord[] = [];
  let pageByteOffset = 0;
  let section: string | undefined;

  document.pages.forEach((page, pageIndex) => {
    const headings = findHeadings(page);
    let headingCursor = 0;
    let start = 0;

    while (start < page.length) {
      const end = safeBoundary(page, Math.min(page.length, start + size));

      while (headingCursor < headings.length && headings[headingCursor].index <= start) {
        section = headings[headingCursor].title;
        headingCursor += 1;
      }

      const text = page.slice(start, end);
      if (text.trim().length > 0) {
        const startOffset = pageByteOffset + Buffer.byteLength(page.slice(0, start));
        chunks.push({
          documentId: document.blobRef,
          sequence: chunks.length,
          text,
          startOffset,
          endOffset: startOffset + Buffer.byteLength(text),
          pageNumber: pageIndex + 1,
          ...(section !== undefined ? { section } : {}),
        });
      }

      if (end >= page.length) {
        break;
      }
      start = safeBoundary(page, start + step);
    }

    // Headings past the last window start still open the next page's section.
    for (; headingCursor < headings.length; headingCursor += 1) {
      section = headings[headingCursor].title;
    }

    pageByteOffset += Buffer.byteLength(page) + separatorBytes;
  });

  return chunks;
}
