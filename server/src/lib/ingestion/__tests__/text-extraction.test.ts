import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { extractTextFromFile, isSupportedExtractionExtension } from '../text-extraction';

describe('text extraction helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ingestion-text-'));
  });

  afterEach(async () => {
    vi.clearAllMocks();
    vi.resetModules();
    vi.doUnmock('mammoth');
    await rm(dir, { recursive: true, force: true });
  });

  it('recognizes supported extraction extensions', () => {
    expect(isSupportedExtractionExtension('/tmp/a.txt')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.pdf')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.docx')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.CSV')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.doc')).toBe(false);
    expect(isSupportedExtractionExtension('/tmp/a.xyz')).toBe(false);
  });

  it('extracts raw text from txt files as a single page', async () => {
    const filePath = join(dir, 'sample.txt');
    await writeFile(filePath, 'hello from txt');

    await expect(extractTextFromFile(filePath)).resolves.toEqual({
      contentType: 'text/plain',
      pages: ['hello from txt'],
    });
  });

  it('reads markdown with its content type', async () => {
    const filePath = join(dir, 'notes.md');
    await writeFile(filePath, '# Title\n\nBody');

    const result = await extractTextFromFile(filePath);
    expect(result.contentType).toBe('text/markdown');
    expect(result.pages).toEqual(['# Title\n\nBody']);
  });

  it('extracts docx text through mammoth', async () => {
    const extractRawText = vi.fn().mockResolvedValue({ value: 'docx body', messages: [] });
    vi.doMock('mammoth', () => ({ default: { extractRawText } }));
    const { extractTextFromFile: extractWithMock } = await import('../text-extraction');

    const filePath = join(dir, 'report.docx');
    await writeFile(filePath, 'not really a zip');

    await expect(extractWithMock(filePath)).resolves.toEqual({
      contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      pages: ['docx body'],
    });
    expect(extractRawText).toHaveBeenCalledWith({ path: filePath });
  });

  it('rejects unsupported extensions permanently', async () => {
    const filePath = join(dir, 'archive.zip');
    await writeFile(filePath, 'zip');

    await expect(extractTextFromFile(filePath)).rejects.toMatchObject({
      kind: 'permanent',
      message: 'Unsupported file extension for extraction: .zip',
    });
  });
});
