import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { tmpdir } from 'node:os';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalBlobStorage } from '../blob-storage';

describe('LocalBlobStorage', () => {
  let root: string;
  let storage: LocalBlobStorage;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'blob-storage-'));
    await mkdir(join(root, 'source', 'docs'), { recursive: true });
    await mkdir(join(root, 'source', 'other'), { recursive: true });
    for (const name of ['docs/c.txt', 'docs/a.txt', 'docs/b.txt', 'other/d.txt']) {
      await writeFile(join(root, 'source', name), name);
    }
    storage = new LocalBlobStorage({ root, container: 'source', pageSize: 2 });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('pages through a prefix in lexical order', async () => {
    const first = await storage.listPage('docs/', null);
    expect(first).toEqual({ documents: ['docs/a.txt', 'docs/b.txt'], nextCursor: 'docs/b.txt' });

    const second = await storage.listPage('docs/', first.nextCursor);
    expect(second).toEqual({ documents: ['docs/c.txt'], nextCursor: null });
  });

  it('lists the whole container for an empty prefix', async () => {
    const first = await storage.listPage('', null);
    const second = await storage.listPage('', first.nextCursor);

    expect([...first.documents, ...second.documents]).toEqual([
      'docs/a.txt',
      'docs/b.txt',
      'docs/c.txt',
      'other/d.txt',
    ]);
    expect(second.nextCursor).toBeNull();
  });

  it('returns an empty final page when nothing matches', async () => {
    await expect(storage.listPage('missing/', null)).resolves.toEqual({ documents: [], nextCursor: null });
  });

  it('fails permanently when the container does not exist', async () => {
    const missing = new LocalBlobStorage({ root, container: 'nope', pageSize: 2 });

    await expect(missing.listPage('', null)).rejects.toMatchObject({ kind: 'permanent' });
  });

  it('refuses blob references outside the container', () => {
    expect(() => storage.resolveBlob('../escape.txt')).toThrow('Blob reference "../escape.txt" escapes the container');
    expect(storage.resolveBlob('docs/a.txt')).toBe(join(root, 'source', 'docs', 'a.txt'));
    expect(storage.storageUrl('docs/a.txt').startsWith('file://')).toBe(true);
    expect(storage.storageUrl('docs/a.txt').endsWith('/source/docs/a.txt')).toBe(true);
  });
  it('walks only the directory named by the prefix', async () => {
    await mkdir(join(root, 'source', 'data(1)', 'nested'), { recursive: true });
    await writeFile(join(root, 'source', 'data(1)', 'nested', 'e.txt'), 'e');
    await writeFile(join(root, 'source', 'docs', 'readme.md'), 'readme');

    await expect(storage.listPage('data(1)/', null)).resolves.toEqual({
      documents: ['data(1)/nested/e.txt'],
      nextCursor: null,
    });
    await expect(storage.listPage('docs/re', null)).resolves.toEqual({
      documents: ['docs/readme.md'],
      nextCursor: null,
    });
  });

  it('maps document references onto blob refs', () => {
    expect(storage.toBlobRef(' docs/a.txt ')).toBe('docs/a.txt');
    expect(storage.toBlobRef(pathToFileURL(join(root, 'source', 'docs', 'a.txt')).href)).toBe('docs/a.txt');
    expect(storage.toBlobRef('https://account.blob.core.windows.net/source/docs/a%20b.txt')).toBe('docs/a b.txt');
    expect(() => storage.toBlobRef('https://account.blob.core.windows.net/other/a.txt')).toThrow(
      'Document URL "https://account.blob.core.windows.net/other/a.txt" is not in container "source"'
    );
    expect(() => storage.toBlobRef('docs/../../escape.txt')).toThrow(
      'Document "docs/../../escape.txt" is outside container "source"'
    );
  });

  it('saves uploads under a unique name', async () => {
    const blobRef = await storage.saveUpload('my report (final).txt', new TextEncoder().encode('uploaded'));

    expect(blobRef).toMatch(/^uploads\/[0-9a-f-]{36}-my_report__final_\.txt$/);
    expect(await readFile(storage.resolveBlob(blobRef), 'utf8')).toBe('uploaded');
  });
});
