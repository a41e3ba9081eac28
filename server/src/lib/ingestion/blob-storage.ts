import { randomUUID } from 'node:crypto';
import { basename, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import fg from 'fast-glob';
import fs from 'fs-extra';
import { ActivityError, InvalidConfigurationError, toErrorMessage } from '../errors';
import type { DocumentPage } from '../orchestration/types';

export const UPLOADS_PREFIX = 'uploads/';

export interface BlobStorageOptions {
  root: string;
  container: string;
  pageSize: number;
}

function escapesContainer(fromContainer: string): boolean {
  return fromContainer === '' || fromContainer === '..' || fromContainer.startsWith(`..${sep}`) || isAbsolute(fromContainer);
}

/** Narrows the walk to the directory part of the prefix. */
function globForPrefix(prefix: string): string {
  const directory = prefix.slice(0, Math.max(0, prefix.lastIndexOf('/')));
  return directory ? `${fg.escapePath(directory)}/**/*` : '**/*';
}

function sanitizeFileName(filename: string): string {
  const sanitized = basename(filename).replace(/[^a-zA-Z0-9._-]/g, '_');
  return sanitized || 'file';
}

function parseUrl(value: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw new InvalidConfigurationError(`Invalid document URL "${value}": ${toErrorMessage(error)}`);
  }
}

function filePathFromUrl(url: URL): string {
  try {
    return fileURLToPath(url);
  } catch (error) {
    throw new InvalidConfigurationError(`Invalid file URL "${url.href}": ${toErrorMessage(error)}`);
  }
}

/**
 * Local-directory stand-in for a blob container. Blob references are POSIX
 * paths relative to `<root>/<container>`.
 */
export class LocalBlobStorage {
  readonly container: string;
  readonly containerDir: string;
  private readonly pageSize: number;

  constructor(options: BlobStorageOptions) {
    this.container = options.container;
    this.containerDir = resolve(options.root, options.container);
    this.pageSize = options.pageSize;
  }

  async ensureContainer(): Promise<void> {
    await fs.ensureDir(this.containerDir);
  }

  /**
   * Lists blob refs starting with `prefix` in lexical order. The cursor is the
   * last ref of the previous page; `nextCursor` is null on the final page.
   */
  async listPage(prefix: string, cursor: string | null): Promise<DocumentPage> {
    if (!(await fs.pathExists(this.containerDir))) {
      throw ActivityError.permanent(`Blob container ${this.containerDir} does not exist`);
    }

    const files = await fg(globForPrefix(prefix), { cwd: this.containerDir, dot: false, onlyFiles: true });
    const matching = files
      .filter((ref) => ref.startsWith(prefix))
      .filter((ref) => cursor === null || ref > cursor)
      .sort();

    const documents = matching.slice(0, this.pageSize);
    const hasMore = matching.length > documents.length;
    return {
      documents,
      nextCursor: hasMore ? documents[documents.length - 1] : null,
    };
  }

  resolveBlob(blobRef: string): string {
    const absolute = resolve(this.containerDir, blobRef);
    if (escapesContainer(relative(this.containerDir, absolute))) {
      throw ActivityError.permanent(`Blob reference "${blobRef}" escapes the container`);
    }
    return absolute;
  }

  /**
   * Blob ref for a document reference given by a caller: a container-relative
   * path, a `file://` URL inside the container, or an http(s) blob URL whose
   * path starts with `/<container>/`.
   */
  toBlobRef(reference: string): string {
    const trimmed = reference.trim();
    let absolute: string;
    if (/^file:/i.test(trimmed)) {
      absolute = filePathFromUrl(parseUrl(trimmed));
    } else if (/^https?:/i.test(trimmed)) {
      const pathname = decodeURIComponent(parseUrl(trimmed).pathname);
      const containerPath = `/${this.container}/`;
      if (!pathname.startsWith(containerPath)) {
        throw new InvalidConfigurationError(`Document URL "${trimmed}" is not in container "${this.container}"`);
      }
      absolute = resolve(this.containerDir, pathname.slice(containerPath.length));
    } else {
      absolute = resolve(this.containerDir, trimmed);
    }

    const fromContainer = relative(this.containerDir, absolute);
    if (escapesContainer(fromContainer)) {
      throw new InvalidConfigurationError(`Document "${trimmed}" is outside container "${this.container}"`);
    }
    return fromContainer.split(sep).join('/');
  }

  /**
   * Stores an uploaded file under `uploads/` with a unique name and returns its blob ref.
   */
  async saveUpload(filename: string, data: Uint8Array): Promise<string> {
    const storedName = `${randomUUID()}-${sanitizeFileName(filename)}`;
    const uploadsDir = join(this.containerDir, UPLOADS_PREFIX);
    await fs.ensureDir(uploadsDir);
    await fs.writeFile(join(uploadsDir, storedName), data);
    return `${UPLOADS_PREFIX}${storedName}`;
  }

  storageUrl(blobRef: string): string {
    return pathToFileURL(this.resolveBlob(blobRef)).href;
  }
}
