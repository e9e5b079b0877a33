import { promises as fsPromises } from 'node:fs';
import { createHash } from 'node:crypto';
import { basename, dirname, extname, join, resolve } from 'node:path';
import type { ContentRef } from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { formatBytes } from '../utils/formatBytes.js';
import { MetadataStore } from './MetadataStore.js';

/** Only files with this extension are ever cleaned up automatically */
export const TRACKED_EXTENSION = '.mp4';

export interface TrackedFile {
  path: string;
  size: number;
  mtimeMs: number;
}

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

/**
 * File-name stem for a content URL: the last path segment (e.g. the numeric
 * id of `https://host/@user/video/123`), or a content hash when the URL has
 * no usable segment.
 */
export function artifactIdFor(ref: ContentRef): string {
  let segment = '';
  try {
    const url = new URL(ref);
    segment = url.pathname.split('/').filter(Boolean).pop() ?? '';
  } catch {
    segment = ref.replace(/[?#].*$/, '').split('/').filter(Boolean).pop() ?? '';
  }

  const safe = segment.replace(/[^A-Za-z0-9_-]/g, '');
  if (safe.length > 0) {
    return safe;
  }

  return createHash('sha256').update(ref).digest('hex').slice(0, 16);
}

/**
 * View of the output directory: where artifacts are written, which files are
 * tracked, and best-effort deletion of them. Anything that is not a tracked
 * file directly inside the directory is never touched.
 */
export class ArtifactStore {
  readonly outputDir: string;
  readonly metadata = new MetadataStore();

  constructor(
    outputDir: string,
    private readonly logger: Logger = createLogger('storage')
  ) {
    this.outputDir = resolve(outputDir);
  }

  async initialize(): Promise<void> {
    await fsPromises.mkdir(this.outputDir, { recursive: true });
  }

  pathFor(ref: ContentRef): string {
    return join(this.outputDir, `${artifactIdFor(ref)}${TRACKED_EXTENSION}`);
  }

  isTracked(path: string): boolean {
    const absolute = resolve(path);
    return (
      extname(absolute).toLowerCase() === TRACKED_EXTENSION && dirname(absolute) === this.outputDir
    );
  }

  /**
   * Tracked files currently on disk. A missing directory reads as empty.
   */
  async listTracked(): Promise<TrackedFile[]> {
    let names: string[];
    try {
      const entries = await fsPromises.readdir(this.outputDir, { withFileTypes: true });
      names = entries
        .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === TRACKED_EXTENSION)
        .map((entry) => entry.name);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const files: TrackedFile[] = [];
    for (const name of names) {
      const path = join(this.outputDir, name);
      try {
        const stats = await fsPromises.stat(path);
        files.push({ path, size: stats.size, mtimeMs: stats.mtimeMs });
      } catch (error) {
        // Deleted between readdir and stat
        if (!hasErrorCode(error, 'ENOENT')) {
          throw error;
        }
      }
    }
    return files;
  }

  async trackedBytes(): Promise<number> {
    const files = await this.listTracked();
    return files.reduce((total, file) => total + file.size, 0);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fsPromises.access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Deletes a tracked file. Failures are logged, never thrown.
   * @returns whether a file was actually removed
   */
  async safeDelete(path: string): Promise<boolean> {
    if (!this.isTracked(path)) {
      this.logger.warn(`Refusing to delete untracked path: ${path}`);
      return false;
    }

    try {
      await fsPromises.unlink(path);
      this.logger.info(`Deleted file: ${basename(path)}`);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.debug(`Already gone: ${basename(path)}`);
      } else {
        this.logger.warn(`Failed to delete ${path}`, error);
      }
      return false;
    }
  }

  /**
   * Deletes every tracked file not in `protectedPaths` and drops its metadata.
   * @returns the deleted paths
   */
  async sweep(protectedPaths: ReadonlySet<string>): Promise<string[]> {
    let files: TrackedFile[];
    try {
      files = await this.listTracked();
    } catch (error) {
      this.logger.warn('Cleanup sweep could not list the output directory', error);
      return [];
    }

    const deleted: string[] = [];
    let reclaimed = 0;
    for (const file of files) {
      if (protectedPaths.has(file.path)) {
        continue;
      }
      this.metadata.delete(file.path);
      if (await this.safeDelete(file.path)) {
        deleted.push(file.path);
        reclaimed += file.size;
      }
    }

    if (deleted.length > 0) {
      this.logger.debug(`Sweep removed ${deleted.length} stale file(s), ${formatBytes(reclaimed)}`);
    }
    return deleted;
  }
}
