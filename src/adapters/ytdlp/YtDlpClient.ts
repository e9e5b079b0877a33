import { promises as fsPromises } from 'node:fs';
import type {
  ArtifactDownloader,
  DownloadOutcome,
  DownloadRequest,
  ExtractOptions,
  MetadataExtractor,
} from '../../pipeline/collaborators.js';
import { TransientError, errorMessage } from '../../pipeline/errors.js';
import type { ArtifactMetadata, ContentRef, DurationWindow } from '../../types.js';
import { formatBytes, mbToBytes } from '../../utils/formatBytes.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { isWithinDurationWindow, parseYtDlpMetadata } from './metadata.js';
import { createYtDlpRunner, type YtDlpRunner } from './runner.js';

export interface YtDlpClientOptions {
  binary: string;
  /** Netscape cookie jar */
  cookiesFile: string;
  durationWindow: DurationWindow;
  /** Bound for the metadata probe that precedes a download */
  metadataTimeoutMs: number;
  downloadTimeoutMs: number;
  /** Files above this size are kept but logged as slow to deliver */
  largeFileWarnBytes?: number;
}

const DEFAULT_LARGE_FILE_WARN_BYTES = mbToBytes(50);

/**
 * Metadata extraction and downloads through the yt-dlp command line
 */
export class YtDlpClient implements MetadataExtractor, ArtifactDownloader {
  private readonly run: YtDlpRunner;

  constructor(
    private readonly options: YtDlpClientOptions,
    runner?: YtDlpRunner,
    private readonly logger: Logger = createLogger('yt-dlp')
  ) {
    this.run = runner ?? createYtDlpRunner(options.binary);
  }

  async extract(ref: ContentRef, { timeoutMs, signal }: ExtractOptions): Promise<ArtifactMetadata | null> {
    try {
      const stdout = await this.run(['--dump-json', '--cookies', this.options.cookiesFile, ref], {
        timeoutMs,
        signal,
      });
      return parseYtDlpMetadata(stdout);
    } catch (error) {
      this.logger.warn(`Failed to extract metadata for ${ref}: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Probes metadata first and skips clips outside the duration window. When
   * the probe fails the clip is downloaded anyway.
   */
  async download({ ref, targetPath, signal }: DownloadRequest): Promise<DownloadOutcome> {
    const { durationWindow, metadataTimeoutMs, downloadTimeoutMs } = this.options;

    const metadata = await this.extract(ref, { timeoutMs: metadataTimeoutMs, signal });
    if (metadata && !isWithinDurationWindow(metadata.duration, durationWindow)) {
      return {
        status: 'skipped',
        reason:
          `Duration ${(metadata.duration ?? 0).toFixed(1)}s not in ` +
          `${durationWindow.minSec}-${durationWindow.maxSec}s`,
      };
    }

    await this.run(
      ['--no-part', '--no-mtime', '--cookies', this.options.cookiesFile, '-o', targetPath, ref],
      { timeoutMs: downloadTimeoutMs, signal }
    );

    let bytes: number;
    try {
      bytes = (await fsPromises.stat(targetPath)).size;
    } catch (error) {
      throw new TransientError(`yt-dlp reported success but ${targetPath} is missing`, { cause: error });
    }

    this.logger.info(`Video downloaded successfully to ${targetPath} (${formatBytes(bytes)})`);
    if (bytes > (this.options.largeFileWarnBytes ?? DEFAULT_LARGE_FILE_WARN_BYTES)) {
      this.logger.warn(`Large video file (${formatBytes(bytes)}) may be slow to deliver`);
    }

    return { status: 'downloaded', artifact: { path: targetPath, source: ref }, metadata, bytes };
  }
}
