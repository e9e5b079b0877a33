import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { FatalError, TimeoutError, TransientError, errorMessage } from '../../pipeline/errors.js';

const execFileAsync = promisify(execFile);

/** yt-dlp's JSON dumps can be large for clips with long comment sections */
const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

export interface RunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs yt-dlp with `args` and resolves with its stdout
 */
export type YtDlpRunner = (args: string[], options: RunOptions) => Promise<string>;

const hasField = <K extends string>(error: unknown, key: K): error is Error & Record<K, unknown> =>
  error instanceof Error && key in error;

function stderrTail(error: unknown): string {
  if (!hasField(error, 'stderr') || typeof error.stderr !== 'string') {
    return '';
  }
  const lines = error.stderr.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

/**
 * Maps a failed child process onto the pipeline's failure kinds: a missing
 * binary is fatal, a killed process timed out, anything else is transient.
 */
export function toRunError(binary: string, error: unknown, timeoutMs: number): Error {
  if (hasField(error, 'code') && error.code === 'ENOENT') {
    return new FatalError(`${binary} was not found on PATH`, { cause: error });
  }
  if (hasField(error, 'killed') && error.killed === true) {
    return new TimeoutError(binary, timeoutMs);
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new TransientError(`${binary} was aborted`, { cause: error });
  }

  const detail = stderrTail(error) || errorMessage(error);
  return new TransientError(`${binary} failed: ${detail}`, { cause: error });
}

export function createYtDlpRunner(binary: string): YtDlpRunner {
  return async (args, { timeoutMs, signal }) => {
    try {
      const { stdout } = await execFileAsync(binary, args, {
        timeout: timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        signal,
        encoding: 'utf8',
      });
      return stdout;
    } catch (error) {
      throw toRunError(binary, error, timeoutMs);
    }
  };
}
