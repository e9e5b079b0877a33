import type { PipelineState } from '../state/PipelineState.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { formatBytes } from '../utils/formatBytes.js';
import { statfsProbe, type DiskUsageProbe } from './diskUsage.js';

export interface DiskBudget {
  /** Ceiling for tracked artifact bytes */
  quotaBytes: number;
  /** Free space that must remain on the volume */
  reserveBytes: number;
  /** Deletions attempted before giving up on a pass */
  maxIterations?: number;
}

export type EnforcementStop = 'satisfied' | 'exhausted' | 'safety-stop' | 'unmeasurable';

export interface EnforcementReport {
  /** Unreferenced files removed by the initial sweep */
  swept: string[];
  /** Files the reclamation ladder actually removed, in order */
  deleted: string[];
  stopReason: EnforcementStop;
  trackedBytes: number;
  freeBytes: number;
}

interface Reclaimed {
  path: string;
  released: boolean;
}

interface Measurement {
  trackedBytes: number;
  freeBytes: number;
}

const DEFAULT_MAX_ITERATIONS = 100;

/**
 * Brings the output directory back under quota and above the free-space
 * reserve, one deletion at a time, re-measuring after each:
 *
 * 1. history, oldest first, never the displayed artifact or a reserved one
 * 2. ready cache, oldest first
 * 3. unreferenced tracked files, oldest mtime first
 *
 * Must run inside `PipelineState.withLock`.
 */
export class DiskBudgetEnforcer {
  private readonly maxIterations: number;

  constructor(
    private readonly state: PipelineState,
    private readonly budget: DiskBudget,
    private readonly probe: DiskUsageProbe = statfsProbe,
    private readonly logger: Logger = createLogger('disk-budget')
  ) {
    this.maxIterations = budget.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  async enforce(): Promise<EnforcementReport> {
    const swept = await this.state.sweepUnreferenced();
    const deleted: string[] = [];

    let measurement = await this.measure();
    if (!measurement) {
      return { swept, deleted, stopReason: 'unmeasurable', trackedBytes: 0, freeBytes: 0 };
    }

    const report = (stopReason: EnforcementStop, m: Measurement): EnforcementReport => ({
      swept,
      deleted,
      stopReason,
      trackedBytes: m.trackedBytes,
      freeBytes: m.freeBytes,
    });

    let iterations = 0;
    while (!this.constraintsMet(measurement)) {
      iterations++;
      if (iterations > this.maxIterations) {
        this.logger.warn(`Disk budget safety stop hit after ${this.maxIterations} deletions`);
        return report('safety-stop', measurement);
      }

      const victim = await this.reclaimOne();
      if (!victim) {
        this.logger.warn(
          `Disk budget cannot be met: ${formatBytes(measurement.trackedBytes)} tracked ` +
            `(quota ${formatBytes(this.budget.quotaBytes)}), ${formatBytes(measurement.freeBytes)} free ` +
            `(reserve ${formatBytes(this.budget.reserveBytes)}); nothing left to delete`
        );
        return report('exhausted', measurement);
      }
      if (victim.released) {
        deleted.push(victim.path);
      }

      const next = await this.measure();
      if (!next) {
        return report('unmeasurable', measurement);
      }
      measurement = next;
    }

    if (deleted.length > 0) {
      this.logger.info(
        `Reclaimed ${deleted.length} file(s); ${formatBytes(measurement.trackedBytes)} tracked, ` +
          `${formatBytes(measurement.freeBytes)} free`
      );
    }
    return report('satisfied', measurement);
  }

  private constraintsMet({ trackedBytes, freeBytes }: Measurement): boolean {
    return trackedBytes <= this.budget.quotaBytes && freeBytes >= this.budget.reserveBytes;
  }

  private async measure(): Promise<Measurement | null> {
    try {
      const [trackedBytes, freeBytes] = await Promise.all([
        this.state.store.trackedBytes(),
        this.probe.freeBytes(this.state.store.outputDir),
      ]);
      return { trackedBytes, freeBytes };
    } catch (error) {
      this.logger.warn('Could not measure disk usage; skipping budget pass', error);
      return null;
    }
  }

  /**
   * Takes exactly one candidate off the ladder. Reserved paths and the
   * displayed artifact are never candidates.
   * @returns the candidate and whether its file was removed, or null when
   * nothing is deletable
   */
  private async reclaimOne(): Promise<Reclaimed | null> {
    const { history, cache, store } = this.state;

    const eviction = await history.evictForBudget((path) => this.state.isReserved(path));
    if (eviction) {
      return { path: eviction.artifact.path, released: eviction.released };
    }

    if (cache.length > 0) {
      const oldest = cache.shift();
      return { path: oldest.path, released: await this.state.dispose(oldest) };
    }

    const protectedPaths = this.state.protectedPaths();
    const candidates = (await store.listTracked())
      .filter((file) => !protectedPaths.has(file.path))
      .sort((a, b) => a.mtimeMs - b.mtimeMs);

    const stale = candidates[0];
    if (!stale) {
      return null;
    }

    store.metadata.delete(stale.path);
    return { path: stale.path, released: await store.safeDelete(stale.path) };
  }
}
