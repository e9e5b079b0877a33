import type { ArtifactRef } from '../types.js';
import type { ArtifactStore } from '../storage/ArtifactStore.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { ArtifactDisposer } from './disposer.js';
import { DiscoveryQueue } from './DiscoveryQueue.js';
import { HistoryLog } from './HistoryLog.js';
import { ReadyCache } from './ReadyCache.js';
import { SeenUrlTracker } from './SeenUrlTracker.js';
import { StateLock } from './StateLock.js';

export interface PipelineCapacities {
  queue: number;
  cache: number;
  history: number;
  seen: number;
}

export interface PipelineSnapshot {
  queued: number;
  ready: number;
  history: number;
  cursor: number;
  seen: number;
  inFlight: number;
}

/**
 * The single owner of every bounded container. All mutation goes through
 * `withLock`, one coarse critical section, because operations routinely span
 * several containers plus the disk (evict, delete file, purge metadata).
 */
export class PipelineState implements ArtifactDisposer {
  readonly seen: SeenUrlTracker;
  readonly queue: DiscoveryQueue;
  readonly cache: ReadyCache;
  readonly history: HistoryLog;

  private readonly lock = new StateLock();
  /** Reservation count per path: downloads, uploads and presentations in progress */
  private readonly inFlight = new Map<string, number>();

  constructor(
    capacities: PipelineCapacities,
    readonly store: ArtifactStore,
    private readonly logger: Logger = createLogger('state')
  ) {
    this.seen = new SeenUrlTracker(capacities.seen);
    this.queue = new DiscoveryQueue(capacities.queue);
    this.cache = new ReadyCache(capacities.cache, this);
    this.history = new HistoryLog(capacities.history, this);
  }

  withLock<T>(task: (state: PipelineState) => Promise<T> | T): Promise<T> {
    return this.lock.runExclusive(() => task(this));
  }

  /**
   * Reserves a path so cleanup leaves it alone while a file is being written
   * or read outside the lock. Reservations nest.
   */
  beginTransfer(path: string): void {
    this.inFlight.set(path, (this.inFlight.get(path) ?? 0) + 1);
  }

  endTransfer(path: string): void {
    const remaining = (this.inFlight.get(path) ?? 0) - 1;
    if (remaining > 0) {
      this.inFlight.set(path, remaining);
    } else {
      this.inFlight.delete(path);
    }
  }

  /** Paths that cleanup must not delete: ready, played, or mid-transfer */
  protectedPaths(): Set<string> {
    const paths = new Set<string>(this.inFlight.keys());
    for (const artifact of this.cache.toArray()) {
      paths.add(artifact.path);
    }
    for (const artifact of this.history.toArray()) {
      paths.add(artifact.path);
    }
    return paths;
  }

  /** Whether a download or presentation currently holds `path` */
  isReserved(path: string): boolean {
    return this.inFlight.has(path);
  }

  isReferenced(path: string): boolean {
    return this.inFlight.has(path) || this.cache.has(path) || this.history.has(path);
  }

  /**
   * Deletes the artifact's file and metadata unless another container still
   * holds the same path.
   */
  async dispose(artifact: ArtifactRef): Promise<boolean> {
    if (this.isReferenced(artifact.path)) {
      this.logger.debug(`Keeping ${artifact.path}: still referenced`);
      return false;
    }
    this.store.metadata.delete(artifact.path);
    return this.store.safeDelete(artifact.path);
  }

  /** Deletes on-disk tracked files that nothing references */
  sweepUnreferenced(): Promise<string[]> {
    return this.store.sweep(this.protectedPaths());
  }

  snapshot(): PipelineSnapshot {
    return {
      queued: this.queue.length,
      ready: this.cache.length,
      history: this.history.length,
      cursor: this.history.currentIndex,
      seen: this.seen.size,
      inFlight: this.inFlight.size,
    };
  }
}
