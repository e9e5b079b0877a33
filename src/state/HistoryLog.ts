import type { ArtifactRef, NavigationResult } from '../types.js';
import type { ArtifactDisposer } from './disposer.js';

export interface HistoryEviction {
  artifact: ArtifactRef;
  /** False when the file stayed on disk because something else still holds it */
  released: boolean;
}

/**
 * Previously served artifacts with a cursor on the one currently displayed.
 *
 * The cursor is -1 exactly when the log is empty; otherwise it is a valid
 * index. Only the methods below move it.
 */
export class HistoryLog {
  private entries: ArtifactRef[] = [];
  private cursor = -1;

  constructor(
    public readonly capacity: number,
    private readonly disposer: ArtifactDisposer
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.entries.length;
  }

  get currentIndex(): number {
    return this.cursor;
  }

  current(): ArtifactRef | null {
    return this.entries[this.cursor] ?? null;
  }

  has(path: string): boolean {
    return this.entries.some((entry) => entry.path === path);
  }

  toArray(): ArtifactRef[] {
    return [...this.entries];
  }

  /**
   * Appends a served artifact. On overflow the oldest entry is dropped (and
   * its file disposed unless it is the artifact just appended) and the cursor
   * shifts left with it.
   * @returns the evicted artifact, if any
   */
  async pushPlayed(artifact: ArtifactRef, advanceCursor: boolean = true): Promise<ArtifactRef | null> {
    this.entries.push(artifact);

    let evicted: ArtifactRef | null = null;
    if (this.entries.length > this.capacity) {
      evicted = this.entries.shift() ?? null;
      if (this.cursor > 0) {
        this.cursor -= 1;
      }
    }

    if (advanceCursor || this.cursor < 0) {
      this.cursor = this.entries.length - 1;
    }

    if (evicted && evicted.path !== artifact.path) {
      await this.disposer.dispose(evicted);
    }

    return evicted;
  }

  /**
   * Steps back one entry. At the oldest entry this is a no-op reported as a
   * boundary; it never triggers a download.
   */
  movePrevious(): NavigationResult {
    const previous = this.cursor > 0 ? this.entries[this.cursor - 1] : undefined;
    if (!previous) {
      return { status: 'boundary', index: this.cursor };
    }

    this.cursor -= 1;
    return { status: 'moved', artifact: previous, index: this.cursor };
  }

  /**
   * Drops one entry to reclaim disk space: the oldest entry that is neither
   * the displayed artifact nor pinned by `isPinned`. Returns null when no
   * entry qualifies.
   */
  async evictForBudget(
    isPinned: (path: string) => boolean = () => false
  ): Promise<HistoryEviction | null> {
    const currentPath = this.current()?.path;
    const index = this.entries.findIndex(
      (entry, i) => i !== this.cursor && entry.path !== currentPath && !isPinned(entry.path)
    );
    const removed = this.entries[index];
    if (!removed) {
      return null;
    }

    this.entries.splice(index, 1);
    if (index < this.cursor) {
      this.cursor -= 1;
    }

    const released = await this.disposer.dispose(removed);
    return { artifact: removed, released };
  }
}
