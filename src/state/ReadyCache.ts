import type { ArtifactRef } from '../types.js';
import { BoundedFifo } from './BoundedFifo.js';
import type { ArtifactDisposer } from './disposer.js';

/**
 * Downloaded artifacts ready to serve. Capacity is enforced by eviction: the
 * producer never waits, the oldest ready artifact ages out instead.
 */
export class ReadyCache extends BoundedFifo<ArtifactRef> {
  constructor(
    capacity: number,
    private readonly disposer: ArtifactDisposer
  ) {
    super(capacity, 'Ready cache');
  }

  /**
   * Appends `artifact`, first evicting (and disposing) the oldest entry when full.
   * @returns the evicted artifact, if any
   */
  async push(artifact: ArtifactRef): Promise<ArtifactRef | null> {
    let evicted: ArtifactRef | null = null;

    if (this.isFull()) {
      evicted = this.shift();
    }
    this.items.push(artifact);

    if (evicted && evicted.path !== artifact.path) {
      await this.disposer.dispose(evicted);
    }

    return evicted;
  }

  has(path: string): boolean {
    return this.items.some((item) => item.path === path);
  }
}
