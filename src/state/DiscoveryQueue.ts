import type { ContentRef } from '../types.js';
import { QueueCapacityError } from '../pipeline/errors.js';
import { BoundedFifo } from './BoundedFifo.js';

/**
 * Pending content identifiers awaiting download. Never evicts: the discovery
 * loop confirms room before pushing, and pushing while full is refused.
 */
export class DiscoveryQueue extends BoundedFifo<ContentRef> {
  constructor(capacity: number) {
    super(capacity, 'Discovery queue');
  }

  /**
   * @throws {QueueCapacityError} when the queue is already full
   */
  push(ref: ContentRef): void {
    if (this.isFull()) {
      throw new QueueCapacityError(this.capacity);
    }
    this.items.push(ref);
  }

  has(ref: ContentRef): boolean {
    return this.items.includes(ref);
  }
}
