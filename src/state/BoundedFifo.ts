import { NotFoundError } from '../pipeline/errors.js';

/**
 * Ordered, capacity-bounded sequence. Subclasses decide what happens on
 * overflow; removal from the front is a move and fails loudly when empty.
 */
export abstract class BoundedFifo<T> {
  protected items: T[] = [];

  constructor(
    public readonly capacity: number,
    private readonly label: string
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`${label} capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Removes and returns the oldest element
   * @throws {NotFoundError} when empty
   */
  shift(): T {
    const head = this.items.shift();
    if (head === undefined) {
      throw new NotFoundError(`${this.label} is empty`);
    }
    return head;
  }

  toArray(): T[] {
    return [...this.items];
  }
}
