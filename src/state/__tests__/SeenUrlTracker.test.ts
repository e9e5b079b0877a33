import { describe, it, expect } from 'vitest';
import { SeenUrlTracker } from '../SeenUrlTracker.js';

const url = (n: number) => `https://www.example.com/@someone/video/${n}`;

describe('SeenUrlTracker', () => {
  it('should report newly marked identifiers as seen', () => {
    const tracker = new SeenUrlTracker(250);

    expect(tracker.markSeen(url(1))).toBe(true);
    expect(tracker.isSeen(url(1))).toBe(true);
    expect(tracker.isSeen(url(2))).toBe(false);
  });

  it('should treat marking a seen identifier as a no-op', () => {
    const tracker = new SeenUrlTracker(3);
    tracker.markSeen(url(1));
    tracker.markSeen(url(2));

    expect(tracker.markSeen(url(1))).toBe(false);
    expect(tracker.toArray()).toEqual([url(1), url(2)]);
  });

  it('should hold exactly the most recent distinct identifiers', () => {
    const tracker = new SeenUrlTracker(250);

    for (let i = 0; i < 400; i++) {
      tracker.markSeen(url(i));
    }

    expect(tracker.size).toBe(250);
    expect(tracker.isSeen(url(149))).toBe(false);
    expect(tracker.isSeen(url(150))).toBe(true);
    expect(tracker.isSeen(url(399))).toBe(true);
    expect(tracker.toArray()[0]).toBe(url(150));
  });

  it('should evict in insertion order regardless of lookups', () => {
    const tracker = new SeenUrlTracker(2);
    tracker.markSeen(url(1));
    tracker.markSeen(url(2));

    // A lookup must not refresh url(1)
    expect(tracker.isSeen(url(1))).toBe(true);
    tracker.markSeen(url(3));

    expect(tracker.isSeen(url(1))).toBe(false);
    expect(tracker.toArray()).toEqual([url(2), url(3)]);
  });

  it('should leave a window within capacity untouched when pruning', () => {
    const tracker = new SeenUrlTracker(3);
    tracker.markSeen(url(1));
    tracker.markSeen(url(2));

    expect(tracker.pruneIfNeeded()).toBe(0);
    expect(tracker.pruneIfNeeded()).toBe(0);
    expect(tracker.size).toBe(2);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new SeenUrlTracker(0)).toThrow(RangeError);
  });
});
