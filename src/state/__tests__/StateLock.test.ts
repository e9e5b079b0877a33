import { describe, it, expect } from 'vitest';
import { StateLock } from '../StateLock.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('StateLock', () => {
  it('should run tasks one at a time in submission order', async () => {
    const lock = new StateLock();
    const events: string[] = [];

    const first = lock.runExclusive(async () => {
      events.push('first:start');
      await tick();
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive(async () => {
      events.push('second:start');
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should keep going after a task rejects', async () => {
    const lock = new StateLock();

    const failing = lock.runExclusive(async () => {
      throw new Error('boom');
    });
    const next = lock.runExclusive(() => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
