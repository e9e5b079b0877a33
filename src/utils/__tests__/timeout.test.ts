import { describe, it, expect } from 'vitest';
import { secondsToMs, withTimeout } from '../timeout.js';
import { TimeoutError } from '../../pipeline/errors.js';

describe('withTimeout', () => {
  it('should resolve with the task result', async () => {
    await expect(withTimeout('Quick', 100, async () => 'ok')).resolves.toBe('ok');
  });

  it('should reject with a TimeoutError and abort the signal at the deadline', async () => {
    const captured: { signal?: AbortSignal } = {};
    const pending = withTimeout('Slow', 10, (signal) => {
      captured.signal = signal;
      return new Promise<string>(() => {});
    });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('Slow timed out after 10ms');
    expect(captured.signal?.aborted).toBe(true);
  });

  it('should pass task errors through', async () => {
    await expect(
      withTimeout('Failing', 100, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
  });
});

describe('secondsToMs', () => {
  it('should convert seconds to whole milliseconds', () => {
    expect(secondsToMs(1.5)).toBe(1500);
    expect(secondsToMs(0)).toBe(0);
  });
});
