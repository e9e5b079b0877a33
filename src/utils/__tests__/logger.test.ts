import { describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../logger.js';

describe('createLogger', () => {
  it('should prefix messages with timestamp, level and component', () => {
    const info = vi.mocked(console.info);
    const logger = createLogger('storage');

    logger.info('Deleted file: a.mp4');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO {2}\[storage\] Deleted file: a\.mp4$/
    );
  });

  it('should append data as JSON and reduce errors to their message', () => {
    const warn = vi.mocked(console.warn);
    const logger = createLogger('pipeline');

    logger.warn('Refill failed', new Error('no links'));
    logger.warn('Snapshot', { queued: 2 });

    expect(warn.mock.calls[0]?.[0]).toMatch(/Refill failed \{"error":"no links"\}$/);
    expect(warn.mock.calls[1]?.[0]).toMatch(/Snapshot \{"queued":2\}$/);
  });

  it('should drop messages below the active level', () => {
    const debug = vi.mocked(console.debug);
    const error = vi.mocked(console.error);
    const logger = createLogger('app');

    setLogLevel('error');
    logger.debug('hidden');
    logger.error('shown');

    expect(getLogLevel()).toBe('error');
    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});
