import { describe, it, expect, beforeEach } from 'vitest';
import { RuntimeRecycler, type RecyclerSettings } from '../RuntimeRecycler.js';
import { processMemorySampler } from '../memorySampler.js';
import { FatalError } from '../../pipeline/errors.js';
import { FakeSession, FixedMemorySampler } from '../../../tests/mocks/collaborators.js';
import { createMockLogger, type MockLogger } from '../../../tests/helpers/mockFactories.js';

const settings = (overrides: Partial<RecyclerSettings> = {}): RecyclerSettings => ({
  restartPreloads: 3,
  memSoftLimitMb: 1200,
  sessionTimeoutMs: 1000,
  restartPauseMs: 0,
  ...overrides,
});

describe('RuntimeRecycler', () => {
  let session: FakeSession;
  let sampler: FixedMemorySampler;
  let logger: MockLogger;

  beforeEach(() => {
    session = new FakeSession();
    sampler = new FixedMemorySampler(null);
    logger = createMockLogger();
  });

  describe('evaluate', () => {
    it('should ask for a restart once the preload threshold is reached', () => {
      const recycler = new RuntimeRecycler(session, settings(), sampler, logger);
      recycler.recordPreload();
      recycler.recordPreload();
      expect(recycler.evaluate().restart).toBe(false);

      recycler.recordPreload();
      expect(recycler.evaluate()).toEqual({
        restart: true,
        reasons: ['preload-threshold'],
        preloads: 3,
        rssMb: null,
      });
    });

    it('should ignore the counter when the threshold is 0', () => {
      const recycler = new RuntimeRecycler(session, settings({ restartPreloads: 0 }), sampler, logger);
      for (let i = 0; i < 500; i++) {
        recycler.recordPreload();
      }

      expect(recycler.evaluate().restart).toBe(false);
    });

    it('should ask for a restart when memory reaches the soft limit', () => {
      sampler.rssMb = 1200;
      const recycler = new RuntimeRecycler(session, settings(), sampler, logger);

      expect(recycler.evaluate()).toEqual({
        restart: true,
        reasons: ['memory-limit'],
        preloads: 0,
        rssMb: 1200,
      });
    });

    it('should rely on the counter alone when memory is unknown', () => {
      const recycler = new RuntimeRecycler(session, settings(), new FixedMemorySampler(null), logger);

      expect(recycler.evaluate()).toEqual({ restart: false, reasons: [], preloads: 0, rssMb: null });
    });
  });

  describe('recycleIfNeeded', () => {
    it('should do nothing when no trigger fired', async () => {
      const recycler = new RuntimeRecycler(session, settings(), sampler, logger);

      expect(await recycler.recycleIfNeeded()).toBe(false);
      expect(session.stops).toBe(0);
    });

    it('should restart, re-apply credentials and reset the counter', async () => {
      const recycler = new RuntimeRecycler(session, settings({ restartPreloads: 1 }), sampler, logger);
      await session.start();
      recycler.recordPreload();

      expect(await recycler.recycleIfNeeded()).toBe(true);
      expect(session.stops).toBe(1);
      expect(session.starts).toBe(2);
      expect(session.credentialApplications).toBe(1);
      expect(recycler.preloadCount).toBe(0);
      expect(recycler.restartCount).toBe(1);
    });

    it('should keep the counter when the restart fails', async () => {
      const recycler = new RuntimeRecycler(session, settings({ restartPreloads: 1 }), sampler, logger);
      recycler.recordPreload();
      session.failStart = true;

      expect(await recycler.recycleIfNeeded()).toBe(false);
      expect(recycler.preloadCount).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'Browser restart failed: Could not start browser session: geckodriver missing'
      );
    });

    it('should start a new session even if stopping the old one fails', async () => {
      const recycler = new RuntimeRecycler(session, settings({ restartPreloads: 1 }), sampler, logger);
      await session.start();
      recycler.recordPreload();
      session.stop = async () => {
        throw new Error('already dead');
      };

      expect(await recycler.recycleIfNeeded()).toBe(true);
      expect(session.starts).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith(
        'Browser stop failed, starting a new one anyway: already dead'
      );
    });

    it('should replace a session that is no longer running without stopping it', async () => {
      const recycler = new RuntimeRecycler(session, settings({ restartPreloads: 1 }), sampler, logger);
      recycler.recordPreload();

      expect(await recycler.recycleIfNeeded()).toBe(true);
      expect(session.stops).toBe(0);
      expect(session.starts).toBe(1);
    });
  });

  describe('stopSession', () => {
    it('should stop a running session', async () => {
      const recycler = new RuntimeRecycler(session, settings(), sampler, logger);
      await recycler.startSession();

      await recycler.stopSession();

      expect(session.stops).toBe(1);
      expect(session.isRunning()).toBe(false);
    });

    it('should leave a session that never started alone', async () => {
      const recycler = new RuntimeRecycler(session, settings(), sampler, logger);

      await recycler.stopSession();

      expect(session.stops).toBe(0);
      expect(logger.debug).toHaveBeenCalledWith('Browser session is not running; nothing to stop');
    });
  });

  describe('startSession', () => {
    it('should only warn when credentials cannot be applied', async () => {
      session.failCredentials = true;
      const recycler = new RuntimeRecycler(session, settings(), sampler, logger);

      await expect(recycler.startSession()).resolves.toBeUndefined();
      expect(session.starts).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'Could not apply stored credentials: cookie file unreadable'
      );
    });

    it('should raise a fatal error when the session will not start', async () => {
      session.failStart = true;
      const recycler = new RuntimeRecycler(session, settings(), sampler, logger);

      await expect(recycler.startSession()).rejects.toBeInstanceOf(FatalError);
    });

    it('should time out a session that never starts', async () => {
      session.start = () => new Promise<void>(() => {});
      const recycler = new RuntimeRecycler(session, settings({ sessionTimeoutMs: 20 }), sampler, logger);

      await expect(recycler.startSession()).rejects.toThrow(
        'Could not start browser session: Browser start timed out after 20ms'
      );
    });
  });
});

describe('processMemorySampler', () => {
  it('should report a positive resident size in MB', () => {
    const rss = processMemorySampler.sampleRssMb();

    expect(rss).not.toBeNull();
    expect(rss).toBeGreaterThan(0);
  });
});
