/**
 * End-to-end flow through createApp with in-process collaborators:
 * startup, navigation, refill, history eviction and disk budget maintenance.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { createApp, type App } from '../../app.js';
import { loadConfig } from '../../config/index.js';
import {
  MB,
  createTempDir,
  removeTempDir,
} from '../../../tests/helpers/mockFactories.js';
import {
  FakeChannel,
  FakeDiscoverer,
  FakeDiskProbe,
  FakeDownloader,
  FakeExtractor,
  FakePoster,
  FakeSession,
  FixedMemorySampler,
} from '../../../tests/mocks/collaborators.js';

const ref = (id: number): string => `https://www.example.com/@someone/video/${id}`;

describe('Pipeline flow', () => {
  let dir: string;
  let app: App;
  let channel: FakeChannel;
  let session: FakeSession;
  let poster: FakePoster;

  const pathOf = (id: number): string => join(dir, `${id}.mp4`);
  const sources = (): string[] => app.state.history.toArray().map((artifact) => artifact.source);

  const next = (): Promise<void> => channel.send({ type: 'next', requesterId: 'console' });
  const previous = (): Promise<void> => channel.send({ type: 'previous', requesterId: 'console' });

  const buildApp = (env: Record<string, string>, downloadBytes: number): App => {
    const config = loadConfig({
      OUTPUT_DIR: dir,
      QUEUE_CAPACITY: '3',
      CACHE_CAPACITY: '3',
      HISTORY_CAPACITY: '3',
      SEEN_URLS_MAX: '250',
      ...env,
    });
    return createApp(config, {
      session,
      discoverer: new FakeDiscoverer([1, 2, 3, 4, 5, 6, 7].map(ref)),
      poster,
      downloader: new FakeDownloader(downloadBytes),
      extractor: new FakeExtractor(),
      channel,
      probe: new FakeDiskProbe(),
      sampler: new FixedMemorySampler(null),
      skipCookieJar: true,
    });
  };

  beforeEach(async () => {
    // Background refill and maintenance never fire; the test drives them
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    dir = await createTempDir();
    channel = new FakeChannel();
    session = new FakeSession();
    poster = new FakePoster();
  });

  afterEach(async () => {
    await app.shutdown();
    vi.useRealTimers();
    await removeTempDir(dir);
  });

  it('should serve, refill and evict the oldest played video', async () => {
    app = buildApp({}, 1024);
    await app.start();

    expect(app.state.queue.toArray()).toEqual([ref(3)]);
    expect(app.state.cache.length).toBe(1);
    expect(sources()).toEqual([ref(1)]);

    await next();
    await app.orchestrator.refillOnce();
    expect(app.state.cache.toArray()).toEqual([{ path: pathOf(3), source: ref(3) }]);
    expect(app.state.queue.toArray()).toEqual([ref(4), ref(5), ref(6)]);

    await next();
    await next();

    expect(sources()).toEqual([ref(2), ref(3), ref(4)]);
    expect(app.state.history.currentIndex).toBe(2);
    expect(existsSync(pathOf(1))).toBe(false);
    expect((await app.state.store.listTracked()).map((file) => file.path).sort()).toEqual(
      [pathOf(2), pathOf(3), pathOf(4)].sort()
    );

    await previous();
    await previous();
    await previous();

    expect(app.state.history.currentIndex).toBe(0);
    expect(channel.presented.map((presentation) => presentation.artifact.path)).toEqual([
      pathOf(1),
      pathOf(2),
      pathOf(3),
      pathOf(4),
      pathOf(3),
      pathOf(2),
    ]);
  });

  it('should reclaim the oldest played video when the quota is exceeded', async () => {
    app = buildApp({ OUTPUT_DISK_QUOTA_MB: '2.5', OUTPUT_DISK_RESERVE_MB: '0' }, MB);
    await app.start();
    await next();
    await app.orchestrator.refillOnce();

    const report = await app.orchestrator.runMaintenance();

    expect(report.budget).toMatchObject({
      swept: [],
      deleted: [pathOf(1)],
      stopReason: 'satisfied',
      trackedBytes: 2 * MB,
    });
    expect(sources()).toEqual([ref(2)]);
    expect(app.state.cache.toArray()).toEqual([{ path: pathOf(3), source: ref(3) }]);
  });

  it('should close the browser on shutdown', async () => {
    app = buildApp({}, 1024);
    await app.start();

    await app.shutdown();

    expect(session.stops).toBe(1);
    expect(channel.stopped).toBe(true);
  });
});
