import type { PipelineState } from '../state/PipelineState.js';
import { StateLock } from '../state/StateLock.js';
import type { DiskBudgetEnforcer, EnforcementReport } from '../storage/DiskBudgetEnforcer.js';
import { EMPTY_METADATA } from '../storage/MetadataStore.js';
import type { RuntimeRecycler } from '../runtime/RuntimeRecycler.js';
import type {
  ArtifactMetadata,
  ArtifactRef,
  ContentRef,
  InboundSignal,
  NavigationResult,
  RequesterId,
} from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { CircuitBreaker, retryWithBackoff, sleep } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import type {
  ArtifactDownloader,
  ArtifactPoster,
  ContentDiscoverer,
  MetadataExtractor,
  NotificationChannel,
} from './collaborators.js';
import { FatalError, NotFoundError, TransientError, errorMessage } from './errors.js';
import { PostFlowRegistry, type PendingPostFlow } from './PostFlowRegistry.js';
import {
  COMMENT_PROMPT,
  HASHTAG_PROMPT,
  NOTHING_AVAILABLE_MESSAGE,
  POST_PROCESSING_MESSAGE,
  WELCOME_CAPTION,
  buildCaptionText,
  navigationActions,
} from './presentation.js';

export interface OrchestratorSettings {
  /** Who receives the welcome presentation */
  requesterId: RequesterId;
  discoveryTimeoutMs: number;
  downloadTimeoutMs: number;
  serveMetadataTimeoutMs: number;
  postTimeoutMs: number;
  postFlowTimeoutMs: number;
  maintenanceIntervalMs: number;
  refillIntervalMs?: number;
  refillFailureDelayMs?: number;
  /** Retries of a timed out or transiently failing download */
  downloadRetries?: number;
  presentAttempts?: number;
  presentRetryDelayMs?: number;
  /** Consecutive failed refills before the loop pauses */
  discoveryFailureThreshold?: number;
  discoveryPauseMs?: number;
}

export interface OrchestratorDeps {
  state: PipelineState;
  enforcer: DiskBudgetEnforcer;
  recycler: RuntimeRecycler;
  discoverer: ContentDiscoverer;
  downloader: ArtifactDownloader;
  extractor: MetadataExtractor;
  channel: NotificationChannel;
  poster: ArtifactPoster;
  postFlows?: PostFlowRegistry;
  logger?: Logger;
}

export interface RefillReport {
  downloaded: boolean;
  discovered: number;
  /** True when the circuit breaker held discovery back */
  paused: boolean;
}

export interface MaintenanceReport {
  budget: EnforcementReport | null;
  prunedSeen: number;
  expiredFlows: number;
  recycled: boolean;
  failures: string[];
}

const DEFAULTS = {
  refillIntervalMs: 1000,
  refillFailureDelayMs: 5000,
  downloadRetries: 1,
  presentAttempts: 3,
  presentRetryDelayMs: 1000,
  discoveryFailureThreshold: 3,
  discoveryPauseMs: 60_000,
};

type Publish = (state: PipelineState, artifact: ArtifactRef) => Promise<unknown>;

/**
 * Drives discovery → download → cache → serve → evict and answers navigation.
 *
 * Container mutations run inside `state.withLock`; slow collaborator calls run
 * outside it and re-enter only to publish their result. Browser work
 * (discovery, posting, recycling) is serialized by a separate session lock.
 */
export class PipelineOrchestrator {
  private readonly state: PipelineState;
  private readonly enforcer: DiskBudgetEnforcer;
  private readonly recycler: RuntimeRecycler;
  private readonly discoverer: ContentDiscoverer;
  private readonly downloader: ArtifactDownloader;
  private readonly extractor: MetadataExtractor;
  private readonly channel: NotificationChannel;
  private readonly poster: ArtifactPoster;
  private readonly logger: Logger;
  readonly postFlows: PostFlowRegistry;

  private readonly settings: Required<OrchestratorSettings>;
  private readonly sessionLock = new StateLock();
  private readonly breaker: CircuitBreaker;

  private running = false;
  private stopping = false;
  private refillTimer: NodeJS.Timeout | null = null;
  private maintenanceTimer: NodeJS.Timeout | null = null;
  private refillTask: Promise<void> | null = null;
  private maintenanceTask: Promise<void> | null = null;
  private readonly pendingPosts = new Set<Promise<void>>();
  private readonly pendingSignals = new Set<Promise<void>>();
  private shutdownPromise: Promise<void> | null = null;

  constructor(deps: OrchestratorDeps, settings: OrchestratorSettings) {
    this.state = deps.state;
    this.enforcer = deps.enforcer;
    this.recycler = deps.recycler;
    this.discoverer = deps.discoverer;
    this.downloader = deps.downloader;
    this.extractor = deps.extractor;
    this.channel = deps.channel;
    this.poster = deps.poster;
    this.postFlows = deps.postFlows ?? new PostFlowRegistry();
    this.logger = deps.logger ?? createLogger('pipeline');
    this.settings = { ...DEFAULTS, ...settings };
    this.breaker = new CircuitBreaker(
      this.settings.discoveryFailureThreshold,
      this.settings.discoveryPauseMs
    );
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Startup sequence. Rejects with a FatalError when the session cannot be
   * started, the queue cannot be filled or the first video cannot be fetched.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.logger.info('Starting pipeline...');

    await this.recycler.startSession();

    try {
      await this.fillQueue(this.state.queue.capacity);
    } catch (error) {
      throw new FatalError(`Could not fill the discovery queue: ${errorMessage(error)}`, { cause: error });
    }
    this.logger.info(`Preloaded ${this.state.queue.length} video URL(s)`);

    const first = await this.downloadFromQueue(async (state, artifact) => {
      await state.history.pushPlayed(artifact, true);
    });
    if (!first) {
      throw new FatalError('Failed to download the first video at startup');
    }

    const second = await this.downloadFromQueue((state, artifact) => state.cache.push(artifact));
    if (second) {
      this.logger.info("Second video downloaded and kept ready for immediate 'Next'");
    } else {
      this.logger.warn('Failed to download the second startup video');
    }

    if (this.state.queue.isEmpty()) {
      try {
        await this.fillQueue(1);
      } catch (error) {
        this.logger.warn(`Could not top up the queue: ${errorMessage(error)}`);
      }
    }

    this.channel.onSignal((signal) => this.handleSignal(signal));
    await this.channel.start();

    this.running = true;
    this.scheduleRefill(this.settings.refillIntervalMs);
    this.scheduleMaintenance();

    const current = this.state.history.current();
    if (current) {
      await this.present(
        this.settings.requesterId,
        current,
        this.state.history.currentIndex,
        WELCOME_CAPTION
      );
    }

    try {
      await this.state.withLock(() => this.enforcer.enforce());
    } catch (error) {
      this.logger.warn(`Startup cleanup failed: ${errorMessage(error)}`);
    }

    this.logger.info('Pipeline started', this.state.snapshot());
  }

  /**
   * One refill pass: keep at least one artifact ready, then top the discovery
   * queue up to capacity. Rejects when discovery fails so the caller can back
   * off.
   */
  async refillOnce(): Promise<RefillReport> {
    const report: RefillReport = { downloaded: false, discovered: 0, paused: false };

    if (this.state.cache.isEmpty() && !this.state.queue.isEmpty()) {
      const artifact = await this.downloadFromQueue((state, ready) => state.cache.push(ready));
      if (artifact) {
        report.downloaded = true;
        this.logger.info(`Pre-downloaded next video: ${artifact.path}`);
      }
    }

    if (this.state.queue.isFull()) {
      return report;
    }

    if (!this.breaker.allowsAttempt()) {
      report.paused = true;
      return report;
    }

    try {
      report.discovered = await this.fillQueue(this.state.queue.capacity);
      this.breaker.recordSuccess();
    } catch (error) {
      this.breaker.recordFailure();
      if (this.breaker.getState() === 'OPEN') {
        this.logger.warn(
          `Discovery failed ${this.breaker.getFailureCount()} times in a row; pausing for ` +
            `${Math.round(this.settings.discoveryPauseMs / 1000)}s`
        );
      }
      throw error;
    }

    return report;
  }

  /**
   * Serves the next artifact: the oldest ready one, or a fresh download from
   * the queue when nothing is ready.
   * @throws {NotFoundError} when both the cache and the queue are empty, or
   * once shutdown has begun
   * @throws {TransientError} when the fallback download fails
   */
  async moveNext(): Promise<NavigationResult> {
    if (this.stopping) {
      throw new NotFoundError('Pipeline is shutting down; not serving Next');
    }

    const served = await this.state.withLock(async (state) => {
      if (state.cache.isEmpty()) {
        return null;
      }
      const artifact = state.cache.shift();
      await state.history.pushPlayed(artifact, true);
      await state.sweepUnreferenced();
      return { status: 'moved', artifact, index: state.history.currentIndex } satisfies NavigationResult;
    });

    if (served) {
      this.logger.info(`Moved ready video to played: ${served.artifact.path}`);
      return served;
    }

    if (this.state.queue.isEmpty()) {
      throw new NotFoundError('No ready video and no URL in queue for Next');
    }

    let index = -1;
    const downloaded = await this.downloadFromQueue(async (state, artifact) => {
      await state.history.pushPlayed(artifact, true);
      index = state.history.currentIndex;
      await state.sweepUnreferenced();
    });
    if (!downloaded) {
      throw new TransientError('Failed to download a fallback video for Next');
    }

    this.logger.info(`Downloaded and moved to played for Next: ${downloaded.path}`);
    return { status: 'moved', artifact: downloaded, index };
  }

  /** Steps the history cursor back; never downloads */
  movePrevious(): Promise<NavigationResult> {
    return this.state.withLock((state) => state.history.movePrevious());
  }

  /**
   * Sends an artifact to the requester, extracting metadata on demand.
   * @returns whether the channel accepted it
   */
  async present(
    requesterId: RequesterId,
    artifact: ArtifactRef,
    navIndex: number,
    customCaption?: string
  ): Promise<boolean> {
    this.state.beginTransfer(artifact.path);
    try {
      if (!(await this.state.store.exists(artifact.path))) {
        this.logger.error(`Video file ${artifact.path} does not exist`);
        return false;
      }

      const metadata = await this.metadataFor(artifact);
      const presentation = {
        requesterId,
        artifact,
        navIndex,
        captionText: buildCaptionText(customCaption, metadata),
        actions: navigationActions(navIndex),
      };

      const { presentAttempts, presentRetryDelayMs } = this.settings;
      for (let attempt = 1; attempt <= presentAttempts; attempt++) {
        try {
          await this.channel.presentArtifact(presentation);
          return true;
        } catch (error) {
          this.logger.warn(
            `Failed to send video ${artifact.path} (attempt ${attempt}): ${errorMessage(error)}`
          );
          if (attempt < presentAttempts) {
            await sleep(presentRetryDelayMs);
          }
        }
      }

      this.logger.error(`Failed to send video ${artifact.path} after ${presentAttempts} attempts`);
      return false;
    } finally {
      this.state.endTransfer(artifact.path);
    }
  }

  /**
   * Entry point for inbound channel signals. Never rejects: failures are
   * logged, and a missing video is reported back to the requester. Once
   * shutdown has begun, Next is answered with "nothing available" and every
   * other signal is dropped.
   */
  handleSignal(signal: InboundSignal): Promise<void> {
    const task = this.dispatchSignal(signal).finally(() => {
      this.pendingSignals.delete(task);
    });
    this.pendingSignals.add(task);
    return task;
  }

  private async dispatchSignal(signal: InboundSignal): Promise<void> {
    const { requesterId } = signal;

    if (this.stopping && signal.type !== 'next' && signal.type !== 'post-next') {
      this.logger.debug(`Ignoring '${signal.type}' from ${requesterId}: shutting down`);
      return;
    }

    try {
      switch (signal.type) {
        case 'next':
        case 'post-next':
          await this.showNext(requesterId);
          break;
        case 'previous':
          await this.showPrevious(requesterId);
          break;
        case 'post':
          await this.beginPost(requesterId);
          break;
        case 'text':
          await this.acceptText(requesterId, signal.text);
          break;
      }
    } catch (error) {
      this.logger.error(`Handling '${signal.type}' for ${requesterId} failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Maintenance tick: disk budget, seen-window pruning, stale post flows and
   * browser recycling. Each step is independent; a failure is recorded and
   * the remaining steps still run.
   */
  async runMaintenance(): Promise<MaintenanceReport> {
    const report: MaintenanceReport = {
      budget: null,
      prunedSeen: 0,
      expiredFlows: 0,
      recycled: false,
      failures: [],
    };

    const step = async (name: string, task: () => Promise<void>): Promise<void> => {
      try {
        await task();
      } catch (error) {
        report.failures.push(name);
        this.logger.warn(`Maintenance step '${name}' failed: ${errorMessage(error)}`);
      }
    };

    await step('disk-budget', async () => {
      report.budget = await this.state.withLock(() => this.enforcer.enforce());
    });

    await step('seen-prune', async () => {
      report.prunedSeen = await this.state.withLock((state) => state.seen.pruneIfNeeded());
    });

    await step('post-flows', async () => {
      const expired = this.postFlows.expireStale(this.settings.postFlowTimeoutMs);
      report.expiredFlows = expired.length;
      for (const flow of expired) {
        this.logger.info(`Dropping abandoned post flow for ${flow.requesterId}`);
        await this.retractAll(flow.requesterId, flow.promptIds);
      }
    });

    await step('recycle', async () => {
      report.recycled = await this.sessionLock.runExclusive(() => this.recycler.recycleIfNeeded());
    });

    return report;
  }

  /**
   * Stops background work, waits for in-flight signal handlers and posts,
   * runs a final cleanup pass and closes the browser. Each step is attempted
   * even if an earlier one failed. Safe to call twice.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    this.logger.info('Shutting down pipeline...');
    this.stopping = true;
    this.running = false;

    if (this.refillTimer) {
      clearTimeout(this.refillTimer);
      this.refillTimer = null;
    }
    if (this.maintenanceTimer) {
      clearTimeout(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }

    try {
      await this.channel.stop();
    } catch (error) {
      this.logger.warn(`Failed to stop the channel: ${errorMessage(error)}`);
    }

    await Promise.allSettled([...this.pendingSignals]);
    await Promise.allSettled([this.refillTask, this.maintenanceTask, ...this.pendingPosts]);

    try {
      await this.state.withLock(() => this.enforcer.enforce());
    } catch (error) {
      this.logger.warn(`Final cleanup failed: ${errorMessage(error)}`);
    }

    try {
      await this.sessionLock.runExclusive(() => this.recycler.stopSession());
      this.logger.info('Browser session closed');
    } catch (error) {
      this.logger.warn(`Failed to close the browser session: ${errorMessage(error)}`);
    }
  }

  private async showNext(requesterId: RequesterId): Promise<void> {
    let result: NavigationResult;
    try {
      result = await this.moveNext();
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof TransientError) {
        this.logger.warn(error.message);
        await this.channel.notify(requesterId, NOTHING_AVAILABLE_MESSAGE, ['next']);
        return;
      }
      throw error;
    }

    if (result.status === 'moved') {
      await this.present(requesterId, result.artifact, result.index);
    }
  }

  private async showPrevious(requesterId: RequesterId): Promise<void> {
    const result = await this.movePrevious();
    if (result.status === 'boundary') {
      this.logger.warn('Already at the first video');
      return;
    }

    this.logger.info(`Moving to previous video at index ${result.index}`);
    await this.present(requesterId, result.artifact, result.index);
  }

  private async beginPost(requesterId: RequesterId): Promise<void> {
    const current = this.state.history.current();
    if (!current) {
      this.logger.warn('No current video to post');
      return;
    }

    const previous = this.postFlows.cancel(requesterId);
    if (previous) {
      await this.retractAll(requesterId, previous.promptIds);
    }

    this.postFlows.begin(requesterId, current);
    const promptId = await this.channel.requestText(requesterId, COMMENT_PROMPT);
    this.postFlows.trackPrompt(requesterId, promptId);
  }

  private async acceptText(requesterId: RequesterId, text: string): Promise<void> {
    const outcome = this.postFlows.acceptText(requesterId, text);
    if (outcome.status === 'ignored') {
      return;
    }

    await this.retractAll(requesterId, outcome.retract);

    if (outcome.status === 'awaiting-hashtags') {
      const promptId = await this.channel.requestText(requesterId, HASHTAG_PROMPT);
      this.postFlows.trackPrompt(requesterId, promptId);
      return;
    }

    await this.channel.notify(requesterId, POST_PROCESSING_MESSAGE, ['post-next']);
    this.dispatchPost(outcome.flow);
  }

  /** Posts in the background; the promise is kept so shutdown can wait for it */
  private dispatchPost(flow: PendingPostFlow): void {
    const { path } = flow.artifact;
    this.state.beginTransfer(path);

    const task = this.sessionLock
      .runExclusive(() =>
        withTimeout('Posting', this.settings.postTimeoutMs, (signal) =>
          this.poster.post({ path, caption: flow.comment, hashtags: flow.hashtags, signal })
        )
      )
      .then(
        (posted) => {
          if (posted) {
            this.logger.info(`Background post succeeded for ${path}`);
          } else {
            this.logger.warn(`Background post failed for ${path}`);
          }
        },
        (error: unknown) => {
          this.logger.error(`Background post raised: ${errorMessage(error)}`);
        }
      )
      .finally(() => {
        this.state.endTransfer(path);
        this.pendingPosts.delete(task);
      });

    this.pendingPosts.add(task);
  }

  private async retractAll(requesterId: RequesterId, promptIds: string[]): Promise<void> {
    for (const promptId of promptIds) {
      try {
        await this.channel.retractPrompt(requesterId, promptId);
      } catch (error) {
        this.logger.debug(`Could not retract prompt ${promptId}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Discovers identifiers until the queue holds `target` entries. Bounded by
   * the queue's capacity so a discoverer that keeps returning duplicates
   * cannot spin forever.
   * @returns how many identifiers were queued
   */
  private async fillQueue(target: number): Promise<number> {
    let added = 0;
    for (let attempt = 0; attempt < this.state.queue.capacity * 2; attempt++) {
      if (this.stopping || this.state.queue.length >= target) {
        break;
      }
      const ref = await this.discoverOne();
      if (await this.enqueue(ref)) {
        added++;
        this.logger.debug(`Added new video URL to queue: ${ref}`);
      }
    }
    return added;
  }

  private discoverOne(): Promise<ContentRef> {
    return this.sessionLock.runExclusive(() =>
      withTimeout('Discovery', this.settings.discoveryTimeoutMs, (signal) =>
        this.discoverer.discoverOne({
          isSeen: (ref) => this.state.seen.isSeen(ref) || this.state.queue.has(ref),
          signal,
        })
      )
    );
  }

  private enqueue(ref: ContentRef): Promise<boolean> {
    return this.state.withLock((state) => {
      if (state.queue.isFull() || !state.seen.markSeen(ref)) {
        return false;
      }
      state.queue.push(ref);
      this.recycler.recordPreload();
      return true;
    });
  }

  /**
   * Pops the oldest queued identifier, downloads it outside the lock, and
   * publishes the artifact with `publish` inside it. The target path stays
   * reserved until publishing is done.
   * @returns the published artifact, or null when nothing was published
   * (shutdown under way, empty queue, skipped clip or failed download)
   */
  private async downloadFromQueue(publish: Publish): Promise<ArtifactRef | null> {
    const ref = await this.state.withLock((state) =>
      this.stopping || state.queue.isEmpty() ? null : state.queue.shift()
    );
    if (ref === null) {
      return null;
    }

    const targetPath = this.state.store.pathFor(ref);
    this.state.beginTransfer(targetPath);
    try {
      const outcome = await retryWithBackoff(
        () =>
          withTimeout('Download', this.settings.downloadTimeoutMs, (signal) =>
            this.downloader.download({ ref, targetPath, signal })
          ),
        {
          config: { maxRetries: this.settings.downloadRetries },
          onRetry: (attempt, kind) => {
            this.logger.info(`Retrying download of ${ref} after ${kind} (retry ${attempt})`);
          },
        }
      );

      if (outcome.status === 'skipped') {
        this.logger.info(`Skipped ${ref}: ${outcome.reason}`);
        return null;
      }

      const { artifact, metadata } = outcome;
      await this.state.withLock(async (state) => {
        if (metadata) {
          state.store.metadata.set(artifact.path, metadata);
        }
        await publish(state, artifact);
      });
      return artifact;
    } catch (error) {
      this.logger.warn(`Download failed for ${ref}: ${errorMessage(error)}`);
      return null;
    } finally {
      this.state.endTransfer(targetPath);
    }
  }

  private async metadataFor(artifact: ArtifactRef): Promise<ArtifactMetadata> {
    const known = this.state.store.metadata.get(artifact.path);
    if (known) {
      return known;
    }

    let extracted: ArtifactMetadata | null = null;
    try {
      extracted = await withTimeout('Metadata', this.settings.serveMetadataTimeoutMs, (signal) =>
        this.extractor.extract(artifact.source, {
          timeoutMs: this.settings.serveMetadataTimeoutMs,
          signal,
        })
      );
    } catch (error) {
      this.logger.debug(`Metadata unavailable for ${artifact.source}: ${errorMessage(error)}`);
    }

    const metadata = extracted ?? EMPTY_METADATA;
    if (this.state.isReferenced(artifact.path)) {
      this.state.store.metadata.set(artifact.path, metadata);
    }
    return metadata;
  }

  private scheduleRefill(delayMs: number): void {
    if (this.stopping) {
      return;
    }
    this.refillTimer = setTimeout(() => {
      this.refillTimer = null;
      this.refillTask = this.refillTick().finally(() => {
        this.refillTask = null;
      });
    }, delayMs);
  }

  private async refillTick(): Promise<void> {
    let delay = this.settings.refillIntervalMs;
    try {
      await this.refillOnce();
    } catch (error) {
      this.logger.warn(`Refill failed: ${errorMessage(error)}`);
      delay = this.settings.refillFailureDelayMs;
    }
    this.scheduleRefill(delay);
  }

  private scheduleMaintenance(): void {
    if (this.stopping) {
      return;
    }
    this.maintenanceTimer = setTimeout(() => {
      this.maintenanceTimer = null;
      this.maintenanceTask = this.runMaintenance()
        .then((report) => {
          this.logger.debug('Maintenance done', report);
        })
        .finally(() => {
          this.maintenanceTask = null;
          this.scheduleMaintenance();
        });
    }, this.settings.maintenanceIntervalMs);
  }
}
