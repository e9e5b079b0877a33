import type { ExternalRuntimeSession } from '../pipeline/collaborators.js';
import { FatalError, errorMessage } from '../pipeline/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import { processMemorySampler, type MemorySampler } from './memorySampler.js';

export interface RecyclerSettings {
  /** Preloads after which the session is restarted; 0 disables the counter trigger */
  restartPreloads: number;
  memSoftLimitMb: number;
  sessionTimeoutMs: number;
  /** Pause between stopping and starting again */
  restartPauseMs?: number;
}

export type RestartReason = 'preload-threshold' | 'memory-limit';

export interface RecycleDecision {
  restart: boolean;
  reasons: RestartReason[];
  preloads: number;
  rssMb: number | null;
}

const DEFAULT_RESTART_PAUSE_MS = 500;

/**
 * Keeps the long-lived browser session healthy by restarting it after a number
 * of preloads or once resident memory crosses the soft limit.
 */
export class RuntimeRecycler {
  private preloads = 0;
  private restarts = 0;

  constructor(
    private readonly session: ExternalRuntimeSession,
    private readonly settings: RecyclerSettings,
    private readonly sampler: MemorySampler = processMemorySampler,
    private readonly logger: Logger = createLogger('recycler')
  ) {}

  /** Called once per newly queued identifier */
  recordPreload(): number {
    this.preloads++;
    return this.preloads;
  }

  get preloadCount(): number {
    return this.preloads;
  }

  get restartCount(): number {
    return this.restarts;
  }

  evaluate(): RecycleDecision {
    const reasons: RestartReason[] = [];
    const { restartPreloads, memSoftLimitMb } = this.settings;

    if (restartPreloads > 0 && this.preloads >= restartPreloads) {
      reasons.push('preload-threshold');
    }

    const rssMb = this.sampler.sampleRssMb();
    if (rssMb !== null && rssMb >= memSoftLimitMb) {
      reasons.push('memory-limit');
    }

    return { restart: reasons.length > 0, reasons, preloads: this.preloads, rssMb };
  }

  /**
   * Restarts the session when `evaluate` says so. Failures are logged; the
   * counter is kept so the next evaluation tries again.
   * @returns true when a restart completed
   */
  async recycleIfNeeded(): Promise<boolean> {
    const decision = this.evaluate();
    if (!decision.restart) {
      return false;
    }

    const rss = decision.rssMb === null ? 'unknown' : `${decision.rssMb}MB`;
    this.logger.info(
      `Restarting browser (${decision.reasons.join(', ')}): preloads=${decision.preloads}, rss=${rss}`
    );

    try {
      await this.stopSession();
    } catch (error) {
      // A hung or dead browser still gets replaced
      this.logger.warn(`Browser stop failed, starting a new one anyway: ${errorMessage(error)}`);
    }

    try {
      await sleep(this.settings.restartPauseMs ?? DEFAULT_RESTART_PAUSE_MS);
      await this.startSession();
    } catch (error) {
      this.logger.warn(`Browser restart failed: ${errorMessage(error)}`);
      return false;
    }

    this.preloads = 0;
    this.restarts++;
    return true;
  }

  /**
   * Starts the session and re-applies stored credentials. A session that will
   * not start is fatal; credentials that fail to apply are only a warning.
   */
  async startSession(): Promise<void> {
    const { sessionTimeoutMs } = this.settings;

    try {
      await withTimeout('Browser start', sessionTimeoutMs, () => this.session.start());
    } catch (error) {
      throw new FatalError(`Could not start browser session: ${errorMessage(error)}`, { cause: error });
    }

    try {
      await withTimeout('Applying credentials', sessionTimeoutMs, () =>
        this.session.applyStoredCredentials()
      );
    } catch (error) {
      this.logger.warn(`Could not apply stored credentials: ${errorMessage(error)}`);
    }
  }

  /** Stops the session; one that is not running is left alone */
  async stopSession(): Promise<void> {
    if (!this.session.isRunning()) {
      this.logger.debug('Browser session is not running; nothing to stop');
      return;
    }
    await withTimeout('Browser stop', this.settings.sessionTimeoutMs, () => this.session.stop());
  }
}
