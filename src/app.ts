import { PlaywrightSession } from './adapters/browser/PlaywrightSession.js';
import { ConsoleChannel } from './adapters/console/ConsoleChannel.js';
import { loadCookies, writeNetscapeCookies } from './adapters/cookies.js';
import { YtDlpClient } from './adapters/ytdlp/YtDlpClient.js';
import type { Config } from './config/index.js';
import type {
  ArtifactDownloader,
  ArtifactPoster,
  ContentDiscoverer,
  ExternalRuntimeSession,
  MetadataExtractor,
  NotificationChannel,
} from './pipeline/collaborators.js';
import { errorMessage } from './pipeline/errors.js';
import { PipelineOrchestrator } from './pipeline/PipelineOrchestrator.js';
import { processMemorySampler, type MemorySampler } from './runtime/memorySampler.js';
import { RuntimeRecycler } from './runtime/RuntimeRecycler.js';
import { PipelineState } from './state/PipelineState.js';
import { ArtifactStore } from './storage/ArtifactStore.js';
import { DiskBudgetEnforcer } from './storage/DiskBudgetEnforcer.js';
import { statfsProbe, type DiskUsageProbe } from './storage/diskUsage.js';
import { mbToBytes } from './utils/formatBytes.js';
import { createLogger } from './utils/logger.js';
import { secondsToMs } from './utils/timeout.js';

const logger = createLogger('app');

/** Replaceable collaborators; anything left out gets the default adapter */
export interface AppOverrides {
  session?: ExternalRuntimeSession;
  discoverer?: ContentDiscoverer;
  poster?: ArtifactPoster;
  downloader?: ArtifactDownloader;
  extractor?: MetadataExtractor;
  channel?: NotificationChannel;
  probe?: DiskUsageProbe;
  sampler?: MemorySampler;
  /** Skip writing the Netscape cookie jar */
  skipCookieJar?: boolean;
}

export interface App {
  state: PipelineState;
  orchestrator: PipelineOrchestrator;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Converts the JSON cookie export into the cookie jar yt-dlp reads. Downloads
 * of public clips still work without it, so failure is only a warning.
 */
export async function prepareCookieJar(config: Config): Promise<void> {
  try {
    const cookies = await loadCookies(config.source.cookiesFile);
    await writeNetscapeCookies(cookies, config.source.netscapeCookiesFile);
  } catch (error) {
    logger.warn(`Cookie jar not written: ${errorMessage(error)}`);
  }
}

export function createApp(config: Config, overrides: AppOverrides = {}): App {
  const store = new ArtifactStore(config.storage.outputDir);
  const state = new PipelineState(config.capacity, store);

  const browser =
    overrides.session && overrides.discoverer && overrides.poster
      ? null
      : new PlaywrightSession({
          feedUrl: config.source.feedUrl,
          cookiesFile: config.source.cookiesFile,
          headless: config.runtime.headless,
          discoveryRetries: config.source.discoveryRetries,
        });

  const ytDlp =
    overrides.downloader && overrides.extractor
      ? null
      : new YtDlpClient({
          binary: config.source.ytDlpPath,
          cookiesFile: config.source.netscapeCookiesFile,
          durationWindow: {
            minSec: config.source.minDurationSec,
            maxSec: config.source.maxDurationSec,
          },
          metadataTimeoutMs: secondsToMs(config.source.metadataTimeoutSec),
          downloadTimeoutMs: secondsToMs(config.source.downloadTimeoutSec),
        });

  const pick = <T>(override: T | undefined, fallback: T | null, name: string): T => {
    const chosen = override ?? fallback;
    if (chosen === null) {
      throw new Error(`No ${name} configured`);
    }
    return chosen;
  };

  const session = pick<ExternalRuntimeSession>(overrides.session, browser, 'session');

  const recycler = new RuntimeRecycler(
    session,
    {
      restartPreloads: config.runtime.restartPreloads,
      memSoftLimitMb: config.runtime.memSoftLimitMb,
      sessionTimeoutMs: secondsToMs(config.runtime.sessionTimeoutSec),
    },
    overrides.sampler ?? processMemorySampler
  );

  const enforcer = new DiskBudgetEnforcer(
    state,
    {
      quotaBytes: mbToBytes(config.storage.quotaMb),
      reserveBytes: mbToBytes(config.storage.reserveMb),
    },
    overrides.probe ?? statfsProbe
  );

  const orchestrator = new PipelineOrchestrator(
    {
      state,
      enforcer,
      recycler,
      discoverer: pick<ContentDiscoverer>(overrides.discoverer, browser, 'discoverer'),
      poster: pick<ArtifactPoster>(overrides.poster, browser, 'poster'),
      downloader: pick<ArtifactDownloader>(overrides.downloader, ytDlp, 'downloader'),
      extractor: pick<MetadataExtractor>(overrides.extractor, ytDlp, 'extractor'),
      channel: overrides.channel ?? new ConsoleChannel({ requesterId: config.channel.requesterId }),
    },
    {
      requesterId: config.channel.requesterId,
      discoveryTimeoutMs: secondsToMs(config.source.discoveryTimeoutSec),
      downloadTimeoutMs: secondsToMs(config.source.downloadTimeoutSec),
      serveMetadataTimeoutMs: secondsToMs(config.source.serveMetadataTimeoutSec),
      postTimeoutMs: secondsToMs(config.source.postTimeoutSec),
      postFlowTimeoutMs: secondsToMs(config.channel.postFlowTimeoutSec),
      maintenanceIntervalMs: secondsToMs(config.storage.maintenanceIntervalSec),
    }
  );

  return {
    state,
    orchestrator,
    async start() {
      await store.initialize();
      if (!overrides.skipCookieJar) {
        await prepareCookieJar(config);
      }
      await orchestrator.start();
    },
    shutdown: () => orchestrator.shutdown(),
  };
}
