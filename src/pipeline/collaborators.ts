import type {
  ArtifactMetadata,
  ArtifactPresentation,
  ArtifactRef,
  ContentRef,
  InboundSignal,
  NavigationAction,
  PromptId,
  RequesterId,
} from '../types.js';

export interface DiscoverOptions {
  /** Identifiers for which this returns true must not be offered */
  isSeen: (ref: ContentRef) => boolean;
  signal?: AbortSignal;
}

/**
 * Finds one fresh content identifier. Retries internally (refreshing its
 * session between attempts) and throws a FatalError once retries run out.
 */
export interface ContentDiscoverer {
  discoverOne(options: DiscoverOptions): Promise<ContentRef>;
}

export interface DownloadRequest {
  ref: ContentRef;
  /** Where the file must be written; reserved against cleanup for the duration */
  targetPath: string;
  signal?: AbortSignal;
}

export type DownloadOutcome =
  | { status: 'downloaded'; artifact: ArtifactRef; metadata: ArtifactMetadata | null; bytes: number }
  | { status: 'skipped'; reason: string };

/**
 * Fetches a clip to disk. Clips outside the duration window come back as
 * `skipped`; real failures throw (TimeoutError, TransientError).
 */
export interface ArtifactDownloader {
  download(request: DownloadRequest): Promise<DownloadOutcome>;
}

export interface ExtractOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Best-effort: null when metadata cannot be obtained */
export interface MetadataExtractor {
  extract(ref: ContentRef, options: ExtractOptions): Promise<ArtifactMetadata | null>;
}

export type SignalHandler = (signal: InboundSignal) => Promise<void>;

/**
 * Remote control surface. Outbound calls present artifacts and prompts;
 * inbound user actions arrive through the registered signal handler.
 */
export interface NotificationChannel {
  start(): Promise<void>;
  stop(): Promise<void>;
  onSignal(handler: SignalHandler): void;
  presentArtifact(presentation: ArtifactPresentation): Promise<void>;
  /** Asks for free text; the reply comes back as a `text` signal */
  requestText(requesterId: RequesterId, prompt: string): Promise<PromptId>;
  retractPrompt(requesterId: RequesterId, promptId: PromptId): Promise<void>;
  notify(requesterId: RequesterId, text: string, actions?: NavigationAction[]): Promise<void>;
}

/** The automation process discovery and posting run in */
export interface ExternalRuntimeSession {
  start(): Promise<void>;
  applyStoredCredentials(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
}

export interface PostRequest {
  path: string;
  caption: string;
  hashtags: string[];
  signal?: AbortSignal;
}

export interface ArtifactPoster {
  post(request: PostRequest): Promise<boolean>;
}
