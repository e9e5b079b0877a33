/** Opaque identifier (URL) of discoverable remote content */
export type ContentRef = string;

/** Whoever drives navigation: a chat id, or `console` for the terminal channel */
export type RequesterId = string;

export type PromptId = string;

export interface ArtifactMetadata {
  /** Clip length in seconds, null when the extractor could not tell */
  duration: number | null;
  caption: string;
  /** Ordered, de-duplicated */
  hashtags: string[];
}

/**
 * Handle to a downloaded file. Held by exactly one of ReadyCache or HistoryLog;
 * metadata lives in the MetadataStore keyed by `path`.
 */
export interface ArtifactRef {
  path: string;
  source: ContentRef;
}

export type NavigationAction = 'previous' | 'post' | 'next' | 'post-next';

export type InboundSignal =
  | { type: 'next'; requesterId: RequesterId }
  | { type: 'previous'; requesterId: RequesterId }
  | { type: 'post'; requesterId: RequesterId }
  | { type: 'post-next'; requesterId: RequesterId }
  | { type: 'text'; requesterId: RequesterId; text: string };

export interface ArtifactPresentation {
  requesterId: RequesterId;
  artifact: ArtifactRef;
  /** Cursor position of the artifact inside the history */
  navIndex: number;
  captionText: string | null;
  actions: NavigationAction[];
}

export type NavigationResult =
  | { status: 'moved'; artifact: ArtifactRef; index: number }
  | { status: 'boundary'; index: number };

export interface DurationWindow {
  minSec: number;
  maxSec: number;
}
