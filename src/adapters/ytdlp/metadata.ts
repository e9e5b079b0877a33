import { z } from 'zod';
import type { ArtifactMetadata, DurationWindow } from '../../types.js';

const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;

/** The subset of yt-dlp's `--dump-json` output used here */
const videoInfoSchema = z.object({
  duration: z.number().nullish(),
  description: z.string().nullish(),
  tags: z.array(z.unknown()).nullish(),
});

export class MetadataParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetadataParseError';
    Object.setPrototypeOf(this, MetadataParseError.prototype);
  }
}

/**
 * Hashtags from the description followed by tags that already start with `#`,
 * de-duplicated, first occurrence wins.
 */
export function extractHashtags(description: string, tags: readonly unknown[]): string[] {
  const fromDescription = description.match(HASHTAG_PATTERN) ?? [];
  const fromTags = tags.filter((tag): tag is string => typeof tag === 'string' && tag.startsWith('#'));
  return [...new Set([...fromDescription, ...fromTags])];
}

/**
 * Parses the first JSON document of a `--dump-json` run. A missing duration
 * reads as 0 so the clip falls outside any duration window.
 * @throws {MetadataParseError}
 */
export function parseYtDlpMetadata(stdout: string): ArtifactMetadata {
  const firstLine = stdout
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine) {
    throw new MetadataParseError('yt-dlp printed no metadata');
  }

  let json: unknown;
  try {
    json = JSON.parse(firstLine);
  } catch (error) {
    throw new MetadataParseError('yt-dlp metadata is not valid JSON', { cause: error });
  }

  const result = videoInfoSchema.safeParse(json);
  if (!result.success) {
    throw new MetadataParseError(`Unexpected yt-dlp metadata: ${result.error.message}`);
  }

  const description = result.data.description ?? '';
  return {
    duration: result.data.duration ?? 0,
    caption: description.trim(),
    hashtags: extractHashtags(description, result.data.tags ?? []),
  };
}

/** Inclusive on both ends; an unknown duration is outside */
export function isWithinDurationWindow(duration: number | null, window: DurationWindow): boolean {
  return duration !== null && duration >= window.minSec && duration <= window.maxSec;
}
