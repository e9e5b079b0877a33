import type { ArtifactMetadata, NavigationAction } from '../types.js';

export const WELCOME_CAPTION =
  'Welcome! Browse fresh short videos with Next and Previous, or share the current one with Post.';

export const COMMENT_PROMPT = 'What would you like to comment?';
export const HASHTAG_PROMPT = 'What would you like as your #?';
export const POST_PROCESSING_MESSAGE =
  'Your post is now processing. Please check your account shortly to confirm.';
export const NOTHING_AVAILABLE_MESSAGE = 'Nothing available yet, please try again shortly.';

/**
 * Caption shown with an artifact: the custom text, the original caption and
 * the hashtags, each as its own paragraph. Null when there is nothing to show.
 */
export function buildCaptionText(
  customCaption: string | undefined,
  metadata: ArtifactMetadata | undefined
): string | null {
  const parts: string[] = [];

  if (customCaption) {
    parts.push(customCaption);
  }
  if (metadata?.caption) {
    parts.push(`Original Caption: ${metadata.caption}`);
  }
  if (metadata && metadata.hashtags.length > 0) {
    parts.push(`Hashtags: ${metadata.hashtags.join(' ')}`);
  }

  return parts.length > 0 ? parts.join('\n\n') : null;
}

export function navigationActions(navIndex: number): NavigationAction[] {
  return navIndex > 0 ? ['previous', 'post', 'next'] : ['post', 'next'];
}
