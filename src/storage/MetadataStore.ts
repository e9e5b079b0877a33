import type { ArtifactMetadata } from '../types.js';

export const EMPTY_METADATA: ArtifactMetadata = { duration: null, caption: '', hashtags: [] };

/**
 * Artifact path → extracted metadata. Entries live exactly as long as the
 * artifact sits in the ready cache or the history.
 */
export class MetadataStore {
  private entries = new Map<string, ArtifactMetadata>();

  get(path: string): ArtifactMetadata | undefined {
    return this.entries.get(path);
  }

  set(path: string, metadata: ArtifactMetadata): void {
    this.entries.set(path, metadata);
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  delete(path: string): boolean {
    return this.entries.delete(path);
  }

  get size(): number {
    return this.entries.size;
  }
}
