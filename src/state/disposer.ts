import type { ArtifactRef } from '../types.js';

/**
 * Releases an artifact that left its container: deletes the file and purges
 * its metadata. Implementations never throw; deletion failures are logged.
 */
export interface ArtifactDisposer {
  /** @returns whether the file was actually removed */
  dispose(artifact: ArtifactRef): Promise<boolean>;
}
