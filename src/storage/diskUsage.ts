import { promises as fsPromises } from 'node:fs';

/**
 * Free-space source for the disk budget. Injectable so tests can simulate a
 * nearly full volume.
 */
export interface DiskUsageProbe {
  freeBytes(dir: string): Promise<number>;
}

export const statfsProbe: DiskUsageProbe = {
  async freeBytes(dir: string): Promise<number> {
    const stats = await fsPromises.statfs(dir);
    return stats.bavail * stats.bsize;
  },
};
