import { BYTES_PER_MB } from '../utils/formatBytes.js';

/**
 * Resident-memory reading of the automation process. `null` means the value is
 * unknown, which callers treat as a normal state rather than an error.
 */
export interface MemorySampler {
  sampleRssMb(): number | null;
}

/** Samples this process's resident set size */
export const processMemorySampler: MemorySampler = {
  sampleRssMb(): number | null {
    try {
      return Math.round(process.memoryUsage.rss() / BYTES_PER_MB);
    } catch {
      return null;
    }
  },
};

