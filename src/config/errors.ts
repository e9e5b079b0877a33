import { ZodError } from 'zod';

/**
 * Config paths and the environment variables that feed them
 */
const ENV_NAME_BY_PATH: Record<string, string> = {
  'capacity.queue': 'QUEUE_CAPACITY',
  'capacity.cache': 'CACHE_CAPACITY',
  'capacity.history': 'HISTORY_CAPACITY',
  'capacity.seen': 'SEEN_URLS_MAX',
  'storage.outputDir': 'OUTPUT_DIR',
  'storage.quotaMb': 'OUTPUT_DISK_QUOTA_MB',
  'storage.reserveMb': 'OUTPUT_DISK_RESERVE_MB',
  'storage.maintenanceIntervalSec': 'MAINTENANCE_INTERVAL_SEC',
  'runtime.restartPreloads': 'BROWSER_RESTART_PRELOADS',
  'runtime.memSoftLimitMb': 'MEM_SOFT_LIMIT_MB',
  'runtime.sessionTimeoutSec': 'SESSION_TIMEOUT_SEC',
  'source.feedUrl': 'FEED_URL',
  'source.minDurationSec': 'MIN_DURATION_SEC',
  'source.maxDurationSec': 'MAX_DURATION_SEC',
  'source.downloadTimeoutSec': 'DOWNLOAD_TIMEOUT_SEC',
  'source.metadataTimeoutSec': 'METADATA_TIMEOUT_SEC',
  'source.serveMetadataTimeoutSec': 'SERVE_METADATA_TIMEOUT_SEC',
  'source.discoveryTimeoutSec': 'DISCOVERY_TIMEOUT_SEC',
  'source.discoveryRetries': 'DISCOVERY_RETRIES',
  'source.postTimeoutSec': 'POST_TIMEOUT_SEC',
  'channel.postFlowTimeoutSec': 'POST_FLOW_TIMEOUT_SEC',
  'app.logLevel': 'LOG_LEVEL',
};

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError?: ZodError
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }

  /**
   * Creates a user-friendly error message from a Zod validation error
   */
  static fromZodError(error: ZodError): ConfigValidationError {
    const issues = error.issues.map((err) => {
      const path = err.path.join('.');
      const envName = ENV_NAME_BY_PATH[path];
      return envName ? `  - ${envName} (${path}): ${err.message}` : `  - ${path}: ${err.message}`;
    });

    const message = [
      'Configuration validation failed:',
      '',
      ...issues,
      '',
      'Please check your environment variables and .env file (see .env.example).',
    ].join('\n');

    return new ConfigValidationError(message, error);
  }
}

/**
 * Error thrown when trying to access config before it's loaded
 */
export class ConfigNotLoadedError extends Error {
  constructor() {
    super(
      'Configuration has not been loaded yet. Call loadConfig() before accessing configuration.'
    );
    this.name = 'ConfigNotLoadedError';
    Object.setPrototypeOf(this, ConfigNotLoadedError.prototype);
  }
}
