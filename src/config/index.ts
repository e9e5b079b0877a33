import { ZodError } from 'zod';
import { configSchema, envSchema, type Config } from './schema.js';
import { ConfigValidationError, ConfigNotLoadedError } from './errors.js';

/**
 * Singleton configuration instance
 */
let configInstance: Config | null = null;

/**
 * Loads and validates configuration from environment variables
 * @throws {ConfigValidationError} If validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    const rawEnv = {
      OUTPUT_DIR: env.OUTPUT_DIR,
      QUEUE_CAPACITY: env.QUEUE_CAPACITY,
      CACHE_CAPACITY: env.CACHE_CAPACITY,
      HISTORY_CAPACITY: env.HISTORY_CAPACITY,
      SEEN_URLS_MAX: env.SEEN_URLS_MAX,
      OUTPUT_DISK_QUOTA_MB: env.OUTPUT_DISK_QUOTA_MB,
      OUTPUT_DISK_RESERVE_MB: env.OUTPUT_DISK_RESERVE_MB,
      MAINTENANCE_INTERVAL_SEC: env.MAINTENANCE_INTERVAL_SEC,
      BROWSER_RESTART_PRELOADS: env.BROWSER_RESTART_PRELOADS,
      MEM_SOFT_LIMIT_MB: env.MEM_SOFT_LIMIT_MB,
      BROWSER_HEADLESS: env.BROWSER_HEADLESS,
      SESSION_TIMEOUT_SEC: env.SESSION_TIMEOUT_SEC,
      FEED_URL: env.FEED_URL,
      COOKIES_FILE: env.COOKIES_FILE,
      NETSCAPE_COOKIES_FILE: env.NETSCAPE_COOKIES_FILE,
      YTDLP_PATH: env.YTDLP_PATH,
      MIN_DURATION_SEC: env.MIN_DURATION_SEC,
      MAX_DURATION_SEC: env.MAX_DURATION_SEC,
      DOWNLOAD_TIMEOUT_SEC: env.DOWNLOAD_TIMEOUT_SEC,
      METADATA_TIMEOUT_SEC: env.METADATA_TIMEOUT_SEC,
      SERVE_METADATA_TIMEOUT_SEC: env.SERVE_METADATA_TIMEOUT_SEC,
      DISCOVERY_TIMEOUT_SEC: env.DISCOVERY_TIMEOUT_SEC,
      DISCOVERY_RETRIES: env.DISCOVERY_RETRIES,
      POST_TIMEOUT_SEC: env.POST_TIMEOUT_SEC,
      REQUESTER_ID: env.REQUESTER_ID,
      POST_FLOW_TIMEOUT_SEC: env.POST_FLOW_TIMEOUT_SEC,
      VERBOSE: env.VERBOSE,
      LOG_LEVEL: env.LOG_LEVEL,
    };

    const validatedEnv = envSchema.parse(rawEnv);

    // Transform environment variables into structured config (as strings for schema parsing)
    const configInput = {
      capacity: {
        queue: validatedEnv.QUEUE_CAPACITY,
        cache: validatedEnv.CACHE_CAPACITY,
        history: validatedEnv.HISTORY_CAPACITY,
        seen: validatedEnv.SEEN_URLS_MAX,
      },
      storage: {
        outputDir: validatedEnv.OUTPUT_DIR,
        quotaMb: validatedEnv.OUTPUT_DISK_QUOTA_MB,
        reserveMb: validatedEnv.OUTPUT_DISK_RESERVE_MB,
        maintenanceIntervalSec: validatedEnv.MAINTENANCE_INTERVAL_SEC,
      },
      runtime: {
        restartPreloads: validatedEnv.BROWSER_RESTART_PRELOADS,
        memSoftLimitMb: validatedEnv.MEM_SOFT_LIMIT_MB,
        headless: validatedEnv.BROWSER_HEADLESS,
        sessionTimeoutSec: validatedEnv.SESSION_TIMEOUT_SEC,
      },
      source: {
        feedUrl: validatedEnv.FEED_URL,
        cookiesFile: validatedEnv.COOKIES_FILE,
        netscapeCookiesFile: validatedEnv.NETSCAPE_COOKIES_FILE,
        ytDlpPath: validatedEnv.YTDLP_PATH,
        minDurationSec: validatedEnv.MIN_DURATION_SEC,
        maxDurationSec: validatedEnv.MAX_DURATION_SEC,
        downloadTimeoutSec: validatedEnv.DOWNLOAD_TIMEOUT_SEC,
        metadataTimeoutSec: validatedEnv.METADATA_TIMEOUT_SEC,
        serveMetadataTimeoutSec: validatedEnv.SERVE_METADATA_TIMEOUT_SEC,
        discoveryTimeoutSec: validatedEnv.DISCOVERY_TIMEOUT_SEC,
        discoveryRetries: validatedEnv.DISCOVERY_RETRIES,
        postTimeoutSec: validatedEnv.POST_TIMEOUT_SEC,
      },
      channel: {
        requesterId: validatedEnv.REQUESTER_ID,
        postFlowTimeoutSec: validatedEnv.POST_FLOW_TIMEOUT_SEC,
      },
      app: {
        verbose: validatedEnv.VERBOSE,
        logLevel: validatedEnv.LOG_LEVEL?.toLowerCase(),
      },
    };

    // Validate and transform the complete config structure
    configInstance = configSchema.parse(configInput);
    return configInstance;
  } catch (error) {
    if (error instanceof ZodError) {
      throw ConfigValidationError.fromZodError(error);
    }
    throw error;
  }
}

/**
 * Gets the current configuration instance
 * @throws {ConfigNotLoadedError} If config hasn't been loaded yet
 */
export function getConfig(): Config {
  if (!configInstance) {
    throw new ConfigNotLoadedError();
  }
  return configInstance;
}

/**
 * Checks if configuration has been loaded
 */
export function isConfigLoaded(): boolean {
  return configInstance !== null;
}

/**
 * Resets the configuration instance (primarily for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Export error classes for convenience
 */
export { ConfigValidationError, ConfigNotLoadedError } from './errors.js';

/**
 * Export types
 */
export type { Config } from './schema.js';
