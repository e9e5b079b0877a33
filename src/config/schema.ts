import { z } from 'zod';

/**
 * Helper to parse boolean-like environment variables
 */
const booleanString = (defaultValue: boolean = false) =>
  z
    .string()
    .optional()
    .default(String(defaultValue))
    .transform((val) => /^(1|true|yes)$/i.test(val || ''));

/**
 * Helper to parse numeric environment variables with defaults
 */
const numericString = (defaultValue: number) =>
  z
    .string()
    .optional()
    .default(String(defaultValue))
    .transform((val) => {
      if (val === undefined) return defaultValue;
      const parsed = Number(val);
      return Number.isFinite(parsed) ? parsed : defaultValue;
    });

/**
 * Numeric setting that must stay a positive integer once parsed
 */
const capacityString = (defaultValue: number) =>
  numericString(defaultValue).pipe(
    z.number().int('must be a whole number').positive('must be greater than zero')
  );

/**
 * Numeric setting that must be greater than zero (intervals, timeouts, limits)
 */
const positiveString = (defaultValue: number) =>
  numericString(defaultValue).pipe(z.number().positive('must be greater than zero'));

/**
 * Numeric setting where zero is meaningful but negatives are not
 */
const nonNegativeString = (defaultValue: number) =>
  numericString(defaultValue).pipe(z.number().nonnegative('must not be negative'));

/**
 * Bounded container sizes
 */
const capacityConfigSchema = z.object({
  queue: capacityString(3).describe('Pending discovery identifiers kept ready (default: 3)'),
  cache: capacityString(3).describe('Downloaded artifacts ready to serve (default: 3)'),
  history: capacityString(3).describe('Served artifacts kept for back-navigation (default: 3)'),
  seen: capacityString(250).describe('Size of the seen-URL deduplication window (default: 250)'),
});

/**
 * Disk budget and maintenance cadence
 */
const storageConfigSchema = z.object({
  outputDir: z
    .string()
    .optional()
    .default('./downloads')
    .describe('Directory downloaded artifacts are written to (default: ./downloads)'),
  quotaMb: positiveString(1024).describe('Ceiling for tracked artifact bytes in MB (default: 1024)'),
  reserveMb: nonNegativeString(2048).describe('Minimum free disk space in MB (default: 2048)'),
  maintenanceIntervalSec: positiveString(180).describe(
    'Seconds between maintenance passes (default: 180)'
  ),
});

/**
 * Browser session recycling
 */
const runtimeConfigSchema = z.object({
  restartPreloads: nonNegativeString(200).pipe(z.number().int('must be a whole number')).describe(
    'Preloads before the browser is restarted, 0 disables (default: 200)'
  ),
  memSoftLimitMb: positiveString(1200).describe(
    'Resident memory in MB that forces a browser restart (default: 1200)'
  ),
  headless: booleanString(true).describe('Run the browser headless (default: true)'),
  sessionTimeoutSec: positiveString(60).describe(
    'Bound for browser start, stop and credential calls (default: 60)'
  ),
});

/**
 * Discovery and extraction collaborators
 */
const sourceConfigSchema = z.object({
  feedUrl: z
    .string()
    .url('FEED_URL must be a valid URL')
    .optional()
    .default('https://www.tiktok.com/')
    .describe('Page the discoverer scrolls for content links'),
  cookiesFile: z
    .string()
    .optional()
    .default('cookies.json')
    .describe('JSON cookie export applied to the browser session'),
  netscapeCookiesFile: z
    .string()
    .optional()
    .default('cookies.txt')
    .describe('Netscape cookie jar written for the extraction tool'),
  ytDlpPath: z.string().optional().default('yt-dlp').describe('yt-dlp executable'),
  minDurationSec: nonNegativeString(5).describe('Shortest accepted clip in seconds (default: 5)'),
  maxDurationSec: positiveString(50).describe('Longest accepted clip in seconds (default: 50)'),
  downloadTimeoutSec: positiveString(180).describe('Bound for one download (default: 180)'),
  metadataTimeoutSec: positiveString(12).describe(
    'Bound for metadata extraction during download (default: 12)'
  ),
  serveMetadataTimeoutSec: positiveString(8).describe(
    'Bound for lazy metadata extraction at serve time (default: 8)'
  ),
  discoveryTimeoutSec: positiveString(60).describe('Bound for one discovery call (default: 60)'),
  discoveryRetries: capacityString(5).describe('Attempts inside one discovery call (default: 5)'),
  postTimeoutSec: positiveString(120).describe('Bound for one post (default: 120)'),
});

/**
 * Remote control channel settings
 */
const channelConfigSchema = z.object({
  requesterId: z
    .string()
    .optional()
    .default('console')
    .describe('Requester id used for unsolicited presentations (default: console)'),
  postFlowTimeoutSec: positiveString(600).describe(
    'Idle seconds before an unfinished post flow is dropped (default: 600)'
  ),
});

/**
 * Application settings schema
 */
const appConfigSchema = z.object({
  verbose: booleanString().describe('Enable verbose logging'),
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error'])
    .optional()
    .default('info')
    .describe('Minimum level written by component loggers (default: info)'),
});

/**
 * Complete configuration schema
 */
export const configSchema = z
  .object({
    capacity: capacityConfigSchema,
    storage: storageConfigSchema,
    runtime: runtimeConfigSchema,
    source: sourceConfigSchema,
    channel: channelConfigSchema,
    app: appConfigSchema,
  })
  .refine((config) => config.source.minDurationSec <= config.source.maxDurationSec, {
    message: 'MIN_DURATION_SEC must not exceed MAX_DURATION_SEC',
    path: ['source', 'minDurationSec'],
  });

/**
 * Environment variables schema - maps env vars to config structure
 */
export const envSchema = z.object({
  OUTPUT_DIR: z.string().optional(),
  QUEUE_CAPACITY: z.string().optional(),
  CACHE_CAPACITY: z.string().optional(),
  HISTORY_CAPACITY: z.string().optional(),
  SEEN_URLS_MAX: z.string().optional(),
  OUTPUT_DISK_QUOTA_MB: z.string().optional(),
  OUTPUT_DISK_RESERVE_MB: z.string().optional(),
  MAINTENANCE_INTERVAL_SEC: z.string().optional(),
  BROWSER_RESTART_PRELOADS: z.string().optional(),
  MEM_SOFT_LIMIT_MB: z.string().optional(),
  BROWSER_HEADLESS: z.string().optional(),
  SESSION_TIMEOUT_SEC: z.string().optional(),
  FEED_URL: z.string().optional(),
  COOKIES_FILE: z.string().optional(),
  NETSCAPE_COOKIES_FILE: z.string().optional(),
  YTDLP_PATH: z.string().optional(),
  MIN_DURATION_SEC: z.string().optional(),
  MAX_DURATION_SEC: z.string().optional(),
  DOWNLOAD_TIMEOUT_SEC: z.string().optional(),
  METADATA_TIMEOUT_SEC: z.string().optional(),
  SERVE_METADATA_TIMEOUT_SEC: z.string().optional(),
  DISCOVERY_TIMEOUT_SEC: z.string().optional(),
  DISCOVERY_RETRIES: z.string().optional(),
  POST_TIMEOUT_SEC: z.string().optional(),
  REQUESTER_ID: z.string().optional(),
  POST_FLOW_TIMEOUT_SEC: z.string().optional(),
  VERBOSE: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});

/**
 * TypeScript type for the complete configuration
 */
export type Config = z.infer<typeof configSchema>;

/**
 * TypeScript type for environment variables
 */
export type EnvVars = z.infer<typeof envSchema>;
