#!/usr/bin/env node

import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig, ConfigValidationError, type Config } from './config/index.js';
import { errorMessage } from './pipeline/errors.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const logger = createLogger('main');

// Load and validate configuration before starting the pipeline
let config: Config;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigValidationError) {
    console.error('\n' + error.message + '\n');
    process.exit(1);
  }
  throw error;
}

setLogLevel(config.app.verbose ? 'debug' : config.app.logLevel);

const app = createApp(config);

let exiting = false;
const exit = (code: number): void => {
  if (exiting) {
    return;
  }
  exiting = true;
  app
    .shutdown()
    .catch((error: unknown) => {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
    })
    .finally(() => {
      process.exit(code);
    });
};

process.on('SIGINT', () => exit(130));
process.on('SIGTERM', () => exit(143));

try {
  await app.start();
} catch (error) {
  logger.error(`Startup failed: ${errorMessage(error)}`);
  exit(1);
}
