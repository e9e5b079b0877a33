export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

let activeLevel: LogLevel = 'info';

/**
 * Sets the minimum level for every component logger
 */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[activeLevel];
}

function formatMessage(level: LogLevel, component: string, message: string, data?: unknown): string {
  const levelStr = level.toUpperCase().padEnd(5);
  let output = `[${new Date().toISOString()}] ${levelStr} [${component}] ${message}`;

  if (data !== undefined) {
    output += ` ${JSON.stringify(data instanceof Error ? { error: data.message } : data)}`;
  }

  return output;
}

export function createLogger(component: string): Logger {
  return {
    debug(message, data) {
      if (shouldLog('debug')) {
        console.debug(formatMessage('debug', component, message, data));
      }
    },

    info(message, data) {
      if (shouldLog('info')) {
        console.info(formatMessage('info', component, message, data));
      }
    },

    warn(message, data) {
      if (shouldLog('warn')) {
        console.warn(formatMessage('warn', component, message, data));
      }
    },

    error(message, data) {
      if (shouldLog('error')) {
        console.error(formatMessage('error', component, message, data));
      }
    },
  };
}
