/**
 * Minimal levelled logger writing to the console.
 * The initial level comes from LOG_LEVEL; the CLI adjusts it via setLogLevel.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case "ERROR":
      return LogLevel.ERROR;
    case "WARN":
      return LogLevel.WARN;
    case "DEBUG":
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export const logger = {
  debug: (message: string): void => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  info: (message: string): void => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message);
    }
  },
  warn: (message: string): void => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  error: (message: string): void => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};

/**
 * Shortens a credential for log output so it can be correlated but not replayed.
 */
export function redact(value: string): string {
  return value.length <= 12 ? "***" : `${value.substring(0, 12)}...`;
}
