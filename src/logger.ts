import fs from 'fs';
import path from 'path';
import util from 'util'; // For formatting arguments like console.log does
import type { LoggingConfig } from './configLoader';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

let configuredConsoleLogLevel: LogLevel = LogLevel.INFO;
let configuredFileLogLevel: LogLevel = LogLevel.INFO;
let currentLogFile: string | null = null;
let configuredConsoleQuietMode = false;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const upper = value?.toUpperCase();
  return Object.values(LogLevel).find((level) => level === upper);
}

/**
 * Minimal setup from the environment, for messages logged before the
 * configuration is loaded. Console only.
 */
export function bootstrapLogger(): void {
  const envConsoleLogLevel = parseLogLevel(process.env.LOG_LEVEL);
  if (envConsoleLogLevel) {
    configuredConsoleLogLevel = envConsoleLogLevel;
  }
  log(LogLevel.DEBUG, `Logger bootstrapped. Initial console log level: ${configuredConsoleLogLevel}. Full config pending.`);
}

/**
 * Applies the logging section of the loaded configuration.
 * An empty `logFile` disables file logging.
 */
export function applyLoggerConfig(config: LoggingConfig): void {
  configuredConsoleLogLevel = config.consoleLogLevel;
  configuredFileLogLevel = config.fileLogLevel;
  configuredConsoleQuietMode = config.consoleQuietMode;

  if (config.logFile) {
    // Relative paths resolve against the working directory.
    currentLogFile = path.resolve(process.cwd(), config.logFile);

    const logDir = path.dirname(currentLogFile);
    if (!fs.existsSync(logDir)) {
      try {
        fs.mkdirSync(logDir, { recursive: true });
      } catch (err) {
        console.error(`[${new Date().toLocaleString()}] [ERROR] Failed to create log directory: ${logDir}. File logging will be disabled. Error: ${util.format(err)}`);
        currentLogFile = null;
      }
    }
  } else {
    currentLogFile = null;
  }
  log(LogLevel.DEBUG, `Logger configured. Console log level: ${configuredConsoleLogLevel}, file log level: ${configuredFileLogLevel}, file path: ${currentLogFile || 'DISABLED'}`);
}

/**
 * Logs to the console and, when configured, appends to the log file.
 * `message` may contain util.format specifiers filled from `args`.
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toLocaleString();
  const fullLogMessage = `[${timestamp}] [${level}] ${util.format(message, ...args)}`;

  // Quiet mode keeps only WARN and ERROR on the console.
  const quieted = configuredConsoleQuietMode && levelOrder[level] < levelOrder[LogLevel.WARN];
  if (levelOrder[level] >= levelOrder[configuredConsoleLogLevel] && !quieted) {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(fullLogMessage);
        break;
      case LogLevel.INFO:
        console.info(fullLogMessage);
        break;
      case LogLevel.WARN:
        console.warn(fullLogMessage);
        break;
      case LogLevel.ERROR:
        console.error(fullLogMessage);
        break;
    }
  }

  if (currentLogFile && levelOrder[level] >= levelOrder[configuredFileLogLevel]) {
    try {
      fs.appendFileSync(currentLogFile, fullLogMessage + '\n', { encoding: 'utf8' });
    } catch (err) {
      // Not through log(), which would try the file again.
      console.error(`[${new Date().toLocaleString()}] [ERROR] Failed to write to log file ${currentLogFile}: ${util.format(err)}`);
    }
  }
}

export function _resetLoggerForTesting(): void {
  configuredConsoleLogLevel = LogLevel.INFO;
  configuredFileLogLevel = LogLevel.INFO;
  currentLogFile = null;
  configuredConsoleQuietMode = false;
}
