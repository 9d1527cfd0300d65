import fs from 'fs';
import path from 'path';
import util from 'util'; // For formatting arguments like console.log does
import type { LoggingConfig } from './configLoader';

// Define LogLevel enum here as the source of truth
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  RESPONSE = 'RESPONSE', // Direct answers to REPL controls
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.RESPONSE]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

let configuredConsoleLogLevel: LogLevel = LogLevel.INFO; // Default console log level
let configuredFileLogLevel: LogLevel = LogLevel.INFO;    // Default file log level
let currentLogFile: string | null = null;
let configuredConsoleQuietMode = false;

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Initial, minimal logger setup from environment variables.
 * This is for messages before the config files are loaded.
 * Console logging only at this stage.
 */
export function bootstrapLogger(): void {
  const envConsoleLogLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envConsoleLogLevel && isLogLevel(envConsoleLogLevel)) {
    configuredConsoleLogLevel = envConsoleLogLevel;
  }
  console.log(`[${new Date().toLocaleString()}] [INFO] Logger bootstrapped. Initial console Loglevel: ${configuredConsoleLogLevel}. Full config pending.`);
}

/**
 * Applies the full logging configuration from the loaded AppConfig.
 * This should be called after the config files are parsed.
 * @param config The logging configuration object.
 */
export function applyLoggerConfig(config: LoggingConfig): void {
  configuredConsoleLogLevel = config.consoleLogLevel || LogLevel.INFO;
  configuredFileLogLevel = config.fileLogLevel || LogLevel.INFO;
  configuredConsoleQuietMode = config.consoleQuietMode || false;

  if (config.logFile) {
    // Always resolve the log file path relative to the current working directory.
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
    currentLogFile = null; // Explicitly disable file logging if logFile is null/empty
  }
  log(LogLevel.INFO, `Logger fully configured. Console Loglevel: ${configuredConsoleLogLevel}, File Loglevel: ${configuredFileLogLevel}, File Path: ${currentLogFile || 'DISABLED'}`);
}

/**
 * Logs a message to the console and optionally to a file.
 * @param level The severity level of the message.
 * @param message The main message string (can include format specifiers).
 * @param args Additional arguments to format into the message string (like console.log).
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toLocaleString();
  const fullLogMessage = `[${timestamp}] [${level}] ${util.format(message, ...args)}`;

  if (levelOrder[level] >= levelOrder[configuredConsoleLogLevel]) {
    // In quiet mode, only RESPONSE, WARN, and ERROR reach the console.
    const suppressed = configuredConsoleQuietMode && (level === LogLevel.DEBUG || level === LogLevel.INFO);

    if (!suppressed) {
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(fullLogMessage);
          break;
        case LogLevel.INFO:
        case LogLevel.RESPONSE:
          console.info(fullLogMessage);
          break;
        case LogLevel.WARN:
          console.warn(fullLogMessage);
          break;
        case LogLevel.ERROR:
          console.error(fullLogMessage);
          break;
        default:
          console.log(fullLogMessage);
      }
    }
  }

  // File logging
  if (currentLogFile && (levelOrder[level] >= levelOrder[configuredFileLogLevel])) {
    try {
      fs.appendFileSync(currentLogFile, fullLogMessage + '\n', { encoding: 'utf8' });
    } catch (err) {
      // Avoid recursive log calls on file write error
      console.error(`[${new Date().toLocaleString()}] [ERROR] Failed to write to log file ${currentLogFile}: ${util.format(err)}`);
    }
  }
}

/**
 * Normalizes a caught value into loggable metadata.
 */
export function describeError(error: unknown): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}
