/**
 * Logger Module
 *
 * Leveled logger with an optional rotating log file. Without a log directory
 * entries go to the console; the CLI silences the console while a spinner or
 * progress bar owns the terminal.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Log levels ordered by severity (lower = more severe)
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

/**
 * Logger interface defining the logging methods
 */
export interface Logger {
  error(component: string, message: string, meta?: object): void;
  warn(component: string, message: string, meta?: object): void;
  info(component: string, message: string, meta?: object): void;
  debug(component: string, message: string, meta?: object): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  /** Suppress console output (file output is unaffected) */
  setSilentConsole(silent: boolean): void;
  /** Wait until queued file writes have been flushed */
  flush(): Promise<void>;
}

/**
 * Configuration options for the logger
 */
export interface LoggerConfig {
  /** Directory for the log file; console only when omitted */
  logDir?: string;
  /** Rotate once the active file reaches this many bytes (default: 5MB) */
  maxFileSize?: number;
  /** Rotated files to keep (default: 3) */
  maxFiles?: number;
  /** Initial log level (default: INFO) */
  level?: LogLevel;
  /** Log file name (default: interface-map.log) */
  fileName?: string;
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const DEFAULT_MAX_FILES = 3;
export const DEFAULT_LOG_FILE_NAME = 'interface-map.log';

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

class FileLogger implements Logger {
  private level: LogLevel;
  private logDir: string | null;
  private readonly maxFileSize: number;
  private readonly maxFiles: number;
  private readonly fileName: string;
  private writeQueue: Promise<void> = Promise.resolve();
  private silentConsole = false;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? LogLevel.INFO;
    this.logDir = config.logDir ?? null;
    this.maxFileSize = config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFiles = config.maxFiles ?? DEFAULT_MAX_FILES;
    this.fileName = config.fileName ?? DEFAULT_LOG_FILE_NAME;

    if (this.logDir) {
      this.ensureLogDir();
    }
  }

  private ensureLogDir(): void {
    if (!this.logDir) return;
    try {
      fs.mkdirSync(this.logDir, { recursive: true });
    } catch (err) {
      // Console logging takes over when the directory is unusable
      console.error(`[Logger] Failed to create log directory: ${this.logDir}`, err);
      this.logDir = null;
    }
  }

  private activeFile(): string | null {
    return this.logDir ? path.join(this.logDir, this.fileName) : null;
  }

  private rotatedFile(logDir: string, index: number): string {
    const stem = path.basename(this.fileName, path.extname(this.fileName));
    return path.join(logDir, `${stem}.${index}.log`);
  }

  /**
   * Shift `name.log` to `name.1.log`, `name.1.log` to `name.2.log` and so on,
   * dropping the oldest, once the active file is over the size limit
   */
  private rotateIfNeeded(logDir: string, activeFile: string): void {
    if (!fs.existsSync(activeFile)) return;
    if (fs.statSync(activeFile).size < this.maxFileSize) return;

    const oldest = this.rotatedFile(logDir, this.maxFiles - 1);
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.maxFiles - 2; i >= 0; i--) {
      const from = i === 0 ? activeFile : this.rotatedFile(logDir, i);
      if (fs.existsSync(from)) {
        fs.renameSync(from, this.rotatedFile(logDir, i + 1));
      }
    }
  }

  private format(level: LogLevel, component: string, message: string, meta?: object): string {
    const line = `[${new Date().toISOString()}] [${LEVEL_NAMES[level]}] [${component}] ${message}`;
    return meta && Object.keys(meta).length > 0 ? `${line} ${JSON.stringify(meta)}` : line;
  }

  private write(level: LogLevel, component: string, message: string, meta?: object): void {
    if (level > this.level) return;

    const entry = this.format(level, component, message, meta);
    const logDir = this.logDir;
    const activeFile = this.activeFile();

    if (!logDir || !activeFile) {
      this.toConsole(level, entry);
      return;
    }

    // Sequential so rotation never races an append
    this.writeQueue = this.writeQueue.then(() => {
      try {
        this.rotateIfNeeded(logDir, activeFile);
        fs.appendFileSync(activeFile, entry + '\n');
      } catch (err) {
        console.error('[Logger] Failed to write to log file:', err);
        this.toConsole(level, entry);
      }
    });
  }

  private toConsole(level: LogLevel, entry: string): void {
    if (this.silentConsole) return;
    // stderr throughout: stdout carries command output such as --json
    if (level === LogLevel.DEBUG) {
      console.debug(entry);
    } else {
      console.error(entry);
    }
  }

  error(component: string, message: string, meta?: object): void {
    this.write(LogLevel.ERROR, component, message, meta);
  }

  warn(component: string, message: string, meta?: object): void {
    this.write(LogLevel.WARN, component, message, meta);
  }

  info(component: string, message: string, meta?: object): void {
    this.write(LogLevel.INFO, component, message, meta);
  }

  debug(component: string, message: string, meta?: object): void {
    this.write(LogLevel.DEBUG, component, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSilentConsole(silent: boolean): void {
    this.silentConsole = silent;
  }

  flush(): Promise<void> {
    return this.writeQueue;
  }
}

let loggerInstance: FileLogger | null = null;

/**
 * Log level from the environment.
 *
 * `INTERFACE_MAP_DEBUG` or `DEBUG` set to `1`, `true` or `debug` wins;
 * otherwise `INTERFACE_MAP_LOG_LEVEL` or `LOG_LEVEL` is parsed.
 */
export function getLogLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const debug = (env.INTERFACE_MAP_DEBUG || env.DEBUG)?.toLowerCase();
  if (debug === '1' || debug === 'true' || debug === 'debug') {
    return LogLevel.DEBUG;
  }

  const logLevel = env.INTERFACE_MAP_LOG_LEVEL || env.LOG_LEVEL;
  return logLevel ? parseLogLevel(logLevel) : LogLevel.INFO;
}

/**
 * Replace the shared logger with one writing to `<logDir>/interface-map.log`
 *
 * @param logDir - Directory for the log file
 * @param config - Additional configuration options
 */
export function createLogger(
  logDir: string,
  config: Omit<LoggerConfig, 'logDir'> = {}
): Logger {
  loggerInstance = new FileLogger({ level: getLogLevelFromEnv(), ...config, logDir });
  return loggerInstance;
}

/**
 * Get the shared logger, creating a console-only one on first use
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    const level = getLogLevelFromEnv();
    loggerInstance = new FileLogger({ level });
    if (level === LogLevel.DEBUG) {
      loggerInstance.debug('logger', 'Debug logging enabled via environment variable');
    }
  }
  return loggerInstance;
}

/**
 * Drop the shared logger (tests)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

/**
 * Parse a log level name; unknown names fall back to INFO
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}
