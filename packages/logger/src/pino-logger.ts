import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LogLevel } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

/**
 * Anything pino can write serialized log lines to.
 */
export interface LogDestination {
  write(msg: string): void;
}

/**
 * Category logger. Supports both pino calling conventions:
 * `logger.info('message')` and `logger.info({ metadata }, 'message')`.
 */
export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerSettings {
  /** Write to stderr (pretty in development, JSON otherwise) */
  console: boolean;
  /** Write JSON lines to LOGGER_FILE_LOG_DIRNAME/LOGGER_FILE_LOG_FILENAME */
  file: boolean;
  level: LogLevel;
  /** Explicit destination, replaces every transport (used by tests and embedding callers) */
  destination?: LogDestination | undefined;
}

// Mutable settings so the CLI can toggle outputs at runtime
let settings: LoggerSettings = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
  level: env.LOGGER_LOG_LEVEL,
};

// Root logger instance
let rootLogger: pino.Logger | undefined;

// Cache for category loggers, cleared on reconfiguration
const categoryCache = new Map<string, pino.Logger>();

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(): boolean {
  // vitest may set NODE_ENV after this module was evaluated
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Ensures that the log directory exists; if not, it creates it.
 */
function ensureLogDirExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

function createRootLogger(): pino.Logger {
  interface TransportTarget {
    level: string;
    options: Record<string, unknown>;
    target: string;
  }

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: settings.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (settings.destination) {
    return pino.pino(pinoConfig, settings.destination);
  }

  // In test mode, use a noop stream to suppress all output without spawning transport workers
  if (isTestEnvironment()) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  const transportTargets: TransportTarget[] = [];

  // stdout carries command output, so console logs always go to stderr
  if (settings.console) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: settings.level,
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,service,environment',
          messageFormat: '{categoryLabel} | {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      transportTargets.push({
        level: settings.level,
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (settings.file) {
    ensureLogDirExists(env.LOGGER_FILE_LOG_DIRNAME);
    transportTargets.push({
      level: settings.level,
      options: {
        destination: path.join(env.LOGGER_FILE_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length === 0) {
    return pino.pino({ ...pinoConfig, enabled: false });
  }

  return pino.pino({ ...pinoConfig, transport: { targets: transportTargets } });
}

function getOrCreateCategoryLogger(category: string): pino.Logger {
  const cached = categoryCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 20),
  });
  categoryCache.set(category, categoryLogger);
  return categoryLogger;
}

type LogMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Resolves the underlying pino logger on every call, so loggers created at module
 * top level follow `configureLogger(...)` changes made afterwards.
 */
class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.write('trace', msgOrObj, msg);
  }

  debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.write('debug', msgOrObj, msg);
  }

  info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.write('info', msgOrObj, msg);
  }

  warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.write('warn', msgOrObj, msg);
  }

  error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.write('error', msgOrObj, msg);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateCategoryLogger(this.category).isLevelEnabled(level);
  }

  private write(method: LogMethod, msgOrObj: string | Record<string, unknown>, msg?: string): void {
    const target = getOrCreateCategoryLogger(this.category);
    if (typeof msgOrObj === 'string') {
      target[method](msgOrObj);
    } else {
      target[method](msgOrObj, msg);
    }
  }
}

/**
 * Returns a category logger that stays in sync with runtime reconfiguration.
 */
export function getLogger(category: string): Logger {
  return new CategoryLogger(category);
}

/**
 * Update logger settings at runtime (the CLI turns on stderr output for --verbose).
 * Drops cached loggers so the new configuration applies immediately.
 */
export function configureLogger(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
  rootLogger = undefined;
  categoryCache.clear();
}

/**
 * Restore the settings read from the environment.
 */
export function resetLoggerConfiguration(): void {
  configureLogger({
    console: env.LOGGER_CONSOLE_ENABLED,
    destination: undefined,
    file: env.LOGGER_FILE_LOG_ENABLED,
    level: env.LOGGER_LOG_LEVEL,
  });
}
