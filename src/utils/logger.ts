/**
 * Logger Factory Module
 *
 * Centralized logging on top of Pino:
 * - Development (pretty print) vs Production (JSON) output
 * - Optional rotated file output through the pino-roll transport
 * - Child loggers with a bound `context` field
 * - Sensitive field redaction
 *
 * @module utils/logger
 */

import pino, { type Logger, type Level, type LoggerOptions } from 'pino';
import path from 'path';

/**
 * Log levels supported by Pino
 */
export type LogLevel = Level;

/**
 * Logger configuration interface
 */
export interface LoggerConfig {
  /** Log level (default: 'info' in production, 'debug' in development) */
  level?: LogLevel;
  /** Enable pretty print (default: auto-detected from NODE_ENV) */
  prettyPrint?: boolean;
  /** Rotated log file path; file logging is off when unset */
  file?: string;
  /** Fields to redact from logs */
  redact?: string[];
  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Sensitive field patterns that should be redacted
 */
const SENSITIVE_FIELDS = [
  'apiKey',
  'token',
  'password',
  'secret',
  'authorization',
  'cookie',
  'setCookie',
];

let rootLogger: Logger | null = null;
let configured = false;

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production';
}

function isTest(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level: LOG_LEVEL env first, then the fallback.
 */
function resolveLevel(fallback?: LogLevel): LogLevel | 'silent' {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  if (fallback) {
    return fallback;
  }
  if (isTest()) {
    return 'silent';
  }
  return isDevelopment() ? 'debug' : 'info';
}

function levelFormatter(label: string): { level: string } {
  return { level: label };
}

/**
 * Development configuration: pretty printed, human-oriented.
 */
function getDevelopmentConfig(level: LogLevel | 'silent'): LoggerOptions {
  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false,
        messageFormat: '[{context}] {msg}',
      },
    },
    formatters: { level: levelFormatter },
  };
}

/**
 * Production configuration: structured JSON.
 */
function getProductionConfig(level: LogLevel | 'silent'): LoggerOptions {
  return {
    level,
    formatters: { level: levelFormatter },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };
}

/**
 * Plain configuration for test runs: no worker-thread transports.
 */
function getTestConfig(level: LogLevel | 'silent'): LoggerOptions {
  return {
    level,
    serializers: { err: pino.stdSerializers.err },
  };
}

function baseOptions(level: LogLevel | 'silent', prettyPrint?: boolean): LoggerOptions {
  if (isTest()) {
    return getTestConfig(level);
  }
  const pretty = prettyPrint ?? isDevelopment();
  return pretty ? getDevelopmentConfig(level) : getProductionConfig(level);
}

/**
 * Build the rotated file transport. The directory is created by pino-roll.
 */
function fileTransportOptions(file: string, level: LogLevel | 'silent'): LoggerOptions['transport'] {
  return {
    targets: [
      {
        target: 'pino-roll',
        level: level === 'silent' ? 'info' : level,
        options: {
          file: path.resolve(process.cwd(), file),
          frequency: 'daily',
          size: '10m',
          mkdir: true,
          limit: { count: 30 },
        },
      },
      {
        target: 'pino/file',
        level: level === 'silent' ? 'info' : level,
        options: { destination: 1 },
      },
    ],
  };
}

/**
 * Initialize the root logger.
 *
 * Called once at process start by the CLI; replaces the default root built
 * on first use. Later calls return the same instance until
 * {@link resetLogger} is used. Child loggers created before this call stay
 * on the default root, so components create theirs lazily.
 *
 * @example
 * ```typescript
 * const logger = initLogger({ level: 'info' });
 * logger.info('Relay starting');
 * ```
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  if (rootLogger && configured) {
    return rootLogger;
  }

  const level = resolveLevel(config.level);
  let options = baseOptions(level, config.prettyPrint);

  if (!isDevelopment() || config.redact) {
    options = {
      ...options,
      redact: {
        paths: (config.redact ?? SENSITIVE_FIELDS).map((field) => `*.${field}`),
        remove: true,
      },
    };
  }

  if (config.metadata) {
    options.base = { ...options.base, ...config.metadata };
  }

  if (config.file && !isTest()) {
    // File output replaces the pretty transport; formatters are not allowed with multi-target transports.
    const { formatters: _formatters, ...rest } = options;
    options = { ...rest, transport: fileTransportOptions(config.file, level) };
  }

  rootLogger = pino(options);
  configured = true;
  return rootLogger;
}

/**
 * Create a child logger with context
 *
 * @param context - Component name (e.g., 'RelayClient', 'AgentServer')
 * @param metadata - Additional fields bound to every entry
 */
export function createLogger(context: string, metadata?: Record<string, unknown>): Logger {
  return getRootLogger().child({ context, ...metadata });
}

/**
 * Get the root logger instance, creating a default one if needed.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(baseOptions(resolveLevel()));
  }
  return rootLogger;
}

/**
 * Drop the root logger so the next call builds a fresh one. Test helper.
 */
export function resetLogger(): void {
  rootLogger = null;
  configured = false;
}

/**
 * Update the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

/**
 * Check if a log level is enabled
 */
export function isLevelEnabled(level: LogLevel): boolean {
  return getRootLogger().isLevelEnabled(level);
}

/**
 * Flush any pending log entries before exit.
 */
export function flushLogger(): Promise<void> {
  if (!rootLogger) {
    return Promise.resolve();
  }
  const logger = rootLogger;
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}
