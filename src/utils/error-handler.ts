/**
 * Enhanced Error Handling Module
 *
 * Utilities for consistent error classification and logging:
 * - Error categorization (relay errors map onto fixed categories)
 * - Error context enrichment
 * - Retryable/transient detection
 * - Standardized error logging with Pino
 *
 * @module utils/error-handler
 */

import type { Logger } from 'pino';
import { createLogger } from './logger.js';
import {
  AgentExecutionError,
  ConfigurationError,
  EmptyResultError,
  ParseError,
  PipelineStageError,
  ProtocolError,
  TransportError,
  ValidationError,
} from './errors.js';

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  /** Configuration errors (missing/invalid config) */
  CONFIGURATION = 'CONFIGURATION',
  /** Network errors (connection refused/reset) */
  NETWORK = 'NETWORK',
  /** Agent endpoint answered with an error status */
  API = 'API',
  /** Malformed envelope or payload */
  PARSE = 'PARSE',
  /** Stream finished without extractable text */
  EMPTY_RESULT = 'EMPTY_RESULT',
  /** Invalid input */
  VALIDATION = 'VALIDATION',
  /** Timeouts */
  TIMEOUT = 'TIMEOUT',
  /** Caller cancelled the operation */
  CANCELLED = 'CANCELLED',
  /** Text generation failed inside an agent */
  AGENT = 'AGENT',
  /** Unknown/unclassified errors */
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Fatal - process should exit */
  FATAL = 'fatal',
  /** Error - operation failed but system can continue */
  ERROR = 'error',
  /** Warning - operation succeeded with issues */
  WARN = 'warn',
}

/**
 * Standard error context interface
 */
export interface ErrorContext {
  category?: ErrorCategory;
  retryable?: boolean;
  transient?: boolean;
  userMessage?: string;
  [key: string]: unknown;
}

/**
 * Error enriched with classification metadata
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
  readonly transient: boolean;
  readonly userMessage?: string;
  readonly errorId: string;
  readonly context?: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
    options: {
      retryable?: boolean;
      transient?: boolean;
      userMessage?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.category = category;
    this.severity = severity;
    this.retryable = options.retryable ?? false;
    this.transient = options.transient ?? false;
    this.userMessage = options.userMessage;
    this.context = options.context;
    this.originalError = options.cause;
    this.errorId = `err_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
  }

  toJSON() {
    return {
      errorId: this.errorId,
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      retryable: this.retryable,
      transient: this.transient,
      userMessage: this.userMessage,
      context: this.context,
      originalError: this.originalError
        ? { name: this.originalError.name, message: this.originalError.message }
        : undefined,
    };
  }
}

let errorLogger: Logger | undefined;

function getErrorHandlerLogger(): Logger {
  if (!errorLogger) {
    errorLogger = createLogger('ErrorHandler');
  }
  return errorLogger;
}

/**
 * Classify an error based on its type and message
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof AppError) {
    return error.category;
  }
  if (error instanceof PipelineStageError) {
    return classifyError(error.cause);
  }
  if (error instanceof TransportError) {
    switch (error.reason) {
      case 'timeout':
        return ErrorCategory.TIMEOUT;
      case 'cancelled':
        return ErrorCategory.CANCELLED;
      default:
        return ErrorCategory.NETWORK;
    }
  }
  if (error instanceof ProtocolError) {
    return ErrorCategory.API;
  }
  if (error instanceof EmptyResultError) {
    return ErrorCategory.EMPTY_RESULT;
  }
  if (error instanceof ParseError || error instanceof SyntaxError) {
    return ErrorCategory.PARSE;
  }
  if (error instanceof ValidationError) {
    return ErrorCategory.VALIDATION;
  }
  if (error instanceof ConfigurationError) {
    return ErrorCategory.CONFIGURATION;
  }
  if (error instanceof AgentExecutionError) {
    return ErrorCategory.AGENT;
  }
  if (!(error instanceof Error)) {
    return ErrorCategory.UNKNOWN;
  }

  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();

  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('socket hang up')
  ) {
    return ErrorCategory.NETWORK;
  }
  if (message.includes('timeout') || message.includes('etimedout') || name.includes('timeout')) {
    return ErrorCategory.TIMEOUT;
  }
  if (name === 'aborterror') {
    return ErrorCategory.CANCELLED;
  }
  if (message.includes('configuration')) {
    return ErrorCategory.CONFIGURATION;
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Determine if an error is worth another attempt by the caller.
 *
 * The relay itself never retries; this only informs callers.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  if (error instanceof ProtocolError) {
    return error.status === 429 || error.status >= 500;
  }
  const category = classifyError(error);
  return category === ErrorCategory.NETWORK || category === ErrorCategory.TIMEOUT;
}

/**
 * Determine if an error is transient (temporary)
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.transient;
  }
  const category = classifyError(error);
  return category === ErrorCategory.NETWORK || category === ErrorCategory.TIMEOUT;
}

/**
 * Determine the severity level for an error
 */
export function getSeverity(error: unknown): ErrorSeverity {
  if (error instanceof AppError) {
    return error.severity;
  }
  const category = classifyError(error);
  if (category === ErrorCategory.CONFIGURATION) {
    return ErrorSeverity.FATAL;
  }
  if (category === ErrorCategory.PARSE || category === ErrorCategory.CANCELLED) {
    return ErrorSeverity.WARN;
  }
  return ErrorSeverity.ERROR;
}

/**
 * Create a user-facing message for an error
 */
export function createUserMessage(error: unknown): string {
  if (error instanceof AppError) {
    return error.userMessage || error.message;
  }
  if (!(error instanceof Error)) {
    return 'An unknown error occurred';
  }

  switch (classifyError(error)) {
    case ErrorCategory.NETWORK:
      return 'Could not reach the agent. Check that it is running.';
    case ErrorCategory.TIMEOUT:
      return 'The agent did not finish in time.';
    case ErrorCategory.CANCELLED:
      return 'The operation was cancelled.';
    case ErrorCategory.API:
      return 'The agent rejected the request.';
    case ErrorCategory.EMPTY_RESULT:
      return 'The agent returned no text.';
    case ErrorCategory.PARSE:
      return 'The agent returned malformed data.';
    case ErrorCategory.VALIDATION:
      return 'Invalid input.';
    case ErrorCategory.CONFIGURATION:
      return 'Configuration error. Check agent-relay.config.yaml.';
    case ErrorCategory.AGENT:
      return 'The agent failed while generating text.';
    default:
      return 'An unexpected error occurred.';
  }
}

/**
 * Enrich error with additional context
 */
export function enrichError(error: unknown, context: ErrorContext = {}): AppError {
  if (error instanceof AppError) {
    return new AppError(error.message, error.category, error.severity, {
      retryable: error.retryable,
      transient: error.transient,
      userMessage: error.userMessage,
      context: { ...error.context, ...context },
      cause: error.originalError ?? error,
    });
  }

  const errorObj = error instanceof Error ? error : new Error(String(error));

  return new AppError(errorObj.message, context.category ?? classifyError(errorObj), getSeverity(errorObj), {
    retryable: context.retryable ?? isRetryable(errorObj),
    transient: context.transient ?? isTransient(errorObj),
    userMessage: context.userMessage ?? createUserMessage(errorObj),
    context,
    cause: errorObj,
  });
}

/**
 * Log an error with full context using Pino
 */
export function logError(error: unknown, context: ErrorContext = {}, customLogger?: Logger): AppError {
  const logger = customLogger ?? getErrorHandlerLogger();
  const enriched = enrichError(error, context);

  const logData: Record<string, unknown> = {
    err: error instanceof Error ? error : undefined,
    errorId: enriched.errorId,
    category: enriched.category,
    retryable: enriched.retryable,
    userMessage: enriched.userMessage,
    ...context,
  };

  switch (enriched.severity) {
    case ErrorSeverity.FATAL:
      logger.fatal(logData, enriched.message);
      break;
    case ErrorSeverity.ERROR:
      logger.error(logData, enriched.message);
      break;
    case ErrorSeverity.WARN:
      logger.warn(logData, enriched.message);
      break;
  }

  return enriched;
}

/**
 * Handle an error with logging and optional user notification
 */
export function handleError(
  error: unknown,
  context: ErrorContext = {},
  options: {
    log?: boolean;
    throwOnError?: boolean;
    userNotifier?: (message: string) => void;
    customLogger?: Logger;
  } = {}
): AppError {
  const { log = true, throwOnError = false, userNotifier, customLogger } = options;

  const enriched = log ? logError(error, context, customLogger) : enrichError(error, context);

  if (userNotifier) {
    userNotifier(enriched.userMessage || enriched.message);
  }

  if (throwOnError) {
    throw enriched;
  }

  return enriched;
}
