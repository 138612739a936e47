/**
 * Error types for the relay and pipeline layers.
 *
 * Fatal errors (escalated to the caller):
 * - TransportError: connection failed with no usable partial content
 * - ProtocolError: agent endpoint answered with status >= 400
 * - EmptyResultError: stream completed without any extractable text
 * - PipelineStageError: wraps the failure of one pipeline stage
 *
 * Non-fatal:
 * - ParseError: one malformed JSON candidate; logged and skipped
 */

/**
 * Why a transport-level failure happened.
 */
export type TransportErrorReason = 'connection' | 'timeout' | 'cancelled';

/**
 * Format a millisecond duration for messages ("500ms", "1.5s", "5.0m").
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${(ms / 60_000).toFixed(1)}m`;
}

function causeMessage(cause: unknown): string | undefined {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? undefined : String(cause);
}

export class TransportError extends Error {
  readonly reason: TransportErrorReason;
  readonly url?: string;
  readonly timeoutMs?: number;

  constructor(
    message: string,
    options: { reason?: TransportErrorReason; url?: string; timeoutMs?: number; cause?: unknown } = {}
  ) {
    const detail = causeMessage(options.cause);
    super(detail ? `${message} (caused by: ${detail})` : message, { cause: options.cause });
    this.name = 'TransportError';
    this.reason = options.reason ?? 'connection';
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      reason: this.reason,
      url: this.url,
      timeout: this.timeoutMs !== undefined ? formatDuration(this.timeoutMs) : undefined,
      cause: causeMessage(this.cause),
      stack: this.stack,
    };
  }
}

/** Maximum number of body characters kept on a ProtocolError. */
export const PROTOCOL_ERROR_BODY_LIMIT = 500;

export class ProtocolError extends Error {
  readonly status: number;
  readonly bodyExcerpt: string;
  readonly url?: string;

  constructor(status: number, body: string, url?: string) {
    const bodyExcerpt = body.slice(0, PROTOCOL_ERROR_BODY_LIMIT);
    super(`Agent error: HTTP ${status}: ${bodyExcerpt}`);
    this.name = 'ProtocolError';
    this.status = status;
    this.bodyExcerpt = bodyExcerpt;
    this.url = url;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      status: this.status,
      bodyExcerpt: this.bodyExcerpt,
      url: this.url,
      stack: this.stack,
    };
  }
}

export class ParseError extends Error {
  /** Position of the candidate within its blob or stream */
  readonly index: number;
  /** Leading part of the rejected input */
  readonly preview: string;

  constructor(index: number, input: string, cause?: unknown) {
    const detail = causeMessage(cause);
    super(detail ? `Failed to parse candidate ${index}: ${detail}` : `Failed to parse candidate ${index}`, { cause });
    this.name = 'ParseError';
    this.index = index;
    this.preview = input.slice(0, 100);
  }
}

export class EmptyResultError extends Error {
  /** Number of stream events seen before finalization, when known */
  readonly eventCount?: number;

  constructor(message = 'No content received from agent', eventCount?: number) {
    super(message);
    this.name = 'EmptyResultError';
    this.eventCount = eventCount;
  }
}

export class PipelineStageError extends Error {
  readonly stageIndex: number;
  readonly stageName: string;

  constructor(stageIndex: number, stageName: string, cause: unknown) {
    super(`Stage ${stageIndex + 1} (${stageName}) failed: ${causeMessage(cause) ?? 'unknown error'}`, { cause });
    this.name = 'PipelineStageError';
    this.stageIndex = stageIndex;
    this.stageName = stageName;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      stageIndex: this.stageIndex,
      stageName: this.stageName,
      cause: causeMessage(this.cause),
    };
  }
}

export class ValidationError extends Error {
  readonly field?: string;
  readonly value?: unknown;

  constructor(message: string, options: { field?: string; value?: unknown } = {}) {
    super(message);
    this.name = 'ValidationError';
    this.field = options.field;
    this.value = options.value;
  }
}

export class ConfigurationError extends Error {
  /** One entry per failing field, e.g. "relay.timeoutMs: Expected number" */
  readonly issues: string[];
  readonly source?: string;

  constructor(message: string, options: { issues?: string[]; source?: string; cause?: unknown } = {}) {
    const issues = options.issues ?? [];
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, { cause: options.cause });
    this.name = 'ConfigurationError';
    this.issues = issues;
    this.source = options.source;
  }
}

export class AgentExecutionError extends Error {
  readonly agent?: string;

  constructor(message: string, options: { agent?: string; cause?: unknown } = {}) {
    const detail = causeMessage(options.cause);
    super(detail ? `${message} (caused by: ${detail})` : message, { cause: options.cause });
    this.name = 'AgentExecutionError';
    this.agent = options.agent;
  }
}

/**
 * Errors that end an invocation and must reach the orchestrator.
 */
export type RelayError = TransportError | ProtocolError | EmptyResultError;

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof TransportError || error instanceof ProtocolError || error instanceof EmptyResultError;
}

/**
 * Render any thrown value as a one-line message.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
