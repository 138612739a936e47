/**
 * Tests for error types (src/utils/errors.ts)
 */

import { describe, it, expect } from 'vitest';
import {
  AgentExecutionError,
  ConfigurationError,
  EmptyResultError,
  ParseError,
  PipelineStageError,
  ProtocolError,
  TransportError,
  ValidationError,
  formatDuration,
  formatError,
  isRelayError,
} from './errors.js';

describe('formatDuration', () => {
  it('should format milliseconds, seconds and minutes', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(300_000)).toBe('5.0m');
  });
});

describe('TransportError', () => {
  it('should default to a connection failure', () => {
    const error = new TransportError('Agent request failed');

    expect(error.name).toBe('TransportError');
    expect(error.reason).toBe('connection');
    expect(error.message).toBe('Agent request failed');
  });

  it('should include the cause message', () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:8003');
    const error = new TransportError('Agent request failed', { cause, url: 'http://127.0.0.1:8003' });

    expect(error.message).toBe('Agent request failed (caused by: connect ECONNREFUSED 127.0.0.1:8003)');
    expect(error.cause).toBe(cause);
  });

  it('should serialize to JSON', () => {
    const error = new TransportError('Agent call timed out after 300000ms', { reason: 'timeout', timeoutMs: 300_000 });

    expect(error.toJSON()).toMatchObject({
      name: 'TransportError',
      reason: 'timeout',
      timeout: '5.0m',
    });
  });
});

describe('ProtocolError', () => {
  it('should keep the first 500 characters of the body', () => {
    const error = new ProtocolError(502, `${'a'.repeat(500)}b`, 'http://agent');

    expect(error.status).toBe(502);
    expect(error.bodyExcerpt).toBe('a'.repeat(500));
    expect(error.message).toBe(`Agent error: HTTP 502: ${'a'.repeat(500)}`);
    expect(error.url).toBe('http://agent');
  });
});

describe('ParseError', () => {
  it('should describe the failed candidate', () => {
    const error = new ParseError(2, `{"x": ${'y'.repeat(200)}`, new SyntaxError('Unexpected token'));

    expect(error.message).toBe('Failed to parse candidate 2: Unexpected token');
    expect(error.index).toBe(2);
    expect(error.preview).toHaveLength(100);
  });
});

describe('EmptyResultError', () => {
  it('should use the default message', () => {
    const error = new EmptyResultError();

    expect(error.message).toBe('No content received from agent');
    expect(error.eventCount).toBeUndefined();
  });
});

describe('PipelineStageError', () => {
  it('should name the stage with a 1-based number', () => {
    const error = new PipelineStageError(0, 'research', new EmptyResultError());

    expect(error.message).toBe('Stage 1 (research) failed: No content received from agent');
    expect(error.toJSON()).toEqual({
      name: 'PipelineStageError',
      message: 'Stage 1 (research) failed: No content received from agent',
      stageIndex: 0,
      stageName: 'research',
      cause: 'No content received from agent',
    });
  });
});

describe('ConfigurationError', () => {
  it('should list every issue', () => {
    const error = new ConfigurationError('Invalid configuration', {
      issues: ['relay.timeoutMs: Expected number', 'agents.research.url: Invalid url'],
    });

    expect(error.message).toBe(
      'Invalid configuration:\n  - relay.timeoutMs: Expected number\n  - agents.research.url: Invalid url'
    );
    expect(error.issues).toHaveLength(2);
  });
});

describe('ValidationError', () => {
  it('should keep field and value', () => {
    const error = new ValidationError('Invalid port', { field: 'port', value: 'abc' });

    expect(error.field).toBe('port');
    expect(error.value).toBe('abc');
  });
});

describe('AgentExecutionError', () => {
  it('should keep the agent name', () => {
    const error = new AgentExecutionError('Generation failed', { agent: 'ResearchAgent', cause: 'boom' });

    expect(error.message).toBe('Generation failed (caused by: boom)');
    expect(error.agent).toBe('ResearchAgent');
  });
});

describe('isRelayError', () => {
  it('should accept the errors that end an invocation', () => {
    expect(isRelayError(new TransportError('x'))).toBe(true);
    expect(isRelayError(new ProtocolError(500, ''))).toBe(true);
    expect(isRelayError(new EmptyResultError())).toBe(true);
    expect(isRelayError(new ParseError(0, ''))).toBe(false);
    expect(isRelayError(new Error('x'))).toBe(false);
  });
});

describe('formatError', () => {
  it('should include the error name', () => {
    expect(formatError(new ProtocolError(404, 'missing'))).toBe('ProtocolError: Agent error: HTTP 404: missing');
    expect(formatError('plain')).toBe('plain');
  });
});
