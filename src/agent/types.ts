/**
 * Types for hosting an agent workflow behind the streaming endpoint.
 */

import type { Logger } from 'pino';
import type { AgentCard } from '../transport/types.js';

/**
 * Per-request context handed to a workflow.
 */
export interface RunContext {
  /** Unique id of the inbound request, echoed on every status envelope */
  contextId: string;
  /** Aborted when the client disconnects or the server stops */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * A text producer hosted by {@link AgentServer}.
 *
 * `run` yields chunks of text as they are generated; each chunk becomes
 * one event on the response stream.
 */
export interface AgentWorkflow {
  readonly card: AgentCard;
  /**
   * Input may be another agent's raw stream; unwrap relayed status
   * envelopes before `run`. Off by default.
   */
  readonly unwrapRelayedInput?: boolean;
  run(input: string, context: RunContext): AsyncIterable<string>;
}

/**
 * Lifecycle state of a status envelope written by the server.
 */
export type TaskState = 'working' | 'completed' | 'failed';
