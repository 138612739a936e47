/**
 * Wire types shared by the relay client and the agent server.
 *
 * ```
 * RelayClient                                   AgentServer
 *     │  POST /v1/message:stream ─────────────────►
 *     │  {"message":{"content":[{"text":...}]}}    │
 *     │                                            │
 *     ◄──────────────── data: {"statusUpdate":...} │
 *     ◄──────────────── data: {"statusUpdate":...} │
 *     ◄─────────────────────────── (connection close)
 *
 *     │  GET /.well-known/agent.json ──────────────►
 * ```
 */

import { z } from 'zod';

/** Path of the streaming message endpoint. */
export const MESSAGE_STREAM_PATH = '/v1/message:stream';

/** Path of the agent capability document. */
export const AGENT_CARD_PATH = '/.well-known/agent.json';

/**
 * Request body for {@link MESSAGE_STREAM_PATH}.
 */
export interface OutboundMessageBody {
  message: {
    content: Array<{ text: string }>;
  };
}

export function buildMessageBody(text: string): OutboundMessageBody {
  return { message: { content: [{ text }] } };
}

/**
 * One `data: ` line of an event stream.
 */
export interface StreamEvent {
  /** Payload with the `data: ` prefix removed */
  rawPayload: string;
  /** Ordinal of the event within its stream, starting at 0 */
  index: number;
}

/**
 * Capability document served at {@link AGENT_CARD_PATH}.
 * Only `name` and `description` are required; other fields pass through.
 */
export const AgentCardSchema = z
  .object({
    name: z.string(),
    description: z.string(),
    version: z.string().optional(),
    url: z.string().optional(),
    skills: z
      .array(
        z
          .object({
            id: z.string(),
            name: z.string(),
            description: z.string().optional(),
            tags: z.array(z.string()).optional(),
            examples: z.array(z.string()).optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

export type AgentCard = z.infer<typeof AgentCardSchema>;

/**
 * Per-call options for an invocation.
 */
export interface InvokeOptions {
  /** Cancels the call; accumulated text is discarded */
  signal?: AbortSignal;
}

/**
 * Anything that turns input text into output text. Pipeline stages depend
 * on this rather than on the HTTP client.
 */
export interface TextInvoker {
  invoke(text: string, options?: InvokeOptions): Promise<string>;
}
