/**
 * RelayClient - one streamed request to an agent, returned as plain text.
 *
 * Architecture:
 * ```
 * invoke(text)
 *   │ POST <base>/v1/message:stream
 *   ▼
 * IncomingMessage ──► readEvents ──► extractPayload ──► ResultAccumulator ──► text
 * ```
 *
 * Failure policy:
 * - status >= 400                     → ProtocolError (status + first 500 chars of body)
 * - read error after ≥ 1 fragment     → finalize with what arrived
 * - read error with 0 fragments       → TransportError
 * - timeout or caller cancellation    → TransportError, partial text discarded
 * - stream ended with no text         → EmptyResultError
 *
 * No retries: one attempt per call.
 *
 * Usage:
 * ```typescript
 * const client = new RelayClient({ baseUrl: 'http://localhost:8003', name: 'research' });
 * const card = await client.discover();
 * const text = await client.invoke('Sustainable energy storage');
 * client.close();
 * ```
 */

import http from 'node:http';
import https from 'node:https';
import type { IncomingMessage } from 'node:http';
import { URL } from 'node:url';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { EmptyResultError, ProtocolError, TransportError, isRelayError } from '../utils/errors.js';
import { ExtractionStats } from '../envelope/stats.js';
import { extractPayload } from '../envelope/extractor.js';
import { ResultAccumulator } from '../envelope/accumulator.js';
import { readEvents } from './event-stream-reader.js';
import {
  AGENT_CARD_PATH,
  AgentCardSchema,
  MESSAGE_STREAM_PATH,
  buildMessageBody,
  type AgentCard,
  type InvokeOptions,
  type TextInvoker,
} from './types.js';

/** Text generation is slow and bursty; the whole call gets minutes. */
export const DEFAULT_INVOKE_TIMEOUT_MS = 300_000;

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 10_000;

/**
 * Configuration for RelayClient.
 */
export interface RelayClientConfig {
  /** Agent base URL, e.g. http://localhost:8003 */
  baseUrl: string;
  /** Name used in logs and pipeline reports (default: the base URL) */
  name?: string;
  /** Upper bound for one invoke call in ms (default: 300000) */
  timeoutMs?: number;
  /** Upper bound for discovery in ms (default: 10000) */
  discoveryTimeoutMs?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
}

interface RequestSpec {
  method: 'GET' | 'POST';
  url: URL;
  headers: Record<string, string | number>;
  body?: string;
  signal: AbortSignal;
}

/**
 * Abort handle combining a timeout with an optional caller signal.
 */
class CallDeadline {
  readonly controller = new AbortController();
  private timedOut = false;
  private readonly timer: NodeJS.Timeout;
  private readonly onCallerAbort = () => this.controller.abort();

  constructor(
    private readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal
  ) {
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);
    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  toError(url: string): TransportError {
    if (this.timedOut) {
      return new TransportError(`Agent call timed out after ${this.timeoutMs}ms`, {
        reason: 'timeout',
        url,
        timeoutMs: this.timeoutMs,
      });
    }
    return new TransportError('Agent call was cancelled', { reason: 'cancelled', url });
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }
}

export class RelayClient implements TextInvoker {
  readonly baseUrl: string;
  readonly name: string;
  private readonly timeoutMs: number;
  private readonly discoveryTimeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly agent: http.Agent;
  private readonly logger: Logger;

  constructor(config: RelayClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.name = config.name ?? this.baseUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_INVOKE_TIMEOUT_MS;
    this.discoveryTimeoutMs = config.discoveryTimeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
    this.headers = config.headers ?? {};

    this.agent = this.baseUrl.startsWith('https:')
      ? new https.Agent({ keepAlive: true })
      : new http.Agent({ keepAlive: true });
    this.logger = createLogger('RelayClient', { agent: this.name });
  }

  /**
   * Fetch the agent's capability document.
   *
   * Never throws: any failure is logged and yields null.
   */
  async discover(): Promise<AgentCard | null> {
    const url = new URL(`${this.baseUrl}${AGENT_CARD_PATH}`);
    const deadline = new CallDeadline(this.discoveryTimeoutMs);

    try {
      const response = await this.request({
        method: 'GET',
        url,
        headers: { Accept: 'application/json', ...this.headers },
        signal: deadline.signal,
      });
      const body = await readBody(response);
      const status = response.statusCode ?? 0;

      if (status >= 400) {
        this.logger.warn({ status, url: url.href }, 'Agent card request failed');
        return null;
      }

      const parsed = AgentCardSchema.safeParse(JSON.parse(body));
      if (!parsed.success) {
        this.logger.warn({ issues: parsed.error.issues, url: url.href }, 'Agent card is invalid');
        return null;
      }

      this.logger.debug({ name: parsed.data.name }, 'Agent discovered');
      return parsed.data;
    } catch (error) {
      this.logger.warn({ err: error, url: url.href }, 'Failed to discover agent');
      return null;
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Stream one message to the agent and return the extracted text.
   *
   * @throws TransportError | ProtocolError | EmptyResultError
   */
  async invoke(text: string, options: InvokeOptions = {}): Promise<string> {
    const url = new URL(`${this.baseUrl}${MESSAGE_STREAM_PATH}`);
    const deadline = new CallDeadline(this.timeoutMs, options.signal);
    const body = JSON.stringify(buildMessageBody(text));

    this.logger.info({ url: url.href, inputLength: text.length }, 'Streaming from agent');

    try {
      if (deadline.aborted) {
        throw deadline.toError(url.href);
      }

      const response = await this.request({
        method: 'POST',
        url,
        headers: {
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(body),
          Accept: 'text/event-stream',
          ...this.headers,
        },
        body,
        signal: deadline.signal,
      });

      const status = response.statusCode ?? 0;
      if (status >= 400) {
        throw new ProtocolError(status, await readBody(response), url.href);
      }

      return await this.consume(response, deadline, url.href);
    } catch (error) {
      if (deadline.aborted) {
        throw deadline.toError(url.href);
      }
      if (isRelayError(error)) {
        throw error;
      }
      throw new TransportError('Agent request failed', { url: url.href, cause: error });
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Release pooled connections.
   */
  close(): void {
    this.agent.destroy();
  }

  private async consume(response: IncomingMessage, deadline: CallDeadline, url: string): Promise<string> {
    const accumulator = new ResultAccumulator();
    const stats = new ExtractionStats();

    try {
      for await (const event of readEvents(response)) {
        stats.increment('eventsRead');
        const { text } = extractPayload(event.rawPayload, stats);
        if (accumulator.add({ text, index: event.index })) {
          stats.increment('fragmentsExtracted');
        }
      }
    } catch (error) {
      if (deadline.aborted) {
        throw deadline.toError(url);
      }
      if (accumulator.size === 0) {
        throw new TransportError('Stream error', { url, cause: error });
      }
      this.logger.warn({ err: error, ...stats.snapshot() }, 'Stream closed early, keeping partial content');
    }

    if (deadline.aborted) {
      throw deadline.toError(url);
    }

    try {
      const result = accumulator.finalize();
      this.logger.info({ ...stats.snapshot(), totalChars: result.length }, 'Agent stream complete');
      return result;
    } catch (error) {
      if (error instanceof EmptyResultError) {
        this.logger.warn(stats.snapshot(), 'Agent stream produced no text');
        throw new EmptyResultError(error.message, stats.get('eventsRead'));
      }
      throw error;
    }
  }

  private request(call: RequestSpec): Promise<IncomingMessage> {
    const options: http.RequestOptions = {
      method: call.method,
      headers: call.headers,
      agent: this.agent,
      signal: call.signal,
    };

    return new Promise((resolve, reject) => {
      const req = call.url.protocol === 'https:'
        ? https.request(call.url, options, resolve)
        : http.request(call.url, options, resolve);

      req.on('error', reject);

      if (call.body !== undefined) {
        req.write(call.body);
      }
      req.end();
    });
  }
}

/**
 * Read a whole response body as UTF-8 text.
 */
async function readBody(response: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of response) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
