/**
 * AgentServer - hosts one agent workflow behind the streaming endpoint.
 *
 * Routes:
 * - POST /v1/message:stream     → SSE stream of status envelopes
 * - GET  /.well-known/agent.json → agent card
 * - GET  /health                 → { status: 'ok', agent }
 *
 * Each chunk the workflow yields is written as one frame:
 * ```
 * data: {"statusUpdate":{"contextId":"...","status":{"state":"working","message":{"role":"agent","content":[{"text":"..."}]}}}}
 * ```
 * The stream ends by closing the response. A workflow failure is written as
 * a last envelope with state `failed`.
 *
 * Usage:
 * ```typescript
 * const server = new AgentServer(new ResearchWorkflow(llmConfig), { port: 8003 });
 * await server.start();
 * ```
 */

import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { containsStatusEnvelopes, recoverEnvelopeText } from '../envelope/splitter.js';
import type { StatusEnvelope } from '../envelope/types.js';
import { AGENT_CARD_PATH, MESSAGE_STREAM_PATH } from '../transport/types.js';
import { extractInboundText } from './message-parts.js';
import type { AgentWorkflow, TaskState } from './types.js';

export interface AgentServerConfig {
  /** Port to listen on; 0 picks a free port */
  port: number;
  /** Host to bind (default: 0.0.0.0) */
  host?: string;
}

/**
 * Build the status envelope for one chunk of text.
 */
export function buildStatusEnvelope(text: string, state: TaskState, contextId: string): StatusEnvelope {
  return {
    statusUpdate: {
      contextId,
      status: {
        state,
        message: { role: 'agent', content: [{ text }] },
      },
    },
  };
}

/**
 * One SSE frame carrying a status envelope.
 */
export function formatStatusFrame(text: string, state: TaskState, contextId: string): string {
  return `data: ${JSON.stringify(buildStatusEnvelope(text, state, contextId))}\n\n`;
}

export class AgentServer {
  private readonly workflow: AgentWorkflow;
  private readonly config: Required<AgentServerConfig>;
  private readonly logger: Logger;
  private readonly active = new Set<AbortController>();
  private server?: http.Server;
  private running = false;

  constructor(workflow: AgentWorkflow, config: AgentServerConfig) {
    this.workflow = workflow;
    this.config = { host: '0.0.0.0', ...config };
    this.logger = createLogger('AgentServer', { agent: workflow.card.name });
  }

  /**
   * Start listening.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('AgentServer already running');
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error({ err: error }, 'Unhandled request failure');
          if (!res.headersSent) {
            res.writeHead(500, { 'Content-Type': 'application/json' });
          }
          res.end();
        });
      });

      server.once('error', (err) => {
        this.logger.error({ err }, 'Agent server error');
        reject(err);
      });

      server.listen(this.config.port, this.config.host, () => {
        this.server = server;
        resolve();
      });
    });

    this.running = true;
    this.logger.info({ ...this.address(), agent: this.workflow.card.name }, 'Agent server listening');
  }

  /**
   * Stop listening and abort in-flight workflows.
   */
  async stop(): Promise<void> {
    if (!this.running || !this.server) {
      return;
    }

    this.running = false;
    for (const controller of this.active) {
      controller.abort();
    }

    const server = this.server;
    this.server = undefined;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });

    this.logger.info('Agent server stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Bound address, once started.
   */
  address(): { host: string; port: number } | undefined {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return undefined;
    }
    return { host: address.address, port: address.port };
  }

  /**
   * Base URL clients should use, once started.
   */
  get url(): string | undefined {
    const address = this.address();
    if (!address) {
      return undefined;
    }
    const host = address.host === '0.0.0.0' || address.host === '::' ? 'localhost' : address.host;
    return `http://${host}:${address.port}`;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;

    this.logger.debug({ method: req.method, path }, 'Received request');

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (req.method === 'POST' && path === MESSAGE_STREAM_PATH) {
      await this.handleMessageStream(req, res);
    } else if (req.method === 'GET' && path === AGENT_CARD_PATH) {
      this.sendJson(res, 200, this.workflow.card);
    } else if (req.method === 'GET' && path === '/health') {
      this.sendJson(res, 200, { status: 'ok', agent: this.workflow.card.name });
    } else {
      this.sendJson(res, 404, { error: 'Not found' });
    }
  }

  private async handleMessageStream(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      body = JSON.parse(await readRequestBody(req));
    } catch (error) {
      this.logger.warn({ err: error }, 'Rejected message with invalid JSON body');
      this.sendJson(res, 400, { error: 'Invalid JSON body' });
      return;
    }

    let input = extractInboundText(body);
    if (this.workflow.unwrapRelayedInput && containsStatusEnvelopes(input)) {
      input = recoverEnvelopeText(input);
    }
    if (!input) {
      this.sendJson(res, 400, { error: 'Message contains no text' });
      return;
    }

    const contextId = randomUUID();
    const controller = new AbortController();
    const logger = this.logger.child({ contextId });
    this.active.add(controller);

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    logger.info({ inputLength: input.length }, 'Message stream started');
    let chunks = 0;

    try {
      for await (const chunk of this.workflow.run(input, { contextId, signal: controller.signal, logger })) {
        if (controller.signal.aborted) {
          break;
        }
        if (!chunk) {
          continue;
        }
        res.write(formatStatusFrame(chunk, 'working', contextId));
        chunks++;
      }
      logger.info({ chunks, aborted: controller.signal.aborted }, 'Message stream finished');
    } catch (error) {
      if (controller.signal.aborted) {
        logger.info({ chunks }, 'Message stream aborted');
      } else {
        logger.error({ err: error, chunks }, 'Workflow failed');
        res.write(formatStatusFrame(`Agent failed: ${error instanceof Error ? error.message : String(error)}`, 'failed', contextId));
      }
    } finally {
      this.active.delete(controller);
      res.end();
    }
  }

  private sendJson(res: ServerResponse, status: number, payload: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(payload));
  }
}

/**
 * Read a request body as UTF-8 text.
 */
function readRequestBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    req.on('end', () => {
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}
