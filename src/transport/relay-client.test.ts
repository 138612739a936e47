/**
 * Tests for RelayClient (src/transport/relay-client.ts)
 *
 * Each test runs a real HTTP server on an ephemeral local port.
 */

import { describe, it, expect, afterEach } from 'vitest';
import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { RelayClient } from './relay-client.js';
import { EmptyResultError, ProtocolError, TransportError } from '../utils/errors.js';

interface TestServer {
  url: string;
  requests: Array<{ method?: string; path?: string; headers: http.IncomingHttpHeaders; body: string }>;
  close(): Promise<void>;
}

type Handler = (req: IncomingMessage, res: ServerResponse, body: string) => void;

const servers: TestServer[] = [];
const clients: RelayClient[] = [];

async function startServer(handler: Handler): Promise<TestServer> {
  const requests: TestServer['requests'] = [];
  const server = http.createServer((req, res) => {
    let body = '';
    req.on('data', (chunk: Buffer) => {
      body += chunk.toString();
    });
    req.on('end', () => {
      requests.push({ method: req.method, path: req.url, headers: req.headers, body });
      handler(req, res, body);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no port');
  }
  const { port } = address;

  const testServer: TestServer = {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      }),
  };
  servers.push(testServer);
  return testServer;
}

async function rejectionOf<T extends Error>(promise: Promise<unknown>, type: new (...args: never[]) => T): Promise<T> {
  try {
    await promise;
  } catch (error) {
    expect(error).toBeInstanceOf(type);
    if (error instanceof type) {
      return error;
    }
  }
  throw new Error(`Expected a ${type.name}`);
}

function createClient(url: string, timeoutMs?: number): RelayClient {
  const client = new RelayClient({ baseUrl: url, name: 'test-agent', timeoutMs });
  clients.push(client);
  return client;
}

function statusFrame(text: string): string {
  return `data: ${JSON.stringify({ statusUpdate: { status: { message: { content: [{ text }] } } } })}\n\n`;
}

function sse(res: ServerResponse, frames: string[]): void {
  res.writeHead(200, { 'Content-Type': 'text/event-stream' });
  for (const frame of frames) {
    res.write(frame);
  }
  res.end();
}

afterEach(async () => {
  clients.splice(0).forEach((client) => client.close());
  await Promise.all(servers.splice(0).map((server) => server.close()));
});

describe('RelayClient', () => {
  describe('invoke', () => {
    it('should return the concatenated text of status envelopes', async () => {
      const server = await startServer((_req, res) => {
        sse(res, [statusFrame('Hello '), statusFrame('world'), 'data: [DONE]\n\n']);
      });

      const result = await createClient(server.url).invoke('Say hello');

      expect(result).toBe('Hello world');
    });

    it('should post the message body with streaming headers', async () => {
      const server = await startServer((_req, res) => {
        sse(res, [statusFrame('ok')]);
      });

      await createClient(`${server.url}/`).invoke('Renewable storage');

      expect(server.requests).toHaveLength(1);
      const [request] = server.requests;
      expect(request?.method).toBe('POST');
      expect(request?.path).toBe('/v1/message:stream');
      expect(request?.headers.accept).toBe('text/event-stream');
      expect(request?.headers['content-type']).toBe('application/json');
      expect(JSON.parse(request?.body ?? '')).toEqual({ message: { content: [{ text: 'Renewable storage' }] } });
    });

    it('should return plain text events verbatim', async () => {
      const server = await startServer((_req, res) => {
        sse(res, ['data: just some text\n\n']);
      });

      expect(await createClient(server.url).invoke('x')).toBe('just some text');
    });

    it('should skip malformed JSON events and keep the rest', async () => {
      const server = await startServer((_req, res) => {
        sse(res, [statusFrame('before '), 'data: {"statusUpdate": {"sta\n\n', statusFrame('after')]);
      });

      expect(await createClient(server.url).invoke('x')).toBe('before after');
    });

    it('should keep partial content when the connection drops mid-stream', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/event-stream' });
        res.write(statusFrame('partial '));
        setTimeout(() => res.socket?.destroy(), 100);
      });

      expect(await createClient(server.url).invoke('x')).toBe('partial');
    });

    it('should fail with TransportError when the connection drops before any text', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/event-stream' });
        res.flushHeaders();
        setTimeout(() => res.socket?.destroy(), 100);
      });

      const error = await rejectionOf(createClient(server.url).invoke('x'), TransportError);

      expect(error.reason).toBe('connection');
      expect(error.message).toMatch(/^Stream error/);
    });

    it('should fail with ProtocolError carrying status and a body excerpt', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(503, { 'Content-Type': 'text/plain' });
        res.end('x'.repeat(600));
      });

      const error = await rejectionOf(createClient(server.url).invoke('x'), ProtocolError);

      expect(error.status).toBe(503);
      expect(error.bodyExcerpt).toBe('x'.repeat(500));
      expect(error.message).toBe(`Agent error: HTTP 503: ${'x'.repeat(500)}`);
    });

    it('should fail with EmptyResultError when the stream carries no text', async () => {
      const server = await startServer((_req, res) => {
        sse(res, ['data: {"kind":"ping"}\n\n', 'data: [DONE]\n\n', 'data: \n\n']);
      });

      const error = await rejectionOf(createClient(server.url).invoke('x'), EmptyResultError);

      expect(error.eventCount).toBe(1);
    });

    it('should fail with TransportError when nothing listens', async () => {
      const server = await startServer((_req, res) => res.end());
      const { url } = server;
      await server.close();
      servers.splice(servers.indexOf(server), 1);

      const error = await rejectionOf(createClient(url).invoke('x'), TransportError);

      expect(error.reason).toBe('connection');
      expect(error.message).toMatch(/^Agent request failed/);
    });

    it('should discard partial text when the caller cancels', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/event-stream' });
        res.write(statusFrame('never returned'));
      });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);

      const error = await rejectionOf(createClient(server.url).invoke('x', { signal: controller.signal }), TransportError);

      expect(error.reason).toBe('cancelled');
      expect(error.message).toBe('Agent call was cancelled');
    });

    it('should not send anything when the signal is already aborted', async () => {
      const server = await startServer((_req, res) => sse(res, [statusFrame('x')]));
      const controller = new AbortController();
      controller.abort();

      const error = await rejectionOf(createClient(server.url).invoke('x', { signal: controller.signal }), TransportError);

      expect(error.reason).toBe('cancelled');
      expect(server.requests).toHaveLength(0);
    });

    it('should time out a call that takes too long', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/event-stream' });
        res.write(statusFrame('slow'));
      });

      const error = await rejectionOf(createClient(server.url, 150).invoke('x'), TransportError);

      expect(error.reason).toBe('timeout');
      expect(error.timeoutMs).toBe(150);
      expect(error.message).toBe('Agent call timed out after 150ms');
    });

    it('should serve concurrent invocations independently', async () => {
      const server = await startServer((_req, res, body) => {
        const text = body.includes('"text":"a"') ? 'a' : 'b';
        setTimeout(() => sse(res, [statusFrame(`${text}-1 `), statusFrame(`${text}-2`)]), text === 'a' ? 80 : 10);
      });
      const client = createClient(server.url);

      const [a, b] = await Promise.all([client.invoke('a'), client.invoke('b')]);

      expect(a).toBe('a-1 a-2');
      expect(b).toBe('b-1 b-2');
    });
  });

  describe('discover', () => {
    it('should return the agent card', async () => {
      const card = { name: 'Research Agent', description: 'Researches things', version: '1.0.0', extra: true };
      const server = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(card));
      });

      const result = await createClient(server.url).discover();

      expect(result).toEqual(card);
      expect(server.requests[0]?.path).toBe('/.well-known/agent.json');
      expect(server.requests[0]?.method).toBe('GET');
    });

    it('should return null for an error status', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(404);
        res.end('missing');
      });

      expect(await createClient(server.url).discover()).toBeNull();
    });

    it('should return null for an invalid card', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ name: 'No description' }));
      });

      expect(await createClient(server.url).discover()).toBeNull();
    });

    it('should return null for a body that is not JSON', async () => {
      const server = await startServer((_req, res) => {
        res.writeHead(200);
        res.end('<html></html>');
      });

      expect(await createClient(server.url).discover()).toBeNull();
    });
  });
});
