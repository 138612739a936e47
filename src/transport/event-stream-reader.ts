/**
 * EventStreamReader - Server-Sent Event payloads from a byte stream.
 *
 * Each event is a single `data: <payload>` line. `data: [DONE]` and blank
 * `data: ` lines are keepalives; lines without the prefix are ignored.
 * Stream end is connection close, not a sentinel.
 */

import type { StreamEvent } from './types.js';

export const DATA_PREFIX = 'data: ';
export const DONE_SENTINEL = '[DONE]';

/**
 * Split a chunked byte or text stream into lines.
 *
 * UTF-8 sequences split across chunks are decoded correctly. A final line
 * without a newline is emitted when the stream ends; if the stream errors,
 * that partial line is dropped and the error propagates.
 */
export async function* readLines(chunks: AsyncIterable<string | Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      yield stripCarriageReturn(buffer.slice(0, newline));
      buffer = buffer.slice(newline + 1);
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  if (buffer) {
    yield stripCarriageReturn(buffer);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Payload of one line, or null when the line carries nothing.
 */
export function parseEventLine(line: string): string | null {
  if (!line.startsWith(DATA_PREFIX)) {
    return null;
  }
  const payload = line.slice(DATA_PREFIX.length);
  const trimmed = payload.trim();
  if (trimmed === '' || trimmed === DONE_SENTINEL) {
    return null;
  }
  return payload;
}

/**
 * Lazily yield the events of a stream. Not restartable.
 */
export async function* readEvents(chunks: AsyncIterable<string | Uint8Array>): AsyncGenerator<StreamEvent> {
  let index = 0;
  for await (const line of readLines(chunks)) {
    const rawPayload = parseEventLine(line);
    if (rawPayload !== null) {
      yield { rawPayload, index: index++ };
    }
  }
}
