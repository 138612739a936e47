/**
 * Inbound message decoding.
 *
 * Clients send either the outbound wire shape
 * `{ message: { content: [{ text }] } }` or a parts list
 * `{ message: { parts: [{ root: { kind: 'text', text } }] } }`.
 * Each element is resolved once into a {@link MessagePart}; every
 * text-bearing part contributes, in order.
 */

import { isRecord, textValue } from '../envelope/extractor.js';

export interface TextPart {
  kind: 'text';
  text: string;
}

export interface ContentPart {
  kind: 'content';
  content: string;
}

export interface UnknownPart {
  kind: 'unknown';
}

export type MessagePart = TextPart | ContentPart | UnknownPart;

function resolveTextKind(value: Record<string, unknown>): TextPart | null {
  if (value.kind === 'text' && typeof value.text === 'string') {
    return { kind: 'text', text: value.text };
  }
  return null;
}

/**
 * Classify one element of an inbound `parts` or `content` list.
 */
export function resolveMessagePart(raw: unknown): MessagePart {
  if (!isRecord(raw)) {
    return { kind: 'unknown' };
  }

  if (isRecord(raw.root)) {
    const rooted = resolveTextKind(raw.root);
    if (rooted) {
      return rooted;
    }
  }

  const tagged = resolveTextKind(raw);
  if (tagged) {
    return tagged;
  }

  if ('text' in raw) {
    return { kind: 'text', text: textValue(raw.text) };
  }
  if ('content' in raw) {
    return { kind: 'content', content: textValue(raw.content) };
  }
  return { kind: 'unknown' };
}

export function partText(part: MessagePart): string {
  switch (part.kind) {
    case 'text':
      return part.text;
    case 'content':
      return part.content;
    case 'unknown':
      return '';
  }
}

/**
 * Resolve the parts of an inbound body. `parts` wins over `content` when
 * both are present.
 */
export function resolveMessageParts(body: unknown): MessagePart[] {
  const message = isRecord(body) ? body.message : undefined;
  if (!isRecord(message)) {
    return [];
  }
  const list = Array.isArray(message.parts) ? message.parts : message.content;
  if (!Array.isArray(list)) {
    return [];
  }
  return list.map((raw: unknown) => resolveMessagePart(raw));
}

/**
 * Concatenated, trimmed text of every text-bearing part.
 */
export function extractInboundText(body: unknown): string {
  return resolveMessageParts(body).map(partText).join('').trim();
}
