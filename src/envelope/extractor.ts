/**
 * EnvelopeExtractor - turns one raw stream payload into plain text.
 *
 * Priority: StatusEnvelope → DirectEnvelope → PlainText → discard.
 *
 * ```
 * {"statusUpdate":{"status":{"message":{"content":[{"text":"a"},{"text":"b"}]}}}}  → ("ab", true)
 * {"content":[{"text":"a"}]}                                                      → ("a", true)
 * {"kind":"ping"}                                                                  → ("", true)
 * just some text                                                                   → ("just some text", true)
 * {"statusUpdate": {"sta                                                           → ("", false)
 * ```
 */

import type { DirectEnvelope, ExtractResult, StatusEnvelope } from './types.js';
import { STATUS_UPDATE_MARKER } from './types.js';
import type { ExtractionStats } from './stats.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStatusEnvelope(value: unknown): value is StatusEnvelope {
  return isRecord(value) && STATUS_UPDATE_MARKER in value;
}

export function isDirectEnvelope(value: unknown): value is DirectEnvelope {
  return isRecord(value) && 'content' in value;
}

/**
 * Read a nested key, treating anything that is not an object as empty.
 */
function child(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

/**
 * String form of a `text` value.
 */
export function textValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value) ?? '';
}

/**
 * Concatenate the `text` of every content item whose text is not blank.
 */
export function collectContentText(content: unknown): string {
  if (!Array.isArray(content)) {
    return '';
  }

  let buffer = '';
  for (const item of content) {
    if (!isRecord(item) || !('text' in item)) {
      continue;
    }
    const text = textValue(item.text);
    if (text.trim()) {
      buffer += text;
    }
  }
  return buffer;
}

/**
 * Extract text from an already parsed envelope value.
 *
 * Returns '' for values that match no known shape.
 */
export function extractEnvelopeText(value: unknown): string {
  if (isStatusEnvelope(value)) {
    const content = child(child(child(value.statusUpdate, 'status'), 'message'), 'content');
    return collectContentText(content);
  }
  if (isDirectEnvelope(value)) {
    return collectContentText(value.content);
  }
  return '';
}

/**
 * Extract plain text from one raw payload.
 */
export function extractPayload(payload: string, stats?: ExtractionStats): ExtractResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    if (!payload.trim().startsWith('{')) {
      return { text: payload, matched: true };
    }
    stats?.increment('parseFailures');
    stats?.increment('payloadsDiscarded');
    return { text: '', matched: false };
  }

  stats?.increment('candidatesParsed');
  return { text: extractEnvelopeText(parsed), matched: true };
}
