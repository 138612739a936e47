/**
 * ConcatenatedEnvelopeSplitter - recovers text from a blob of relayed envelopes.
 *
 * When an upstream stage forwards raw envelopes instead of extracted text,
 * the downstream input looks like:
 *
 * ```
 * {"statusUpdate":{...,"content":[{"text":"foo"}]}}{"statusUpdate":{...,"content":[{"text":"bar"}]}}
 * ```
 *
 * Every `}{` boundary is cut. This is a heuristic, not a JSON tokenizer:
 * it is only correct while no string value inside an envelope contains `}{`.
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { ParseError } from '../utils/errors.js';
import { extractEnvelopeText } from './extractor.js';
import { ExtractionStats } from './stats.js';
import { STATUS_UPDATE_MARKER } from './types.js';

let splitterLogger: Logger | undefined;

function getLogger(): Logger {
  if (!splitterLogger) {
    splitterLogger = createLogger('EnvelopeSplitter');
  }
  return splitterLogger;
}

const BOUNDARY = '}{';
const DELIMITER = '|||';
const TEXT_FIELD_PATTERN = /"text":\s*"([^"]+)"/g;

/**
 * Returned when nothing readable could be recovered from a relayed blob.
 */
export const UNRECOVERABLE_CONTENT_MESSAGE =
  'ERROR: Unable to extract research content from message. Please provide research text directly.';

export function containsStatusEnvelopes(blob: string): boolean {
  return blob.includes(STATUS_UPDATE_MARKER);
}

/**
 * Split a blob into JSON object candidates.
 *
 * Without the `statusUpdate` marker the blob is returned as the only element.
 */
export function splitConcatenatedEnvelopes(blob: string): string[] {
  if (!containsStatusEnvelopes(blob)) {
    return [blob];
  }
  return blob.split(BOUNDARY).join(`}${DELIMITER}{`).split(DELIMITER);
}

/**
 * Lenient scan for `"text": "<value>"` pairs anywhere in the blob.
 */
export function scanTextFields(blob: string): string[] {
  return Array.from(blob.matchAll(TEXT_FIELD_PATTERN), (match) => match[1] ?? '').filter(Boolean);
}

/**
 * Recover plain text from a blob that may hold concatenated envelopes.
 *
 * Order of attempts:
 * 1. split on `}{` and extract each parsed candidate; a candidate that is
 *    not valid JSON is skipped, never kept verbatim
 * 2. join every `"text": "..."` value with a space
 * 3. {@link UNRECOVERABLE_CONTENT_MESSAGE}
 */
export function recoverEnvelopeText(blob: string, stats: ExtractionStats = new ExtractionStats()): string {
  if (!containsStatusEnvelopes(blob)) {
    return blob;
  }

  const logger = getLogger();
  const candidates = splitConcatenatedEnvelopes(blob);
  const chunks: string[] = [];

  candidates.forEach((candidate, index) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch (error) {
      stats.increment('parseFailures');
      const parseError = new ParseError(index, candidate, error);
      logger.debug({ index, preview: parseError.preview }, parseError.message);
      return;
    }

    stats.increment('candidatesParsed');
    const text = extractEnvelopeText(parsed);
    if (text) {
      stats.increment('fragmentsExtracted');
      chunks.push(text);
    }
  });

  const joined = chunks.join('').trim();
  if (joined) {
    logger.debug({ candidates: candidates.length, ...stats.snapshot(), length: joined.length }, 'Recovered text from relayed envelopes');
    return joined;
  }

  stats.increment('fallbackTriggered');
  const scanned = scanTextFields(blob);
  if (scanned.length > 0) {
    logger.warn({ candidates: candidates.length, textFields: scanned.length }, 'Envelope split yielded no text, used text field scan');
    return scanned.join(' ');
  }

  logger.warn({ candidates: candidates.length, length: blob.length }, 'Unable to recover any text from relayed envelopes');
  return UNRECOVERABLE_CONTENT_MESSAGE;
}
