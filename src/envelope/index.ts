/**
 * Envelope parsing layer.
 *
 * Usage:
 * ```typescript
 * import { extractPayload, ResultAccumulator, recoverEnvelopeText } from './envelope/index.js';
 *
 * const accumulator = new ResultAccumulator();
 * const { text } = extractPayload(payload);
 * accumulator.add({ text, index: 0 });
 * const result = accumulator.finalize();
 *
 * // Relayed raw envelopes
 * const recovered = recoverEnvelopeText(blob);
 * ```
 */

export * from './types.js';
export { ExtractionStats, type ExtractionCounters, type ExtractionCounter } from './stats.js';
export {
  extractPayload,
  extractEnvelopeText,
  collectContentText,
  textValue,
  isRecord,
  isStatusEnvelope,
  isDirectEnvelope,
} from './extractor.js';
export {
  splitConcatenatedEnvelopes,
  recoverEnvelopeText,
  scanTextFields,
  containsStatusEnvelopes,
  UNRECOVERABLE_CONTENT_MESSAGE,
} from './splitter.js';
export { ResultAccumulator } from './accumulator.js';
