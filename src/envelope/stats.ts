/**
 * Extraction counters.
 *
 * One instance per invocation or recovery pass; logged at the end of the
 * operation instead of printing as the stream goes.
 */

export interface ExtractionCounters {
  /** SSE payloads handed to the extractor */
  eventsRead: number;
  /** JSON candidates that parsed */
  candidatesParsed: number;
  /** Candidates or payloads that failed to parse */
  parseFailures: number;
  /** Non-empty fragments produced */
  fragmentsExtracted: number;
  /** JSON-looking payloads dropped without text */
  payloadsDiscarded: number;
  /** Times the lenient `"text": "..."` scan ran */
  fallbackTriggered: number;
}

export type ExtractionCounter = keyof ExtractionCounters;

export class ExtractionStats {
  private readonly counters: ExtractionCounters = {
    eventsRead: 0,
    candidatesParsed: 0,
    parseFailures: 0,
    fragmentsExtracted: 0,
    payloadsDiscarded: 0,
    fallbackTriggered: 0,
  };

  increment(counter: ExtractionCounter, by = 1): void {
    this.counters[counter] += by;
  }

  get(counter: ExtractionCounter): number {
    return this.counters[counter];
  }

  snapshot(): ExtractionCounters {
    return { ...this.counters };
  }
}
