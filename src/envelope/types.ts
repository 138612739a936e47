/**
 * Envelope shapes carried on agent streams.
 *
 * A payload is matched against these shapes in priority order:
 * StatusEnvelope, DirectEnvelope, PlainText; anything else that looks like
 * JSON is discarded.
 */

/**
 * One element of a `content` list. Only elements with a `text` key
 * contribute text.
 */
export interface ContentItem {
  text?: unknown;
  [key: string]: unknown;
}

/**
 * `{ statusUpdate: { status: { message: { content: [...] } } } }`
 *
 * Every level is optional on the wire; missing levels are not errors.
 */
export interface StatusEnvelope {
  statusUpdate: {
    contextId?: string;
    status?: {
      state?: string;
      message?: {
        role?: string;
        content?: ContentItem[];
      };
    };
  };
}

/**
 * `{ content: [...] }` without the status wrapper.
 */
export interface DirectEnvelope {
  content: ContentItem[];
}

/**
 * Outcome of extracting one payload.
 *
 * `matched` is false only for payloads that look like JSON but do not parse.
 */
export interface ExtractResult {
  text: string;
  matched: boolean;
}

/**
 * A non-empty piece of extracted text and the ordinal of its event.
 */
export interface TextFragment {
  text: string;
  index: number;
}

/**
 * Literal key that marks relayed status envelopes inside a text blob.
 */
export const STATUS_UPDATE_MARKER = 'statusUpdate';
