/**
 * Transport layer module.
 *
 * Outbound side of the agent wire protocol: SSE reading and the relay
 * client.
 *
 * Usage:
 * ```typescript
 * import { RelayClient } from './transport/index.js';
 *
 * const client = new RelayClient({ baseUrl: 'http://localhost:8004' });
 * const text = await client.invoke(researchText, { signal });
 * ```
 */

export * from './types.js';
export { readLines, readEvents, parseEventLine, DATA_PREFIX, DONE_SENTINEL } from './event-stream-reader.js';
export {
  RelayClient,
  type RelayClientConfig,
  DEFAULT_INVOKE_TIMEOUT_MS,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
} from './relay-client.js';
