/**
 * Application-wide constants.
 */

import { DEFAULT_INVOKE_TIMEOUT_MS } from '../transport/relay-client.js';

/**
 * Configuration file names to search for, in priority order.
 */
export const CONFIG_FILE_NAMES = ['agent-relay.config.yaml', 'agent-relay.config.yml'] as const;

/**
 * Built-in agents and where they listen by default.
 */
export const DEFAULT_AGENTS = {
  research: { url: 'http://localhost:8003' },
  content: { url: 'http://localhost:8004' },
} as const;

export const DEFAULTS = {
  /** Upper bound for one agent call (milliseconds) */
  RELAY_TIMEOUT_MS: DEFAULT_INVOKE_TIMEOUT_MS,
  /** Default pipeline: research feeds content */
  PIPELINE_STAGES: ['research', 'content'],
  SERVER_HOST: '0.0.0.0',
  MODEL: 'claude-sonnet-4-5',
  LOG_LEVEL: 'info',
} as const;

/**
 * Topic used by `pipeline` when none is given.
 */
export const DEFAULT_PIPELINE_TOPIC = 'The future of sustainable energy technologies';
