/**
 * Configuration management.
 *
 * `loadConfig()` runs once at process start and returns a frozen
 * {@link RelayConfig}; callers pass it on explicitly.
 *
 * Precedence: config file, then environment (ANTHROPIC_API_KEY,
 * ANTHROPIC_BASE_URL), then built-in defaults. LOG_LEVEL is applied by the
 * logger itself.
 */

import { ValidationError } from '../utils/errors.js';
import { DEFAULT_AGENTS, DEFAULTS } from './constants.js';
import { loadConfigFile } from './loader.js';
import type { AgentEndpoint, ConfigFile, RelayConfig } from './types.js';

export interface LoadConfigOptions {
  /** Explicit config file path (CLI --config) */
  configPath?: string;
  /** Directories searched when no path is given */
  searchPaths?: readonly string[];
  /** Environment used for fallbacks (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Merge a parsed config file with environment fallbacks and defaults.
 */
export function resolveConfig(file: ConfigFile, env: NodeJS.ProcessEnv = process.env, source?: string): RelayConfig {
  const agents: Record<string, AgentEndpoint> = { ...DEFAULT_AGENTS, ...file.agents };
  for (const [name, endpoint] of Object.entries(agents)) {
    agents[name] = Object.freeze({ ...endpoint });
  }

  return Object.freeze({
    agents: Object.freeze(agents),
    relay: Object.freeze({ timeoutMs: file.relay?.timeoutMs ?? DEFAULTS.RELAY_TIMEOUT_MS }),
    pipeline: Object.freeze({ stages: Object.freeze([...(file.pipeline?.stages ?? DEFAULTS.PIPELINE_STAGES)]) }),
    server: Object.freeze({ host: file.server?.host ?? DEFAULTS.SERVER_HOST }),
    llm: Object.freeze({
      model: file.llm?.model ?? DEFAULTS.MODEL,
      apiKey: file.llm?.apiKey ?? env.ANTHROPIC_API_KEY,
      apiBaseUrl: file.llm?.apiBaseUrl ?? env.ANTHROPIC_BASE_URL,
    }),
    logging: Object.freeze({
      level: file.logging?.level ?? DEFAULTS.LOG_LEVEL,
      file: file.logging?.file,
      pretty: file.logging?.pretty,
    }),
    source,
  });
}

/**
 * Load, validate and resolve the configuration.
 *
 * @throws ConfigurationError when the file is invalid or an explicit path is missing
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const { config, source } = loadConfigFile(options.configPath, options.searchPaths);
  return resolveConfig(config, options.env ?? process.env, source);
}

/**
 * Where to reach an agent.
 */
export interface AgentTarget {
  name: string;
  url: string;
  timeoutMs: number;
}

/**
 * Resolve an agent name from the config, or accept an http(s) URL as is.
 *
 * @throws ValidationError for unknown names
 */
export function resolveAgentTarget(config: RelayConfig, nameOrUrl: string): AgentTarget {
  if (/^https?:\/\//.test(nameOrUrl)) {
    return { name: nameOrUrl, url: nameOrUrl, timeoutMs: config.relay.timeoutMs };
  }

  const endpoint = config.agents[nameOrUrl];
  if (!endpoint) {
    throw new ValidationError(
      `Unknown agent "${nameOrUrl}". Known agents: ${Object.keys(config.agents).join(', ')}`,
      { field: 'agent', value: nameOrUrl }
    );
  }
  return { name: nameOrUrl, url: endpoint.url, timeoutMs: endpoint.timeoutMs ?? config.relay.timeoutMs };
}

export { loadConfigFile, findConfigFile, parseConfigText, defaultSearchPaths } from './loader.js';
export { CONFIG_FILE_NAMES, DEFAULT_AGENTS, DEFAULTS, DEFAULT_PIPELINE_TOPIC } from './constants.js';
export { ConfigFileSchema, AgentEndpointSchema } from './types.js';
export type {
  AgentEndpoint,
  ConfigFile,
  ConfigFileInfo,
  LlmConfig,
  LoadedConfigFile,
  LoggingSettings,
  LogLevelName,
  RelayConfig,
} from './types.js';
