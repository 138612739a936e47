/**
 * Configuration type definitions.
 *
 * The file shape is described by zod schemas; every section is optional
 * and filled from defaults by the loader. The resolved {@link RelayConfig}
 * is frozen and passed explicitly to the components that need it.
 */

import { z } from 'zod';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export const AgentEndpointSchema = z.object({
  url: z.string().url(),
  /** Per-agent override of relay.timeoutMs */
  timeoutMs: z.number().int().positive().optional(),
});

export const ConfigFileSchema = z
  .object({
    agents: z.record(z.string(), AgentEndpointSchema).optional(),
    relay: z
      .object({
        timeoutMs: z.number().int().positive().optional(),
      })
      .optional(),
    pipeline: z
      .object({
        stages: z.array(z.string().min(1)).min(1).optional(),
      })
      .optional(),
    server: z
      .object({
        host: z.string().min(1).optional(),
      })
      .optional(),
    llm: z
      .object({
        model: z.string().min(1).optional(),
        apiKey: z.string().min(1).optional(),
        apiBaseUrl: z.string().url().optional(),
      })
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        file: z.string().min(1).optional(),
        pretty: z.boolean().optional(),
      })
      .optional(),
  })
  .strict();

/**
 * Configuration as written in agent-relay.config.yaml.
 */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type AgentEndpoint = z.infer<typeof AgentEndpointSchema>;

export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Model settings for the hosted agent workflows.
 */
export interface LlmConfig {
  model: string;
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
  apiBaseUrl?: string;
}

export interface LoggingSettings {
  level: LogLevelName;
  file?: string;
  pretty?: boolean;
}

/**
 * Fully resolved configuration.
 */
export interface RelayConfig {
  agents: Readonly<Record<string, AgentEndpoint>>;
  relay: { timeoutMs: number };
  pipeline: { stages: readonly string[] };
  server: { host: string };
  llm: LlmConfig;
  logging: LoggingSettings;
  /** File the configuration came from, when one was found */
  source?: string;
}

/**
 * Configuration file discovery result.
 */
export interface ConfigFileInfo {
  path: string;
  exists: boolean;
}

/**
 * Raw file content plus where it came from.
 */
export interface LoadedConfigFile {
  config: ConfigFile;
  source?: string;
}
