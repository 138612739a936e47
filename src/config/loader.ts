/**
 * Configuration file loader.
 *
 * Handles finding, parsing (js-yaml) and validating (zod) the YAML file.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { CONFIG_FILE_NAMES } from './constants.js';
import { ConfigFileSchema, type ConfigFile, type ConfigFileInfo, type LoadedConfigFile } from './types.js';

/**
 * Default search paths: working directory, then home directory.
 */
export function defaultSearchPaths(): string[] {
  return [process.cwd(), process.env.HOME || ''].filter(Boolean);
}

/**
 * Find the configuration file in the search paths.
 */
export function findConfigFile(searchPaths: readonly string[] = defaultSearchPaths()): ConfigFileInfo {
  const logger = createLogger('ConfigLoader');

  for (const searchPath of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(searchPath, fileName);
      if (existsSync(filePath)) {
        logger.debug({ filePath }, 'Found configuration file');
        return { path: filePath, exists: true };
      }
    }
  }

  logger.debug('No configuration file found, using defaults');
  return { path: '', exists: false };
}

function formatIssue(issue: ZodIssue): string {
  const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${field}: ${issue.message}`;
}

/**
 * Parse and validate configuration text.
 *
 * An empty document is an empty configuration.
 *
 * @throws ConfigurationError listing every failing field
 */
export function parseConfigText(content: string, source?: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError('Configuration file is not valid YAML', { source, cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration${source ? ` in ${source}` : ''}`, {
      source,
      issues: result.error.issues.map(formatIssue),
    });
  }
  return result.data;
}

/**
 * Load the configuration file.
 *
 * @param filePath - Explicit path; it must exist. Searched for when omitted.
 * @param searchPaths - Directories to search when no path is given
 *
 * @example
 * ```typescript
 * const { config, source } = loadConfigFile();
 * if (source) {
 *   console.log(`Loaded from ${source}`);
 * }
 * ```
 */
export function loadConfigFile(filePath?: string, searchPaths?: readonly string[]): LoadedConfigFile {
  const logger = createLogger('ConfigLoader');

  const fileInfo = filePath
    ? { path: resolve(filePath), exists: existsSync(resolve(filePath)) }
    : findConfigFile(searchPaths);

  if (!fileInfo.exists) {
    if (filePath) {
      throw new ConfigurationError(`Configuration file not found: ${fileInfo.path}`, { source: fileInfo.path });
    }
    return { config: {} };
  }

  const config = parseConfigText(readFileSync(fileInfo.path, 'utf-8'), fileInfo.path);
  logger.info({ path: fileInfo.path, keys: Object.keys(config) }, 'Configuration file loaded successfully');

  return { config, source: fileInfo.path };
}
