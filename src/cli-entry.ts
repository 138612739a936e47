#!/usr/bin/env node
/**
 * CLI entry point for agent-relay.
 *
 * Loads configuration once, initializes logging from it and runs one
 * command. SIGINT/SIGTERM cancel in-flight calls and stop `serve`.
 */
import { readFileSync } from 'fs';
import { parseArgs, runCommand, showHelp, type ParsedArgs } from './cli/index.js';
import { loadConfig } from './config/index.js';
import { initLogger, flushLogger, getRootLogger, isLogLevel } from './utils/logger.js';
import { handleError, ErrorCategory } from './utils/error-handler.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    getRootLogger().debug({ err: error }, 'package.json not readable');
  }
  return '0.0.0';
}

/**
 * Main CLI entry point with enhanced error handling.
 */
async function main(): Promise<number> {
  const version = readVersion();

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    const enriched = handleError(error, { category: ErrorCategory.VALIDATION }, { log: false });
    console.error(`\n${enriched.message}`);
    showHelp(version);
    return 1;
  }

  const config = loadConfig({ configPath: parsed.configPath });

  const logger = initLogger({
    level: isLogLevel(config.logging.level) ? config.logging.level : undefined,
    prettyPrint: config.logging.pretty,
    file: config.logging.file,
    metadata: {
      version,
      nodeVersion: process.version,
      platform: process.platform,
    },
  });

  logger.info({ command: parsed.command.kind, configSource: config.source }, 'agent-relay starting');

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return runCommand(parsed.command, config, { version, signal: controller.signal });
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  const logger = getRootLogger();
  logger.fatal({ err: error }, 'Uncaught exception');
  void flushLogger().finally(() => process.exit(1));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  const logger = getRootLogger();
  logger.fatal({ err: reason }, 'Unhandled promise rejection');
  void flushLogger().finally(() => process.exit(1));
});

main()
  .then(async (code) => {
    await flushLogger();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    const enriched = handleError(error, {}, { log: true });
    console.error(`Error: ${enriched.userMessage ?? enriched.message}`);
    console.error(enriched.message);
    await flushLogger();
    process.exit(1);
  });
