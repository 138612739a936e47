/**
 * CLI commands for agent-relay.
 *
 * ```
 * agent-relay serve <research|content> [--port N] [--host H]
 * agent-relay invoke <agent|url> <text...>
 * agent-relay discover <agent|url>
 * agent-relay pipeline [topic...]
 * ```
 *
 * Commands print to the given {@link CliOutput} and resolve to an exit code.
 */

import { AgentServer } from '../agent/agent-server.js';
import type { AgentWorkflow } from '../agent/types.js';
import { ContentAgent } from '../agents/content-agent.js';
import { ResearchAgent } from '../agents/research-agent.js';
import { DEFAULT_PIPELINE_TOPIC, resolveAgentTarget } from '../config/index.js';
import type { LlmConfig, RelayConfig } from '../config/types.js';
import { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import type { PipelineStage } from '../pipeline/types.js';
import { RelayClient } from '../transport/relay-client.js';
import type { AgentCard } from '../transport/types.js';
import { ValidationError } from '../utils/errors.js';
import { createUserMessage, handleError } from '../utils/error-handler.js';
import { createLogger } from '../utils/logger.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

/**
 * Display colored text.
 */
function color(text: string, colorName: keyof typeof colors): string {
  return `${colors[colorName]}${text}${colors.reset}`;
}

const RULE = '═══════════════════════════════════════════════════';

export const HOSTED_AGENTS = ['research', 'content'] as const;

export type HostedAgentName = (typeof HOSTED_AGENTS)[number];

export function isHostedAgentName(value: string | undefined): value is HostedAgentName {
  return HOSTED_AGENTS.some((name) => name === value);
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'serve'; agent: HostedAgentName; port?: number; host?: string }
  | { kind: 'invoke'; target: string; text: string }
  | { kind: 'discover'; target: string }
  | { kind: 'pipeline'; topic: string };

export interface ParsedArgs {
  command: CliCommand;
  /** --config <path> */
  configPath?: string;
}

/**
 * Where command output goes.
 */
export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parsePort(value: string | undefined): number {
  const port = Number(value);
  if (value === undefined || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError(`Invalid port "${value ?? ''}"`, { field: 'port', value });
  }
  return port;
}

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @throws ValidationError for unknown commands or missing operands
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') {
      return { command: { kind: 'help' } };
    }
    if (arg === '--port' || arg === '--host' || arg === '--config') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ValidationError(`Missing value for ${arg}`, { field: arg.slice(2) });
      }
      flags.set(arg.slice(2), value);
      i++;
      continue;
    }
    positional.push(arg);
  }

  const configPath = flags.get('config');
  const [name, ...rest] = positional;

  switch (name) {
    case undefined:
    case 'help':
      return { command: { kind: 'help' }, configPath };

    case 'serve': {
      const agent = rest[0];
      if (!isHostedAgentName(agent)) {
        throw new ValidationError(`serve needs one of: ${HOSTED_AGENTS.join(', ')}`, { field: 'agent', value: agent });
      }
      const port = flags.has('port') ? parsePort(flags.get('port')) : undefined;
      return { command: { kind: 'serve', agent, port, host: flags.get('host') }, configPath };
    }

    case 'invoke': {
      const [target, ...words] = rest;
      const text = words.join(' ').trim();
      if (!target || !text) {
        throw new ValidationError('invoke needs an agent and some text', { field: 'text' });
      }
      return { command: { kind: 'invoke', target, text }, configPath };
    }

    case 'discover': {
      const target = rest[0];
      if (!target) {
        throw new ValidationError('discover needs an agent name or URL', { field: 'agent' });
      }
      return { command: { kind: 'discover', target }, configPath };
    }

    case 'pipeline': {
      const topic = rest.join(' ').trim() || DEFAULT_PIPELINE_TOPIC;
      return { command: { kind: 'pipeline', topic }, configPath };
    }

    default:
      throw new ValidationError(`Unknown command "${name}"`, { field: 'command', value: name });
  }
}

export function showHelp(version: string, output: CliOutput = consoleOutput): void {
  output.out('');
  output.out(color(RULE, 'cyan'));
  output.out(color('  agent-relay - streaming agent pipeline', 'bold'));
  output.out(`  Version: ${version}`);
  output.out(color(RULE, 'cyan'));
  output.out('');
  output.out(color('Usage:', 'bold'));
  output.out('  agent-relay serve <research|content>    Host an agent');
  output.out('  agent-relay invoke <agent|url> <text>   Stream one message to an agent');
  output.out('  agent-relay discover <agent|url>        Show an agent card');
  output.out('  agent-relay pipeline [topic]            Run research → content');
  output.out('');
  output.out(color('Options:', 'bold'));
  output.out('  --port <port>      Port for serve (default: from the agent URL)');
  output.out('  --host <host>      Host for serve (default: server.host)');
  output.out('  --config <path>    Configuration file (default: agent-relay.config.yaml)');
  output.out('');
  output.out(color('Examples:', 'bold'));
  output.out(`  agent-relay serve research --port 8003`);
  output.out(`  agent-relay invoke research ${color('"Solid state batteries"', 'yellow')}`);
  output.out(`  agent-relay pipeline ${color('"Solid state batteries"', 'yellow')}`);
  output.out('');
}

/**
 * Workflow hosted by `serve <name>`.
 */
export function createWorkflow(name: HostedAgentName, llm: LlmConfig): AgentWorkflow {
  return name === 'research' ? new ResearchAgent(llm) : new ContentAgent(llm);
}

/**
 * Port an agent listens on by default: the port of its configured URL.
 */
export function defaultServePort(config: RelayConfig, name: HostedAgentName): number {
  const url = new URL(resolveAgentTarget(config, name).url);
  if (url.port) {
    return Number(url.port);
  }
  return url.protocol === 'https:' ? 443 : 80;
}

function formatCard(card: AgentCard): string[] {
  const lines = [`${color(card.name, 'bold')}${card.version ? color(` v${card.version}`, 'dim') : ''}`, `  ${card.description}`];
  for (const skill of card.skills ?? []) {
    lines.push(`  - ${skill.name}${skill.description ? `: ${skill.description}` : ''}`);
  }
  return lines;
}

function createClient(config: RelayConfig, target: string): RelayClient {
  const { name, url, timeoutMs } = resolveAgentTarget(config, target);
  return new RelayClient({ baseUrl: url, name, timeoutMs });
}

/**
 * Resolve when the signal aborts.
 */
function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

async function serve(
  command: Extract<CliCommand, { kind: 'serve' }>,
  config: RelayConfig,
  output: CliOutput,
  signal: AbortSignal
): Promise<number> {
  const server = new AgentServer(createWorkflow(command.agent, config.llm), {
    port: command.port ?? defaultServePort(config, command.agent),
    host: command.host ?? config.server.host,
  });

  await server.start();
  output.out(color(`${command.agent} agent listening on ${server.url ?? ''}`, 'green'));

  await untilAborted(signal);
  await server.stop();
  return 0;
}

async function invoke(
  command: Extract<CliCommand, { kind: 'invoke' }>,
  config: RelayConfig,
  output: CliOutput,
  signal: AbortSignal
): Promise<number> {
  const client = createClient(config, command.target);
  try {
    const text = await client.invoke(command.text, { signal });
    output.out(text);
    return 0;
  } finally {
    client.close();
  }
}

async function discover(
  command: Extract<CliCommand, { kind: 'discover' }>,
  config: RelayConfig,
  output: CliOutput
): Promise<number> {
  const client = createClient(config, command.target);
  try {
    const card = await client.discover();
    if (!card) {
      output.err(color(`No agent card at ${client.baseUrl}`, 'red'));
      return 1;
    }
    formatCard(card).forEach((line) => output.out(line));
    return 0;
  } finally {
    client.close();
  }
}

async function pipeline(
  command: Extract<CliCommand, { kind: 'pipeline' }>,
  config: RelayConfig,
  output: CliOutput,
  signal: AbortSignal
): Promise<number> {
  const logger = createLogger('CLI');
  const clients = config.pipeline.stages.map((stage) => createClient(config, stage));

  try {
    for (const client of clients) {
      const card = await client.discover();
      if (card) {
        logger.info({ agent: client.name, card: card.name }, 'Agent discovered');
      } else {
        logger.warn({ agent: client.name }, 'Agent card unavailable, continuing');
      }
    }

    output.out(color(`Topic: ${command.topic}`, 'bold'));
    output.out(color('───────────────────────────────────────────────────', 'dim'));

    const stages: PipelineStage[] = clients.map((client) => ({ name: client.name, client }));
    const result = await new PipelineOrchestrator().run(stages, command.topic, { signal });

    if (!result.success) {
      output.err(color(`Stage ${result.failedStage.index + 1} (${result.failedStage.name}) failed`, 'red'));
      output.err(result.error.message);
      return 1;
    }

    output.out(result.output);
    output.out('');
    for (const stage of result.stages) {
      output.out(color(`  ${stage.name}: ${stage.outputLength ?? 0} chars in ${stage.durationMs}ms`, 'dim'));
    }
    return 0;
  } finally {
    clients.forEach((client) => client.close());
  }
}

export interface RunCommandOptions {
  version: string;
  output?: CliOutput;
  /** Cancels in-flight calls; ends `serve` */
  signal?: AbortSignal;
}

/**
 * Run one parsed command.
 *
 * Failures are logged through the error handler and printed; they resolve
 * to exit code 1.
 */
export async function runCommand(command: CliCommand, config: RelayConfig, options: RunCommandOptions): Promise<number> {
  const output = options.output ?? consoleOutput;
  const signal = options.signal ?? new AbortController().signal;

  try {
    switch (command.kind) {
      case 'help':
        showHelp(options.version, output);
        return 0;
      case 'serve':
        return await serve(command, config, output, signal);
      case 'invoke':
        return await invoke(command, config, output, signal);
      case 'discover':
        return await discover(command, config, output);
      case 'pipeline':
        return await pipeline(command, config, output, signal);
    }
  } catch (error) {
    const enriched = handleError(error, { command: command.kind, userMessage: createUserMessage(error) });
    output.err(color(`Error: ${enriched.userMessage ?? enriched.message}`, 'red'));
    output.err(color(enriched.message, 'dim'));
    return 1;
  }
}
