/**
 * BaseAgent - Abstract base class for the hosted agent workflows.
 *
 * Provides common functionality:
 * - SDK option building (model, environment, no tools)
 * - Streaming of assistant text with cancellation
 * - Mapping of failed SDK results onto AgentExecutionError
 *
 * Uses Template Method pattern - subclasses implement `run` and the card.
 *
 * @module agents/base-agent
 */

import { query, type Options, type SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import type { Logger } from 'pino';
import { buildSdkEnv, extractAssistantText, getResultError } from '../utils/sdk.js';
import { createLogger } from '../utils/logger.js';
import { AgentExecutionError } from '../utils/errors.js';
import type { AgentCard } from '../transport/types.js';
import type { AgentWorkflow, RunContext } from '../agent/types.js';
import type { LlmConfig } from '../config/types.js';

/**
 * Abstract base class for agent workflows backed by the Claude Agent SDK.
 *
 * @example
 * ```typescript
 * class EchoAgent extends BaseAgent {
 *   readonly card = { name: 'Echo', description: 'Repeats the input' };
 *   protected getAgentName() { return 'EchoAgent'; }
 *
 *   async *run(input: string, context: RunContext) {
 *     yield* this.streamText(`Repeat: ${input}`, context);
 *   }
 * }
 * ```
 */
export abstract class BaseAgent implements AgentWorkflow {
  abstract readonly card: AgentCard;
  declare readonly unwrapRelayedInput?: boolean;

  readonly model: string;
  protected readonly apiKey?: string;
  protected readonly apiBaseUrl?: string;
  protected readonly logger: Logger;

  constructor(config: LlmConfig) {
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.apiBaseUrl = config.apiBaseUrl;
    this.logger = createLogger(this.getAgentName(), { model: this.model });
  }

  /**
   * Get the agent name for logging.
   */
  protected abstract getAgentName(): string;

  abstract run(input: string, context: RunContext): AsyncIterable<string>;

  /**
   * Create SDK options for one text generation step.
   */
  protected createSdkOptions(abortController: AbortController, systemPrompt?: string): Options {
    const options: Options = {
      model: this.model,
      env: buildSdkEnv(this.apiKey, this.apiBaseUrl),
      allowedTools: [],
      maxTurns: 1,
      abortController,
    };
    if (systemPrompt) {
      options.systemPrompt = systemPrompt;
    }
    return options;
  }

  /**
   * Run one prompt and yield assistant text as it arrives.
   *
   * @throws AgentExecutionError when the SDK reports a failed result or throws
   */
  protected async *streamText(prompt: string, context: RunContext, systemPrompt?: string): AsyncGenerator<string> {
    const abortController = new AbortController();
    const onAbort = () => abortController.abort();
    context.signal.addEventListener('abort', onAbort, { once: true });

    try {
      const messages: AsyncIterable<SDKMessage> = query({
        prompt,
        options: this.createSdkOptions(abortController, systemPrompt),
      });

      for await (const message of messages) {
        this.logger.debug({ contextId: context.contextId, messageType: message.type }, 'SDK message');

        const failure = getResultError(message);
        if (failure !== undefined) {
          throw new AgentExecutionError(`Generation failed: ${failure}`, { agent: this.getAgentName() });
        }

        const text = extractAssistantText(message);
        if (text) {
          yield text;
        }
      }
    } catch (error) {
      if (error instanceof AgentExecutionError) {
        throw error;
      }
      throw new AgentExecutionError('Generation failed', { agent: this.getAgentName(), cause: error });
    } finally {
      context.signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Run one prompt and return the whole trimmed answer.
   */
  protected async generateText(prompt: string, context: RunContext, systemPrompt?: string): Promise<string> {
    let text = '';
    for await (const chunk of this.streamText(prompt, context, systemPrompt)) {
      text += chunk;
    }
    return text.trim();
  }
}
