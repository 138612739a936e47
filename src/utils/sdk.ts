/**
 * Shared utilities for Claude Agent SDK integration.
 */
import type { SDKMessage } from '@anthropic-ai/claude-agent-sdk';

/**
 * Get directory containing node executable.
 * This is needed for SDK subprocess spawning to find node.
 */
export function getNodeBinDir(): string {
  const {execPath} = process;
  return execPath.substring(0, execPath.lastIndexOf('/'));
}

/**
 * Build environment variables for the SDK subprocess.
 *
 * Explicit settings win over the inherited process environment; unset
 * variables are dropped.
 *
 * @param apiKey - API key for authentication
 * @param apiBaseUrl - Optional base URL for API requests
 * @param extraEnv - Optional extra environment variables to merge
 */
export function buildSdkEnv(
  apiKey: string | undefined,
  apiBaseUrl?: string,
  extraEnv?: Record<string, string | undefined>
): Record<string, string> {
  const merged: Record<string, string | undefined> = {
    ...process.env,
    ...extraEnv,
    PATH: `${getNodeBinDir()}:${process.env.PATH || ''}`,
  };

  if (apiKey) {
    merged.ANTHROPIC_API_KEY = apiKey;
  }
  if (apiBaseUrl) {
    merged.ANTHROPIC_BASE_URL = apiBaseUrl;
  }

  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(merged)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

/**
 * Concatenated text blocks of an assistant message; '' for anything else.
 */
export function extractAssistantText(message: SDKMessage): string {
  if (message.type !== 'assistant') {
    return '';
  }
  const apiMessage = message.message;
  if (!apiMessage || !Array.isArray(apiMessage.content)) {
    return '';
  }

  const parts: string[] = [];
  for (const block of apiMessage.content) {
    if (block.type === 'text' && 'text' in block) {
      parts.push(block.text);
    }
  }
  return parts.join('');
}

/**
 * Error text of a failed result message, or undefined when the message is
 * not a failed result.
 */
export function getResultError(message: SDKMessage): string | undefined {
  if (message.type !== 'result' || message.subtype === 'success') {
    return undefined;
  }
  if ('errors' in message && Array.isArray(message.errors) && message.errors.length > 0) {
    return message.errors.map(String).join(', ');
  }
  return message.subtype;
}
