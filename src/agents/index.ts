/**
 * Agent workflows.
 */

export { BaseAgent } from './base-agent.js';
export { ResearchAgent, buildResearchPrompt } from './research-agent.js';
export {
  ContentAgent,
  deriveTopic,
  buildTitlePrompt,
  buildBodyPrompt,
  formatPostSummary,
  MAX_TOPIC_LENGTH,
  DEFAULT_TOPIC,
} from './content-agent.js';
