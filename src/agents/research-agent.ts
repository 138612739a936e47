/**
 * ResearchAgent - writes a structured research report about a topic.
 *
 * The report streams out as it is generated; it is the first stage of the
 * default pipeline and its first line becomes the content agent's topic.
 */

import type { RunContext } from '../agent/types.js';
import type { AgentCard } from '../transport/types.js';
import { BaseAgent } from './base-agent.js';

const SYSTEM_PROMPT =
  'You are a research analyst. You write factual, well-organized research reports in markdown. ' +
  'You never ask follow-up questions; you work with the topic as given.';

export function buildResearchPrompt(topic: string): string {
  return `Research the following topic and write a comprehensive report.

Topic: ${topic}

Requirements:
- Start with a single line that names the topic (no heading markup)
- Cover background, current state, key components and real-world applications
- Include notable challenges and open questions
- Finish with a short list of key findings

Return only the report in markdown format.`;
}

export class ResearchAgent extends BaseAgent {
  readonly card: AgentCard = {
    name: 'Research Agent',
    description: 'Researches a topic and returns a structured markdown report',
    version: '1.0.0',
    skills: [
      {
        id: 'research',
        name: 'Comprehensive Research',
        description: 'Background, current state and key findings for a topic',
        tags: ['research', 'analysis'],
        examples: ['Sustainable energy storage', 'History of the printing press'],
      },
    ],
  };

  protected getAgentName(): string {
    return 'ResearchAgent';
  }

  async *run(input: string, context: RunContext): AsyncGenerator<string> {
    context.logger.info({ topicLength: input.length }, 'Research started');
    yield* this.streamText(buildResearchPrompt(input), context, SYSTEM_PROMPT);
  }
}
