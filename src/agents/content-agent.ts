/**
 * ContentAgent - turns research text into a blog post.
 *
 * Steps:
 * 1. topic = first line of the research (truncated to 150 chars + "...")
 * 2. generate a title
 * 3. generate the post body
 * 4. yield a summary: topic, title, length, then the body
 */

import type { RunContext } from '../agent/types.js';
import type { AgentCard } from '../transport/types.js';
import { BaseAgent } from './base-agent.js';

/** Longest topic taken from the research before it is cut. */
export const MAX_TOPIC_LENGTH = 150;

export const DEFAULT_TOPIC = 'Blog Post Topic';

/** Research excerpt shown to the title step. */
const TITLE_RESEARCH_EXCERPT = 500;

const SYSTEM_PROMPT = 'You are a technical blog writer. You write engaging, accurate posts in markdown.';

/**
 * Topic of a research text: its first line, trimmed and truncated.
 */
export function deriveTopic(research: string): string {
  const firstLine = research.split('\n')[0]?.trim() ?? '';
  if (!firstLine) {
    return DEFAULT_TOPIC;
  }
  return firstLine.length > MAX_TOPIC_LENGTH ? `${firstLine.slice(0, MAX_TOPIC_LENGTH)}...` : firstLine;
}

export function buildTitlePrompt(topic: string, research: string): string {
  return `Based on the following research content about "${topic}", create an engaging, SEO-friendly blog post title.

Research content: ${research.slice(0, TITLE_RESEARCH_EXCERPT)}...

Requirements:
- Make it catchy and engaging
- Keep it under 60 characters
- Make it informative and clear

Return only the title, nothing else.`;
}

export function buildBodyPrompt(topic: string, title: string, research: string): string {
  return `Create a comprehensive, well-structured blog post based on the following research.

Topic: ${topic}
Title: ${title}
Research Content: ${research}

Requirements:
- Engaging, professional tone
- Markdown with ## and ### headings
- Introduction, main sections, key insights, a "Key Takeaways" section and a conclusion
- 800-1500 words

Return the complete blog post in markdown format.`;
}

/**
 * Summary header written before the post body.
 */
export function formatPostSummary(topic: string, title: string, body: string): string {
  return `Blog post generated\n\n**Topic:** ${topic}\n**Title:** ${title}\n**Content Length:** ${body.length} characters\n\n---\n\n`;
}

export class ContentAgent extends BaseAgent {
  readonly card: AgentCard = {
    name: 'Content Agent',
    description: 'Writes a blog post from research content',
    version: '1.0.0',
    skills: [
      {
        id: 'blog-post',
        name: 'Blog Post Generation',
        description: 'Title creation and long-form writing from research text',
        tags: ['content', 'writing', 'blog'],
        examples: ['Research content or topic description'],
      },
    ],
  };

  /** Research arrives as relayed output of the research stage. */
  readonly unwrapRelayedInput = true;

  protected getAgentName(): string {
    return 'ContentAgent';
  }

  async *run(input: string, context: RunContext): AsyncGenerator<string> {
    const topic = deriveTopic(input);
    context.logger.info({ topic, researchLength: input.length }, 'Content generation started');

    const title = await this.generateText(buildTitlePrompt(topic, input), context, SYSTEM_PROMPT);
    context.logger.debug({ title }, 'Title generated');

    const body = await this.generateText(buildBodyPrompt(topic, title, input), context, SYSTEM_PROMPT);
    context.logger.info({ title, contentLength: body.length }, 'Content generated');

    yield formatPostSummary(topic, title, body);
    yield body;
  }
}
