import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { RateLimiter } from '../shared/rate-limiter.js';
import { ReportData, formatCategory } from '../publisher/report-data.js';

export interface TextCompleter {
  complete(prompt: string): Promise<string>;
}

export class AnthropicCompleter implements TextCompleter {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly maxTokens: number,
    timeoutMs = 60000
  ) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 1 });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: 'user', content: prompt }]
    });

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
    if (!text) {
      throw new Error('Model returned no text content');
    }
    return text;
  }
}

export function buildNarrativePrompt(report: ReportData): string {
  const lines = report.categories
    .filter(stats => stats.postCount > 0)
    .map(stats => {
      const signals = Object.entries(stats.signalCounts)
        .sort(([, a], [, b]) => b - a)
        .slice(0, 5)
        .map(([signal, count]) => `${signal}×${count}`)
        .join(', ');
      const top = stats.topPost ? ` Top post (@${stats.topPost.account}): "${stats.topPost.text.slice(0, 200)}"` : '';
      return `- ${formatCategory(stats.category)}: ${stats.postCount} posts, sentiment ${stats.meanSentiment.toFixed(2)} (${stats.sentimentLabel}), engagement ${stats.totalEngagement}${signals ? `, signals: ${signals}` : ''}.${top}`;
    });

  return `You are a financial markets analyst. Summarize social-media sentiment for ${report.window.since} to ${report.window.until} in 3-5 concise sentences.

Overall: ${report.totalPosts} posts, sentiment ${report.overall.meanSentiment.toFixed(2)} (${report.overall.sentimentLabel}).
By category:
${lines.length > 0 ? lines.join('\n') : '- no posts in this window'}

Mention the strongest and weakest categories and any risk worth watching. Do not give investment advice.`;
}

/**
 * Optional prose summary of a report. Paced by its own limiter; any failure
 * yields null so the report is still published.
 */
export class Narrator {
  constructor(
    private readonly completer: TextCompleter,
    private readonly limiter: RateLimiter
  ) {}

  async write(report: ReportData): Promise<string | null> {
    if (report.totalPosts === 0) {
      logger.info('No posts in window, skipping narrative');
      return null;
    }

    try {
      await this.limiter.acquire();
      const narrative = await this.completer.complete(buildNarrativePrompt(report));
      logger.info(`Narrative generated (${narrative.length} chars)`);
      return narrative;
    } catch (error) {
      logger.error(`Narrative generation failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
