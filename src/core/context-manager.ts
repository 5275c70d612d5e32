import type { ChatMessage, LLMProvider, Logger } from './types.js';
import { errorMessage } from './errors.js';

export const DEFAULT_MAX_TOKENS = 8192;
export const PRESERVE_LAST = 4;
export const MIN_COMPACT_MESSAGES = 5;
export const SUMMARY_PREFIX = 'Previous conversation summary: ';
export const SUMMARY_FAILED = '... Conversation compressed (summary failed) ...';
export const SUMMARY_UNAVAILABLE = '... Old conversation compressed ...';

export type Summarizer = Pick<LLMProvider, 'complete'>;

export interface ContextManagerOptions {
  maxTokens?: number;
  summarizer?: Summarizer;
  logger?: Logger;
}

/**
 * Ordered message log for one conversation. A primed system message, when
 * present, is always the first entry.
 */
export class ContextManager {
  private messages: ChatMessage[] = [];
  private summarizer?: Summarizer;
  readonly maxTokens: number;
  private readonly logger?: Logger;

  constructor(options: ContextManagerOptions = {}) {
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.summarizer = options.summarizer;
    this.logger = options.logger;
  }

  setSummarizer(summarizer: Summarizer): void {
    this.summarizer = summarizer;
  }

  append(message: ChatMessage): void {
    this.messages.push({ role: message.role, content: message.content });
  }

  snapshot(): ChatMessage[] {
    return this.messages.map(m => ({ ...m }));
  }

  get length(): number {
    return this.messages.length;
  }

  reset(): void {
    this.messages = [];
  }

  load(messages: readonly ChatMessage[]): void {
    this.messages = messages.map(m => ({ role: m.role, content: m.content }));
  }

  injectSystem(content: string): void {
    const first = this.messages[0];
    if (first && first.role === 'system') {
      first.content = content;
      return;
    }
    this.messages.unshift({ role: 'system', content });
  }

  estimateTokens(): number {
    const chars = this.messages.reduce((sum, m) => sum + m.content.length, 0);
    return Math.floor(chars / 4);
  }

  /**
   * Replaces everything between the primed system message and the last
   * {@link PRESERVE_LAST} messages with one summary message. Returns whether
   * the log was rewritten.
   */
  async compact(summarizer: Summarizer | undefined = this.summarizer): Promise<boolean> {
    if (this.estimateTokens() <= this.maxTokens) {
      return false;
    }
    if (this.messages.length <= MIN_COMPACT_MESSAGES) {
      return false;
    }

    const first = this.messages[0];
    const system = first && first.role === 'system' ? first : undefined;
    const start = system ? 1 : 0;
    const end = this.messages.length - PRESERVE_LAST;
    if (start >= end) {
      return false;
    }

    const middle = this.messages.slice(start, end);
    const tail = this.messages.slice(end);
    const summary = await this.summarize(middle, summarizer);

    this.messages = [
      ...(system ? [system] : []),
      { role: 'system', content: `${SUMMARY_PREFIX}${summary}` },
      ...tail
    ];
    this.logger?.debug('Context compacted', {
      summarized: middle.length,
      remaining: this.messages.length
    });
    return true;
  }

  private async summarize(messages: ChatMessage[], summarizer?: Summarizer): Promise<string> {
    if (!summarizer) {
      return SUMMARY_UNAVAILABLE;
    }

    const text = messages
      .map(m => `${m.role.toUpperCase()}: ${m.content}`)
      .join('\n');
    const prompt = `Summarize the following conversation history into a single paragraph. Ignore system messages if any.\n\n${text}`;

    try {
      return await summarizer.complete([{ role: 'user', content: prompt }]);
    } catch (error) {
      this.logger?.warn('Context summarization failed', { error: errorMessage(error) });
      return SUMMARY_FAILED;
    }
  }
}
