import { ConfigurationError, LLMError, errorMessage } from '../core/errors.js';
import type {
  ChatMessage,
  LLMConfig,
  LLMProvider,
  LLMProviderConfig,
  RateLimitConfig
} from './types.js';

export type { ChatMessage, LLMConfig, LLMProvider, LLMProviderConfig, RateLimitConfig };

export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly model: string;

  abstract complete(messages: ChatMessage[]): Promise<string>;

  protected rateLimiter: RateLimiter | null = null;

  constructor(config?: { rateLimit?: RateLimitConfig }) {
    if (config?.rateLimit) {
      this.rateLimiter = new RateLimiter(config.rateLimit);
    }
  }

  protected async checkRateLimit(): Promise<void> {
    if (this.rateLimiter) {
      await this.rateLimiter.acquire();
    }
  }

  /** POSTs JSON and returns the parsed response body; anything else is an {@link LLMError}. */
  protected async postJson(url: string, headers: Record<string, string>, body: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body)
      });
    } catch (error) {
      throw new LLMError(`Failed to send request to ${this.name}: ${errorMessage(error)}`, this.name);
    }

    const text = await response.text().catch(() => 'Unable to read error');
    if (!response.ok) {
      throw new LLMError(
        `${this.name} API error: ${response.status} ${response.statusText} - ${text}`,
        this.name,
        response.status
      );
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new LLMError(`Failed to parse ${this.name} response: ${errorMessage(error)}`, this.name, response.status);
    }
  }
}

export class RateLimiter {
  private timestamps: number[] = [];

  constructor(private config: RateLimitConfig) {}

  async acquire(): Promise<void> {
    const now = Date.now();
    const minuteAgo = now - 60000;

    this.timestamps = this.timestamps.filter(ts => ts > minuteAgo);

    if (this.timestamps.length >= this.config.maxPerMinute) {
      const oldestInWindow = this.timestamps[0];
      if (oldestInWindow !== undefined) {
        const waitTime = oldestInWindow + 60000 - now;

        if (waitTime > 0) {
          await new Promise(resolve => setTimeout(resolve, waitTime));
        }

        this.timestamps = this.timestamps.filter(ts => ts > Date.now() - 60000);
      }
    }

    this.timestamps.push(Date.now());
  }
}

/** Accepts either a base URL or the full endpoint. */
export function resolveEndpoint(baseUrl: string, path: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith(path) ? trimmed : `${trimmed}${path}`;
}

export async function createLLMProvider(
  config: { provider: string } & LLMProviderConfig
): Promise<LLMProvider> {
  const { provider, ...rest } = config;

  switch (provider.toLowerCase()) {
    case 'openai': {
      const { OpenAIProvider } = await import('./openai.js');
      return new OpenAIProvider(rest);
    }
    // Minimax speaks the Anthropic messages API.
    case 'claude':
    case 'anthropic':
    case 'minimax': {
      const { AnthropicProvider } = await import('./anthropic.js');
      return new AnthropicProvider(rest, provider);
    }
    default:
      throw new ConfigurationError(`Unknown LLM provider: ${provider}`);
  }
}
