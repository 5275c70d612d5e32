import { z } from 'zod';
import { LLMError } from '../core/errors.js';
import { BaseLLMProvider, resolveEndpoint } from './provider.js';
import type { ChatMessage, LLMProviderConfig } from './types.js';

const DEFAULT_BASE_URL = 'https://api.anthropic.com/v1';
const DEFAULT_MAX_TOKENS = 4096;
const ANTHROPIC_VERSION = '2023-06-01';

const ContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  thinking: z.string().optional()
}).passthrough();

const AnthropicResponseSchema = z.object({
  content: z.array(ContentBlockSchema)
});

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface AnthropicRequest {
  model: string;
  max_tokens: number;
  messages: AnthropicMessage[];
  system?: string;
}

/** Lifts system messages into the top-level `system` field. */
export function toAnthropicRequest(model: string, maxTokens: number, messages: ChatMessage[]): AnthropicRequest {
  const system: string[] = [];
  const turns: AnthropicMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  const request: AnthropicRequest = { model, max_tokens: maxTokens, messages: turns };
  if (system.length > 0) {
    request.system = system.join('\n\n');
  }
  return request;
}

export class AnthropicProvider extends BaseLLMProvider {
  readonly name: string;
  readonly model: string;

  private endpoint: string;
  private apiKey: string;
  private maxTokens: number;

  constructor(config: LLMProviderConfig, name = 'anthropic') {
    super(config);
    this.name = name;
    this.model = config.model;
    this.endpoint = resolveEndpoint(config.baseUrl ?? DEFAULT_BASE_URL, '/messages');
    this.apiKey = config.apiKey ?? '';
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;

    if (!this.apiKey) {
      throw new LLMError('Anthropic API key is required', this.name);
    }
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    await this.checkRateLimit();

    const body = toAnthropicRequest(this.model, this.maxTokens, messages);
    const raw = await this.postJson(
      this.endpoint,
      { 'x-api-key': this.apiKey, 'anthropic-version': ANTHROPIC_VERSION },
      body
    );

    const parsed = AnthropicResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMError(`Unexpected ${this.name} response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, this.name);
    }

    let thinking = '';
    let text = '';
    for (const block of parsed.data.content) {
      if (block.type === 'text' && block.text !== undefined) {
        text += block.text;
      } else if (block.type === 'thinking' && block.thinking !== undefined) {
        thinking += block.thinking;
      }
    }

    return thinking ? `<thinking>\n${thinking}\n</thinking>\n${text}` : text;
  }
}
