import { z } from 'zod';
import { LLMError } from '../core/errors.js';
import { BaseLLMProvider, resolveEndpoint } from './provider.js';
import type { ChatMessage, LLMProviderConfig } from './types.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional()
    })
  }))
});

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai';
  readonly model: string;

  private endpoint: string;
  private apiKey: string;

  constructor(config: LLMProviderConfig) {
    super(config);
    this.model = config.model;
    this.endpoint = resolveEndpoint(config.baseUrl ?? DEFAULT_BASE_URL, '/chat/completions');
    this.apiKey = config.apiKey ?? '';

    if (!this.apiKey) {
      throw new LLMError('OpenAI API key is required', this.name);
    }
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    await this.checkRateLimit();

    const body = {
      model: this.model,
      messages: messages.map(m => ({ role: m.role, content: m.content }))
    };

    const raw = await this.postJson(this.endpoint, { 'Authorization': `Bearer ${this.apiKey}` }, body);
    const parsed = OpenAIResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMError(`Unexpected OpenAI response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, this.name);
    }

    const choice = parsed.data.choices[0];
    if (!choice) {
      throw new LLMError('No choices in OpenAI response', this.name);
    }
    return choice.message.content ?? '';
  }
}
