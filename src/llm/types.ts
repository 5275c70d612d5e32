import type { LLMConfig } from '../core/types.js';

export type { ChatMessage, LLMProvider, LLMConfig, RateLimitConfig } from '../core/types.js';

export type LLMProviderConfig = Omit<LLMConfig, 'provider'>;
