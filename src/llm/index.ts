export { BaseLLMProvider, RateLimiter, createLLMProvider, resolveEndpoint } from './provider.js';
export { OpenAIProvider } from './openai.js';
export { AnthropicProvider, toAnthropicRequest, type AnthropicRequest } from './anthropic.js';
export type { ChatMessage, LLMConfig, LLMProvider, LLMProviderConfig, RateLimitConfig } from './types.js';
