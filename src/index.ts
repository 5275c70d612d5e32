export * from './core/index.js';
export {
  ToolRegistry,
  TOOL_PROTOCOL,
  BASE_SYSTEM_PROMPT,
  bashTool,
  isDangerousCommand,
  subagentTool,
  McpToolSource,
  connectStdioServer,
  createMcpTool,
  formatCallResult,
  readMcpConfig,
  createBuiltinTools,
  type McpConfig,
  type McpConnection,
  type McpConnector,
  type McpServerConfig,
  type McpToolInfo
} from './tools/index.js';
export {
  BaseLLMProvider,
  RateLimiter,
  createLLMProvider,
  resolveEndpoint,
  OpenAIProvider,
  AnthropicProvider,
  toAnthropicRequest,
  type AnthropicRequest,
  type LLMProviderConfig
} from './llm/index.js';
export { FileSessionStore } from './memory/index.js';
