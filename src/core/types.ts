export type Role = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: Role;
  content: string;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  complete(messages: ChatMessage[]): Promise<string>;
}

export interface Tool {
  name: string;
  description: string;
  parameters: JsonObject;
  execute: (args: JsonValue) => Promise<string>;
}

export interface ToolResolver {
  get(name: string): Tool | undefined;
}

export interface ToolCatalog extends ToolResolver {
  generateToolInstructions(): string;
}

export interface ToolCall {
  name: string;
  args: JsonValue;
}

export type AgentKind = 'code' | 'test' | 'doc' | 'analysis' | 'dynamic';

export interface SubTaskSpec {
  task: string;
  kind: string;
  maxIterations: number;
}

export type Directive =
  | { type: 'tool_call'; call: ToolCall; parallel?: SubTaskSpec[] }
  | { type: 'parallel'; tasks: SubTaskSpec[] }
  | { type: 'final'; text: string }
  | { type: 'none'; diagnostic?: string };

export type AgentStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface AgentSummary {
  id: string;
  task: string;
  kind: string;
  status: AgentStatus;
  depth: number;
  iterations: number;
  maxIterations: number;
  result?: string;
  error?: string;
  createdAt: number;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  file?: string;
}

export interface LLMConfig {
  provider: 'openai' | 'claude' | 'anthropic' | 'minimax';
  model: string;
  baseUrl?: string;
  apiKey?: string;
  maxTokens?: number;
  rateLimit?: RateLimitConfig;
}

export interface RateLimitConfig {
  maxPerMinute: number;
}

export interface PersistedSession {
  id: string;
  messages: ChatMessage[];
  created_at: string;
}
