export * from './types.js';
export * from './errors.js';
export { jsonValueSchema, jsonObjectSchema, isJsonObject, toJsonObject } from './json.js';
export { AsyncMutex, generateAgentId } from './utils.js';
export { createLogger, childLogger, createNullLogger, DEFAULT_LOG_FILE } from './logger.js';
export { InterruptChannel, InterruptSubscription, raceInterrupt } from './interrupt.js';
export {
  ContextManager,
  DEFAULT_MAX_TOKENS,
  PRESERVE_LAST,
  MIN_COMPACT_MESSAGES,
  SUMMARY_PREFIX,
  type Summarizer
} from './context-manager.js';
export {
  parseDirective,
  parseToolCall,
  parseParallelTasks,
  extractFinal,
  scanJsonObjects,
  DEFAULT_SUBTASK_KIND,
  DEFAULT_SUBTASK_MAX_ITERATIONS,
  type ToolCallParse
} from './directives.js';
export { NUDGE_MESSAGE, FINISH_PROTOCOL, agentPrompt, buildSubAgentPrompt, resolveAgentKind } from './prompts.js';
export {
  DirectiveExecutor,
  SUBAGENT_TOOL_NAME,
  formatToolOutput,
  formatParallelResults,
  type SubAgentRunner
} from './executor.js';
export { SubAgent, CANCELLED_REASON, MAX_ITERATIONS_REASON, type SubAgentConfig, type RunOptions } from './agent.js';
export { Orchestrator, DEFAULT_MAX_DEPTH, CANCELLED_BY_USER, type OrchestratorOptions, type AgentHandle } from './orchestrator.js';
export {
  Session,
  DEFAULT_MAX_LOOPS,
  HELP_TEXT,
  type SessionOptions,
  type SessionAction,
  type SessionEvents,
  type SessionPersistence,
  type SessionTools,
  type TurnOutcome
} from './session.js';
