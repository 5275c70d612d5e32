export class AgentryError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AgentryError';
    this.code = code;
    this.timestamp = new Date();
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AgentryError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class LLMError extends AgentryError {
  public readonly provider?: string;
  public readonly status?: number;

  constructor(message: string, provider?: string, status?: number) {
    super(message, 'LLM_ERROR');
    this.name = 'LLMError';
    this.provider = provider;
    this.status = status;
  }
}

export class ToolError extends AgentryError {
  public readonly toolName: string;

  constructor(message: string, toolName: string) {
    super(message, 'TOOL_ERROR');
    this.name = 'ToolError';
    this.toolName = toolName;
  }
}

export class MaxIterationsError extends AgentryError {
  public readonly agentId: string;
  public readonly maxIterations: number;

  constructor(agentId: string, maxIterations: number) {
    super(`SubAgent ${agentId} max iterations reached (${maxIterations})`, 'MAX_ITERATIONS');
    this.name = 'MaxIterationsError';
    this.agentId = agentId;
    this.maxIterations = maxIterations;
  }
}

export class CancelledError extends AgentryError {
  public readonly generation: number;

  constructor(message: string, generation: number) {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
    this.generation = generation;
  }
}

export class SpawnError extends AgentryError {
  public readonly task: string;

  constructor(message: string, task: string, code = 'SPAWN_ERROR') {
    super(message, code);
    this.name = 'SpawnError';
    this.task = task;
  }
}

export class MaxDepthExceededError extends SpawnError {
  public readonly maxDepth: number;
  public readonly depth: number;

  constructor(task: string, maxDepth: number, depth: number) {
    super(`Maximum sub-agent depth exceeded: ${depth} > ${maxDepth}`, task, 'MAX_DEPTH_EXCEEDED');
    this.name = 'MaxDepthExceededError';
    this.maxDepth = maxDepth;
    this.depth = depth;
  }
}

export class AgentStateError extends AgentryError {
  constructor(message: string) {
    super(message, 'AGENT_STATE');
    this.name = 'AgentStateError';
  }
}

export class PersistenceError extends AgentryError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
  }
}

export function isCancellation(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
