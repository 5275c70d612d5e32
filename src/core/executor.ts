import { errorMessage, isCancellation } from './errors.js';
import { isJsonObject } from './json.js';
import { raceInterrupt, type InterruptSubscription } from './interrupt.js';
import { DEFAULT_SUBTASK_KIND, DEFAULT_SUBTASK_MAX_ITERATIONS } from './directives.js';
import type { JsonValue, Logger, SubTaskSpec, ToolCall, ToolResolver } from './types.js';

export const SUBAGENT_TOOL_NAME = 'subagent';

const SUBAGENT_ALIASES = new Map<string, string>([
  [SUBAGENT_TOOL_NAME, DEFAULT_SUBTASK_KIND],
  ['code_subagent', 'code'],
  ['test_subagent', 'test'],
  ['doc_subagent', 'doc']
]);

/** The part of the orchestrator that tool dispatch needs. */
export interface SubAgentRunner {
  runSubagent(spec: SubTaskSpec, interrupt: InterruptSubscription | undefined, depth: number): Promise<string>;
  runParallel(tasks: SubTaskSpec[], interrupt: InterruptSubscription | undefined, depth: number): Promise<string[]>;
}

export interface DirectiveExecutorOptions {
  tools: ToolResolver;
  runner?: SubAgentRunner;
  logger?: Logger;
}

export function formatToolOutput(name: string, output: string): string {
  return `Tool '${name}' output:\n${output}`;
}

export function formatParallelResults(results: string[]): string {
  return `Parallel tasks results:\n${results.join('\n---\n')}`;
}

function readSubTaskSpec(args: JsonValue, defaultKind: string): SubTaskSpec | string {
  if (!isJsonObject(args)) {
    return "Error: Missing 'task' argument for subagent";
  }
  const task = args['task'];
  if (typeof task !== 'string') {
    return "Error: Missing 'task' argument for subagent";
  }
  const kind = args['type'];
  const maxLoops = args['max_loops'];
  return {
    task,
    kind: typeof kind === 'string' ? kind : defaultKind,
    maxIterations:
      typeof maxLoops === 'number' && Number.isInteger(maxLoops) && maxLoops >= 0
        ? maxLoops
        : DEFAULT_SUBTASK_MAX_ITERATIONS
  };
}

/**
 * Runs the side effects a directive asks for. Tool failures come back as
 * `Error: ...` text; only a {@link CancelledError} escapes.
 */
export class DirectiveExecutor {
  private readonly tools: ToolResolver;
  private readonly runner?: SubAgentRunner;
  private readonly logger?: Logger;

  constructor(options: DirectiveExecutorOptions) {
    this.tools = options.tools;
    this.runner = options.runner;
    this.logger = options.logger;
  }

  async executeTool(call: ToolCall, interrupt?: InterruptSubscription, depth = 0): Promise<string> {
    const subagentKind = SUBAGENT_ALIASES.get(call.name);
    if (subagentKind !== undefined && this.runner) {
      const spec = readSubTaskSpec(call.args, subagentKind);
      if (typeof spec === 'string') {
        return spec;
      }
      this.logger?.info('Executing subagent', { kind: spec.kind, task: spec.task, depth: depth + 1 });
      return this.runner.runSubagent(spec, interrupt, depth + 1);
    }

    const tool = this.tools.get(call.name);
    if (!tool) {
      this.logger?.warn('Tool not found', { tool: call.name });
      return `Error: Tool '${call.name}' not found`;
    }

    try {
      const execution = Promise.resolve().then(() => tool.execute(call.args));
      return await raceInterrupt(execution, interrupt);
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      this.logger?.warn('Tool error', { tool: call.name, error: errorMessage(error) });
      return `Error: ${errorMessage(error)}`;
    }
  }

  async executeParallel(tasks: SubTaskSpec[], interrupt?: InterruptSubscription, depth = 0): Promise<string> {
    if (!this.runner) {
      return formatParallelResults(['Error: parallel execution is not available']);
    }
    this.logger?.info('Found parallel tasks', { count: tasks.length, depth: depth + 1 });
    const results = await this.runner.runParallel(tasks, interrupt, depth + 1);
    return formatParallelResults(results);
  }
}
