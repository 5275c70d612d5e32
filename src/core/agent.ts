import { ContextManager, DEFAULT_MAX_TOKENS } from './context-manager.js';
import { parseDirective } from './directives.js';
import { DirectiveExecutor, formatToolOutput, type SubAgentRunner } from './executor.js';
import { raceInterrupt, type InterruptSubscription } from './interrupt.js';
import { createNullLogger } from './logger.js';
import { NUDGE_MESSAGE } from './prompts.js';
import { generateAgentId } from './utils.js';
import {
  AgentStateError,
  CancelledError,
  LLMError,
  MaxIterationsError,
  errorMessage,
  isCancellation
} from './errors.js';
import type {
  AgentStatus,
  AgentSummary,
  LLMProvider,
  Logger,
  ToolResolver
} from './types.js';

export const CANCELLED_REASON = 'cancelled';
export const MAX_ITERATIONS_REASON = 'max iterations reached';

export interface SubAgentConfig {
  id?: string;
  task: string;
  kind: string;
  maxIterations: number;
  depth?: number;
  maxTokens?: number;
  logger?: Logger;
}

export interface RunOptions {
  llm: LLMProvider;
  tools: ToolResolver;
  interrupt?: InterruptSubscription;
  runner?: SubAgentRunner;
}

/**
 * One agent loop: its own conversation, driven until the model produces a
 * final answer, runs out of iterations, or is cancelled.
 *
 * Status only moves forward: pending → running → completed | failed.
 */
export class SubAgent {
  readonly id: string;
  readonly task: string;
  readonly kind: string;
  readonly maxIterations: number;
  readonly depth: number;
  readonly context: ContextManager;
  readonly createdAt: number;

  private currentStatus: AgentStatus = 'pending';
  private finalResult?: string;
  private failure?: string;
  private iterationCount = 0;
  private readonly logger: Logger;

  constructor(config: SubAgentConfig) {
    this.id = config.id ?? generateAgentId();
    this.task = config.task;
    this.kind = config.kind;
    this.maxIterations = config.maxIterations;
    this.depth = config.depth ?? 1;
    this.logger = config.logger ?? createNullLogger();
    this.context = new ContextManager({
      maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
      logger: this.logger
    });
    this.createdAt = Date.now();
  }

  get status(): AgentStatus {
    return this.currentStatus;
  }

  get result(): string | undefined {
    return this.finalResult;
  }

  get error(): string | undefined {
    return this.failure;
  }

  get iterations(): number {
    return this.iterationCount;
  }

  get isTerminal(): boolean {
    return this.currentStatus === 'completed' || this.currentStatus === 'failed';
  }

  injectSystemPrompt(prompt: string): void {
    this.context.injectSystem(prompt);
  }

  /** Fails a pending or running agent. Returns false when it was already terminal. */
  cancel(reason: string): boolean {
    return this.fail(reason);
  }

  private fail(reason: string): boolean {
    if (this.isTerminal) {
      return false;
    }
    this.currentStatus = 'failed';
    this.failure = reason;
    this.finalResult = undefined;
    return true;
  }

  summary(): AgentSummary {
    return {
      id: this.id,
      task: this.task,
      kind: this.kind,
      status: this.currentStatus,
      depth: this.depth,
      iterations: this.iterationCount,
      maxIterations: this.maxIterations,
      result: this.finalResult,
      error: this.failure,
      createdAt: this.createdAt
    };
  }

  async run(options: RunOptions): Promise<string> {
    if (this.currentStatus !== 'pending') {
      throw new AgentStateError(`SubAgent ${this.id} cannot run from status '${this.currentStatus}'`);
    }

    const { llm, interrupt } = options;
    const executor = new DirectiveExecutor({
      tools: options.tools,
      runner: options.runner,
      logger: this.logger
    });

    this.logger.info('SubAgent start', {
      agent: this.id,
      kind: this.kind,
      maxIterations: this.maxIterations,
      depth: this.depth
    });
    this.context.setSummarizer(llm);
    this.context.append({ role: 'user', content: this.task });
    this.currentStatus = 'running';

    for (;;) {
      this.ensureActive(interrupt);
      this.iterationCount++;
      this.logger.debug('SubAgent loop', {
        agent: this.id,
        iteration: this.iterationCount,
        maxIterations: this.maxIterations
      });

      const response = await this.complete(llm, interrupt);
      this.context.append({ role: 'assistant', content: response });

      const directive = parseDirective(response);

      switch (directive.type) {
        case 'tool_call': {
          const { call } = directive;
          this.logger.info('SubAgent tool call', { agent: this.id, tool: call.name });
          const output = await this.suspend(executor.executeTool(call, interrupt, this.depth), interrupt);
          this.logger.debug('SubAgent tool output', { agent: this.id, tool: call.name, output });
          this.context.append({ role: 'user', content: formatToolOutput(call.name, output) });

          if (directive.parallel) {
            const joined = await this.suspend(
              executor.executeParallel(directive.parallel, interrupt, this.depth),
              interrupt
            );
            this.context.append({ role: 'user', content: joined });
          }
          break;
        }

        case 'parallel': {
          const joined = await this.suspend(
            executor.executeParallel(directive.tasks, interrupt, this.depth),
            interrupt
          );
          this.context.append({ role: 'user', content: joined });
          break;
        }

        case 'final': {
          this.context.append({ role: 'assistant', content: directive.text });
          this.currentStatus = 'completed';
          this.finalResult = directive.text;
          this.logger.info('SubAgent completed', { agent: this.id, iterations: this.iterationCount });
          return directive.text;
        }

        case 'none': {
          if (directive.diagnostic) {
            this.logger.warn('Ignoring malformed directive', {
              agent: this.id,
              diagnostic: directive.diagnostic
            });
          }
          if (this.iterationCount >= this.maxIterations) {
            this.fail(MAX_ITERATIONS_REASON);
            this.logger.warn('SubAgent failed: max iterations reached', { agent: this.id });
            throw new MaxIterationsError(this.id, this.maxIterations);
          }
          this.context.append({ role: 'user', content: NUDGE_MESSAGE });
          break;
        }
      }

      try {
        await this.context.compact(llm);
      } catch (error) {
        this.logger.debug('SubAgent context compaction failed', {
          agent: this.id,
          error: errorMessage(error)
        });
      }
    }
  }

  private async complete(llm: LLMProvider, interrupt?: InterruptSubscription): Promise<string> {
    try {
      return await this.suspend(llm.complete(this.context.snapshot()), interrupt);
    } catch (error) {
      if (isCancellation(error) || this.isTerminal) {
        throw error;
      }
      const message = errorMessage(error);
      this.fail(message);
      this.logger.error('SubAgent model call failed', { agent: this.id, error: message });
      throw error instanceof LLMError ? error : new LLMError(message);
    }
  }

  /**
   * Awaits one suspension point raced against the interrupt. A cancellation,
   * or an external cancel that landed while waiting, fails the agent.
   */
  private async suspend<T>(operation: Promise<T>, interrupt?: InterruptSubscription): Promise<T> {
    let value: T;
    try {
      value = await raceInterrupt(operation, interrupt);
    } catch (error) {
      if (isCancellation(error)) {
        this.fail(CANCELLED_REASON);
        this.logger.warn('SubAgent cancelled by user', { agent: this.id });
        throw new CancelledError(`SubAgent ${this.id} cancelled`, error.generation);
      }
      throw error;
    }
    this.ensureActive(interrupt);
    return value;
  }

  private ensureActive(interrupt?: InterruptSubscription): void {
    if (this.currentStatus !== 'running') {
      throw new CancelledError(
        `SubAgent ${this.id} cancelled: ${this.failure ?? this.currentStatus}`,
        interrupt?.acknowledged ?? 0
      );
    }
  }
}
