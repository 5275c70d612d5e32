import { EventEmitter } from 'events';
import { SubAgent } from './agent.js';
import { DEFAULT_MAX_TOKENS } from './context-manager.js';
import { AgentStateError, MaxDepthExceededError, SpawnError, errorMessage, isCancellation } from './errors.js';
import type { SubAgentRunner } from './executor.js';
import { raceInterrupt, type InterruptSubscription } from './interrupt.js';
import { childLogger, createNullLogger } from './logger.js';
import { buildSubAgentPrompt } from './prompts.js';
import { AsyncMutex, generateAgentId } from './utils.js';
import type { AgentSummary, LLMProvider, Logger, SubTaskSpec, ToolCatalog } from './types.js';

export const DEFAULT_MAX_DEPTH = 4;
export const CANCELLED_BY_USER = 'Cancelled by user';

export interface OrchestratorOptions {
  llm: LLMProvider;
  tools: ToolCatalog;
  logger?: Logger;
  maxDepth?: number;
  maxTokens?: number;
}

export interface AgentHandle {
  readonly agent: SubAgent;
  readonly lock: AsyncMutex;
}

type Outcome =
  | { id: string; ok: true; result: string }
  | { id: string; ok: false; error: unknown };

/**
 * Registry of spawned sub-agents. Inserts are serialized on the registry
 * lock, status changes made through {@link cancel} on the record's own lock.
 * No lock is held while a sub-agent runs, so sub-agents can spawn their own
 * batches through the same instance.
 */
export class Orchestrator extends EventEmitter implements SubAgentRunner {
  private readonly agents: Map<string, AgentHandle> = new Map();
  private readonly registryLock = new AsyncMutex();
  private readonly llm: LLMProvider;
  private readonly tools: ToolCatalog;
  private readonly logger: Logger;
  private readonly maxDepth: number;
  private readonly maxTokens: number;

  constructor(options: OrchestratorOptions) {
    super();
    this.llm = options.llm;
    this.tools = options.tools;
    this.logger = options.logger ?? createNullLogger();
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async spawn(spec: SubTaskSpec, depth = 1): Promise<string> {
    if (!spec.task.trim()) {
      throw new SpawnError('Task description is empty', spec.task);
    }
    if (!Number.isInteger(spec.maxIterations) || spec.maxIterations < 1) {
      throw new SpawnError(`Invalid max iterations: ${spec.maxIterations}`, spec.task);
    }
    if (depth > this.maxDepth) {
      throw new MaxDepthExceededError(spec.task, this.maxDepth, depth);
    }

    const prompt = buildSubAgentPrompt(spec.kind, this.tools.generateToolInstructions());

    return this.registryLock.run(() => {
      let id = generateAgentId();
      while (this.agents.has(id)) {
        id = generateAgentId();
      }

      const agent = new SubAgent({
        id,
        task: spec.task,
        kind: spec.kind,
        maxIterations: spec.maxIterations,
        depth,
        maxTokens: this.maxTokens,
        logger: childLogger(this.logger, { agent: id })
      });
      agent.injectSystemPrompt(prompt);

      this.agents.set(id, { agent, lock: new AsyncMutex() });
      this.logger.info('SubAgent spawned', { agent: id, kind: spec.kind, depth });
      this.emit('spawned', agent.summary());
      return id;
    });
  }

  get(id: string): AgentHandle | undefined {
    return this.agents.get(id);
  }

  async withAgent<T>(id: string, fn: (agent: SubAgent) => T | Promise<T>): Promise<T | undefined> {
    const handle = this.agents.get(id);
    if (!handle) {
      return undefined;
    }
    return handle.lock.run(() => fn(handle.agent));
  }

  list(): AgentSummary[] {
    return Array.from(this.agents.values()).map(h => h.agent.summary());
  }

  /** Fails a pending or running record. Terminal records are left alone. */
  async cancel(id: string, reason: string): Promise<boolean> {
    const cancelled = await this.withAgent(id, agent => agent.cancel(reason));
    if (cancelled) {
      const handle = this.agents.get(id);
      if (handle) this.emit('cancelled', handle.agent.summary());
    }
    return cancelled ?? false;
  }

  async runAgent(id: string, interrupt?: InterruptSubscription): Promise<string> {
    const handle = this.agents.get(id);
    if (!handle) {
      throw new AgentStateError(`SubAgent ${id} not found`);
    }

    try {
      const result = await handle.agent.run({
        llm: this.llm,
        tools: this.tools,
        interrupt,
        runner: this
      });
      this.emit('completed', handle.agent.summary());
      return result;
    } catch (error) {
      this.emit(isCancellation(error) ? 'cancelled' : 'failed', handle.agent.summary());
      throw error;
    }
  }

  async runSubagent(spec: SubTaskSpec, interrupt: InterruptSubscription | undefined, depth: number): Promise<string> {
    let id: string;
    try {
      id = await this.spawn(spec, depth);
    } catch (error) {
      this.logger.warn('SubAgent spawn failed', { kind: spec.kind, error: errorMessage(error) });
      return `SubAgent [${spec.kind}] failed to spawn: ${errorMessage(error)}`;
    }

    try {
      const result = await raceInterrupt(this.runAgent(id, interrupt?.fork()), interrupt);
      return `SubAgent [${spec.kind}] completed:\n${result}`;
    } catch (error) {
      if (isCancellation(error)) {
        await this.cancel(id, CANCELLED_BY_USER);
        return `SubAgent [${spec.kind}] cancelled by user`;
      }
      return `SubAgent [${spec.kind}] failed: ${errorMessage(error)}`;
    }
  }

  /**
   * Runs every task as its own sub-agent concurrently. Results come back in
   * completion order; spawn failures are reported first, and an interrupt
   * turns every unfinished task into a CANCELLED line.
   */
  async runParallel(batch: SubTaskSpec[], interrupt: InterruptSubscription | undefined, depth: number): Promise<string[]> {
    this.logger.info('Executing parallel tasks', { count: batch.length, depth });
    const results: string[] = [];
    const pending = new Map<string, { spec: SubTaskSpec; outcome: Promise<Outcome> }>();

    for (const spec of batch) {
      let id: string;
      try {
        id = await this.spawn(spec, depth);
      } catch (error) {
        results.push(`[${spec.kind}] ERROR: ${spec.task} - ${errorMessage(error)}`);
        continue;
      }

      const outcome = this.runAgent(id, interrupt?.fork()).then(
        (result): Outcome => ({ id, ok: true, result }),
        (error: unknown): Outcome => ({ id, ok: false, error })
      );
      pending.set(id, { spec, outcome });
    }

    while (pending.size > 0) {
      let settled: Outcome;
      try {
        const next = Promise.race(Array.from(pending.values(), entry => entry.outcome));
        settled = await raceInterrupt(next, interrupt);
      } catch (error) {
        if (!isCancellation(error)) throw error;
        for (const [id, { spec }] of pending) {
          await this.cancel(id, CANCELLED_BY_USER);
          results.push(`[${spec.kind}] CANCELLED: ${spec.task}`);
        }
        pending.clear();
        this.logger.warn('Parallel tasks cancelled by user', { depth });
        break;
      }

      const entry = pending.get(settled.id);
      pending.delete(settled.id);
      if (!entry) continue;

      const { spec } = entry;
      results.push(
        settled.ok
          ? `[${spec.kind}] Task: ${spec.task}\nResult: ${settled.result}`
          : `[${spec.kind}] ERROR: ${spec.task} - ${errorMessage(settled.error)}`
      );
    }

    return results;
  }
}
