import { EventEmitter } from 'events';
import { ContextManager, DEFAULT_MAX_TOKENS } from './context-manager.js';
import { parseDirective } from './directives.js';
import { DirectiveExecutor, formatToolOutput } from './executor.js';
import { errorMessage, isCancellation } from './errors.js';
import { InterruptChannel, type InterruptSubscription } from './interrupt.js';
import { createNullLogger } from './logger.js';
import { Orchestrator } from './orchestrator.js';
import { NUDGE_MESSAGE } from './prompts.js';
import type { ChatMessage, Directive, LLMProvider, Logger, Tool, ToolCatalog } from './types.js';

export const DEFAULT_MAX_LOOPS = 50;

export const HELP_TEXT = [
  'Commands:',
  '  /save <name> - Save session',
  '  /load <name> - Load session',
  '  /list - List sessions',
  '  /clear - Clear context',
  '  /tools - List tools',
  '  /agents - List sub-agents',
  '  /quit - Exit'
].join('\n');

/** The registry surface the session needs. */
export interface SessionTools extends ToolCatalog {
  list(): Tool[];
  generateSystemPrompt(): string;
}

export interface SessionPersistence {
  save(id: string, messages: readonly ChatMessage[]): Promise<unknown>;
  load(id: string): Promise<{ messages: ChatMessage[] }>;
  list(): Promise<string[]>;
}

export interface SessionOptions {
  llm: LLMProvider;
  tools: SessionTools;
  store: SessionPersistence;
  interrupts?: InterruptChannel;
  orchestrator?: Orchestrator;
  maxIterations?: number;
  maxTokens?: number;
  logger?: Logger;
}

export type SessionAction = 'continue' | 'quit';

export type TurnOutcome = 'final' | 'exhausted' | 'interrupted' | 'error';

export interface SessionEvents {
  assistant: (response: string) => void;
  tool: (name: string) => void;
  'tool-output': (name: string, output: string) => void;
  notice: (message: string) => void;
}

/**
 * The top-level conversation behind the interactive shell. Slash commands
 * are handled locally; anything else is a chat turn driven through the same
 * directive loop the sub-agents use.
 */
export class Session extends EventEmitter {
  readonly context: ContextManager;
  readonly interrupts: InterruptChannel;
  readonly orchestrator: Orchestrator;

  private readonly llm: LLMProvider;
  private readonly tools: SessionTools;
  private readonly store: SessionPersistence;
  private readonly executor: DirectiveExecutor;
  private readonly subscription: InterruptSubscription;
  private readonly maxIterations: number;
  private readonly logger: Logger;
  private running = false;

  constructor(options: SessionOptions) {
    super();
    this.llm = options.llm;
    this.tools = options.tools;
    this.store = options.store;
    this.logger = options.logger ?? createNullLogger();
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_LOOPS;
    this.interrupts = options.interrupts ?? new InterruptChannel(this.logger);
    this.subscription = this.interrupts.subscribe();
    this.orchestrator = options.orchestrator ?? new Orchestrator({
      llm: this.llm,
      tools: this.tools,
      logger: this.logger,
      maxTokens: options.maxTokens
    });
    this.executor = new DirectiveExecutor({
      tools: this.tools,
      runner: this.orchestrator,
      logger: this.logger
    });
    this.context = new ContextManager({
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      summarizer: this.llm,
      logger: this.logger
    });
    this.context.injectSystem(this.tools.generateSystemPrompt());
  }

  get busy(): boolean {
    return this.running;
  }

  interrupt(): number {
    return this.interrupts.interrupt();
  }

  private notify<K extends keyof SessionEvents>(event: K, ...args: Parameters<SessionEvents[K]>): void {
    this.emit(event, ...args);
  }

  async handleInput(line: string): Promise<SessionAction> {
    const input = line.trim();
    if (!input) {
      return 'continue';
    }
    if (input.startsWith('/')) {
      return this.handleCommand(input);
    }
    await this.runTurn(input);
    return 'continue';
  }

  async handleCommand(input: string): Promise<SessionAction> {
    const [command, name] = input.split(/\s+/);

    switch (command) {
      case '/quit':
      case '/exit':
        return 'quit';

      case '/help':
        this.notify('notice', HELP_TEXT);
        break;

      case '/save':
        if (!name) {
          this.notify('notice', 'Usage: /save <name>');
          break;
        }
        try {
          await this.store.save(name, this.context.snapshot());
          this.notify('notice', `Session saved as: ${name}`);
        } catch (error) {
          this.notify('notice', `Error saving session: ${errorMessage(error)}`);
        }
        break;

      case '/load':
        if (!name) {
          this.notify('notice', 'Usage: /load <name>');
          break;
        }
        try {
          const record = await this.store.load(name);
          this.context.load(record.messages);
          this.context.injectSystem(this.tools.generateSystemPrompt());
          this.notify('notice', 'Session loaded');
        } catch (error) {
          this.notify('notice', `Error loading session: ${errorMessage(error)}`);
        }
        break;

      case '/list':
        try {
          const sessions = await this.store.list();
          this.notify('notice', `Sessions: ${sessions.length > 0 ? sessions.join(', ') : '(none)'}`);
        } catch (error) {
          this.notify('notice', `Error listing sessions: ${errorMessage(error)}`);
        }
        break;

      case '/clear':
        this.context.reset();
        this.context.injectSystem(this.tools.generateSystemPrompt());
        this.notify('notice', 'Context cleared');
        break;

      case '/tools':
        this.notify('notice', this.tools.list().map(t => `- ${t.name}: ${t.description}`).join('\n'));
        break;

      case '/agents': {
        const agents = this.orchestrator.list();
        this.notify(
          'notice',
          agents.length > 0
            ? agents.map(a => `- ${a.id} [${a.kind}] ${a.status}: ${a.task}`).join('\n')
            : 'No sub-agents'
        );
        break;
      }

      default:
        this.notify('notice', 'Unknown command. Type /help');
    }
    return 'continue';
  }

  /** One user turn: iterate the loop protocol until a final answer, an error, an interrupt or the loop limit. */
  async runTurn(input: string): Promise<TurnOutcome> {
    this.running = true;
    this.subscription.acknowledge();
    this.context.append({ role: 'user', content: input });

    let outcome: TurnOutcome = 'exhausted';
    try {
      for (let loop = 0; loop < this.maxIterations; loop++) {
        const step = await this.step();
        if (step !== 'continue') {
          outcome = step;
          break;
        }
      }
    } finally {
      this.running = false;
    }

    if (outcome === 'exhausted') {
      this.logger.warn('Turn ended at loop limit', { maxIterations: this.maxIterations });
    }

    try {
      await this.context.compact(this.llm);
    } catch (error) {
      this.logger.warn('Context compression failed', { error: errorMessage(error) });
      this.notify('notice', `(Context compression error: ${errorMessage(error)})`);
    }
    return outcome;
  }

  private async step(): Promise<TurnOutcome | 'continue'> {
    let response: string;
    try {
      response = await this.subscription.race(this.llm.complete(this.context.snapshot()));
    } catch (error) {
      return this.stopTurn(error);
    }

    this.notify('assistant', response);
    this.context.append({ role: 'assistant', content: response });

    const directive: Directive = parseDirective(response);
    try {
      switch (directive.type) {
        case 'tool_call': {
          const { call } = directive;
          this.notify('tool', call.name);
          const output = await this.executor.executeTool(call, this.subscription);
          this.notify('tool-output', call.name, output);
          this.context.append({ role: 'user', content: formatToolOutput(call.name, output) });

          if (directive.parallel) {
            const joined = await this.executor.executeParallel(directive.parallel, this.subscription);
            this.context.append({ role: 'user', content: joined });
          }
          return 'continue';
        }

        case 'parallel': {
          const joined = await this.executor.executeParallel(directive.tasks, this.subscription);
          this.context.append({ role: 'user', content: joined });
          return 'continue';
        }

        case 'final':
          this.context.append({ role: 'assistant', content: directive.text });
          return 'final';

        case 'none':
          if (directive.diagnostic) {
            this.logger.warn('Ignoring malformed directive', { diagnostic: directive.diagnostic });
          }
          this.context.append({ role: 'user', content: NUDGE_MESSAGE });
          return 'continue';
      }
    } catch (error) {
      return this.stopTurn(error);
    }
  }

  private stopTurn(error: unknown): TurnOutcome {
    if (isCancellation(error)) {
      this.logger.info('Turn interrupted', { generation: error.generation });
      this.notify('notice', 'CTRL-C');
      return 'interrupted';
    }
    this.logger.error('Turn failed', { error: errorMessage(error) });
    this.notify('notice', `Error: ${errorMessage(error)}`);
    return 'error';
  }
}
