#!/usr/bin/env node

import 'dotenv/config';
import fs from 'fs';
import readline from 'readline';
import { fileURLToPath } from 'url';
import chalk from 'chalk';
import { Session } from '../core/session.js';
import { FileSessionStore } from '../memory/session-store.js';
import { createLLMProvider } from '../llm/index.js';
import { McpToolSource, ToolRegistry, createBuiltinTools } from '../tools/index.js';
import { createLogger } from '../core/logger.js';
import { Orchestrator } from '../core/orchestrator.js';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import { loadConfig, parseArgs, toLLMConfig } from './config.js';
import { formatResponse } from './format.js';
import { DEFAULT_HISTORY_FILE, HISTORY_SIZE, loadHistory, saveHistory } from './history.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
Agentry - interactive coding agent

Usage:
  agentry [options]

Options:
  --provider <name>     openai, claude, anthropic or minimax (default: minimax)
  --model <name>        Model name (default: MiniMax-M2.1)
  --api-key <key>       API key (default: OPENAI_API_KEY, ANTHROPIC_API_KEY or MINIMAX_API_KEY)
  --api-url <url>       API base URL or full endpoint
  --session-dir <dir>   Session storage directory (default: __sessions)
  --max-loops <n>       Maximum loop iterations per turn (default: 50)
  --max-tokens <n>      Context budget before compaction (default: 8192)
  --max-depth <n>       Maximum sub-agent nesting depth (default: 4)
  --log-level <level>   trace, debug, info, warn, error or silent (default: debug)
  --log-file <path>     Log file (default: agentry.log)
  --mcp-config <path>   MCP server config (default: mcp.json)
  --disable-mcp         Do not start MCP servers
  --version             Show version
  --help                Show this help message
`);
}

export async function run(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    printHelp();
    return 0;
  }
  if (args.version) {
    console.log(`Agentry v${VERSION}`);
    return 0;
  }

  const config = await loadConfig({ flags: args.flags });
  const llmConfig = toLLMConfig(config);
  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  logger.info('Starting', { provider: config.provider, model: config.model });

  const llm = await createLLMProvider(llmConfig);

  const tools = new ToolRegistry();
  for (const tool of createBuiltinTools()) {
    tools.register(tool);
  }

  const mcp = new McpToolSource({ logger });
  if (!config.disableMcp) {
    try {
      await mcp.load(config.mcpConfig, tools);
    } catch (error) {
      logger.error('MCP tool registration failed', { error: errorMessage(error) });
    }
  }

  const orchestrator = new Orchestrator({
    llm,
    tools,
    logger,
    maxDepth: config.maxDepth,
    maxTokens: config.maxTokens
  });
  const session = new Session({
    llm,
    tools,
    orchestrator,
    store: new FileSessionStore(config.sessionDir),
    maxIterations: config.maxLoops,
    maxTokens: config.maxTokens,
    logger
  });

  session.on('assistant', (response: string) => {
    console.log(`${formatResponse(response)}\n`);
  });
  session.on('tool', (name: string) => {
    console.log(chalk.cyan(`>> Executing tool: ${name}...`));
  });
  session.on('tool-output', (_name: string, output: string) => {
    console.log(`>> Tool Output:\n${output.trim()}`);
  });
  session.on('notice', (message: string) => {
    console.log(message);
  });

  console.log('Agentry CLI - Type /help for commands');

  let history = await loadHistory(DEFAULT_HISTORY_FILE);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '>> ',
    history,
    historySize: HISTORY_SIZE
  });
  rl.on('history', (entries: string[]) => {
    history = entries;
  });

  // a busy session reports the interrupt itself when the turn unwinds
  rl.on('SIGINT', () => {
    const busy = session.busy;
    session.interrupt();
    if (!busy) {
      console.log('CTRL-C');
      rl.prompt();
    }
  });

  rl.prompt();
  try {
    for await (const line of rl) {
      const action = await session.handleInput(line);
      if (action === 'quit') {
        break;
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    try {
      await saveHistory(DEFAULT_HISTORY_FILE, history);
    } catch (error) {
      logger.error('Saving input history failed', { error: errorMessage(error) });
    }
    await mcp.closeAll();
    logger.info('Stopped');
  }
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return fs.realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  run(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      if (error instanceof ConfigurationError) {
        console.error(chalk.red(`Configuration error: ${error.message}`));
      } else {
        console.error(chalk.red(`Fatal error: ${errorMessage(error)}`));
      }
      process.exitCode = 1;
    }
  );
}
