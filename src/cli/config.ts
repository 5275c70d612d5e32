import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import type { LLMConfig } from '../core/types.js';

export const AGENTRY_DIR = path.join(os.homedir(), '.agentry');
export const CONFIG_FILE = path.join(AGENTRY_DIR, 'config.json');
export const MINIMAX_API_URL = 'https://api.minimaxi.com/anthropic/v1/messages';

const ProviderSchema = z.enum(['openai', 'claude', 'anthropic', 'minimax']);

const CLIConfigSchema = z.object({
  provider: ProviderSchema,
  model: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  apiUrl: z.string().url().optional(),
  sessionDir: z.string().min(1),
  maxLoops: z.number().int().positive(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']),
  logFile: z.string().min(1),
  mcpConfig: z.string().min(1),
  disableMcp: z.boolean(),
  maxTokens: z.number().int().positive(),
  maxDepth: z.number().int().positive(),
  rateLimit: z.object({ maxPerMinute: z.number().int().positive() }).optional()
});

export type Provider = z.infer<typeof ProviderSchema>;
export type CLIConfig = z.infer<typeof CLIConfigSchema>;
export type CLIOverrides = Partial<CLIConfig>;

export const defaultConfig: CLIConfig = {
  provider: 'minimax',
  model: 'MiniMax-M2.1',
  sessionDir: '__sessions',
  maxLoops: 50,
  logLevel: 'debug',
  logFile: 'agentry.log',
  mcpConfig: 'mcp.json',
  disableMcp: false,
  maxTokens: 8192,
  maxDepth: 4
};

const API_KEY_ENV: Record<Provider, string> = {
  openai: 'OPENAI_API_KEY',
  claude: 'ANTHROPIC_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  minimax: 'MINIMAX_API_KEY'
};

export type Env = Record<string, string | undefined>;

export interface ParsedArgs {
  flags: CLIOverrides;
  help: boolean;
  version: boolean;
}

type FlagKind = 'string' | 'number' | 'boolean';

const FLAGS = new Map<string, { key: keyof CLIConfig; kind: FlagKind }>([
  ['--provider', { key: 'provider', kind: 'string' }],
  ['--model', { key: 'model', kind: 'string' }],
  ['--api-key', { key: 'apiKey', kind: 'string' }],
  ['--api-url', { key: 'apiUrl', kind: 'string' }],
  ['--session-dir', { key: 'sessionDir', kind: 'string' }],
  ['--max-loops', { key: 'maxLoops', kind: 'number' }],
  ['--log-level', { key: 'logLevel', kind: 'string' }],
  ['--log-file', { key: 'logFile', kind: 'string' }],
  ['--mcp-config', { key: 'mcpConfig', kind: 'string' }],
  ['--disable-mcp', { key: 'disableMcp', kind: 'boolean' }],
  ['--max-tokens', { key: 'maxTokens', kind: 'number' }],
  ['--max-depth', { key: 'maxDepth', kind: 'number' }]
]);

function toNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${flag} expects a number, got '${value}'`);
  }
  return parsed;
}

/**
 * Reads `--flag value` and `--flag=value` pairs. Values are checked later,
 * together with the other layers.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const raw: Record<string, string | number | boolean> = {};
  let help = false;
  let version = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }
    if (arg === '--version' || arg === '-V') {
      version = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const spec = FLAGS.get(flag);
    if (!spec) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }

    if (spec.kind === 'boolean') {
      raw[spec.key] = eq === -1 ? true : arg.slice(eq + 1) !== 'false';
      continue;
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Missing value for ${flag}`);
    }
    raw[spec.key] = spec.kind === 'number' ? toNumber(flag, value) : value;
  }

  return { flags: validateLayer('command line', raw), help, version };
}

function validateLayer(source: string, layer: unknown): CLIOverrides {
  const parsed = CLIConfigSchema.partial().safeParse(layer);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${source}: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid';
  const where = issue.path.join('.');
  return where ? `${where}: ${issue.message}` : issue.message;
}

export async function readConfigFile(file: string): Promise<CLIOverrides> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${file}: ${errorMessage(error)}`);
  }
  return validateLayer(file, raw);
}

export function readEnv(env: Env): CLIOverrides {
  const raw: Record<string, string> = {};
  if (env['AGENTRY_PROVIDER']) raw['provider'] = env['AGENTRY_PROVIDER'];
  if (env['AGENTRY_MODEL']) raw['model'] = env['AGENTRY_MODEL'];
  if (env['AGENTRY_API_URL']) raw['apiUrl'] = env['AGENTRY_API_URL'];
  return validateLayer('environment', raw);
}

export interface LoadConfigOptions {
  flags?: CLIOverrides;
  env?: Env;
  configFile?: string;
}

/**
 * Layers defaults, the config file, the environment and command-line flags,
 * later layers winning. The API key comes from the flag, then the provider's
 * own environment variable, then the file.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const flags = options.flags ?? {};
  const file = await readConfigFile(options.configFile ?? CONFIG_FILE);
  const fromEnv = readEnv(env);

  const merged: CLIConfig = { ...defaultConfig, ...file, ...fromEnv, ...flags };
  const envKey = env[API_KEY_ENV[merged.provider]];
  const apiKey = flags.apiKey ?? (envKey ? envKey : undefined) ?? file.apiKey;

  const config: CLIConfig = { ...merged, apiKey };
  if (config.apiUrl === undefined && config.provider === 'minimax') {
    config.apiUrl = MINIMAX_API_URL;
  }

  const parsed = CLIConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

export function requireApiKey(config: CLIConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError(
      `API key must be provided via --api-key or env var (e.g. ${API_KEY_ENV[config.provider]})`
    );
  }
  return config.apiKey;
}

export function toLLMConfig(config: CLIConfig): LLMConfig {
  return {
    provider: config.provider,
    model: config.model,
    apiKey: requireApiKey(config),
    baseUrl: config.apiUrl,
    rateLimit: config.rateLimit
  };
}
