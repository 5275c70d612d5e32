import { z } from 'zod';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { ToolError } from '../core/errors.js';
import type { JsonValue, Tool } from './types.js';

const execFileAsync = promisify(execFile);

const MAX_STDOUT = 50000;
const MAX_STDERR = 10000;

const BashSchema = z.object({
  command: z.string().min(1).describe('The command to execute'),
  timeout: z.number().int().positive().optional().default(120000).describe('Timeout in ms (default: 120000)'),
  cwd: z.string().optional().describe('Working directory')
});

// Dangerous patterns to block
const DANGEROUS_PATTERNS = [
  /rm\s+-rf\s+\/(\s|$)/,      // rm -rf /
  />\s*\/dev\/(?!null)/,      // Writing to device files
  /mkfs/,                     // Format filesystem
  /dd\s+if=/,                 // dd commands
  /:\(\)\s*\{.*:\s*\};\s*:/,  // Fork bombs
];

interface ExecFailure {
  code?: number | string;
  killed: boolean;
  stdout: string;
  stderr: string;
}

function readFailure(error: unknown): ExecFailure {
  const failure: ExecFailure = { killed: false, stdout: '', stderr: '' };
  if (typeof error !== 'object' || error === null) {
    failure.stderr = String(error);
    return failure;
  }
  if ('code' in error && (typeof error.code === 'number' || typeof error.code === 'string')) {
    failure.code = error.code;
  }
  if ('killed' in error && typeof error.killed === 'boolean') {
    failure.killed = error.killed;
  }
  if ('stdout' in error && typeof error.stdout === 'string') {
    failure.stdout = error.stdout;
  }
  if ('stderr' in error && typeof error.stderr === 'string') {
    failure.stderr = error.stderr;
  } else if (error instanceof Error) {
    failure.stderr = error.message;
  }
  return failure;
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}\n[truncated]` : text;
}

export function isDangerousCommand(command: string): boolean {
  return DANGEROUS_PATTERNS.some(pattern => pattern.test(command));
}

export const bashTool: Tool = {
  name: 'bash',
  description: 'Execute a bash command',
  parameters: {
    type: 'object',
    properties: {
      command: { type: 'string', description: 'The command to execute' },
      timeout: { type: 'integer', description: 'Timeout in ms (default: 120000)' },
      cwd: { type: 'string', description: 'Working directory' }
    },
    required: ['command']
  },
  execute: async (args: JsonValue): Promise<string> => {
    const parsed = BashSchema.safeParse(args);
    if (!parsed.success) {
      throw new ToolError(`Invalid arguments: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'bash');
    }

    const { command, timeout, cwd } = parsed.data;

    if (isDangerousCommand(command)) {
      throw new ToolError('Command blocked for safety: matches dangerous pattern', 'bash');
    }

    try {
      const { stdout } = await execFileAsync('bash', ['-c', command], {
        timeout,
        cwd,
        maxBuffer: 1024 * 1024 * 10  // 10MB buffer
      });
      return clip(stdout, MAX_STDOUT);
    } catch (error) {
      const failure = readFailure(error);
      if (failure.killed) {
        throw new ToolError(`Command timed out after ${timeout}ms`, 'bash');
      }
      return `Error: ${clip(failure.stderr, MAX_STDERR)}\nStdout: ${clip(failure.stdout, MAX_STDOUT)}`;
    }
  }
};
