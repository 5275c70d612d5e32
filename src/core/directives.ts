import { z } from 'zod';
import { jsonValueSchema } from './json.js';
import type { Directive, SubTaskSpec, ToolCall } from './types.js';

export const DEFAULT_SUBTASK_KIND = 'dynamic';
export const DEFAULT_SUBTASK_MAX_ITERATIONS = 20;

const TOOL_CODE_RE = /<tool_code>([\s\S]*?)<\/tool_code>/;
const PARALLEL_RE = /<parallel>([\s\S]*?)<\/parallel>/;
const FINAL_RE = /<final>([\s\S]*?)<\/final>/;

const ToolCallSchema = z.object({
  name: z.string(),
  args: jsonValueSchema
});

const SubTaskSchema = z.object({
  task: z.string(),
  type: z.string().catch(DEFAULT_SUBTASK_KIND),
  max_loops: z.number().int().nonnegative().catch(DEFAULT_SUBTASK_MAX_ITERATIONS)
});

export type ToolCallParse =
  | { ok: true; call: ToolCall }
  | { ok: false; diagnostic: string };

function region(text: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(text);
  return match?.[1]?.trim();
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parses the first `<tool_code>` region. Returns `undefined` when the text has
 * no such region at all.
 */
export function parseToolCall(text: string): ToolCallParse | undefined {
  const inner = region(text, TOOL_CODE_RE);
  if (inner === undefined) {
    return undefined;
  }

  const json = tryParseJson(inner);
  if (!json.ok) {
    return { ok: false, diagnostic: `Failed to deserialize tool call JSON: ${json.error}` };
  }

  const parsed = ToolCallSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'payload';
    return { ok: false, diagnostic: `Invalid tool call: ${where}: ${issue?.message ?? 'invalid'}` };
  }

  return { ok: true, call: { name: parsed.data.name, args: parsed.data.args } };
}

/**
 * Splits text into its top-level `{...}` objects. Braces inside JSON strings
 * are ignored and nesting is tracked, so an object with a nested object value
 * comes back whole. An unterminated trailing object is dropped.
 */
export function scanJsonObjects(text: string): string[] {
  const objects: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      if (depth > 0) inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) {
        objects.push(text.slice(start, i + 1));
      }
    }
  }

  return objects;
}

/**
 * Reads the sub-task specs inside the first `<parallel>` region. Objects that
 * are not valid JSON or have no string `task` are skipped. Returns `undefined`
 * when nothing usable was found.
 */
export function parseParallelTasks(text: string): SubTaskSpec[] | undefined {
  const inner = region(text, PARALLEL_RE);
  if (inner === undefined) {
    return undefined;
  }

  const tasks: SubTaskSpec[] = [];
  for (const candidate of scanJsonObjects(inner)) {
    const json = tryParseJson(candidate);
    if (!json.ok) continue;

    const parsed = SubTaskSchema.safeParse(json.value);
    if (!parsed.success) continue;

    tasks.push({
      task: parsed.data.task,
      kind: parsed.data.type,
      maxIterations: parsed.data.max_loops
    });
  }

  return tasks.length > 0 ? tasks : undefined;
}

/** Trimmed `<final>` content; empty content counts as no final answer. */
export function extractFinal(text: string): string | undefined {
  const inner = region(text, FINAL_RE);
  return inner ? inner : undefined;
}

export function parseDirective(text: string): Directive {
  const toolCall = parseToolCall(text);

  if (toolCall) {
    if (!toolCall.ok) {
      return { type: 'none', diagnostic: toolCall.diagnostic };
    }
    const parallel = parseParallelTasks(text);
    return parallel
      ? { type: 'tool_call', call: toolCall.call, parallel }
      : { type: 'tool_call', call: toolCall.call };
  }

  const final = extractFinal(text);
  if (final !== undefined) {
    return { type: 'final', text: final };
  }

  const tasks = parseParallelTasks(text);
  if (tasks) {
    return { type: 'parallel', tasks };
  }

  return { type: 'none' };
}
