import { errorMessage } from '../core/errors.js';
import { FINISH_PROTOCOL } from '../core/prompts.js';
import type { JsonValue, Tool, ToolCatalog } from './types.js';

export type { Tool };

export const BASE_SYSTEM_PROMPT = 'You are a helpful coding agent.\n\n';

export const TOOL_PROTOCOL = [
  'To use a tool, ONLY output a JSON block wrapped in <tool_code> tags. The JSON must be valid and directly deserializable. Do not double-encode JSON strings or escape quotes inside JSON values.',
  'Example:',
  '<tool_code>',
  '{',
  '  "name": "bash",',
  '  "args": {',
  '    "command": "ls -la"',
  '  }',
  '}',
  '</tool_code>',
  'To run independent sub-tasks concurrently, add a <parallel> block next to a tool call, one JSON object per task:',
  '<parallel>{"task": "...", "type": "code|test|doc|analysis|dynamic", "max_loops": 20}</parallel>',
  "After the tool execution, you will receive the output. Then you can continue to answer the user's question.",
  ''
].join('\n');

export class ToolRegistry implements ToolCatalog {
  private tools: Map<string, Tool> = new Map();

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  get size(): number {
    return this.tools.size;
  }

  list(): Tool[] {
    return Array.from(this.tools.values()).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async call(name: string, args: JsonValue): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `Error: Tool '${name}' not found`;
    }

    try {
      return await tool.execute(args);
    } catch (error) {
      return `Error: ${errorMessage(error)}`;
    }
  }

  generateToolInstructions(): string {
    let prompt = 'You have access to the following tools:\n\n';
    for (const tool of this.list()) {
      prompt += `## ${tool.name}: ${tool.description}\n`;
      prompt += `Schema: ${JSON.stringify(tool.parameters)}\n\n`;
    }
    return prompt + TOOL_PROTOCOL;
  }

  generateSystemPrompt(): string {
    return `${BASE_SYSTEM_PROMPT}${FINISH_PROTOCOL}\n${this.generateToolInstructions()}`;
  }
}
