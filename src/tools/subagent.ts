import { ToolError } from '../core/errors.js';
import { SUBAGENT_TOOL_NAME } from '../core/executor.js';
import type { Tool } from './types.js';

/**
 * Schema-only entry so the model learns about sub-agents from the tool list.
 * Calls are intercepted by the directive executor and handed to the
 * orchestrator; reaching `execute` means no orchestrator was wired in.
 */
export const subagentTool: Tool = {
  name: SUBAGENT_TOOL_NAME,
  description: 'Spawn a new subagent to handle a specific task (parallel execution supported)',
  parameters: {
    type: 'object',
    properties: {
      task: { type: 'string', description: 'The task description for the subagent' },
      type: { type: 'string', description: 'SubAgent type: code, test, doc, analysis, or dynamic (default)' },
      max_loops: { type: 'integer', description: 'Maximum loop iterations (default: 20)' }
    },
    required: ['task']
  },
  execute: async (): Promise<string> => {
    throw new ToolError('Sub-agents need an orchestrator; none is configured', SUBAGENT_TOOL_NAME);
  }
};
