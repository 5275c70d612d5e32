import { describe, it, expect, vi } from 'vitest';
import { DirectiveExecutor } from '../../src/core/executor.js';
import { InterruptChannel } from '../../src/core/interrupt.js';
import { CancelledError } from '../../src/core/errors.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { subagentTool } from '../../src/tools/subagent.js';
import type { JsonValue } from '../../src/core/types.js';

function createRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register({
    name: 'echo',
    description: 'Echo text',
    parameters: { type: 'object' },
    execute: async (args: JsonValue) => `echo: ${JSON.stringify(args)}`
  });
  registry.register({
    name: 'fail',
    description: 'Always fails',
    parameters: { type: 'object' },
    execute: async () => {
      throw new Error('bad input');
    }
  });
  registry.register(subagentTool);
  return registry;
}

function createRunner() {
  return {
    runSubagent: vi.fn().mockResolvedValue('SubAgent [code] completed:\nok'),
    runParallel: vi.fn().mockResolvedValue(['first', 'second'])
  };
}

describe('DirectiveExecutor', () => {
  it('runs a registered tool', async () => {
    const executor = new DirectiveExecutor({ tools: createRegistry() });

    await expect(executor.executeTool({ name: 'echo', args: { text: 'hi' } })).resolves.toBe('echo: {"text":"hi"}');
  });

  it('reports an unknown tool', async () => {
    const executor = new DirectiveExecutor({ tools: createRegistry() });

    await expect(executor.executeTool({ name: 'nope', args: {} })).resolves.toBe("Error: Tool 'nope' not found");
  });

  it('treats names inherited from Object as unknown tools', async () => {
    const runner = createRunner();
    const executor = new DirectiveExecutor({ tools: createRegistry(), runner });

    await expect(executor.executeTool({ name: 'toString', args: {} })).resolves.toBe("Error: Tool 'toString' not found");
    await expect(executor.executeTool({ name: 'constructor', args: { task: 'x' } })).resolves.toBe(
      "Error: Tool 'constructor' not found"
    );
    expect(runner.runSubagent).not.toHaveBeenCalled();
  });

  it('turns a tool failure into error text', async () => {
    const executor = new DirectiveExecutor({ tools: createRegistry() });

    await expect(executor.executeTool({ name: 'fail', args: {} })).resolves.toBe('Error: bad input');
  });

  it('routes subagent calls to the runner one level deeper', async () => {
    const runner = createRunner();
    const executor = new DirectiveExecutor({ tools: createRegistry(), runner });

    const output = await executor.executeTool({ name: 'code_subagent', args: { task: 'refactor' } }, undefined, 1);

    expect(output).toBe('SubAgent [code] completed:\nok');
    expect(runner.runSubagent).toHaveBeenCalledWith(
      { task: 'refactor', kind: 'code', maxIterations: 20 },
      undefined,
      2
    );
  });

  it('reads type and max_loops from subagent arguments', async () => {
    const runner = createRunner();
    const executor = new DirectiveExecutor({ tools: createRegistry(), runner });

    await executor.executeTool({ name: 'subagent', args: { task: 't', type: 'analysis', max_loops: 3 } });

    expect(runner.runSubagent).toHaveBeenCalledWith({ task: 't', kind: 'analysis', maxIterations: 3 }, undefined, 1);
  });

  it('rejects a subagent call without a task', async () => {
    const runner = createRunner();
    const executor = new DirectiveExecutor({ tools: createRegistry(), runner });

    await expect(executor.executeTool({ name: 'subagent', args: { type: 'code' } })).resolves.toBe(
      "Error: Missing 'task' argument for subagent"
    );
    expect(runner.runSubagent).not.toHaveBeenCalled();
  });

  it('falls back to the subagent tool itself without a runner', async () => {
    const executor = new DirectiveExecutor({ tools: createRegistry() });

    await expect(executor.executeTool({ name: 'subagent', args: { task: 't' } })).resolves.toBe(
      'Error: Sub-agents need an orchestrator; none is configured'
    );
  });

  it('joins parallel results', async () => {
    const runner = createRunner();
    const executor = new DirectiveExecutor({ tools: createRegistry(), runner });
    const tasks = [{ task: 'a', kind: 'code', maxIterations: 5 }];

    await expect(executor.executeParallel(tasks)).resolves.toBe('Parallel tasks results:\nfirst\n---\nsecond');
    expect(runner.runParallel).toHaveBeenCalledWith(tasks, undefined, 1);
  });

  it('reports parallel execution as unavailable without a runner', async () => {
    const executor = new DirectiveExecutor({ tools: createRegistry() });

    await expect(executor.executeParallel([{ task: 'a', kind: 'code', maxIterations: 5 }])).resolves.toBe(
      'Parallel tasks results:\nError: parallel execution is not available'
    );
  });

  it('rethrows cancellation while a tool is running', async () => {
    const channel = new InterruptChannel();
    const registry = createRegistry();
    registry.register({
      name: 'hang',
      description: 'Never returns',
      parameters: { type: 'object' },
      execute: () => {
        channel.interrupt();
        return new Promise<string>(() => undefined);
      }
    });
    const executor = new DirectiveExecutor({ tools: registry });

    await expect(executor.executeTool({ name: 'hang', args: {} }, channel.subscribe())).rejects.toBeInstanceOf(
      CancelledError
    );
  });
});
