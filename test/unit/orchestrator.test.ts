import { describe, it, expect, vi } from 'vitest';
import { Orchestrator, CANCELLED_BY_USER } from '../../src/core/orchestrator.js';
import { InterruptChannel } from '../../src/core/interrupt.js';
import { MaxDepthExceededError, SpawnError } from '../../src/core/errors.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { MockLLM } from '../../src/testing/mock-llm.js';
import type { AgentSummary, ChatMessage } from '../../src/core/types.js';

function taskOf(messages: ChatMessage[]): string {
  return messages[1]?.content ?? '';
}

function lastOf(messages: ChatMessage[]): string {
  return messages[messages.length - 1]?.content ?? '';
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function createOrchestrator(llm: MockLLM, maxDepth?: number): Orchestrator {
  return new Orchestrator({ llm, tools: new ToolRegistry(), maxDepth });
}

describe('Orchestrator', () => {
  describe('spawn', () => {
    it('rejects an empty task', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      await expect(orchestrator.spawn({ task: '  ', kind: 'code', maxIterations: 5 })).rejects.toBeInstanceOf(
        SpawnError
      );
      expect(orchestrator.list()).toEqual([]);
    });

    it('rejects a zero iteration limit', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      await expect(orchestrator.spawn({ task: 't', kind: 'code', maxIterations: 0 })).rejects.toThrow(
        'Invalid max iterations: 0'
      );
    });

    it('rejects a depth past the limit', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      await expect(orchestrator.spawn({ task: 't', kind: 'code', maxIterations: 5 }, 5)).rejects.toBeInstanceOf(
        MaxDepthExceededError
      );
      await expect(orchestrator.spawn({ task: 't', kind: 'code', maxIterations: 5 }, 4)).resolves.toEqual(
        expect.any(String)
      );
    });

    it('registers a pending agent with its kind prompt', async () => {
      const orchestrator = createOrchestrator(new MockLLM());
      const spawned = vi.fn<(summary: AgentSummary) => void>();
      orchestrator.on('spawned', spawned);

      const id = await orchestrator.spawn({ task: 'refactor', kind: 'code', maxIterations: 5 }, 2);

      const agent = orchestrator.get(id)?.agent;
      expect(agent?.status).toBe('pending');
      expect(agent?.depth).toBe(2);
      const prompt = agent?.context.snapshot()[0];
      expect(prompt?.role).toBe('system');
      expect(prompt?.content.startsWith('You are a Code SubAgent')).toBe(true);
      expect(spawned).toHaveBeenCalledWith(expect.objectContaining({ id, task: 'refactor', kind: 'code' }));
    });

    it('falls back to the general prompt for unknown kinds', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      const id = await orchestrator.spawn({ task: 't', kind: 'research', maxIterations: 5 });

      expect(orchestrator.get(id)?.agent.context.snapshot()[0]?.content.startsWith('You are a general-purpose SubAgent.')).toBe(
        true
      );
      expect(orchestrator.get(id)?.agent.kind).toBe('research');
    });

    it('hands out distinct ids', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      const ids = await Promise.all(
        Array.from({ length: 10 }, () => orchestrator.spawn({ task: 't', kind: 'code', maxIterations: 1 }))
      );

      expect(new Set(ids).size).toBe(10);
      expect(orchestrator.list()).toHaveLength(10);
    });
  });

  describe('cancel', () => {
    it('fails a pending agent once', async () => {
      const orchestrator = createOrchestrator(new MockLLM());
      const cancelled = vi.fn<(summary: AgentSummary) => void>();
      orchestrator.on('cancelled', cancelled);
      const id = await orchestrator.spawn({ task: 't', kind: 'code', maxIterations: 5 });

      await expect(orchestrator.cancel(id, 'no longer needed')).resolves.toBe(true);
      await expect(orchestrator.cancel(id, 'again')).resolves.toBe(false);

      expect(orchestrator.get(id)?.agent.status).toBe('failed');
      expect(orchestrator.get(id)?.agent.error).toBe('no longer needed');
      expect(cancelled).toHaveBeenCalledTimes(1);
    });

    it('returns false for an unknown id', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      await expect(orchestrator.cancel('missing', 'x')).resolves.toBe(false);
    });

    it('leaves a completed agent alone', async () => {
      const orchestrator = createOrchestrator(new MockLLM({ script: ['<final>done</final>'] }));
      const id = await orchestrator.spawn({ task: 't', kind: 'code', maxIterations: 5 });
      await orchestrator.runAgent(id);

      await expect(orchestrator.cancel(id, 'late')).resolves.toBe(false);
      expect(orchestrator.get(id)?.agent.result).toBe('done');
    });
  });

  describe('runSubagent', () => {
    it('formats a completed run', async () => {
      const orchestrator = createOrchestrator(new MockLLM({ script: ['<final>all good</final>'] }));
      const completed = vi.fn<(summary: AgentSummary) => void>();
      orchestrator.on('completed', completed);

      await expect(
        orchestrator.runSubagent({ task: 'check', kind: 'test', maxIterations: 5 }, undefined, 1)
      ).resolves.toBe('SubAgent [test] completed:\nall good');
      expect(completed).toHaveBeenCalledWith(expect.objectContaining({ status: 'completed', result: 'all good' }));
    });

    it('formats a failed run', async () => {
      const orchestrator = createOrchestrator(new MockLLM({ defaultResponse: 'hmm' }));
      const failed = vi.fn<(summary: AgentSummary) => void>();
      orchestrator.on('failed', failed);

      const output = await orchestrator.runSubagent({ task: 'loop', kind: 'dynamic', maxIterations: 1 }, undefined, 1);

      expect(output).toMatch(/^SubAgent \[dynamic\] failed: SubAgent \w+ max iterations reached \(1\)$/);
      expect(failed).toHaveBeenCalledWith(expect.objectContaining({ status: 'failed', error: 'max iterations reached' }));
    });

    it('formats a spawn failure', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      await expect(
        orchestrator.runSubagent({ task: 'bad', kind: 'code', maxIterations: 0 }, undefined, 1)
      ).resolves.toBe('SubAgent [code] failed to spawn: Invalid max iterations: 0');
    });

    it('reports a cancelled run', async () => {
      const channel = new InterruptChannel();
      const llm = new MockLLM({
        handler: () => {
          channel.interrupt();
          return new Promise<string>(() => undefined);
        }
      });
      const orchestrator = createOrchestrator(llm);

      await expect(
        orchestrator.runSubagent({ task: 'hang', kind: 'doc', maxIterations: 5 }, channel.subscribe(), 1)
      ).resolves.toBe('SubAgent [doc] cancelled by user');

      const [summary] = orchestrator.list();
      expect(summary?.status).toBe('failed');
    });

    it('lets sub-agents spawn their own sub-agents', async () => {
      const llm = new MockLLM({
        handler: messages => {
          if (taskOf(messages) === 'child') return '<final>child result</final>';
          return lastOf(messages).includes('child result')
            ? '<final>parent done</final>'
            : '<tool_code>{"name": "subagent", "args": {"task": "child"}}</tool_code>';
        }
      });
      const orchestrator = createOrchestrator(llm);

      await expect(
        orchestrator.runSubagent({ task: 'parent', kind: 'dynamic', maxIterations: 5 }, undefined, 1)
      ).resolves.toBe('SubAgent [dynamic] completed:\nparent done');

      const agents = orchestrator.list();
      expect(agents.map(a => [a.task, a.depth, a.status])).toEqual([
        ['parent', 1, 'completed'],
        ['child', 2, 'completed']
      ]);
      expect(agents[1]?.maxIterations).toBe(20);
    });

    it('reports the depth limit back to the calling agent', async () => {
      const llm = new MockLLM({
        handler: messages =>
          lastOf(messages).startsWith("Tool 'subagent' output:")
            ? '<final>gave up</final>'
            : '<tool_code>{"name": "subagent", "args": {"task": "deeper"}}</tool_code>'
      });
      const orchestrator = createOrchestrator(llm, 1);

      await orchestrator.runSubagent({ task: 'top', kind: 'dynamic', maxIterations: 5 }, undefined, 1);

      const secondCall = llm.calls[1] ?? [];
      expect(lastOf(secondCall)).toBe(
        "Tool 'subagent' output:\nSubAgent [dynamic] failed to spawn: Maximum sub-agent depth exceeded: 2 > 1"
      );
      expect(orchestrator.list()).toHaveLength(1);
    });
  });

  describe('runParallel', () => {
    it('reports spawn failures first and runs the rest', async () => {
      const llm = new MockLLM({ handler: messages => `<final>${taskOf(messages)} done</final>` });
      const orchestrator = createOrchestrator(llm);

      const results = await orchestrator.runParallel(
        [
          { task: 'a', kind: 'code', maxIterations: 5 },
          { task: 'bad', kind: 'code', maxIterations: 0 },
          { task: 'b', kind: 'test', maxIterations: 5 }
        ],
        undefined,
        1
      );

      expect(results).toHaveLength(3);
      expect(results[0]).toBe('[code] ERROR: bad - Invalid max iterations: 0');
      expect(results.slice(1).sort()).toEqual([
        '[code] Task: a\nResult: a done',
        '[test] Task: b\nResult: b done'
      ]);
    });

    it('returns results in completion order', async () => {
      const llm = new MockLLM({
        handler: async messages => {
          const task = taskOf(messages);
          await sleep(task === 'slow' ? 40 : 1);
          return `<final>${task}</final>`;
        }
      });
      const orchestrator = createOrchestrator(llm);

      const results = await orchestrator.runParallel(
        [
          { task: 'slow', kind: 'dynamic', maxIterations: 5 },
          { task: 'fast', kind: 'dynamic', maxIterations: 5 }
        ],
        undefined,
        1
      );

      expect(results).toEqual(['[dynamic] Task: fast\nResult: fast', '[dynamic] Task: slow\nResult: slow']);
    });

    it('reports failed tasks as errors', async () => {
      const llm = new MockLLM({
        handler: messages => {
          if (taskOf(messages) === 'broken') throw new Error('model down');
          return '<final>ok</final>';
        }
      });
      const orchestrator = createOrchestrator(llm);

      const results = await orchestrator.runParallel([{ task: 'broken', kind: 'analysis', maxIterations: 5 }], undefined, 1);

      expect(results).toEqual(['[analysis] ERROR: broken - model down']);
    });

    it('cancels unfinished tasks on interrupt', async () => {
      const channel = new InterruptChannel();
      const llm = new MockLLM({
        handler: () => {
          channel.interrupt();
          return new Promise<string>(() => undefined);
        }
      });
      const orchestrator = createOrchestrator(llm);

      const results = await orchestrator.runParallel(
        [{ task: 'hang', kind: 'dynamic', maxIterations: 5 }],
        channel.subscribe(),
        1
      );

      expect(results).toEqual(['[dynamic] CANCELLED: hang']);
      const [summary] = orchestrator.list();
      expect(summary?.status).toBe('failed');
      expect([CANCELLED_BY_USER, 'cancelled']).toContain(summary?.error);
    });

    it('returns an empty list for an empty batch', async () => {
      const orchestrator = createOrchestrator(new MockLLM());

      await expect(orchestrator.runParallel([], undefined, 1)).resolves.toEqual([]);
    });
  });
});
