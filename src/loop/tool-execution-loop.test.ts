import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ToolExecutionLoop } from './tool-execution-loop.js';
import type { ToolAdapter } from './tool-adapter.js';
import type { ToolCallRequest, ToolCallResult } from './call-protocol.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { describeTool, type ToolContext } from '../tools/tool-definition.js';
import { ToolExecutionError } from '../errors/tool-errors.js';
import { DEFAULT_CONFIG } from '../config/config-manager.js';
import { Logger } from '../logging/logger.js';

class TestRegistry extends ToolRegistry<number> {
  manifest(): number {
    return this.size;
  }
}

interface FakeResponse {
  calls: ToolCallRequest[];
  text?: string;
}

/**
 * Adapter whose model replies are scripted up front
 */
class ScriptedAdapter implements ToolAdapter<FakeResponse, ToolCallResult> {
  readonly recorded: FakeResponse[] = [];
  readonly sent: ToolCallResult[][] = [];
  readonly events: string[] = [];
  private readonly replies: FakeResponse[];

  constructor(replies: FakeResponse[]) {
    this.replies = [...replies];
  }

  extractCalls(response: FakeResponse): ToolCallRequest[] {
    return response.calls;
  }

  recordAssistantMessage(response: FakeResponse): void {
    this.events.push('record');
    this.recorded.push(response);
  }

  buildResultMessage(result: ToolCallResult): ToolCallResult {
    return result;
  }

  async sendResults(messages: ToolCallResult[]): Promise<FakeResponse> {
    this.events.push('send');
    this.sent.push(messages);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('No scripted reply left');
    }
    return reply;
  }
}

const add = describeTool(
  {
    description: 'Adds two numbers.',
    parameters: {
      a: z.number().describe('First addend'),
      b: z.number().describe('Second addend'),
    },
  },
  function add({ a, b }) {
    return a + b;
  },
);

describe('ToolExecutionLoop', () => {
  let registry: TestRegistry;

  beforeEach(() => {
    registry = new TestRegistry();
    registry.register(add);
  });

  describe('run', () => {
    it('should return a response without calls as the final answer', async () => {
      const loop = new ToolExecutionLoop(registry);
      const answer: FakeResponse = { calls: [], text: 'Hello' };
      const adapter = new ScriptedAdapter([]);

      const outcome = await loop.run({ initialResponse: answer, adapter });

      expect(outcome).toEqual({ response: answer, status: 'done', iterations: 0 });
      expect(adapter.recorded).toEqual([answer]);
      expect(adapter.sent).toEqual([]);
    });

    it('should execute a call and return the follow-up answer', async () => {
      const loop = new ToolExecutionLoop(registry);
      const request: FakeResponse = { calls: [{ name: 'add', arguments: { a: 2, b: 3 }, callId: 'call-1' }] };
      const answer: FakeResponse = { calls: [], text: 'The sum is 5.' };
      const adapter = new ScriptedAdapter([answer]);

      const outcome = await loop.run({ initialResponse: request, adapter });

      expect(outcome.response).toBe(answer);
      expect(outcome.status).toBe('done');
      expect(outcome.iterations).toBe(1);
      expect(adapter.sent).toEqual([[{ name: 'add', callId: 'call-1', response: { result: 5 } }]]);
    });

    it('should record the model response before sending results', async () => {
      const loop = new ToolExecutionLoop(registry);
      const adapter = new ScriptedAdapter([{ calls: [] }]);

      await loop.run({ initialResponse: { calls: [{ name: 'add', arguments: { a: 1, b: 1 } }] }, adapter });

      expect(adapter.events).toEqual(['record', 'send', 'record']);
    });

    it('should return the second response unchanged when capped at one iteration', async () => {
      const implementation = vi.fn(() => 'ok');
      registry.register('step', 'Takes a step.', implementation, { type: 'object' });
      const loop = new ToolExecutionLoop(registry, { maxIterations: 1 });
      const first: FakeResponse = { calls: [{ name: 'step', arguments: {}, callId: 'a' }] };
      const second: FakeResponse = { calls: [{ name: 'step', arguments: {}, callId: 'b' }] };
      const adapter = new ScriptedAdapter([second]);

      const outcome = await loop.run({ initialResponse: first, adapter });

      expect(outcome.response).toBe(second);
      expect(outcome.status).toBe('capped');
      expect(outcome.iterations).toBe(1);
      expect(implementation).toHaveBeenCalledTimes(1);
      expect(adapter.sent).toHaveLength(1);
      expect(adapter.recorded).toEqual([first]);
    });

    it('should send one result per call, each carrying its request id', async () => {
      const loop = new ToolExecutionLoop(registry);
      const adapter = new ScriptedAdapter([{ calls: [] }]);

      await loop.run({
        initialResponse: {
          calls: [
            { name: 'add', arguments: { a: 1, b: 2 }, callId: 'x' },
            { name: 'missing', arguments: {}, callId: 'y' },
            { name: 'add', arguments: '{"a":10,"b":20}', callId: 'z' },
          ],
        },
        adapter,
      });

      const [batch] = adapter.sent;
      expect(batch?.map((result) => [result.callId, result.response])).toEqual([
        ['x', { result: 3 }],
        ['y', { error: "Tool 'missing' not found in registry." }],
        ['z', { result: 30 }],
      ]);
    });

    it('should propagate fatal tool errors', async () => {
      registry.register('explode', 'Fails hard.', () => {
        throw new Error('boom');
      }, { type: 'object' });
      const loop = new ToolExecutionLoop(registry);
      const adapter = new ScriptedAdapter([{ calls: [] }]);

      await expect(
        loop.run({ initialResponse: { calls: [{ name: 'explode', arguments: {} }] }, adapter }),
      ).rejects.toThrow('boom');
      expect(adapter.sent).toEqual([]);
    });

    it('should take its limits from configuration', async () => {
      registry.register('step', 'Takes a step.', () => 'ok', { type: 'object' });
      const loop = ToolExecutionLoop.fromConfig(registry, {
        ...DEFAULT_CONFIG,
        loop: { maxIterations: 2, toolTimeoutMs: 1000 },
      });
      const looping: FakeResponse = { calls: [{ name: 'step', arguments: {} }] };
      const adapter = new ScriptedAdapter([looping, looping, looping]);

      const outcome = await loop.run({ initialResponse: looping, adapter });

      expect(outcome.status).toBe('capped');
      expect(outcome.iterations).toBe(2);
      expect(adapter.sent).toHaveLength(2);
    });
  });

  describe('executeCall', () => {
    let loop: ToolExecutionLoop;

    beforeEach(() => {
      loop = new ToolExecutionLoop(registry);
    });

    it('should report unknown tools', async () => {
      const result = await loop.executeCall({ name: 'missing', arguments: {}, callId: 'c' });

      expect(result).toEqual({
        name: 'missing',
        callId: 'c',
        response: { error: "Tool 'missing' not found in registry." },
        errorType: 'not_found',
      });
    });

    it('should decode JSON string arguments', async () => {
      const result = await loop.executeCall({ name: 'add', arguments: '{"a": 4, "b": 5}' });

      expect(result.response).toEqual({ result: 9 });
    });

    it('should accept maps and entry lists', async () => {
      const fromMap = await loop.executeCall({ name: 'add', arguments: new Map<string, number>([['a', 1], ['b', 1]]) });
      const fromEntries = await loop.executeCall({ name: 'add', arguments: [['a', 2], ['b', 2]] });

      expect(fromMap.response).toEqual({ result: 2 });
      expect(fromEntries.response).toEqual({ result: 4 });
    });

    it('should treat missing arguments as an empty object', async () => {
      registry.register('ping', 'Checks liveness.', (args) => Object.keys(args).length, { type: 'object' });

      for (const raw of [undefined, null, '', 'null']) {
        const result = await loop.executeCall({ name: 'ping', arguments: raw });
        expect(result.response).toEqual({ result: 0 });
      }
    });

    it('should reject JSON that is not an object', async () => {
      const result = await loop.executeCall({ name: 'add', arguments: '[1, 2]' });

      expect(result.response).toEqual({
        error: "Failed to parse arguments for tool 'add': Function arguments must decode to a JSON object.",
      });
      expect(result.errorType).toBe('arguments');
    });

    it('should report malformed JSON through the formatter', async () => {
      const result = await loop.executeCall({ name: 'add', arguments: '{"a": 1,' });

      expect(result.errorType).toBe('arguments');
      expect(result.response).toEqual({
        error: expect.stringMatching(/^Failed to parse arguments for tool 'add': /),
      });
    });

    it('should use a custom argument error formatter', async () => {
      const custom = new ToolExecutionLoop(registry, {
        argumentErrorFormatter: (toolName) => `Arguments for ${toolName} must be a JSON object.`,
      });

      const result = await custom.executeCall({ name: 'add', arguments: 42 });

      expect(result.response).toEqual({ error: 'Arguments for add must be a JSON object.' });
    });

    it('should validate arguments against the tool model', async () => {
      const missing = await loop.executeCall({ name: 'add', arguments: { a: 2 } });
      const wrongType = await loop.executeCall({ name: 'add', arguments: { a: 'two', b: 2 } });

      expect(missing.response).toEqual({ error: 'Argument validation failed: b: Required' });
      expect(missing.errorType).toBe('validation');
      expect(wrongType.response).toEqual({
        error: 'Argument validation failed: a: Expected number, received string',
      });
    });

    it('should apply parameter defaults before the call', async () => {
      const greet = describeTool(
        {
          description: 'Greets someone.',
          parameters: {
            name: z.string().describe('Who to greet'),
            greeting: z.string().default('Hello').describe('Greeting word'),
          },
        },
        function greet({ name, greeting }) {
          return `${greeting}, ${name}!`;
        },
      );
      registry.register(greet);

      const result = await loop.executeCall({ name: 'greet', arguments: { name: 'Ada' } });

      expect(result.response).toEqual({ result: 'Hello, Ada!' });
    });

    it('should turn recoverable errors into error payloads', async () => {
      registry.register('save', 'Saves a file.', () => {
        throw new ToolExecutionError('Disk quota exceeded.');
      }, { type: 'object' });
      registry.register('open', 'Opens a file.', async () => {
        throw Object.assign(new Error('no such file or directory'), { code: 'ENOENT' });
      }, { type: 'object' });

      const saved = await loop.executeCall({ name: 'save', arguments: {} });
      const opened = await loop.executeCall({ name: 'open', arguments: {} });

      expect(saved).toEqual({
        name: 'save',
        callId: undefined,
        response: { error: 'Disk quota exceeded.' },
        errorType: 'execution',
      });
      expect(opened.response).toEqual({ error: 'no such file or directory' });
    });

    it('should report an undefined return value as null', async () => {
      registry.register('noop', 'Does nothing.', () => undefined, { type: 'object' });

      const result = await loop.executeCall({ name: 'noop', arguments: {} });

      expect(result.response).toEqual({ result: null });
    });

    it('should pass the call id and an abort signal to the implementation', async () => {
      let seen: ToolContext | undefined;
      registry.register('inspect', 'Inspects its context.', (_args, context) => {
        seen = context;
        return true;
      }, { type: 'object' });

      await loop.executeCall({ name: 'inspect', arguments: {}, callId: 'call-7' });

      expect(seen?.callId).toBe('call-7');
      expect(seen?.signal.aborted).toBe(false);
    });
  });

  describe('concurrency', () => {
    it('should start synchronous tools only after the whole batch is dispatched', async () => {
      const order: string[] = [];
      registry.register('first', 'First.', () => order.push('first'), { type: 'object' });
      registry.register('second', 'Second.', () => order.push('second'), { type: 'object' });
      const loop = new ToolExecutionLoop(registry);

      const pending = loop.executeCalls([
        { name: 'first', arguments: {} },
        { name: 'second', arguments: {} },
      ]);
      expect(order).toEqual([]);

      await pending;
      expect(order).toEqual(['first', 'second']);
    });

    it('should time out a slow call while its siblings complete', async () => {
      let slowSignal: AbortSignal | undefined;
      registry.register('slow', 'Sleeps.', (_args, { signal }) => {
        slowSignal = signal;
        return new Promise((resolve) => {
          const timer = setTimeout(() => resolve('late'), 5000);
          signal.addEventListener('abort', () => clearTimeout(timer));
        });
      }, { type: 'object' });
      const loop = new ToolExecutionLoop(registry, { toolTimeoutMs: 50 });

      const [slow, fast] = await loop.executeCalls([
        { name: 'slow', arguments: {}, callId: 's' },
        { name: 'add', arguments: { a: 1, b: 2 }, callId: 'f' },
      ]);

      expect(slow).toEqual({
        name: 'slow',
        callId: 's',
        response: { error: 'Tool execution timed out after 0.05 seconds.' },
        errorType: 'timeout',
      });
      expect(fast?.response).toEqual({ result: 3 });
      expect(slowSignal?.aborted).toBe(true);
    });

    it('should charge a blocking tool for its own overrun and not its siblings', async () => {
      let busySignal: AbortSignal | undefined;
      registry.register('busy', 'Spins.', (_args, { signal }) => {
        busySignal = signal;
        const until = Date.now() + 300;
        while (Date.now() < until) {
          // blocks the event loop
        }
        return 'done';
      }, { type: 'object' });
      registry.register('quick', 'Waits briefly.', () => {
        return new Promise((resolve) => setTimeout(() => resolve('ok'), 10));
      }, { type: 'object' });
      const loop = new ToolExecutionLoop(registry, { toolTimeoutMs: 50 });

      const [busy, quick] = await loop.executeCalls([
        { name: 'busy', arguments: {}, callId: 'b' },
        { name: 'quick', arguments: {}, callId: 'q' },
      ]);

      expect(busy).toEqual({
        name: 'busy',
        callId: 'b',
        response: { error: 'Tool execution timed out after 0.05 seconds.' },
        errorType: 'timeout',
      });
      expect(quick).toEqual({ name: 'quick', callId: 'q', response: { result: 'ok' } });
      expect(busySignal?.aborted).toBe(true);
    });

    it('should let a synchronous tool within its limit succeed', async () => {
      registry.register('brief', 'Spins briefly.', () => {
        const until = Date.now() + 5;
        while (Date.now() < until) {
          // blocks the event loop
        }
        return 'fine';
      }, { type: 'object' });
      const loop = new ToolExecutionLoop(registry, { toolTimeoutMs: 1000 });

      const result = await loop.executeCall({ name: 'brief', arguments: {} });

      expect(result.response).toEqual({ result: 'fine' });
    });
  });

  describe('logging', () => {
    it('should warn when the iteration limit is reached', async () => {
      const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const logger = new Logger({ level: 'warn' });
      const loop = new ToolExecutionLoop(registry, { maxIterations: 1, logger });
      const looping: FakeResponse = { calls: [{ name: 'add', arguments: { a: 1, b: 1 } }] };

      try {
        await loop.run({ initialResponse: looping, adapter: new ScriptedAdapter([looping]) });
        await logger.flush();

        const entries: unknown[] = spy.mock.calls.map((call) => JSON.parse(String(call[0])));
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({
          level: 'warn',
          message: 'Iteration limit of 1 reached; returning the last response',
          context: { operation: 'tool-loop', maxIterations: 1 },
        });
      } finally {
        spy.mockRestore();
      }
    });
  });
});
