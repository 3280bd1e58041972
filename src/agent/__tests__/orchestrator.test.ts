import { describe, it, expect, vi, type Mock } from 'vitest';
import { ToolOrchestrator } from '../orchestrator.js';
import { buildSystemContext, buildSystemPrompt } from '../system-prompt.js';
import { ToolRegistry } from '../tools/registry.js';
import { CourseSearchTool } from '../tools/course-search-tool.js';
import type { Tool, ToolSchema } from '../tools/types.js';
import type { ConversationTurn, ModelRequest } from '../types.js';
import type { GenerationHandle, SpanHandle, TraceHandle } from '../../observability/types.js';
import { call, completed, fakeCatalog, scriptedClient, toolCalls } from '../../test-utils/index.js';

function schemaFor(name: string): ToolSchema {
  return { name, description: name, input_schema: { type: 'object', properties: {}, required: [] } };
}

type EchoTool = Tool & { execute: Mock<(args: Record<string, unknown>) => Promise<string>> };

function echoTool(name = 'search_course_content'): EchoTool {
  return {
    name,
    schema: () => schemaFor(name),
    execute: vi.fn(async (args: Record<string, unknown>) => `results for ${String(args['query'])}`),
  };
}

function requestAt(client: ReturnType<typeof scriptedClient>, index: number): ModelRequest {
  const request = client.create.mock.calls[index]?.[0];
  if (request === undefined) {
    throw new Error(`No model call at index ${index}`);
  }
  return request;
}

describe('ToolOrchestrator', () => {
  describe('natural termination', () => {
    it('returns the first answer when no tools are requested', async () => {
      const client = scriptedClient(completed('4'));
      const tool = echoTool();
      const orchestrator = new ToolOrchestrator({ client });

      const answer = await orchestrator.generate({ query: 'What is 2+2?', registry: new ToolRegistry([tool]) });

      expect(answer).toBe('4');
      expect(client.create).toHaveBeenCalledTimes(1);
      expect(tool.execute).not.toHaveBeenCalled();
    });

    it('sends the query, tools and fixed generation settings', async () => {
      const client = scriptedClient(completed('4'));
      const orchestrator = new ToolOrchestrator({ client });

      await orchestrator.generate({ query: 'What is 2+2?', registry: new ToolRegistry([echoTool()]) });

      expect(requestAt(client, 0)).toEqual({
        messages: [{ type: 'user_message', text: 'What is 2+2?' }],
        system: buildSystemPrompt(2),
        temperature: 0,
        maxTokens: 800,
        tools: [schemaFor('search_course_content')],
        toolChoice: 'auto',
      });
    });

    it('offers no tools without a registry', async () => {
      const client = scriptedClient(completed('Hello'));

      await new ToolOrchestrator({ client }).generate({ query: 'Hi' });

      expect(requestAt(client, 0).tools).toBeUndefined();
      expect(requestAt(client, 0).toolChoice).toBeUndefined();
    });

    it('reports an empty answer', async () => {
      const client = scriptedClient(completed(''));

      await expect(new ToolOrchestrator({ client }).generate({ query: 'q' })).resolves.toBe('No response generated');
    });
  });

  describe('round bound', () => {
    it('makes at most maxRounds tool rounds plus one forced final call', async () => {
      const client = scriptedClient(
        toolCalls(call('c1', 'search_course_content', { query: 'basics' })),
        toolCalls(call('c2', 'search_course_content', { query: 'advanced' })),
        completed('Synthesized answer')
      );
      const tool = echoTool();
      const orchestrator = new ToolOrchestrator({ client });

      const answer = await orchestrator.generate({ query: 'Explain', registry: new ToolRegistry([tool]) });

      expect(answer).toBe('Synthesized answer');
      expect(client.create).toHaveBeenCalledTimes(3);
      expect(tool.execute).toHaveBeenCalledTimes(2);
      expect(tool.execute).toHaveBeenNthCalledWith(1, { query: 'basics' });
      expect(tool.execute).toHaveBeenNthCalledWith(2, { query: 'advanced' });
    });

    it('withholds tools from the forced final call', async () => {
      const client = scriptedClient(
        toolCalls(call('c1', 'search_course_content', { query: 'a' })),
        toolCalls(call('c2', 'search_course_content', { query: 'b' })),
        completed('Final')
      );

      await new ToolOrchestrator({ client }).generate({ query: 'q', registry: new ToolRegistry([echoTool()]) });

      expect(requestAt(client, 0).toolChoice).toBe('auto');
      expect(requestAt(client, 1).toolChoice).toBe('auto');
      expect(requestAt(client, 2).tools).toBeUndefined();
      expect(requestAt(client, 2).toolChoice).toBeUndefined();
      expect(requestAt(client, 2).messages).toHaveLength(5);
    });

    it('returns the text of a final call that still asks for tools', async () => {
      const client = scriptedClient(toolCalls(call('c1', 'search_course_content', { query: 'a' })), {
        kind: 'tool_calls',
        text: 'Partial answer',
        calls: [call('c2', 'search_course_content', { query: 'b' })],
      });
      const tool = echoTool();

      const answer = await new ToolOrchestrator({ client, settings: { maxRounds: 1 } }).generate({
        query: 'q',
        registry: new ToolRegistry([tool]),
      });

      expect(answer).toBe('Partial answer');
      expect(client.create).toHaveBeenCalledTimes(2);
      expect(tool.execute).toHaveBeenCalledTimes(1);
    });

    it('honours a custom round limit', async () => {
      const client = scriptedClient(
        toolCalls(call('c1', 'search_course_content', { query: 'a' })),
        toolCalls(call('c2', 'search_course_content', { query: 'b' })),
        toolCalls(call('c3', 'search_course_content', { query: 'c' })),
        completed('Done')
      );

      const answer = await new ToolOrchestrator({ client, settings: { maxRounds: 3 } }).generate({
        query: 'q',
        registry: new ToolRegistry([echoTool()]),
      });

      expect(answer).toBe('Done');
      expect(client.create).toHaveBeenCalledTimes(4);
    });
  });

  describe('result alignment', () => {
    it('answers every call of a round in request order', async () => {
      const client = scriptedClient(
        {
          kind: 'tool_calls',
          text: 'Looking this up.',
          calls: [
            call('c1', 'search_course_content', { query: 'one' }),
            call('c2', 'bogus'),
            call('c3', 'search_course_content', { query: 'three' }),
          ],
        },
        completed('Answer')
      );

      await new ToolOrchestrator({ client }).generate({ query: 'q', registry: new ToolRegistry([echoTool()]) });

      const expected: ConversationTurn[] = [
        { type: 'user_message', text: 'q' },
        {
          type: 'assistant_message',
          text: 'Looking this up.',
          toolCalls: [
            call('c1', 'search_course_content', { query: 'one' }),
            call('c2', 'bogus'),
            call('c3', 'search_course_content', { query: 'three' }),
          ],
        },
        {
          type: 'tool_results',
          results: [
            { toolCallId: 'c1', content: 'results for one' },
            { toolCallId: 'c2', content: "Tool 'bogus' not found" },
            { toolCallId: 'c3', content: 'results for three' },
          ],
        },
      ];
      expect(requestAt(client, 1).messages).toEqual(expected);
    });
  });

  describe('tool failures', () => {
    it('feeds an unknown tool back to the model and continues', async () => {
      const client = scriptedClient(toolCalls(call('c1', 'bogus')), completed('Recovered'));

      const answer = await new ToolOrchestrator({ client }).generate({
        query: 'q',
        registry: new ToolRegistry([echoTool()]),
      });

      expect(answer).toBe('Recovered');
      expect(requestAt(client, 1).messages[2]).toEqual({
        type: 'tool_results',
        results: [{ toolCallId: 'c1', content: "Tool 'bogus' not found" }],
      });
    });

    it('converts a thrown tool error into a result without blocking siblings', async () => {
      const broken: Tool = {
        name: 'get_course_outline',
        schema: () => schemaFor('get_course_outline'),
        execute: async () => {
          throw new Error('database is locked');
        },
      };
      const search = echoTool();
      const client = scriptedClient(
        toolCalls(call('c1', 'get_course_outline'), call('c2', 'search_course_content', { query: 'x' })),
        completed('Answer')
      );

      const answer = await new ToolOrchestrator({ client }).generate({
        query: 'q',
        registry: new ToolRegistry([broken, search]),
      });

      expect(answer).toBe('Answer');
      expect(requestAt(client, 1).messages[2]).toEqual({
        type: 'tool_results',
        results: [
          { toolCallId: 'c1', content: 'Tool execution failed: database is locked' },
          { toolCallId: 'c2', content: 'results for x' },
        ],
      });
    });

    it('reports invalid tool arguments as a failed execution', async () => {
      const catalog = fakeCatalog();
      const client = scriptedClient(toolCalls(call('c1', 'search_course_content', {})), completed('Answer'));

      await new ToolOrchestrator({ client }).generate({
        query: 'q',
        registry: new ToolRegistry([new CourseSearchTool(catalog)]),
      });

      expect(requestAt(client, 1).messages[2]).toEqual({
        type: 'tool_results',
        results: [
          {
            toolCallId: 'c1',
            content: 'Tool execution failed: Invalid arguments for search_course_content: query: Required',
          },
        ],
      });
    });
  });

  describe('model failures', () => {
    it('stops on a model error in round 2 after one tool execution', async () => {
      const client = scriptedClient(
        toolCalls(call('c1', 'search_course_content', { query: 'a' })),
        new Error('API rate limit exceeded')
      );
      const tool = echoTool();

      const answer = await new ToolOrchestrator({ client }).generate({ query: 'q', registry: new ToolRegistry([tool]) });

      expect(answer).toBe('Error: API rate limit exceeded');
      expect(tool.execute).toHaveBeenCalledTimes(1);
      expect(client.create).toHaveBeenCalledTimes(2);
    });

    it('returns an error string when the first call fails', async () => {
      const client = scriptedClient(new Error('invalid x-api-key'));

      await expect(new ToolOrchestrator({ client }).generate({ query: 'q' })).resolves.toBe(
        'Error: invalid x-api-key'
      );
    });

    it('returns an error string when the forced final call fails', async () => {
      const client = scriptedClient(
        toolCalls(call('c1', 'search_course_content', { query: 'a' })),
        toolCalls(call('c2', 'search_course_content', { query: 'b' })),
        new Error('overloaded')
      );

      await expect(
        new ToolOrchestrator({ client }).generate({ query: 'q', registry: new ToolRegistry([echoTool()]) })
      ).resolves.toBe('Error: overloaded');
    });

    it('accepts a failed turn from the client', async () => {
      const client = scriptedClient({ kind: 'failed', message: 'bad gateway' });

      await expect(new ToolOrchestrator({ client }).generate({ query: 'q' })).resolves.toBe('Error: bad gateway');
    });
  });

  describe('system context', () => {
    it('appends prior conversation to the instructions', async () => {
      const client = scriptedClient(completed('ok'));

      await new ToolOrchestrator({ client, systemPrompt: 'Be brief.' }).generate({
        query: 'q',
        history: 'User: hi\nAssistant: hello',
      });

      expect(requestAt(client, 0).system).toBe('Be brief.\n\nPrevious conversation:\nUser: hi\nAssistant: hello');
    });

    it('leaves the instructions alone without history', () => {
      expect(buildSystemContext('Be brief.', null)).toBe('Be brief.');
      expect(buildSystemContext('Be brief.', '')).toBe('Be brief.');
    });

    it('states the round budget in the prompt', () => {
      expect(buildSystemPrompt(2)).toContain('in up to 2 rounds;');
      expect(buildSystemPrompt(1)).toContain('in up to 1 round;');
    });
  });

  describe('tracing', () => {
    it('records one generation per model call and one span per tool call', async () => {
      const spanEnd = vi.fn();
      const generationEnd = vi.fn();
      const span: SpanHandle = { update: vi.fn(() => span), end: spanEnd };
      const generation: GenerationHandle = { update: vi.fn(() => generation), end: generationEnd };
      const trace: TraceHandle = {
        span: vi.fn(() => span),
        generation: vi.fn(() => generation),
        update: vi.fn(() => trace),
        end: vi.fn(),
      };
      const client = scriptedClient(
        {
          kind: 'tool_calls',
          text: '',
          calls: [call('c1', 'search_course_content', { query: 'a' })],
          usage: { inputTokens: 10, outputTokens: 2 },
        },
        completed('Answer')
      );

      await new ToolOrchestrator({ client }).generate({
        query: 'q',
        registry: new ToolRegistry([echoTool()]),
        trace,
      });

      expect(trace.generation).toHaveBeenCalledTimes(2);
      expect(trace.generation).toHaveBeenNthCalledWith(1, {
        name: 'model-round-1',
        model: 'test-model',
        input: { messages: 1, toolsOffered: true },
        metadata: { round: 1 },
      });
      expect(generation.update).toHaveBeenNthCalledWith(1, {
        output: '',
        metadata: { stop: 'tool_calls' },
        usage: { input: 10, output: 2, total: 12 },
      });
      expect(trace.span).toHaveBeenCalledWith({ name: 'tool:search_course_content', input: { query: 'a' } });
      expect(span.update).toHaveBeenCalledWith({ metadata: { outputLength: 13, failed: false } });
      expect(spanEnd).toHaveBeenCalledTimes(1);
      expect(generationEnd).toHaveBeenCalledTimes(2);
    });
  });

  it('logs each round decision at debug level', async () => {
    const debug = vi.fn();
    const client = scriptedClient(toolCalls(call('c1', 'search_course_content', { query: 'a' })), completed('Answer'));

    await new ToolOrchestrator({ client, logger: { warn: vi.fn(), debug } }).generate({
      query: 'q',
      registry: new ToolRegistry([echoTool()]),
    });

    expect(debug.mock.calls).toEqual([
      ['[agent] Round 1: 1 tool call(s): search_course_content'],
      ['[agent] Round 2: completed'],
    ]);
  });

  it('does not share state between queries', async () => {
    const client = scriptedClient(completed('first'), completed('second'));
    const orchestrator = new ToolOrchestrator({ client });

    await orchestrator.generate({ query: 'one' });
    await orchestrator.generate({ query: 'two' });

    expect(requestAt(client, 1).messages).toEqual([{ type: 'user_message', text: 'two' }]);
  });
});
