import { describe, it, expect } from 'vitest';
import { jsonSchema, tool } from 'ai';
import type { ModelMessage } from 'ai';
import { ProviderError } from '../errors';
import { mock } from './mock';
import { MockProvider, createMockProvider } from './mock-provider';

const messages = (content: string): ModelMessage[] => [{ role: 'user', content }];

const searchTool = tool({
  description: 'Search restaurants',
  inputSchema: jsonSchema<{ cuisine: string }>({
    type: 'object',
    properties: { cuisine: { type: 'string' } },
    required: ['cuisine'],
  }),
});

describe('MockProvider', () => {
  describe('simpleExecution', () => {
    it('should execute with mock text response', async () => {
      const provider = mock.provider(mock.text('Hello, world!'));

      const execution = provider.simpleExecution(async (session) => {
        const result = await session.generateText({ messages: messages('Say hello') });
        return result.text;
      });

      expect(await execution.toResult()).toBe('Hello, world!');
    });

    it('should execute with mock json response', async () => {
      const provider = mock.provider(mock.json({ name: 'Alice', party: 2 }));

      const execution = provider.simpleExecution(async (session) => {
        const result = await session.generateText({ messages: messages('Get guest') });
        return JSON.parse(result.text);
      });

      expect(await execution.toResult()).toEqual({ name: 'Alice', party: 2 });
    });

    it('should surface model errors as ProviderError', async () => {
      const provider = mock.provider(mock.error(new Error('API Error')));

      const execution = provider.simpleExecution(async (session) => {
        await session.generateText({ messages: messages('Test') });
      });

      const result = await execution.result();
      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error).toBeInstanceOf(ProviderError);
        expect(result.error.message).toBe('API Error');
      }
    });

    it('should return tool calls without executing them', async () => {
      const provider = mock.provider(mock.toolCall('search_restaurants', { cuisine: 'Italian' }));

      const execution = provider.simpleExecution(async (session) => {
        const result = await session.generateText({
          messages: messages('Find Italian food'),
          tools: { search_restaurants: searchTool },
        });
        return result.toolCalls.map((call) => ({ name: call.toolName, input: call.input }));
      });

      expect(await execution.toResult()).toEqual([
        { name: 'search_restaurants', input: { cuisine: 'Italian' } },
      ]);
    });

    it('should play scripted turns in order', async () => {
      const provider = mock.provider(
        mock.script([
          { toolName: 'search_restaurants', input: { cuisine: 'Japanese' } },
          { text: 'Sakura Japanese has tables.' },
        ])
      );

      const execution = provider.simpleExecution(async (session) => {
        const first = await session.generateText({
          messages: messages('sushi?'),
          tools: { search_restaurants: searchTool },
        });
        const second = await session.generateText({ messages: messages('and?') });
        const third = await session.generateText({ messages: messages('again') });
        return [first.toolCalls.length, second.text, third.text];
      });

      expect(await execution.toResult()).toEqual([
        1,
        'Sakura Japanese has tables.',
        'Sakura Japanese has tables.',
      ]);
    });
  });

  describe('getCalls()', () => {
    it('should track calls with the default model id', async () => {
      const provider = mock.provider(mock.text('ok'));

      await provider
        .simpleExecution((session) => session.generateText({ messages: messages('hi') }))
        .toResult();

      const calls = provider.getCalls();
      expect(calls).toHaveLength(1);
      expect(calls[0].modelId).toBe('default');
    });

    it('should share call tracking across fluent copies', async () => {
      const provider = mock.provider(mock.text('ok'));
      const configured = provider.withDefaultModel('test-model');

      await configured
        .simpleExecution((session) => session.generateText({ messages: messages('hi') }))
        .toResult();

      expect(provider.getCalls().map((c) => c.modelId)).toEqual(['test-model']);

      provider.clearCalls();
      expect(configured.getCalls()).toEqual([]);
    });

    it('should pass the requested model id to a model factory', async () => {
      const provider = mock.provider((modelId) => mock.text(`from ${modelId}`));

      const text = await provider
        .simpleExecution(async (session) => {
          const result = await session.generateText({ model: 'small', messages: messages('hi') });
          return result.text;
        })
        .toResult();

      expect(text).toBe('from small');
    });
  });

  describe('createMockProvider', () => {
    it('should reject a config without a model', () => {
      expect(() => createMockProvider({})).toThrow('MockProvider requires either model or modelFactory');
    });

    it('should accept a config object', () => {
      const provider = createMockProvider({ model: mock.text('x') });
      expect(provider).toBeInstanceOf(MockProvider);
      expect(provider.type).toBe('mock');
    });
  });
});
