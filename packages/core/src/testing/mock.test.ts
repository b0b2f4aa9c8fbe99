import { describe, it, expect } from 'vitest';
import { generateText, jsonSchema, tool } from 'ai';
import { mock } from './mock';

describe('mock.text', () => {
  it('should create model that returns text', async () => {
    const result = await generateText({
      model: mock.text('Hello, world!'),
      prompt: 'Say hello',
    });

    expect(result.text).toBe('Hello, world!');
  });

  it('should include usage in result', async () => {
    const result = await generateText({
      model: mock.text('Hello'),
      prompt: 'test',
    });

    expect(result.usage).toBeDefined();
  });

  it('should allow custom options', async () => {
    const result = await generateText({
      model: mock.text('Hello', {
        usage: {
          inputTokens: { total: 100, noCache: 100, cacheRead: undefined, cacheWrite: undefined },
          outputTokens: { total: 50, text: 50, reasoning: undefined },
        },
      }),
      prompt: 'test',
    });

    expect(result.text).toBe('Hello');
  });

  it('should allow custom finishReason', async () => {
    const result = await generateText({
      model: mock.text('Truncated...', {
        finishReason: { unified: 'length', raw: 'max_tokens' },
      }),
      prompt: 'test',
    });

    expect(result.finishReason).toBe('length');
  });
});

describe('mock.json', () => {
  it('should create model that returns JSON string', async () => {
    const data = { name: 'Alice', age: 30 };
    const result = await generateText({
      model: mock.json(data),
      prompt: 'Get user',
    });

    expect(result.text).toBe(JSON.stringify(data));
  });

  it('should handle nested objects', async () => {
    const data = {
      user: { name: 'Alice' },
      items: [{ id: 1 }, { id: 2 }],
    };
    const result = await generateText({
      model: mock.json(data),
      prompt: 'Get data',
    });

    expect(JSON.parse(result.text)).toEqual(data);
  });

  it('should handle arrays', async () => {
    const result = await generateText({
      model: mock.json([1, 2, 3]),
      prompt: 'Get numbers',
    });

    expect(JSON.parse(result.text)).toEqual([1, 2, 3]);
  });

  it('should pass options through', async () => {
    const result = await generateText({
      model: mock.json({ value: 'test' }, {
        finishReason: { unified: 'length', raw: 'max_tokens' },
      }),
      prompt: 'test',
    });

    expect(result.finishReason).toBe('length');
  });
});

const searchTool = tool({
  description: 'Search restaurants',
  inputSchema: jsonSchema<{ cuisine: string }>({
    type: 'object',
    properties: { cuisine: { type: 'string' } },
    required: ['cuisine'],
  }),
});

describe('mock.toolCall', () => {
  it('should surface the call without running it', async () => {
    const result = await generateText({
      model: mock.toolCall('search', { cuisine: 'Italian' }),
      tools: { search: searchTool },
      prompt: 'Find Italian food',
    });

    expect(result.toolCalls.map((c) => [c.toolName, c.input])).toEqual([['search', { cuisine: 'Italian' }]]);
    expect(result.finishReason).toBe('tool-calls');
  });
});

describe('mock.script', () => {
  it('should play turns in order and repeat the last', async () => {
    const model = mock.script([{ toolName: 'search', input: { cuisine: 'Thai' } }, { text: 'Two places.' }]);
    const run = () => generateText({ model, tools: { search: searchTool }, prompt: 'Thai?' });

    const first = await run();
    const second = await run();
    const third = await run();

    expect(first.toolCalls.map((c) => c.input)).toEqual([{ cuisine: 'Thai' }]);
    expect(second.text).toBe('Two places.');
    expect(third.text).toBe('Two places.');
  });

  it('should throw a scripted error', async () => {
    const model = mock.script([{ error: new Error('overloaded') }]);

    await expect(generateText({ model, prompt: 'hi' })).rejects.toThrow('overloaded');
  });

  it('should require at least one turn', () => {
    expect(() => mock.script([])).toThrow('mock.script requires at least one turn');
  });
});

describe('mock.error', () => {
  it('should create model that throws on generateText', async () => {
    const error = new Error('Rate limit exceeded');

    await expect(
      generateText({
        model: mock.error(error),
        prompt: 'test',
      })
    ).rejects.toThrow('Rate limit exceeded');
  });

  it('should preserve error properties', async () => {
    const error = Object.assign(new Error('Custom error'), { code: 'RATE_LIMIT' });

    const caught = await generateText({ model: mock.error(error), prompt: 'test' }).catch((e: unknown) => e);

    expect(caught).toMatchObject({ message: 'Custom error', code: 'RATE_LIMIT' });
  });
});
