import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockCreate = vi.hoisted(() => vi.fn());
const MockOpenAIConstructor = vi.hoisted(() => vi.fn());

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: mockCreate,
        },
      };
      constructor(...args: unknown[]) {
        MockOpenAIConstructor(...args);
      }
    },
  };
});

vi.mock('../config.js', () => ({
  config: {
    port: 3000,
    openai: {
      apiKey: 'test-api-key',
      model: 'gpt-4o-mini',
      fallbackModel: undefined,
      maxRetries: 0,
    },
    generator: {
      enabled: true,
      timeoutMs: 15000,
      maxTokens: 400,
    },
    debug: false,
  },
}));

import { OpenAiClient } from '../openai/OpenAiClient.js';
import { OpenAiGenerationStrategy } from '../advisor/generation/OpenAiGenerationStrategy.js';
import { MAX_PROMPT_RECORDS, buildUserPrompt } from '../advisor/generation/prompts.js';
import { makePhone } from './phoneFixtures.js';

function completion(content: string | null) {
  return {
    choices: [
      {
        message: { content },
        finish_reason: 'stop',
      },
    ],
  };
}

describe('OpenAiClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('constructor', () => {
    it('should create OpenAI client with configured timeout and retries', () => {
      new OpenAiClient({ apiKey: 'test-api-key' });

      expect(MockOpenAIConstructor).toHaveBeenCalledWith({
        apiKey: 'test-api-key',
        timeout: 15000,
        maxRetries: 0,
      });
    });

    it('should accept timeout and retry overrides', () => {
      new OpenAiClient({ apiKey: 'test-api-key', timeoutMs: 2000, maxRetries: 1 });

      expect(MockOpenAIConstructor).toHaveBeenCalledWith({
        apiKey: 'test-api-key',
        timeout: 2000,
        maxRetries: 1,
      });
    });
  });

  describe('complete', () => {
    it('should use default model gpt-4o-mini when not specified', async () => {
      mockCreate.mockResolvedValue(completion('Hello'));

      const client = new OpenAiClient({ apiKey: 'test-api-key' });
      const result = await client.complete({ messages: [{ role: 'user', content: 'Hello' }] });

      expect(result).toEqual({ content: 'Hello', model: 'gpt-4o-mini', finishReason: 'stop' });
      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'gpt-4o-mini' }),
        expect.objectContaining({ timeout: 15000, maxRetries: 0 })
      );
    });

    it('should forward messages, model override, token limit and signal', async () => {
      mockCreate.mockResolvedValue(completion('Response'));
      const controller = new AbortController();
      const messages = [
        { role: 'system' as const, content: 'You are a phone expert' },
        { role: 'user' as const, content: 'Hello' },
      ];

      const client = new OpenAiClient({ apiKey: 'test-api-key', defaultModel: 'gpt-4o' });
      await client.complete({ messages, model: 'gpt-4.1-mini', maxTokens: 250, signal: controller.signal });

      expect(mockCreate).toHaveBeenCalledWith(
        { model: 'gpt-4.1-mini', messages, max_tokens: 250 },
        { timeout: 15000, maxRetries: 0, signal: controller.signal }
      );
    });

    it('should return null content when the response has no choices', async () => {
      mockCreate.mockResolvedValue({ choices: [] });

      const client = new OpenAiClient({ apiKey: 'test-api-key' });
      const result = await client.complete({ messages: [{ role: 'user', content: 'Hello' }] });

      expect(result.content).toBeNull();
      expect(result.finishReason).toBeNull();
    });

    it('should rethrow SDK errors', async () => {
      const error = Object.assign(new Error('Rate limit reached'), { name: 'RateLimitError', status: 429 });
      mockCreate.mockRejectedValue(error);

      const client = new OpenAiClient({ apiKey: 'test-api-key' });

      await expect(client.complete({ messages: [{ role: 'user', content: 'Hello' }] })).rejects.toBe(error);
    });
  });
});

describe('OpenAiGenerationStrategy', () => {
  const context = {
    question: 'Which has the better camera?',
    intent: 'comparison' as const,
    criteria: { focus: 'camera' as const },
    records: [makePhone('Galaxy Alpha'), makePhone('Galaxy Beta')],
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should send the prompt to its model and return trimmed text', async () => {
    mockCreate.mockResolvedValue(completion('  Galaxy Alpha, thanks to its main sensor.\n'));
    const client = new OpenAiClient({ apiKey: 'test-api-key' });
    const strategy = new OpenAiGenerationStrategy({ client, model: 'gpt-4o', maxTokens: 300 });

    const text = await strategy.generate(context, new AbortController().signal);

    expect(strategy.name).toBe('openai:gpt-4o');
    expect(text).toBe('Galaxy Alpha, thanks to its main sensor.');
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gpt-4o',
        max_tokens: 300,
        messages: [
          expect.objectContaining({ role: 'system' }),
          { role: 'user', content: buildUserPrompt(context) },
        ],
      }),
      expect.anything()
    );
  });

  it('should reject an empty completion', async () => {
    mockCreate.mockResolvedValue(completion('   '));
    const client = new OpenAiClient({ apiKey: 'test-api-key' });
    const strategy = new OpenAiGenerationStrategy({ client, model: 'gpt-4o', maxTokens: 300 });

    await expect(strategy.generate(context, new AbortController().signal)).rejects.toMatchObject({
      code: 'OPENAI_EMPTY_RESPONSE',
    });
  });
});

describe('buildUserPrompt', () => {
  it('should include the question, intent, criteria and phone data', () => {
    const prompt = buildUserPrompt({
      question: 'best battery under $900',
      intent: 'recommendation',
      criteria: { priceMax: 900, focus: 'battery' },
      records: [makePhone('Galaxy Alpha', { battery: '5000 mAh' })],
    });

    const lines = prompt.split('\n');
    expect(lines.slice(0, 3)).toEqual([
      'User Question: best battery under $900',
      'Query Type: recommendation',
      'Criteria: price at most $900, focus on battery',
    ]);
    expect(lines).toContain('Phone: Galaxy Alpha');
    expect(lines).toContain('- Battery: 5000 mAh');
  });

  it('should include at most five phones', () => {
    const records = ['One', 'Two', 'Three', 'Four', 'Five', 'Six', 'Seven'].map(name => makePhone(name));
    const prompt = buildUserPrompt({ question: 'q', intent: 'general', criteria: {}, records });

    const phoneLines = prompt.split('\n').filter(line => line.startsWith('Phone: '));
    expect(phoneLines).toHaveLength(MAX_PROMPT_RECORDS);
    expect(phoneLines[4]).toBe('Phone: Five');
    expect(prompt).toContain('Criteria: none');
  });
});
