import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LLMService } from '../services/llm.js';
import type { LLMConfig } from '../config.js';
import { LLMError } from '../types/errors.js';

const generateText = vi.hoisted(() => vi.fn());

vi.mock('ai', () => ({ generateText }));

const ollama: LLMConfig = {
  provider: 'ollama',
  model: 'sqlcoder:7b-q4_K_M',
  apiKey: 'ollama',
  maxTokens: 256,
  timeoutMs: 5_000,
};

describe('LLMService', () => {
  beforeEach(() => {
    generateText.mockReset();
  });

  it('describes provider, model and default endpoint', () => {
    const service = new LLMService({
      provider: 'anthropic',
      model: 'claude-sonnet-4-5',
      apiKey: 'test-secret',
      maxTokens: 512,
      timeoutMs: 60_000,
    });
    expect(service.modelId).toBe('anthropic/claude-sonnet-4-5');
    expect(service.endpoint).toBe('https://api.anthropic.com/v1');
  });

  it('prefers a configured base URL', () => {
    const service = new LLMService({ ...ollama, baseURL: 'http://gpu-box:11434/v1' });
    expect(service.endpoint).toBe('http://gpu-box:11434/v1');
  });

  it('calls the model once, deterministically, without retries', async () => {
    generateText.mockResolvedValue({
      content: [
        { type: 'reasoning', text: 'customers table' },
        { type: 'text', text: 'SELECT id FROM customers' },
      ],
      usage: { inputTokens: 120, outputTokens: 8 },
    });
    const service = new LLMService(ollama);

    const reply = await service.complete({ system: 'schema here', prompt: 'List customers' });

    expect(reply).toEqual([{ type: 'reasoning' }, { type: 'text', text: 'SELECT id FROM customers' }]);
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        system: 'schema here',
        prompt: 'List customers',
        temperature: 0,
        maxOutputTokens: 256,
        maxRetries: 0,
        abortSignal: expect.any(AbortSignal),
      })
    );
  });

  it('wraps provider failures in LLMError', async () => {
    generateText.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
    const service = new LLMService(ollama);

    const failure = service.complete({ system: 's', prompt: 'p' });
    await expect(failure).rejects.toBeInstanceOf(LLMError);
    await expect(failure).rejects.toThrow(
      'Generation service call failed: connect ECONNREFUSED 127.0.0.1:11434'
    );
  });
});
