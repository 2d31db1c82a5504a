import { describe, expect, it } from 'vitest';

import { resolveTokenLimitParam, tokenLimitParams } from '../config/models.js';
import { OpenAIChatClient } from '../llm/openaiClient.js';
import { ProviderUnavailableError } from '../utils/errors.js';

describe('token limit parameter', () => {
  it('uses max_tokens for classic chat models', () => {
    expect(resolveTokenLimitParam('gpt-4o')).toBe('max_tokens');
    expect(resolveTokenLimitParam('gpt-4o-mini')).toBe('max_tokens');
  });

  it('uses max_completion_tokens for reasoning models', () => {
    expect(resolveTokenLimitParam('o3-mini')).toBe('max_completion_tokens');
    expect(resolveTokenLimitParam('GPT-5-turbo')).toBe('max_completion_tokens');
    expect(resolveTokenLimitParam('chatgpt-4o-latest')).toBe('max_completion_tokens');
  });

  it('builds the request fragment', () => {
    expect(tokenLimitParams('o1-preview', 300)).toEqual({ max_completion_tokens: 300 });
    expect(tokenLimitParams('gpt-4o', 300)).toEqual({ max_tokens: 300 });
  });
});

describe('OpenAIChatClient', () => {
  it('reports a missing API key as provider unavailability', async () => {
    const client = new OpenAIChatClient({ apiKey: '', model: 'gpt-4o' });

    await expect(client.complete([{ role: 'user', content: 'hi' }], { maxTokens: 10 })).rejects.toBeInstanceOf(
      ProviderUnavailableError
    );
  });
});
