export type TokenLimitParam = 'max_tokens' | 'max_completion_tokens';

/**
 * Model families whose chat-completions endpoint rejects `max_tokens`.
 * Matched as case-insensitive substrings of the model name, first hit wins.
 */
const TOKEN_LIMIT_PARAMS: ReadonlyArray<{ match: string; param: TokenLimitParam }> = [
  { match: 'o1', param: 'max_completion_tokens' },
  { match: 'o3', param: 'max_completion_tokens' },
  { match: 'gpt-4.5', param: 'max_completion_tokens' },
  { match: 'gpt-5', param: 'max_completion_tokens' },
  { match: 'chatgpt-4o', param: 'max_completion_tokens' }
];

const DEFAULT_TOKEN_LIMIT_PARAM: TokenLimitParam = 'max_tokens';

export function resolveTokenLimitParam(model: string): TokenLimitParam {
  const normalized = model.trim().toLowerCase();
  const entry = TOKEN_LIMIT_PARAMS.find((candidate) => normalized.includes(candidate.match));
  return entry?.param ?? DEFAULT_TOKEN_LIMIT_PARAM;
}

export function tokenLimitParams(model: string, maxTokens: number): Partial<Record<TokenLimitParam, number>> {
  return { [resolveTokenLimitParam(model)]: maxTokens };
}
