import type { AgentMessage, MemoryContext } from '../../../shared/types.js';
import type { LlmClient } from '../llm/openaiClient.js';
import type { PromptProvider } from '../prompts/promptProvider.js';
import type { MemoryStore } from '../services/memoryStore.js';
import type { AgentErrorKind } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

const MAX_TOTAL_RECENT_CHARS = 4000;
const MIN_TURN_BUDGET = 400;
const MIN_TAIL_CHARS = 120;
const SUMMARY_WINDOW = 16;
const SUMMARY_MAX_TOKENS = 320;

export function trimTurn(content: string, budget: number): string {
  if (content.length <= budget) {
    return content;
  }
  const head = content.slice(0, Math.floor(budget * 0.6));
  const tail = content.slice(-Math.max(MIN_TAIL_CHARS, Math.floor(budget * 0.4)));
  const trimmed = content.length - head.length - tail.length;
  return `${head} ... [trimmed ${trimmed} chars] ... ${tail}`;
}

export function renderMemoryContext(context: MemoryContext): string {
  const lines: string[] = [];
  if (context.summary) {
    lines.push(`Summary: ${context.summary}`);
  }

  if (context.recent.length) {
    lines.push('Recent turns:');
    const budget = Math.max(MIN_TURN_BUDGET, Math.floor(MAX_TOTAL_RECENT_CHARS / context.recent.length));
    for (const item of context.recent) {
      lines.push(`- ${item.role}: ${trimTurn(item.content, budget)}`);
    }
  }

  return lines.join('\n').trim();
}

/**
 * Long-term memory rendered for prompts. A store that cannot be read yields
 * an empty context.
 */
export function formatMemoryContext(store: MemoryStore, threadId: string, limit: number, logger?: Logger): string {
  try {
    return renderMemoryContext(store.getContext(threadId, limit));
  } catch (error) {
    logger?.warn({ err: error }, 'Memory context unavailable');
    return '';
  }
}

export interface PersistTurnDeps {
  store: MemoryStore;
  llm: LlmClient;
  prompts: PromptProvider;
  logger: Logger;
}

async function refreshSummary(deps: PersistTurnDeps, threadId: string) {
  const { store, llm, prompts } = deps;
  const recent = store.getRecent(threadId, SUMMARY_WINDOW);
  const priorSummary = store.getSummary(threadId);
  const conversation = recent.map((item) => `${item.role}: ${item.content}`).join('\n');

  const messages: AgentMessage[] = [
    { role: 'system', content: prompts.get('memory-summary-system') },
    {
      role: 'user',
      content: `Existing summary:\n${priorSummary || 'None'}\n\nRecent turns:\n${conversation}`
    }
  ];

  const summary = await llm.complete(messages, { maxTokens: SUMMARY_MAX_TOKENS });
  if (summary.trim()) {
    store.setSummary(threadId, summary.trim());
  }
}

/**
 * Appends the turn to the thread and refreshes the rolling summary every
 * `summaryInterval` messages. Never throws.
 */
export async function persistTurn(
  deps: PersistTurnDeps,
  threadId: string,
  question: string,
  answer: string | undefined
): Promise<void> {
  const { store, logger } = deps;
  try {
    await store.withThreadLock(threadId, async () => {
      store.addMessage(threadId, 'user', question);
      if (answer) {
        store.addMessage(threadId, 'assistant', answer);
      }
      if (answer && store.shouldSummarize(threadId)) {
        await refreshSummary(deps, threadId);
      }
    });
  } catch (error) {
    logger.warn(
      { err: error, threadId, kind: 'MemoryPersistFailure' satisfies AgentErrorKind },
      'Failed to persist conversation turn'
    );
  }
}
