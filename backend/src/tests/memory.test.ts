import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { formatMemoryContext, persistTurn, renderMemoryContext, trimTurn } from '../orchestrator/memory.js';
import { MemoryStore } from '../services/memoryStore.js';
import { createLogger } from '../utils/logger.js';
import { namedPrompts, ScriptedLlm } from './fakes.js';

const logger = createLogger({ level: 'silent' });

describe('memory rendering', () => {
  it('keeps the head and tail of a long turn', () => {
    const content = `${'a'.repeat(500)}${'b'.repeat(500)}`;

    expect(trimTurn(content, 400)).toBe(`${'a'.repeat(240)} ... [trimmed 600 chars] ... ${'b'.repeat(160)}`);
    expect(trimTurn('short', 400)).toBe('short');
  });

  it('renders the summary and recent turns', () => {
    const rendered = renderMemoryContext({
      summary: 'Line 2 runs slow',
      recent: [
        { role: 'user', content: 'hi', createdAt: '2026-01-01T00:00:00.000Z' },
        { role: 'assistant', content: 'hello', createdAt: '2026-01-01T00:00:01.000Z' }
      ]
    });

    expect(rendered).toBe('Summary: Line 2 runs slow\nRecent turns:\n- user: hi\n- assistant: hello');
  });

  it('renders nothing for an empty thread', () => {
    expect(renderMemoryContext({ summary: null, recent: [] })).toBe('');
  });

  it('yields an empty context when the store cannot be read', () => {
    const store = new MemoryStore({ dbPath: ':memory:' });
    vi.spyOn(store, 'getContext').mockImplementation(() => {
      throw new Error('disk gone');
    });

    expect(formatMemoryContext(store, 'line-1', 8)).toBe('');
    store.close();
  });
});

describe('persistTurn', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore({ dbPath: ':memory:', summaryInterval: 2 });
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  it('stores the turn and refreshes the summary when due', async () => {
    const llm = new ScriptedLlm({ 'memory-summary-system': '- Goal: track OEE\n' });

    await persistTurn({ store, llm, prompts: namedPrompts(), logger }, 'line-1', 'What is OEE?', 'OEE is 80%');

    expect(store.getRecent('line-1', 2).map((item) => item.content)).toEqual(['What is OEE?', 'OEE is 80%']);
    expect(store.getSummary('line-1')).toBe('- Goal: track OEE');
    expect(llm.callsFor('memory-summary-system')[0]?.messages[1]?.content).toBe(
      'Existing summary:\nNone\n\nRecent turns:\nuser: What is OEE?\nassistant: OEE is 80%'
    );
  });

  it('stores only the question when there is no answer', async () => {
    const llm = new ScriptedLlm({});

    await persistTurn({ store, llm, prompts: namedPrompts(), logger }, 'line-1', 'What is OEE?', undefined);

    expect(store.countMessages('line-1')).toBe(1);
    expect(llm.calls).toHaveLength(0);
  });

  it('keeps the messages when summarizing fails', async () => {
    const llm = new ScriptedLlm({ 'memory-summary-system': new Error('rate limited') });

    await expect(
      persistTurn({ store, llm, prompts: namedPrompts(), logger }, 'line-1', 'What is OEE?', 'OEE is 80%')
    ).resolves.toBeUndefined();

    expect(store.countMessages('line-1')).toBe(2);
    expect(store.getSummary('line-1')).toBeNull();
  });

  it('logs a failed turn with its failure kind', async () => {
    const local = createLogger({ level: 'silent' });
    const warn = vi.spyOn(local, 'warn');
    const llm = new ScriptedLlm({ 'memory-summary-system': new Error('rate limited') });

    await persistTurn({ store, llm, prompts: namedPrompts(), logger: local }, 'line-1', 'What is OEE?', 'OEE is 80%');

    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'MemoryPersistFailure', threadId: 'line-1' }),
      'Failed to persist conversation turn'
    );
  });

  it('does not interleave concurrent turns on one thread', async () => {
    const llm = new ScriptedLlm({ 'memory-summary-system': 'summary' });
    const deps = { store, llm, prompts: namedPrompts(), logger };

    await Promise.all([
      persistTurn(deps, 'line-1', 'q1', 'a1'),
      persistTurn(deps, 'line-1', 'q2', 'a2')
    ]);

    expect(store.getRecent('line-1').map((item) => item.content)).toEqual(['q1', 'a1', 'q2', 'a2']);
  });
});
