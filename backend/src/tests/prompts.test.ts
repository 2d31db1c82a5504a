import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

import { createInitialState } from '../orchestrator/state.js';
import { buildReactReasoningMessages, buildSynthesisMessages, withMemoryContext } from '../prompts/builders.js';
import {
  assertAvailable,
  FilePromptProvider,
  PROMPT_NAMES,
  StaticPromptProvider
} from '../prompts/promptProvider.js';
import { PromptUnavailableError } from '../utils/errors.js';
import { namedPrompts } from './fakes.js';

const promptsDir = fileURLToPath(new URL('../../prompts', import.meta.url));

describe('prompt providers', () => {
  it('ships every prompt the agent needs', () => {
    const provider = new FilePromptProvider(promptsDir);

    expect(() => assertAvailable(provider)).not.toThrow();
    for (const name of PROMPT_NAMES) {
      expect(provider.get(name).length).toBeGreaterThan(0);
    }
  });

  it('names the missing prompt', () => {
    const provider = new StaticPromptProvider({ 'planning-system': 'plan' });

    expect(() => provider.get('understanding-system')).toThrow(
      "Prompt 'understanding-system' not found in prompt source."
    );
    expect(() => assertAvailable(provider)).toThrow(PromptUnavailableError);
  });

  it('fails for a directory without prompt files', () => {
    const provider = new FilePromptProvider(fileURLToPath(new URL('./missing-prompts', import.meta.url)));

    expect(() => provider.get('planning-system')).toThrow(PromptUnavailableError);
  });
});

describe('message builders', () => {
  it('appends conversation context only when there is some', () => {
    expect(withMemoryContext('system', '')).toBe('system');
    expect(withMemoryContext('system', 'Summary: line 2 is slow')).toBe(
      'system\n\nConversation context:\nSummary: line 2 is slow'
    );
  });

  it('lays out the reasoning request', () => {
    const messages = buildReactReasoningMessages(
      namedPrompts(),
      'Where is the bottleneck?',
      [{ name: 'find_bottleneck', description: 'Slowest station', inputSchema: {} }],
      '',
      ''
    );

    expect(messages[0]).toEqual({ role: 'system', content: 'react-reasoning-system' });
    expect(messages[1]?.content).toContain('Question: Where is the bottleneck?');
    expect(messages[1]?.content).toContain('- find_bottleneck: Slowest station');
    expect(messages[1]?.content).toContain('Previous steps:\nNone yet.');
  });

  it('uses the direct template when no data was gathered', () => {
    const state = createInitialState('hi');

    expect(buildSynthesisMessages(namedPrompts(), state, '')).toEqual([
      { role: 'system', content: 'synthesis-direct-system' },
      { role: 'user', content: 'hi' }
    ]);
  });

  it('passes gathered data to the data template', () => {
    const state = createInitialState('How many units today?');
    state.toolPlan = [{ name: 'get_production_metrics', args: {}, purpose: 'units', priority: 1 }];
    state.toolResults.get_production_metrics = {
      toolName: 'get_production_metrics',
      success: true,
      data: { units: 120 },
      error: '',
      executionTimeMs: 12.4
    };

    const [system, user] = buildSynthesisMessages(namedPrompts(), state, '');
    const context = JSON.parse(user?.content ?? '{}');

    expect(system?.content).toBe('synthesis-data-system');
    expect(context.question).toBe('How many units today?');
    expect(context.tool_results.get_production_metrics).toEqual({
      tool_name: 'get_production_metrics',
      success: true,
      data: { units: 120 },
      error: '',
      execution_time_ms: 12
    });
    expect(context.react_trace).toBeUndefined();
  });
});
