import { z } from 'zod';
import type { AgentRunState, PhaseName } from '../../../shared/types.js';
import { config } from '../config/app.js';

const IterationCapSchema = z.number().int().positive();

/** Cap on reasoning iterations; at least one is required. Throws a ZodError otherwise. */
export function parseIterationCap(value: number): number {
  return IterationCapSchema.parse(value);
}

export function generateThreadId(now: number = Date.now()): string {
  const suffix = Math.random().toString(36).slice(2, 9).padEnd(7, '0');
  return `thread-${now}-${suffix}`;
}

export interface InitialStateOptions {
  threadId?: string;
  reactEnabled?: boolean;
  reactMaxIterations?: number;
}

export function createInitialState(question: string, options: InitialStateOptions = {}): AgentRunState {
  return {
    question,
    threadId: options.threadId?.trim() || generateThreadId(),
    toolPlan: [],
    executionStrategy: 'sequential',
    toolResults: {},
    observations: [],
    reactEnabled: options.reactEnabled ?? config.REACT_ENABLED,
    reactSteps: [],
    reactIteration: 0,
    reactMaxIterations: parseIterationCap(options.reactMaxIterations ?? config.REACT_MAX_ITERATIONS),
    reactScratchpad: '',
    steps: [],
    timeline: [],
    data: { tools: {}, toolErrors: [] },
    currentPhase: 'validation'
  };
}

export function recordStep(state: AgentRunState, phase: PhaseName, message: string, dataKeys?: string[]): void {
  state.currentPhase = phase;
  state.timeline.push({
    phase,
    message,
    timestamp: new Date().toISOString(),
    ...(dataKeys && dataKeys.length ? { dataKeys } : {})
  });
  state.steps.push(`[${phase}] ${message}`);
}

/**
 * The one sanctioned edit of an existing entry: the closing message of the
 * last timeline entry once the answer is known.
 */
export function setLastTimelineMessage(state: AgentRunState, message: string): void {
  const last = state.timeline[state.timeline.length - 1];
  if (!last) {
    return;
  }
  last.message = message;
  if (state.steps.length) {
    state.steps[state.steps.length - 1] = `[${last.phase}] ${message}`;
  }
}

export function spaced(name: string): string {
  return name.replace(/_/g, ' ');
}

const LEGACY_ALIASES: Readonly<Record<string, 'metrics' | 'bottleneck' | 'oee'>> = {
  get_production_metrics: 'metrics',
  find_bottleneck: 'bottleneck',
  calculate_oee: 'oee'
};

/** Stores tool output under `data.tools` and its well-known alias. */
export function storeToolData(state: AgentRunState, toolName: string, data: unknown): void {
  state.data.tools[toolName] = data;
  const alias = LEGACY_ALIASES[toolName];
  if (alias) {
    state.data[alias] = data;
  }
}

export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}
