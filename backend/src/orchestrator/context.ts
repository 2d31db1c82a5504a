import type { Tracer } from '@opentelemetry/api';
import type { AgentMessage } from '../../../shared/types.js';
import type { LlmClient } from '../llm/openaiClient.js';
import { withMemoryContext } from '../prompts/builders.js';
import type { PromptName, PromptProvider } from '../prompts/promptProvider.js';
import type { ToolRegistry } from '../tools/registry.js';
import { degraded, isProviderUnavailable, ok, type AgentErrorKind, type PhaseOutcome } from '../utils/errors.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import { extractJsonObject } from './responseParser.js';

/**
 * Everything a phase needs besides the run state. Built once per run.
 */
export interface RunContext {
  llm: LlmClient;
  registry: ToolRegistry;
  prompts: PromptProvider;
  logger: Logger;
  tracer: Tracer;
  memoryContext: string;
  toolTimeoutMs: number;
}

/**
 * Builds `[system, user]` messages from a named prompt. Prompt lookup errors
 * surface to the caller like any other call failure.
 */
export function systemAndUser(
  ctx: RunContext,
  prompt: PromptName,
  user: string,
  includeMemory = true
): AgentMessage[] {
  const system = ctx.prompts.get(prompt);
  return [
    { role: 'system', content: includeMemory ? withMemoryContext(system, ctx.memoryContext) : system },
    { role: 'user', content: user }
  ];
}

/**
 * One completion whose failure degrades instead of throwing. Provider
 * unavailability is rethrown.
 */
export async function completeText(
  ctx: RunContext,
  buildMessages: () => AgentMessage[],
  maxTokens: number,
  failureKind: AgentErrorKind
): Promise<PhaseOutcome<string | null>> {
  try {
    const text = await ctx.llm.complete(buildMessages(), { maxTokens });
    return ok(text);
  } catch (error) {
    if (isProviderUnavailable(error)) {
      throw error;
    }
    ctx.logger.warn({ err: error, kind: failureKind }, 'LLM call failed; using fallback');
    return degraded(null, failureKind, errorMessage(error));
  }
}

/**
 * Completion parsed as one JSON object. Call failures carry `failureKind`,
 * unparseable replies carry `ResponseParseError`.
 */
export async function completeJson(
  ctx: RunContext,
  buildMessages: () => AgentMessage[],
  maxTokens: number,
  failureKind: AgentErrorKind
): Promise<PhaseOutcome<Record<string, unknown> | null>> {
  const outcome = await completeText(ctx, buildMessages, maxTokens, failureKind);
  if (outcome.degraded || outcome.value === null) {
    return degraded(null, outcome.kind ?? failureKind, outcome.note ?? 'No response');
  }

  const extracted = extractJsonObject(outcome.value);
  if (!extracted.ok) {
    ctx.logger.debug({ raw: extracted.raw }, 'Unparseable JSON reply');
    return degraded(null, 'ResponseParseError', extracted.error);
  }
  return ok(extracted.value);
}
