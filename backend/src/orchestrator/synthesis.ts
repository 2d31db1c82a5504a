import type { AgentMessage, AgentRunState } from '../../../shared/types.js';
import { buildSynthesisMessages } from '../prompts/builders.js';
import { isProviderUnavailable, type AgentErrorKind } from '../utils/errors.js';
import { errorMessage } from '../utils/logger.js';
import type { RunContext } from './context.js';
import { setLastTimelineMessage } from './state.js';
import { traced } from './telemetry.js';

export const EMPTY_ANSWER_FALLBACK = 'Happy to help. Could you share a bit more detail?';
const SYNTHESIS_MAX_TOKENS = 800;

function failureAnswer(state: AgentRunState, ctx: RunContext, error: unknown): string {
  if (isProviderUnavailable(error)) {
    throw error;
  }
  ctx.logger.error({ err: error, kind: 'SynthesisFailure' satisfies AgentErrorKind }, 'Synthesis failed');
  setLastTimelineMessage(state, 'Response failed');
  return `Unable to generate response: ${errorMessage(error)}`;
}

function messagesFor(state: AgentRunState, ctx: RunContext): AgentMessage[] {
  return buildSynthesisMessages(ctx.prompts, state, ctx.memoryContext);
}

/** Produces the complete answer and stores it on `state.data.answer`. */
export async function synthesize(state: AgentRunState, ctx: RunContext): Promise<string> {
  return traced(
    'agent.synthesis',
    async (span) => {
      let answer: string;
      try {
        const text = await ctx.llm.complete(messagesFor(state, ctx), { maxTokens: SYNTHESIS_MAX_TOKENS });
        answer = text.trim() ? text : EMPTY_ANSWER_FALLBACK;
        setLastTimelineMessage(state, 'Response complete');
      } catch (error) {
        answer = failureAnswer(state, ctx, error);
      }
      span.setAttribute('agent.answer_length', answer.length);
      state.data.answer = answer;
      return answer;
    },
    { 'agent.thread_id': state.threadId, 'agent.streaming': false },
    ctx.tracer
  );
}

/**
 * Streams the answer as ordered deltas. Whitespace-only deltas are held back
 * until real text arrives, so a blank reply streams as the fallback alone.
 * A failure after some deltas were sent is reported as one more delta
 * holding the error text.
 */
export async function* streamSynthesis(state: AgentRunState, ctx: RunContext): AsyncGenerator<string, string> {
  let answer = '';
  let held = '';
  try {
    for await (const chunk of ctx.llm.stream(messagesFor(state, ctx), { maxTokens: SYNTHESIS_MAX_TOKENS })) {
      answer += chunk;
      held += chunk;
      if (answer.trim()) {
        yield held;
        held = '';
      }
    }
    if (!answer.trim()) {
      answer = EMPTY_ANSWER_FALLBACK;
      yield answer;
    }
    setLastTimelineMessage(state, 'Response complete');
  } catch (error) {
    const message = failureAnswer(state, ctx, error);
    answer = message;
    yield message;
  }

  state.data.answer = answer;
  return answer;
}
