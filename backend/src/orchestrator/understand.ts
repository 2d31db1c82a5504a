import type { AgentRunState, IntentAnalysis } from '../../../shared/types.js';
import { completeJson, systemAndUser, type RunContext } from './context.js';
import { IntentReplySchema } from './schemas.js';
import { recordStep } from './state.js';

const UNDERSTANDING_MAX_TOKENS = 400;
const GREETINGS = ['hi', 'hello', 'hey', 'good morning', 'good afternoon'];

/**
 * Intent used when the model cannot be consulted. Greeting detection is a
 * plain substring match, so "hi" inside "machine" counts too.
 */
export function heuristicIntent(question: string): IntentAnalysis {
  const lower = question.toLowerCase();
  const isGreeting = GREETINGS.some((greeting) => lower.includes(greeting));
  return {
    primaryIntent: isGreeting ? 'Greeting' : 'Production inquiry',
    entities: [],
    constraints: [],
    requiresLiveData: !isGreeting && question.length > 10,
    confidence: 0.7,
    summary: question
  };
}

export async function understandIntent(state: AgentRunState, ctx: RunContext): Promise<void> {
  recordStep(state, 'understanding', 'Analyzing intent');

  if (state.inputValidation?.status === 'invalid') {
    state.intent = {
      primaryIntent: 'Invalid request',
      entities: [],
      constraints: [],
      requiresLiveData: false,
      confidence: 0,
      summary: state.inputValidation.reason || 'Invalid input'
    };
    return;
  }

  const outcome = await completeJson(
    ctx,
    () => systemAndUser(ctx, 'understanding-system', state.question),
    UNDERSTANDING_MAX_TOKENS,
    'UnderstandingCallFailure'
  );

  const reply = outcome.value ? IntentReplySchema.safeParse(outcome.value) : null;
  if (reply?.success) {
    state.intent = {
      primaryIntent: reply.data.primary_intent,
      entities: reply.data.entities,
      constraints: reply.data.constraints,
      requiresLiveData: reply.data.requires_live_data,
      confidence: reply.data.confidence,
      summary: reply.data.summary ?? state.question
    };
  } else {
    ctx.logger.debug({ note: outcome.note }, 'Intent analysis fell back to heuristic');
    state.intent = heuristicIntent(state.question);
  }

  recordStep(state, 'understanding', `Intent: ${state.intent.primaryIntent.slice(0, 50)}`);
}
