import type { AgentRunState, InputValidation } from '../../../shared/types.js';
import { completeJson, systemAndUser, type RunContext } from './context.js';
import { InputValidationReplySchema } from './schemas.js';
import { recordStep } from './state.js';

const VALIDATION_MAX_TOKENS = 300;

function passThrough(reason: string): InputValidation {
  return { status: 'valid', isSafe: true, isClear: true, isRelevant: true, reason };
}

/**
 * Safety, clarity and relevance check. Fails open: any failure lets the
 * question through as valid.
 */
export async function validateInput(state: AgentRunState, ctx: RunContext): Promise<void> {
  recordStep(state, 'validation', 'Validating input');

  const outcome = await completeJson(
    ctx,
    () => systemAndUser(ctx, 'input-validation-system', state.question),
    VALIDATION_MAX_TOKENS,
    'ValidationCallFailure'
  );

  if (outcome.degraded || !outcome.value) {
    if (outcome.kind === 'ResponseParseError') {
      state.inputValidation = passThrough('Validation skipped, proceeding with request');
    } else {
      state.inputValidation = passThrough(`Validation error: ${outcome.note ?? 'unknown error'}, proceeding anyway`);
      recordStep(state, 'validation', 'Validation completed with fallback');
      return;
    }
  } else {
    const reply = InputValidationReplySchema.parse(outcome.value);
    state.inputValidation = {
      status: reply.status,
      isSafe: reply.is_safe,
      isClear: reply.is_clear,
      isRelevant: reply.is_relevant,
      reason: reply.reason,
      ...(reply.suggested_clarification ? { suggestedClarification: reply.suggested_clarification } : {})
    };
  }

  const { status, reason } = state.inputValidation;
  if (status === 'valid') {
    recordStep(state, 'validation', 'Input validated successfully');
  } else if (status === 'needs_clarification') {
    recordStep(state, 'validation', `Clarification needed: ${reason}`);
  } else {
    recordStep(state, 'validation', `Input issue: ${reason}`);
  }
}
