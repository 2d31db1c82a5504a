import type { AgentRunState, OutputValidation } from '../../../shared/types.js';
import { isFinishAction } from './responseParser.js';
import { recordStep } from './state.js';

const UNFINISHED_PENALTY = 0.8;

/** Success ratio; no attempts at all counts as full confidence. */
export function successRatio(successes: number, total: number): number {
  return total === 0 ? 1 : successes / Math.max(total, 1);
}

function isSuccessfulObservation(observation: string): boolean {
  return observation.length > 0 && !observation.startsWith('Error:');
}

function validateReactRun(state: AgentRunState): OutputValidation {
  const actions = state.reactSteps.filter((step) => !isFinishAction(step.action));
  const successes = actions.filter((step) => isSuccessfulObservation(step.observation));
  const missingInfo = actions
    .filter((step) => !isSuccessfulObservation(step.observation))
    .map((step) => step.observation || `${step.action || 'unknown action'}: no observation`);
  const finished = state.reactSteps.some((step) => isFinishAction(step.action));

  let confidence = successRatio(successes.length, actions.length);
  const warnings: string[] = [];
  if (!finished) {
    confidence *= UNFINISHED_PENALTY;
    warnings.push('Agent reached max iterations without finishing');
  }

  const validation: OutputValidation = {
    isComplete: missingInfo.length === 0 && finished,
    isAccurate: true,
    isSafe: true,
    confidence,
    missingInfo,
    warnings
  };

  if (missingInfo.length) {
    recordStep(state, 'output_validation', `Partial data (${successes.length}/${actions.length} actions)`);
  } else {
    recordStep(state, 'output_validation', `ReAct completed (${state.reactSteps.length} steps)`);
  }
  return validation;
}

function validateToolResults(state: AgentRunState): OutputValidation {
  const results = Object.values(state.toolResults);
  const missingInfo: string[] = [];
  const warnings: string[] = [];
  let successes = 0;

  for (const result of results) {
    if (!result.success) {
      missingInfo.push(`${result.toolName} failed: ${result.error}`);
      continue;
    }
    successes += 1;
    if (result.data === null || result.data === undefined) {
      warnings.push(`${result.toolName} returned no data`);
    }
  }

  const validation: OutputValidation = {
    isComplete: missingInfo.length === 0,
    isAccurate: true,
    isSafe: true,
    confidence: successRatio(successes, results.length),
    missingInfo,
    warnings
  };

  if (missingInfo.length) {
    recordStep(state, 'output_validation', `Partial data (${successes}/${results.length} tools)`);
  } else {
    recordStep(state, 'output_validation', 'Results validated');
  }
  return validation;
}

/**
 * Rule-based check of the gathered data. The direct path (no plan, no
 * reasoning steps) is complete by definition and leaves no timeline entry.
 */
export function validateOutput(state: AgentRunState): void {
  if (state.reactSteps.length > 0) {
    recordStep(state, 'output_validation', 'Validating results');
    state.outputValidation = validateReactRun(state);
    return;
  }

  if (state.toolPlan.length === 0 && Object.keys(state.toolResults).length === 0) {
    state.currentPhase = 'output_validation';
    state.outputValidation = {
      isComplete: true,
      isAccurate: true,
      isSafe: true,
      confidence: 1,
      missingInfo: [],
      warnings: []
    };
    return;
  }

  recordStep(state, 'output_validation', 'Validating results');
  state.outputValidation = validateToolResults(state);
}
