import type { AgentRunState, GraphNode } from '../../../shared/types.js';
import { isFinishAction } from './responseParser.js';

export type ExecutionPath = 'react_reasoning' | 'execute_plan' | 'validate_output';

export function routeAfterValidation(state: AgentRunState): 'understand_intent' | 'finalize' {
  return state.inputValidation?.status === 'invalid' ? 'finalize' : 'understand_intent';
}

export function selectExecutionPath(state: AgentRunState): ExecutionPath {
  if (state.reactEnabled && state.intent?.requiresLiveData && state.reactIteration < state.reactMaxIterations) {
    return 'react_reasoning';
  }
  if (state.toolPlan.length > 0) {
    return 'execute_plan';
  }
  return 'validate_output';
}

/**
 * Loop edge of the reasoning cycle. The iteration cap holds no matter what
 * the model replies.
 */
export function shouldContinueReact(state: AgentRunState): 'react_reasoning' | 'validate_output' {
  if (state.reactIteration >= state.reactMaxIterations) {
    return 'validate_output';
  }
  const last = state.reactSteps[state.reactSteps.length - 1];
  if (last && isFinishAction(last.action)) {
    return 'validate_output';
  }
  return 'react_reasoning';
}

/** Next node after `node`, or null once the graph is done. */
export function nextNode(node: GraphNode, state: AgentRunState): GraphNode | null {
  switch (node) {
    case 'validate_input':
      return routeAfterValidation(state);
    case 'understand_intent':
      return 'create_plan';
    case 'create_plan':
      return selectExecutionPath(state);
    case 'react_reasoning':
      return 'react_action';
    case 'react_action':
      return shouldContinueReact(state);
    case 'execute_plan':
      return 'validate_output';
    case 'validate_output':
      return 'finalize';
    case 'finalize':
      return null;
  }
}
