import type { AgentRunState, GraphNode } from '../../../shared/types.js';
import type { RunContext } from './context.js';
import { executePlan } from './dispatch.js';
import { validateOutput } from './outputValidation.js';
import { createPlan } from './plan.js';
import { reactAction, reactReasoning } from './react.js';
import { nextNode } from './router.js';
import { recordStep } from './state.js';
import { traced } from './telemetry.js';
import { understandIntent } from './understand.js';
import { validateInput } from './validateInput.js';

export interface GraphStep {
  node: GraphNode;
  state: AgentRunState;
}

type NodeHandler = (state: AgentRunState, ctx: RunContext) => Promise<void> | void;

function finalize(state: AgentRunState): void {
  recordStep(state, 'synthesis', 'Preparing response');
}

const NODE_HANDLERS: Readonly<Record<GraphNode, NodeHandler>> = {
  validate_input: validateInput,
  understand_intent: understandIntent,
  create_plan: createPlan,
  react_reasoning: reactReasoning,
  react_action: reactAction,
  execute_plan: executePlan,
  validate_output: validateOutput,
  finalize
};

/**
 * Walks the phase graph from `validate_input` to `finalize`, yielding the
 * shared state after each node. Phases degrade on their own; only provider
 * unavailability propagates out of the generator.
 */
export async function* executeGraph(
  state: AgentRunState,
  ctx: RunContext,
  start: GraphNode = 'validate_input'
): AsyncGenerator<GraphStep, AgentRunState> {
  let node: GraphNode | null = start;

  while (node) {
    const current: GraphNode = node;
    const timelineBefore = state.timeline.length;

    await traced(
      `agent.${current}`,
      async (span) => {
        await NODE_HANDLERS[current](state, ctx);
        span.setAttribute('agent.timeline_entries', state.timeline.length - timelineBefore);
        if (current === 'react_reasoning' || current === 'react_action') {
          span.setAttribute('agent.react_iteration', state.reactIteration);
        }
      },
      { 'agent.thread_id': state.threadId, 'agent.node': current },
      ctx.tracer
    );

    ctx.logger.debug({ node: current, phase: state.currentPhase }, 'Phase complete');
    yield { node: current, state };
    node = nextNode(current, state);
  }

  return state;
}

/** Runs the graph to completion without observing intermediate steps. */
export async function runGraph(state: AgentRunState, ctx: RunContext): Promise<AgentRunState> {
  const steps = executeGraph(state, ctx);
  let result = await steps.next();
  while (!result.done) {
    result = await steps.next();
  }
  return result.value;
}
