import type { AgentRunState, ToolPlanItem } from '../../../shared/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { completeJson, systemAndUser, type RunContext } from './context.js';
import { PlanItemSchema, PlanReplySchema } from './schemas.js';
import { recordStep, spaced } from './state.js';

const PLANNING_MAX_TOKENS = 500;

/** Keeps well-formed entries naming a registered tool; others are dropped. */
export function sanitizePlan(items: unknown[], registry: ToolRegistry): ToolPlanItem[] {
  return items.flatMap((item, index) => {
    const parsed = PlanItemSchema.safeParse(item);
    if (!parsed.success || !registry.has(parsed.data.name)) {
      return [];
    }
    return [
      {
        name: parsed.data.name,
        args: parsed.data.args,
        purpose: parsed.data.purpose,
        priority: parsed.data.priority ?? index + 1
      }
    ];
  });
}

export async function createPlan(state: AgentRunState, ctx: RunContext): Promise<void> {
  recordStep(state, 'planning', 'Creating execution plan');

  if (!state.intent?.requiresLiveData) {
    state.toolPlan = [];
    state.executionStrategy = 'direct';
    recordStep(state, 'planning', 'Direct response path (no tools needed)');
    return;
  }

  const intent = state.intent;
  const outcome = await completeJson(
    ctx,
    () =>
      systemAndUser(
        ctx,
        'planning-system',
        JSON.stringify(
          {
            question: state.question,
            intent_analysis: {
              primary_intent: intent.primaryIntent,
              entities: intent.entities,
              constraints: intent.constraints,
              requires_live_data: intent.requiresLiveData,
              confidence: intent.confidence,
              summary: intent.summary
            }
          },
          null,
          2
        )
      ),
    PLANNING_MAX_TOKENS,
    'PlanningCallFailure'
  );

  if (outcome.degraded && outcome.kind === 'PlanningCallFailure') {
    state.toolPlan = [];
    state.executionStrategy = 'direct';
    state.data.planningError = outcome.note ?? 'Planning unavailable';
    recordStep(state, 'planning', 'Using direct response (planning unavailable)');
    return;
  }

  const reply = PlanReplySchema.parse(outcome.value ?? {});
  state.toolPlan = sanitizePlan(reply.tool_plan, ctx.registry);
  state.executionStrategy = reply.execution_strategy;

  if (state.toolPlan.length) {
    recordStep(state, 'planning', `Plan: ${state.toolPlan.map((item) => spaced(item.name)).join(', ')}`);
  } else {
    recordStep(state, 'planning', 'No tools required');
  }
}
