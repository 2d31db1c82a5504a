import type { AgentRunState, ToolResult } from '../../../shared/types.js';
import { invokeTool } from '../tools/invoke.js';
import type { AgentErrorKind } from '../utils/errors.js';
import type { RunContext } from './context.js';
import { recordStep, spaced, storeToolData } from './state.js';

/**
 * Invokes one validated tool call and files the result: `toolResults`, the
 * data maps on success, `toolErrors` on failure, plus an observation note.
 */
export async function runTool(
  state: AgentRunState,
  ctx: RunContext,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  const result = await invokeTool(ctx.registry, name, args, { timeoutMs: ctx.toolTimeoutMs, tracer: ctx.tracer });
  state.toolResults[name] = result;

  if (result.success) {
    storeToolData(state, name, result.data);
    state.observations.push(`${name}: Retrieved successfully`);
  } else {
    state.data.toolErrors.push({ tool: name, error: result.error });
    state.observations.push(`${name}: Error - ${result.error}`);
    ctx.logger.warn({ tool: name, error: result.error }, 'Tool call failed');
  }

  return result;
}

/**
 * Legacy executor: runs the committed plan one call at a time. Entries with
 * invalid arguments are skipped and the rest still run.
 */
export async function executePlan(state: AgentRunState, ctx: RunContext): Promise<void> {
  if (!state.toolPlan.length) {
    recordStep(state, 'execution', 'Skipped (direct response)');
    return;
  }

  recordStep(state, 'execution', `Executing ${state.toolPlan.length} tool(s)`);

  for (const item of state.toolPlan) {
    if (!item.name) {
      continue;
    }

    const validation = ctx.registry.validate(item.name, item.args);
    if (!validation.ok) {
      ctx.logger.warn(
        { tool: item.name, error: validation.error, kind: 'ToolArgInvalid' satisfies AgentErrorKind },
        'Skipping plan entry with invalid arguments'
      );
      state.observations.push(`Skipped ${item.name}: ${validation.error}`);
      recordStep(state, 'execution', `Skipped ${spaced(item.name)} (invalid args)`);
      continue;
    }

    recordStep(state, 'execution', `Calling ${spaced(item.name)}`);
    const result = await runTool(state, ctx, item.name, validation.args);

    if (result.success) {
      recordStep(state, 'execution', `Retrieved ${spaced(item.name)}`, [item.name]);
    } else {
      recordStep(state, 'execution', `Error retrieving ${spaced(item.name)}`);
    }
  }
}
