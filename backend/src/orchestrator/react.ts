import type { AgentRunState, ReActStep } from '../../../shared/types.js';
import { buildReactReasoningMessages } from '../prompts/builders.js';
import type { AgentErrorKind } from '../utils/errors.js';
import { completeText, type RunContext } from './context.js';
import { runTool } from './dispatch.js';
import { formatReactScratchpad, isFinishAction, parseReactResponse, type ParsedReactResponse } from './responseParser.js';
import { recordStep } from './state.js';

const REASONING_MAX_TOKENS = 600;
const THOUGHT_PREVIEW_CHARS = 80;

export function formatObservation(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  return JSON.stringify(data, null, 2) ?? 'null';
}

function finalAnswerText(actionInput: Record<string, unknown>): string {
  const answer = actionInput.answer ?? actionInput.raw;
  if (answer === undefined || answer === null) {
    return '';
  }
  return typeof answer === 'string' ? answer : JSON.stringify(answer);
}

/**
 * One reasoning turn: asks the model for the next Thought / Action pair and
 * appends it as a new step. A failed call still produces a step so the loop
 * advances toward the iteration cap.
 */
export async function reactReasoning(state: AgentRunState, ctx: RunContext): Promise<void> {
  const iteration = state.reactIteration + 1;
  recordStep(state, 'react_reasoning', `ReAct iteration ${iteration}/${state.reactMaxIterations}`);

  const outcome = await completeText(
    ctx,
    () =>
      buildReactReasoningMessages(
        ctx.prompts,
        state.question,
        ctx.registry.descriptors(),
        state.reactScratchpad,
        ctx.memoryContext
      ),
    REASONING_MAX_TOKENS,
    'ResponseParseError'
  );

  const parsed: ParsedReactResponse =
    outcome.value === null
      ? {
          thought: '',
          action: '',
          actionInput: {},
          parseError: `Reasoning call failed: ${outcome.note ?? 'no response'}`
        }
      : parseReactResponse(outcome.value);

  const step: ReActStep = {
    iteration,
    thought: parsed.thought,
    action: parsed.action,
    actionInput: parsed.actionInput,
    observation: '',
    ...(parsed.parseError ? { parseError: parsed.parseError } : {})
  };

  state.reactSteps.push(step);
  state.reactIteration = iteration;
  state.reactScratchpad = formatReactScratchpad(state.reactSteps);

  if (parsed.parseError) {
    ctx.logger.debug({ iteration, parseError: parsed.parseError }, 'ReAct reply was not fully parseable');
  }

  recordStep(
    state,
    'react_reasoning',
    `Thought: ${parsed.thought.slice(0, THOUGHT_PREVIEW_CHARS)}... → Action: ${parsed.action}`
  );
}

async function observe(state: AgentRunState, ctx: RunContext, step: ReActStep): Promise<string> {
  const action = step.action.trim().toLowerCase();

  if (isFinishAction(action)) {
    recordStep(state, 'react_action', 'Agent decided to finish');
    return `Final Answer: ${finalAnswerText(step.actionInput)}`;
  }

  if (!action) {
    recordStep(state, 'react_action', 'No action to execute');
    return `Error: No action could be read from the response (${step.parseError ?? 'empty reply'}). Reply with Thought, Action and Action Input.`;
  }

  recordStep(state, 'react_action', `Executing tool: ${action}`);

  if (!ctx.registry.has(action)) {
    ctx.logger.warn({ tool: action, kind: 'ToolNotFound' satisfies AgentErrorKind }, 'Model requested an unknown tool');
    recordStep(state, 'react_action', `Tool not found: ${action}`);
    return `Error: Tool '${action}' not found. Available tools: ${ctx.registry.names().join(', ')}`;
  }

  const validation = ctx.registry.validate(action, step.actionInput);
  if (!validation.ok) {
    ctx.logger.warn(
      { tool: action, error: validation.error, kind: 'ToolArgInvalid' satisfies AgentErrorKind },
      'Model sent invalid tool arguments'
    );
    recordStep(state, 'react_action', `Invalid arguments: ${validation.error}`);
    return `Error: Invalid arguments for ${action}: ${validation.error}`;
  }

  const result = await runTool(state, ctx, action, validation.args);
  if (result.success) {
    recordStep(state, 'react_action', `Tool ${action} executed successfully`, [action]);
    return formatObservation(result.data);
  }

  recordStep(state, 'react_action', `Tool ${action} failed: ${result.error}`);
  return `Error: ${result.error}`;
}

/**
 * Acts on the latest reasoning step and records what came back as its
 * observation.
 */
export async function reactAction(state: AgentRunState, ctx: RunContext): Promise<void> {
  const step = state.reactSteps[state.reactSteps.length - 1];
  if (!step) {
    return;
  }

  step.observation = await observe(state, ctx, step);
  state.reactScratchpad = formatReactScratchpad(state.reactSteps);
}
