import type { AgentMessage, AgentRunState, ReActStep, ToolResult } from '../../../shared/types.js';
import type { ToolDescriptor } from '../tools/registry.js';
import type { PromptProvider } from './promptProvider.js';

const TRACE_OBSERVATION_LIMIT = 500;

export function withMemoryContext(system: string, memoryContext: string): string {
  return memoryContext ? `${system}\n\nConversation context:\n${memoryContext}` : system;
}

function toolArguments(descriptor: ToolDescriptor): unknown {
  const properties = descriptor.inputSchema.properties;
  return typeof properties === 'object' && properties !== null ? properties : {};
}

export function formatToolList(tools: ToolDescriptor[]): string {
  if (!tools.length) {
    return '(no tools available)';
  }
  return tools
    .map((tool) => {
      const args = JSON.stringify(toolArguments(tool));
      return `- ${tool.name}: ${tool.description || 'No description'}\n  Arguments: ${args === '{}' ? 'none' : args}`;
    })
    .join('\n');
}

export function buildReactReasoningMessages(
  prompts: PromptProvider,
  question: string,
  tools: ToolDescriptor[],
  scratchpad: string,
  memoryContext: string
): AgentMessage[] {
  const user = [
    `Question: ${question}`,
    '',
    'Available tools:',
    formatToolList(tools),
    '',
    'Previous steps:',
    scratchpad || 'None yet.',
    '',
    'Write the next Thought, Action and Action Input.'
  ].join('\n');

  return [
    { role: 'system', content: withMemoryContext(prompts.get('react-reasoning-system'), memoryContext) },
    { role: 'user', content: user }
  ];
}

function serializeToolResult(result: ToolResult) {
  return {
    tool_name: result.toolName,
    success: result.success,
    data: result.data,
    error: result.error,
    execution_time_ms: Math.round(result.executionTimeMs)
  };
}

function serializeTraceStep(step: ReActStep) {
  return {
    iteration: step.iteration,
    thought: step.thought,
    action: step.action,
    action_input: step.actionInput,
    observation: step.observation.slice(0, TRACE_OBSERVATION_LIMIT)
  };
}

export function usesDirectTemplate(state: AgentRunState): boolean {
  return (
    state.toolPlan.length === 0 &&
    Object.keys(state.toolResults).length === 0 &&
    Object.keys(state.data.tools).length === 0
  );
}

/**
 * Final-answer messages: a conversational template when no data was
 * gathered, otherwise a JSON context of everything the run collected.
 */
export function buildSynthesisMessages(
  prompts: PromptProvider,
  state: AgentRunState,
  memoryContext: string
): AgentMessage[] {
  if (usesDirectTemplate(state)) {
    return [
      { role: 'system', content: withMemoryContext(prompts.get('synthesis-direct-system'), memoryContext) },
      { role: 'user', content: state.question }
    ];
  }

  const validation = state.outputValidation;
  const context: Record<string, unknown> = {
    question: state.question,
    intent_summary: state.intent?.summary ?? '',
    primary_intent: state.intent?.primaryIntent ?? '',
    tool_results: Object.fromEntries(
      Object.entries(state.toolResults).map(([name, result]) => [name, serializeToolResult(result)])
    ),
    observations: state.observations,
    validation: {
      confidence: validation?.confidence ?? 1,
      warnings: validation?.warnings ?? [],
      missing_info: validation?.missingInfo ?? []
    },
    errors: state.data.toolErrors
  };

  if (state.reactSteps.length) {
    context.react_trace = state.reactSteps.map(serializeTraceStep);
  }

  return [
    { role: 'system', content: withMemoryContext(prompts.get('synthesis-data-system'), memoryContext) },
    { role: 'user', content: JSON.stringify(context, null, 2) }
  ];
}
