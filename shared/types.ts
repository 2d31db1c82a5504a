export type Role = 'user' | 'assistant' | 'system';

export interface AgentMessage {
  role: Role;
  content: string;
}

export type ValidationStatus = 'valid' | 'invalid' | 'needs_clarification' | 'off_topic';

export interface InputValidation {
  status: ValidationStatus;
  isSafe: boolean;
  isClear: boolean;
  isRelevant: boolean;
  reason: string;
  suggestedClarification?: string;
}

export interface IntentEntity {
  type: string;
  value: string;
  context?: string;
}

export interface IntentAnalysis {
  primaryIntent: string;
  entities: IntentEntity[];
  constraints: string[];
  requiresLiveData: boolean;
  confidence: number;
  summary: string;
}

export interface ToolPlanItem {
  name: string;
  args: Record<string, unknown>;
  purpose: string;
  priority: number;
}

export type ExecutionStrategy = 'sequential' | 'parallel' | 'direct';

export interface ToolResult {
  toolName: string;
  success: boolean;
  data: unknown;
  error: string;
  executionTimeMs: number;
}

export interface ReActStep {
  iteration: number;
  thought: string;
  action: string;
  actionInput: Record<string, unknown>;
  observation: string;
  parseError?: string;
}

export interface OutputValidation {
  isComplete: boolean;
  isAccurate: boolean;
  isSafe: boolean;
  confidence: number;
  missingInfo: string[];
  warnings: string[];
}

export type PhaseName =
  | 'validation'
  | 'understanding'
  | 'planning'
  | 'react_reasoning'
  | 'react_action'
  | 'execution'
  | 'output_validation'
  | 'synthesis';

export interface TimelineEntry {
  phase: PhaseName;
  message: string;
  timestamp: string;
  dataKeys?: string[];
}

export interface ToolError {
  tool: string;
  error: string;
}

/**
 * Scratch data carried alongside the typed phase fields. `metrics`,
 * `bottleneck` and `oee` mirror well-known tools for downstream consumers.
 */
export interface RunData {
  tools: Record<string, unknown>;
  toolErrors: ToolError[];
  metrics?: unknown;
  bottleneck?: unknown;
  oee?: unknown;
  planningError?: string;
  answer?: string;
}

export interface AgentRunState {
  question: string;
  threadId: string;

  inputValidation?: InputValidation;
  intent?: IntentAnalysis;

  toolPlan: ToolPlanItem[];
  executionStrategy: ExecutionStrategy;

  toolResults: Record<string, ToolResult>;
  observations: string[];

  outputValidation?: OutputValidation;

  reactEnabled: boolean;
  reactSteps: ReActStep[];
  reactIteration: number;
  reactMaxIterations: number;
  reactScratchpad: string;

  steps: string[];
  timeline: TimelineEntry[];
  data: RunData;
  currentPhase: PhaseName;
}

export type GraphNode =
  | 'validate_input'
  | 'understand_intent'
  | 'create_plan'
  | 'react_reasoning'
  | 'react_action'
  | 'execute_plan'
  | 'validate_output'
  | 'finalize';

export type AgentEvent =
  | { type: 'step'; node: GraphNode; phase: PhaseName | undefined; entries: TimelineEntry[] }
  | { type: 'answer_start' }
  | { type: 'answer_chunk'; chunk: string }
  | { type: 'answer_end' }
  | { type: 'final'; state: Readonly<AgentRunState> };

export interface MemoryMessage {
  threadId: string;
  role: 'user' | 'assistant';
  content: string;
  createdAt: string;
}

export interface MemorySummary {
  threadId: string;
  summary: string;
  updatedAt: string;
}

export interface MemoryContext {
  summary: string | null;
  recent: Array<Pick<MemoryMessage, 'role' | 'content' | 'createdAt'>>;
}
