export type AgentErrorKind =
  | 'ValidationCallFailure'
  | 'UnderstandingCallFailure'
  | 'PlanningCallFailure'
  | 'ToolNotFound'
  | 'ToolArgInvalid'
  | 'ToolTimeout'
  | 'ToolExecutionError'
  | 'ResponseParseError'
  | 'SynthesisFailure'
  | 'MemoryPersistFailure'
  | 'ProviderUnavailable'
  | 'PromptUnavailable';

export class AgentError extends Error {
  readonly kind: AgentErrorKind;

  constructor(kind: AgentErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/**
 * No credentials or no connection to the completion or tool provider.
 * The only failure that aborts a run.
 */
export class ProviderUnavailableError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ProviderUnavailable', message, options);
  }
}

export class PromptUnavailableError extends AgentError {
  readonly promptName: string;

  constructor(promptName: string, options?: { cause?: unknown }) {
    super('PromptUnavailable', `Prompt '${promptName}' not found in prompt source.`, options);
    this.promptName = promptName;
  }
}

export class ToolTimeoutError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, timeoutMs: number) {
    super('ToolTimeout', `Tool call timed out after ${timeoutMs / 1000} seconds`);
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ToolExecutionError', message, options);
  }
}

export function isProviderUnavailable(error: unknown): error is ProviderUnavailableError {
  return error instanceof ProviderUnavailableError;
}

/**
 * Result of a fallible step inside a phase. `degraded` means `value` is a
 * fallback and `note` says why.
 */
export interface PhaseOutcome<T> {
  value: T;
  degraded: boolean;
  note?: string;
  kind?: AgentErrorKind;
}

export function ok<T>(value: T): PhaseOutcome<T> {
  return { value, degraded: false };
}

export function degraded<T>(value: T, kind: AgentErrorKind, note: string): PhaseOutcome<T> {
  return { value, degraded: true, kind, note };
}
