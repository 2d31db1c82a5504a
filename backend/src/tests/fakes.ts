import type { AgentMessage } from '../../../shared/types.js';
import type { CompletionOptions, LlmClient } from '../llm/openaiClient.js';
import type { RunContext } from '../orchestrator/context.js';
import { getTracer } from '../orchestrator/telemetry.js';
import { PROMPT_NAMES, StaticPromptProvider, type PromptName } from '../prompts/promptProvider.js';
import {
  ToolRegistry,
  type ToolCallOptions,
  type ToolDescriptor,
  type ToolProvider
} from '../tools/registry.js';
import { ToolExecutionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export type Reply = string | Error | ((messages: AgentMessage[], call: number) => string | Error);

/** Every prompt's text is its own name, so fakes can route on it. */
export function namedPrompts(): StaticPromptProvider {
  const prompts: Partial<Record<PromptName, string>> = {};
  for (const name of PROMPT_NAMES) {
    prompts[name] = name;
  }
  return new StaticPromptProvider(prompts);
}

function promptOf(messages: AgentMessage[]): PromptName | undefined {
  const system = messages[0]?.content ?? '';
  return PROMPT_NAMES.find((name) => system === name || system.startsWith(`${name}\n`));
}

/**
 * LLM stand-in that answers per system prompt. Unscripted prompts fail the
 * call like a provider error would.
 */
export class ScriptedLlm implements LlmClient {
  readonly model = 'test-model';
  readonly calls: Array<{ prompt: PromptName | undefined; messages: AgentMessage[] }> = [];
  private readonly counts = new Map<PromptName | undefined, number>();

  constructor(private readonly replies: Partial<Record<PromptName, Reply>>) {}

  callsFor(prompt: PromptName) {
    return this.calls.filter((call) => call.prompt === prompt);
  }

  private reply(messages: AgentMessage[]): string {
    const prompt = promptOf(messages);
    this.calls.push({ prompt, messages });
    const call = this.counts.get(prompt) ?? 0;
    this.counts.set(prompt, call + 1);

    const scripted = prompt ? this.replies[prompt] : undefined;
    if (scripted === undefined) {
      throw new Error(`No scripted reply for ${prompt ?? 'unknown prompt'}`);
    }
    const value = typeof scripted === 'function' ? scripted(messages, call) : scripted;
    if (value instanceof Error) {
      throw value;
    }
    return value;
  }

  async complete(messages: AgentMessage[], _options: CompletionOptions): Promise<string> {
    return this.reply(messages);
  }

  async *stream(messages: AgentMessage[], _options: CompletionOptions): AsyncIterable<string> {
    const text = this.reply(messages);
    for (const part of text.split(/(?<= )/)) {
      yield part;
    }
  }
}

export type ToolHandler = (args: Record<string, unknown>, options: ToolCallOptions) => unknown;

export class FakeToolProvider implements ToolProvider {
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  connected = false;

  constructor(private readonly handlers: Record<string, ToolHandler>) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  descriptors(): ToolDescriptor[] {
    return Object.keys(this.handlers).map((name) => ({
      name,
      description: `${name} tool`,
      inputSchema: { type: 'object', properties: {} }
    }));
  }

  async list(): Promise<ToolDescriptor[]> {
    return this.descriptors();
  }

  async call(name: string, args: Record<string, unknown>, options: ToolCallOptions = {}): Promise<unknown> {
    this.calls.push({ name, args });
    const handler = this.handlers[name];
    if (!handler) {
      throw new ToolExecutionError(`Unknown tool ${name}`);
    }
    return handler(args, options);
  }
}

/** A call that only settles when its abort signal fires. */
export function hangingTool(): ToolHandler {
  return (_args, options) =>
    new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
}

export function makeContext(llm: LlmClient, provider: FakeToolProvider, overrides: Partial<RunContext> = {}): RunContext {
  return {
    llm,
    registry: new ToolRegistry(provider, provider.descriptors()),
    prompts: namedPrompts(),
    logger: createLogger({ level: 'silent' }),
    tracer: getTracer(),
    memoryContext: '',
    toolTimeoutMs: 1000,
    ...overrides
  };
}
