import type { Tracer } from '@opentelemetry/api';
import type { AgentEvent, AgentRunState } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { OpenAIChatClient, type LlmClient } from '../llm/openaiClient.js';
import type { RunContext } from '../orchestrator/context.js';
import { executeGraph, runGraph } from '../orchestrator/index.js';
import { formatMemoryContext, persistTurn } from '../orchestrator/memory.js';
import { createInitialState, deepFreeze, parseIterationCap } from '../orchestrator/state.js';
import { streamSynthesis, synthesize } from '../orchestrator/synthesis.js';
import { getTracer, traced } from '../orchestrator/telemetry.js';
import { assertAvailable, FilePromptProvider, type PromptProvider } from '../prompts/promptProvider.js';
import { McpToolClient } from '../tools/mcpClient.js';
import { ToolRegistry, type ToolProvider } from '../tools/registry.js';
import { TOOL_ARG_SCHEMAS, type ToolArgsSchema } from '../tools/schemas.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { MemoryStore } from './memoryStore.js';

export interface ProductionAgentOptions {
  llm?: LlmClient;
  toolProvider?: ToolProvider;
  toolSchemas?: Readonly<Record<string, ToolArgsSchema>>;
  prompts?: PromptProvider;
  memory?: MemoryStore;
  logger?: Logger;
  tracer?: Tracer;
  reactEnabled?: boolean;
  reactMaxIterations?: number;
  toolTimeoutMs?: number;
  memoryContextLimit?: number;
}

interface PreparedRun {
  state: AgentRunState;
  ctx: RunContext;
}

/**
 * Answers one question per call. Runs share the LLM client, the tool
 * connection and the memory store; each gets its own state and context.
 */
export class ProductionAgent {
  private readonly llm: LlmClient;
  private readonly toolProvider: ToolProvider;
  private readonly toolSchemas: Readonly<Record<string, ToolArgsSchema>>;
  private readonly prompts: PromptProvider;
  private readonly memory: MemoryStore;
  private readonly logger: Logger;
  private readonly tracer: Tracer;
  private readonly reactEnabled: boolean;
  private readonly reactMaxIterations: number;
  private readonly toolTimeoutMs: number;
  private readonly memoryContextLimit: number;
  private registry: Promise<ToolRegistry> | null = null;

  constructor(options: ProductionAgentOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.llm = options.llm ?? new OpenAIChatClient();
    this.toolProvider = options.toolProvider ?? new McpToolClient({ logger: this.logger });
    this.toolSchemas = options.toolSchemas ?? TOOL_ARG_SCHEMAS;
    this.prompts = options.prompts ?? new FilePromptProvider();
    this.memory = options.memory ?? new MemoryStore({ logger: this.logger });
    this.tracer = options.tracer ?? getTracer();
    this.reactEnabled = options.reactEnabled ?? config.REACT_ENABLED;
    this.reactMaxIterations = parseIterationCap(options.reactMaxIterations ?? config.REACT_MAX_ITERATIONS);
    this.toolTimeoutMs = options.toolTimeoutMs ?? config.TOOL_TIMEOUT_MS;
    this.memoryContextLimit = options.memoryContextLimit ?? config.MEMORY_CONTEXT_LIMIT;

    assertAvailable(this.prompts);
  }

  private loadRegistry(): Promise<ToolRegistry> {
    if (!this.registry) {
      const pending = this.toolProvider
        .connect()
        .then(() => ToolRegistry.fromProvider(this.toolProvider, this.toolSchemas, this.logger));
      pending.catch(() => {
        this.registry = null;
      });
      this.registry = pending;
    }
    return this.registry;
  }

  private async prepare(question: string, threadId?: string): Promise<PreparedRun> {
    const registry = await this.loadRegistry();
    const state = createInitialState(question, {
      threadId,
      reactEnabled: this.reactEnabled,
      reactMaxIterations: this.reactMaxIterations
    });
    const logger = this.logger.child({ threadId: state.threadId });

    return {
      state,
      ctx: {
        llm: this.llm,
        registry,
        prompts: this.prompts,
        logger,
        tracer: this.tracer,
        memoryContext: formatMemoryContext(this.memory, state.threadId, this.memoryContextLimit, logger),
        toolTimeoutMs: this.toolTimeoutMs
      }
    };
  }

  private persist(state: AgentRunState, ctx: RunContext): Promise<void> {
    return persistTurn(
      { store: this.memory, llm: this.llm, prompts: this.prompts, logger: ctx.logger },
      state.threadId,
      state.question,
      state.data.answer
    );
  }

  async run(question: string, threadId?: string): Promise<Readonly<AgentRunState>> {
    const { state, ctx } = await this.prepare(question, threadId);

    return traced(
      'agent.run',
      async () => {
        await runGraph(state, ctx);
        await synthesize(state, ctx);
        await this.persist(state, ctx);
        ctx.logger.info({ steps: state.steps.length, confidence: state.outputValidation?.confidence }, 'Run complete');
        return deepFreeze(state);
      },
      { 'agent.thread_id': state.threadId, 'agent.mode': 'run' },
      this.tracer
    );
  }

  /**
   * Same pipeline as `run`, reported as events: new timeline entries after
   * each phase, then the answer deltas, then the frozen final state.
   */
  async *stream(question: string, threadId?: string): AsyncGenerator<AgentEvent> {
    const { state, ctx } = await this.prepare(question, threadId);
    let emitted = 0;

    for await (const step of executeGraph(state, ctx)) {
      const entries = state.timeline.slice(emitted).map((entry) => ({ ...entry }));
      emitted = state.timeline.length;
      if (entries.length) {
        yield { type: 'step', node: step.node, phase: entries[entries.length - 1]?.phase, entries };
      }
    }

    yield { type: 'answer_start' };
    for await (const chunk of streamSynthesis(state, ctx)) {
      yield { type: 'answer_chunk', chunk };
    }
    yield { type: 'answer_end' };

    await this.persist(state, ctx);
    ctx.logger.info({ steps: state.steps.length, confidence: state.outputValidation?.confidence }, 'Stream complete');
    yield { type: 'final', state: deepFreeze(state) };
  }

  async close(): Promise<void> {
    this.registry = null;
    await this.toolProvider.close();
    this.memory.close();
  }
}
