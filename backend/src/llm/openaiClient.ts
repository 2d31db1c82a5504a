import OpenAI, { APIConnectionError, AuthenticationError, PermissionDeniedError } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { AgentMessage } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { tokenLimitParams } from '../config/models.js';
import { ProviderUnavailableError } from '../utils/errors.js';

export interface CompletionOptions {
  maxTokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * Chat-completion backend used by every phase. `stream` yields text deltas
 * in arrival order.
 */
export interface LlmClient {
  readonly model: string;
  complete(messages: AgentMessage[], options: CompletionOptions): Promise<string>;
  stream(messages: AgentMessage[], options: CompletionOptions): AsyncIterable<string>;
}

export interface OpenAIChatClientOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
}

function toChatMessage(message: AgentMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

// Credentials and connectivity failures abort the run; everything else is
// left to the calling phase.
function mapProviderError(error: unknown): unknown {
  if (error instanceof APIConnectionError) {
    return new ProviderUnavailableError(`LLM provider unreachable: ${error.message}`, { cause: error });
  }
  if (error instanceof AuthenticationError || error instanceof PermissionDeniedError) {
    return new ProviderUnavailableError(`LLM provider rejected credentials: ${error.message}`, { cause: error });
  }
  return error;
}

export class OpenAIChatClient implements LlmClient {
  readonly model: string;
  private readonly temperature: number;
  private readonly apiKey: string | undefined;
  private readonly baseURL: string | undefined;
  private client: OpenAI | null = null;

  constructor(options: OpenAIChatClientOptions = {}) {
    this.model = options.model ?? config.OPENAI_MODEL;
    this.temperature = options.temperature ?? config.LLM_TEMPERATURE;
    this.apiKey = options.apiKey ?? config.OPENAI_API_KEY;
    this.baseURL = options.baseURL ?? config.OPENAI_BASE_URL;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }
    if (!this.apiKey) {
      throw new ProviderUnavailableError('OPENAI_API_KEY is not configured.');
    }
    this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseURL });
    return this.client;
  }

  async complete(messages: AgentMessage[], options: CompletionOptions): Promise<string> {
    const client = this.getClient();
    try {
      const completion = await client.chat.completions.create(
        {
          model: this.model,
          temperature: options.temperature ?? this.temperature,
          messages: messages.map(toChatMessage),
          ...tokenLimitParams(this.model, options.maxTokens)
        },
        { signal: options.signal }
      );
      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      throw mapProviderError(error);
    }
  }

  async *stream(messages: AgentMessage[], options: CompletionOptions): AsyncIterable<string> {
    const client = this.getClient();
    try {
      const stream = await client.chat.completions.create(
        {
          model: this.model,
          temperature: options.temperature ?? this.temperature,
          messages: messages.map(toChatMessage),
          stream: true,
          ...tokenLimitParams(this.model, options.maxTokens)
        },
        { signal: options.signal }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw mapProviderError(error);
    }
  }
}
