import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { config } from '../config/app.js';
import { ProviderUnavailableError, ToolExecutionError } from '../utils/errors.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import type { ToolCallOptions, ToolDescriptor, ToolProvider } from './registry.js';

export type McpTransportConfig =
  | { type: 'stdio'; command: string; args: string[] }
  | { type: 'http'; url: string };

export interface McpToolClientOptions {
  transport?: McpTransportConfig;
  connectTimeoutMs?: number;
  callTimeoutMs?: number;
  logger?: Logger;
}

export function transportFromConfig(): McpTransportConfig {
  if (config.MCP_TRANSPORT === 'http') {
    return { type: 'http', url: config.MCP_SERVER_URL };
  }
  return {
    type: 'stdio',
    command: config.MCP_SERVER_COMMAND,
    args: config.MCP_SERVER_ARGS.split(/\s+/).filter(Boolean)
  };
}

function createTransport(settings: McpTransportConfig): Transport {
  switch (settings.type) {
    case 'stdio':
      return new StdioClientTransport({ command: settings.command, args: settings.args });
    case 'http':
      return new StreamableHTTPClientTransport(new URL(settings.url));
  }
}

function decodeText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Tool provider backed by an MCP server. Text content that parses as JSON is
 * returned decoded, anything else as the raw string.
 */
export class McpToolClient implements ToolProvider {
  private client: Client | null = null;
  private readonly settings: McpTransportConfig;
  private readonly connectTimeoutMs: number;
  private readonly callTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: McpToolClientOptions = {}) {
    this.settings = options.transport ?? transportFromConfig();
    this.connectTimeoutMs = options.connectTimeoutMs ?? config.MCP_CONNECT_TIMEOUT_MS;
    this.callTimeoutMs = options.callTimeoutMs ?? config.TOOL_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const client = new Client({ name: config.PROJECT_NAME, version: '1.0.0' });
    client.onerror = (error) => {
      this.logger?.error({ err: error }, 'MCP client error');
    };

    try {
      await client.connect(createTransport(this.settings), { timeout: this.connectTimeoutMs });
    } catch (error) {
      throw new ProviderUnavailableError(`Unable to connect to MCP server: ${errorMessage(error)}`, {
        cause: error
      });
    }

    this.client = client;
    this.logger?.info({ transport: this.settings.type }, 'Connected to MCP server');
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.close();
    }
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new ProviderUnavailableError('MCP client is not connected.');
    }
    return this.client;
  }

  async list(): Promise<ToolDescriptor[]> {
    const client = this.requireClient();
    const result = await client.listTools(undefined, { timeout: this.connectTimeoutMs });
    return result.tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: { ...tool.inputSchema }
    }));
  }

  async call(name: string, args: Record<string, unknown>, options: ToolCallOptions = {}): Promise<unknown> {
    const client = this.requireClient();
    const raw = await client.callTool({ name, arguments: args }, undefined, {
      signal: options.signal,
      timeout: this.callTimeoutMs
    });
    const result = CallToolResultSchema.parse(raw);

    const text = result.content
      .flatMap((item) => (item.type === 'text' ? [item.text] : []))
      .join('\n');

    if (result.isError) {
      throw new ToolExecutionError(text || `Tool ${name} reported an error`);
    }

    return text ? decodeText(text) : result.content;
  }
}
