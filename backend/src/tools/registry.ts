import type { Logger } from '../utils/logger.js';
import { TOOL_ARG_SCHEMAS, formatIssues, type ToolArgsSchema } from './schemas.js';

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallOptions {
  signal?: AbortSignal;
}

/**
 * Source of callable tools. `call` resolves with the tool's decoded payload
 * and rejects when the tool reports an error.
 */
export interface ToolProvider {
  connect(): Promise<void>;
  close(): Promise<void>;
  list(): Promise<ToolDescriptor[]>;
  call(name: string, args: Record<string, unknown>, options?: ToolCallOptions): Promise<unknown>;
}

export type ArgValidation =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; error: string };

interface RegisteredTool {
  descriptor: ToolDescriptor;
  schema: ToolArgsSchema;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(
    readonly provider: ToolProvider,
    descriptors: ToolDescriptor[],
    schemas: Readonly<Record<string, ToolArgsSchema>> = TOOL_ARG_SCHEMAS,
    logger?: Logger
  ) {
    for (const descriptor of descriptors) {
      const schema = schemas[descriptor.name];
      if (!schema) {
        logger?.warn({ tool: descriptor.name }, 'Tool has no argument schema; excluded from registry');
        continue;
      }
      this.tools.set(descriptor.name, { descriptor, schema });
    }
  }

  /**
   * Registers every tool the provider lists that also has an argument schema.
   */
  static async fromProvider(
    provider: ToolProvider,
    schemas: Readonly<Record<string, ToolArgsSchema>> = TOOL_ARG_SCHEMAS,
    logger?: Logger
  ): Promise<ToolRegistry> {
    const descriptors = await provider.list();
    return new ToolRegistry(provider, descriptors, schemas, logger);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  descriptors(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }

  validate(name: string, args: unknown): ArgValidation {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, error: `Unknown tool: ${name}` };
    }

    const parsed = tool.schema.safeParse(args ?? {});
    if (!parsed.success) {
      return { ok: false, error: formatIssues(parsed.error) };
    }
    return { ok: true, args: parsed.data };
  }
}
