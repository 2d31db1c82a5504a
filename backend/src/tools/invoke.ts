import type { Tracer } from '@opentelemetry/api';
import { performance } from 'node:perf_hooks';
import type { ToolResult } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { traced } from '../orchestrator/telemetry.js';
import { ToolTimeoutError, isProviderUnavailable } from '../utils/errors.js';
import { errorMessage } from '../utils/logger.js';
import type { ToolRegistry } from './registry.js';

export interface InvokeOptions {
  timeoutMs?: number;
  /** Span source for the call; the process tracer when omitted. */
  tracer?: Tracer;
}

/**
 * Calls a registered tool with already-validated arguments. Failures,
 * timeouts included, come back as an unsuccessful result; only provider
 * unavailability is rethrown.
 */
export async function invokeTool(
  registry: ToolRegistry,
  name: string,
  args: Record<string, unknown>,
  options: InvokeOptions = {}
): Promise<ToolResult> {
  const timeoutMs = options.timeoutMs ?? config.TOOL_TIMEOUT_MS;
  const started = performance.now();

  return traced(
    'agent.tool',
    async (span) => {
      const controller = new AbortController();
      let timeoutId: NodeJS.Timeout | undefined;

      try {
        const data = await Promise.race([
          registry.provider.call(name, args, { signal: controller.signal }),
          new Promise<never>((_, reject) => {
            timeoutId = setTimeout(() => {
              controller.abort();
              reject(new ToolTimeoutError(name, timeoutMs));
            }, timeoutMs);
          })
        ]);

        span.setAttribute('tool.success', true);
        return {
          toolName: name,
          success: true,
          data,
          error: '',
          executionTimeMs: performance.now() - started
        };
      } catch (error) {
        if (isProviderUnavailable(error)) {
          throw error;
        }
        span.setAttribute('tool.success', false);
        return {
          toolName: name,
          success: false,
          data: null,
          error: errorMessage(error),
          executionTimeMs: performance.now() - started
        };
      } finally {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
      }
    },
    { 'tool.name': name, 'tool.timeout_ms': timeoutMs },
    options.tracer
  );
}
