import { trace, context, SpanStatusCode, type Attributes, type Span, type Tracer } from '@opentelemetry/api';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { config } from '../config/app.js';

let tracerInitialized = false;

function ensureTracer() {
  if (tracerInitialized) return;
  tracerInitialized = true;

  // Without a registered provider the API hands out no-op spans
  if (!config.ENABLE_TRACING) return;

  const endpoint = config.OTEL_EXPORTER_OTLP_ENDPOINT;
  const resource = new Resource({
    [SemanticResourceAttributes.SERVICE_NAME]: config.OTEL_SERVICE_NAME,
    [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: config.NODE_ENV
  });

  const provider = new NodeTracerProvider({ resource });

  if (endpoint) {
    provider.addSpanProcessor(new SimpleSpanProcessor(new OTLPTraceExporter({ url: endpoint })));
  } else {
    provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  provider.register();
}

export function getTracer(): Tracer {
  ensureTracer();
  return trace.getTracer('production-line-agent');
}

export async function traced<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: Attributes,
  tracer: Tracer = getTracer()
): Promise<T> {
  const span = tracer.startSpan(name, attributes ? { attributes } : undefined);
  try {
    return await context.with(trace.setSpan(context.active(), span), () => fn(span));
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    span.recordException(err);
    span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    throw error;
  } finally {
    span.end();
  }
}
