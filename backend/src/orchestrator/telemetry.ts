import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Tracer } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { BatchSpanProcessor, ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { config } from '../config/app.js';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('telemetry');

let provider: NodeTracerProvider | null = null;

/**
 * Registers the global tracer provider once. Spans are exported over OTLP when
 * an endpoint is configured and to stdout when console tracing is on; with
 * neither, spans are still created (for `annotateActiveSpan`) but go nowhere.
 */
function ensureProvider(): NodeTracerProvider {
  if (provider) {
    return provider;
  }

  const created = new NodeTracerProvider({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: config.OTEL_SERVICE_NAME,
      'deployment.environment': config.NODE_ENV
    })
  });

  if (config.OTEL_EXPORTER_OTLP_ENDPOINT) {
    created.addSpanProcessor(new BatchSpanProcessor(new OTLPTraceExporter({ url: config.OTEL_EXPORTER_OTLP_ENDPOINT })));
  }
  if (config.ENABLE_CONSOLE_TRACING) {
    created.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  created.register();
  provider = created;
  return created;
}

export function getTracer(): Tracer {
  return ensureProvider().getTracer(config.OTEL_SERVICE_NAME);
}

/** Runs `fn` inside an active span named `name`; a thrown error marks the span failed. */
export function traced<T>(name: string, fn: () => Promise<T>, attributes: Attributes = {}): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message: error instanceof Error ? error.message : String(error) });
      throw error;
    } finally {
      span.end();
    }
  });
}

/** Sets attributes on the span that is active inside a `traced` callback. */
export function annotateActiveSpan(attributes: Attributes) {
  trace.getActiveSpan()?.setAttributes(attributes);
}

/** Flushes pending spans and releases exporters. Safe to call when tracing never started. */
export async function shutdownTelemetry(): Promise<void> {
  if (!provider) {
    return;
  }
  const current = provider;
  provider = null;
  try {
    await current.shutdown();
  } catch (error) {
    log.warn({ err: error }, 'tracer provider shutdown failed');
  }
}
