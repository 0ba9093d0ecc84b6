/**
 * Tracing initialization (optional)
 *
 * Enabled when TRACING_ENABLED=true. Exporters:
 *  - console (default): logs spans to stdout
 *  - memory: keeps finished spans for tests
 *  - none: initialize API no-op (explicit)
 *
 * OTLP/http exporter is added on top when OTLP_ENDPOINT is set.
 */
import { diag, DiagConsoleLogger, DiagLogLevel, trace, SpanStatusCode, type Span, type Tracer } from '@opentelemetry/api';
import { NodeTracerProvider, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-node';
import { ConsoleSpanExporter, InMemorySpanExporter, type ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { loadConfig } from './config.js';

const SERVICE_NAME = 'rollout-verifier';

let tracerProvider: NodeTracerProvider | undefined;
let memoryExporter: InMemorySpanExporter | undefined;

export function initTracing() {
  const cfg = loadConfig();
  if (tracerProvider || !cfg.tracingEnabled) return;
  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);
  tracerProvider = new NodeTracerProvider({
    resource: new Resource({
      'service.name': SERVICE_NAME
    })
  });
  if (cfg.tracingExporter === 'console') {
    tracerProvider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  } else if (cfg.tracingExporter === 'memory') {
    memoryExporter = new InMemorySpanExporter();
    tracerProvider.addSpanProcessor(new SimpleSpanProcessor(memoryExporter));
  }
  if (cfg.otlpEndpoint) {
    const exporter = new OTLPTraceExporter({
      url: cfg.otlpEndpoint,
      headers: Object.keys(cfg.otlpHeaders).length ? cfg.otlpHeaders : undefined,
      timeoutMillis: cfg.otlpTimeoutMs
    });
    tracerProvider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  }
  tracerProvider.register();
}

export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

export async function shutdownTracing() {
  if (!tracerProvider) return;
  const provider = tracerProvider;
  tracerProvider = undefined;
  memoryExporter = undefined;
  trace.disable();
  await provider.shutdown();
}

export async function withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
  const tracer = getTracer();
  return await tracer.startActiveSpan(name, async (span: Span) => {
    try {
      const res = await fn(span);
      span.end();
      return res;
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(e) });
      span.end();
      throw e;
    }
  });
}

// Test helper (only populated when TRACING_EXPORTER=memory)
export function getCollectedSpans(): ReadableSpan[] { return memoryExporter ? memoryExporter.getFinishedSpans() : []; }
export function resetCollectedSpans() { memoryExporter?.reset(); }
