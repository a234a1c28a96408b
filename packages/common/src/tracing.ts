import { trace, SpanStatusCode, type Span, type Tracer } from "@opentelemetry/api";

export interface Tracing {
  initTracing(): Promise<void>;
  getTracer(): Tracer;
  /** Run `fn` inside a span, recording OK/ERROR status. */
  withSpan<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T>;
  /** Reset internal state (for tests only). */
  _resetTracing(): void;
}

export function createTracing(serviceName: string): Tracing {
  let sdkStarted = false;

  /**
   * Initialises the OpenTelemetry SDK.
   * No-op unless OTEL_ENABLED=true.
   */
  async function initTracing(): Promise<void> {
    if (process.env.OTEL_ENABLED !== "true") return;
    if (sdkStarted) return;

    const { NodeSDK } = await import("@opentelemetry/sdk-node");
    const { getNodeAutoInstrumentations } = await import(
      "@opentelemetry/auto-instrumentations-node"
    );
    const { OTLPTraceExporter } = await import(
      "@opentelemetry/exporter-trace-otlp-http"
    );

    const endpoint =
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";

    const sdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
      instrumentations: [getNodeAutoInstrumentations()],
    });

    sdk.start();
    sdkStarted = true;
  }

  /**
   * Returns a tracer for this service.
   * When no SDK is registered all spans are no-ops.
   */
  function getTracer(): Tracer {
    return trace.getTracer(serviceName);
  }

  async function withSpan<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    const span = getTracer().startSpan(name);
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
      throw error;
    } finally {
      span.end();
    }
  }

  function _resetTracing(): void {
    sdkStarted = false;
  }

  return { initTracing, getTracer, withSpan, _resetTracing };
}
