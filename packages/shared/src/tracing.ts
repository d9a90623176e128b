/**
 * Tracing helpers over the OpenTelemetry API.
 *
 * This package never starts an SDK. When the host process registers one,
 * submission, polling and termination passes show up as spans; otherwise
 * every call here is a no-op.
 */
import { trace, SpanStatusCode, type Span, type Attributes } from '@opentelemetry/api';

const tracer = trace.getTracer('batchrun');

/**
 * Run `fn` inside an active span. Errors are recorded on the span and
 * rethrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      span.recordException(err);
      throw error;
    } finally {
      span.end();
    }
  });
}

/** Attach an event to the currently active span, if any. */
export function spanEvent(name: string, attributes?: Attributes): void {
  trace.getActiveSpan()?.addEvent(name, attributes);
}
