import { trace, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'switchboard';

export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

export function startSpan(
  name: string,
  attributes?: Record<string, string | number | boolean>,
): Span {
  const span = getTracer().startSpan(name);
  if (attributes) {
    span.setAttributes(attributes);
  }
  return span;
}

export function endSpan(span: Span, error?: Error): void {
  if (error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    span.recordException(error);
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

export type { Span };
export { SpanStatusCode };
