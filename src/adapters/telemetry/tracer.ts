/**
 * OpenTelemetry Tracer
 *
 * Provides tracing for registration operations. Spans are no-ops until an
 * SDK registers a global tracer provider.
 */

import { SpanStatusCode, trace, type Span } from "@opentelemetry/api";
import type {
  RegistrationTracer,
  SpanLike,
} from "../../core/ports/telemetry.port.js";

// ============================================
// Tracer Configuration
// ============================================

export const TRACER_NAME = "user-registration";
export const TRACER_VERSION = "1.0.0";

class OtelSpan implements SpanLike {
  constructor(private readonly span: Span) {}

  setAttribute(key: string, value: string | number | boolean): void {
    this.span.setAttribute(key, value);
  }

  recordException(exception: Error): void {
    this.span.recordException(exception);
  }

  setError(message: string): void {
    this.span.setStatus({ code: SpanStatusCode.ERROR, message });
  }

  end(): void {
    this.span.end();
  }
}

export class OtelRegistrationTracer implements RegistrationTracer {
  private readonly tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);

  startSpan(name: string): SpanLike {
    return new OtelSpan(this.tracer.startSpan(name));
  }
}

