/**
 * Telemetry Port
 *
 * Tracing and metrics hooks the use cases report through.
 */

export type RegistrationOutcome = "succeeded" | "rejected" | "failed";

export interface SpanLike {
  setAttribute(key: string, value: string | number | boolean): void;
  recordException(exception: Error): void;
  /** Marks the span failed; the message may come from a non-Error throw */
  setError(message: string): void;
  end(): void;
}

export interface RegistrationTracer {
  startSpan(name: string): SpanLike;
}

export interface RegistrationMetrics {
  recordOutcome(outcome: RegistrationOutcome): void;
}

// ============================================
// No-op Implementations
// ============================================

const noopSpan: SpanLike = {
  setAttribute: () => {},
  recordException: () => {},
  setError: () => {},
  end: () => {},
};

export const noopTracer: RegistrationTracer = {
  startSpan: () => noopSpan,
};

export const noopMetrics: RegistrationMetrics = {
  recordOutcome: () => {},
};
