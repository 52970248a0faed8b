/**
 * Registration Use Case
 *
 * Validates a user record and hands it to the storage gateway.
 * A record that fails validation never reaches storage.
 */

import type { UserRecord } from "../domain/entities/user-record.js";
import {
  StorageError,
  ValidationError,
  type UserField,
} from "../domain/errors/index.js";
import {
  registered,
  rejected,
  type RegistrationResult,
} from "../domain/value-objects/registration-result.js";
import type { StorageGateway } from "../ports/storage-gateway.port.js";
import {
  noopMetrics,
  noopTracer,
  type RegistrationMetrics,
  type RegistrationOutcome,
  type RegistrationTracer,
  type SpanLike,
} from "../ports/telemetry.port.js";

export interface RegistrationServiceOptions {
  metrics?: RegistrationMetrics;
  tracer?: RegistrationTracer;
}

export class RegistrationService {
  private readonly metrics: RegistrationMetrics;
  private readonly tracer: RegistrationTracer;

  constructor(
    private readonly storage: StorageGateway,
    options: RegistrationServiceOptions = {},
  ) {
    this.metrics = options.metrics ?? noopMetrics;
    this.tracer = options.tracer ?? noopTracer;
  }

  /**
   * Returns true once the record has been handed to storage.
   * Success is optimistic: a throwing gateway propagates, it is never
   * turned into `false`.
   */
  register(record: UserRecord): boolean {
    const span = this.openSpan(record);
    try {
      if (this.validate(record)) {
        this.finish(span, "rejected");
        return false;
      }

      // save() has no return value to inspect; success is assumed.
      this.storage.save(record);
      this.finish(span, "succeeded");
      return true;
    } catch (error) {
      if (error instanceof Error) span.recordException(error);
      span.setError(error instanceof Error ? error.message : String(error));
      this.finish(span, "failed");
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Like `register`, but reports storage failures as a result instead of
   * throwing.
   */
  registerWithResult(record: UserRecord): RegistrationResult {
    const span = this.openSpan(record);
    try {
      const invalid = this.validate(record);
      if (invalid) {
        this.finish(span, "rejected");
        return rejected(invalid);
      }

      try {
        this.storage.save(record);
      } catch (cause) {
        const error = new StorageError(record.id, cause);
        console.error(`[RegistrationService] ${error.message}`);
        span.recordException(error);
        span.setError(error.message);
        this.finish(span, "failed");
        return rejected(error);
      }

      this.finish(span, "succeeded");
      return registered(record);
    } finally {
      span.end();
    }
  }

  /**
   * Both name and email must be non-empty. No format checks.
   */
  validate(record: UserRecord): ValidationError | undefined {
    const empty: UserField[] = [];
    if (!record.hasName()) empty.push("name");
    if (!record.hasEmail()) empty.push("email");

    return empty.length > 0 ? new ValidationError(empty) : undefined;
  }

  private openSpan(record: UserRecord): SpanLike {
    const span = this.tracer.startSpan("registration.register");
    span.setAttribute("user.id", record.id);
    return span;
  }

  private finish(span: SpanLike, outcome: RegistrationOutcome): void {
    span.setAttribute("registration.outcome", outcome);
    this.metrics.recordOutcome(outcome);
  }
}
