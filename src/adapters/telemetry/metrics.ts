/**
 * OpenTelemetry Metrics
 *
 * One counter per registration outcome. Counters are no-ops until an SDK
 * registers a global meter provider.
 */

import { metrics, type Counter } from "@opentelemetry/api";
import type {
  RegistrationMetrics,
  RegistrationOutcome,
} from "../../core/ports/telemetry.port.js";

export const METER_NAME = "user-registration";

export class OtelRegistrationMetrics implements RegistrationMetrics {
  private readonly counters: Record<RegistrationOutcome, Counter>;

  constructor() {
    const meter = metrics.getMeter(METER_NAME);
    this.counters = {
      succeeded: meter.createCounter("registrations.succeeded", {
        description: "Records validated and handed to storage",
      }),
      rejected: meter.createCounter("registrations.rejected", {
        description: "Records with an empty name or email",
      }),
      failed: meter.createCounter("registrations.failed", {
        description: "Records whose save threw",
      }),
    };
  }

  recordOutcome(outcome: RegistrationOutcome): void {
    this.counters[outcome].add(1);
  }
}

/**
 * Counts outcomes in process (for testing/development)
 */
export class InMemoryRegistrationMetrics implements RegistrationMetrics {
  private counts: Record<RegistrationOutcome, number> = {
    succeeded: 0,
    rejected: 0,
    failed: 0,
  };

  recordOutcome(outcome: RegistrationOutcome): void {
    this.counts[outcome] += 1;
  }

  snapshot(): Readonly<Record<RegistrationOutcome, number>> {
    return { ...this.counts };
  }
}
