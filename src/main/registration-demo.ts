/**
 * Registration Demo
 *
 * Wires the console gateway into the registration service and reports the
 * outcome for a single record.
 */

import { ConsoleStorageGateway } from "../adapters/storage/console-storage.gateway.js";
import { OtelRegistrationMetrics } from "../adapters/telemetry/metrics.js";
import { OtelRegistrationTracer } from "../adapters/telemetry/tracer.js";
import type { UserRecord } from "../core/domain/entities/user-record.js";
import type { OutputSink } from "../core/ports/output-sink.port.js";
import { consoleSink } from "../adapters/storage/console-sink.js";
import type { StorageGateway } from "../core/ports/storage-gateway.port.js";
import { RegistrationService } from "../core/use-cases/registration.use-case.js";

export const REGISTRATION_SUCCEEDED = "User registered successfully!";
export const REGISTRATION_FAILED = "User registration failed.";

export interface RegistrationDemoOptions {
  sink?: OutputSink;
  /** Defaults to a ConsoleStorageGateway writing to the same sink */
  storage?: StorageGateway;
}

export function runRegistrationDemo(
  record: UserRecord,
  options: RegistrationDemoOptions = {},
): boolean {
  const sink = options.sink ?? consoleSink;
  const storage = options.storage ?? new ConsoleStorageGateway({ sink });
  const service = new RegistrationService(storage, {
    tracer: new OtelRegistrationTracer(),
    metrics: new OtelRegistrationMetrics(),
  });

  const ok = service.register(record);
  sink.writeLine(ok ? REGISTRATION_SUCCEEDED : REGISTRATION_FAILED);
  return ok;
}
