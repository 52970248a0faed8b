/**
 * OpenTelemetry Adapter Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  INVALID_SPAN_CONTEXT,
  ProxyTracerProvider,
  SpanStatusCode,
  createNoopMeter,
  metrics,
  trace,
  type Counter,
  type MeterProvider,
  type SpanStatus,
  type TracerProvider,
} from "@opentelemetry/api";
import { OtelRegistrationTracer } from "../../src/adapters/telemetry/tracer.js";
import { OtelRegistrationMetrics } from "../../src/adapters/telemetry/metrics.js";
import { RegistrationService } from "../../src/core/use-cases/registration.use-case.js";
import { UserRecord } from "../../src/core/domain/entities/user-record.js";
import type { StorageGateway } from "../../src/core/ports/storage-gateway.port.js";

interface RecordedSpan {
  name: string;
  attributes: Record<string, unknown>;
  statuses: SpanStatus[];
  exceptions: unknown[];
  ended: number;
}

const alice = UserRecord.create({ id: 1, name: "Alice", email: "alice@example.com" });
const noName = UserRecord.create({ id: 2, name: "", email: "bob@example.com" });
const dave = UserRecord.create({ id: 9, name: "Dave", email: "dave@example.com" });

describe("OpenTelemetry adapters", () => {
  let tracerNames: string[];
  let meterNames: string[];
  let counterNames: string[];
  let adds: string[];
  let spans: RecordedSpan[];

  beforeEach(() => {
    tracerNames = [];
    meterNames = [];
    counterNames = [];
    adds = [];
    spans = [];

    const tracer = new ProxyTracerProvider().getTracer("recording");
    vi.spyOn(tracer, "startSpan").mockImplementation((name: string) => {
      const span = trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
      const recorded: RecordedSpan = { name, attributes: {}, statuses: [], exceptions: [], ended: 0 };
      spans.push(recorded);

      vi.spyOn(span, "setAttribute").mockImplementation((key, value) => {
        recorded.attributes[key] = value;
        return span;
      });
      vi.spyOn(span, "setStatus").mockImplementation((status) => {
        recorded.statuses.push(status);
        return span;
      });
      vi.spyOn(span, "recordException").mockImplementation((exception) => {
        recorded.exceptions.push(exception);
      });
      vi.spyOn(span, "end").mockImplementation(() => {
        recorded.ended += 1;
      });
      return span;
    });
    const tracerProvider: TracerProvider = {
      getTracer: (name, version) => {
        tracerNames.push(`${name}@${version ?? ""}`);
        return tracer;
      },
    };

    const meter = createNoopMeter();
    vi.spyOn(meter, "createCounter").mockImplementation((name: string) => {
      counterNames.push(name);
      const counter: Counter = {
        add: () => {
          adds.push(name);
        },
      };
      return counter;
    });
    const meterProvider: MeterProvider = {
      getMeter: (name) => {
        meterNames.push(name);
        return meter;
      },
    };

    expect(trace.setGlobalTracerProvider(tracerProvider)).toBe(true);
    expect(metrics.setGlobalMeterProvider(meterProvider)).toBe(true);
  });

  afterEach(() => {
    trace.disable();
    metrics.disable();
    vi.restoreAllMocks();
  });

  const serviceWith = (storage: StorageGateway) =>
    new RegistrationService(storage, {
      tracer: new OtelRegistrationTracer(),
      metrics: new OtelRegistrationMetrics(),
    });

  it("should request the user-registration tracer", () => {
    new OtelRegistrationTracer();

    expect(tracerNames).toEqual(["user-registration@1.0.0"]);
  });

  it("should create one counter per outcome on the user-registration meter", () => {
    new OtelRegistrationMetrics();

    expect(meterNames).toEqual(["user-registration"]);
    expect(counterNames).toEqual([
      "registrations.succeeded",
      "registrations.rejected",
      "registrations.failed",
    ]);
  });

  it("should add to the counter matching each outcome", () => {
    const service = serviceWith({
      save: (record) => {
        if (record.id === 9) throw new Error("disk full");
      },
    });

    expect(service.register(alice)).toBe(true);
    expect(service.register(noName)).toBe(false);
    expect(() => service.register(dave)).toThrow("disk full");

    expect(adds).toEqual([
      "registrations.succeeded",
      "registrations.rejected",
      "registrations.failed",
    ]);
  });

  it("should end one registration.register span per call", () => {
    const service = serviceWith({ save: () => {} });

    service.register(alice);
    service.register(noName);

    expect(spans.map((s) => s.name)).toEqual(["registration.register", "registration.register"]);
    expect(spans.map((s) => s.ended)).toEqual([1, 1]);
    expect(spans[0]?.attributes).toEqual({ "user.id": 1, "registration.outcome": "succeeded" });
    expect(spans[1]?.attributes).toEqual({ "user.id": 2, "registration.outcome": "rejected" });
    expect(spans.flatMap((s) => s.statuses)).toEqual([]);
  });

  it("should mark the span ERROR when save throws", () => {
    const cause = new Error("disk full");
    const service = serviceWith({
      save: () => {
        throw cause;
      },
    });

    expect(() => service.register(alice)).toThrow("disk full");

    expect(spans).toHaveLength(1);
    expect(spans[0]?.statuses).toEqual([{ code: SpanStatusCode.ERROR, message: "disk full" }]);
    expect(spans[0]?.exceptions).toEqual([cause]);
    expect(spans[0]?.ended).toBe(1);
  });

  it("should mark the span ERROR when save throws a non-Error value", () => {
    const service = serviceWith({
      save: () => {
        throw "offline";
      },
    });

    expect(() => service.register(alice)).toThrow();

    expect(spans[0]?.statuses).toEqual([{ code: SpanStatusCode.ERROR, message: "offline" }]);
    expect(spans[0]?.exceptions).toEqual([]);
    expect(adds).toEqual(["registrations.failed"]);
  });
});
