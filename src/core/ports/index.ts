/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./storage-gateway.port.js";
export * from "./output-sink.port.js";
export * from "./telemetry.port.js";
