/**
 * @module adapters
 * Adapters for external systems (storage, telemetry)
 */

export * from "./storage/index.js";
export * from "./telemetry/index.js";
