export * from "./console-sink.js";
export * from "./console-storage.gateway.js";
export * from "./in-memory-storage.gateway.js";
