export * from "./tracer.js";
export * from "./metrics.js";
