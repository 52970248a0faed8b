/**
 * @module core/use-cases
 * Application use cases (orchestration layer)
 */

export * from "./registration.use-case.js";
