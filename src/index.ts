/**
 * @module user-registration
 * Public API: core layer plus the bundled adapters
 */

export * from "./core/index.js";
export * from "./adapters/index.js";
export * from "./main/registration-demo.js";
