/**
 * @module core/domain
 * Domain layer: entities, value objects and errors
 */

export * from "./entities/user-record.js";
export * from "./errors/index.js";
export * from "./value-objects/registration-result.js";
