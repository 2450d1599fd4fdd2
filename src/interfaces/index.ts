/**
 * @module interfaces
 * @description Public interface exports.
 */

export * from "./event-emitter.js";
export * from "./configuration.js";
export * from "./medium-settings.js";
export * from "./drivers.js";
export * from "./keyring.js";
export * from "./credential-resolver.js";
export * from "./connection-pool.js";
export * from "./network.js";
export * from "./link-factory.js";
