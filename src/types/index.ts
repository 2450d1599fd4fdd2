/**
 * @module types
 * @description Public type exports.
 */

export * from "./branded.js";
export * from "./medium.js";
export * from "./options.js";
export * from "./keyring.js";
export * from "./link.js";
export * from "./events.js";
