/**
 * @module backends
 * @description Node.js backends for hashing and networking.
 */

export * from "./crypto-utils.js";
export * from "./node-network.js";
