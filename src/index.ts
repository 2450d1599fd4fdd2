/**
 * @module knx-connect
 * @description Connection setup for KNX tools: option parsing, credential
 * resolution, keyring lookup, stream connection pooling and link selection.
 *
 * @example
 * ```ts
 * import {
 *   LinkFactory,
 *   ShutdownHandler,
 *   parseLinkOptions,
 *   processConnectionPool,
 *   processKeyringLookup,
 * } from "knx-connect";
 *
 * const options = parseLinkOptions(process.argv.slice(2));
 * const factory = new LinkFactory({
 *   drivers,
 *   keyrings: processKeyringLookup(loader),
 *   pool: processConnectionPool(drivers.connect),
 * });
 * factory.on("LINK_SELECTED", (e) => console.log(e.kind));
 *
 * const shutdown = new ShutdownHandler().register();
 * const { link } = await factory.newLink(options, shutdown.signal);
 * ```
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Codecs ─────────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Option Parsing ─────────────────────────────────────────────────
export * from "./options/index.js";

// ─── Node Backends ──────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { LinkFactory, MANAGEMENT_USER, selectLocalTransport } from "./link-factory.js";
export type { LinkFactoryConfig, LinkFactoryDependencies } from "./link-factory.js";

// ─── Process Lifetime ───────────────────────────────────────────────
export { processConnectionPool, processKeyringLookup } from "./process.js";
export { ShutdownHandler } from "./shutdown.js";
export type { SignalSource } from "./shutdown.js";
