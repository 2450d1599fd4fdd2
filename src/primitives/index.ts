/**
 * @module primitives
 * @description Implementations of the link setup primitives plus the
 * base event emitter.
 */

export { KnxEmitter, timestamp } from "./base-emitter.js";
export { Mutex } from "./mutex.js";
export { raceAbort } from "./abort.js";
export { MediumSettings } from "./medium-settings.js";
export { CredentialResolver } from "./credential-resolver.js";
export { KeyringLookup } from "./keyring-lookup.js";
export type { KeyringLookupConfig } from "./keyring-lookup.js";
export { SecurityInstallation } from "./security-installation.js";
export { ConnectionPool, endpointKey } from "./connection-pool.js";
