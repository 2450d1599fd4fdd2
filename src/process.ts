/**
 * @module process
 * @description Process-wide connection pool and keyring lookup.
 *
 * Both live until the process exits and are created on first use; later
 * calls return the existing instance and ignore their arguments. Pass them
 * into a LinkFactory explicitly so tests can use private instances.
 */

import { ConnectionPool } from "./primitives/connection-pool.js";
import { KeyringLookup } from "./primitives/keyring-lookup.js";
import { SecurityInstallation } from "./primitives/security-installation.js";
import type { ConnectionOpener } from "./interfaces/drivers.js";
import type { KeyringLoader, SecurityContext } from "./interfaces/keyring.js";

let connectionPool: ConnectionPool | null = null;
let keyringLookup: KeyringLookup | null = null;

export function processConnectionPool(connect: ConnectionOpener): ConnectionPool {
  if (!connectionPool) {
    connectionPool = new ConnectionPool(connect);
  }
  return connectionPool;
}

export function processKeyringLookup(
  loader: KeyringLoader,
  security: SecurityContext = SecurityInstallation.defaultInstallation()
): KeyringLookup {
  if (!keyringLookup) {
    keyringLookup = new KeyringLookup(loader, security);
  }
  return keyringLookup;
}
