/**
 * @module backends/node-network
 * @description NetworkEnvironment on top of Node's resolver and interface
 * table.
 */

import { lookup } from "node:dns/promises";
import { isIPv4, isIPv6 } from "node:net";
import { networkInterfaces } from "node:os";
import { raceAbort } from "../primitives/abort.js";
import type { NetworkEnvironment } from "../interfaces/network.js";

// ─── Address Predicates ────────────────────────────────────────────

/**
 * True for IPv4 224.0.0.0/4 and IPv6 ff00::/8.
 */
export function isMulticastAddress(address: string): boolean {
  if (isIPv4(address)) {
    const first = Number(address.split(".")[0]);
    return first >= 224 && first <= 239;
  }
  if (isIPv6(address)) {
    return address.toLowerCase().startsWith("ff");
  }
  return false;
}

/**
 * True for the wildcard addresses `0.0.0.0` and `::`.
 */
export function isAnyLocalAddress(address: string): boolean {
  if (isIPv4(address)) return address === "0.0.0.0";
  if (isIPv6(address)) return /^[0:]+$/.test(address);
  return false;
}

/** Wildcard address used when no local host is given. */
export const ANY_LOCAL_ADDRESS = "0.0.0.0";

// ─── Node Environment ──────────────────────────────────────────────

/**
 * Resolves names with the system resolver (`getaddrinfo`) and looks up
 * interface bindings in `os.networkInterfaces()`. An aborted lookup
 * rejects at once; the resolver call itself cannot be cancelled.
 */
export const nodeNetwork: NetworkEnvironment = {
  async lookup(host: string, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const { address } = await raceAbort(lookup(host), signal);
    return address;
  },

  interfaceOf(address: string): string | null {
    for (const [name, infos] of Object.entries(networkInterfaces())) {
      if (infos?.some((info) => info.address === address)) {
        return name;
      }
    }
    return null;
  },
};
