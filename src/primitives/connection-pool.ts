/**
 * @module primitives/connection-pool
 * @description Full implementation of the IConnectionPool interface.
 *
 * One map from remote endpoint to stream connection, guarded by a single
 * lock for the whole acquire. Opening a connection happens inside the
 * lock, so a slow server delays acquisitions for every other endpoint;
 * an aborted waiter leaves the queue without opening anything.
 * The pool never closes connections; transports own their lifecycle.
 * A stream whose open completes after an abort is still published, so a
 * later acquire for the same endpoint reuses it.
 */

import { KnxEmitter, timestamp } from "./base-emitter.js";
import { Mutex } from "./mutex.js";
import type { IConnectionPool } from "../interfaces/connection-pool.js";
import type { ConnectionOpener, StreamConnection } from "../interfaces/drivers.js";
import type { Endpoint } from "../types/link.js";

/**
 * Map key of an endpoint; IPv6 addresses are bracketed.
 */
export function endpointKey(endpoint: Endpoint): string {
  const host = endpoint.address.includes(":")
    ? `[${endpoint.address}]`
    : endpoint.address;
  return `${host}:${endpoint.port}`;
}

/**
 * ConnectionPool: at most one connected stream per remote endpoint.
 *
 * @example
 * ```ts
 * const pool = new ConnectionPool(drivers.connect);
 * const a = await pool.acquire(local, { address: "10.0.0.5", port: 3671 });
 * const b = await pool.acquire(local, { address: "10.0.0.5", port: 3671 });
 * // a === b while a.isConnected()
 * ```
 */
export class ConnectionPool extends KnxEmitter implements IConnectionPool {
  private readonly connections = new Map<string, StreamConnection>();
  private readonly lock = new Mutex();

  constructor(private readonly open: ConnectionOpener) {
    super();
  }

  // ─── Commands ───────────────────────────────────────────────────

  async acquire(
    local: Endpoint,
    remote: Endpoint,
    signal?: AbortSignal
  ): Promise<StreamConnection> {
    return this.lock.runExclusive(async () => {
      signal?.throwIfAborted();

      const key = endpointKey(remote);
      const cached = this.connections.get(key);
      if (cached && cached.isConnected()) {
        this.emit({ type: "CONNECTION_REUSED", remote, timestamp: timestamp() });
        return cached;
      }

      const connection = await this.open(local, remote, signal);
      this.connections.set(key, connection);
      this.emit({
        type: "CONNECTION_OPENED",
        remote,
        replaced: cached !== undefined,
        timestamp: timestamp(),
      });

      signal?.throwIfAborted();
      return connection;
    }, signal);
  }

  // ─── Queries ────────────────────────────────────────────────────

  get size(): number {
    return this.connections.size;
  }
}
