/**
 * @module interfaces/connection-pool
 * @description IConnectionPool: process-wide reuse of stream connections.
 */

import type { Endpoint } from "../types/link.js";
import type { StreamConnection } from "./drivers.js";

/**
 * @interface IConnectionPool
 * @description Caches one stream connection per remote endpoint.
 * The pool owns its connections; callers borrow them and must not close
 * them.
 */
export interface IConnectionPool {
  /**
   * @command
   * @description Returns the cached connection to `remote` if it is still
   * connected, otherwise opens a new one and replaces the stale entry.
   *
   * @postcondition Emits CONNECTION_REUSED or CONNECTION_OPENED.
   *   An aborted or failed open leaves the pool unchanged.
   */
  acquire(local: Endpoint, remote: Endpoint, signal?: AbortSignal): Promise<StreamConnection>;

  /**
   * @query
   * @description Number of cached entries, connected or not.
   */
  readonly size: number;
}
