/**
 * @module interfaces/network
 * @description Name resolution and network interface queries used to
 * pick between routing and tunneling.
 */

export interface NetworkEnvironment {
  /**
   * Resolves a host name (or literal address) to a network address.
   * Resolution failures propagate unchanged.
   */
  lookup(host: string, signal?: AbortSignal): Promise<string>;

  /**
   * Name of the network interface that has `address` assigned, or null.
   */
  interfaceOf(address: string): string | null;
}
