/**
 * @module interfaces/link-factory
 * @description ILinkFactory: the entry points that turn an Option Set
 * into a ready-to-use transport.
 */

import type { Endpoint, SelectedLink, SelectedManagement } from "../types/link.js";
import type { OptionSet } from "../types/options.js";
import type { CloseListener, StreamConnection } from "./drivers.js";

/**
 * Errors raised by the link factory itself. Transport and negotiation
 * failures are not wrapped and propagate as thrown by the drivers.
 */
export class LinkError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "MISSING_HOST"
      | "HOST_UNRESOLVED"
      | "MISSING_SECURE_CREDENTIAL"
      | "ABORTED",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LinkError";
  }
}

/**
 * @interface ILinkFactory
 */
export interface ILinkFactory {
  /**
   * @command
   * @description Selects and constructs a network link.
   *
   * Precedence: FT1.2, FT1.2 cEMI, USB, TP-UART, then IP. IP picks
   * routing for multicast hosts and tunneling otherwise; tunneling is
   * secured whenever a user key resolves.
   *
   * @throws {ConfigurationError} code=UNSUPPORTED_DOMAIN_MEDIUM,
   *   INTERFACE_NOT_BOUND.
   * @throws {LinkError} code=HOST_UNRESOLVED, MISSING_SECURE_CREDENTIAL,
   *   MISSING_HOST, ABORTED.
   */
  newLink(options: OptionSet, signal?: AbortSignal): Promise<SelectedLink>;

  /**
   * @command
   * @description Constructs a local device management connection to a
   * KNXnet/IP server. Secure sessions use the management user id 1.
   */
  newLocalDeviceMgmtIP(
    options: OptionSet,
    onClose: CloseListener,
    signal?: AbortSignal
  ): Promise<SelectedManagement>;

  /**
   * @command
   * @description Borrows a pooled stream connection to `remote`.
   */
  tcpConnection(local: Endpoint, remote: Endpoint, signal?: AbortSignal): Promise<StreamConnection>;
}
