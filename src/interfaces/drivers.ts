/**
 * @module interfaces/drivers
 * @description LinkDrivers: the transport constructors the link factory
 * chooses between.
 *
 * Serial framing, USB HID transfer, TP-UART capture and the KNXnet/IP
 * datagram exchange all live behind this interface. The factory only
 * decides which constructor to call and with which key material; it never
 * speaks the bus protocol itself.
 */

import type { IndividualAddress, Secret } from "../types/branded.js";
import type { CloseEvent, Endpoint } from "../types/link.js";
import type { IMediumSettings } from "./medium-settings.js";

// ─── Handles ────────────────────────────────────────────────────────

/**
 * A constructed, ready-to-use link to the KNX network.
 */
export interface NetworkLink {
  readonly name: string;
  isOpen(): boolean;
  close(): void;
}

/**
 * A local device management connection to a KNXnet/IP server.
 */
export interface ManagementConnection {
  readonly name: string;
  isOpen(): boolean;
  close(): void;
}

/**
 * An authenticated, encrypted session negotiated over a stream connection.
 */
export interface SecureSession {
  readonly user: number;
  readonly remote: Endpoint;
}

/**
 * A stream (TCP) connection to a KNXnet/IP server. Owned by the
 * connection pool: borrowers must not close it.
 */
export interface StreamConnection {
  readonly remote: Endpoint;
  isConnected(): boolean;

  /**
   * Negotiates a secure session over this connection.
   * Negotiation failures propagate to the caller unchanged.
   */
  newSecureSession(
    user: number,
    userKey: Secret,
    deviceAuthentication: Secret,
    signal?: AbortSignal
  ): Promise<SecureSession>;
}

/**
 * Opens a new stream connection from `local` to `remote`.
 */
export type ConnectionOpener = (
  local: Endpoint,
  remote: Endpoint,
  signal?: AbortSignal
) => Promise<StreamConnection>;

export type CloseListener = (event: CloseEvent) => void;

// ─── Drivers ────────────────────────────────────────────────────────

/**
 * @interface LinkDrivers
 * @description Transport constructors consumed by the link factory.
 */
export interface LinkDrivers {
  // ─── Local Links ────────────────────────────────────────────────

  /** FT1.2 link on a numeric port or a named serial device. */
  ft12(port: number | string, medium: IMediumSettings): Promise<NetworkLink>;

  /** FT1.2 link using cEMI framing. */
  ft12Cemi(port: string, medium: IMediumSettings): Promise<NetworkLink>;

  usb(device: string, medium: IMediumSettings): Promise<NetworkLink>;

  /** TP-UART link acknowledging frames for `acknowledge` addresses. */
  tpuart(
    port: string,
    medium: IMediumSettings,
    acknowledge: readonly IndividualAddress[]
  ): Promise<NetworkLink>;

  // ─── KNX IP Routing ─────────────────────────────────────────────

  routing(
    localAddress: string,
    group: string,
    medium: IMediumSettings
  ): Promise<NetworkLink>;

  /**
   * @param networkInterface - Interface name bound to the local address,
   *   or null to let the system choose.
   * @param syncLatency - Group key renewal/sync tolerance in milliseconds.
   */
  secureRouting(
    networkInterface: string | null,
    group: string,
    groupKey: Secret,
    syncLatency: number,
    medium: IMediumSettings
  ): Promise<NetworkLink>;

  // ─── KNX IP Tunneling ───────────────────────────────────────────

  tunneling(
    local: Endpoint,
    remote: Endpoint,
    nat: boolean,
    medium: IMediumSettings
  ): Promise<NetworkLink>;

  tunnelingOver(
    connection: StreamConnection,
    medium: IMediumSettings
  ): Promise<NetworkLink>;

  secureTunneling(
    local: Endpoint,
    remote: Endpoint,
    nat: boolean,
    deviceAuthentication: Secret,
    user: number,
    userKey: Secret,
    medium: IMediumSettings
  ): Promise<NetworkLink>;

  secureTunnelingOver(
    session: SecureSession,
    medium: IMediumSettings
  ): Promise<NetworkLink>;

  // ─── Local Device Management ────────────────────────────────────

  management(
    local: Endpoint,
    remote: Endpoint,
    nat: boolean,
    queryWriteEnable: boolean,
    onClose: CloseListener
  ): Promise<ManagementConnection>;

  managementOver(
    connection: StreamConnection,
    onClose: CloseListener
  ): Promise<ManagementConnection>;

  secureManagement(
    local: Endpoint,
    remote: Endpoint,
    nat: boolean,
    deviceAuthentication: Secret,
    userKey: Secret,
    onClose: CloseListener
  ): Promise<ManagementConnection>;

  secureManagementOver(
    session: SecureSession,
    onClose: CloseListener
  ): Promise<ManagementConnection>;

  // ─── Streams ────────────────────────────────────────────────────

  /** Opens a TCP stream connection; used by the connection pool. */
  connect: ConnectionOpener;
}
