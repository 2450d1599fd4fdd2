/**
 * @module types/link
 * @description Endpoints, link variants and credential roles.
 *
 * The link factory always terminates in exactly one variant:
 *
 * | Kind                  | Transport                                  |
 * |-----------------------|--------------------------------------------|
 * | FT12                  | serial FT1.2                               |
 * | FT12_CEMI             | serial FT1.2, cEMI framing                 |
 * | USB                   | KNX USB                                    |
 * | TPUART                | TP-UART bus monitor, no acknowledge filter |
 * | ROUTING               | KNX IP routing (multicast)                 |
 * | SECURE_ROUTING        | KNX IP secure routing                      |
 * | TUNNELING             | KNX IP tunneling over UDP                  |
 * | TUNNELING_TCP         | KNX IP tunneling over a pooled TCP stream  |
 * | SECURE_TUNNELING_UDP  | secure tunneling over UDP                  |
 * | SECURE_TUNNELING_TCP  | secure session over a pooled TCP stream    |
 */

import type { NetworkLink, ManagementConnection } from "../interfaces/drivers.js";

// ─── Endpoints ──────────────────────────────────────────────────────

/**
 * A resolved socket address.
 */
export interface Endpoint {
  readonly address: string;
  readonly port: number;
}

// ─── Variants ───────────────────────────────────────────────────────

export type LocalLinkKind = "FT12" | "FT12_CEMI" | "USB" | "TPUART";

export type LinkKind =
  | LocalLinkKind
  | "ROUTING"
  | "SECURE_ROUTING"
  | "TUNNELING"
  | "TUNNELING_TCP"
  | "SECURE_TUNNELING_UDP"
  | "SECURE_TUNNELING_TCP";

export type ManagementKind =
  | "MANAGEMENT"
  | "MANAGEMENT_TCP"
  | "SECURE_MANAGEMENT_UDP"
  | "SECURE_MANAGEMENT_TCP";

/**
 * Result of `newLink()`: the constructed link tagged with its variant.
 */
export interface SelectedLink {
  readonly kind: LinkKind;
  readonly link: NetworkLink;
}

/**
 * Result of `newLocalDeviceMgmtIP()`.
 */
export interface SelectedManagement {
  readonly kind: ManagementKind;
  readonly connection: ManagementConnection;
}

/**
 * Notification passed to the close callback of a management connection.
 */
export interface CloseEvent {
  readonly initiator: "CLIENT" | "SERVER" | "INTERNAL";
  readonly reason: string;
}

// ─── Credentials ────────────────────────────────────────────────────

/**
 * What a resolved secret is used for.
 */
export type CredentialRole = "USER_KEY" | "DEVICE_MGMT_KEY" | "DEVICE_AUTH";

/**
 * Which tier produced a secret.
 */
export type CredentialTier = "EXPLICIT" | "PASSWORD" | "KEYRING" | "FALLBACK";
