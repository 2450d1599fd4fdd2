/**
 * @module types/options
 * @description The Option Set: typed connection intent parsed from the
 * command line.
 *
 * Boolean options are `true` when present and absent otherwise; there is
 * no explicit `false`. The record is read-only after parsing except for
 * `user`, which the credential resolver may backfill from a keyring.
 */

import type { IndividualAddress, Secret } from "./branded.js";
import type { IMediumSettings } from "../interfaces/medium-settings.js";

/** A presence flag. */
export type Flag = true | undefined;

/**
 * Transport flags in precedence order: when several are present, the
 * first one wins and IP is used when none is.
 */
export const TRANSPORT_PRECEDENCE = ["ft12", "ft12Cemi", "usb", "tpuart"] as const;

export type TransportFlag = (typeof TRANSPORT_PRECEDENCE)[number];

export interface OptionSet {
  /** Remote host, serial port or USB device identifier. */
  readonly host?: string;
  /** Medium settings; mutated when a device or domain address is applied. */
  readonly medium: IMediumSettings;

  // ─── Transport ──────────────────────────────────────────────────

  readonly ft12?: Flag;
  readonly ft12Cemi?: Flag;
  readonly usb?: Flag;
  readonly tpuart?: Flag;
  readonly tcp?: Flag;
  readonly udp?: Flag;
  /** Network address translation for UDP tunneling. */
  readonly nat?: Flag;

  // ─── IP Endpoints ───────────────────────────────────────────────

  readonly localhost?: string;
  readonly localport?: number;
  readonly port?: number;

  // ─── Addressing ─────────────────────────────────────────────────

  /** 64-bit domain value for PL110/RF media. */
  readonly domain?: bigint;
  /** Local device address to use on the bus. */
  readonly knxAddress?: IndividualAddress;
  /** Query the write-enable state on plain management connections. */
  readonly emulateWriteEnable?: Flag;

  // ─── KNX IP Secure ──────────────────────────────────────────────

  /** Fail instead of falling back to an unsecured link. */
  readonly secure?: Flag;
  readonly groupKey?: Secret;
  readonly deviceKey?: Secret;
  readonly devicePassword?: string;
  readonly userKey?: Secret;
  readonly userPassword?: string;
  /** Tunneling user id; 0 or unset means "any". Backfilled from a keyring. */
  user?: number;
  /** Path of an explicitly referenced keyring file. */
  readonly keyring?: string;
  readonly keyringPassword?: string;
  /** Interface address used to select keyring records. */
  readonly interface?: IndividualAddress;
}

/**
 * Mutable view used while parsing arguments.
 */
export type OptionSetDraft = {
  -readonly [K in keyof OptionSet]?: OptionSet[K];
};
