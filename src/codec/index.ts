/**
 * @module codec
 * @description Address and key codecs.
 *
 * - Domain addresses: 64-bit value → 2 bytes (PL110) or 6 bytes (RF),
 *   big-endian, keeping the low-order bytes.
 * - Individual addresses: 16-bit `area.line.device`.
 * - Secrets: 32 hexadecimal digits → 16 bytes.
 */

import { ConfigurationError } from "../interfaces/configuration.js";
import { DOMAIN_ADDRESS_LENGTH } from "../types/medium.js";
import type { MediumKind } from "../types/medium.js";
import type { DomainAddress, IndividualAddress, Secret } from "../types/branded.js";
import {
  HexSecretSchema,
  IndividualAddressSchema,
  MEDIUM_IDENTIFIERS,
  MediumSchema,
  parseOrThrow,
} from "./schemas.js";

export * from "./schemas.js";

// ─── Domain Address Codec ───────────────────────────────────────────

/**
 * Convert a 64-bit domain value to the byte address of `medium`.
 *
 * The value is laid out big-endian in 8 bytes and the last 2 (PL110) or
 * 6 (RF) bytes are kept. Higher-order bits are truncated without notice.
 *
 * @throws {ConfigurationError} code=UNSUPPORTED_DOMAIN_MEDIUM for media
 *   other than PL110 and RF.
 */
export function domainAddress(value: bigint, medium: MediumKind): DomainAddress {
  if (medium !== "PL110" && medium !== "RF") {
    throw new ConfigurationError(
      `${mediumString(medium)} networks don't use domain addresses, use --medium to specify KNX network medium`,
      "UNSUPPORTED_DOMAIN_MEDIUM"
    );
  }

  const length = DOMAIN_ADDRESS_LENGTH[medium];
  const view = new DataView(new ArrayBuffer(8));
  view.setBigUint64(0, BigInt.asUintN(64, value), false);

  return new Uint8Array(view.buffer.slice(8 - length)) as DomainAddress;
}

// ─── Individual Address Codec ───────────────────────────────────────

/** Default device address of a medium: the backbone router `0.0.0`. */
export const BACKBONE_ROUTER = 0 as IndividualAddress;

/** Default address of a device without a registered subnetwork. */
export const UNREGISTERED_DEVICE = individualAddress(0x0f, 0x0f, 0xff);

export function individualAddress(
  area: number,
  line: number,
  device: number
): IndividualAddress {
  return (((area & 0x0f) << 12) |
    ((line & 0x0f) << 8) |
    (device & 0xff)) as IndividualAddress;
}

/**
 * @throws {ConfigurationError} code=MALFORMED_ADDRESS
 */
export function parseIndividualAddress(text: string): IndividualAddress {
  return parseOrThrow(
    IndividualAddressSchema,
    text,
    "MALFORMED_ADDRESS",
    "KNX device address"
  );
}

export function formatIndividualAddress(address: IndividualAddress): string {
  return `${(address >> 12) & 0x0f}.${(address >> 8) & 0x0f}.${address & 0xff}`;
}

// ─── Secret Codec ───────────────────────────────────────────────────

/** "No device authentication". */
export const EMPTY_SECRET = new Uint8Array(0) as Secret;

/**
 * Decode a hexadecimal key: 0 digits → empty secret, 32 digits → 16 bytes.
 *
 * @throws {ConfigurationError} code=INVALID_KEY for any other length or
 *   non-hexadecimal input.
 */
export function decodeSecret(hex: string): Secret {
  return parseOrThrow(HexSecretSchema, hex, "INVALID_KEY");
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

// ─── Medium Identifiers ─────────────────────────────────────────────

/**
 * @throws {ConfigurationError} code=UNKNOWN_MEDIUM
 */
export function parseMedium(id: string): MediumKind {
  return parseOrThrow(MediumSchema, id, "UNKNOWN_MEDIUM");
}

/** The canonical command-line identifier of `medium`. */
export function mediumString(medium: MediumKind): string {
  for (const [id, kind] of Object.entries(MEDIUM_IDENTIFIERS)) {
    if (kind === medium) return id;
  }
  return medium.toLowerCase();
}
