/**
 * @module types/medium
 * @description KNX network media and their identifiers.
 *
 * | Medium | Identifier(s)  | Domain address |
 * |--------|----------------|----------------|
 * | TP1    | tp1            | -              |
 * | PL110  | p110, pl110    | 2 bytes        |
 * | RF     | rf             | 6 bytes        |
 * | KNXIP  | knxip, ip      | -              |
 */

/**
 * Supported KNX media.
 */
export type MediumKind = "TP1" | "PL110" | "RF" | "KNXIP";

/**
 * Media that carry a domain address, with the address width in bytes.
 */
export const DOMAIN_ADDRESS_LENGTH = {
  PL110: 2,
  RF: 6,
} as const satisfies Partial<Record<MediumKind, number>>;

export type DomainMedium = keyof typeof DOMAIN_ADDRESS_LENGTH;
