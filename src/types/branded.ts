/**
 * @module types/branded
 * @description Branded types for compile-time safety across link setup.
 *
 * Branded types keep raw primitives (numbers, Uint8Arrays) from being
 * passed where a protocol-level value is expected. A raw number can never
 * be used as an IndividualAddress, and a raw Uint8Array can never be
 * handed to a driver as a Secret without going through a decoder.
 *
 * @example
 * ```ts
 * const raw = 0x1105;
 * // Type error: number is not assignable to IndividualAddress
 * const addr: IndividualAddress = raw;
 * // Correct:
 * const addr = parseIndividualAddress("1.1.5");
 * ```
 */

/** Unique symbol for branding. Not exported. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Addressing Brands ──────────────────────────────────────────────

/**
 * A 16-bit KNX individual address (area 4 bits, line 4 bits, device 8 bits).
 * Text form: `area.line.device`, e.g. `1.1.5`.
 */
export type IndividualAddress = Brand<number, "IndividualAddress">;

/**
 * A medium-specific domain address: 2 bytes on PL110, 6 bytes on RF.
 */
export type DomainAddress = Brand<Uint8Array, "DomainAddress">;

// ─── Cryptographic Brands ───────────────────────────────────────────

/**
 * A 16-byte key or password hash. The empty sequence means
 * "no device authentication".
 */
export type Secret = Brand<Uint8Array, "Secret">;

/**
 * A keyring password still in its encrypted on-disk form.
 */
export type EncryptedPassword = Brand<Uint8Array, "EncryptedPassword">;

// ─── Misc ───────────────────────────────────────────────────────────

/**
 * A Unix timestamp in seconds.
 */
export type UnixTimestamp = Brand<number, "UnixTimestamp">;
