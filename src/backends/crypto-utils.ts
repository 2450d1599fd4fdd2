/**
 * @module backends/crypto-utils
 * @description KNX IP Secure password hashing built on WebCrypto.
 *
 * Provides:
 * - PBKDF2-HMAC-SHA256 key derivation
 * - Tunneling user password → 16-byte user key
 * - Device authentication password → 16-byte device authentication code
 * - Constant-time secret comparison
 *
 * Both hashes use 65536 iterations and a fixed, purpose-specific salt.
 */

import { timingSafeEqual, webcrypto } from "node:crypto";
import type { PasswordHasher } from "../interfaces/credential-resolver.js";
import type { Secret } from "../types/branded.js";

const USER_PASSWORD_SALT = "user-password.1.secure.ip.knx.org";
const DEVICE_AUTHENTICATION_SALT = "device-authentication-code.1.secure.ip.knx.org";
const ITERATIONS = 65536;
const KEY_BITS = 128;

/**
 * Strip branded type wrapper for WebCrypto BufferSource compatibility.
 * TypeScript 5.x DOM types expect `Uint8Array<ArrayBuffer>` but branded
 * types produce `Uint8Array<ArrayBufferLike>`. This creates a clean copy.
 */
export function buf(data: Uint8Array): ArrayBuffer {
  return new Uint8Array(data).buffer as ArrayBuffer;
}

// ─── PBKDF2 ────────────────────────────────────────────────────────

/**
 * Derive `bits` bits from `password` with PBKDF2-HMAC-SHA256.
 */
export async function pbkdf2Sha256(
  password: Uint8Array,
  salt: Uint8Array,
  iterations: number,
  bits: number
): Promise<Uint8Array> {
  const key = await webcrypto.subtle.importKey(
    "raw",
    buf(password),
    "PBKDF2",
    false,
    ["deriveBits"]
  );
  const derived = await webcrypto.subtle.deriveBits(
    { name: "PBKDF2", hash: "SHA-256", salt: buf(salt), iterations },
    key,
    bits
  );
  return new Uint8Array(derived);
}

function latin1(text: string): Uint8Array {
  return Uint8Array.from(Buffer.from(text, "latin1"));
}

// ─── KNX IP Secure Hashes ──────────────────────────────────────────

/**
 * Hash a tunneling user password into a user key.
 */
export async function hashUserPassword(password: string): Promise<Secret> {
  const key = await pbkdf2Sha256(
    latin1(password),
    latin1(USER_PASSWORD_SALT),
    ITERATIONS,
    KEY_BITS
  );
  return key as Secret;
}

/**
 * Hash a device authentication password into a device authentication code.
 */
export async function hashDeviceAuthenticationPassword(
  password: string
): Promise<Secret> {
  const key = await pbkdf2Sha256(
    latin1(password),
    latin1(DEVICE_AUTHENTICATION_SALT),
    ITERATIONS,
    KEY_BITS
  );
  return key as Secret;
}

/**
 * The KNX IP Secure password hashes.
 */
export const knxPasswordHasher: PasswordHasher = {
  hashUserPassword,
  hashDeviceAuthenticationPassword,
};

// ─── Comparison ────────────────────────────────────────────────────

/**
 * Compare two secrets without leaking the position of the first mismatch.
 */
export function secretsEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
