/**
 * @module codec/schemas
 * @description zod schemas for textual option values.
 *
 * Each schema takes the raw command-line string and yields the typed
 * value. Integers follow "decode" syntax: optional sign, then `0x`, `0X`
 * or `#` for hexadecimal, a leading `0` for octal, decimal otherwise.
 */

import { z } from "zod";
import { ConfigurationError } from "../interfaces/configuration.js";
import type { ConfigurationErrorCode } from "../interfaces/configuration.js";
import type { IndividualAddress, Secret } from "../types/branded.js";
import type { MediumKind } from "../types/medium.js";

const INT64_MIN = -(BigInt(1) << BigInt(63));
const INT64_MAX = (BigInt(1) << BigInt(63)) - BigInt(1);

/** Command-line medium identifiers. */
export const MEDIUM_IDENTIFIERS: Readonly<Record<string, MediumKind>> = {
  tp1: "TP1",
  p110: "PL110",
  pl110: "PL110",
  rf: "RF",
  knxip: "KNXIP",
  ip: "KNXIP",
};

function decodeInteger(text: string): bigint | null {
  let rest = text;
  let negative = false;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    negative = rest.startsWith("-");
    rest = rest.slice(1);
  }

  let prefix = "";
  let digits = /^[0-9]+$/;
  if (rest.startsWith("0x") || rest.startsWith("0X")) {
    prefix = "0x";
    rest = rest.slice(2);
    digits = /^[0-9a-fA-F]+$/;
  } else if (rest.startsWith("#")) {
    prefix = "0x";
    rest = rest.slice(1);
    digits = /^[0-9a-fA-F]+$/;
  } else if (rest.length > 1 && rest.startsWith("0")) {
    prefix = "0o";
    rest = rest.slice(1);
    digits = /^[0-7]+$/;
  }

  if (!digits.test(rest)) return null;
  const magnitude = BigInt(prefix + rest);
  return negative ? -magnitude : magnitude;
}

// ─── Numbers ────────────────────────────────────────────────────────

/** A signed 64-bit integer in decode syntax. */
export const DecodedIntegerSchema = z
  .string()
  .trim()
  .transform((text, ctx) => {
    const value = decodeInteger(text);
    if (value === null || value < INT64_MIN || value > INT64_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${text}" is not a valid integer`,
      });
      return z.NEVER;
    }
    return value;
  });

const DecodedNumberSchema = DecodedIntegerSchema.transform((value) => Number(value));

/** UDP/TCP port. */
export const PortSchema = DecodedNumberSchema.pipe(
  z.number().int().min(0).max(65535)
);

/** Tunneling user id; 0 means "any". */
export const UserIdSchema = DecodedNumberSchema.pipe(
  z.number().int().min(0).max(127)
);

/** 64-bit domain value, reinterpreted as unsigned. */
export const DomainSchema = DecodedIntegerSchema.transform((value) =>
  BigInt.asUintN(64, value)
);

// ─── Addresses ──────────────────────────────────────────────────────

/**
 * Individual address as `area.line.device` (or with `/`), or a raw
 * 16-bit value in decode syntax.
 */
export const IndividualAddressSchema = z
  .string()
  .trim()
  .transform((text, ctx) => {
    const parts = /^(\d{1,2})[./](\d{1,2})[./](\d{1,3})$/.exec(text);
    if (parts) {
      const area = Number(parts[1]);
      const line = Number(parts[2]);
      const device = Number(parts[3]);
      if (area <= 0x0f && line <= 0x0f && device <= 0xff) {
        return ((area << 12) | (line << 8) | device) as IndividualAddress;
      }
    } else {
      const raw = decodeInteger(text);
      if (raw !== null && raw >= BigInt(0) && raw <= BigInt(0xffff)) {
        return Number(raw) as IndividualAddress;
      }
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `"${text}" is not a KNX individual address`,
    });
    return z.NEVER;
  });

// ─── Keys ───────────────────────────────────────────────────────────

/**
 * A KNX key: empty, or exactly 32 hexadecimal digits (16 bytes).
 */
export const HexSecretSchema = z
  .string()
  .regex(/^[0-9a-fA-F]*$/, "key is not a hexadecimal string")
  .refine(
    (hex) => hex.length === 0 || hex.length === 32,
    "wrong KNX key length, requires 16 bytes (32 hex chars)"
  )
  .transform((hex) => Uint8Array.from(Buffer.from(hex, "hex")) as Secret);

// ─── Medium ─────────────────────────────────────────────────────────

export const MediumSchema = z
  .string()
  .trim()
  .transform((id, ctx) => {
    const kind = MEDIUM_IDENTIFIERS[id.toLowerCase()];
    if (kind === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unknown KNX medium "${id}", use one of tp1, p110, rf, knxip`,
      });
      return z.NEVER;
    }
    return kind;
  });

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Parses `value` with `schema`, converting validation failures into a
 * ConfigurationError carrying `code`.
 *
 * @param label - Prefix for the error message, typically the option name.
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  value: string,
  code: ConfigurationErrorCode,
  label?: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues[0]?.message ?? "invalid value";
    throw new ConfigurationError(label ? `${label}: ${detail}` : detail, code, {
      cause: result.error,
    });
  }
  return result.data;
}
