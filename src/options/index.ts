/**
 * @module options
 * @description Command-line parsing into an Option Set.
 *
 * Options may be abbreviated to any non-empty prefix of their long name
 * (`--loc` for `--localhost`), so the order in which names are tested
 * decides ambiguous prefixes: `--u` is `--usb`, `--user` is `--user`.
 *
 * Flags:
 *
 * | Option                | Short | Value        | Option Set field     |
 * |-----------------------|-------|--------------|----------------------|
 * | --localhost           |       | host         | localhost            |
 * | --localport           |       | integer      | localport            |
 * | --port                | -p    | integer      | port                 |
 * | --nat                 | -n    |              | nat                  |
 * | --ft12                | -f    |              | ft12                 |
 * | --usb                 | -u    |              | usb                  |
 * | --tpuart              |       |              | tpuart               |
 * | --medium              | -m    | medium id    | medium               |
 * | --domain              |       | integer      | domain               |
 * | --tcp / --udp         |       |              | tcp / udp            |
 * | --ft12-cemi           |       |              | ft12Cemi             |
 * | --group-key           |       | 32 hex       | groupKey             |
 * | --device-key          |       | 32 hex       | deviceKey            |
 * | --device-pwd          |       | password     | devicePassword       |
 * | --user                |       | 0..127       | user                 |
 * | --user-key            |       | 32 hex       | userKey              |
 * | --user-pwd            |       | password     | userPassword         |
 * | --keyring             |       | path         | keyring              |
 * | --keyring-pwd         |       | passphrase   | keyringPassword      |
 * | --interface           |       | address      | interface            |
 * | --knx-address         | -k    | address      | knxAddress           |
 * | --emulatewriteenable  |       |              | emulateWriteEnable   |
 * | --secure              |       |              | secure               |
 */

import { ConfigurationError } from "../interfaces/configuration.js";
import { MediumSettings } from "../primitives/medium-settings.js";
import {
  DomainSchema,
  PortSchema,
  UserIdSchema,
  decodeSecret,
  domainAddress,
  parseIndividualAddress,
  parseOrThrow,
} from "../codec/index.js";
import type { OptionSet, OptionSetDraft } from "../types/options.js";
import { PeekingIterator } from "./peeking-iterator.js";

export { PeekingIterator } from "./peeking-iterator.js";
export { commonOptionsHelp, secureOptionsHelp } from "./help.js";

/**
 * Whether `arg` selects the option `longOpt` (`--` plus a prefix of it) or
 * `shortOpt` (`-` plus a prefix of it).
 *
 * @throws {ConfigurationError} code=LONG_OPTION_PREFIX when the long name
 *   is written with a single dash.
 */
export function isOption(arg: string, longOpt: string, shortOpt?: string): boolean {
  if (arg === `-${longOpt}`) {
    throw new ConfigurationError(`use --${longOpt}`, "LONG_OPTION_PREFIX");
  }
  const long = arg.length > 2 && arg.startsWith("--") && longOpt.startsWith(arg.slice(2));
  const short =
    shortOpt !== undefined &&
    arg.length > 1 &&
    !arg.startsWith("--") &&
    arg.startsWith("-") &&
    shortOpt.startsWith(arg.slice(1));
  return long || short;
}

/**
 * Consumes the value of `option`. A following `--name` token is another
 * option, not a value.
 *
 * @throws {ConfigurationError} code=MISSING_ARGUMENT
 */
function valueOf(option: string, args: PeekingIterator<string>): string {
  const value = args.peek();
  if (value === undefined || (value.length > 2 && value.startsWith("--"))) {
    throw new ConfigurationError(
      `option ${option} requires an argument`,
      "MISSING_ARGUMENT"
    );
  }
  args.next();
  return value;
}

// ─── Shared Parsing Routines ────────────────────────────────────────

/**
 * Parses one transport or endpoint option into `options`.
 *
 * @returns false if `arg` is none of the common options.
 * @throws {ConfigurationError} on a malformed or missing option value.
 */
export function parseCommonOption(
  arg: string,
  args: PeekingIterator<string>,
  options: OptionSetDraft
): boolean {
  if (isOption(arg, "localhost")) options.localhost = valueOf(arg, args);
  else if (isOption(arg, "localport"))
    options.localport = parseOrThrow(PortSchema, valueOf(arg, args), "MALFORMED_VALUE", arg);
  else if (isOption(arg, "port", "p"))
    options.port = parseOrThrow(PortSchema, valueOf(arg, args), "MALFORMED_VALUE", arg);
  else if (isOption(arg, "nat", "n")) options.nat = true;
  else if (isOption(arg, "ft12", "f")) options.ft12 = true;
  else if (isOption(arg, "usb", "u")) options.usb = true;
  else if (isOption(arg, "tpuart")) options.tpuart = true;
  else if (isOption(arg, "medium", "m"))
    options.medium = MediumSettings.fromIdentifier(valueOf(arg, args));
  else if (isOption(arg, "domain"))
    options.domain = parseOrThrow(DomainSchema, valueOf(arg, args), "MALFORMED_VALUE", arg);
  else if (isOption(arg, "tcp")) options.tcp = true;
  else if (isOption(arg, "udp")) options.udp = true;
  else if (isOption(arg, "ft12-cemi")) options.ft12Cemi = true;
  else return false;
  return true;
}

/**
 * Parses one KNX IP Secure option into `options`. Passwords are stored as
 * given; hashing happens when credentials are resolved.
 *
 * @returns false if `arg` is none of the secure options.
 * @throws {ConfigurationError} on a malformed or missing option value.
 */
export function parseSecureOption(
  arg: string,
  args: PeekingIterator<string>,
  options: OptionSetDraft
): boolean {
  if (isOption(arg, "group-key")) options.groupKey = decodeSecret(valueOf(arg, args));
  else if (isOption(arg, "device-key")) options.deviceKey = decodeSecret(valueOf(arg, args));
  else if (isOption(arg, "device-pwd")) options.devicePassword = valueOf(arg, args);
  else if (isOption(arg, "user"))
    options.user = parseOrThrow(UserIdSchema, valueOf(arg, args), "MALFORMED_VALUE", arg);
  else if (isOption(arg, "user-key")) options.userKey = decodeSecret(valueOf(arg, args));
  else if (isOption(arg, "user-pwd")) options.userPassword = valueOf(arg, args);
  else if (isOption(arg, "keyring")) options.keyring = valueOf(arg, args);
  else if (isOption(arg, "keyring-pwd")) options.keyringPassword = valueOf(arg, args);
  else if (isOption(arg, "interface"))
    options.interface = parseIndividualAddress(valueOf(arg, args));
  else return false;
  return true;
}

function parseLinkOption(
  arg: string,
  args: PeekingIterator<string>,
  options: OptionSetDraft
): boolean {
  if (isOption(arg, "knx-address", "k"))
    options.knxAddress = parseIndividualAddress(valueOf(arg, args));
  else if (isOption(arg, "emulatewriteenable")) options.emulateWriteEnable = true;
  else if (isOption(arg, "secure")) options.secure = true;
  else return false;
  return true;
}

// ─── Option Set ─────────────────────────────────────────────────────

/**
 * Parses a complete link command line. The first positional argument is
 * the host; the medium defaults to tp1.
 *
 * @example
 * ```ts
 * const options = parseLinkOptions(["--tcp", "--user", "2", "10.0.0.5"]);
 * options.host; // "10.0.0.5"
 * ```
 *
 * @throws {ConfigurationError} code=UNKNOWN_OPTION for unrecognized
 *   options or a second positional argument.
 */
export function parseLinkOptions(argv: readonly string[]): OptionSet {
  const draft: OptionSetDraft = {};
  const args = PeekingIterator.of(argv);

  for (const arg of args) {
    if (
      parseCommonOption(arg, args, draft) ||
      parseSecureOption(arg, args, draft) ||
      parseLinkOption(arg, args, draft)
    ) {
      continue;
    }
    if (arg.length > 1 && arg.startsWith("-")) {
      throw new ConfigurationError(`unknown option "${arg}"`, "UNKNOWN_OPTION");
    }
    if (draft.host !== undefined) {
      throw new ConfigurationError(`unexpected argument "${arg}"`, "UNKNOWN_OPTION");
    }
    draft.host = arg;
  }

  return { ...draft, medium: draft.medium ?? MediumSettings.fromIdentifier("tp1") };
}

/**
 * Writes the domain address derived from `options.domain` into the
 * medium settings. No-op without a domain.
 *
 * @throws {ConfigurationError} code=UNSUPPORTED_DOMAIN_MEDIUM
 */
export function applyDomainAddress(options: OptionSet): void {
  if (options.domain === undefined) return;
  const medium = options.medium;
  medium.setDomainAddress(domainAddress(options.domain, medium.getMedium()));
}
