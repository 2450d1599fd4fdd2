/**
 * @module interfaces/medium-settings
 * @description IMediumSettings: per-medium configuration handed to every
 * link constructor.
 */

import type { DomainAddress, IndividualAddress } from "../types/branded.js";
import type { MediumKind } from "../types/medium.js";

/**
 * @interface IMediumSettings
 * @description Device address and, on PL110/RF, domain address of the
 * local endpoint on the selected medium. Mutated in place when an
 * address is applied.
 */
export interface IMediumSettings {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Sets the local device address.
   */
  setDeviceAddress(address: IndividualAddress): void;

  /**
   * @command
   * @description Sets the domain address.
   * @throws {ConfigurationError} code=UNSUPPORTED_DOMAIN_MEDIUM on media
   *   without domain addresses, or if the length does not fit the medium.
   */
  setDomainAddress(domain: DomainAddress): void;

  // ─── Queries ────────────────────────────────────────────────────

  getMedium(): MediumKind;

  /** Identifier as accepted on the command line, e.g. `tp1`. */
  getMediumString(): string;

  getDeviceAddress(): IndividualAddress;

  getDomainAddress(): DomainAddress | null;
}
