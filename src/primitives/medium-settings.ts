/**
 * @module primitives/medium-settings
 * @description Concrete per-medium settings.
 */

import type { IMediumSettings } from "../interfaces/medium-settings.js";
import { ConfigurationError } from "../interfaces/configuration.js";
import { DOMAIN_ADDRESS_LENGTH } from "../types/medium.js";
import type { MediumKind } from "../types/medium.js";
import type { DomainAddress, IndividualAddress } from "../types/branded.js";
import { BACKBONE_ROUTER, mediumString, parseMedium } from "../codec/index.js";

/**
 * MediumSettings: device and domain address of the local endpoint.
 *
 * @example
 * ```ts
 * const medium = MediumSettings.fromIdentifier("p110");
 * medium.setDomainAddress(domainAddress(0x1234n, medium.getMedium()));
 * ```
 */
export class MediumSettings implements IMediumSettings {
  private deviceAddress: IndividualAddress;
  private domain: DomainAddress | null = null;

  private constructor(
    private readonly medium: MediumKind,
    deviceAddress: IndividualAddress
  ) {
    this.deviceAddress = deviceAddress;
  }

  static create(
    medium: MediumKind,
    deviceAddress: IndividualAddress = BACKBONE_ROUTER
  ): MediumSettings {
    return new MediumSettings(medium, deviceAddress);
  }

  /**
   * @throws {ConfigurationError} code=UNKNOWN_MEDIUM
   */
  static fromIdentifier(id: string): MediumSettings {
    return MediumSettings.create(parseMedium(id));
  }

  // ─── Commands ───────────────────────────────────────────────────

  setDeviceAddress(address: IndividualAddress): void {
    this.deviceAddress = address;
  }

  setDomainAddress(domain: DomainAddress): void {
    if (this.medium !== "PL110" && this.medium !== "RF") {
      throw new ConfigurationError(
        `${this.getMediumString()} networks don't use domain addresses`,
        "UNSUPPORTED_DOMAIN_MEDIUM"
      );
    }
    const expected = DOMAIN_ADDRESS_LENGTH[this.medium];
    if (domain.length !== expected) {
      throw new ConfigurationError(
        `${this.getMediumString()} domain address requires ${expected} bytes, got ${domain.length}`,
        "UNSUPPORTED_DOMAIN_MEDIUM"
      );
    }
    this.domain = domain;
  }

  // ─── Queries ────────────────────────────────────────────────────

  getMedium(): MediumKind {
    return this.medium;
  }

  getMediumString(): string {
    return mediumString(this.medium);
  }

  getDeviceAddress(): IndividualAddress {
    return this.deviceAddress;
  }

  getDomainAddress(): DomainAddress | null {
    return this.domain;
  }
}
