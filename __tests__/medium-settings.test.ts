import { describe, it, expect } from "vitest";
import { MediumSettings } from "../src/primitives/medium-settings.js";
import { ConfigurationError } from "../src/interfaces/configuration.js";
import { BACKBONE_ROUTER, domainAddress, individualAddress } from "../src/codec/index.js";
import type { DomainAddress } from "../src/types/branded.js";

describe("MediumSettings", () => {
  it("starts at the backbone router address", () => {
    const medium = MediumSettings.create("TP1");
    expect(medium.getDeviceAddress()).toBe(BACKBONE_ROUTER);
    expect(medium.getDomainAddress()).toBeNull();
  });

  it("is created from a command-line identifier", () => {
    const medium = MediumSettings.fromIdentifier("pl110");
    expect(medium.getMedium()).toBe("PL110");
    expect(medium.getMediumString()).toBe("p110");
  });

  it("updates the device address", () => {
    const medium = MediumSettings.create("KNXIP");
    medium.setDeviceAddress(individualAddress(1, 2, 3));
    expect(medium.getDeviceAddress()).toBe(0x1203);
  });

  it("stores domain addresses of the medium's width", () => {
    const medium = MediumSettings.create("RF");
    medium.setDomainAddress(domainAddress(BigInt(0xabcdef), "RF"));
    expect([...(medium.getDomainAddress() ?? [])]).toEqual([0, 0, 0, 0xab, 0xcd, 0xef]);
  });

  it("rejects domain addresses of the wrong width", () => {
    const medium = MediumSettings.create("PL110");
    expect(() => medium.setDomainAddress(domainAddress(BigInt(1), "RF"))).toThrow(
      "p110 domain address requires 2 bytes, got 6"
    );
  });

  it("rejects domain addresses on twisted pair", () => {
    const medium = MediumSettings.create("TP1");
    const domain = new Uint8Array(2) as DomainAddress;
    expect(() => medium.setDomainAddress(domain)).toThrow(ConfigurationError);
  });
});
