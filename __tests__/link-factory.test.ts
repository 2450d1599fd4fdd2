import { describe, it, expect, vi } from "vitest";
import { LinkFactory, MANAGEMENT_USER, selectLocalTransport } from "../src/link-factory.js";
import { LinkError } from "../src/interfaces/link-factory.js";
import { ConfigurationError } from "../src/interfaces/configuration.js";
import { MediumSettings } from "../src/primitives/medium-settings.js";
import { ConnectionPool } from "../src/primitives/connection-pool.js";
import { timestamp } from "../src/primitives/base-emitter.js";
import {
  EMPTY_SECRET,
  UNREGISTERED_DEVICE,
  decodeSecret,
  formatIndividualAddress,
  individualAddress,
} from "../src/codec/index.js";
import type { Keyring } from "../src/interfaces/keyring.js";
import type { OptionSet } from "../src/types/options.js";
import type { Endpoint } from "../src/types/link.js";
import { hashUserPassword } from "../src/backends/crypto-utils.js";
import {
  FakeStream,
  encrypted,
  fakeDrivers,
  fakeKeyring,
  fakeKeyringLookup,
  fakeNetwork,
} from "./helpers/fakes.js";

// ─── Helpers ───────────────────────────────────────────────────────

const USER_KEY = decodeSecret("00112233445566778899aabbccddeeff");
const DEVICE_KEY = decodeSecret("0123456789abcdef0123456789abcdef");
const GROUP_KEY = decodeSecret("ffeeddccbbaa99887766554433221100");

const ANY_LOCAL: Endpoint = { address: "0.0.0.0", port: 0 };
const SERVER: Endpoint = { address: "10.0.0.5", port: 3671 };

function optionSet(overrides: Partial<OptionSet> = {}): OptionSet {
  return { medium: MediumSettings.create("TP1"), ...overrides };
}

function setup(keyring: Keyring | null = null) {
  const drivers = fakeDrivers();
  const network = fakeNetwork(
    { "knx-server.local": "10.0.0.5" },
    { "192.168.1.20": "eth0" }
  );
  const keyrings = fakeKeyringLookup(keyring);
  const factory = new LinkFactory({ drivers, keyrings, network });
  return { factory, drivers, network, keyrings };
}

function onClose(): void {}

// ─── Tests ──────────────────────────────────────────────────────────

describe("LinkFactory", () => {
  describe("local links", () => {
    it("opens FT1.2 on a numeric port index", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ ft12: true, host: "2" });

      const { kind } = await factory.newLink(options);

      expect(kind).toBe("FT12");
      expect(drivers.ft12).toHaveBeenCalledWith(2, options.medium);
    });

    it("opens FT1.2 on a named serial device", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ ft12: true, host: "/dev/ttyS0" });

      await factory.newLink(options);

      expect(drivers.ft12).toHaveBeenCalledWith("/dev/ttyS0", options.medium);
    });

    it("keeps port numbers outside the 32-bit range as device names", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ ft12: true, host: "99999999999" });

      await factory.newLink(options);

      expect(drivers.ft12).toHaveBeenCalledWith("99999999999", options.medium);
    });

    it("reads a signed zero port index as 0", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ ft12: true, host: "-0" });

      await factory.newLink(options);

      expect(drivers.ft12).toHaveBeenCalledWith(0, options.medium);
    });

    it("applies the transport precedence", () => {
      expect(selectLocalTransport(optionSet({ ft12: true, usb: true, tpuart: true }))).toBe("ft12");
      expect(selectLocalTransport(optionSet({ ft12Cemi: true, usb: true }))).toBe("ft12Cemi");
      expect(selectLocalTransport(optionSet({ usb: true, tpuart: true }))).toBe("usb");
      expect(selectLocalTransport(optionSet({ tpuart: true, tcp: true }))).toBe("tpuart");
      expect(selectLocalTransport(optionSet({ tcp: true }))).toBeNull();
    });

    it("builds the highest-precedence link only", async () => {
      const { factory, drivers } = setup();

      const { kind } = await factory.newLink(
        optionSet({ ft12Cemi: true, usb: true, tpuart: true, host: "/dev/ttyACM0" })
      );

      expect(kind).toBe("FT12_CEMI");
      expect(drivers.usb).not.toHaveBeenCalled();
      expect(drivers.tpuart).not.toHaveBeenCalled();
    });

    it("ignores the local device address for USB", async () => {
      const { factory } = setup();
      const options = optionSet({ usb: true, host: "knx-usb", knxAddress: individualAddress(1, 1, 5) });

      expect((await factory.newLink(options)).kind).toBe("USB");
      expect(options.medium.getDeviceAddress()).toBe(0);
    });

    it("applies the local device address to TP-UART without acknowledge filter", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ tpuart: true, host: "/dev/ttyAMA0", knxAddress: individualAddress(1, 1, 5) });

      expect((await factory.newLink(options)).kind).toBe("TPUART");
      expect(options.medium.getDeviceAddress()).toBe(0x1105);
      expect(drivers.tpuart).toHaveBeenCalledWith("/dev/ttyAMA0", options.medium, []);
    });

    it("requires a host", async () => {
      const { factory } = setup();
      await expect(factory.newLink(optionSet({ usb: true }))).rejects.toMatchObject({
        code: "MISSING_HOST",
      });
    });
  });

  describe("routing", () => {
    it("uses plain routing with the unregistered device address", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ host: "239.0.0.1" });

      const { kind } = await factory.newLink(options);

      expect(kind).toBe("ROUTING");
      expect(options.medium.getDeviceAddress()).toBe(UNREGISTERED_DEVICE);
      expect(formatIndividualAddress(options.medium.getDeviceAddress())).toBe("15.15.255");
      expect(drivers.routing).toHaveBeenCalledWith("0.0.0.0", "239.0.0.1", options.medium);
    });

    it("keeps an explicit device address", async () => {
      const { factory } = setup();
      const options = optionSet({ host: "239.0.0.1", knxAddress: individualAddress(1, 1, 5) });

      await factory.newLink(options);

      expect(formatIndividualAddress(options.medium.getDeviceAddress())).toBe("1.1.5");
    });

    it("uses secure routing with a group key on the wildcard address", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ host: "239.0.0.1", groupKey: GROUP_KEY });

      const { kind } = await factory.newLink(options);

      expect(kind).toBe("SECURE_ROUTING");
      expect(drivers.secureRouting).toHaveBeenCalledWith(
        null, "239.0.0.1", GROUP_KEY, 2000, options.medium
      );
      expect(drivers.routing).not.toHaveBeenCalled();
    });

    it("passes the interface bound to the local address", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ host: "239.0.0.1", localhost: "192.168.1.20", groupKey: GROUP_KEY });

      await factory.newLink(options);

      expect(drivers.secureRouting.mock.calls[0]?.[0]).toBe("eth0");
    });

    it("rejects a local address without a network interface", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ host: "239.0.0.1", localhost: "192.168.1.99", groupKey: GROUP_KEY });

      const error = await factory.newLink(options).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: "INTERFACE_NOT_BOUND",
        message: "192.168.1.99 is not assigned to a network interface",
      });
      expect(drivers.secureRouting).not.toHaveBeenCalled();
    });

    it("refuses plain routing when security is required", async () => {
      const { factory } = setup();
      await expect(
        factory.newLink(optionSet({ host: "239.0.0.1", secure: true }))
      ).rejects.toMatchObject({ code: "MISSING_SECURE_CREDENTIAL" });
    });
  });

  describe("tunneling", () => {
    it("negotiates a secure session over a pooled TCP connection", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({
        host: "10.0.0.5",
        port: 3671,
        tcp: true,
        userKey: USER_KEY,
        deviceKey: DEVICE_KEY,
      });

      const { kind } = await factory.newLink(options);

      expect(kind).toBe("SECURE_TUNNELING_TCP");
      expect(drivers.connect).toHaveBeenCalledTimes(1);
      expect(drivers.connect).toHaveBeenCalledWith(ANY_LOCAL, SERVER, undefined);

      const stream = await drivers.connect.mock.results[0]?.value;
      expect(stream).toBeInstanceOf(FakeStream);
      expect(stream.newSecureSession).toHaveBeenCalledWith(0, USER_KEY, DEVICE_KEY, undefined);
      expect(drivers.secureTunnelingOver).toHaveBeenCalledWith(
        { user: 0, remote: SERVER },
        options.medium
      );
      expect(drivers.secureTunneling).not.toHaveBeenCalled();
    });

    it("secures tunneling over TCP by default once a user key resolves", async () => {
      const { factory } = setup();
      const { kind } = await factory.newLink(
        optionSet({ host: "10.0.0.5", userKey: USER_KEY, user: 4 })
      );
      expect(kind).toBe("SECURE_TUNNELING_TCP");
    });

    it("uses secure UDP tunneling when requested", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ host: "10.0.0.5", udp: true, nat: true, userKey: USER_KEY, user: 7 });

      const { kind } = await factory.newLink(options);

      expect(kind).toBe("SECURE_TUNNELING_UDP");
      expect(drivers.secureTunneling).toHaveBeenCalledWith(
        ANY_LOCAL, SERVER, true, EMPTY_SECRET, 7, USER_KEY, options.medium
      );
      expect(drivers.connect).not.toHaveBeenCalled();
    });

    it("uses a pooled TCP connection for plain tunneling with tcp", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({ host: "knx-server.local", tcp: true });

      const { kind } = await factory.newLink(options);

      expect(kind).toBe("TUNNELING_TCP");
      const stream = await drivers.connect.mock.results[0]?.value;
      expect(drivers.tunnelingOver).toHaveBeenCalledWith(stream, options.medium);
    });

    it("falls back to plain UDP tunneling", async () => {
      const { factory, drivers } = setup();
      const options = optionSet({
        host: "10.0.0.5",
        port: 3700,
        nat: true,
        localhost: "192.168.1.20",
        localport: 50000,
      });

      const { kind } = await factory.newLink(options);

      expect(kind).toBe("TUNNELING");
      expect(drivers.tunneling).toHaveBeenCalledWith(
        { address: "192.168.1.20", port: 50000 },
        { address: "10.0.0.5", port: 3700 },
        true,
        options.medium
      );
    });

    it("shares one TCP connection between links to the same server", async () => {
      const { factory, drivers } = setup();

      await factory.newLink(optionSet({ host: "10.0.0.5", tcp: true }));
      await factory.newLink(optionSet({ host: "knx-server.local", tcp: true }));

      expect(drivers.connect).toHaveBeenCalledTimes(1);
    });

    it("fails when security is required but no user key resolves", async () => {
      const { factory, drivers } = setup();

      const error = await factory
        .newLink(optionSet({ host: "10.0.0.5", secure: true }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LinkError);
      expect(error).toMatchObject({ code: "MISSING_SECURE_CREDENTIAL" });
      expect(drivers.tunneling).not.toHaveBeenCalled();
    });

    it("reads the user id after credential resolution", async () => {
      const drivers = fakeDrivers();
      const resolver = {
        userKey: vi.fn(async (options: OptionSet) => {
          options.user = 3;
          return USER_KEY;
        }),
        deviceMgmtKey: vi.fn(async () => undefined),
        deviceAuthentication: vi.fn(async () => DEVICE_KEY),
      };
      const factory = new LinkFactory({
        drivers,
        keyrings: fakeKeyringLookup(),
        resolver,
        network: fakeNetwork(),
      });

      await factory.newLink(optionSet({ host: "10.0.0.5", udp: true }));

      expect(drivers.secureTunneling.mock.calls[0]?.[4]).toBe(3);
    });

    it("derives the user key and user id from the sole keyring interface", async () => {
      const keyring = fakeKeyring([
        [
          individualAddress(1, 1, 1),
          [{ address: individualAddress(1, 1, 10), user: 3, password: encrypted("tunnel-pwd") }],
        ],
      ]);
      const { factory, drivers } = setup(keyring);
      const options = optionSet({ host: "10.0.0.5", udp: true });

      await factory.newLink(options);

      const call = drivers.secureTunneling.mock.calls[0];
      expect(call?.[4]).toBe(3);
      expect(call?.[5]).toEqual(await hashUserPassword("tunnel-pwd"));
      expect(options.user).toBe(3);
    });
  });

  describe("failures", () => {
    it("reports unresolvable hosts with the resolver error as cause", async () => {
      const { factory } = setup();

      const error = await factory.newLink(optionSet({ host: "nowhere.invalid" })).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LinkError);
      expect(error).toMatchObject({
        code: "HOST_UNRESOLVED",
        message: "failed to read IP host nowhere.invalid",
      });
      expect(error).toMatchObject({
        cause: expect.objectContaining({ message: "getaddrinfo ENOTFOUND nowhere.invalid" }),
      });
    });

    it("propagates negotiation failures unchanged", async () => {
      const { factory, drivers } = setup();
      const failure = new Error("authentication failed");
      drivers.connect.mockImplementationOnce(async (_local, remote) => {
        const stream = new FakeStream(remote);
        stream.newSecureSession.mockRejectedValueOnce(failure);
        return stream;
      });

      await expect(
        factory.newLink(optionSet({ host: "10.0.0.5", userKey: USER_KEY }))
      ).rejects.toBe(failure);
    });

    it("rejects domain addresses on twisted pair", async () => {
      const { factory } = setup();
      await expect(
        factory.newLink(optionSet({ host: "10.0.0.5", domain: BigInt(1) }))
      ).rejects.toMatchObject({ code: "UNSUPPORTED_DOMAIN_MEDIUM" });
    });

    it("reports an already aborted signal", async () => {
      const { factory, keyrings } = setup();
      const controller = new AbortController();
      controller.abort();

      await expect(
        factory.newLink(optionSet({ host: "10.0.0.5" }), controller.signal)
      ).rejects.toMatchObject({ code: "ABORTED" });
      expect(keyrings.lookup).not.toHaveBeenCalled();
    });

    it("reports an abort during name resolution as ABORTED", async () => {
      const { factory, network } = setup();
      const controller = new AbortController();
      network.lookup.mockImplementationOnce(async () => {
        controller.abort();
        throw new Error("lookup cancelled");
      });

      await expect(
        factory.newLink(optionSet({ host: "knx-server.local" }), controller.signal)
      ).rejects.toMatchObject({ code: "ABORTED" });
    });
  });

  describe("newLocalDeviceMgmtIP()", () => {
    it("opens a secure management session as the management user", async () => {
      const { factory, drivers } = setup();

      const { kind } = await factory.newLocalDeviceMgmtIP(
        optionSet({ host: "10.0.0.5", userKey: USER_KEY, deviceKey: DEVICE_KEY }),
        onClose
      );

      expect(kind).toBe("SECURE_MANAGEMENT_TCP");
      expect(MANAGEMENT_USER).toBe(1);
      const stream = await drivers.connect.mock.results[0]?.value;
      expect(stream.newSecureSession).toHaveBeenCalledWith(1, USER_KEY, DEVICE_KEY, undefined);
      expect(drivers.secureManagementOver).toHaveBeenCalledWith({ user: 1, remote: SERVER }, onClose);
    });

    it("opens secure management over UDP when requested", async () => {
      const { factory, drivers } = setup();

      const { kind } = await factory.newLocalDeviceMgmtIP(
        optionSet({ host: "10.0.0.5", udp: true, userPassword: "test-secret" }),
        onClose
      );

      expect(kind).toBe("SECURE_MANAGEMENT_UDP");
      expect(drivers.secureManagement.mock.calls[0]?.[3]).toEqual(EMPTY_SECRET);
    });

    it("uses a pooled TCP connection for plain management with tcp", async () => {
      const { factory, drivers } = setup();

      const { kind } = await factory.newLocalDeviceMgmtIP(optionSet({ host: "10.0.0.5", tcp: true }), onClose);

      expect(kind).toBe("MANAGEMENT_TCP");
      expect(drivers.managementOver).toHaveBeenCalledTimes(1);
    });

    it("passes the write-enable query flag to plain management", async () => {
      const { factory, drivers } = setup();

      const { kind } = await factory.newLocalDeviceMgmtIP(
        optionSet({ host: "10.0.0.5", emulateWriteEnable: true }),
        onClose
      );

      expect(kind).toBe("MANAGEMENT");
      expect(drivers.management).toHaveBeenCalledWith(ANY_LOCAL, SERVER, false, true, onClose);
    });

    it("fails when security is required but no management key resolves", async () => {
      const { factory } = setup();
      await expect(
        factory.newLocalDeviceMgmtIP(optionSet({ host: "10.0.0.5", secure: true }), onClose)
      ).rejects.toMatchObject({ code: "MISSING_SECURE_CREDENTIAL" });
    });
  });

  describe("events", () => {
    it("reports the selected link and forwards pool and credential events", async () => {
      const { factory } = setup();
      const selected = vi.fn();
      const opened = vi.fn();
      const resolved = vi.fn();
      factory.on("LINK_SELECTED", selected);
      factory.on("CONNECTION_OPENED", opened);
      factory.on("CREDENTIAL_RESOLVED", resolved);

      await factory.newLink(optionSet({ host: "10.0.0.5", userKey: USER_KEY }));

      expect(selected.mock.calls[0]?.[0]).toMatchObject({ kind: "SECURE_TUNNELING_TCP" });
      expect(opened.mock.calls[0]?.[0]).toMatchObject({ remote: SERVER, replaced: false });
      expect(resolved.mock.calls.map((call) => call[0].role)).toEqual(["USER_KEY", "DEVICE_AUTH"]);
    });

    it("forwards collaborator events only from its own calls", async () => {
      const drivers = fakeDrivers();
      const pool = new ConnectionPool(drivers.connect);
      const network = fakeNetwork({}, {});
      const idle = new LinkFactory({ drivers, keyrings: fakeKeyringLookup(null), pool, network });
      const busy = new LinkFactory({ drivers, keyrings: fakeKeyringLookup(null), pool, network });
      const idleOpened = vi.fn();
      const busyOpened = vi.fn();
      idle.on("CONNECTION_OPENED", idleOpened);
      busy.on("CONNECTION_OPENED", busyOpened);

      await busy.newLink(optionSet({ host: "10.0.0.5", tcp: true }));

      expect(busyOpened).toHaveBeenCalledTimes(1);
      expect(idleOpened).not.toHaveBeenCalled();
    });

    it("detaches from shared collaborators when a call completes", async () => {
      const drivers = fakeDrivers();
      const pool = new ConnectionPool(drivers.connect);
      const factory = new LinkFactory({
        drivers,
        keyrings: fakeKeyringLookup(null),
        pool,
        network: fakeNetwork({}, {}),
      });
      const opened = vi.fn();
      factory.on("CONNECTION_OPENED", opened);

      await factory.newLink(optionSet({ host: "10.0.0.5", tcp: true }));
      pool.emit({ type: "CONNECTION_OPENED", remote: SERVER, replaced: false, timestamp: timestamp() });

      expect(opened).toHaveBeenCalledTimes(1);
    });

    it("looks up the keyring for every link", async () => {
      const { factory, keyrings } = setup();
      const options = optionSet({ host: "239.0.0.1" });

      await factory.newLink(options);

      expect(keyrings.lookup).toHaveBeenCalledWith(options);
    });
  });
});
