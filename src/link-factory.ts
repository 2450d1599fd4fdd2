/**
 * @module link-factory
 * @description LinkFactory: the orchestrator that turns an Option Set
 * into exactly one transport.
 *
 * Decision order, first match wins:
 * 1. `ft12`, `ft12Cemi`, `usb`, `tpuart` flags, in that order. TP-UART
 *    links see the `knxAddress` override, the serial and USB links do not.
 * 2. Multicast host: KNX IP routing, secured when a group key is given.
 * 3. Any other host: KNX IP tunneling. Secured whenever a user key
 *    resolves; over UDP with `udp`, else over a pooled TCP stream.
 *    Unsecured tunneling uses the pooled stream only with `tcp`.
 *
 * Driver and negotiation errors propagate unchanged. Any failure after
 * the signal aborted is reported as LinkError code=ABORTED.
 *
 * Keyring, credential and pool events are re-emitted from the factory
 * only while one of its calls is in flight. Collaborators shared with
 * another factory stay unobserved between calls.
 *
 * @example
 * ```ts
 * const keyrings = processKeyringLookup(loader);
 * const factory = new LinkFactory({
 *   drivers,
 *   keyrings,
 *   pool: processConnectionPool(drivers.connect),
 * });
 *
 * const { kind, link } = await factory.newLink(parseLinkOptions(argv), shutdown.signal);
 * ```
 */

import { KnxEmitter, timestamp } from "./primitives/base-emitter.js";
import { CredentialResolver } from "./primitives/credential-resolver.js";
import { ConnectionPool } from "./primitives/connection-pool.js";
import { ConfigurationError } from "./interfaces/configuration.js";
import { LinkError } from "./interfaces/link-factory.js";
import type { ILinkFactory } from "./interfaces/link-factory.js";
import type { IKnxEmitter } from "./interfaces/event-emitter.js";
import type { ICredentialResolver } from "./interfaces/credential-resolver.js";
import type { IConnectionPool } from "./interfaces/connection-pool.js";
import type { IKeyringLookup } from "./interfaces/keyring.js";
import type { NetworkEnvironment } from "./interfaces/network.js";
import type {
  CloseListener,
  LinkDrivers,
  NetworkLink,
  StreamConnection,
} from "./interfaces/drivers.js";
import type { IMediumSettings } from "./interfaces/medium-settings.js";
import {
  ANY_LOCAL_ADDRESS,
  isAnyLocalAddress,
  isMulticastAddress,
  nodeNetwork,
} from "./backends/node-network.js";
import { BACKBONE_ROUTER, UNREGISTERED_DEVICE } from "./codec/index.js";
import { applyDomainAddress } from "./options/index.js";
import { TRANSPORT_PRECEDENCE } from "./types/options.js";
import type { OptionSet, TransportFlag } from "./types/options.js";
import type {
  Endpoint,
  LinkKind,
  LocalLinkKind,
  ManagementKind,
  SelectedLink,
  SelectedManagement,
} from "./types/link.js";
import type { KnxEventType } from "./types/events.js";

// ─── Configuration ────────────────────────────────────────────────

export interface LinkFactoryConfig {
  /** KNXnet/IP server port when none is given. Default: 3671 */
  defaultPort?: number;
  /** Secure routing group key sync tolerance in milliseconds. Default: 2000 */
  secureRoutingSyncInterval?: number;
}

export interface LinkFactoryDependencies {
  drivers: LinkDrivers;
  keyrings: IKeyringLookup;
  /** Default: a CredentialResolver over `keyrings`. */
  resolver?: ICredentialResolver;
  /** Default: a private ConnectionPool over `drivers.connect`. */
  pool?: IConnectionPool;
  /** Default: the Node.js resolver and interface table. */
  network?: NetworkEnvironment;
}

/** User id of secure device management sessions. */
export const MANAGEMENT_USER = 1;

const FORWARDED_EVENTS: readonly KnxEventType[] = [
  "KEYRING_INSTALLED",
  "KEYRING_NOT_FOUND",
  "CREDENTIAL_RESOLVED",
  "CREDENTIAL_ABSENT",
  "USER_ID_BACKFILLED",
  "CONNECTION_OPENED",
  "CONNECTION_REUSED",
];

// ─── Local Links ──────────────────────────────────────────────────

interface LocalRoute {
  readonly kind: LocalLinkKind;
  /** Whether the `knxAddress` override applies to this link. */
  readonly addressed: boolean;
  open(drivers: LinkDrivers, host: string, medium: IMediumSettings): Promise<NetworkLink>;
}

const LOCAL_ROUTES: Readonly<Record<TransportFlag, LocalRoute>> = {
  ft12: {
    kind: "FT12",
    addressed: false,
    open: (drivers, host, medium) => drivers.ft12(serialPort(host), medium),
  },
  ft12Cemi: {
    kind: "FT12_CEMI",
    addressed: false,
    open: (drivers, host, medium) => drivers.ft12Cemi(host, medium),
  },
  usb: {
    kind: "USB",
    addressed: false,
    open: (drivers, host, medium) => drivers.usb(host, medium),
  },
  tpuart: {
    kind: "TPUART",
    addressed: true,
    open: (drivers, host, medium) => drivers.tpuart(host, medium, []),
  },
};

/**
 * The local transport flag that wins under the precedence order, or null
 * for an IP link.
 */
export function selectLocalTransport(options: OptionSet): TransportFlag | null {
  return TRANSPORT_PRECEDENCE.find((flag) => options[flag] === true) ?? null;
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

/**
 * Numeric serial port index if `host` is a decimal 32-bit integer, else
 * the device name.
 */
function serialPort(host: string): number | string {
  if (!/^[+-]?\d+$/.test(host)) return host;
  const index = Number(host);
  if (index < INT32_MIN || index > INT32_MAX) return host;
  return index === 0 ? 0 : index;
}

function isEmitter(value: unknown): value is IKnxEmitter {
  return value instanceof KnxEmitter;
}

// ─── Orchestrator ──────────────────────────────────────────────────

export class LinkFactory extends KnxEmitter implements ILinkFactory {
  private readonly drivers: LinkDrivers;
  private readonly keyrings: IKeyringLookup;
  private readonly resolver: ICredentialResolver;
  private readonly pool: IConnectionPool;
  private readonly network: NetworkEnvironment;
  private readonly config: Required<LinkFactoryConfig>;
  private readonly sources: IKnxEmitter[] = [];
  private activeCalls = 0;
  private detachers: Array<() => void> = [];

  constructor(deps: LinkFactoryDependencies, config: LinkFactoryConfig = {}) {
    super();
    this.config = {
      defaultPort: config.defaultPort ?? 3671,
      secureRoutingSyncInterval: config.secureRoutingSyncInterval ?? 2000,
    };

    this.drivers = deps.drivers;
    this.keyrings = deps.keyrings;
    this.resolver = deps.resolver ?? new CredentialResolver(deps.keyrings);
    this.pool = deps.pool ?? new ConnectionPool(deps.drivers.connect);
    this.network = deps.network ?? nodeNetwork;

    for (const source of [this.keyrings, this.resolver, this.pool]) {
      if (isEmitter(source)) this.sources.push(source);
    }
  }

  // ─── Commands ───────────────────────────────────────────────────

  async newLink(options: OptionSet, signal?: AbortSignal): Promise<SelectedLink> {
    return this.abortable(signal, async () => {
      await this.keyrings.lookup(options);
      applyDomainAddress(options);

      const medium = options.medium;
      const flag = selectLocalTransport(options);
      if (flag !== null) {
        const route = LOCAL_ROUTES[flag];
        if (route.addressed) this.applyKnxAddress(options);
        const link = await route.open(this.drivers, this.requireHost(options), medium);
        return this.linkSelected(route.kind, link);
      }

      this.applyKnxAddress(options);
      const local = await this.localEndpoint(options, signal);
      const address = await this.resolve(this.requireHost(options), signal);

      if (isMulticastAddress(address)) {
        return this.routingLink(options, local, address);
      }
      return this.tunnelingLink(options, local, this.remoteEndpoint(options, address), signal);
    });
  }

  async newLocalDeviceMgmtIP(
    options: OptionSet,
    onClose: CloseListener,
    signal?: AbortSignal
  ): Promise<SelectedManagement> {
    return this.abortable(signal, async () => {
      await this.keyrings.lookup(options);

      const local = await this.localEndpoint(options, signal);
      const address = await this.resolve(this.requireHost(options), signal);
      const remote = this.remoteEndpoint(options, address);
      const nat = options.nat === true;

      const mgmtKey = await this.resolver.deviceMgmtKey(options);
      if (mgmtKey !== undefined) {
        const deviceAuth = await this.resolver.deviceAuthentication(options);
        if (options.udp) {
          const connection = await this.drivers.secureManagement(
            local, remote, nat, deviceAuth, mgmtKey, onClose
          );
          return this.managementSelected("SECURE_MANAGEMENT_UDP", connection);
        }
        const stream = await this.tcpConnection(local, remote, signal);
        const session = await stream.newSecureSession(MANAGEMENT_USER, mgmtKey, deviceAuth, signal);
        const connection = await this.drivers.secureManagementOver(session, onClose);
        return this.managementSelected("SECURE_MANAGEMENT_TCP", connection);
      }

      this.requireInsecureAllowed(options, "no device management key");
      if (options.tcp) {
        const stream = await this.tcpConnection(local, remote, signal);
        const connection = await this.drivers.managementOver(stream, onClose);
        return this.managementSelected("MANAGEMENT_TCP", connection);
      }

      const queryWriteEnable = options.emulateWriteEnable === true;
      const connection = await this.drivers.management(
        local, remote, nat, queryWriteEnable, onClose
      );
      return this.managementSelected("MANAGEMENT", connection);
    });
  }

  async tcpConnection(
    local: Endpoint,
    remote: Endpoint,
    signal?: AbortSignal
  ): Promise<StreamConnection> {
    return this.abortable(signal, () => this.pool.acquire(local, remote, signal));
  }

  // ─── Internal: IP Links ─────────────────────────────────────────

  private async routingLink(
    options: OptionSet,
    local: Endpoint,
    group: string
  ): Promise<SelectedLink> {
    const medium = options.medium;
    if (medium.getDeviceAddress() === BACKBONE_ROUTER) {
      medium.setDeviceAddress(UNREGISTERED_DEVICE);
    }

    if (options.groupKey !== undefined) {
      const networkInterface = this.network.interfaceOf(local.address);
      if (networkInterface === null && !isAnyLocalAddress(local.address)) {
        throw new ConfigurationError(
          `${local.address} is not assigned to a network interface`,
          "INTERFACE_NOT_BOUND"
        );
      }
      const link = await this.drivers.secureRouting(
        networkInterface,
        group,
        options.groupKey,
        this.config.secureRoutingSyncInterval,
        medium
      );
      return this.linkSelected("SECURE_ROUTING", link);
    }

    this.requireInsecureAllowed(options, "no group key");
    const link = await this.drivers.routing(local.address, group, medium);
    return this.linkSelected("ROUTING", link);
  }

  private async tunnelingLink(
    options: OptionSet,
    local: Endpoint,
    remote: Endpoint,
    signal?: AbortSignal
  ): Promise<SelectedLink> {
    const medium = options.medium;
    const nat = options.nat === true;

    const userKey = await this.resolver.userKey(options);
    if (userKey !== undefined) {
      const deviceAuth = await this.resolver.deviceAuthentication(options);
      // Read after resolution: the keyring tier may have backfilled it.
      const user = options.user ?? 0;

      if (options.udp) {
        const link = await this.drivers.secureTunneling(
          local, remote, nat, deviceAuth, user, userKey, medium
        );
        return this.linkSelected("SECURE_TUNNELING_UDP", link);
      }
      const stream = await this.tcpConnection(local, remote, signal);
      const session = await stream.newSecureSession(user, userKey, deviceAuth, signal);
      const link = await this.drivers.secureTunnelingOver(session, medium);
      return this.linkSelected("SECURE_TUNNELING_TCP", link);
    }

    this.requireInsecureAllowed(options, "no tunneling user key");
    if (options.tcp) {
      const stream = await this.tcpConnection(local, remote, signal);
      const link = await this.drivers.tunnelingOver(stream, medium);
      return this.linkSelected("TUNNELING_TCP", link);
    }

    const link = await this.drivers.tunneling(local, remote, nat, medium);
    return this.linkSelected("TUNNELING", link);
  }

  // ─── Internal: Endpoints ────────────────────────────────────────

  private async localEndpoint(options: OptionSet, signal?: AbortSignal): Promise<Endpoint> {
    const address =
      options.localhost !== undefined
        ? await this.resolve(options.localhost, signal)
        : ANY_LOCAL_ADDRESS;
    return { address, port: options.localport ?? 0 };
  }

  private remoteEndpoint(options: OptionSet, address: string): Endpoint {
    return { address, port: options.port ?? this.config.defaultPort };
  }

  /**
   * @throws {LinkError} code=HOST_UNRESOLVED wrapping the resolver error.
   */
  private async resolve(host: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.network.lookup(host, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new LinkError(`failed to read IP host ${host}`, "HOST_UNRESOLVED", { cause: err });
    }
  }

  // ─── Internal: Guards ───────────────────────────────────────────

  private requireHost(options: OptionSet): string {
    if (options.host === undefined || options.host === "") {
      throw new LinkError("no host specified", "MISSING_HOST");
    }
    return options.host;
  }

  private requireInsecureAllowed(options: OptionSet, reason: string): void {
    if (options.secure) {
      throw new LinkError(
        `KNX IP Secure requested, but ${reason} is available`,
        "MISSING_SECURE_CREDENTIAL"
      );
    }
  }

  private applyKnxAddress(options: OptionSet): void {
    if (options.knxAddress !== undefined) {
      options.medium.setDeviceAddress(options.knxAddress);
    }
  }

  private async abortable<T>(
    signal: AbortSignal | undefined,
    task: () => Promise<T>
  ): Promise<T> {
    this.attachSources();
    try {
      signal?.throwIfAborted();
      return await task();
    } catch (err) {
      if (!signal?.aborted || (err instanceof LinkError && err.code === "ABORTED")) {
        throw err;
      }
      throw new LinkError("connection setup aborted", "ABORTED", { cause: err });
    } finally {
      this.detachSources();
    }
  }

  // ─── Internal: Events ───────────────────────────────────────────

  // Counted, so nested and concurrent calls share one set of relays.
  private attachSources(): void {
    if (this.activeCalls++ === 0) {
      this.detachers = this.sources.map((source) => this.forward(source, FORWARDED_EVENTS));
    }
  }

  private detachSources(): void {
    if (--this.activeCalls === 0) {
      for (const detach of this.detachers) detach();
      this.detachers = [];
    }
  }

  private linkSelected(kind: LinkKind, link: NetworkLink): SelectedLink {
    this.emit({ type: "LINK_SELECTED", kind, timestamp: timestamp() });
    return { kind, link };
  }

  private managementSelected(
    kind: ManagementKind,
    connection: SelectedManagement["connection"]
  ): SelectedManagement {
    this.emit({ type: "MANAGEMENT_SELECTED", kind, timestamp: timestamp() });
    return { kind, connection };
  }
}
