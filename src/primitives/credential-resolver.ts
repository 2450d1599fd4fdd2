/**
 * @module primitives/credential-resolver
 * @description Full implementation of the ICredentialResolver interface.
 *
 * Keyring resolution narrows by interface address: the Option Set's
 * `interface` if the keyring has records for it, else the keyring's only
 * interface. With several interfaces and no usable address the keyring
 * tier yields nothing rather than guessing.
 */

import { KnxEmitter, timestamp } from "./base-emitter.js";
import type {
  ICredentialResolver,
  PasswordHasher,
} from "../interfaces/credential-resolver.js";
import type { ActiveKeyring, IKeyringLookup } from "../interfaces/keyring.js";
import type { IndividualAddress, Secret } from "../types/branded.js";
import type { KeyringDevice, KeyringInterfaceRecord } from "../types/keyring.js";
import type { CredentialRole, CredentialTier } from "../types/link.js";
import type { OptionSet } from "../types/options.js";
import { knxPasswordHasher } from "../backends/crypto-utils.js";
import { EMPTY_SECRET } from "../codec/index.js";

/**
 * CredentialResolver: explicit key, then password, then keyring.
 *
 * @example
 * ```ts
 * const resolver = new CredentialResolver(keyringLookup);
 * const userKey = await resolver.userKey(options);
 * if (userKey) {
 *   const auth = await resolver.deviceAuthentication(options);
 * }
 * ```
 */
export class CredentialResolver extends KnxEmitter implements ICredentialResolver {
  constructor(
    private readonly keyrings: IKeyringLookup,
    private readonly hasher: PasswordHasher = knxPasswordHasher
  ) {
    super();
  }

  // ─── Queries ────────────────────────────────────────────────────

  async userKey(options: OptionSet): Promise<Secret | undefined> {
    if (options.userKey !== undefined) {
      return this.resolved("USER_KEY", "EXPLICIT", options.userKey);
    }
    if (options.userPassword !== undefined) {
      const key = await this.hasher.hashUserPassword(options.userPassword);
      return this.resolved("USER_KEY", "PASSWORD", key);
    }
    const key = await this.keyringUserKey(options);
    if (key !== undefined) {
      return this.resolved("USER_KEY", "KEYRING", key);
    }
    return this.absent("USER_KEY");
  }

  async deviceMgmtKey(options: OptionSet): Promise<Secret | undefined> {
    if (options.userKey !== undefined) {
      return this.resolved("DEVICE_MGMT_KEY", "EXPLICIT", options.userKey);
    }
    if (options.userPassword !== undefined) {
      const key = await this.hasher.hashUserPassword(options.userPassword);
      return this.resolved("DEVICE_MGMT_KEY", "PASSWORD", key);
    }

    const active = this.keyrings.getActive();
    const device = active ? this.keyringDevice(active, options) : undefined;
    if (active && device?.password !== undefined) {
      const password = await active.keyring.decryptPassword(
        device.password,
        active.passphrase
      );
      const key = await this.hasher.hashUserPassword(password);
      return this.resolved("DEVICE_MGMT_KEY", "KEYRING", key);
    }
    return this.absent("DEVICE_MGMT_KEY");
  }

  async deviceAuthentication(options: OptionSet): Promise<Secret> {
    if (options.deviceKey !== undefined) {
      return this.resolved("DEVICE_AUTH", "EXPLICIT", options.deviceKey);
    }
    if (options.devicePassword !== undefined) {
      const code = await this.hasher.hashDeviceAuthenticationPassword(
        options.devicePassword
      );
      return this.resolved("DEVICE_AUTH", "PASSWORD", code);
    }

    const active = this.keyrings.getActive();
    const device = active ? this.keyringDevice(active, options) : undefined;
    if (active && device?.authentication !== undefined) {
      const password = await active.keyring.decryptPassword(
        device.authentication,
        active.passphrase
      );
      const code = await this.hasher.hashDeviceAuthenticationPassword(password);
      return this.resolved("DEVICE_AUTH", "KEYRING", code);
    }
    return this.resolved("DEVICE_AUTH", "FALLBACK", EMPTY_SECRET);
  }

  // ─── Internal: Keyring Tier ─────────────────────────────────────

  /**
   * The keyring interface to read records from: the requested one if the
   * keyring knows it, else the sole interface, else none.
   */
  private interfaceAddress(
    active: ActiveKeyring,
    requested: IndividualAddress | undefined
  ): IndividualAddress | null {
    const interfaces = active.keyring.interfaces();
    if (requested !== undefined && interfaces.has(requested)) {
      return requested;
    }
    if (interfaces.size !== 1) return null;
    const [sole] = interfaces.keys();
    return sole ?? null;
  }

  private async keyringUserKey(options: OptionSet): Promise<Secret | undefined> {
    const active = this.keyrings.getActive();
    if (!active) return undefined;

    const address = this.interfaceAddress(active, options.interface);
    if (address === null) return undefined;

    const records = active.keyring.interfaces().get(address) ?? [];
    const requestedUser = options.user ? options.user : undefined;
    const record = matchUser(records, requestedUser, options.interface);
    if (!record) return undefined;

    if (requestedUser === undefined) {
      options.user = record.user;
      this.emit({
        type: "USER_ID_BACKFILLED",
        user: record.user,
        interfaceAddress: address,
        timestamp: timestamp(),
      });
    }

    if (record.password === undefined) return undefined;
    const password = await active.keyring.decryptPassword(
      record.password,
      active.passphrase
    );
    return this.hasher.hashUserPassword(password);
  }

  private keyringDevice(
    active: ActiveKeyring,
    options: OptionSet
  ): KeyringDevice | undefined {
    const address = this.interfaceAddress(active, options.interface);
    if (address === null) return undefined;
    return active.keyring.devices().get(address);
  }

  // ─── Internal: Events ───────────────────────────────────────────

  private resolved(role: CredentialRole, tier: CredentialTier, secret: Secret): Secret {
    this.emit({ type: "CREDENTIAL_RESOLVED", role, tier, timestamp: timestamp() });
    return secret;
  }

  private absent(role: CredentialRole): undefined {
    this.emit({ type: "CREDENTIAL_ABSENT", role, timestamp: timestamp() });
    return undefined;
  }
}

/**
 * Pick the user record to use. A requested user id must match exactly;
 * without one, the record whose tunneling address equals `address` wins,
 * else the first record.
 */
function matchUser(
  records: readonly KeyringInterfaceRecord[],
  requestedUser: number | undefined,
  address: IndividualAddress | undefined
): KeyringInterfaceRecord | undefined {
  if (requestedUser !== undefined) {
    return records.find((record) => record.user === requestedUser);
  }
  return records.find((record) => record.address === address) ?? records[0];
}
