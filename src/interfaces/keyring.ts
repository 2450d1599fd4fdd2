/**
 * @module interfaces/keyring
 * @description Keyring access and the process-wide security context.
 *
 * The keyring file format and its password encryption belong to the
 * keyring implementation; this module only names the contract the
 * credential resolver consumes and the lookup that installs a keyring.
 */

import type { IndividualAddress, EncryptedPassword } from "../types/branded.js";
import type { KeyringDevice, KeyringInterfaceRecord } from "../types/keyring.js";
import type { OptionSet } from "../types/options.js";

/**
 * A loaded keyring.
 */
export interface Keyring {
  /** Interface address → tunneling users of that interface. */
  interfaces(): ReadonlyMap<IndividualAddress, readonly KeyringInterfaceRecord[]>;

  /** Device address → device credentials. */
  devices(): ReadonlyMap<IndividualAddress, KeyringDevice>;

  /** Decrypts a stored password with the keyring passphrase. */
  decryptPassword(encrypted: EncryptedPassword, passphrase: string): Promise<string>;
}

/**
 * Loads a keyring from a file path.
 */
export interface KeyringLoader {
  load(path: string): Promise<Keyring>;
}

/**
 * Process-wide security installation consumed by the protocol layer.
 */
export interface SecurityContext {
  useKeyring(keyring: Keyring, passphrase: string): void;
}

/**
 * The keyring currently installed for this process, with its passphrase.
 */
export interface ActiveKeyring {
  readonly keyring: Keyring;
  readonly passphrase: string;
}

/**
 * @interface IKeyringLookup
 * @description Discovers and installs the keyring referenced by an
 * Option Set.
 */
export interface IKeyringLookup {
  /**
   * @command
   * @description If `options.keyringPassword` is set, loads the explicit
   * `options.keyring`, or else the single keyring file in the working
   * directory, and installs it. Finding no keyring is not an error.
   *
   * @returns The installed keyring, or null if none was installed.
   * @postcondition Emits KEYRING_INSTALLED or KEYRING_NOT_FOUND.
   */
  lookup(options: OptionSet): Promise<Keyring | null>;

  /**
   * @query
   * @description The keyring installed by the last successful lookup.
   */
  getActive(): ActiveKeyring | null;
}
