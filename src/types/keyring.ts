/**
 * @module types/keyring
 * @description Records exposed by a loaded keyring.
 *
 * A keyring maps interface addresses to the tunneling users of that
 * interface, and device addresses to device credentials. Passwords stay
 * encrypted until the keyring decrypts them with its passphrase.
 */

import type { IndividualAddress, EncryptedPassword } from "./branded.js";

/**
 * One tunneling user of a KNX IP interface.
 */
export interface KeyringInterfaceRecord {
  /** Tunneling address assigned to this user. */
  readonly address: IndividualAddress;
  /** Tunneling user id (1..127). */
  readonly user: number;
  readonly password?: EncryptedPassword;
}

/**
 * Credentials of a device (typically the interface device itself).
 */
export interface KeyringDevice {
  readonly address: IndividualAddress;
  /** Management password. */
  readonly password?: EncryptedPassword;
  /** Device authentication password. */
  readonly authentication?: EncryptedPassword;
}
