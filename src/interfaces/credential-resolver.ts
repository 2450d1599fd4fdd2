/**
 * @module interfaces/credential-resolver
 * @description ICredentialResolver: tiered lookup of KNX IP Secure keys.
 *
 * Tiers, first hit wins:
 * 1. explicit key from the Option Set
 * 2. password from the Option Set, hashed for the role
 * 3. keyring record selected by interface address
 * 4. absent (device authentication: empty secret)
 */

import type { Secret } from "../types/branded.js";
import type { OptionSet } from "../types/options.js";

/**
 * One-way password hashes used by KNX IP Secure.
 */
export interface PasswordHasher {
  hashUserPassword(password: string): Promise<Secret>;
  hashDeviceAuthenticationPassword(password: string): Promise<Secret>;
}

/**
 * @interface ICredentialResolver
 */
export interface ICredentialResolver {
  /**
   * @query
   * @description Resolves the tunneling user key.
   * @postcondition May set `options.user` from the matched keyring record
   *   when it was unset. Emits USER_ID_BACKFILLED in that case.
   * @returns The key, or undefined to run without a secure session.
   */
  userKey(options: OptionSet): Promise<Secret | undefined>;

  /**
   * @query
   * @description Resolves the device management key.
   * @returns The key, or undefined to run without a secure session.
   */
  deviceMgmtKey(options: OptionSet): Promise<Secret | undefined>;

  /**
   * @query
   * @description Resolves the device authentication code.
   * @returns The code, or an empty secret if none is configured.
   */
  deviceAuthentication(options: OptionSet): Promise<Secret>;
}
