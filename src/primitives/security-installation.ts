/**
 * @module primitives/security-installation
 * @description In-process SecurityContext holding the installed keyring.
 */

import type { ActiveKeyring, Keyring, SecurityContext } from "../interfaces/keyring.js";

/**
 * SecurityInstallation: the security context the protocol layer reads
 * the keyring and its passphrase from. One default instance lives for the
 * whole process; installing a keyring replaces the previous one.
 */
export class SecurityInstallation implements SecurityContext {
  private static instance: SecurityInstallation | null = null;

  private installed: ActiveKeyring | null = null;

  /**
   * Returns the process-wide installation, creating it on first access.
   */
  static defaultInstallation(): SecurityInstallation {
    if (!SecurityInstallation.instance) {
      SecurityInstallation.instance = new SecurityInstallation();
    }
    return SecurityInstallation.instance;
  }

  useKeyring(keyring: Keyring, passphrase: string): void {
    this.installed = { keyring, passphrase };
  }

  keyring(): ActiveKeyring | null {
    return this.installed;
  }
}
