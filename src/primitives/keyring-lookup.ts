/**
 * @module primitives/keyring-lookup
 * @description Full implementation of the IKeyringLookup interface.
 *
 * A keyring is only looked for when a keyring passphrase was given.
 * The explicit `--keyring` path wins; otherwise the working directory
 * must contain exactly one file ending in the keyring suffix.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { KnxEmitter, timestamp } from "./base-emitter.js";
import { Mutex } from "./mutex.js";
import type {
  ActiveKeyring,
  IKeyringLookup,
  Keyring,
  KeyringLoader,
  SecurityContext,
} from "../interfaces/keyring.js";
import type { OptionSet } from "../types/options.js";

export interface KeyringLookupConfig {
  /** Directory searched for keyring files. Default: `process.cwd()` at lookup time. */
  workingDirectory?: string;
  /** File name suffix of keyring files. Default: ".knxkeys" */
  suffix?: string;
}

interface KeyringLocation {
  readonly path: string;
  readonly source: "EXPLICIT" | "WORKING_DIRECTORY";
}

/**
 * KeyringLookup: finds, loads and installs the process keyring.
 *
 * @example
 * ```ts
 * const lookup = new KeyringLookup(loader, SecurityInstallation.defaultInstallation());
 * await lookup.lookup({ medium, keyringPassword: "pwd" });
 * lookup.getActive()?.keyring.interfaces();
 * ```
 */
export class KeyringLookup extends KnxEmitter implements IKeyringLookup {
  private active: ActiveKeyring | null = null;
  private readonly lock = new Mutex();
  private readonly suffix: string;

  constructor(
    private readonly loader: KeyringLoader,
    private readonly security: SecurityContext,
    private readonly config: KeyringLookupConfig = {}
  ) {
    super();
    this.suffix = config.suffix ?? ".knxkeys";
  }

  // ─── Commands ───────────────────────────────────────────────────

  async lookup(options: OptionSet): Promise<Keyring | null> {
    const passphrase = options.keyringPassword;
    if (passphrase === undefined) return null;

    const location: KeyringLocation | null =
      options.keyring !== undefined
        ? { path: options.keyring, source: "EXPLICIT" }
        : await this.findInWorkingDirectory();
    if (!location) return null;

    const keyring = await this.loader.load(location.path);

    return this.lock.runExclusive(async () => {
      this.active = { keyring, passphrase };
      this.security.useKeyring(keyring, passphrase);

      this.emit({
        type: "KEYRING_INSTALLED",
        path: location.path,
        source: location.source,
        timestamp: timestamp(),
      });
      return keyring;
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  getActive(): ActiveKeyring | null {
    return this.active;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private async findInWorkingDirectory(): Promise<KeyringLocation | null> {
    const directory = this.config.workingDirectory ?? process.cwd();

    let entries: string[];
    try {
      entries = await readdir(directory);
    } catch (err) {
      this.emit({
        type: "KEYRING_NOT_FOUND",
        directory,
        candidates: -1,
        error: err instanceof Error ? err.message : String(err),
        timestamp: timestamp(),
      });
      return null;
    }

    const candidates = entries.filter((name) => name.endsWith(this.suffix));
    const [only] = candidates;
    if (candidates.length !== 1 || only === undefined) {
      this.emit({
        type: "KEYRING_NOT_FOUND",
        directory,
        candidates: candidates.length,
        timestamp: timestamp(),
      });
      return null;
    }

    return { path: join(directory, only), source: "WORKING_DIRECTORY" };
  }
}
