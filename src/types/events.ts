/**
 * @module types/events
 * @description Typed events emitted during link setup.
 *
 * Events are the observable trail of every decision the factory takes:
 * which keyring got installed, which tier produced a credential, whether
 * a pooled connection was reused, and which link variant was built.
 */

import type { IndividualAddress, UnixTimestamp } from "./branded.js";
import type {
  CredentialRole,
  CredentialTier,
  Endpoint,
  LinkKind,
  ManagementKind,
} from "./link.js";

// ─── Keyring Events ─────────────────────────────────────────────────

export interface KeyringInstalledEvent {
  readonly type: "KEYRING_INSTALLED";
  readonly path: string;
  readonly source: "EXPLICIT" | "WORKING_DIRECTORY";
  readonly timestamp: UnixTimestamp;
}

export interface KeyringNotFoundEvent {
  readonly type: "KEYRING_NOT_FOUND";
  readonly directory: string;
  /** Number of candidate files found (0 or more than 1), or -1 if unreadable. */
  readonly candidates: number;
  readonly error?: string;
  readonly timestamp: UnixTimestamp;
}

// ─── Credential Events ──────────────────────────────────────────────

export interface CredentialResolvedEvent {
  readonly type: "CREDENTIAL_RESOLVED";
  readonly role: CredentialRole;
  readonly tier: CredentialTier;
  readonly timestamp: UnixTimestamp;
}

export interface CredentialAbsentEvent {
  readonly type: "CREDENTIAL_ABSENT";
  readonly role: CredentialRole;
  readonly timestamp: UnixTimestamp;
}

export interface UserIdBackfilledEvent {
  readonly type: "USER_ID_BACKFILLED";
  readonly user: number;
  readonly interfaceAddress: IndividualAddress;
  readonly timestamp: UnixTimestamp;
}

// ─── Connection Events ──────────────────────────────────────────────

export interface ConnectionOpenedEvent {
  readonly type: "CONNECTION_OPENED";
  readonly remote: Endpoint;
  /** True if a stale, disconnected entry was replaced. */
  readonly replaced: boolean;
  readonly timestamp: UnixTimestamp;
}

export interface ConnectionReusedEvent {
  readonly type: "CONNECTION_REUSED";
  readonly remote: Endpoint;
  readonly timestamp: UnixTimestamp;
}

// ─── Factory Events ─────────────────────────────────────────────────

export interface LinkSelectedEvent {
  readonly type: "LINK_SELECTED";
  readonly kind: LinkKind;
  readonly timestamp: UnixTimestamp;
}

export interface ManagementSelectedEvent {
  readonly type: "MANAGEMENT_SELECTED";
  readonly kind: ManagementKind;
  readonly timestamp: UnixTimestamp;
}

// ─── Event Map ──────────────────────────────────────────────────────

export interface KnxEventMap {
  KEYRING_INSTALLED: KeyringInstalledEvent;
  KEYRING_NOT_FOUND: KeyringNotFoundEvent;
  CREDENTIAL_RESOLVED: CredentialResolvedEvent;
  CREDENTIAL_ABSENT: CredentialAbsentEvent;
  USER_ID_BACKFILLED: UserIdBackfilledEvent;
  CONNECTION_OPENED: ConnectionOpenedEvent;
  CONNECTION_REUSED: ConnectionReusedEvent;
  LINK_SELECTED: LinkSelectedEvent;
  MANAGEMENT_SELECTED: ManagementSelectedEvent;
}

export type KnxEventType = keyof KnxEventMap;

export type KnxEvent = KnxEventMap[KnxEventType];

