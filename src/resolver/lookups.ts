import type { PermissionSet } from '../permissions/permission-set.js';

// ── Collaborator Lookups ─────────────────────────────────────────
//
// Everything the resolver reads comes through this interface. An
// implementation is a read-only, point-in-time view: every answer it gives
// during one resolution must come from the same state of the underlying
// data. Stores that change concurrently hand out a fresh immutable view per
// resolution instead of reading live tables (see DirectorySnapshot).

export const CHANNEL_KINDS = ['text', 'voice', 'category'] as const;
export type ChannelKind = (typeof CHANNEL_KINDS)[number];

const KNOWN_KINDS: ReadonlySet<string> = new Set(CHANNEL_KINDS);

export function isChannelKind(value: unknown): value is ChannelKind {
  return typeof value === 'string' && KNOWN_KINDS.has(value);
}

export interface Role {
  readonly id: string;
  readonly position: number;
}

export type OverwriteSubject =
  | { readonly type: 'role'; readonly id: string }
  | { readonly type: 'user'; readonly id: string };

export interface GlobalPermissions {
  /** Server-wide grants of the user, before any channel overwrite. */
  readonly permissions: PermissionSet;
  /** Whether the user owns the server. */
  readonly isOwner: boolean;
}

export interface PermissionLookups {
  /** Server that owns the channel. */
  lookupServerId(channelId: string): string;

  /** Overwrite configured on the channel for the subject; EMPTY when none. */
  lookupOverwrite(channelId: string, subject: OverwriteSubject): PermissionSet;

  /** Roles the user holds in the server, the default role included. */
  lookupRoles(serverId: string, userId: string): readonly Role[];

  /** The role every member of the server implicitly holds. */
  lookupDefaultRole(serverId: string): Role;

  lookupGlobalPermissions(serverId: string, userId: string): GlobalPermissions;

  /** Whether the user can observe the channel at all. */
  isVisible(channelId: string, userId: string): boolean;

  resourceKind(channelId: string): ChannelKind;
}

/** Source of consistent lookups; each call returns one point-in-time view. */
export interface SnapshotSource {
  snapshot(): PermissionLookups;
}

export function roleSubject(id: string): OverwriteSubject {
  return { type: 'role', id };
}

export function userSubject(id: string): OverwriteSubject {
  return { type: 'user', id };
}
