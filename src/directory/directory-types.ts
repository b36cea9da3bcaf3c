import type { ChannelKind } from '../resolver/lookups.js';

// ── Directory Types ──────────────────────────────────────────────
//
// Records stored in the directory buckets (_servers, _channels, ...).
// They are written by whatever ingests server state; this package only
// reads them.

// ── Server ───────────────────────────────────────────────────────

export interface ServerRecord {
  readonly id: string;
  readonly name?: string;
  readonly ownerId: string;
  readonly _version: number;
  readonly _createdAt: number;
  readonly _updatedAt: number;
}

// ── Channel ──────────────────────────────────────────────────────

export interface ChannelRecord {
  readonly id: string;
  readonly serverId: string;
  readonly name?: string;
  readonly kind: ChannelKind;
  readonly position?: number;
  readonly _version: number;
  readonly _createdAt: number;
  readonly _updatedAt: number;
}

// ── Role ─────────────────────────────────────────────────────────

export interface RoleRecord {
  readonly id: string;
  readonly serverId: string;
  readonly name?: string;
  readonly position: number;
  /** Marks the role every member of the server implicitly holds. */
  readonly isDefault: boolean;
  /** Permission type names granted server-wide. */
  readonly permissions?: readonly string[];
  readonly _version: number;
  readonly _createdAt: number;
  readonly _updatedAt: number;
}

// ── Member–Role join ─────────────────────────────────────────────

export interface MemberRoleRecord {
  readonly id: string;
  readonly userId: string;
  readonly roleId: string;
  readonly _version: number;
  readonly _createdAt: number;
  readonly _updatedAt: number;
}

// ── Overwrite ────────────────────────────────────────────────────

export type OverwriteSubjectType = 'role' | 'user';

export interface OverwriteRecord {
  readonly id: string;
  readonly channelId: string;
  readonly subjectType: OverwriteSubjectType;
  readonly subjectId: string;
  /** Permission type names explicitly allowed. */
  readonly allow?: readonly string[];
  /** Permission type names explicitly denied. Deny wins over allow. */
  readonly deny?: readonly string[];
  readonly _version: number;
  readonly _createdAt: number;
  readonly _updatedAt: number;
}

// ── Bucket Names ─────────────────────────────────────────────────

export const DIRECTORY_BUCKET_NAMES = [
  '_servers',
  '_channels',
  '_roles',
  '_member_roles',
  '_overwrites',
] as const;
export type DirectoryBucketName = (typeof DIRECTORY_BUCKET_NAMES)[number];
