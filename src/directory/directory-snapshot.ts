import { PERMISSION_TYPES, PermissionType } from '../permissions/permission-type.js';
import { PermissionState } from '../permissions/permission-state.js';
import { PermissionSet } from '../permissions/permission-set.js';
import { PermissionSetBuilder } from '../permissions/permission-set-builder.js';
import type {
  ChannelKind,
  GlobalPermissions,
  OverwriteSubject,
  PermissionLookups,
  Role,
} from '../resolver/lookups.js';
import { hasAnyPermission } from '../resolver/access-decisions.js';
import type { ChannelRecord, RoleRecord, ServerRecord } from './directory-types.js';
import { ErrorCode } from '../codes.js';
import { PermissionEngineError } from '../errors.js';

// ── Tables ───────────────────────────────────────────────────────

export interface DirectoryTables {
  // serverId → ServerRecord
  readonly servers: ReadonlyMap<string, ServerRecord>;

  // channelId → ChannelRecord
  readonly channels: ReadonlyMap<string, ChannelRecord>;

  // roleId → RoleRecord
  readonly roles: ReadonlyMap<string, RoleRecord>;

  // roleId → decoded server-wide grants
  readonly roleGrants: ReadonlyMap<string, PermissionSet>;

  // serverId → default role
  readonly defaultRoles: ReadonlyMap<string, RoleRecord>;

  // userId → Set<roleId>
  readonly memberRoles: ReadonlyMap<string, ReadonlySet<string>>;

  // overwriteKey(channelId, subject) → overwrite
  readonly overwrites: ReadonlyMap<string, PermissionSet>;
}

export const EMPTY_TABLES: DirectoryTables = {
  servers: new Map(),
  channels: new Map(),
  roles: new Map(),
  roleGrants: new Map(),
  defaultRoles: new Map(),
  memberRoles: new Map(),
  overwrites: new Map(),
};

/** Collision-free key: ids may contain any character. */
export function overwriteKey(channelId: string, subject: OverwriteSubject): string {
  return JSON.stringify([channelId, subject.type, subject.id]);
}

// ── DirectorySnapshot ────────────────────────────────────────────

/**
 * Immutable view of the directory at one point in time.
 *
 * Reloads never touch an existing snapshot: they build a new one with
 * {@link with} and swap it in, so a resolution holding a snapshot keeps
 * reading the same data to the end.
 */
export class DirectorySnapshot implements PermissionLookups {
  static readonly EMPTY = new DirectorySnapshot(EMPTY_TABLES);

  readonly tables: DirectoryTables;

  constructor(tables: DirectoryTables) {
    this.tables = tables;
  }

  /** Returns a new snapshot with some tables replaced. */
  with(changes: Partial<DirectoryTables>): DirectorySnapshot {
    return new DirectorySnapshot({ ...this.tables, ...changes });
  }

  lookupServerId(channelId: string): string {
    return this.#requireChannel(channelId).serverId;
  }

  lookupOverwrite(channelId: string, subject: OverwriteSubject): PermissionSet {
    return this.tables.overwrites.get(overwriteKey(channelId, subject)) ?? PermissionSet.EMPTY;
  }

  /** Default role first, then assigned roles by ascending position. */
  lookupRoles(serverId: string, userId: string): readonly Role[] {
    const defaultRole = this.lookupDefaultRole(serverId);
    const assigned: RoleRecord[] = [];

    for (const roleId of this.tables.memberRoles.get(userId) ?? []) {
      const role = this.tables.roles.get(roleId);
      if (role === undefined || role.serverId !== serverId) continue;
      if (role.id === defaultRole.id) continue;
      assigned.push(role);
    }

    assigned.sort((a, b) => a.position - b.position || a.id.localeCompare(b.id));
    return [defaultRole, ...assigned.map(toRole)];
  }

  lookupDefaultRole(serverId: string): Role {
    this.#requireServer(serverId);
    const role = this.tables.defaultRoles.get(serverId);
    if (role === undefined) {
      throw new PermissionEngineError(
        ErrorCode.NOT_FOUND,
        `Server "${serverId}" has no default role`,
      );
    }
    return toRole(role);
  }

  /** Union of the grants of every role the user holds, default role included. */
  lookupGlobalPermissions(serverId: string, userId: string): GlobalPermissions {
    const server = this.#requireServer(serverId);
    const builder = new PermissionSetBuilder();

    for (const role of this.lookupRoles(serverId, userId)) {
      const grants = this.tables.roleGrants.get(role.id) ?? PermissionSet.EMPTY;
      for (const type of PERMISSION_TYPES) {
        if (grants.isAllowed(type)) builder.set(type, PermissionState.ALLOWED);
      }
    }

    return {
      permissions: builder.build(),
      isOwner: server.ownerId === userId,
    };
  }

  /** A channel is visible with ADMINISTRATOR or VIEW_CHANNEL in it. */
  isVisible(channelId: string, userId: string): boolean {
    return hasAnyPermission(this, channelId, userId, [
      PermissionType.ADMINISTRATOR,
      PermissionType.VIEW_CHANNEL,
    ]);
  }

  resourceKind(channelId: string): ChannelKind {
    return this.#requireChannel(channelId).kind;
  }

  #requireChannel(channelId: string): ChannelRecord {
    const channel = this.tables.channels.get(channelId);
    if (channel === undefined) {
      throw PermissionEngineError.notFound('Channel', channelId);
    }
    return channel;
  }

  #requireServer(serverId: string): ServerRecord {
    const server = this.tables.servers.get(serverId);
    if (server === undefined) {
      throw PermissionEngineError.notFound('Server', serverId);
    }
    return server;
  }
}

function toRole(record: RoleRecord): Role {
  return { id: record.id, position: record.position };
}
