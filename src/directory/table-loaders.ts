import type { Store } from '@hamicek/noex-store';
import type { PermissionSet } from '../permissions/permission-set.js';
import { fromNames } from '../permissions/bitmask.js';
import type {
  ChannelRecord,
  DirectoryBucketName,
  MemberRoleRecord,
  OverwriteRecord,
  RoleRecord,
  ServerRecord,
} from './directory-types.js';
import { overwriteKey, type DirectoryTables } from './directory-snapshot.js';

// ── Table Loaders ────────────────────────────────────────────────
//
// One loader per bucket. Each reads the whole bucket and returns fresh
// maps for the tables that bucket feeds; nothing is mutated in place.

type TableLoader = (store: Store) => Promise<Partial<DirectoryTables>>;

async function loadServers(store: Store): Promise<Partial<DirectoryTables>> {
  const servers = new Map<string, ServerRecord>();
  const records = (await store
    .bucket('_servers')
    .all()) as unknown as ServerRecord[];

  for (const s of records) servers.set(s.id, s);

  return { servers };
}

async function loadChannels(store: Store): Promise<Partial<DirectoryTables>> {
  const channels = new Map<string, ChannelRecord>();
  const records = (await store
    .bucket('_channels')
    .all()) as unknown as ChannelRecord[];

  for (const c of records) channels.set(c.id, c);

  return { channels };
}

async function loadRoles(store: Store): Promise<Partial<DirectoryTables>> {
  const roles = new Map<string, RoleRecord>();
  const roleGrants = new Map<string, PermissionSet>();
  const defaultRoles = new Map<string, RoleRecord>();
  const records = (await store
    .bucket('_roles')
    .all()) as unknown as RoleRecord[];

  for (const r of records) {
    roles.set(r.id, r);
    roleGrants.set(r.id, fromNames({ allow: r.permissions ?? [] }));
    if (r.isDefault) defaultRoles.set(r.serverId, r);
  }

  return { roles, roleGrants, defaultRoles };
}

async function loadMemberRoles(store: Store): Promise<Partial<DirectoryTables>> {
  const memberRoles = new Map<string, Set<string>>();
  const records = (await store
    .bucket('_member_roles')
    .all()) as unknown as MemberRoleRecord[];

  for (const mr of records) {
    let set = memberRoles.get(mr.userId);
    if (set === undefined) {
      set = new Set();
      memberRoles.set(mr.userId, set);
    }
    set.add(mr.roleId);
  }

  return { memberRoles };
}

async function loadOverwrites(store: Store): Promise<Partial<DirectoryTables>> {
  const overwrites = new Map<string, PermissionSet>();
  const records = (await store
    .bucket('_overwrites')
    .all()) as unknown as OverwriteRecord[];

  for (const o of records) {
    const key = overwriteKey(o.channelId, { type: o.subjectType, id: o.subjectId });
    overwrites.set(key, fromNames({ allow: o.allow ?? [], deny: o.deny ?? [] }));
  }

  return { overwrites };
}

const TABLE_LOADERS: Readonly<Record<DirectoryBucketName, TableLoader>> = {
  '_servers':      loadServers,
  '_channels':     loadChannels,
  '_roles':        loadRoles,
  '_member_roles': loadMemberRoles,
  '_overwrites':   loadOverwrites,
};

/** Loads every bucket into one complete table set. */
export async function loadAllTables(store: Store): Promise<Partial<DirectoryTables>> {
  const parts = await Promise.all(
    Object.values(TABLE_LOADERS).map((load) => load(store)),
  );
  return parts.reduce<Partial<DirectoryTables>>((acc, part) => ({ ...acc, ...part }), {});
}
