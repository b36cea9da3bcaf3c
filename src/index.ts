// ── Permissions ──────────────────────────────────────────────────

export { PermissionType, PERMISSION_TYPES, PERMISSION_BITS, isPermissionType } from './permissions/permission-type.js';
export { PermissionState } from './permissions/permission-state.js';
export { PermissionSet } from './permissions/permission-set.js';
export type { PermissionNames } from './permissions/permission-set.js';
export { PermissionSetBuilder } from './permissions/permission-set-builder.js';
export { toBitmasks, fromBitmasks, fromNames, maskOf } from './permissions/bitmask.js';
export type { PermissionBitmasks } from './permissions/bitmask.js';

// ── Resolution ───────────────────────────────────────────────────

export type {
  ChannelKind,
  Role,
  OverwriteSubject,
  GlobalPermissions,
  PermissionLookups,
  SnapshotSource,
} from './resolver/lookups.js';
export { CHANNEL_KINDS, isChannelKind, roleSubject, userSubject } from './resolver/lookups.js';
export { resolveEffectiveOverwrite } from './resolver/overwrite-resolver.js';
export { resolveEffectivePermissions } from './resolver/effective-permissions.js';
export {
  allowedPermissions,
  deniedPermissions,
  hasPermission,
  hasAllPermissions,
  hasAnyPermission,
  canCreateInvite,
  DEFAULT_NON_INVITABLE_KINDS,
} from './resolver/access-decisions.js';
export { PermissionResolver } from './resolver/permission-resolver.js';
export type { PermissionResolverOptions } from './resolver/permission-resolver.js';

// ── Store-backed directory ───────────────────────────────────────

export { PermissionDirectory } from './directory/permission-directory.js';
export { PermissionCache } from './directory/permission-cache.js';
export type { TablesLoader } from './directory/permission-cache.js';
export { loadAllTables } from './directory/table-loaders.js';
export { DirectorySnapshot } from './directory/directory-snapshot.js';
export type { DirectoryTables } from './directory/directory-snapshot.js';
export { ensureDirectoryBuckets } from './directory/system-buckets.js';
export { DIRECTORY_BUCKET_NAMES } from './directory/directory-types.js';
export type {
  ServerRecord,
  ChannelRecord,
  RoleRecord,
  MemberRoleRecord,
  OverwriteRecord,
  OverwriteSubjectType,
  DirectoryBucketName,
} from './directory/directory-types.js';

// ── Configuration ────────────────────────────────────────────────

export type { EngineConfig, ResolvedEngineConfig } from './config.js';
export { resolveConfig } from './config.js';

// ── Errors ───────────────────────────────────────────────────────

export { PermissionEngineError } from './errors.js';
export type { PermissionEngineErrorJSON } from './errors.js';
export { ErrorCode } from './codes.js';
