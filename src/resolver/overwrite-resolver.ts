import { PERMISSION_TYPES } from '../permissions/permission-type.js';
import { PermissionState } from '../permissions/permission-state.js';
import type { PermissionSet } from '../permissions/permission-set.js';
import { PermissionSetBuilder } from '../permissions/permission-set-builder.js';
import { roleSubject, userSubject, type PermissionLookups } from './lookups.js';

// ── Effective Overwrite ──────────────────────────────────────────
//
// Layers, lowest to highest precedence:
//
//   0. default role overwrite        (ALLOWED and DENIED both applied)
//   1. DENIED of every other role
//   2. ALLOWED of every other role   (any role's allow beats any role's deny)
//   3. user overwrite                (ALLOWED and DENIED both applied)
//
// Role position plays no part. UNSET never writes, so a type no layer
// mentions stays UNSET in the result.

/**
 * Merges the channel's default-role, role and user overwrites that apply
 * to the user into one set. Global (server-wide) grants are not included.
 */
export function resolveEffectiveOverwrite(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
): PermissionSet {
  const serverId = lookups.lookupServerId(channelId);
  const defaultRole = lookups.lookupDefaultRole(serverId);
  const builder = new PermissionSetBuilder();

  applyExplicit(builder, lookups.lookupOverwrite(channelId, roleSubject(defaultRole.id)));

  const roleOverwrites = lookups
    .lookupRoles(serverId, userId)
    .filter((role) => role.id !== defaultRole.id)
    .map((role) => lookups.lookupOverwrite(channelId, roleSubject(role.id)));

  for (const overwrite of roleOverwrites) {
    applyOnly(builder, overwrite, PermissionState.DENIED);
  }
  for (const overwrite of roleOverwrites) {
    applyOnly(builder, overwrite, PermissionState.ALLOWED);
  }

  applyExplicit(builder, lookups.lookupOverwrite(channelId, userSubject(userId)));

  return builder.build();
}

function applyExplicit(builder: PermissionSetBuilder, overwrite: PermissionSet): void {
  for (const type of PERMISSION_TYPES) {
    const state = overwrite.state(type);
    if (state !== PermissionState.UNSET) builder.set(type, state);
  }
}

function applyOnly(
  builder: PermissionSetBuilder,
  overwrite: PermissionSet,
  state: PermissionState,
): void {
  for (const type of PERMISSION_TYPES) {
    if (overwrite.state(type) === state) builder.set(type, state);
  }
}
