import { PERMISSION_TYPES } from '../permissions/permission-type.js';
import { PermissionState } from '../permissions/permission-state.js';
import type { PermissionSet } from '../permissions/permission-set.js';
import { PermissionSetBuilder } from '../permissions/permission-set-builder.js';
import type { PermissionLookups } from './lookups.js';
import { resolveEffectiveOverwrite } from './overwrite-resolver.js';

/**
 * Final permissions of a user in a channel.
 *
 * - The server owner gets their global set back unchanged; no overwrite is
 *   consulted. That set may still contain UNSET entries.
 * - Everyone else starts from the global set, takes every explicit state of
 *   the effective overwrite on top, and has what remains UNSET denied. The
 *   result then holds only ALLOWED and DENIED.
 *
 * Implications between types (sending without viewing, for example) are not
 * evaluated here.
 */
export function resolveEffectivePermissions(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
): PermissionSet {
  const serverId = lookups.lookupServerId(channelId);
  const global = lookups.lookupGlobalPermissions(serverId, userId);
  if (global.isOwner) return global.permissions;

  const builder = new PermissionSetBuilder(global.permissions);
  const overwrite = resolveEffectiveOverwrite(lookups, channelId, userId);

  for (const type of PERMISSION_TYPES) {
    const state = overwrite.state(type);
    if (state !== PermissionState.UNSET) builder.set(type, state);
  }

  for (const type of PERMISSION_TYPES) {
    if (builder.get(type) === PermissionState.UNSET) {
      builder.set(type, PermissionState.DENIED);
    }
  }

  return builder.build();
}
