import { PermissionType } from '../permissions/permission-type.js';
import type { ChannelKind, PermissionLookups } from './lookups.js';
import { resolveEffectivePermissions } from './effective-permissions.js';

// ── Access Decisions ─────────────────────────────────────────────
//
// Boolean and list queries derived from resolveEffectivePermissions.
// They hold no state of their own.

export const DEFAULT_NON_INVITABLE_KINDS: readonly ChannelKind[] = Object.freeze(['category']);

export function allowedPermissions(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
): PermissionType[] {
  return resolveEffectivePermissions(lookups, channelId, userId).allowed();
}

export function deniedPermissions(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
): PermissionType[] {
  return resolveEffectivePermissions(lookups, channelId, userId).denied();
}

export function hasPermission(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
  type: PermissionType,
): boolean {
  return resolveEffectivePermissions(lookups, channelId, userId).isAllowed(type);
}

/** True when every requested type is allowed; an empty request is true. */
export function hasAllPermissions(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
  types: readonly PermissionType[],
): boolean {
  const effective = resolveEffectivePermissions(lookups, channelId, userId);
  return types.every((type) => effective.isAllowed(type));
}

/** True when at least one requested type is allowed; an empty request is false. */
export function hasAnyPermission(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
  types: readonly PermissionType[],
): boolean {
  const effective = resolveEffectivePermissions(lookups, channelId, userId);
  return types.some((type) => effective.isAllowed(type));
}

/**
 * Whether the user may create an invite to the channel: they must see it,
 * its kind must accept invites, and they need ADMINISTRATOR or CREATE_INVITE.
 */
export function canCreateInvite(
  lookups: PermissionLookups,
  channelId: string,
  userId: string,
  nonInvitableKinds: readonly ChannelKind[] = DEFAULT_NON_INVITABLE_KINDS,
): boolean {
  if (!lookups.isVisible(channelId, userId)) return false;
  if (nonInvitableKinds.includes(lookups.resourceKind(channelId))) return false;

  return hasAnyPermission(lookups, channelId, userId, [
    PermissionType.ADMINISTRATOR,
    PermissionType.CREATE_INVITE,
  ]);
}
