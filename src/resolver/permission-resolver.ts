import type { PermissionType } from '../permissions/permission-type.js';
import type { PermissionSet } from '../permissions/permission-set.js';
import type { ChannelKind, SnapshotSource } from './lookups.js';
import { resolveEffectiveOverwrite } from './overwrite-resolver.js';
import { resolveEffectivePermissions } from './effective-permissions.js';
import {
  DEFAULT_NON_INVITABLE_KINDS,
  allowedPermissions,
  canCreateInvite,
  deniedPermissions,
  hasAllPermissions,
  hasAnyPermission,
  hasPermission,
} from './access-decisions.js';
import { ErrorCode } from '../codes.js';
import { PermissionEngineError } from '../errors.js';

export interface PermissionResolverOptions {
  readonly nonInvitableKinds?: readonly ChannelKind[];
  readonly selfUserId?: string | null;
}

// ── PermissionResolver ───────────────────────────────────────────

/**
 * ID-based entry point to the resolution engine.
 *
 * Every method takes exactly one snapshot from the source and answers from
 * it alone, so a call never mixes data from before and after a concurrent
 * update. Two calls may see different snapshots.
 */
export class PermissionResolver {
  readonly #source: SnapshotSource;
  readonly #nonInvitableKinds: readonly ChannelKind[];
  readonly #selfUserId: string | null;

  constructor(source: SnapshotSource, options: PermissionResolverOptions = {}) {
    this.#source = source;
    this.#nonInvitableKinds = options.nonInvitableKinds ?? DEFAULT_NON_INVITABLE_KINDS;
    this.#selfUserId = options.selfUserId ?? null;
  }

  resolveEffectiveOverwrite(channelId: string, userId: string): PermissionSet {
    return resolveEffectiveOverwrite(this.#source.snapshot(), channelId, userId);
  }

  resolveEffectivePermissions(channelId: string, userId: string): PermissionSet {
    return resolveEffectivePermissions(this.#source.snapshot(), channelId, userId);
  }

  allowedPermissions(channelId: string, userId: string): PermissionType[] {
    return allowedPermissions(this.#source.snapshot(), channelId, userId);
  }

  deniedPermissions(channelId: string, userId: string): PermissionType[] {
    return deniedPermissions(this.#source.snapshot(), channelId, userId);
  }

  hasPermission(channelId: string, userId: string, type: PermissionType): boolean {
    return hasPermission(this.#source.snapshot(), channelId, userId, type);
  }

  hasAllPermissions(channelId: string, userId: string, ...types: PermissionType[]): boolean {
    return hasAllPermissions(this.#source.snapshot(), channelId, userId, types);
  }

  hasAnyPermission(channelId: string, userId: string, ...types: PermissionType[]): boolean {
    return hasAnyPermission(this.#source.snapshot(), channelId, userId, types);
  }

  canCreateInvite(channelId: string, userId: string): boolean {
    return canCreateInvite(
      this.#source.snapshot(),
      channelId,
      userId,
      this.#nonInvitableKinds,
    );
  }

  /**
   * `canCreateInvite` for the connected account.
   * Throws NOT_CONFIGURED when no self user id was given.
   */
  canSelfCreateInvite(channelId: string): boolean {
    if (this.#selfUserId === null) {
      throw new PermissionEngineError(
        ErrorCode.NOT_CONFIGURED,
        'No self user id configured',
      );
    }
    return this.canCreateInvite(channelId, this.#selfUserId);
  }
}
