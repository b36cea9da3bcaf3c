import { CHANNEL_KINDS, isChannelKind, type ChannelKind } from './resolver/lookups.js';
import { DEFAULT_NON_INVITABLE_KINDS } from './resolver/access-decisions.js';
import { ErrorCode } from './codes.js';
import { PermissionEngineError } from './errors.js';

// ── Engine Config (user-facing) ──────────────────────────────────

export interface EngineConfig {
  /** Name used to prefix reports. Default: 'channel-permissions'. */
  readonly name?: string;

  /**
   * User id of the connected account. Enables
   * `PermissionResolver.canSelfCreateInvite`. Default: none.
   */
  readonly selfUserId?: string;

  /** Channel kinds no invite can point at. Default: ['category']. */
  readonly nonInvitableKinds?: readonly ChannelKind[];

  /**
   * Called for failures that happen in the background (snapshot reloads).
   * Default: one line on stderr.
   */
  readonly onError?: (error: Error, context: string) => void;
}

// ── Defaults ──────────────────────────────────────────────────────

export const DEFAULT_NAME = 'channel-permissions';

// ── Resolved Config (all defaults applied) ────────────────────────

export interface ResolvedEngineConfig {
  readonly name: string;
  readonly selfUserId: string | null;
  readonly nonInvitableKinds: readonly ChannelKind[];
  readonly onError: (error: Error, context: string) => void;
}

// ── Resolve ───────────────────────────────────────────────────────

export function resolveConfig(config: EngineConfig = {}): ResolvedEngineConfig {
  const name = config.name ?? DEFAULT_NAME;

  // Copied so later edits to the caller's array do not change decisions.
  const nonInvitableKinds: readonly ChannelKind[] = Object.freeze([
    ...(config.nonInvitableKinds ?? DEFAULT_NON_INVITABLE_KINDS),
  ]);
  const unknownKinds = nonInvitableKinds.filter((kind) => !isChannelKind(kind));
  if (unknownKinds.length > 0) {
    throw new PermissionEngineError(
      ErrorCode.VALIDATION_ERROR,
      `Unknown channel kind(s): ${unknownKinds.join(', ')}`,
      { allowed: CHANNEL_KINDS },
    );
  }

  return {
    name,
    selfUserId: config.selfUserId ?? null,
    nonInvitableKinds,
    onError: config.onError ?? ((error, context) => {
      console.error(`[${name}] ${context}: ${error.message}`);
    }),
  };
}
