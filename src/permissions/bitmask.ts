import {
  PERMISSION_BITS,
  PERMISSION_TYPES,
  isPermissionType,
  type PermissionType,
} from './permission-type.js';
import { PermissionState } from './permission-state.js';
import type { PermissionSet } from './permission-set.js';
import { PermissionSetBuilder } from './permission-set-builder.js';

// ── Packed form ──────────────────────────────────────────────────
//
// A set packs into two masks: `allow` has the bit of every ALLOWED type,
// `deny` the bit of every DENIED type. UNSET sets neither. When a bit is
// present in both masks, deny wins.

export interface PermissionBitmasks {
  readonly allow: number;
  readonly deny: number;
}

export function toBitmasks(set: PermissionSet): PermissionBitmasks {
  let allow = 0;
  let deny = 0;
  for (const type of PERMISSION_TYPES) {
    const state = set.state(type);
    if (state === PermissionState.ALLOWED) allow |= PERMISSION_BITS[type];
    else if (state === PermissionState.DENIED) deny |= PERMISSION_BITS[type];
  }
  return { allow, deny };
}

/** Decodes packed masks. Bits outside the enumeration are ignored. */
export function fromBitmasks(allow: number, deny: number): PermissionSet {
  const builder = new PermissionSetBuilder();
  for (const type of PERMISSION_TYPES) {
    const bit = PERMISSION_BITS[type];
    if ((allow & bit) !== 0) builder.set(type, PermissionState.ALLOWED);
    if ((deny & bit) !== 0) builder.set(type, PermissionState.DENIED);
  }
  return builder.build();
}

/**
 * Decodes allow/deny name lists (the stored form of an overwrite).
 * Names outside the enumeration are skipped; deny wins over allow.
 */
export function fromNames(names: {
  readonly allow?: readonly string[];
  readonly deny?: readonly string[];
}): PermissionSet {
  const builder = new PermissionSetBuilder();
  for (const name of names.allow ?? []) {
    if (isPermissionType(name)) builder.set(name, PermissionState.ALLOWED);
  }
  for (const name of names.deny ?? []) {
    if (isPermissionType(name)) builder.set(name, PermissionState.DENIED);
  }
  return builder.build();
}

/** Sum of the bits of the given types. */
export function maskOf(types: readonly PermissionType[]): number {
  let mask = 0;
  for (const type of types) mask |= PERMISSION_BITS[type];
  return mask;
}
