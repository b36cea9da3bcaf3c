import { PERMISSION_TYPES, type PermissionType } from './permission-type.js';
import { PermissionState } from './permission-state.js';

// ── Permission names ─────────────────────────────────────────────

/** Compact form of a set: the allowed and denied types, UNSET omitted. */
export interface PermissionNames {
  readonly allow: readonly PermissionType[];
  readonly deny: readonly PermissionType[];
}

// ── PermissionSet ────────────────────────────────────────────────

const CONSTRUCT = Symbol('PermissionSet');

/**
 * Immutable mapping from every PermissionType to a PermissionState.
 *
 * Total over the enumeration: a type that was never set reads as UNSET.
 * Instances come from {@link PermissionSetBuilder.build} or the decoders
 * in bitmask.ts, never from user code.
 */
export class PermissionSet {
  /** The all-UNSET set. */
  static readonly EMPTY: PermissionSet = new PermissionSet(CONSTRUCT, new Map());

  // Only non-UNSET entries are stored.
  readonly #states: ReadonlyMap<PermissionType, PermissionState>;

  constructor(
    token: typeof CONSTRUCT,
    states: ReadonlyMap<PermissionType, PermissionState>,
  ) {
    if (token !== CONSTRUCT) {
      throw new TypeError('PermissionSet instances are created by PermissionSetBuilder');
    }
    const copy = new Map<PermissionType, PermissionState>();
    for (const [type, state] of states) {
      if (state !== PermissionState.UNSET) copy.set(type, state);
    }
    this.#states = copy;
  }

  state(type: PermissionType): PermissionState {
    return this.#states.get(type) ?? PermissionState.UNSET;
  }

  isAllowed(type: PermissionType): boolean {
    return this.state(type) === PermissionState.ALLOWED;
  }

  isDenied(type: PermissionType): boolean {
    return this.state(type) === PermissionState.DENIED;
  }

  /** Types in ALLOWED state, in enumeration order. */
  allowed(): PermissionType[] {
    return this.#typesIn(PermissionState.ALLOWED);
  }

  /** Types in DENIED state, in enumeration order. */
  denied(): PermissionType[] {
    return this.#typesIn(PermissionState.DENIED);
  }

  /** Types in UNSET state, in enumeration order. */
  unset(): PermissionType[] {
    return this.#typesIn(PermissionState.UNSET);
  }

  /** Whether no type carries an explicit state. */
  isEmpty(): boolean {
    return this.#states.size === 0;
  }

  equals(other: PermissionSet): boolean {
    return PERMISSION_TYPES.every((type) => this.state(type) === other.state(type));
  }

  toNames(): PermissionNames {
    return { allow: this.allowed(), deny: this.denied() };
  }

  toJSON(): PermissionNames {
    return this.toNames();
  }

  #typesIn(state: PermissionState): PermissionType[] {
    return PERMISSION_TYPES.filter((type) => this.state(type) === state);
  }
}

/**
 * Package-internal factory. Not re-exported from the package entry point.
 */
export function createPermissionSet(
  states: ReadonlyMap<PermissionType, PermissionState>,
): PermissionSet {
  return states.size === 0 ? PermissionSet.EMPTY : new PermissionSet(CONSTRUCT, states);
}
