import { PERMISSION_TYPES, type PermissionType } from './permission-type.js';
import { PermissionState } from './permission-state.js';
import { createPermissionSet, type PermissionSet } from './permission-set.js';

// ── PermissionSetBuilder ─────────────────────────────────────────

/**
 * Mutable accumulator for a {@link PermissionSet}.
 *
 * Any type/state pair is legal. `build()` takes a snapshot and leaves the
 * builder usable, so one builder can produce several sets.
 */
export class PermissionSetBuilder {
  readonly #states = new Map<PermissionType, PermissionState>();

  constructor(seed?: PermissionSet) {
    if (seed === undefined) return;
    for (const type of PERMISSION_TYPES) {
      this.set(type, seed.state(type));
    }
  }

  get(type: PermissionType): PermissionState {
    return this.#states.get(type) ?? PermissionState.UNSET;
  }

  set(type: PermissionType, state: PermissionState): this {
    if (state === PermissionState.UNSET) {
      this.#states.delete(type);
    } else {
      this.#states.set(type, state);
    }
    return this;
  }

  build(): PermissionSet {
    return createPermissionSet(this.#states);
  }
}
