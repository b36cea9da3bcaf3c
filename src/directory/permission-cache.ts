import type { Store } from '@hamicek/noex-store';
import type { GenServerBehavior, GenServerRef } from '@hamicek/noex';
import { GenServer } from '@hamicek/noex';
import type { ResolvedEngineConfig } from '../config.js';
import type { SnapshotSource } from '../resolver/lookups.js';
import { ErrorCode } from '../codes.js';
import { PermissionEngineError } from '../errors.js';
import { DIRECTORY_BUCKET_NAMES } from './directory-types.js';
import { DirectorySnapshot, type DirectoryTables } from './directory-snapshot.js';
import { loadAllTables } from './table-loaders.js';

// ── Reload Server ────────────────────────────────────────────────
//
// Bucket events are turned into `reload` casts. The GenServer mailbox runs
// them one at a time, so two reloads never race and an older read can never
// replace a newer one. A `sync` call returns once every cast queued before
// it has been handled.

export interface ReloadState {
  readonly applied: number;
}

export type ReloadCast = { readonly type: 'reload' };
export type ReloadCall = { readonly type: 'sync' };

export type ReloadRef = GenServerRef<ReloadState, ReloadCall, ReloadCast, number>;

export function createReloadBehavior(
  reload: () => Promise<void>,
): GenServerBehavior<ReloadState, ReloadCall, ReloadCast, number> {
  return {
    init(): ReloadState {
      return { applied: 0 };
    },

    handleCall(_msg: ReloadCall, state: ReloadState): [number, ReloadState] {
      return [state.applied, state];
    },

    async handleCast(_msg: ReloadCast, state: ReloadState): Promise<ReloadState> {
      await reload();
      return { applied: state.applied + 1 };
    },
  };
}

// ── PermissionCache ──────────────────────────────────────────────
//
// Immutable snapshot of the directory buckets, loaded on start and kept
// current through store event subscriptions.
//
// Every reload reads all buckets and publishes one complete snapshot, so a
// snapshot never pairs a fresh table with a stale one. Events that arrive
// while a reload is queued are folded into it.

export type TablesLoader = (store: Store) => Promise<Partial<DirectoryTables>>;

export class PermissionCache implements SnapshotSource {
  readonly #store: Store;
  readonly #config: ResolvedEngineConfig;
  readonly #loadTables: TablesLoader;
  #snapshot: DirectorySnapshot;
  #server: ReloadRef | null = null;
  #reloadQueued = false;

  readonly #unsubscribers: Array<() => Promise<void>> = [];

  private constructor(
    store: Store,
    config: ResolvedEngineConfig,
    loadTables: TablesLoader,
    snapshot: DirectorySnapshot,
  ) {
    this.#store = store;
    this.#config = config;
    this.#loadTables = loadTables;
    this.#snapshot = snapshot;
  }

  /**
   * Creates and initializes a PermissionCache.
   *
   * 1. Loads every directory bucket (a failure rejects the start).
   * 2. Starts the reload server and subscribes to bucket events.
   * 3. Reloads once more to pick up writes made between 1 and 2.
   *
   * If step 2 or 3 fails, whatever was started is stopped again.
   */
  static async start(
    store: Store,
    config: ResolvedEngineConfig,
    loadTables: TablesLoader = loadAllTables,
  ): Promise<PermissionCache> {
    const initial = DirectorySnapshot.EMPTY.with(await loadTables(store));
    const cache = new PermissionCache(store, config, loadTables, initial);

    cache.#server = await GenServer.start(
      createReloadBehavior(() => cache.#reload()),
    );

    try {
      await cache.#subscribeToChanges();
      cache.#markDirty();
      await cache.settle();
    } catch (error) {
      await cache.stop();
      throw error;
    }

    return cache;
  }

  /** Unsubscribes from all store events and stops the reload server. */
  async stop(): Promise<void> {
    for (const unsub of this.#unsubscribers) {
      await unsub();
    }
    this.#unsubscribers.length = 0;

    if (this.#server !== null) {
      await GenServer.stop(this.#server, 'normal');
      this.#server = null;
    }
  }

  /** Current point-in-time view; never changes after it is returned. */
  snapshot(): DirectorySnapshot {
    return this.#snapshot;
  }

  /** Resolves once every reload queued so far has been applied. */
  async settle(): Promise<void> {
    if (this.#server === null) return;
    await GenServer.call(this.#server, { type: 'sync' });
  }

  // ── Reload ─────────────────────────────────────────────────────

  #markDirty(): void {
    if (this.#server === null || this.#reloadQueued) return;
    this.#reloadQueued = true;
    GenServer.cast(this.#server, { type: 'reload' });
  }

  async #reload(): Promise<void> {
    // Cleared before reading: an event during the read queues the next reload.
    this.#reloadQueued = false;
    try {
      const tables = await this.#loadTables(this.#store);
      this.#snapshot = DirectorySnapshot.EMPTY.with(tables);
    } catch (error) {
      this.#config.onError(
        error instanceof Error
          ? error
          : new PermissionEngineError(ErrorCode.INTERNAL_ERROR, String(error)),
        'reload failed, keeping previous snapshot',
      );
    }
  }

  // ── Subscribe for Invalidation ─────────────────────────────────

  async #subscribeToChanges(): Promise<void> {
    for (const bucket of DIRECTORY_BUCKET_NAMES) {
      this.#unsubscribers.push(
        await this.#store.on(`bucket.${bucket}.*`, () => {
          this.#markDirty();
        }),
      );
    }
  }
}
