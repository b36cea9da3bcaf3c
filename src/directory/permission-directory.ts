import type { Store } from '@hamicek/noex-store';
import { resolveConfig, type EngineConfig, type ResolvedEngineConfig } from '../config.js';
import { PermissionResolver } from '../resolver/permission-resolver.js';
import { ensureDirectoryBuckets } from './system-buckets.js';
import { PermissionCache } from './permission-cache.js';

// ── PermissionDirectory ──────────────────────────────────────────

/**
 * Store-backed permission engine: directory buckets, a live snapshot cache
 * and a resolver reading from it.
 *
 * @example
 * ```ts
 * const store = await Store.start({ name: 'guilds' });
 * const directory = await PermissionDirectory.start(store);
 *
 * directory.resolver.hasPermission(channelId, userId, PermissionType.SEND_MESSAGES);
 *
 * await directory.stop();
 * ```
 */
export class PermissionDirectory {
  readonly #store: Store;
  readonly #cache: PermissionCache;
  readonly #resolver: PermissionResolver;
  readonly #config: ResolvedEngineConfig;

  private constructor(store: Store, cache: PermissionCache, config: ResolvedEngineConfig) {
    this.#store = store;
    this.#cache = cache;
    this.#config = config;
    this.#resolver = new PermissionResolver(cache, {
      nonInvitableKinds: config.nonInvitableKinds,
      selfUserId: config.selfUserId,
    });
  }

  /** Creates the directory buckets if needed and loads the cache. */
  static async start(store: Store, config?: EngineConfig): Promise<PermissionDirectory> {
    const resolved = resolveConfig(config);
    await ensureDirectoryBuckets(store);
    const cache = await PermissionCache.start(store, resolved);
    return new PermissionDirectory(store, cache, resolved);
  }

  get name(): string {
    return this.#config.name;
  }

  get resolver(): PermissionResolver {
    return this.#resolver;
  }

  get cache(): PermissionCache {
    return this.#cache;
  }

  /**
   * Waits until pending store events have been delivered and every reload
   * they caused is visible in the snapshot.
   */
  async settle(): Promise<void> {
    await this.#store.settle();
    await this.#cache.settle();
  }

  /** Stops the cache. The store stays running; its owner stops it. */
  async stop(): Promise<void> {
    await this.#cache.stop();
  }
}
