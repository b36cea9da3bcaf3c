import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Store } from '@hamicek/noex-store';
import { GenServer } from '@hamicek/noex';
import {
  PermissionCache,
  createReloadBehavior,
  type TablesLoader,
} from '../../../src/directory/permission-cache.js';
import { DirectorySnapshot } from '../../../src/directory/directory-snapshot.js';
import { ensureDirectoryBuckets } from '../../../src/directory/system-buckets.js';
import { loadAllTables } from '../../../src/directory/table-loaders.js';
import { resolveConfig } from '../../../src/config.js';
import { hasPermission } from '../../../src/resolver/access-decisions.js';
import { roleSubject, userSubject } from '../../../src/resolver/lookups.js';
import { PermissionType } from '../../../src/permissions/permission-type.js';
import { PermissionEngineError } from '../../../src/errors.js';
import { ErrorCode } from '../../../src/codes.js';
import { addOverwrite, assignRole, seedServer, type SeededServer } from '../../helpers/seed-directory.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Reload server ────────────────────────────────────────────────

describe('createReloadBehavior', () => {
  it('applies reloads one at a time in arrival order', async () => {
    const log: string[] = [];
    let next = 0;
    const ref = await GenServer.start(
      createReloadBehavior(async () => {
        const n = ++next;
        log.push(`start ${n}`);
        // The first reload is the slowest; a parallel run would interleave.
        await delay(n === 1 ? 30 : 1);
        log.push(`end ${n}`);
      }),
    );

    GenServer.cast(ref, { type: 'reload' });
    GenServer.cast(ref, { type: 'reload' });
    GenServer.cast(ref, { type: 'reload' });

    const applied = await GenServer.call(ref, { type: 'sync' });
    await GenServer.stop(ref, 'normal');

    expect(applied).toBe(3);
    expect(log).toEqual(['start 1', 'end 1', 'start 2', 'end 2', 'start 3', 'end 3']);
  });
});

// ── PermissionCache ──────────────────────────────────────────────

describe('PermissionCache', () => {
  let store: Store;
  let cache: PermissionCache;
  let seeded: SeededServer;
  let storeCounter = 0;
  const onError = vi.fn();

  beforeEach(async () => {
    onError.mockReset();
    store = await Store.start({ name: `perm-cache-test-${++storeCounter}` });
    await ensureDirectoryBuckets(store);
    seeded = await seedServer(store, 'owner-1');
    cache = await PermissionCache.start(store, resolveConfig({ onError }));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cache.stop();
    await store.stop();
  });

  async function settle(target: PermissionCache = cache): Promise<void> {
    await store.settle();
    await target.settle();
  }

  it('loads the directory on start', () => {
    const snapshot = cache.snapshot();

    expect(snapshot.lookupServerId(seeded.textChannelId)).toBe(seeded.serverId);
    expect(snapshot.lookupDefaultRole(seeded.serverId).id).toBe(seeded.defaultRoleId);
    expect(snapshot.resourceKind(seeded.categoryId)).toBe('category');
  });

  it('picks up writes through bucket events', async () => {
    await assignRole(store, 'user-1', seeded.modRoleId);
    await settle();

    await vi.waitFor(() => {
      const roles = cache.snapshot().lookupRoles(seeded.serverId, 'user-1');
      expect(roles.map((r) => r.id)).toEqual([seeded.defaultRoleId, seeded.modRoleId]);
    });
  });

  it('never changes a snapshot that was already handed out', async () => {
    const before = cache.snapshot();

    await addOverwrite(store, seeded.textChannelId, userSubject('user-1'), {
      deny: [PermissionType.VIEW_CHANNEL],
    });
    await settle();

    await vi.waitFor(() => {
      expect(cache.snapshot()).not.toBe(before);
      expect(cache.snapshot().lookupOverwrite(seeded.textChannelId, userSubject('user-1')).denied())
        .toEqual([PermissionType.VIEW_CHANNEL]);
    });
    expect(before.lookupOverwrite(seeded.textChannelId, userSubject('user-1')).isEmpty()).toBe(true);
  });

  it('drops deleted records on reload', async () => {
    const grantId = await assignRole(store, 'user-1', seeded.modRoleId);
    await settle();
    await vi.waitFor(() => {
      expect(cache.snapshot().lookupRoles(seeded.serverId, 'user-1')).toHaveLength(2);
    });

    await store.bucket('_member_roles').delete(grantId);
    await settle();

    await vi.waitFor(() => {
      expect(cache.snapshot().lookupRoles(seeded.serverId, 'user-1')).toHaveLength(1);
    });
    expect(onError).not.toHaveBeenCalled();
  });

  it('publishes only complete snapshots for a write spanning two buckets', async () => {
    // user-1 may send only through the mod role; the transaction swaps that
    // for a user overwrite, so sending is allowed before and after it.
    const grantId = await assignRole(store, 'user-1', seeded.modRoleId);
    await addOverwrite(store, seeded.textChannelId, roleSubject(seeded.defaultRoleId), {
      deny: [PermissionType.SEND_MESSAGES],
    });
    await addOverwrite(store, seeded.textChannelId, roleSubject(seeded.modRoleId), {
      allow: [PermissionType.SEND_MESSAGES],
    });
    await settle();

    const published: DirectorySnapshot[] = [];
    const recording: TablesLoader = async (s) => {
      const tables = await loadAllTables(s);
      published.push(DirectorySnapshot.EMPTY.with(tables));
      return tables;
    };
    const watched = await PermissionCache.start(store, resolveConfig({ onError }), recording);

    try {
      await store.transaction(async (tx) => {
        const memberRoles = await tx.bucket('_member_roles');
        await memberRoles.delete(grantId);
        const overwrites = await tx.bucket('_overwrites');
        await overwrites.insert({
          channelId: seeded.textChannelId,
          subjectType: 'user',
          subjectId: 'user-1',
          allow: [PermissionType.SEND_MESSAGES],
          deny: [],
        });
      });
      await settle(watched);

      await vi.waitFor(() => {
        expect(watched.snapshot().lookupRoles(seeded.serverId, 'user-1')).toHaveLength(1);
        expect(
          watched.snapshot().lookupOverwrite(seeded.textChannelId, userSubject('user-1')).allowed(),
        ).toEqual([PermissionType.SEND_MESSAGES]);
      });

      expect(published.length).toBeGreaterThanOrEqual(3);
      for (const snapshot of published) {
        expect(
          hasPermission(snapshot, seeded.textChannelId, 'user-1', PermissionType.SEND_MESSAGES),
        ).toBe(true);
      }
    } finally {
      await watched.stop();
    }
  });

  it('keeps the previous snapshot and reports when a reload fails', async () => {
    let failing = false;
    const flaky: TablesLoader = async (s) => {
      if (failing) throw new Error('bucket unavailable');
      return loadAllTables(s);
    };
    const reported = vi.fn((_error: Error, _context: string) => undefined);
    const flakyCache = await PermissionCache.start(store, resolveConfig({ onError: reported }), flaky);

    try {
      const before = flakyCache.snapshot();
      failing = true;
      await assignRole(store, 'user-1', seeded.modRoleId);
      await settle(flakyCache);

      await vi.waitFor(() => {
        expect(reported).toHaveBeenCalledTimes(1);
      });
      failing = false;

      const [error, context] = reported.mock.calls[0] ?? [];
      expect(error).toBeInstanceOf(Error);
      expect(error).toHaveProperty('message', 'bucket unavailable');
      expect(context).toBe('reload failed, keeping previous snapshot');
      expect(flakyCache.snapshot()).toBe(before);

      await assignRole(store, 'user-2', seeded.modRoleId);
      await settle(flakyCache);

      await vi.waitFor(() => {
        const snapshot = flakyCache.snapshot();
        expect(snapshot.lookupRoles(seeded.serverId, 'user-1')).toHaveLength(2);
        expect(snapshot.lookupRoles(seeded.serverId, 'user-2')).toHaveLength(2);
      });
      expect(reported).toHaveBeenCalledTimes(1);
    } finally {
      await flakyCache.stop();
    }
  });

  it('wraps a non-Error rejection as INTERNAL_ERROR', async () => {
    let failing = false;
    const flaky: TablesLoader = (s) =>
      failing ? Promise.reject('bucket unavailable') : loadAllTables(s);
    const reported = vi.fn((_error: Error, _context: string) => undefined);
    const flakyCache = await PermissionCache.start(store, resolveConfig({ onError: reported }), flaky);

    try {
      failing = true;
      await assignRole(store, 'user-1', seeded.modRoleId);
      await settle(flakyCache);

      await vi.waitFor(() => {
        expect(reported).toHaveBeenCalled();
      });
      failing = false;

      const [error] = reported.mock.calls[0] ?? [];
      expect(error).toBeInstanceOf(PermissionEngineError);
      if (error instanceof PermissionEngineError) {
        expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
        expect(error.message).toBe('bucket unavailable');
      }
    } finally {
      await flakyCache.stop();
    }
  });

  it('stops what it started when subscribing fails', async () => {
    const unsubscribe = vi.fn(async () => undefined);
    vi.spyOn(store, 'on')
      .mockResolvedValueOnce(unsubscribe)
      .mockRejectedValueOnce(new Error('subscribe failed'));
    const stopSpy = vi.spyOn(GenServer, 'stop');

    await expect(PermissionCache.start(store, resolveConfig({ onError }))).rejects.toThrow(
      'subscribe failed',
    );

    expect(unsubscribe).toHaveBeenCalledTimes(1);
    expect(stopSpy).toHaveBeenCalledTimes(1);
  });

  it('stop is idempotent and settle after stop resolves', async () => {
    await cache.stop();
    await cache.stop();
    await expect(cache.settle()).resolves.toBeUndefined();
  });
});
