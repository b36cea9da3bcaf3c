/**
 * 01: Channel Permissions
 *
 * Seeds one server into a store and asks the directory what members may
 * do in its channels: role grants, channel overwrites, owner bypass and
 * invite checks.
 *
 * Run:
 *   npx tsx examples/01-channel-permissions.example.ts
 */

import { Store } from '@hamicek/noex-store';
import { PermissionDirectory, PermissionType, roleSubject, userSubject } from '../src/index.js';

function idOf(record: Readonly<Record<string, unknown>>): string {
  const id = record['id'];
  if (typeof id !== 'string') throw new Error('record has no string id');
  return id;
}

async function main() {
  // ── 1. Start store and directory ────────────────────────────────

  const store = await Store.start({ name: 'permissions-demo' });
  const directory = await PermissionDirectory.start(store, { selfUserId: 'demo-bot' });

  // ── 2. Seed a server ────────────────────────────────────────────

  const serverId = idOf(await store.bucket('_servers').insert({ name: 'Demo', ownerId: 'olivia' }));

  const everyone = idOf(await store.bucket('_roles').insert({
    serverId,
    name: '@everyone',
    isDefault: true,
    permissions: ['VIEW_CHANNEL', 'SEND_MESSAGES', 'CREATE_INVITE'],
  }));
  const mod = idOf(await store.bucket('_roles').insert({
    serverId,
    name: 'mod',
    position: 1,
    permissions: ['MANAGE_MESSAGES'],
  }));

  const announcements = idOf(await store.bucket('_channels').insert({ serverId, name: 'announcements' }));
  const lobby = idOf(await store.bucket('_channels').insert({ serverId, name: 'lobby', kind: 'category' }));

  await store.bucket('_member_roles').insert({ userId: 'alice', roleId: mod });

  // ── 3. Lock the channel for everyone but mods ───────────────────

  const lock = (subject: { type: 'role' | 'user'; id: string }, names: { allow?: string[]; deny?: string[] }) =>
    store.bucket('_overwrites').insert({
      channelId: announcements,
      subjectType: subject.type,
      subjectId: subject.id,
      ...names,
    });

  await lock(roleSubject(everyone), { deny: ['SEND_MESSAGES'] });
  await lock(roleSubject(mod), { allow: ['SEND_MESSAGES'] });
  await lock(userSubject('bob'), { deny: ['VIEW_CHANNEL'] });

  await directory.settle();
  await delay(50);

  // ── 4. Ask questions ────────────────────────────────────────────

  const { resolver } = directory;

  console.log('alice can post:', resolver.hasPermission(announcements, 'alice', PermissionType.SEND_MESSAGES));
  console.log('carol can post:', resolver.hasPermission(announcements, 'carol', PermissionType.SEND_MESSAGES));
  console.log('bob sees the channel:', resolver.hasPermission(announcements, 'bob', PermissionType.VIEW_CHANNEL));
  console.log('alice allowed:', resolver.allowedPermissions(announcements, 'alice').join(', '));
  console.log('owner effective:', resolver.resolveEffectivePermissions(announcements, 'olivia').toNames());

  console.log('carol can invite:', resolver.canCreateInvite(announcements, 'carol'));
  console.log('invite to a category:', resolver.canCreateInvite(lobby, 'carol'));
  console.log('bot can invite:', resolver.canSelfCreateInvite(announcements));

  // ── 5. Cleanup ──────────────────────────────────────────────────

  await directory.stop();
  await store.stop();
  console.log('\nDone!');
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
