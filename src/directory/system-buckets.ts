import type { Store } from '@hamicek/noex-store';
import type { BucketDefinition } from '@hamicek/noex-store';
import { CHANNEL_KINDS } from '../resolver/lookups.js';
import { DIRECTORY_BUCKET_NAMES, type DirectoryBucketName } from './directory-types.js';

// ── Bucket Definitions ───────────────────────────────────────────

export const SERVERS_BUCKET: BucketDefinition = {
  key: 'id',
  schema: {
    id:      { type: 'string', generated: 'uuid' },
    name:    { type: 'string', maxLength: 100 },
    ownerId: { type: 'string', required: true },
  },
  indexes: ['ownerId'],
};

export const CHANNELS_BUCKET: BucketDefinition = {
  key: 'id',
  schema: {
    id:       { type: 'string', generated: 'uuid' },
    serverId: { type: 'string', required: true, ref: '_servers' },
    name:     { type: 'string', maxLength: 100 },
    kind:     { type: 'string', enum: [...CHANNEL_KINDS], default: 'text' },
    position: { type: 'number', default: 0 },
  },
  indexes: ['serverId'],
};

export const ROLES_BUCKET: BucketDefinition = {
  key: 'id',
  schema: {
    id:          { type: 'string', generated: 'uuid' },
    serverId:    { type: 'string', required: true, ref: '_servers' },
    name:        { type: 'string', maxLength: 100 },
    position:    { type: 'number', default: 0 },
    isDefault:   { type: 'boolean', default: false },
    permissions: { type: 'array' },
  },
  indexes: ['serverId'],
};

export const MEMBER_ROLES_BUCKET: BucketDefinition = {
  key: 'id',
  schema: {
    id:     { type: 'string', generated: 'uuid' },
    userId: { type: 'string', required: true },
    roleId: { type: 'string', required: true, ref: '_roles' },
  },
  indexes: ['userId', 'roleId'],
};

export const OVERWRITES_BUCKET: BucketDefinition = {
  key: 'id',
  schema: {
    id:          { type: 'string', generated: 'uuid' },
    channelId:   { type: 'string', required: true, ref: '_channels' },
    subjectType: { type: 'string', required: true, enum: ['role', 'user'] },
    subjectId:   { type: 'string', required: true },
    allow:       { type: 'array' },
    deny:        { type: 'array' },
  },
  indexes: ['channelId', 'subjectId'],
};

const BUCKET_MAP: Record<DirectoryBucketName, BucketDefinition> = {
  '_servers':      SERVERS_BUCKET,
  '_channels':     CHANNELS_BUCKET,
  '_roles':        ROLES_BUCKET,
  '_member_roles': MEMBER_ROLES_BUCKET,
  '_overwrites':   OVERWRITES_BUCKET,
};

// ── ensureDirectoryBuckets ───────────────────────────────────────

/**
 * Creates every directory bucket that does not exist yet.
 * Idempotent, so it runs on every start.
 */
export async function ensureDirectoryBuckets(store: Store): Promise<void> {
  for (const name of DIRECTORY_BUCKET_NAMES) {
    if (!store.hasBucket(name)) {
      await store.defineBucket(name, BUCKET_MAP[name]);
    }
  }
}
