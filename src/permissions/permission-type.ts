// ── Permission Types ─────────────────────────────────────────────
//
// Closed set of capabilities a member can hold in a server or channel.
// Each member owns one bit of the packed allow/deny masks (see bitmask.ts).
// Adding a capability means adding it here AND to PERMISSION_BITS.

export const PermissionType = {
  CREATE_INVITE:        'CREATE_INVITE',
  KICK_MEMBERS:         'KICK_MEMBERS',
  BAN_MEMBERS:          'BAN_MEMBERS',
  ADMINISTRATOR:        'ADMINISTRATOR',
  MANAGE_CHANNELS:      'MANAGE_CHANNELS',
  MANAGE_SERVER:        'MANAGE_SERVER',
  ADD_REACTIONS:        'ADD_REACTIONS',
  VIEW_AUDIT_LOG:       'VIEW_AUDIT_LOG',
  VIEW_CHANNEL:         'VIEW_CHANNEL',
  SEND_MESSAGES:        'SEND_MESSAGES',
  SEND_TTS_MESSAGES:    'SEND_TTS_MESSAGES',
  MANAGE_MESSAGES:      'MANAGE_MESSAGES',
  EMBED_LINKS:          'EMBED_LINKS',
  ATTACH_FILES:         'ATTACH_FILES',
  READ_MESSAGE_HISTORY: 'READ_MESSAGE_HISTORY',
  MENTION_EVERYONE:     'MENTION_EVERYONE',
  USE_EXTERNAL_EMOJIS:  'USE_EXTERNAL_EMOJIS',
  CONNECT:              'CONNECT',
  SPEAK:                'SPEAK',
  MUTE_MEMBERS:         'MUTE_MEMBERS',
  DEAFEN_MEMBERS:       'DEAFEN_MEMBERS',
  MOVE_MEMBERS:         'MOVE_MEMBERS',
  USE_VOICE_ACTIVITY:   'USE_VOICE_ACTIVITY',
  CHANGE_NICKNAME:      'CHANGE_NICKNAME',
  MANAGE_NICKNAMES:     'MANAGE_NICKNAMES',
  MANAGE_ROLES:         'MANAGE_ROLES',
  MANAGE_WEBHOOKS:      'MANAGE_WEBHOOKS',
  MANAGE_EMOJIS:        'MANAGE_EMOJIS',
} as const;

export type PermissionType = (typeof PermissionType)[keyof typeof PermissionType];

export const PERMISSION_BITS: Readonly<Record<PermissionType, number>> = {
  CREATE_INVITE:        0x1,
  KICK_MEMBERS:         0x2,
  BAN_MEMBERS:          0x4,
  ADMINISTRATOR:        0x8,
  MANAGE_CHANNELS:      0x10,
  MANAGE_SERVER:        0x20,
  ADD_REACTIONS:        0x40,
  VIEW_AUDIT_LOG:       0x80,
  VIEW_CHANNEL:         0x400,
  SEND_MESSAGES:        0x800,
  SEND_TTS_MESSAGES:    0x1000,
  MANAGE_MESSAGES:      0x2000,
  EMBED_LINKS:          0x4000,
  ATTACH_FILES:         0x8000,
  READ_MESSAGE_HISTORY: 0x10000,
  MENTION_EVERYONE:     0x20000,
  USE_EXTERNAL_EMOJIS:  0x40000,
  CONNECT:              0x100000,
  SPEAK:                0x200000,
  MUTE_MEMBERS:         0x400000,
  DEAFEN_MEMBERS:       0x800000,
  MOVE_MEMBERS:         0x1000000,
  USE_VOICE_ACTIVITY:   0x2000000,
  CHANGE_NICKNAME:      0x4000000,
  MANAGE_NICKNAMES:     0x8000000,
  MANAGE_ROLES:         0x10000000,
  MANAGE_WEBHOOKS:      0x20000000,
  MANAGE_EMOJIS:        0x40000000,
};

/** Every permission type, in declaration order. */
export const PERMISSION_TYPES: readonly PermissionType[] = Object.freeze(
  Object.values(PermissionType),
);

const KNOWN_TYPES: ReadonlySet<string> = new Set(PERMISSION_TYPES);

export function isPermissionType(value: unknown): value is PermissionType {
  return typeof value === 'string' && KNOWN_TYPES.has(value);
}
