import { describe, it, expect, beforeEach } from 'vitest';
import {
  allowedPermissions,
  canCreateInvite,
  deniedPermissions,
  hasAllPermissions,
  hasAnyPermission,
} from '../../../src/resolver/access-decisions.js';
import { roleSubject } from '../../../src/resolver/lookups.js';
import { PERMISSION_TYPES, PermissionType } from '../../../src/permissions/permission-type.js';
import {
  CATEGORY_ID,
  CHANNEL_ID,
  DEFAULT_ROLE_ID,
  InMemoryLookups,
  perms,
} from '../../helpers/in-memory-lookups.js';

const { ADMINISTRATOR, CREATE_INVITE, SEND_MESSAGES, VIEW_CHANNEL, ATTACH_FILES } = PermissionType;
const USER = 'user-1';

describe('access decisions', () => {
  let lookups: InMemoryLookups;

  beforeEach(() => {
    lookups = new InMemoryLookups()
      .setGlobal(USER, perms({ allow: [VIEW_CHANNEL, SEND_MESSAGES] }));
  });

  describe('allowedPermissions / deniedPermissions', () => {
    it('split the enumeration between them', () => {
      const allowed = allowedPermissions(lookups, CHANNEL_ID, USER);
      const denied = deniedPermissions(lookups, CHANNEL_ID, USER);

      expect(allowed).toEqual([VIEW_CHANNEL, SEND_MESSAGES]);
      expect(denied).toHaveLength(PERMISSION_TYPES.length - 2);
      expect(denied).not.toContain(VIEW_CHANNEL);
    });
  });

  describe('hasAllPermissions', () => {
    it('is true when every type is allowed', () => {
      expect(hasAllPermissions(lookups, CHANNEL_ID, USER, [VIEW_CHANNEL, SEND_MESSAGES])).toBe(true);
    });

    it('is false when one type is denied', () => {
      expect(hasAllPermissions(lookups, CHANNEL_ID, USER, [VIEW_CHANNEL, ATTACH_FILES])).toBe(false);
    });

    it('is true for an empty request', () => {
      expect(hasAllPermissions(lookups, CHANNEL_ID, USER, [])).toBe(true);
    });
  });

  describe('hasAnyPermission', () => {
    it('is true when one type is allowed', () => {
      expect(hasAnyPermission(lookups, CHANNEL_ID, USER, [ATTACH_FILES, SEND_MESSAGES])).toBe(true);
    });

    it('is false when no type is allowed', () => {
      expect(hasAnyPermission(lookups, CHANNEL_ID, USER, [ATTACH_FILES, ADMINISTRATOR])).toBe(false);
    });

    it('is false for an empty request', () => {
      expect(hasAnyPermission(lookups, CHANNEL_ID, USER, [])).toBe(false);
    });
  });

  describe('canCreateInvite', () => {
    it('needs CREATE_INVITE or ADMINISTRATOR', () => {
      expect(canCreateInvite(lookups, CHANNEL_ID, USER)).toBe(false);

      lookups.setOverwrite(CHANNEL_ID, roleSubject(DEFAULT_ROLE_ID), perms({ allow: [CREATE_INVITE] }));
      expect(canCreateInvite(lookups, CHANNEL_ID, USER)).toBe(true);
    });

    it('accepts ADMINISTRATOR in place of CREATE_INVITE', () => {
      lookups.setGlobal(USER, perms({ allow: [ADMINISTRATOR] }));
      expect(canCreateInvite(lookups, CHANNEL_ID, USER)).toBe(true);
    });

    it('is false for a channel the user cannot see', () => {
      lookups
        .setGlobal(USER, perms({ allow: [CREATE_INVITE] }))
        .hide(CHANNEL_ID, USER);

      expect(canCreateInvite(lookups, CHANNEL_ID, USER)).toBe(false);
    });

    it('is false for a category by default', () => {
      lookups.setGlobal(USER, perms({ allow: [CREATE_INVITE] }));
      expect(canCreateInvite(lookups, CATEGORY_ID, USER)).toBe(false);
    });

    it('follows the configured non-invitable kinds', () => {
      lookups
        .setGlobal(USER, perms({ allow: [CREATE_INVITE] }))
        .addChannel('voice-1', 'voice');

      expect(canCreateInvite(lookups, CATEGORY_ID, USER, [])).toBe(true);
      expect(canCreateInvite(lookups, 'voice-1', USER, ['voice'])).toBe(false);
      expect(canCreateInvite(lookups, CHANNEL_ID, USER, ['voice'])).toBe(true);
    });
  });
});
