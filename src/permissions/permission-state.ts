// ── Permission State ─────────────────────────────────────────────
//
// UNSET means "no opinion at this layer". It is the identity element
// of overwrite merging and never survives default-deny closure.

export const PermissionState = {
  ALLOWED: 'allowed',
  DENIED: 'denied',
  UNSET: 'unset',
} as const;

export type PermissionState = (typeof PermissionState)[keyof typeof PermissionState];
