export const WARDEN_VERSION = {
  major: 0,
  minor: 4,
  patch: 0,
  string: '0.4.0',
} as const;
