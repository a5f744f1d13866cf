/**
 * Current resolver version.
 * Increment MAJOR when persisted records must be re-synced.
 * Increment MINOR for backward-compatible additions.
 * Increment PATCH for bug fixes.
 */
export const RESOLVER_VERSION = {
  major: 1,
  minor: 0,
  patch: 0,
  string: '1.0.0',
} as const;
