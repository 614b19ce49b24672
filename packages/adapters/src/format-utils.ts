// src/format-utils.ts

const MAX_SLUG_LENGTH = 64;

/**
 * Turn a display title into a directory-safe slug: spaces become hyphens,
 * everything is lowercased, anything outside `[a-z0-9-_]` is removed and the
 * result is cut to 64 characters.
 */
export function cleanAndFormatString(input: string): string {
  return input
    .replace(/ /g, '-')
    .toLowerCase()
    .replace(/[^a-z0-9\-_]/g, '')
    .slice(0, MAX_SLUG_LENGTH);
}
