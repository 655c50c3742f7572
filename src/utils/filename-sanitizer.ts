const DISALLOWED = /[^\p{L}\p{N} ._-]/gu;

/**
 * Keep letters, digits, space, period, hyphen and underscore; drop the rest
 *
 * No escaping and no collision renaming. Idempotent.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(DISALLOWED, '');
}

/**
 * Append `extension` unless the name already ends with it (case-sensitive)
 */
export function ensureExtension(name: string, extension: string): string {
  return name.endsWith(extension) ? name : `${name}${extension}`;
}
