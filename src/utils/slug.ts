const DIRECTORY_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Convert free text into a lowercase hyphenated slug.
 *
 * @param text - Arbitrary input.
 * @returns Slug of `[a-z0-9]` runs joined by single hyphens; empty for empty input.
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Check whether text can be used as an install directory name.
 */
export function isValidDirectoryName(text: string): boolean {
  return DIRECTORY_NAME.test(text);
}

/**
 * Best-effort conversion of a name into directory form. The result may still be invalid.
 *
 * @param text - Candidate name.
 * @returns Name with disallowed runs replaced by `-` and outer hyphens removed.
 */
export function sanitizeDirectoryName(text: string): string {
  return text.replace(/[^A-Za-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
}
