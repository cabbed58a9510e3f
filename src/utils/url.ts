// CHANGE: Build raw-content URLs for repository files.
// WHY: Branch names and paths may contain '#', which would otherwise be read as a URL fragment.

import { GITHUB } from "../config.js";
import { RepositoryDescriptor } from "../types.js";

/**
 * Normalise raw file URL to ensure it is safe for HTTP requests.
 *
 * @param rawUrl - Assembled raw-content URL.
 * @returns URL with '#' percent-encoded.
 */
export function normalizeRawUrl(rawUrl: string): string {
  return rawUrl.replace(/#/g, "%23");
}

/**
 * URL of a file on the repository's default branch.
 *
 * @param repository - Repository owning the file.
 * @param filePath - Path relative to the repository root; leading slashes are ignored.
 */
export function rawContentUrl(repository: RepositoryDescriptor, filePath: string): string {
  const relative = filePath.replace(/^\/+/, "");
  return normalizeRawUrl(
    `${GITHUB.RAW_BASE}/${repository.owner}/${repository.repo}/${repository.defaultBranch}/${relative}`
  );
}
