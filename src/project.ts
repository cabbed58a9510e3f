// CHANGE: Build catalog project records from a repository and its entry file.
// WHY: Install directory, display name, and donation link are inferred from loosely structured sources.

import { cleanVersion, extractClassPrefix, extractMetadata } from "./metadata.js";
import { ExtractedMetadata, ProjectKind, ProjectRecord, RepositoryDescriptor } from "./types.js";
import { isValidDirectoryName, sanitizeDirectoryName, slugify } from "./utils/slug.js";

const MAX_DISPLAY_NAME_LENGTH = 40;
const SELF_HOSTED_LINK_PREFIX = "https://github.com/";

const NAME_PREFIXES: Record<ProjectKind, RegExp> = {
  plugin: /^typecho[-_]?plugin[-_]+/i,
  theme: /^typecho[-_]?theme[-_]+/i
};

export type BuildResult =
  | { readonly ok: true; readonly project: ProjectRecord }
  | { readonly ok: false; readonly reason: "invalid-directory" | "build-error"; readonly detail?: string };

/**
 * Strip the conventional `typecho-plugin-` / `typecho-theme-` prefix from a repository name.
 *
 * @param repoName - Repository name.
 * @param kind - Project kind selecting the prefix.
 * @returns Stripped name, or the original when nothing would be left.
 */
export function deriveDisplayName(repoName: string, kind: ProjectKind): string {
  const name = repoName.trim().replace(NAME_PREFIXES[kind], "").trim();
  return name || repoName;
}

/**
 * Pick the install directory from the first source that is a legal directory name.
 *
 * Order: `@package` tag, plugin class prefix, derived display name, sanitized display
 * name, sanitized repository name.
 *
 * @returns Directory name, or an empty string when no source qualifies.
 */
export function resolveInstallDir(
  kind: ProjectKind,
  repoName: string,
  meta: ExtractedMetadata,
  classPrefix: string
): string {
  const derived = deriveDisplayName(repoName, kind);
  const candidates = [
    meta.package.trim(),
    classPrefix,
    derived,
    sanitizeDirectoryName(derived),
    sanitizeDirectoryName(repoName)
  ];
  return candidates.find(isValidDirectoryName) ?? "";
}

function isHttpUrl(value: string): boolean {
  const lower = value.toLowerCase();
  return lower.startsWith("http://") || lower.startsWith("https://");
}

/**
 * Choose a donation link: an external `@link` tag first, then the repository homepage.
 */
export function resolveDonateLink(meta: ExtractedMetadata, repository: RepositoryDescriptor): string {
  const link = meta.link.trim();
  if (link && !link.toLowerCase().startsWith(SELF_HOSTED_LINK_PREFIX)) {
    return link;
  }
  if (repository.homepage && isHttpUrl(repository.homepage)) {
    return repository.homepage;
  }
  return "";
}

/**
 * Compute the catalog id for a project before collision handling.
 */
export function projectId(kind: ProjectKind, dir: string, repository: RepositoryDescriptor): string {
  const slug = slugify(dir || repository.repo) || slugify(`${repository.owner}-${repository.repo}`);
  return `${kind}-${slug}`;
}

function assembleProject(kind: ProjectKind, repository: RepositoryDescriptor, fileText: string): ProjectRecord | null {
  const meta = extractMetadata(fileText);
  const classPrefix = kind === "plugin" ? extractClassPrefix(fileText) : "";
  const dir = resolveInstallDir(kind, repository.repo, meta, classPrefix);
  if (!dir) {
    return null;
  }

  const derivedName = deriveDisplayName(repository.repo, kind);
  const name = meta.package && Array.from(derivedName).length > MAX_DISPLAY_NAME_LENGTH ? meta.package : derivedName;

  return {
    id: projectId(kind, dir, repository),
    name,
    type: kind,
    link: repository.htmlUrl || `https://github.com/${repository.owner}/${repository.repo}`,
    isGithub: true,
    direct: true,
    version: cleanVersion(meta.version),
    typecho: "",
    author: meta.author.trim() || repository.owner,
    donate: resolveDonateLink(meta, repository),
    description: repository.description || meta.description,
    dir
  };
}

/**
 * Build a project record for one discovered repository.
 *
 * @param kind - Project kind the repository was searched under.
 * @param repository - Search result.
 * @param fileText - Contents of the kind's entry file.
 * @returns The project, or the reason it cannot enter the catalog.
 */
export function buildProject(kind: ProjectKind, repository: RepositoryDescriptor, fileText: string): BuildResult {
  try {
    const project = assembleProject(kind, repository, fileText);
    return project ? { ok: true, project } : { ok: false, reason: "invalid-directory" };
  } catch (error) {
    return { ok: false, reason: "build-error", detail: error instanceof Error ? error.message : String(error) };
  }
}
