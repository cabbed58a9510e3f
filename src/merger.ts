// CHANGE: Merge discovered projects into the catalog keyed by canonical link.
// WHY: Curated entries must keep their values; discovery only fills blanks and fixes install directories.

import { CatalogEntry, CatalogProject, isOpaqueEntry, JsonValue, ProjectRecord } from "./types.js";
import { isValidDirectoryName } from "./utils/slug.js";

const FILL_IN_FIELDS = ["version", "typecho", "author", "donate", "description", "name", "type"] as const;

export interface MergeResult {
  readonly projects: CatalogEntry[];
  readonly added: number;
  readonly updated: number;
}

/**
 * Read a stored field, including values kept in `extra` because they were not of the expected JSON type.
 */
function storedValue(project: CatalogProject, field: Exclude<keyof CatalogProject, "extra" | "keys">): JsonValue {
  return project[field] ?? project.extra?.[field];
}

/**
 * Blank values are filled by discovery: missing, `null`, `""`, `0`, `false`, and empty arrays or objects.
 */
export function isBlank(value: JsonValue): boolean {
  if (value === undefined || value === null || value === "" || value === 0 || value === false) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === "object" && Object.keys(value).length === 0;
}

function asProject(entry: CatalogEntry | undefined): CatalogProject | undefined {
  return entry === undefined || isOpaqueEntry(entry) ? undefined : entry;
}

function lastLinkSegment(link: string | undefined): string {
  return link?.split("/").pop() ?? "";
}

/**
 * Decide the install directory of an existing project after rediscovery.
 *
 * A stored directory equal to the link's last segment is treated as a never-detected
 * guess and replaced. Any other differing directory is replaced when the incoming one is
 * legal. This heuristic can misfire when a real directory happens to match the repository name.
 */
export function correctDirectory(existing: CatalogProject, incomingDir: string): string | undefined {
  if (!incomingDir) {
    return existing.dir;
  }
  if (!existing.dir || existing.dir === lastLinkSegment(existing.link)) {
    return incomingDir;
  }
  if (existing.dir !== incomingDir && isValidDirectoryName(incomingDir)) {
    return incomingDir;
  }
  return existing.dir;
}

function updateProject(existing: CatalogProject, incoming: ProjectRecord): CatalogProject {
  const filled: Partial<Record<(typeof FILL_IN_FIELDS)[number], string>> = {};
  for (const field of FILL_IN_FIELDS) {
    if (isBlank(storedValue(existing, field)) && incoming[field]) {
      filled[field] = incoming[field];
    }
  }
  return {
    ...existing,
    ...filled,
    dir: correctDirectory(existing, incoming.dir),
    isGithub: storedValue(existing, "isGithub") === undefined ? true : existing.isGithub,
    direct: storedValue(existing, "direct") === undefined ? true : existing.direct
  };
}

class IdRegistry {
  private readonly used: Set<string>;

  constructor(entries: readonly CatalogEntry[]) {
    this.used = new Set(
      entries.flatMap(entry => {
        const project = asProject(entry);
        const id = project ? storedValue(project, "id") : undefined;
        return isBlank(id) ? [] : [String(id)];
      })
    );
  }

  claim(base: string): string {
    let candidate = base;
    for (let suffix = 2; this.used.has(candidate); suffix += 1) {
      candidate = `${base}-${suffix}`;
    }
    this.used.add(candidate);
    return candidate;
  }
}

/**
 * Merge discovered projects into existing catalog entries.
 *
 * @param existing - Current catalog entries in stored order. Entries that are not objects are carried over untouched.
 * @param incoming - Newly built projects in discovery order.
 * @returns Existing entries (updated in place of their position) followed by new ones.
 */
export function mergeProjects(existing: readonly CatalogEntry[], incoming: readonly ProjectRecord[]): MergeResult {
  const projects = [...existing];
  const byLink = new Map<string, number>();
  projects.forEach((entry, index) => {
    const link = asProject(entry)?.link?.trim();
    if (link) {
      byLink.set(link, index);
    }
  });
  const ids = new IdRegistry(existing);

  let added = 0;
  let updated = 0;
  for (const project of incoming) {
    const link = project.link.trim();
    if (!link) {
      continue;
    }
    const index = byLink.get(link);
    const current = index === undefined ? undefined : asProject(projects[index]);
    if (index !== undefined && current) {
      projects[index] = updateProject(current, project);
      updated += 1;
      continue;
    }
    projects.push({ ...project, id: ids.claim(project.id) });
    byLink.set(link, projects.length - 1);
    added += 1;
  }

  return { projects, added, updated };
}
