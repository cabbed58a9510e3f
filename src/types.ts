// CHANGE: Define typed domain models for the catalog discovery pipeline.
// WHY: Search results, parsed metadata, and persisted projects flow through separate stages.

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

export type JsonRecord = { readonly [key: string]: JsonValue };

/**
 * Category of a catalog project.
 */
export type ProjectKind = "plugin" | "theme";

export const PROJECT_KINDS: readonly ProjectKind[] = ["plugin", "theme"];

/**
 * Repository located through the search endpoint.
 *
 * @property owner - Account login of the repository owner.
 * @property repo - Repository name without owner.
 * @property htmlUrl - Browser URL, used as the canonical link.
 * @property defaultBranch - Branch raw files are read from, `main` when unknown.
 * @property homepage - Homepage declared in repository settings.
 */
export interface RepositoryDescriptor {
  readonly owner: string;
  readonly repo: string;
  readonly htmlUrl: string;
  readonly description: string;
  readonly defaultBranch: string;
  readonly homepage: string;
}

/**
 * Tags parsed from the leading docblock of an entry file. Empty string means absent.
 */
export interface ExtractedMetadata {
  readonly package: string;
  readonly author: string;
  readonly version: string;
  readonly link: string;
  readonly description: string;
}

/**
 * Project as built from a discovered repository. Keys match the catalog document.
 *
 * @property type - Project kind.
 * @property isGithub - Discovered through the GitHub pipeline.
 * @property direct - Installable straight from the repository.
 * @property typecho - Supported Typecho version range; never derivable here, so empty.
 * @property donate - Donation or homepage link.
 * @property dir - Install directory name under `usr/plugins` or `usr/themes`.
 */
export interface ProjectRecord {
  readonly id: string;
  readonly name: string;
  readonly type: ProjectKind;
  readonly link: string;
  readonly isGithub: boolean;
  readonly direct: boolean;
  readonly version: string;
  readonly typecho: string;
  readonly author: string;
  readonly donate: string;
  readonly description: string;
  readonly dir: string;
}

export type ProjectStringField = Exclude<
  {
    [K in keyof ProjectRecord]: ProjectRecord[K] extends string ? K : never;
  }[keyof ProjectRecord],
  "type"
>;

export type ProjectFlagField = "isGithub" | "direct";

/**
 * Project as stored in the catalog. Curated entries may omit any field.
 *
 * @property type - Kept as free text since curated files are not restricted to known kinds.
 * @property extra - Unknown keys, and known keys holding a non-conforming JSON type, kept for write-back.
 * @property keys - Key order of the stored entry; absent for records the crawler created.
 */
export type CatalogProject = {
  readonly [K in ProjectStringField]?: string;
} & {
  readonly [K in ProjectFlagField]?: boolean;
} & {
  readonly type?: string;
  readonly extra?: JsonRecord;
  readonly keys?: readonly string[];
};

/**
 * Stored project entry that is not a JSON object. Written back as it was loaded.
 */
export interface OpaqueEntry {
  readonly opaque: JsonValue;
}

export type CatalogEntry = CatalogProject | OpaqueEntry;

export function isOpaqueEntry(entry: CatalogEntry): entry is OpaqueEntry {
  return "opaque" in entry;
}

/**
 * Whole catalog document.
 *
 * @property updatedAt - `YYYY-MM-DD` date of the last crawl, empty if never stamped.
 * @property projects - Entries in stored order, including ones that are not objects.
 * @property extra - Other top-level keys, preserved on save.
 * @property keys - Top-level key order of the loaded document.
 */
export interface Catalog {
  readonly updatedAt: string;
  readonly projects: readonly CatalogEntry[];
  readonly extra: JsonRecord;
  readonly keys?: readonly string[];
}

export type SkipReason = "missing-entry-file" | "fetch-error" | "build-error" | "invalid-directory";

/**
 * Result of turning one candidate repository into a project.
 */
export type CandidateOutcome =
  | { readonly status: "accepted"; readonly repository: RepositoryDescriptor; readonly project: ProjectRecord }
  | {
      readonly status: "skipped";
      readonly repository: RepositoryDescriptor;
      readonly reason: SkipReason;
      readonly detail?: string;
    };
