// CHANGE: Persist the catalog document with whole-file atomic replacement.
// WHY: The crawler writes once per run; an interrupted run must leave the previous file intact.

import path from "path";
import fs from "fs-extra";
import { debug, warn } from "./logger.js";
import { Catalog, CatalogEntry, CatalogProject, isOpaqueEntry, JsonRecord, JsonValue, PROJECT_KINDS } from "./types.js";

const STRING_FIELDS = [
  "id",
  "name",
  "type",
  "link",
  "version",
  "typecho",
  "author",
  "donate",
  "description",
  "dir"
] as const;

const FLAG_FIELDS = ["isGithub", "direct"] as const;

const FIELD_ORDER = [
  "id",
  "name",
  "type",
  "link",
  "isGithub",
  "direct",
  "version",
  "typecho",
  "author",
  "donate",
  "description",
  "dir"
] as const;

export const EMPTY_CATALOG: Catalog = {
  updatedAt: "",
  projects: [],
  extra: {}
};

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split a stored project into typed fields and everything else.
 *
 * Known keys holding an unexpected JSON type are kept in `extra` so they are written back unchanged.
 */
export function toCatalogProject(raw: JsonRecord): CatalogProject {
  const strings: { [K in (typeof STRING_FIELDS)[number]]?: string } = {};
  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (typeof value === "string") {
      strings[field] = value;
    }
  }
  const flags: { [K in (typeof FLAG_FIELDS)[number]]?: boolean } = {};
  for (const field of FLAG_FIELDS) {
    const value = raw[field];
    if (typeof value === "boolean") {
      flags[field] = value;
    }
  }
  const typed = new Set<string>([...Object.keys(strings), ...Object.keys(flags)]);
  const extra = Object.fromEntries(Object.entries(raw).filter(([key]) => !typed.has(key)));
  const keys = Object.keys(raw);
  return Object.keys(extra).length > 0 ? { ...strings, ...flags, extra, keys } : { ...strings, ...flags, keys };
}

function fieldValue(project: CatalogProject, key: string): JsonValue {
  for (const field of FIELD_ORDER) {
    if (field === key) {
      return project[field] ?? project.extra?.[field];
    }
  }
  return project.extra?.[key];
}

/**
 * Flatten a catalog project back into its document form.
 *
 * Keys come out in their loaded order. Fields the entry did not have follow in wire order, then other extras.
 */
export function fromCatalogProject(project: CatalogProject): JsonRecord {
  const order = [...(project.keys ?? []), ...FIELD_ORDER, ...Object.keys(project.extra ?? {})];
  const out: { [key: string]: JsonValue } = {};
  for (const key of new Set(order)) {
    const value = fieldValue(project, key);
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function fromCatalogEntry(entry: CatalogEntry): JsonValue {
  return isOpaqueEntry(entry) ? entry.opaque : fromCatalogProject(entry);
}

function toCatalogEntry(value: JsonValue): CatalogEntry {
  return isRecord(value) ? toCatalogProject(value) : { opaque: value };
}

/**
 * Normalise a parsed catalog document.
 *
 * @param value - Parsed JSON.
 * @param source - File path used in error messages.
 * @throws Error if the document is not a JSON object.
 */
export function toCatalog(value: JsonValue, source: string): Catalog {
  if (!isRecord(value)) {
    throw new Error(`Malformed catalog: ${source}`);
  }
  const { updatedAt, projects, ...extra } = value;
  const entries: readonly JsonValue[] = Array.isArray(projects) ? projects : [];
  const opaque = entries.filter(entry => !isRecord(entry)).length;
  if (opaque > 0) {
    warn(`Keeping ${opaque} non-object project entries of ${source} as they are.`);
  }
  return {
    updatedAt: typeof updatedAt === "string" ? updatedAt : "",
    projects: entries.map(toCatalogEntry),
    extra,
    keys: Object.keys(value)
  };
}

/**
 * Lay out the catalog as written to disk, in the loaded top-level key order.
 */
export function toDocument(catalog: Catalog): JsonRecord {
  const fields: JsonRecord = {
    ...catalog.extra,
    updatedAt: catalog.updatedAt,
    projects: catalog.projects.map(fromCatalogEntry)
  };
  const order = [...(catalog.keys ?? []), "updatedAt", "projects", ...Object.keys(catalog.extra)];
  const out: { [key: string]: JsonValue } = {};
  for (const key of new Set(order)) {
    if (fields[key] !== undefined) {
      out[key] = fields[key];
    }
  }
  return out;
}

/**
 * Count projects per kind for reporting.
 */
export function catalogStats(catalog: Catalog): {
  readonly updatedAt: string;
  readonly total: number;
  readonly plugins: number;
  readonly themes: number;
} {
  const [plugins, themes] = PROJECT_KINDS.map(
    kind => catalog.projects.filter(entry => !isOpaqueEntry(entry) && entry.type === kind).length
  );
  return {
    updatedAt: catalog.updatedAt,
    total: catalog.projects.length,
    plugins,
    themes
  };
}

/**
 * File-backed catalog store. Reads and writes the whole document.
 */
export class CatalogStore {
  constructor(readonly filePath: string) {}

  /**
   * Load the catalog, or an empty one when the file does not exist.
   *
   * @throws Error if the file exists but cannot be parsed.
   */
  async load(): Promise<Catalog> {
    if (!(await fs.pathExists(this.filePath))) {
      debug(`Catalog ${this.filePath} absent, starting with empty catalog.`);
      return { ...EMPTY_CATALOG };
    }
    const parsed: JsonValue = await fs.readJson(this.filePath);
    const catalog = toCatalog(parsed, this.filePath);
    debug(`Loaded ${catalog.projects.length} projects from ${this.filePath}.`);
    return catalog;
  }

  /**
   * Replace the catalog file by writing to a temporary file before rename.
   */
  async save(catalog: Catalog): Promise<void> {
    const document = toDocument(catalog);
    await fs.ensureDir(path.dirname(this.filePath));
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeJson(tempPath, document, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
    debug(`Catalog saved with ${catalog.projects.length} projects.`);
  }
}
