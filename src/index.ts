#!/usr/bin/env node
// CHANGE: Delegate execution to the CLI runner when invoked as a script.
// WHY: Importing the package must not parse process arguments.

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { crawlCatalog } from "./crawler.js";
export { mergeProjects } from "./merger.js";
export { buildProject } from "./project.js";
export { extractMetadata, cleanVersion } from "./metadata.js";
export { slugify, isValidDirectoryName } from "./utils/slug.js";
export type { Catalog, CatalogEntry, CatalogProject, ProjectRecord, RepositoryDescriptor } from "./types.js";
