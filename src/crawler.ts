// CHANGE: Drive per-kind discovery, merge results into the catalog, and persist once.
// WHY: Candidates are processed one at a time; only accepted candidates count towards a kind's cap.

import { RepositorySource, searchQuery } from "./api.js";
import { CatalogStore } from "./catalog.js";
import { CRAWL, ENTRY_FILES } from "./config.js";
import { debug, info } from "./logger.js";
import { mergeProjects } from "./merger.js";
import { buildProject } from "./project.js";
import { Catalog, CandidateOutcome, ProjectKind, ProjectRecord, RepositoryDescriptor } from "./types.js";
import { isValidDirectoryName } from "./utils/slug.js";

/**
 * Limits and target of a crawl run.
 *
 * @property plugins - Maximum accepted plugin candidates.
 * @property themes - Maximum accepted theme candidates.
 * @property dryRun - Merge in memory without writing the catalog.
 * @property today - Date stamp override, `YYYY-MM-DD`.
 */
export interface CrawlOptions {
  readonly catalogPath: string;
  readonly plugins: number;
  readonly themes: number;
  readonly perPage: number;
  readonly pages: number;
  readonly dryRun?: boolean;
  readonly today?: string;
}

export interface CrawlDependencies {
  readonly source: RepositorySource;
  readonly store: Pick<CatalogStore, "load" | "save">;
}

export interface CrawlSummary {
  readonly catalogPath: string;
  readonly catalog: Catalog;
  readonly discovered: readonly ProjectRecord[];
  readonly skipped: readonly CandidateOutcome[];
  readonly added: number;
  readonly updated: number;
  readonly written: boolean;
}

export interface CollectResult {
  readonly accepted: ProjectRecord[];
  readonly skipped: CandidateOutcome[];
}

/**
 * Local calendar date as `YYYY-MM-DD`.
 */
export function todayStamp(date: Date = new Date()): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Clamp numeric options to the ranges the search API and the caps accept.
 */
export function normaliseCrawlOptions(options: CrawlOptions): CrawlOptions {
  return {
    ...options,
    plugins: Math.max(0, options.plugins),
    themes: Math.max(0, options.themes),
    perPage: Math.max(1, Math.min(CRAWL.MAX_PER_PAGE, options.perPage)),
    pages: Math.max(1, options.pages)
  };
}

/**
 * Fetch a candidate's entry file and build its project.
 *
 * @param kind - Kind the repository was discovered under.
 * @param repository - Candidate repository.
 * @param source - Code host client.
 * @returns Accepted project or the reason the candidate was skipped.
 */
export async function processCandidate(
  kind: ProjectKind,
  repository: RepositoryDescriptor,
  source: RepositorySource
): Promise<CandidateOutcome> {
  let text: string | null;
  try {
    text = await source.fetchRawText(repository, ENTRY_FILES[kind]);
  } catch (error) {
    return { status: "skipped", repository, reason: "fetch-error", detail: (error as Error).message };
  }
  if (text === null) {
    return { status: "skipped", repository, reason: "missing-entry-file" };
  }
  const result = buildProject(kind, repository, text);
  if (!result.ok) {
    return { status: "skipped", repository, reason: result.reason, detail: result.detail };
  }
  if (!isValidDirectoryName(result.project.dir)) {
    return { status: "skipped", repository, reason: "invalid-directory" };
  }
  return { status: "accepted", repository, project: result.project };
}

/**
 * Walk repositories in search order until `limit` candidates are accepted.
 */
export async function collectProjects(
  kind: ProjectKind,
  repositories: readonly RepositoryDescriptor[],
  limit: number,
  source: RepositorySource
): Promise<CollectResult> {
  const accepted: ProjectRecord[] = [];
  const skipped: CandidateOutcome[] = [];
  for (const repository of repositories) {
    if (accepted.length >= limit) {
      break;
    }
    const outcome = await processCandidate(kind, repository, source);
    if (outcome.status === "accepted") {
      accepted.push(outcome.project);
      debug(`Accepted ${kind} ${repository.owner}/${repository.repo} as ${outcome.project.dir}`);
    } else {
      skipped.push(outcome);
      debug(
        `Skipped ${kind} ${repository.owner}/${repository.repo}: ${outcome.reason}${outcome.detail ? ` (${outcome.detail})` : ""}`
      );
    }
  }
  info(`Collected ${accepted.length}/${limit} ${kind}s (${skipped.length} skipped).`);
  return { accepted, skipped };
}

/**
 * Discover plugins and themes, merge them into the catalog, and write it back.
 *
 * The catalog is written at most once, after every candidate has been processed.
 *
 * @throws RateLimitError if a search request is rate limited; nothing is written in that case.
 */
export async function crawlCatalog(rawOptions: CrawlOptions, deps: CrawlDependencies): Promise<CrawlSummary> {
  const options = normaliseCrawlOptions(rawOptions);
  const { source, store } = deps;
  const catalog = await store.load();

  const search = { perPage: options.perPage, pages: options.pages };
  const pluginRepos = await source.searchRepositories(searchQuery("plugin"), search);
  const themeRepos = await source.searchRepositories(searchQuery("theme"), search);
  debug(`Search returned ${pluginRepos.length} plugin and ${themeRepos.length} theme repositories.`);

  const plugins = await collectProjects("plugin", pluginRepos, options.plugins, source);
  const themes = await collectProjects("theme", themeRepos, options.themes, source);
  const discovered = [...plugins.accepted, ...themes.accepted];

  const merged = mergeProjects(catalog.projects, discovered);
  const next: Catalog = {
    ...catalog,
    updatedAt: options.today ?? todayStamp(),
    projects: merged.projects
  };

  if (!options.dryRun) {
    await store.save(next);
  }

  return {
    catalogPath: options.catalogPath,
    catalog: next,
    discovered,
    skipped: [...plugins.skipped, ...themes.skipped],
    added: merged.added,
    updated: merged.updated,
    written: !options.dryRun
  };
}
