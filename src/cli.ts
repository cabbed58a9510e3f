// CHANGE: Expose crawl, dry-run, and state commands through commander.
// WHY: Helpers stay importable without parsing process arguments.

import path from "path";
import { Command, InvalidArgumentError } from "commander";
import { GithubApi } from "./api.js";
import { CatalogStore, catalogStats } from "./catalog.js";
import { CRAWL, NET, resolveToken } from "./config.js";
import { crawlCatalog, CrawlOptions, CrawlSummary } from "./crawler.js";
import { debug, error as logError, info, isLogLevel, LOG_LEVELS, setLogLevel } from "./logger.js";

interface CrawlCommandOptions {
  readonly catalog: string;
  readonly plugins: number;
  readonly themes: number;
  readonly perPage: number;
  readonly pages: number;
  readonly logLevel?: string;
}

/**
 * Commander argument parser for non-negative integer options.
 *
 * @throws InvalidArgumentError if the value is not a non-negative integer.
 */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

function parseLogLevel(value: string): string {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(", ")}.`);
  }
  return level;
}

function toCrawlOptions(options: CrawlCommandOptions, dryRun: boolean): CrawlOptions {
  return {
    catalogPath: path.resolve(options.catalog),
    plugins: options.plugins,
    themes: options.themes,
    perPage: options.perPage,
    pages: options.pages,
    dryRun
  };
}

function applyLogLevel(options: { readonly logLevel?: string }): void {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
}

async function runCrawl(options: CrawlOptions): Promise<CrawlSummary> {
  const token = resolveToken();
  debug(token ? "Using GitHub token from environment." : "No GitHub token configured, using anonymous access.");
  return crawlCatalog(options, {
    source: GithubApi.create({ token, timeout: NET.TIMEOUT }),
    store: new CatalogStore(options.catalogPath)
  });
}

/**
 * Crawl mode entry point: discover, merge, and write the catalog.
 */
export async function crawlAction(options: CrawlCommandOptions): Promise<void> {
  applyLogLevel(options);
  const summary = await runCrawl(toCrawlOptions(options, false));
  info(`Updated: ${summary.catalogPath}`);
  info(`Discovered: ${summary.discovered.length} (added ${summary.added}, updated ${summary.updated})`);
  info(`Total projects: ${summary.catalog.projects.length}`);
}

/**
 * Dry-run mode entry point: show what a crawl would merge without writing.
 */
export async function dryRunAction(options: CrawlCommandOptions): Promise<void> {
  applyLogLevel(options);
  const summary = await runCrawl(toCrawlOptions(options, true));
  info("Dry-run: catalog not written.");
  console.table(
    summary.discovered.map(project => ({
      id: project.id,
      type: project.type,
      dir: project.dir,
      version: project.version,
      link: project.link
    }))
  );
  info(
    `Would add ${summary.added} and update ${summary.updated}; ${summary.skipped.length} candidates skipped; total ${summary.catalog.projects.length}.`
  );
}

/**
 * State mode entry point: print catalog statistics.
 */
export async function stateAction(options: { readonly catalog: string }): Promise<void> {
  const store = new CatalogStore(path.resolve(options.catalog));
  const catalog = await store.load();
  console.log(catalogStats(catalog));
}

function addCrawlOptions(command: Command): Command {
  return command
    .option("--catalog <path>", "catalog file to update", CRAWL.CATALOG_PATH)
    .option("--plugins <n>", "max plugin projects to add or update", parseCount, CRAWL.PLUGINS)
    .option("--themes <n>", "max theme projects to add or update", parseCount, CRAWL.THEMES)
    .option("--per-page <n>", "search results per page (1-100)", parseCount, CRAWL.PER_PAGE)
    .option("--pages <n>", "search pages to read per kind", parseCount, CRAWL.PAGES)
    .option("--log-level <level>", `log level (${LOG_LEVELS.join(", ")})`, parseLogLevel);
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("typecho-catalog")
    .description("Discover Typecho plugins and themes on GitHub and merge them into a catalog")
    .version("1.0.0");

  const catalogCommand = program.command("catalog").description("Catalog operations");
  addCrawlOptions(catalogCommand.command("crawl").description("Discover projects and update the catalog file")).action(
    async (options: CrawlCommandOptions) => crawlAction(options)
  );
  addCrawlOptions(catalogCommand.command("dry-run").description("Preview discovered projects without writing")).action(
    async (options: CrawlCommandOptions) => dryRunAction(options)
  );
  catalogCommand
    .command("state")
    .description("Display catalog statistics")
    .option("--catalog <path>", "catalog file to inspect", CRAWL.CATALOG_PATH)
    .action(async (options: { readonly catalog: string }) => stateAction(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${(error as Error).message}`);
    process.exitCode = 1;
  }
}
