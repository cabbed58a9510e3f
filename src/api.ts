// CHANGE: Implement GitHub-facing operations for repository search and raw file retrieval.
// WHY: Search results are validated into descriptors; a rate-limited search aborts the run.

import { AxiosInstance } from "axios";
import { CRAWL, GITHUB } from "./config.js";
import { debug } from "./logger.js";
import { JsonRecord, JsonValue, ProjectKind, RepositoryDescriptor } from "./types.js";
import { createHttpSession, ensureOk, getJson, getText, HttpSessionOptions } from "./utils/http.js";
import { rawContentUrl } from "./utils/url.js";

/**
 * Raised when the search API reports an exhausted rate limit.
 */
export class RateLimitError extends Error {
  constructor() {
    super("GitHub API rate limit exceeded. Set env GITHUB_TOKEN to increase limits.");
    this.name = "RateLimitError";
  }
}

export interface SearchOptions {
  readonly perPage: number;
  readonly pages: number;
}

/**
 * Operations the crawler needs from the code host.
 */
export interface RepositorySource {
  searchRepositories(query: string, options: SearchOptions): Promise<RepositoryDescriptor[]>;
  fetchRawText(repository: RepositoryDescriptor, filePath: string): Promise<string | null>;
}

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: JsonRecord, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value.trim() : "";
}

function bodyText(data: JsonValue): string {
  return typeof data === "string" ? data : JSON.stringify(data ?? "");
}

/**
 * Topic-scoped search query for one project kind, excluding forks and archived repositories.
 */
export function searchQuery(kind: ProjectKind): string {
  return `topic:${CRAWL.TOPIC} ${kind} fork:false archived:false`;
}

/**
 * Convert one search item into a repository descriptor.
 *
 * @param item - Element of the search response `items` array.
 * @returns Descriptor, or null when owner login or name is missing.
 */
export function toRepositoryDescriptor(item: JsonValue): RepositoryDescriptor | null {
  if (!isRecord(item)) {
    return null;
  }
  const owner = isRecord(item.owner) ? stringField(item.owner, "login") : "";
  const repo = stringField(item, "name");
  if (!owner || !repo) {
    return null;
  }
  return {
    owner,
    repo,
    htmlUrl: stringField(item, "html_url"),
    description: stringField(item, "description"),
    defaultBranch: stringField(item, "default_branch") || "main",
    homepage: stringField(item, "homepage")
  };
}

/**
 * GitHub REST and raw-content client bound to one HTTP session.
 */
export class GithubApi implements RepositorySource {
  constructor(readonly session: AxiosInstance) {}

  /**
   * Create a client with its own session.
   *
   * @param options - Token and timeout applied to every request.
   */
  static create(options: HttpSessionOptions = {}): GithubApi {
    return new GithubApi(createHttpSession(options));
  }

  /**
   * Collect repositories from consecutive search pages, ordered by stars descending.
   *
   * @param query - Search qualifier string.
   * @param options - Page size and number of pages to read.
   * @throws RateLimitError if the API answers 403 with a rate limit message.
   */
  async searchRepositories(query: string, options: SearchOptions): Promise<RepositoryDescriptor[]> {
    const url = `${GITHUB.API_BASE}/search/repositories`;
    const repositories: RepositoryDescriptor[] = [];
    for (let page = 1; page <= options.pages; page += 1) {
      const response = await getJson<JsonValue>(this.session, url, {
        q: query,
        sort: "stars",
        order: "desc",
        per_page: options.perPage,
        page
      });
      if (response.status === 403 && bodyText(response.data).toLowerCase().includes("rate limit")) {
        throw new RateLimitError();
      }
      ensureOk(response, url);
      if (!isRecord(response.data)) {
        throw new Error(`Malformed search response for "${query}" page ${page}`);
      }
      const items: readonly JsonValue[] = Array.isArray(response.data.items) ? response.data.items : [];
      for (const item of items) {
        const repository = toRepositoryDescriptor(item);
        if (repository) {
          repositories.push(repository);
        }
      }
      debug(`Search "${query}" page ${page}: ${items.length} items.`);
      if (items.length === 0) {
        break;
      }
    }
    return repositories;
  }

  /**
   * Download a text file from the repository's default branch.
   *
   * @returns File contents, or null if the file does not exist.
   */
  async fetchRawText(repository: RepositoryDescriptor, filePath: string): Promise<string | null> {
    const url = rawContentUrl(repository, filePath);
    const response = await getText(this.session, url);
    if (response.status === 404) {
      return null;
    }
    return ensureOk(response, url).data;
  }
}
