// CHANGE: Centralise crawler configuration with environment overrides.
// WHY: Endpoints, defaults, and the API token are fixed once at start-up and passed down explicitly.

import * as dotenv from "dotenv";
import { ProjectKind } from "./types.js";

dotenv.config();

/**
 * GitHub endpoints and request identity.
 */
export const GITHUB = {
  API_BASE: "https://api.github.com",
  RAW_BASE: "https://raw.githubusercontent.com",
  USER_AGENT: "Typecho-Catalog-Crawler",
  ACCEPT: "application/vnd.github+json",
  TOKEN_ENV_VARS: ["GITHUB_TOKEN", "GH_TOKEN", "GITHUB_PAT", "GITHUB_API_TOKEN"]
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `TIMEOUT` is applied to every request, search and raw fetch alike.
 */
export const NET = {
  TIMEOUT: Number.parseInt(process.env.HTTP_TIMEOUT ?? "25000", 10)
} as const;

/**
 * Discovery defaults, each overridable from the command line.
 */
export const CRAWL = {
  CATALOG_PATH: process.env.CATALOG_PATH ?? "repo.json",
  TOPIC: "typecho",
  PLUGINS: 25,
  THEMES: 25,
  PER_PAGE: 50,
  MAX_PER_PAGE: 100,
  PAGES: 2
} as const;

/**
 * File inspected for metadata in each candidate repository.
 */
export const ENTRY_FILES: Record<ProjectKind, string> = {
  plugin: "Plugin.php",
  theme: "index.php"
};

/**
 * Pick the first non-empty API token from the recognised environment variables.
 *
 * @param env - Environment to read, `process.env` by default.
 * @returns Trimmed token, or undefined for anonymous access.
 */
export function resolveToken(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const name of GITHUB.TOKEN_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}
