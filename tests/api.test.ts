// CHANGE: Validate search pagination, descriptor parsing, rate-limit handling, and raw fetches.
// WHY: Only a rate-limited search is fatal; a missing entry file is a soft miss.

import { AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { GithubApi, RateLimitError, searchQuery, toRepositoryDescriptor } from "../src/api.js";
import { HttpStatusError } from "../src/utils/http.js";
import { RepositoryDescriptor } from "../src/types.js";

const dummyConfig = { url: "", headers: {} } as InternalAxiosRequestConfig;

function response<T>(status: number, data: T): AxiosResponse<T> {
  return { status, statusText: "", headers: {}, config: dummyConfig, data };
}

const searchItem = {
  name: "typecho-plugin-Links",
  html_url: "https://github.com/alice/typecho-plugin-Links",
  description: " Friendly links ",
  default_branch: "master",
  homepage: null,
  owner: { login: "alice" }
};

const repository: RepositoryDescriptor = {
  owner: "alice",
  repo: "Links",
  htmlUrl: "https://github.com/alice/Links",
  description: "",
  defaultBranch: "main",
  homepage: ""
};

describe("searchQuery", () => {
  it("scopes by topic and kind and excludes forks and archives", () => {
    expect(searchQuery("plugin")).toBe("topic:typecho plugin fork:false archived:false");
    expect(searchQuery("theme")).toBe("topic:typecho theme fork:false archived:false");
  });
});

describe("toRepositoryDescriptor", () => {
  it("trims fields and defaults the branch", () => {
    expect(toRepositoryDescriptor({ ...searchItem, default_branch: "" })).toEqual({
      owner: "alice",
      repo: "typecho-plugin-Links",
      htmlUrl: "https://github.com/alice/typecho-plugin-Links",
      description: "Friendly links",
      defaultBranch: "main",
      homepage: ""
    });
  });

  it("rejects items without owner login or name", () => {
    expect(toRepositoryDescriptor({ ...searchItem, owner: null })).toBeNull();
    expect(toRepositoryDescriptor({ ...searchItem, name: "" })).toBeNull();
    expect(toRepositoryDescriptor("item")).toBeNull();
  });
});

describe("GithubApi.searchRepositories", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests pages sorted by stars and collects descriptors", async () => {
    const api = GithubApi.create();
    const spy = vi.spyOn(api.session, "get");
    spy.mockResolvedValueOnce(response(200, { items: [searchItem, { name: "orphan" }] }));
    spy.mockResolvedValueOnce(response(200, { items: [{ ...searchItem, name: "second" }] }));

    const repos = await api.searchRepositories("topic:typecho plugin", { perPage: 2, pages: 2 });

    expect(repos.map(repo => repo.repo)).toEqual(["typecho-plugin-Links", "second"]);
    expect(repos[0]?.defaultBranch).toBe("master");
    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy).toHaveBeenNthCalledWith(1, "https://api.github.com/search/repositories", {
      params: { q: "topic:typecho plugin", sort: "stars", order: "desc", per_page: 2, page: 1 }
    });
    expect(spy.mock.calls[1]?.[1]).toMatchObject({ params: { page: 2 } });
  });

  it("stops at the first empty page", async () => {
    const api = GithubApi.create();
    const spy = vi.spyOn(api.session, "get");
    spy.mockResolvedValueOnce(response(200, { items: [] }));

    expect(await api.searchRepositories("q", { perPage: 10, pages: 3 })).toEqual([]);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("aborts on a rate-limited response", async () => {
    const api = GithubApi.create();
    vi.spyOn(api.session, "get").mockResolvedValueOnce(
      response(403, { message: "API rate limit exceeded for 127.0.0.1." })
    );

    await expect(api.searchRepositories("q", { perPage: 10, pages: 1 })).rejects.toBeInstanceOf(RateLimitError);
  });

  it("raises a status error for other failures", async () => {
    const api = GithubApi.create();
    vi.spyOn(api.session, "get").mockResolvedValueOnce(response(403, { message: "Forbidden" }));

    await expect(api.searchRepositories("q", { perPage: 10, pages: 1 })).rejects.toBeInstanceOf(HttpStatusError);
  });
});

describe("GithubApi.fetchRawText", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("downloads the file from the default branch", async () => {
    const api = GithubApi.create();
    const spy = vi.spyOn(api.session, "get").mockResolvedValueOnce(response(200, "<?php"));

    expect(await api.fetchRawText(repository, "/Plugin.php")).toBe("<?php");
    expect(spy).toHaveBeenCalledWith("https://raw.githubusercontent.com/alice/Links/main/Plugin.php", {
      responseType: "text"
    });
  });

  it("returns null for a missing file", async () => {
    const api = GithubApi.create();
    vi.spyOn(api.session, "get").mockResolvedValueOnce(response(404, "404: Not Found"));

    expect(await api.fetchRawText(repository, "index.php")).toBeNull();
  });

  it("encodes '#' in branch names", async () => {
    const api = GithubApi.create();
    const spy = vi.spyOn(api.session, "get").mockResolvedValueOnce(response(200, ""));

    await api.fetchRawText({ ...repository, defaultBranch: "dev#2" }, "index.php");
    expect(spy.mock.calls[0]?.[0]).toBe("https://raw.githubusercontent.com/alice/Links/dev%232/index.php");
  });

  it("raises a status error for server failures", async () => {
    const api = GithubApi.create();
    vi.spyOn(api.session, "get").mockResolvedValueOnce(response(502, "Bad Gateway"));

    await expect(api.fetchRawText(repository, "index.php")).rejects.toBeInstanceOf(HttpStatusError);
  });
});
