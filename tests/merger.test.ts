// CHANGE: Verify link-keyed merging, fill-in-blanks, directory correction, and id allocation.
// WHY: Curated catalog entries must survive repeated crawls unchanged except for blank fields.

import { describe, expect, it } from "vitest";
import { correctDirectory, isBlank, mergeProjects } from "../src/merger.js";
import { CatalogEntry, CatalogProject, isOpaqueEntry, JsonValue, ProjectRecord } from "../src/types.js";

function project(overrides: Partial<ProjectRecord>): ProjectRecord {
  return {
    id: "plugin-myplugin",
    name: "MyPlugin",
    type: "plugin",
    link: "https://github.com/a/b",
    isGithub: true,
    direct: true,
    version: "",
    typecho: "",
    author: "",
    donate: "",
    description: "",
    dir: "MyPlugin",
    ...overrides
  };
}

function objectEntries(entries: readonly CatalogEntry[]): CatalogProject[] {
  return entries.filter((entry): entry is CatalogProject => !isOpaqueEntry(entry));
}

describe("mergeProjects", () => {
  it("adds a discovered project to an empty catalog", () => {
    const result = mergeProjects([], [project({})]);
    expect(result.projects).toHaveLength(1);
    expect(result.projects[0]).toMatchObject({
      id: "plugin-myplugin",
      dir: "MyPlugin",
      link: "https://github.com/a/b"
    });
    expect(result.added).toBe(1);
    expect(result.updated).toBe(0);
  });

  it("fills only blank fields of an existing project", () => {
    const existing: CatalogProject[] = [
      { id: "plugin-legacy", link: "https://github.com/a/b", author: "", version: "1.0", dir: "MyPlugin" }
    ];
    const result = mergeProjects(existing, [project({ author: "Bob", version: "2.0", description: "New" })]);
    expect(result.projects).toHaveLength(1);
    expect(result.projects[0]).toMatchObject({
      id: "plugin-legacy",
      author: "Bob",
      version: "1.0",
      description: "New",
      name: "MyPlugin",
      type: "plugin"
    });
    expect(result.updated).toBe(1);
  });

  it("defaults missing flags to true but keeps explicit false", () => {
    const existing: CatalogProject[] = [
      { id: "plugin-a", link: "https://github.com/a/b", isGithub: false },
      { id: "plugin-c", link: "https://github.com/a/c" }
    ];
    const result = mergeProjects(existing, [
      project({}),
      project({ id: "plugin-c", link: "https://github.com/a/c", dir: "C" })
    ]);
    expect(result.projects[0]).toMatchObject({ isGithub: false, direct: true });
    expect(result.projects[1]).toMatchObject({ isGithub: true, direct: true });
  });

  it("treats values kept in extra as already set", () => {
    const existing: CatalogProject[] = [{ id: "plugin-a", link: "https://github.com/a/b", extra: { version: 3 } }];
    const [merged] = objectEntries(mergeProjects(existing, [project({ version: "2.0" })]).projects);
    expect(merged.version).toBeUndefined();
    expect(merged.extra).toEqual({ version: 3 });
  });

  it("fills values kept in extra when they are empty arrays or objects", () => {
    const existing: CatalogProject[] = [
      { id: "plugin-a", link: "https://github.com/a/b", extra: { version: [], author: {}, description: null } }
    ];
    const [merged] = objectEntries(
      mergeProjects(existing, [project({ version: "2.0", author: "Bob", description: "New" })]).projects
    );
    expect(merged).toMatchObject({ version: "2.0", author: "Bob", description: "New" });
  });

  it("carries entries that are not objects through in place", () => {
    const existing: CatalogEntry[] = [
      { opaque: null },
      { id: "plugin-myplugin", link: "https://github.com/a/b" },
      { opaque: "note" }
    ];
    const result = mergeProjects(existing, [project({ author: "Bob" }), project({ link: "https://github.com/a/c" })]);
    expect(result.projects).toHaveLength(4);
    expect(result.projects[0]).toEqual({ opaque: null });
    expect(result.projects[1]).toMatchObject({ id: "plugin-myplugin", author: "Bob" });
    expect(result.projects[2]).toEqual({ opaque: "note" });
    expect(result.projects[3]).toMatchObject({ id: "plugin-myplugin-2", link: "https://github.com/a/c" });
    expect(result.updated).toBe(1);
    expect(result.added).toBe(1);
  });

  it("suffixes colliding ids, including ids assigned in the same pass", () => {
    const existing: CatalogProject[] = [{ id: "plugin-foo", link: "https://github.com/a/foo" }];
    const result = mergeProjects(existing, [
      project({ id: "plugin-foo", link: "https://github.com/b/foo", dir: "foo" }),
      project({ id: "plugin-foo", link: "https://github.com/c/foo", dir: "foo" })
    ]);
    expect(objectEntries(result.projects).map(entry => entry.id)).toEqual(["plugin-foo", "plugin-foo-2", "plugin-foo-3"]);
  });

  it("skips projects without a link", () => {
    const result = mergeProjects([], [project({ link: "  " })]);
    expect(result.projects).toEqual([]);
    expect(result.added).toBe(0);
  });

  it("matches links after trimming", () => {
    const existing: CatalogProject[] = [{ id: "plugin-a", link: " https://github.com/a/b " }];
    const result = mergeProjects(existing, [project({})]);
    expect(result.projects).toHaveLength(1);
    expect(result.updated).toBe(1);
  });

  it("is idempotent for the same batch", () => {
    const existing: CatalogProject[] = [
      { id: "plugin-myplugin", link: "https://github.com/x/y", name: "Curated", dir: "Curated" }
    ];
    const batch = [
      project({ author: "Bob", version: "1.1" }),
      project({ id: "theme-mood", type: "theme", link: "https://github.com/a/mood", dir: "Mood" })
    ];
    const once = mergeProjects(existing, batch).projects;
    const twice = mergeProjects(once, batch).projects;
    expect(twice).toEqual(once);
    expect(objectEntries(once).map(entry => entry.id)).toEqual(["plugin-myplugin", "plugin-myplugin-2", "theme-mood"]);
  });

  it("does not mutate its inputs", () => {
    const existing: CatalogProject[] = [{ id: "plugin-a", link: "https://github.com/a/b", author: "" }];
    mergeProjects(existing, [project({ author: "Bob" })]);
    expect(existing).toEqual([{ id: "plugin-a", link: "https://github.com/a/b", author: "" }]);
  });
});

describe("isBlank", () => {
  it("treats empty and falsy JSON values as blank", () => {
    const values: JsonValue[] = [undefined, null, "", 0, false, [], {}];
    expect(values.map(value => isBlank(value))).toEqual([true, true, true, true, true, true, true]);
  });

  it("treats any other value as set", () => {
    const values: JsonValue[] = ["x", 3, true, [0], { a: 1 }];
    expect(values.map(value => isBlank(value))).toEqual([false, false, false, false, false]);
  });
});

describe("correctDirectory", () => {
  const link = "https://github.com/a/b";

  it("replaces an empty directory", () => {
    expect(correctDirectory({ link }, "MyPlugin")).toBe("MyPlugin");
  });

  // Heuristic boundary: a stored directory equal to the repository name is assumed undetected.
  it("replaces a directory equal to the last link segment", () => {
    expect(correctDirectory({ link, dir: "b" }, "MyPlugin")).toBe("MyPlugin");
  });

  it("replaces a differing directory only with a valid name", () => {
    expect(correctDirectory({ link, dir: "Legacy" }, "Fresh")).toBe("Fresh");
    expect(correctDirectory({ link, dir: "Legacy" }, "bad dir")).toBe("Legacy");
  });

  it("keeps the stored directory when nothing was detected", () => {
    expect(correctDirectory({ link, dir: "Legacy" }, "")).toBe("Legacy");
  });
});
