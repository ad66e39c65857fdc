import { afterEach, describe, expect, it } from "vitest";
import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "node:path";
import { ChokidarWatchSource, createRepoIgnore } from "../src/watch/chokidarWatchSource.js";
import { makeRepoDir } from "./_util.js";

describe("createRepoIgnore", () => {
  const ignore = createRepoIgnore("/repo");

  it("keeps the root and ordinary files", () => {
    expect(ignore("/repo")).toBe(false);
    expect(ignore("/repo/src/a.ts")).toBe(false);
    expect(ignore("/repo/.gitignore")).toBe(false);
  });

  it("drops git internals, dependencies and anything outside the root", () => {
    expect(ignore("/repo/.git")).toBe(true);
    expect(ignore("/repo/.git/index")).toBe(true);
    expect(ignore("/repo/packages/x/node_modules/y/index.js")).toBe(true);
    expect(ignore("/repository/a.ts")).toBe(true);
  });
});

describe("ChokidarWatchSource", () => {
  let source: ChokidarWatchSource | undefined;

  afterEach(async () => {
    await source?.stop();
    source = undefined;
  });

  it("hands watcher errors to the error handler", async () => {
    const root = await makeRepoDir();
    const watchers: FSWatcher[] = [];
    source = new ChokidarWatchSource((dir, options) => {
      const watcher = chokidar.watch(dir, options);
      watchers.push(watcher);
      return watcher;
    });
    const errors: string[] = [];
    source.onError((e) => errors.push(e.message));

    await source.start({ rootDir: root, ignore: createRepoIgnore(root) });
    expect(watchers).toHaveLength(1);
    watchers[0]?.emit("error", new Error("ENOSPC: System limit for number of file watchers reached"));

    expect(errors).toEqual(["ENOSPC: System limit for number of file watchers reached"]);
  });

  it("passes the root and ignore rule to the watcher", async () => {
    const root = await makeRepoDir();
    const seen: string[] = [];
    const rules: Array<(p: string) => boolean> = [];
    source = new ChokidarWatchSource((dir, options) => {
      seen.push(dir);
      if (typeof options.ignored === "function") rules.push(options.ignored);
      return chokidar.watch(dir, options);
    });

    await source.start({ rootDir: root, ignore: createRepoIgnore(root) });

    expect(seen).toEqual([root]);
    expect(rules).toHaveLength(1);
    expect(rules[0]?.(path.join(root, ".git", "HEAD"))).toBe(true);
    expect(rules[0]?.(path.join(root, "a.txt"))).toBe(false);
  });
});
