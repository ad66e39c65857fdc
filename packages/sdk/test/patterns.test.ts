import { describe, expect, it } from "vitest";
import { compilePattern, matchesAny, compilePatterns, percentToRegExpSource } from "../src/policy/patterns.js";
import { ConfigError } from "../src/errors.js";

describe("percent patterns", () => {
  it("translates escapes, anchors and classes", () => {
    expect(percentToRegExpSource("%.txt$")).toBe("\\.txt$");
    expect(percentToRegExpSource("^%.git/")).toBe("^\\.git\\/");
    expect(percentToRegExpSource("%.min%.js$")).toBe("\\.min\\.js$");
    expect(percentToRegExpSource("[%w_]+%.md$")).toBe("[A-Za-z0-9_]+\\.md$");
    expect(percentToRegExpSource("%d%D")).toBe("[0-9][^0-9]");
    expect(percentToRegExpSource("a-b")).toBe("a*?b");
  });

  it("matches anywhere in the path unless anchored", () => {
    const txt = compilePattern("%.txt$");
    expect(txt.syntax).toBe("percent");
    expect(txt.test("/r/a.txt")).toBe(true);
    expect(txt.test("/r/a.txt.bak")).toBe(false);
    expect(txt.test("/r/atxt")).toBe(false);

    expect(compilePattern("node_modules/").test("/p/node_modules/x.js")).toBe(true);
    expect(compilePattern("^%.git/").test("/p/.git/config")).toBe(false);
    expect(compilePattern("^%.git/").test(".git/config")).toBe(true);
  });

  it("treats '.' as any character", () => {
    expect(compilePattern("a.c").test("/x/abc")).toBe(true);
  });

  it("rejects unsupported or malformed patterns", () => {
    expect(() => compilePattern("%b()")).toThrow(ConfigError);
    expect(() => compilePattern("abc%")).toThrow(ConfigError);
    expect(() => compilePattern("[abc")).toThrow(ConfigError);
  });
});

describe("glob and regex patterns", () => {
  it("matches a bare glob against the file name", () => {
    const md = compilePattern("glob:*.md");
    expect(md.syntax).toBe("glob");
    expect(md.test("/r/docs/a.md")).toBe(true);
    expect(md.test("/r/docs/a.mdx")).toBe(false);
  });

  it("matches a glob with a slash against the repo-relative path", () => {
    const src = compilePattern("glob:src/**");
    expect(src.test("/r/src/a/b.ts", "src/a/b.ts")).toBe(true);
    expect(src.test("/r/lib/a.ts", "lib/a.ts")).toBe(false);
    expect(src.test("/r/src/a/b.ts")).toBe(false);
  });

  it("compiles re: patterns as JavaScript regular expressions", () => {
    const ts = compilePattern("re:\\.tsx?$");
    expect(ts.syntax).toBe("regex");
    expect(ts.test("/r/a.tsx")).toBe(true);
    expect(ts.test("/r/a.js")).toBe(false);
    expect(() => compilePattern("re:(")).toThrow(ConfigError);
  });

  it("matchesAny is true when one pattern matches", () => {
    const list = compilePatterns(["%.log$", "glob:*.tmp"]);
    expect(matchesAny(list, "/r/x.tmp")).toBe(true);
    expect(matchesAny(list, "/r/x.ts")).toBe(false);
    expect(matchesAny([], "/r/x.ts")).toBe(false);
  });
});
