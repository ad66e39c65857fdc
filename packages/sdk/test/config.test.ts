import { describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG, resolveConfig, toPlainConfig, withEnabled } from "../src/config/config.js";
import { findConfigFile, loadConfigFile } from "../src/config/loadConfig.js";
import { ConfigError } from "../src/errors.js";

async function tmpDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "autostage-config-"));
}

describe("resolveConfig", () => {
  it("fills in the defaults", () => {
    const cfg = resolveConfig();
    expect(toPlainConfig(cfg)).toEqual(DEFAULT_CONFIG);
    expect(cfg.compiled.exclude.map((p) => p.source)).toEqual(DEFAULT_CONFIG.excludePatterns);
    expect(cfg.compiled.include).toEqual([]);
  });

  it("replaces arrays instead of merging them", () => {
    const cfg = resolveConfig({ excludePatterns: ["%.bak$"], delayMs: 0 });
    expect(cfg.excludePatterns).toEqual(["%.bak$"]);
    expect(cfg.delayMs).toBe(0);
    expect(cfg.maxFileSizeBytes).toBe(10 * 1024 * 1024);
  });

  it("ignores keys explicitly set to undefined", () => {
    expect(resolveConfig({ delayMs: undefined }).delayMs).toBe(500);
  });

  it("lists every schema violation", () => {
    let err: unknown;
    try {
      resolveConfig({ delayMs: -1, colour: "blue" });
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(ConfigError);
    const problems = err instanceof ConfigError ? err.problems : [];
    expect(problems).toContain("/: unknown option 'colour'");
    expect(problems).toContain("/delayMs: must be >= 0");
  });

  it("rejects a pattern that does not compile", () => {
    expect(() => resolveConfig({ includePatterns: ["%b()"] })).toThrow(ConfigError);
  });

  it("returns a frozen snapshot", () => {
    const cfg = resolveConfig();
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.excludePatterns)).toBe(true);
  });

  it("withEnabled flips only the flag", () => {
    const cfg = resolveConfig({ delayMs: 7 });
    const off = withEnabled(cfg, false);
    expect(off.enabled).toBe(false);
    expect(off.delayMs).toBe(7);
    expect(off.compiled).toBe(cfg.compiled);
    expect(withEnabled(cfg, true)).toBe(cfg);
  });
});

describe("config files", () => {
  it("finds .autostage.yaml before the json variant", async () => {
    const dir = await tmpDir();
    await fs.writeFile(path.join(dir, ".autostage.json"), "{}", "utf8");
    await fs.writeFile(path.join(dir, ".autostage.yaml"), "delayMs: 0\n", "utf8");
    expect(await findConfigFile(dir)).toBe(path.join(dir, ".autostage.yaml"));
    expect(await findConfigFile(await tmpDir())).toBeUndefined();
  });

  it("loads yaml and applies overrides on top", async () => {
    const dir = await tmpDir();
    const file = path.join(dir, ".autostage.yaml");
    await fs.writeFile(file, "delayMs: 100\nincludePatterns:\n  - '%.md$'\nrestrictToDirs: [docs/]\n", "utf8");
    const cfg = await loadConfigFile(file, { delayMs: 0 });
    expect(cfg.delayMs).toBe(0);
    expect(cfg.includePatterns).toEqual(["%.md$"]);
    expect(cfg.restrictToDirs).toEqual(["docs/"]);
  });

  it("loads json", async () => {
    const dir = await tmpDir();
    const file = path.join(dir, ".autostage.json");
    await fs.writeFile(file, JSON.stringify({ enabled: false }), "utf8");
    expect((await loadConfigFile(file)).enabled).toBe(false);
  });

  it("treats an empty yaml file as no options", async () => {
    const dir = await tmpDir();
    const file = path.join(dir, ".autostage.yml");
    await fs.writeFile(file, "", "utf8");
    expect((await loadConfigFile(file)).delayMs).toBe(500);
  });

  it("rejects a file whose top level is not a mapping", async () => {
    const dir = await tmpDir();
    const file = path.join(dir, ".autostage.yaml");
    await fs.writeFile(file, "- a\n- b\n", "utf8");
    await expect(loadConfigFile(file)).rejects.toThrow("top level must be a mapping");
  });

  it("wraps parse and read errors in ConfigError", async () => {
    const dir = await tmpDir();
    const file = path.join(dir, ".autostage.json");
    await fs.writeFile(file, "{not json", "utf8");
    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfigFile(path.join(dir, "missing.yaml"))).rejects.toBeInstanceOf(ConfigError);
  });
});
