import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError } from "../errors.js";
import { resolveConfig, type ConfigSnapshot } from "./config.js";

export const CONFIG_FILE_NAMES = [".autostage.yaml", ".autostage.yml", ".autostage.json"] as const;

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function findConfigFile(dir: string): Promise<string | undefined> {
  for (const name of CONFIG_FILE_NAMES) {
    const p = path.join(dir, name);
    if (await pathExists(p)) return p;
  }
  return;
}

export function parseConfigText(raw: string, filePath: string): unknown {
  try {
    if (path.extname(filePath).toLowerCase() === ".json") return JSON.parse(raw);
    return yaml.load(raw) ?? {};
  } catch (e) {
    throw new ConfigError(`cannot parse ${filePath}`, [e instanceof Error ? e.message : String(e)], e);
  }
}

export async function loadConfigFile(filePath: string, overrides: Record<string, unknown> = {}): Promise<ConfigSnapshot> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new ConfigError(`cannot read ${filePath}`, [e instanceof Error ? e.message : String(e)], e);
  }
  const parsed = parseConfigText(raw, filePath);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`invalid configuration in ${filePath}`, ["top level must be a mapping"]);
  }
  return resolveConfig({ ...parsed, ...overrides });
}
