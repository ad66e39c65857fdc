import fs from "node:fs";
import path from "node:path";

export const REPO_MARKER = ".git";

/** Returns true when something (file or directory) exists at `markerPath`. */
export type MarkerProbe = (markerPath: string) => boolean;

export type RepoLocatorOptions = {
  probe?: MarkerProbe;
  marker?: string;
};

// A miss is stored as `null` so that it is a cache hit; `undefined` from Map#get means "never looked".
type CacheEntry = string | null;

export function statProbe(markerPath: string): boolean {
  try {
    const st = fs.statSync(markerPath);
    return st.isDirectory() || st.isFile();
  } catch {
    return false;
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Finds the repository root for a path by walking parent directories until one holds a `.git`
 * entry. Results, including misses, are memoized under the path that was asked for.
 */
export class RepoLocator {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly probe: MarkerProbe;
  private readonly marker: string;

  constructor(opts: RepoLocatorOptions = {}) {
    this.probe = opts.probe ?? statProbe;
    this.marker = opts.marker ?? REPO_MARKER;
  }

  findRoot(queryPath: string): string | undefined {
    const cached = this.cache.get(queryPath);
    if (cached !== undefined) return cached ?? undefined;

    const found = this.walk(queryPath);
    this.cache.set(queryPath, found ?? null);
    return found;
  }

  isInRepo(queryPath: string): boolean {
    return this.findRoot(queryPath) !== undefined;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  snapshot(): Record<string, string | null> {
    return Object.fromEntries(this.cache);
  }

  private walk(queryPath: string): string | undefined {
    const abs = path.resolve(queryPath);
    let current = isDirectory(abs) ? abs : path.dirname(abs);
    for (;;) {
      if (this.probe(path.join(current, this.marker))) return current;
      const parent = path.dirname(current);
      if (parent === current) return;
      current = parent;
    }
  }
}
