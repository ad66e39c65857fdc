import path from "node:path";

function normalize(p: string): string {
  const abs = path.resolve(p);
  if (abs.length > 1 && abs.endsWith(path.sep)) return abs.slice(0, -1);
  return abs;
}

/**
 * Path of `absolutePath` relative to `repoRoot`, with `/` separators, or undefined when the
 * file is not strictly below the root. The prefix test is on whole path components.
 */
export function relativeTo(absolutePath: string, repoRoot: string): string | undefined {
  const file = normalize(absolutePath);
  const root = normalize(repoRoot);
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  if (!file.startsWith(prefix)) return;
  const rel = file.slice(prefix.length);
  if (rel.length === 0) return;
  return rel.split(path.sep).join("/");
}
