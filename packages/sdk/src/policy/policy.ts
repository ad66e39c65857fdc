import fs from "node:fs";
import type { ConfigSnapshot } from "../config/config.js";
import { describeFailure, type StagingFailure } from "../errors.js";
import type { RepoLocator } from "../repo/repoLocator.js";
import { relativeTo } from "../repo/pathResolver.js";
import { matchesAny } from "./patterns.js";

/** An accepted decision carries the repository location the staging attempt will use. */
export type PolicyDecision =
  | { accepted: true; reason: string; repoRoot: string; relativePath: string }
  | { accepted: false; reason: string; failure: StagingFailure };

export const POLICY_REASONS = {
  ok: "OK",
  disabled: "Plugin disabled",
  notRegularFile: "Not a regular file",
  excluded: "File matches exclude pattern",
  notIncluded: "File does not match include patterns",
  tooLarge: "File too large",
  notInAllowedDir: "File not in allowed directory",
  notInRepo: "Not in git repository"
} as const;

export type FileInfo = {
  isFile: boolean;
  size: number;
};

export type StatFile = (p: string) => FileInfo | undefined;

export type PolicyDeps = {
  locator: RepoLocator;
  statFile?: StatFile;
};

export function statFileSync(p: string): FileInfo | undefined {
  try {
    const st = fs.statSync(p);
    return { isFile: st.isFile(), size: st.size };
  } catch {
    return;
  }
}

function reject(reason: string): PolicyDecision {
  return { accepted: false, reason, failure: { kind: "policy_rejected", reason } };
}

function inAllowedDir(relativePath: string, dirs: readonly string[]): boolean {
  return dirs.some((d) => relativePath.startsWith(d));
}

/**
 * Decides whether `absolutePath` may be staged. Checks run in a fixed order and the first
 * failing one supplies the reason. No git process is started; repository lookups go through
 * the locator cache.
 */
export function decide(absolutePath: string, config: ConfigSnapshot, deps: PolicyDeps): PolicyDecision {
  if (!config.enabled) return reject(POLICY_REASONS.disabled);

  const info = (deps.statFile ?? statFileSync)(absolutePath);
  if (!info || !info.isFile) return reject(POLICY_REASONS.notRegularFile);

  const repoRoot = deps.locator.findRoot(absolutePath);
  const relativePath = repoRoot !== undefined ? relativeTo(absolutePath, repoRoot) : undefined;

  if (matchesAny(config.compiled.exclude, absolutePath, relativePath)) return reject(POLICY_REASONS.excluded);
  if (config.compiled.include.length > 0 && !matchesAny(config.compiled.include, absolutePath, relativePath)) {
    return reject(POLICY_REASONS.notIncluded);
  }

  if (config.maxFileSizeBytes > 0 && info.size > config.maxFileSizeBytes) return reject(POLICY_REASONS.tooLarge);

  if (config.restrictToDirs.length > 0) {
    if (relativePath === undefined || !inAllowedDir(relativePath, config.restrictToDirs)) {
      return reject(POLICY_REASONS.notInAllowedDir);
    }
  }

  if (repoRoot === undefined) {
    return { accepted: false, reason: POLICY_REASONS.notInRepo, failure: { kind: "not_a_repository" } };
  }
  if (relativePath === undefined) {
    const failure: StagingFailure = { kind: "outside_repository" };
    return { accepted: false, reason: describeFailure(failure), failure };
  }

  return { accepted: true, reason: POLICY_REASONS.ok, repoRoot, relativePath };
}
