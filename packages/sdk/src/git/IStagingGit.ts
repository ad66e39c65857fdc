import type { StagingFailure } from "../errors.js";

export type GitRunResult =
  | { spawned: true; code: number | null; stdout: string; stderr: string; timedOut: boolean }
  | { spawned: false; error: string };

/** Runs `git <args>` in `cwd`. Never rejects: spawn errors come back as `{ spawned: false }`. */
export type GitRunner = (args: string[], cwd: string) => Promise<GitRunResult>;

export type TrackedResult = {
  tracked: boolean;
  status: string;
};

export type AddResult =
  | { ok: true; message: string }
  | { ok: false; message: string; failure: StagingFailure };

export type StatusResult = {
  /** Two-character porcelain code such as "A ", "??" or " M". */
  code?: string;
  message: string;
};

/**
 * Single-path git operations used by the staging engine. Each call spawns one process in the
 * repository root and settles exactly once.
 */
export interface IStagingGit {
  isTracked(repoRoot: string, relativePath: string): Promise<TrackedResult>;
  add(repoRoot: string, relativePath: string): Promise<AddResult>;
  status(repoRoot: string, relativePath: string): Promise<StatusResult>;
}
