export type StagingFailure =
  | { kind: "not_a_repository" }
  | { kind: "outside_repository" }
  | { kind: "policy_rejected"; reason: string }
  | { kind: "spawn_failed"; message: string }
  | { kind: "subprocess_nonzero"; exitCode: number | null; stderr: string };

/** Not a failure: the path is already in the index, nothing to stage. */
export type StagingShortCircuit = { kind: "already_tracked" };

/** How one debounced staging attempt ended. `cancelled` means the engine was cleaned up meanwhile. */
export type StagingOutcome =
  | { kind: "added"; relativePath: string }
  | StagingShortCircuit
  | { kind: "rejected"; failure: StagingFailure }
  | { kind: "failed"; failure: StagingFailure }
  | { kind: "cancelled" };

export const NOT_A_REPO_MESSAGE = "Not in git repo";
export const OUTSIDE_REPO_MESSAGE = "File outside git repo";
export const SPAWN_FAILED_MESSAGE = "Failed to spawn git process";

export function describeFailure(f: StagingFailure): string {
  switch (f.kind) {
    case "not_a_repository":
      return NOT_A_REPO_MESSAGE;
    case "outside_repository":
      return OUTSIDE_REPO_MESSAGE;
    case "policy_rejected":
      return f.reason;
    case "spawn_failed":
      return SPAWN_FAILED_MESSAGE;
    case "subprocess_nonzero":
      return `Git add failed: ${f.stderr}`;
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly problems: string[] = [], public cause?: unknown) {
    super(problems.length ? `${message}: ${problems.join("; ")}` : message);
    this.name = "ConfigError";
  }
}
