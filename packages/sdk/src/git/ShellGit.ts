import { spawn } from "node:child_process";
import { describeFailure, SPAWN_FAILED_MESSAGE, type StagingFailure } from "../errors.js";
import type { AddResult, GitRunner, GitRunResult, IStagingGit, StatusResult, TrackedResult } from "./IStagingGit.js";

export const DEFAULT_GIT_TIMEOUT_MS = 30_000;

export type SpawnRunnerOptions = {
  command?: string;
  timeoutMs?: number;
};

export function createSpawnRunner(opts: SpawnRunnerOptions = {}): GitRunner {
  const command = opts.command ?? "git";
  const timeoutMs = opts.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;

  return (args, cwd) =>
    new Promise<GitRunResult>((resolve) => {
      let settled = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;
      const settle = (r: GitRunResult) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(r);
      };

      let child: ReturnType<typeof spawn>;
      try {
        child = spawn(command, args, { cwd, stdio: ["ignore", "pipe", "pipe"], windowsHide: true });
      } catch (e) {
        settle({ spawned: false, error: e instanceof Error ? e.message : String(e) });
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout?.on("data", (d: Buffer) => stdout.push(Buffer.from(d)));
      child.stderr?.on("data", (d: Buffer) => stderr.push(Buffer.from(d)));
      child.on("error", (e: Error) => settle({ spawned: false, error: e.message }));
      child.on("close", (code: number | null) => {
        settle({
          spawned: true,
          code,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          timedOut
        });
      });

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill("SIGTERM");
        }, timeoutMs);
        timer.unref();
      }
    });
}

/** Parses the two-character code at the start of the first `git status --porcelain` line. */
export function parsePorcelainCode(output: string): string | undefined {
  const first = output.split("\n").find((l) => l.length > 0);
  if (!first) return;
  const m = /^(..) /.exec(first);
  return m?.[1];
}

export class ShellGit implements IStagingGit {
  private readonly run: GitRunner;

  constructor(runner?: GitRunner) {
    this.run = runner ?? createSpawnRunner();
  }

  async isTracked(repoRoot: string, relativePath: string): Promise<TrackedResult> {
    const r = await this.run(["ls-files", "--error-unmatch", "--", relativePath], repoRoot);
    if (!r.spawned) return { tracked: false, status: SPAWN_FAILED_MESSAGE };
    if (r.timedOut) return { tracked: false, status: "git ls-files timed out" };
    return r.code === 0 ? { tracked: true, status: "tracked" } : { tracked: false, status: "untracked" };
  }

  async add(repoRoot: string, relativePath: string): Promise<AddResult> {
    const r = await this.run(["add", "--", relativePath], repoRoot);
    if (r.spawned && r.code === 0 && !r.timedOut) return { ok: true, message: "File added successfully" };
    const failure: StagingFailure = r.spawned
      ? { kind: "subprocess_nonzero", exitCode: r.code, stderr: r.timedOut ? "timed out" : r.stderr.trim() }
      : { kind: "spawn_failed", message: `${SPAWN_FAILED_MESSAGE}: ${r.error}` };
    return { ok: false, message: describeFailure(failure), failure };
  }

  async status(repoRoot: string, relativePath: string): Promise<StatusResult> {
    const r = await this.run(["status", "--porcelain", "--", relativePath], repoRoot);
    if (!r.spawned) return { message: SPAWN_FAILED_MESSAGE };
    if (r.code !== 0 || r.timedOut) return { message: "Git status failed" };
    return { code: parsePorcelainCode(r.stdout), message: "Success" };
  }
}
