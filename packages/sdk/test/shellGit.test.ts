import { describe, expect, it } from "vitest";
import os from "node:os";
import { createSpawnRunner, parsePorcelainCode, ShellGit } from "../src/git/ShellGit.js";
import { exited, fakeRunner } from "./_util.js";

describe("ShellGit", () => {
  it("checks tracking with ls-files for exactly one path", async () => {
    const { runner, calls } = fakeRunner(exited(0, "a.txt\n"));
    const git = new ShellGit(runner);
    expect(await git.isTracked("/r", "a.txt")).toEqual({ tracked: true, status: "tracked" });
    expect(calls).toEqual([{ args: ["ls-files", "--error-unmatch", "--", "a.txt"], cwd: "/r" }]);
  });

  it("reports untracked on a non-zero exit", async () => {
    const { runner } = fakeRunner(exited(1, "", "error: pathspec 'a.txt' did not match"));
    expect(await new ShellGit(runner).isTracked("/r", "a.txt")).toEqual({ tracked: false, status: "untracked" });
  });

  it("reports a spawn failure as not tracked", async () => {
    const { runner } = fakeRunner({ spawned: false, error: "spawn git ENOENT" });
    expect(await new ShellGit(runner).isTracked("/r", "a.txt")).toEqual({ tracked: false, status: "Failed to spawn git process" });
  });

  it("adds one path and reports success", async () => {
    const { runner, calls } = fakeRunner(exited(0));
    expect(await new ShellGit(runner).add("/r", "src/a.ts")).toEqual({ ok: true, message: "File added successfully" });
    expect(calls).toEqual([{ args: ["add", "--", "src/a.ts"], cwd: "/r" }]);
  });

  it("carries stderr of a failed add", async () => {
    const { runner } = fakeRunner(exited(128, "", "fatal: Unable to create index.lock\n"));
    expect(await new ShellGit(runner).add("/r", "a.txt")).toEqual({
      ok: false,
      message: "Git add failed: fatal: Unable to create index.lock",
      failure: { kind: "subprocess_nonzero", exitCode: 128, stderr: "fatal: Unable to create index.lock" }
    });
  });

  it("reports a spawn failure of add", async () => {
    const { runner } = fakeRunner({ spawned: false, error: "spawn git ENOENT" });
    expect(await new ShellGit(runner).add("/r", "a.txt")).toEqual({
      ok: false,
      message: "Failed to spawn git process",
      failure: { kind: "spawn_failed", message: "Failed to spawn git process: spawn git ENOENT" }
    });
  });

  it("treats a timed out add as a failure", async () => {
    const { runner } = fakeRunner({ spawned: true, code: null, stdout: "", stderr: "", timedOut: true });
    const r = await new ShellGit(runner).add("/r", "a.txt");
    expect(r).toEqual({
      ok: false,
      message: "Git add failed: timed out",
      failure: { kind: "subprocess_nonzero", exitCode: null, stderr: "timed out" }
    });
  });

  it("parses the porcelain status code", async () => {
    const { runner, calls } = fakeRunner(exited(0, "A  a.txt\n"));
    expect(await new ShellGit(runner).status("/r", "a.txt")).toEqual({ code: "A ", message: "Success" });
    expect(calls[0]?.args).toEqual(["status", "--porcelain", "--", "a.txt"]);
  });

  it("reports a failed status query", async () => {
    const { runner } = fakeRunner(exited(128, "", "fatal: not a git repository"));
    expect(await new ShellGit(runner).status("/r", "a.txt")).toEqual({ message: "Git status failed" });
  });
});

describe("parsePorcelainCode", () => {
  it("reads the first non-empty line", () => {
    expect(parsePorcelainCode("?? new.txt\n")).toBe("??");
    expect(parsePorcelainCode(" M changed.txt\n")).toBe(" M");
    expect(parsePorcelainCode("")).toBeUndefined();
  });
});

describe("createSpawnRunner", () => {
  it("resolves with spawned=false when the command does not exist", async () => {
    const run = createSpawnRunner({ command: "autostage-missing-binary-for-tests" });
    const r = await run(["status"], os.tmpdir());
    expect(r.spawned).toBe(false);
  });

  it("collects the exit code and output of a finished process", async () => {
    const run = createSpawnRunner({ command: process.execPath });
    const r = await run(["-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"], os.tmpdir());
    expect(r).toMatchObject({ spawned: true, code: 3, stdout: "out", timedOut: false });
    expect(r.spawned && r.stderr.endsWith("err")).toBe(true);
  });

  it("terminates a process that outlives the timeout", async () => {
    const run = createSpawnRunner({ command: process.execPath, timeoutMs: 100 });
    const started = Date.now();
    const r = await run(["-e", "setTimeout(() => {}, 10000)"], os.tmpdir());
    expect(r).toMatchObject({ spawned: true, code: null, timedOut: true });
    expect(Date.now() - started).toBeLessThan(5000);
  });
});
