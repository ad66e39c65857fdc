import path from "node:path";
import { resolveConfig, withEnabled, type AutoStageConfigInput, type ConfigSnapshot } from "../config/config.js";
import { describeFailure, type StagingOutcome } from "../errors.js";
import type { AddResult, IStagingGit, StatusResult } from "../git/IStagingGit.js";
import { createSpawnRunner, ShellGit } from "../git/ShellGit.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { decide, type PolicyDecision, type StatFile } from "../policy/policy.js";
import { relativeTo } from "../repo/pathResolver.js";
import { RepoLocator } from "../repo/repoLocator.js";
import { Scheduler, type PathState } from "../scheduler/scheduler.js";

export type ResultCallback = (path: string, success: boolean, message: string) => void;

export type StatusSnapshot = {
  path: string;
  enabled: boolean;
  inRepo: boolean;
  repoRoot?: string;
  relativePath?: string;
  wouldProcess: boolean;
  reason: string;
  state: PathState;
};

export type EngineOptions = {
  config?: AutoStageConfigInput | ConfigSnapshot;
  git?: IStagingGit;
  locator?: RepoLocator;
  statFile?: StatFile;
  logger?: Logger;
  onResult?: ResultCallback;
  /** Base for relative paths given to `requestAdd`/`getStatus`. */
  cwd?: string;
};

function isSnapshot(c: AutoStageConfigInput | ConfigSnapshot): c is ConfigSnapshot {
  return "compiled" in c;
}

/**
 * Stages newly created files. Owns the repository-root cache, the per-path scheduler and the
 * current configuration; independent instances share nothing.
 */
export class AutoStageEngine {
  private cfg: ConfigSnapshot;
  private git: IStagingGit;
  private readonly ownsGit: boolean;
  private readonly locator: RepoLocator;
  private readonly scheduler: Scheduler;
  private readonly statFile?: StatFile;
  private readonly log: Logger;
  private readonly cwd: string;
  private onResult?: ResultCallback;
  private readonly addLocks = new Map<string, Promise<void>>();

  constructor(opts: EngineOptions = {}) {
    this.cfg = this.resolve(opts.config ?? {});
    this.ownsGit = opts.git === undefined;
    this.git = opts.git ?? this.defaultGit();
    this.locator = opts.locator ?? new RepoLocator();
    this.statFile = opts.statFile;
    this.log = (opts.logger ?? createSilentLogger()).child({ component: "engine" });
    this.cwd = opts.cwd ?? process.cwd();
    this.onResult = opts.onResult;
    this.scheduler = new Scheduler({
      action: (p, isCurrent) => this.attempt(p, isCurrent).then((outcome) => this.report(p, outcome)),
      delayMs: () => this.cfg.delayMs,
      logger: this.log
    });
  }

  get config(): ConfigSnapshot {
    return this.cfg;
  }

  /** Replaces the configuration and drops the repository-root cache. Pending paths stay pending. */
  setup(config: AutoStageConfigInput | ConfigSnapshot = {}): void {
    this.cfg = this.resolve(config);
    if (this.ownsGit) this.git = this.defaultGit();
    this.locator.clear();
    this.log.debug("setup", { delayMs: this.cfg.delayMs, enabled: this.cfg.enabled });
  }

  setResultHandler(handler: ResultCallback | undefined): void {
    this.onResult = handler;
  }

  requestAdd(filePath: string): void {
    if (!filePath) return;
    const abs = this.absolute(filePath);
    this.log.debug("request", { path: abs });
    this.scheduler.request(abs);
  }

  getStatus(filePath: string): StatusSnapshot {
    const abs = this.absolute(filePath);
    const repoRoot = this.locator.findRoot(abs);
    const relativePath = repoRoot !== undefined ? relativeTo(abs, repoRoot) : undefined;
    const decision = this.decide(abs);
    return {
      path: abs,
      enabled: this.cfg.enabled,
      inRepo: repoRoot !== undefined,
      repoRoot,
      relativePath,
      wouldProcess: decision.accepted,
      reason: decision.reason,
      state: this.scheduler.stateOf(abs)
    };
  }

  relativePath(filePath: string): string | undefined {
    const abs = this.absolute(filePath);
    const repoRoot = this.locator.findRoot(abs);
    return repoRoot !== undefined ? relativeTo(abs, repoRoot) : undefined;
  }

  /** Porcelain status of one file, for display only. */
  async gitStatus(filePath: string): Promise<StatusResult> {
    const abs = this.absolute(filePath);
    const repoRoot = this.locator.findRoot(abs);
    if (repoRoot === undefined) return { message: describeFailure({ kind: "not_a_repository" }) };
    const rel = relativeTo(abs, repoRoot);
    if (rel === undefined) return { message: describeFailure({ kind: "outside_repository" }) };
    return await this.git.status(repoRoot, rel);
  }

  enable(): void {
    this.cfg = withEnabled(this.cfg, true);
  }

  disable(): void {
    this.cfg = withEnabled(this.cfg, false);
  }

  /** Returns the new enabled state. */
  toggle(): boolean {
    this.cfg = withEnabled(this.cfg, !this.cfg.enabled);
    return this.cfg.enabled;
  }

  isEnabled(): boolean {
    return this.cfg.enabled;
  }

  clearCache(): void {
    this.locator.clear();
  }

  cacheSnapshot(): Record<string, string | null> {
    return this.locator.snapshot();
  }

  get pendingCount(): number {
    return this.scheduler.pendingCount;
  }

  get activeTimerCount(): number {
    return this.scheduler.activeTimerCount;
  }

  stateOf(filePath: string): PathState {
    return this.scheduler.stateOf(this.absolute(filePath));
  }

  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  /** Cancels every pending path and clears the cache. Git processes already started run to completion unobserved. */
  cleanup(): void {
    this.scheduler.cancelAll();
    this.locator.clear();
    this.log.debug("cleanup");
  }

  private resolve(config: AutoStageConfigInput | ConfigSnapshot): ConfigSnapshot {
    return isSnapshot(config) ? config : resolveConfig(config);
  }

  private defaultGit(): IStagingGit {
    return new ShellGit(createSpawnRunner({ timeoutMs: this.cfg.gitTimeoutMs }));
  }

  private absolute(filePath: string): string {
    return path.resolve(this.cwd, filePath);
  }

  private decide(abs: string): PolicyDecision {
    return decide(abs, this.cfg, { locator: this.locator, statFile: this.statFile });
  }

  /** Waits until no other `git add` runs in `repoRoot`; git holds `index.lock` while staging. */
  private async acquireAddLock(repoRoot: string): Promise<() => void> {
    while (true) {
      const existing = this.addLocks.get(repoRoot);
      if (existing) {
        await existing;
        continue;
      }
      let release: () => void = () => {};
      const lock = new Promise<void>((resolve) => {
        release = resolve;
      });
      this.addLocks.set(repoRoot, lock);
      return () => {
        this.addLocks.delete(repoRoot);
        release();
      };
    }
  }

  private async attempt(abs: string, isCurrent: () => boolean): Promise<StagingOutcome> {
    const decision = this.decide(abs);
    if (!decision.accepted) return { kind: "rejected", failure: decision.failure };
    const { repoRoot, relativePath } = decision;

    const tracked = await this.git.isTracked(repoRoot, relativePath);
    if (!isCurrent()) return { kind: "cancelled" };
    if (tracked.tracked) return { kind: "already_tracked" };

    const release = await this.acquireAddLock(repoRoot);
    let added: AddResult;
    try {
      if (!isCurrent()) return { kind: "cancelled" };
      added = await this.git.add(repoRoot, relativePath);
    } finally {
      release();
    }
    if (!isCurrent()) return { kind: "cancelled" };

    this.onResult?.(abs, added.ok, added.message);
    return added.ok ? { kind: "added", relativePath } : { kind: "failed", failure: added.failure };
  }

  private report(abs: string, outcome: StagingOutcome): void {
    switch (outcome.kind) {
      case "added":
        this.log.debug("added", { path: abs, relativePath: outcome.relativePath });
        return;
      case "already_tracked":
      case "cancelled":
        this.log.debug(outcome.kind, { path: abs });
        return;
      case "rejected":
        this.log.debug("rejected", { path: abs, reason: describeFailure(outcome.failure) });
        return;
      case "failed":
        this.log.warn("add_failed", { path: abs, reason: describeFailure(outcome.failure), failure: outcome.failure });
        return;
    }
  }
}
