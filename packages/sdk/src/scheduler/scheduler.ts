import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";

export type PathState = "idle" | "pending" | "in_flight";

/**
 * Work run once the debounce delay for a path has elapsed. `isCurrent()` turns false once the
 * scheduler has been cleared, after which the action must not report anything.
 */
export type ScheduledAction = (path: string, isCurrent: () => boolean) => Promise<void>;

export type SchedulerOptions = {
  action: ScheduledAction;
  delayMs: () => number;
  logger?: Logger;
};

type PendingEntry = {
  timer?: NodeJS.Timeout;
  inFlight: boolean;
  rerun: boolean;
};

/**
 * Per-path debounce. A path is idle, pending (timer armed) or in flight (action running).
 * Requests while pending re-arm the timer; a request while in flight is remembered and
 * replayed as one new pending cycle after the running action settles.
 */
export class Scheduler {
  private readonly entries = new Map<string, PendingEntry>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly action: ScheduledAction;
  private readonly delayMs: () => number;
  private readonly log: Logger;

  constructor(opts: SchedulerOptions) {
    this.action = opts.action;
    this.delayMs = opts.delayMs;
    this.log = opts.logger ?? createSilentLogger();
  }

  request(path: string): void {
    const existing = this.entries.get(path);
    if (existing?.inFlight) {
      existing.rerun = true;
      this.log.debug("request_while_in_flight", { path });
      return;
    }

    const delay = Math.max(0, this.delayMs());
    if (existing) {
      if (existing.timer) clearTimeout(existing.timer);
      existing.timer = setTimeout(() => this.start(path, existing), delay);
      this.log.debug("debounce_reset", { path, delayMs: delay });
      return;
    }

    const entry: PendingEntry = { inFlight: false, rerun: false };
    this.entries.set(path, entry);
    if (delay === 0) {
      this.start(path, entry);
      return;
    }
    entry.timer = setTimeout(() => this.start(path, entry), delay);
    this.log.debug("scheduled", { path, delayMs: delay });
  }

  stateOf(path: string): PathState {
    const e = this.entries.get(path);
    if (!e) return "idle";
    return e.inFlight ? "in_flight" : "pending";
  }

  get pendingCount(): number {
    return this.entries.size;
  }

  get activeTimerCount(): number {
    let n = 0;
    for (const e of this.entries.values()) if (e.timer) n++;
    return n;
  }

  /** Resolves once no path is pending or in flight. */
  whenIdle(): Promise<void> {
    if (this.entries.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stops every timer and forgets every path. Running actions finish unobserved. */
  cancelAll(): void {
    for (const e of this.entries.values()) {
      if (e.timer) clearTimeout(e.timer);
      e.timer = undefined;
    }
    const dropped = this.entries.size;
    this.entries.clear();
    if (dropped) this.log.debug("cancelled", { dropped });
    this.flushIdle();
  }

  private start(path: string, entry: PendingEntry): void {
    if (this.entries.get(path) !== entry) return;
    entry.timer = undefined;
    entry.inFlight = true;
    const isCurrent = () => this.entries.get(path) === entry;

    let running: Promise<void>;
    try {
      running = this.action(path, isCurrent);
    } catch (e) {
      running = Promise.reject(e);
    }
    void running
      .catch((e: unknown) => {
        this.log.error("action_failed", { path, error: e instanceof Error ? e.message : String(e) });
      })
      .finally(() => this.finish(path, entry));
  }

  private finish(path: string, entry: PendingEntry): void {
    if (this.entries.get(path) !== entry) return;
    this.entries.delete(path);
    if (entry.rerun) {
      this.request(path);
      return;
    }
    if (this.entries.size === 0) this.flushIdle();
  }

  private flushIdle(): void {
    const waiters = this.idleWaiters.splice(0);
    for (const w of waiters) w();
  }
}
