import chokidar from "chokidar";
import type { FSWatcher, WatchOptions } from "chokidar";
import path from "node:path";
import type { HostEvent, HostEventType, WatchSource, WatchSourceOptions } from "./watchSource.js";

const IGNORED_DIRS = [".git", "node_modules"];

/** Ignores everything outside `rootDir` and the repository's own `.git` and `node_modules` trees. */
export function createRepoIgnore(rootDir: string) {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);
    if (p === root) return false;
    if (!p.startsWith(root + path.sep)) return true;
    const segments = path.relative(root, p).split(path.sep);
    return segments.some((s) => IGNORED_DIRS.includes(s));
  };
}

export type CreateWatcher = (rootDir: string, options: WatchOptions) => FSWatcher;

const CHOKIDAR_EVENTS: ReadonlyArray<[string, HostEventType]> = [
  ["add", "created"],
  ["change", "saved"],
  ["unlink", "deleted"]
];

export class ChokidarWatchSource implements WatchSource {
  private watcher?: FSWatcher;
  private eventHandler?: (event: HostEvent) => void;
  private errorHandler?: (error: Error) => void;

  constructor(private readonly createWatcher: CreateWatcher = (rootDir, options) => chokidar.watch(rootDir, options)) {}

  onEvent(handler: (event: HostEvent) => void): void {
    this.eventHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  /** Resolves once the initial scan is done; files already present are not reported. */
  async start(options: WatchSourceOptions): Promise<void> {
    if (this.watcher) return;
    const rootDir = path.resolve(options.rootDir);

    const watcher = this.createWatcher(rootDir, {
      persistent: true,
      ignoreInitial: true,
      // editors write in several steps; report a file once its size settles
      awaitWriteFinish: { stabilityThreshold: 250, pollInterval: 50 },
      ignored: (p: string) => options.ignore(path.resolve(p))
    });
    this.watcher = watcher;

    for (const [chokidarEvent, type] of CHOKIDAR_EVENTS) {
      watcher.on(chokidarEvent, (p: string) => {
        this.eventHandler?.({ type, path: path.resolve(rootDir, p), occurredAt: new Date() });
      });
    }
    watcher.on("error", (e: unknown) => {
      this.errorHandler?.(e instanceof Error ? e : new Error(String(e)));
    });

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
  }

  async stop(): Promise<void> {
    const watcher = this.watcher;
    if (!watcher) return;
    this.watcher = undefined;
    await watcher.close();
  }
}
