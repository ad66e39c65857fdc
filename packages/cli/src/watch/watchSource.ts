export type HostEventType = "created" | "saved" | "deleted";

export type HostEvent = {
  type: HostEventType;
  path: string;
  occurredAt: Date;
};

export type WatchSourceOptions = {
  rootDir: string;
  ignore: (path: string) => boolean;
};

/** Host side of the engine: reports file activity under one directory tree. */
export interface WatchSource {
  start(options: WatchSourceOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: HostEvent) => void): void;
  /** Watcher failures (EMFILE, EACCES, ...). The source keeps running after reporting one. */
  onError(handler: (error: Error) => void): void;
}
