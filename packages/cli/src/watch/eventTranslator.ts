import type { TriggerMode } from "@autostage/sdk";
import type { HostEvent } from "./watchSource.js";

/**
 * Turns host file events into staging requests according to the trigger mode. The
 * `created-then-saved` mode remembers created paths until their first save.
 */
export class EventTranslator {
  private readonly created = new Map<string, Date>();

  constructor(
    private readonly mode: TriggerMode,
    private readonly requestAdd: (path: string) => void
  ) {}

  handle(event: HostEvent): void {
    switch (this.mode) {
      case "all":
        if (event.type !== "deleted") this.requestAdd(event.path);
        return;
      case "created":
        if (event.type === "created") this.requestAdd(event.path);
        return;
      case "created-then-saved":
        this.handleCreatedThenSaved(event);
        return;
    }
  }

  get trackedCount(): number {
    return this.created.size;
  }

  private handleCreatedThenSaved(event: HostEvent): void {
    if (event.type === "created") {
      this.created.set(event.path, event.occurredAt);
      return;
    }
    if (event.type === "deleted") {
      this.created.delete(event.path);
      return;
    }
    if (this.created.delete(event.path)) this.requestAdd(event.path);
  }
}
