/**
 * Event logger — append-only JSONL event log.
 *
 * One file per UTC day (`<dir>/YYYY-MM-DD.jsonl`), one event per line.
 * An optional callback sees every event synchronously before it is written.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

/** Event types the engine emits. */
export type SkillEventType = "registry.loaded" | "registry.rejected";

export interface SkillEvent {
  /** Sequence number within this logger instance. */
  eventId: number;
  type: SkillEventType;
  /** ISO timestamp. */
  timestamp: string;
  actor: string;
  payload: Record<string, unknown>;
}

export type EventCallback = (event: SkillEvent) => void;

export interface EventLoggerOptions {
  /** Called for every event before it is persisted. */
  onEvent?: EventCallback;
  /** Write events to disk (default true). The callback fires either way. */
  persist?: boolean;
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent: EventCallback | undefined;
  private readonly persist: boolean;
  private eventCounter = 0;

  constructor(eventsDir: string, options: EventLoggerOptions = {}) {
    this.eventsDir = eventsDir;
    this.onEvent = options.onEvent;
    this.persist = options.persist ?? true;
  }

  /** Id of the most recent event (0 before the first). */
  get lastEventId(): number {
    return this.eventCounter;
  }

  /** Record an event. */
  async log(
    type: SkillEventType,
    actor: string,
    opts: { payload?: Record<string, unknown> } = {},
  ): Promise<SkillEvent> {
    const event: SkillEvent = {
      eventId: ++this.eventCounter,
      type,
      timestamp: new Date().toISOString(),
      actor,
      payload: opts.payload ?? {},
    };

    this.onEvent?.(event);

    if (this.persist) {
      await mkdir(this.eventsDir, { recursive: true });
      const filePath = join(this.eventsDir, `${event.timestamp.slice(0, 10)}.jsonl`);
      await appendFile(filePath, `${JSON.stringify(event)}\n`, "utf-8");
    }

    return event;
  }

  /** A snapshot was installed. */
  async logRegistryLoaded(
    actor: string,
    payload: { version: number; bundles: number; documents: number; sourceType: string },
  ): Promise<SkillEvent> {
    return this.log("registry.loaded", actor, { payload });
  }

  /** A load was rejected; the previous snapshot stays active. */
  async logRegistryRejected(
    actor: string,
    payload: { message: string; issues: Array<{ rule: string; message: string }> },
  ): Promise<SkillEvent> {
    return this.log("registry.rejected", actor, { payload });
  }
}
