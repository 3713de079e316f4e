import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { EventKey, EventMap } from "../types/events";
import type { SystemModule, TypedEventBus } from "../types/module";
import { errorMessage } from "../utils/errors";

interface EventJournalConfig {
  enabled: boolean;
  path: string;
  flushMs: number;
}

export interface JournalRow<K extends EventKey = EventKey> {
  event: K;
  ts: number;
  payload: EventMap[K];
}

export const JOURNALED_EVENTS: readonly EventKey[] = [
  "position.opened",
  "position.closed",
  "order.failed",
  "risk.state",
  "balance.reconciled",
  "performance.snapshot",
  "log"
];

export class EventJournal implements SystemModule {
  private readonly buffer: JournalRow[] = [];
  private flushTimer?: ReturnType<typeof setInterval>;
  private unsubs: Array<() => void> = [];
  private flushing: Promise<void> = Promise.resolve();

  constructor(
    private readonly bus: TypedEventBus,
    private readonly config: EventJournalConfig
  ) {}

  async start(): Promise<void> {
    if (!this.config.enabled) return;

    await mkdir(dirname(this.config.path), { recursive: true });

    for (const event of JOURNALED_EVENTS) {
      const unsub = this.bus.on(event, (payload) => {
        this.buffer.push({ event, ts: Date.now(), payload });
      });
      this.unsubs.push(unsub);
    }

    this.flushTimer = setInterval(() => {
      void this.flush();
    }, this.config.flushMs);
  }

  async stop(): Promise<void> {
    if (!this.config.enabled) return;
    if (this.flushTimer) clearInterval(this.flushTimer);
    this.flushTimer = undefined;
    for (const unsub of this.unsubs) unsub();
    this.unsubs = [];
    await this.flush();
  }

  flush(): Promise<void> {
    this.flushing = this.flushing.then(() => this.write());
    return this.flushing;
  }

  private async write(): Promise<void> {
    if (this.buffer.length === 0) return;
    const rows = this.buffer.splice(0);
    const lines = rows.map((row) => JSON.stringify(row)).join("\n") + "\n";
    try {
      await appendFile(this.config.path, lines, "utf8");
    } catch (error) {
      this.buffer.unshift(...rows);
      console.error(`Journal write to ${this.config.path} failed: ${errorMessage(error)}`);
    }
  }
}
