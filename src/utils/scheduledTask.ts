import type { TypedEventBus } from "../types/module";
import { errorMessage } from "./errors";

export interface ScheduledTaskOptions {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
}

// A tick that lands while the previous run is still in flight is dropped, not queued.
export class ScheduledTask {
  private timer?: ReturnType<typeof setInterval>;
  private inFlight?: Promise<void>;
  private skipped = 0;

  constructor(
    private readonly bus: TypedEventBus,
    private readonly options: ScheduledTaskOptions
  ) {}

  get name(): string {
    return this.options.name;
  }

  get active(): boolean {
    return this.timer !== undefined;
  }

  get busy(): boolean {
    return this.inFlight !== undefined;
  }

  get skippedTicks(): number {
    return this.skipped;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.trigger();
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  trigger(): Promise<void> {
    if (this.inFlight) {
      this.skipped += 1;
      return this.inFlight;
    }
    const run = this.runSafely().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = run;
    return run;
  }

  idle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private async runSafely(): Promise<void> {
    try {
      await this.options.run();
    } catch (error) {
      this.bus.log("ERROR", `${this.options.name} failed: ${errorMessage(error)}`);
    }
  }
}
