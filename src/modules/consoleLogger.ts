import type { LogEvent } from "../types/events";
import type { SystemModule, TypedEventBus } from "../types/module";

export function formatLogLine(line: LogEvent): string {
  return `${new Date(line.ts).toISOString()} ${line.level.padEnd(5)} ${line.message}`;
}

export class ConsoleLogger implements SystemModule {
  private unsub?: () => void;

  constructor(
    private readonly bus: TypedEventBus,
    private readonly out: (text: string) => void = (text) => process.stdout.write(text),
    private readonly err: (text: string) => void = (text) => process.stderr.write(text)
  ) {}

  start(): void {
    this.unsub = this.bus.on("log", (line) => {
      const text = `${formatLogLine(line)}\n`;
      if (line.level === "ERROR") this.err(text);
      else this.out(text);
    });
  }

  stop(): void {
    this.unsub?.();
    this.unsub = undefined;
  }
}
