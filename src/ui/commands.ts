import type { CommandDefinition, ParsedCommand } from "../types/commands";
import type { TypedEventBus } from "../types/module";
import type { PerformanceSnapshot } from "../types/performance";

export const COMMANDS: readonly CommandDefinition[] = [
  { id: "scan", label: "Run Scan", command: "/scan", description: "Run a scan cycle now" },
  { id: "pause", label: "Pause Scanning", command: "/pause", description: "Stop opening new positions" },
  { id: "resume", label: "Resume Scanning", command: "/resume", description: "Resume the scan cycle" },
  { id: "close", label: "Close Position", command: "/close <positionId>", description: "Close one position" },
  { id: "close-all", label: "Close All", command: "/close-all", description: "Close every open position" },
  {
    id: "reset-breaker",
    label: "Reset Circuit Breaker",
    command: "/reset-breaker",
    description: "Leave the halted state"
  },
  { id: "snapshot", label: "Snapshot", command: "/snapshot", description: "Log a performance snapshot" }
];

export function parseCommand(raw: string): ParsedCommand | undefined {
  const command = raw.trim();
  if (!command) return undefined;
  const parts = (command.startsWith("/") ? command.slice(1) : command).split(/\s+/);
  const action = parts[0]?.toLowerCase();

  switch (action) {
    case "scan":
    case "pause":
    case "resume":
    case "close-all":
    case "reset-breaker":
    case "snapshot":
      return { action };
    case "close": {
      const positionId = parts[1];
      return positionId && positionId !== "<positionId>" ? { action, positionId } : { action };
    }
    default:
      return { action: "unknown", raw: command };
  }
}

export interface CommandTarget {
  runCycleNow(): Promise<void>;
  pause(): void;
  resume(): void;
  closePosition(positionId: string): Promise<boolean>;
  closeAll(): Promise<boolean>;
  resetCircuitBreaker(): Promise<boolean>;
  snapshot(): PerformanceSnapshot;
}

export async function executeCommand(
  parsed: ParsedCommand,
  target: CommandTarget,
  bus: TypedEventBus,
  openPositionIds: readonly string[]
): Promise<void> {
  switch (parsed.action) {
    case "scan":
      await target.runCycleNow();
      return;
    case "pause":
      target.pause();
      return;
    case "resume":
      target.resume();
      return;
    case "close": {
      const positionId = parsed.positionId ?? openPositionIds[0];
      if (!positionId) throw new Error("No open position to close");
      const closed = await target.closePosition(positionId);
      bus.log(closed ? "INFO" : "WARN", closed ? `Closed ${positionId}` : `Position ${positionId} is still open`);
      return;
    }
    case "close-all": {
      const closed = await target.closeAll();
      if (!closed) bus.log("WARN", "Some positions are still open");
      return;
    }
    case "reset-breaker": {
      const reset = await target.resetCircuitBreaker();
      bus.log(reset ? "WARN" : "INFO", reset ? "Circuit breaker reset" : "Circuit breaker is not tripped");
      return;
    }
    case "snapshot":
      target.snapshot();
      return;
    case "unknown":
      bus.log("WARN", `Unknown command: ${parsed.raw}`);
      return;
  }
}
