export interface CommandDefinition {
  id: string;
  label: string;
  command: string;
  description: string;
}

export type ParsedCommand =
  | { action: "scan" }
  | { action: "pause" }
  | { action: "resume" }
  | { action: "close"; positionId?: string }
  | { action: "close-all" }
  | { action: "reset-breaker" }
  | { action: "snapshot" }
  | { action: "unknown"; raw: string };
