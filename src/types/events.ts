import type { Instrument, Opportunity } from "./market";
import type { OrderFailedEvent, OrderReceipt, OrderRequest } from "./order";
import type { PerformanceSnapshot } from "./performance";
import type { AccountView, ClosedTrade, Position, PositionMark } from "./portfolio";
import type { RiskDecisionEvent, RiskStateEvent } from "./risk";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface LogEvent {
  level: LogLevel;
  message: string;
  ts: number;
}

export interface ScanCompletedEvent {
  cycleTs: number;
  scanned: number;
  skipped: number;
  ranked: Opportunity[];
  approved: number;
  submitted: number;
  filled: number;
  durationMs: number;
}

export interface SchedulerStateEvent {
  running: boolean;
  scanning: boolean;
  ts: number;
}

export interface UniverseRefreshedEvent {
  instruments: readonly Instrument[];
  stale: boolean;
  ts: number;
}

export interface BalanceReconciledEvent {
  ledgerBalance: number;
  venueBalance: number;
  drift: number;
  adjusted: boolean;
  ts: number;
}

export interface EventMap {
  "universe.refreshed": UniverseRefreshedEvent;
  "scan.completed": ScanCompletedEvent;
  "risk.decision": RiskDecisionEvent;
  "risk.state": RiskStateEvent;
  "order.submitted": OrderRequest & { ts: number };
  "order.filled": OrderReceipt;
  "order.failed": OrderFailedEvent;
  "position.opened": Position;
  "position.closing": Position;
  "position.closed": ClosedTrade;
  "position.marked": PositionMark;
  "account.updated": AccountView;
  "balance.reconciled": BalanceReconciledEvent;
  "performance.snapshot": PerformanceSnapshot;
  "scheduler.state": SchedulerStateEvent;
  log: LogEvent;
}

export type EventKey = keyof EventMap;
