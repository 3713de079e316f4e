import type { RiskState } from "./risk";

export interface PerformanceSnapshot {
  readonly balance: number;
  readonly growthPct: number;
  readonly tradeCount: number;
  readonly winRate: number;
  readonly totalPnl: number;
  readonly openPositions: number;
  readonly riskState: RiskState;
  readonly ts: number;
}
