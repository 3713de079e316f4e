import type { Direction } from "./market";
import type { RiskState } from "./risk";

export type PositionStatus = "open" | "closing" | "closed";

export type ExitReason = "forced" | "stop-loss" | "take-profit" | "time-stop" | "manual" | "shutdown";

export interface Position {
  id: string;
  clientOrderId: string;
  instrument: string;
  direction: Direction;
  entryPrice: number;
  size: number;
  stopLoss: number;
  takeProfit: number;
  openedAt: number;
  status: PositionStatus;
  forceClose: boolean;
}

export interface ClosedTrade {
  position: Position;
  exitPrice: number;
  pnl: number;
  fee: number;
  reason: ExitReason;
  closedAt: number;
}

export interface TradeStats {
  count: number;
  wins: number;
  totalPnl: number;
}

export interface AccountState {
  balance: number;
  peakBalance: number;
  dailyPnl: number;
  dayStartBalance: number;
  breakerBaseline: number;
  tradingDay: string;
  openPositions: number;
}

export interface AccountView {
  account: AccountState;
  riskState: RiskState;
  positions: Position[];
  reservedCapital: number;
  pendingEntries: number;
  closedTrades: readonly ClosedTrade[];
  tradeStats: TradeStats;
  updatedAt: number;
}

export interface PositionMark {
  positionId: string;
  instrument: string;
  price: number;
  unrealizedPnl: number;
  ts: number;
}
