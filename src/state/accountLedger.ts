import type { AccountState, AccountView, ClosedTrade, Position, TradeStats } from "../types/portfolio";
import type { RiskState } from "../types/risk";
import { utcDay } from "../utils/ids";
import { sum } from "../utils/math";

export const RECENT_TRADES = 100;

export interface Reservation {
  id: string;
  instrument: string;
  size: number;
  createdAt: number;
}

export interface LedgerData {
  account: AccountState;
  riskState: RiskState;
  positions: Map<string, Position>;
  reservations: Map<string, Reservation>;
  closedTrades: ClosedTrade[];
  tradeStats: TradeStats;
}

export function recordTrade(data: LedgerData, trade: ClosedTrade): void {
  data.closedTrades.push(trade);
  if (data.closedTrades.length > RECENT_TRADES) data.closedTrades.shift();
  data.tradeStats.count += 1;
  if (trade.pnl > 0) data.tradeStats.wins += 1;
  data.tradeStats.totalPnl += trade.pnl;
}

export class AccountLedger {
  private readonly data: LedgerData;
  private tail: Promise<void> = Promise.resolve();

  constructor(initialBalance: number, now: number) {
    this.data = {
      account: {
        balance: initialBalance,
        peakBalance: initialBalance,
        dailyPnl: 0,
        dayStartBalance: initialBalance,
        breakerBaseline: initialBalance,
        tradingDay: utcDay(now),
        openPositions: 0
      },
      riskState: "normal",
      positions: new Map(),
      reservations: new Map(),
      closedTrades: [],
      tradeStats: { count: 0, wins: 0, totalPnl: 0 }
    };
  }

  /**
   * The only way to change the ledger. Callbacks run strictly one after another even when
   * they await, so a check and the mutation it guards can never interleave with another caller.
   */
  transact<T>(fn: (data: LedgerData) => T | Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const result = await fn(this.data);
      this.data.account.openPositions = this.data.positions.size;
      return result;
    });
    // The chain only orders callers; each caller still sees its own rejection via `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  view(now = Date.now()): AccountView {
    const positions = [...this.data.positions.values()].map((p) => ({ ...p }));
    return {
      account: { ...this.data.account },
      riskState: this.data.riskState,
      positions,
      reservedCapital: sum([...this.data.reservations.values()].map((r) => r.size)),
      pendingEntries: this.data.reservations.size,
      closedTrades: [...this.data.closedTrades],
      tradeStats: { ...this.data.tradeStats },
      updatedAt: now
    };
  }

  get riskState(): RiskState {
    return this.data.riskState;
  }

  hasExposure(instrument: string): boolean {
    for (const p of this.data.positions.values()) {
      if (p.instrument === instrument) return true;
    }
    for (const r of this.data.reservations.values()) {
      if (r.instrument === instrument) return true;
    }
    return false;
  }
}
