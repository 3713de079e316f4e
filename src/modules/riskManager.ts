import { recordTrade, type AccountLedger, type LedgerData } from "../state/accountLedger";
import type { BalanceReconciledEvent } from "../types/events";
import type { Opportunity } from "../types/market";
import type { TypedEventBus } from "../types/module";
import type { AccountView, ClosedTrade, ExitReason, Position } from "../types/portfolio";
import type { AdmissionDecision, RejectionReason, RiskLimits, RiskState } from "../types/risk";
import { newId, utcDay } from "../utils/ids";
import { clamp, sum } from "../utils/math";

export interface SettleInput {
  exitPrice: number;
  fee: number;
  closedAt: number;
}

function floorCents(value: number): number {
  return Math.floor(value * 100 + 1e-9) / 100;
}

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

// A loss never exceeds the position's size.
export function realizedPnl(position: Position, exitPrice: number, fee: number): number {
  const move = (exitPrice - position.entryPrice) / position.entryPrice;
  const gross = position.size * (position.direction === "long" ? move : -move);
  return Math.max(-position.size, gross - fee);
}

/**
 * Owns the normal / day-limit / halted state machine. `halted` is a latch: only
 * {@link resetCircuitBreaker} leaves it, never a day roll or a recovered balance.
 */
export class RiskManager {
  constructor(
    private readonly bus: TypedEventBus,
    private readonly ledger: AccountLedger,
    private readonly limits: RiskLimits,
    private readonly clock: () => number = Date.now
  ) {}

  get state(): RiskState {
    return this.ledger.riskState;
  }

  view(): AccountView {
    return this.ledger.view(this.clock());
  }

  hasExposure(instrument: string): boolean {
    return this.ledger.hasExposure(instrument);
  }

  async seed(balance: number): Promise<void> {
    await this.ledger.transact((d) => {
      d.account.balance = balance;
      d.account.peakBalance = balance;
      d.account.dayStartBalance = balance;
      d.account.breakerBaseline = balance;
      d.account.dailyPnl = 0;
      d.account.tradingDay = utcDay(this.clock());
    });
    this.publish();
  }

  async admit(opportunity: Opportunity): Promise<AdmissionDecision> {
    const decision = await this.ledger.transact((d): AdmissionDecision => {
      const reject = (reason: RejectionReason): AdmissionDecision => ({ kind: "rejected", reason });

      if (d.riskState === "halted") return reject("CircuitBreakerHalted");
      if (d.riskState === "day-limit") return reject("DailyLimitReached");

      const occupied = d.positions.size + d.reservations.size;
      if (occupied >= this.limits.maxConcurrentTrades) return reject("ConcurrencyCapReached");

      const committed =
        sum([...d.positions.values()].map((p) => p.size)) + sum([...d.reservations.values()].map((r) => r.size));
      const free = d.account.balance - committed;
      const target = clamp(
        opportunity.confidence * this.limits.maxPositionSize,
        this.limits.minPositionSize,
        this.limits.maxPositionSize
      );
      const size = floorCents(Math.min(target, free));
      if (size < Math.max(this.limits.minPositionSize, opportunity.instrument.minSize)) {
        return reject("SizeBelowMinimum");
      }

      const reservationId = newId("rsv");
      d.reservations.set(reservationId, {
        id: reservationId,
        instrument: opportunity.instrument.id,
        size,
        createdAt: this.clock()
      });
      return { kind: "approved", size, reservationId };
    });

    this.bus.emit("risk.decision", {
      instrument: opportunity.instrument.id,
      score: opportunity.score,
      decision,
      ts: this.clock()
    });
    return decision;
  }

  async releaseReservation(reservationId: string): Promise<void> {
    await this.ledger.transact((d) => {
      d.reservations.delete(reservationId);
    });
    this.publish();
  }

  // A fill that lands after a halt is registered already flagged for forced close.
  async confirmOpen(reservationId: string, position: Position): Promise<Position> {
    const opened = await this.ledger.transact((d) => {
      const reservation = d.reservations.get(reservationId);
      if (!reservation) {
        throw new Error(`Unknown reservation ${reservationId}`);
      }
      d.reservations.delete(reservationId);
      const registered: Position = {
        ...position,
        size: reservation.size,
        status: "open",
        forceClose: d.riskState === "halted"
      };
      d.positions.set(registered.id, registered);
      return { ...registered };
    });

    this.bus.emit("position.opened", opened);
    this.publish();
    return opened;
  }

  async beginClose(positionId: string): Promise<Position | undefined> {
    const closing = await this.ledger.transact((d) => {
      const position = d.positions.get(positionId);
      if (!position || position.status !== "open") return undefined;
      position.status = "closing";
      return { ...position };
    });
    if (closing) this.bus.emit("position.closing", closing);
    return closing;
  }

  async settleClose(positionId: string, fill: SettleInput, reason: ExitReason): Promise<ClosedTrade | undefined> {
    const trade = await this.ledger.transact((d) => {
      const position = d.positions.get(positionId);
      if (!position || position.status !== "closing") return undefined;

      const pnl = realizedPnl(position, fill.exitPrice, fill.fee);
      position.status = "closed";
      d.positions.delete(positionId);

      const account = d.account;
      account.balance = Math.max(0, account.balance + pnl);
      account.peakBalance = Math.max(account.peakBalance, account.balance);
      account.dailyPnl += pnl;

      const closed: ClosedTrade = {
        position: { ...position },
        exitPrice: fill.exitPrice,
        pnl,
        fee: fill.fee,
        reason,
        closedAt: fill.closedAt
      };
      recordTrade(d, closed);
      this.evaluate(d);
      return closed;
    });

    if (trade) {
      this.bus.emit("position.closed", trade);
      this.publish();
    }
    return trade;
  }

  // Skipped while a close is pending or once a trade settles after the read: the venue may already hold that PnL.
  async reconcileBalance(
    venueBalance: number,
    tolerance: number,
    settledCount: number
  ): Promise<BalanceReconciledEvent | undefined> {
    const result = await this.ledger.transact((d): BalanceReconciledEvent | undefined => {
      if (d.tradeStats.count !== settledCount) return undefined;
      for (const p of d.positions.values()) {
        if (p.status === "closing") return undefined;
      }

      const ledgerBalance = d.account.balance;
      const drift = venueBalance - ledgerBalance;
      const adjusted = Math.abs(drift) > tolerance;
      if (adjusted) {
        d.account.balance = venueBalance;
        d.account.peakBalance = Math.max(d.account.peakBalance, venueBalance);
        this.evaluate(d);
      }
      return { ledgerBalance, venueBalance, drift, adjusted, ts: this.clock() };
    });
    if (!result) return undefined;

    this.bus.emit("balance.reconciled", result);
    if (result.adjusted) {
      this.bus.log(
        "WARN",
        `Venue balance ${venueBalance.toFixed(2)} differs from ledger ${result.ledgerBalance.toFixed(2)} ` +
          `by ${result.drift.toFixed(2)}; using the venue balance`
      );
      this.publish();
    }
    return result;
  }

  async rollDay(now: number): Promise<boolean> {
    const rolled = await this.ledger.transact((d) => {
      const day = utcDay(now);
      if (day === d.account.tradingDay) return false;
      d.account.tradingDay = day;
      d.account.dayStartBalance = d.account.balance;
      d.account.dailyPnl = 0;
      if (d.riskState === "day-limit") this.transition(d, "normal", `trading day ${day} started`);
      return true;
    });
    if (rolled) {
      this.bus.log("INFO", "Daily risk counters reset");
      this.publish();
    }
    return rolled;
  }

  async resetCircuitBreaker(): Promise<boolean> {
    const reset = await this.ledger.transact((d) => {
      if (d.riskState !== "halted") return false;
      d.account.peakBalance = d.account.balance;
      d.account.breakerBaseline = d.account.balance;
      this.transition(d, "normal", "circuit breaker reset by operator");
      this.evaluate(d);
      return true;
    });
    if (reset) this.publish();
    return reset;
  }

  private evaluate(d: LedgerData): void {
    if (d.riskState === "halted") return;
    const { balance, peakBalance, breakerBaseline, dailyPnl, dayStartBalance } = d.account;

    const drawdown = peakBalance > 0 ? (peakBalance - balance) / peakBalance : 0;
    if (drawdown >= this.limits.maxDrawdownLimit) {
      this.halt(d, `max drawdown ${pct(drawdown)} from peak ${peakBalance.toFixed(2)}`);
      return;
    }

    const breakerLoss = breakerBaseline > 0 ? (breakerBaseline - balance) / breakerBaseline : 0;
    if (breakerLoss >= this.limits.circuitBreakerLimit) {
      this.halt(d, `circuit breaker: ${pct(breakerLoss)} realized loss`);
      return;
    }

    if (d.riskState === "normal" && dailyPnl <= -this.limits.dailyLossLimit * dayStartBalance) {
      this.transition(d, "day-limit", `daily loss ${dailyPnl.toFixed(2)} reached limit`);
    }
  }

  private halt(d: LedgerData, reason: string): void {
    this.transition(d, "halted", reason);
    for (const position of d.positions.values()) {
      position.forceClose = true;
    }
  }

  private transition(d: LedgerData, to: RiskState, reason: string): void {
    const from = d.riskState;
    if (from === to) return;
    d.riskState = to;
    this.bus.emit("risk.state", { from, to, reason, ts: this.clock() });
    this.bus.log(to === "halted" ? "ERROR" : "WARN", `Risk state ${from} -> ${to}: ${reason}`);
  }

  private publish(): void {
    this.bus.emit("account.updated", this.view());
  }
}
