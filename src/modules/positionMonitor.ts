import type { MarketGateway } from "../gateway/marketGateway";
import type { TypedEventBus } from "../types/module";
import type { CloseConfirmation } from "../types/order";
import type { ExitReason, Position } from "../types/portfolio";
import { RejectedByVenueError, errorKind, errorMessage } from "../utils/errors";
import { rootCause, withRetry, type RetryOptions } from "../utils/retry";
import { realizedPnl, type RiskManager } from "./riskManager";

interface MonitorConfig {
  maxHoldTimeSec: number;
  retry: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
}

// Priority: forced, stop-loss, take-profit, then the optional time stop.
export function exitReason(
  position: Position,
  price: number,
  now: number,
  maxHoldMs: number,
  halted: boolean
): ExitReason | undefined {
  if (halted || position.forceClose) return "forced";

  if (position.direction === "long") {
    if (price <= position.stopLoss) return "stop-loss";
    if (price >= position.takeProfit) return "take-profit";
  } else {
    if (price >= position.stopLoss) return "stop-loss";
    if (price <= position.takeProfit) return "take-profit";
  }

  if (maxHoldMs > 0 && now - position.openedAt >= maxHoldMs) return "time-stop";
  return undefined;
}

export class PositionMonitor {
  private readonly closing = new Map<string, Promise<void>>();
  private readonly reasons = new Map<string, ExitReason>();
  private readonly marks = new Map<string, number>();

  constructor(
    private readonly bus: TypedEventBus,
    private readonly gateway: MarketGateway,
    private readonly risk: RiskManager,
    private readonly config: MonitorConfig,
    private readonly clock: () => number = Date.now
  ) {}

  get closesInFlight(): number {
    return this.closing.size;
  }

  async poll(): Promise<void> {
    const view = this.risk.view();
    const halted = view.riskState === "halted";
    await Promise.all(
      view.positions.map((position) => {
        const inFlight = this.closing.get(position.id);
        if (inFlight) return inFlight;
        if (position.status === "closing") {
          return this.close(position, this.reasons.get(position.id) ?? "forced");
        }
        return this.check(position, halted);
      })
    );
  }

  async closeOne(positionId: string, reason: ExitReason): Promise<boolean> {
    const position = this.risk.view().positions.find((p) => p.id === positionId);
    if (!position) return false;
    await this.close(position, reason);
    return !this.risk.view().positions.some((p) => p.id === positionId);
  }

  async closeAll(reason: ExitReason): Promise<boolean> {
    const rounds = Math.max(1, this.config.retry.attempts);
    for (let round = 0; round < rounds; round++) {
      const remaining = this.risk.view().positions;
      if (remaining.length === 0) return true;
      await Promise.all(remaining.map((p) => this.close(p, this.reasons.get(p.id) ?? reason)));
    }
    const left = this.risk.view().positions.length;
    if (left > 0) this.bus.log("ERROR", `${left} position(s) still open after close-all`);
    return left === 0;
  }

  private async check(position: Position, halted: boolean): Promise<void> {
    if (halted || position.forceClose) {
      await this.close(position, "forced");
      return;
    }

    let price: number;
    try {
      const data = await this.gateway.getMarketData(position.instrument);
      price = data.price;
    } catch (error) {
      this.bus.log("WARN", `No price for ${position.instrument} (${errorKind(error)}); will retry`);
      return;
    }

    const now = this.clock();
    this.marks.set(position.id, price);
    this.bus.emit("position.marked", {
      positionId: position.id,
      instrument: position.instrument,
      price,
      unrealizedPnl: realizedPnl(position, price, 0),
      ts: now
    });

    const reason = exitReason(position, price, now, this.config.maxHoldTimeSec * 1000, false);
    if (reason) await this.close(position, reason);
  }

  private close(position: Position, reason: ExitReason): Promise<void> {
    const existing = this.closing.get(position.id);
    if (existing) return existing;
    const run = this.runClose(position, reason).finally(() => this.closing.delete(position.id));
    this.closing.set(position.id, run);
    return run;
  }

  private async runClose(position: Position, reason: ExitReason): Promise<void> {
    if (position.status === "open") {
      const closing = await this.risk.beginClose(position.id);
      if (!closing) return;
    }
    this.reasons.set(position.id, reason);

    let confirmation: CloseConfirmation;
    try {
      const { value } = await withRetry(() => this.gateway.closePosition(position.id), this.config.retry);
      confirmation = value;
    } catch (error) {
      const cause = rootCause(error);
      if (cause instanceof RejectedByVenueError && cause.kind === "AlreadyClosed") {
        confirmation = {
          positionId: position.id,
          exitPrice: this.marks.get(position.id) ?? position.entryPrice,
          fee: 0,
          closedAt: this.clock()
        };
        this.bus.log("WARN", `${position.instrument} ${position.id} was already closed at the venue`);
      } else {
        this.bus.log(
          "WARN",
          `Close of ${position.instrument} ${position.id} failed (${errorKind(cause)} ${errorMessage(cause)}); will retry`
        );
        return;
      }
    }

    const trade = await this.risk.settleClose(position.id, confirmation, reason);
    this.reasons.delete(position.id);
    this.marks.delete(position.id);
    if (trade) {
      this.bus.log(
        trade.pnl >= 0 ? "INFO" : "WARN",
        `Closed ${position.instrument} (${reason}) PnL ${trade.pnl.toFixed(2)}`
      );
    }
  }
}
