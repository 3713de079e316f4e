import type { MarketGateway } from "../gateway/marketGateway";
import type { Direction, Opportunity } from "../types/market";
import type { TypedEventBus } from "../types/module";
import type { OrderReceipt, OrderRequest } from "../types/order";
import type { Position } from "../types/portfolio";
import { errorKind, errorMessage } from "../utils/errors";
import { RetryExhaustedError, rootCause, withRetry, type RetryOptions } from "../utils/retry";
import type { RiskManager } from "./riskManager";

interface ExecutionConfig {
  scalpTakeProfit: number;
  scalpStopLoss: number;
  retry: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
}

export interface Approval {
  size: number;
  reservationId: string;
}

export function exitLevels(
  direction: Direction,
  entryPrice: number,
  stopLossPct: number,
  takeProfitPct: number
): { stopLoss: number; takeProfit: number } {
  if (direction === "long") {
    return { stopLoss: entryPrice * (1 - stopLossPct), takeProfit: entryPrice * (1 + takeProfitPct) };
  }
  return { stopLoss: entryPrice * (1 + stopLossPct), takeProfit: entryPrice * (1 - takeProfitPct) };
}

export function clientOrderId(instrument: string, cycleTs: number): string {
  return `${instrument}:${cycleTs}`;
}

// Retries reuse the client order id, so a timed-out submission that filled is not opened twice.
export class ExecutionCoordinator {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly bus: TypedEventBus,
    private readonly gateway: MarketGateway,
    private readonly risk: RiskManager,
    private readonly config: ExecutionConfig
  ) {}

  isInFlight(instrument: string): boolean {
    return this.inFlight.has(instrument);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  async submit(opportunity: Opportunity, approval: Approval, cycleTs: number): Promise<Position | undefined> {
    const instrument = opportunity.instrument.id;
    if (this.inFlight.has(instrument)) {
      this.bus.log("WARN", `Order for ${instrument} already in flight; dropping duplicate`);
      await this.risk.releaseReservation(approval.reservationId);
      return undefined;
    }

    this.inFlight.add(instrument);
    try {
      const levels = exitLevels(
        opportunity.direction,
        opportunity.entryPrice,
        this.config.scalpStopLoss,
        this.config.scalpTakeProfit
      );
      const request: OrderRequest = {
        clientOrderId: clientOrderId(instrument, cycleTs),
        instrument,
        direction: opportunity.direction,
        size: approval.size,
        ...levels
      };

      const receipt = await this.place(request);
      if (!receipt) {
        await this.risk.releaseReservation(approval.reservationId);
        return undefined;
      }

      const position = await this.risk.confirmOpen(approval.reservationId, {
        id: receipt.orderId,
        clientOrderId: request.clientOrderId,
        instrument,
        direction: request.direction,
        entryPrice: receipt.fillPrice,
        size: request.size,
        stopLoss: request.stopLoss,
        takeProfit: request.takeProfit,
        openedAt: receipt.filledAt,
        status: "open",
        forceClose: false
      });
      this.bus.log(
        "INFO",
        `Opened ${position.direction} ${instrument} size ${position.size.toFixed(2)} @ ${position.entryPrice}`
      );
      return position;
    } finally {
      this.inFlight.delete(instrument);
    }
  }

  private async place(request: OrderRequest): Promise<OrderReceipt | undefined> {
    this.bus.emit("order.submitted", { ...request, ts: Date.now() });
    try {
      const { value } = await withRetry(() => this.gateway.placeOrder(request), {
        ...this.config.retry,
        onRetry: (error, attempt, delayMs) =>
          this.bus.log(
            "WARN",
            `Order ${request.clientOrderId} attempt ${attempt} failed (${errorKind(error)}); retrying in ${delayMs}ms`
          )
      });
      this.bus.emit("order.filled", value);
      return value;
    } catch (error) {
      const cause = rootCause(error);
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
      this.bus.emit("order.failed", {
        clientOrderId: request.clientOrderId,
        instrument: request.instrument,
        kind: errorKind(cause),
        message: errorMessage(cause),
        attempts,
        ts: Date.now()
      });
      this.bus.log(
        "WARN",
        `Order ${request.clientOrderId} dropped after ${attempts} attempt(s): ${errorKind(cause)} ${errorMessage(cause)}`
      );
      return undefined;
    }
  }
}
