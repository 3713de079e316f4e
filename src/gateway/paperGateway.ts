import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Candle, Direction, Instrument, MarketData } from "../types/market";
import type { CloseConfirmation, OrderReceipt, OrderRequest } from "../types/order";
import { RejectedByVenueError } from "../utils/errors";
import { newId } from "../utils/ids";
import { sleep } from "../utils/retry";
import type { MarketGateway } from "./marketGateway";

const seedSchema = z.array(
  z.object({
    id: z.string().min(1),
    minSize: z.number().positive(),
    liquidityTier: z.number().int().nonnegative(),
    basePrice: z.number().positive()
  })
);

export type PaperInstrumentSeed = z.infer<typeof seedSchema>[number];

export function loadPaperInstruments(): PaperInstrumentSeed[] {
  const raw = readFileSync(new URL("./paperInstruments.json", import.meta.url), "utf8");
  return seedSchema.parse(JSON.parse(raw));
}

export interface PaperGatewayConfig {
  instruments: readonly PaperInstrumentSeed[];
  initialBalance: number;
  takerFee: number;
  latencyMs: number;
  historyLength?: number;
  candleMs?: number;
  random?: () => number;
}

interface PaperPosition {
  id: string;
  instrument: string;
  direction: Direction;
  size: number;
  entryPrice: number;
  open: boolean;
}

export class PaperGateway implements MarketGateway {
  private readonly instruments = new Map<string, Instrument>();
  private readonly history = new Map<string, Candle[]>();
  private readonly receipts = new Map<string, OrderReceipt>();
  private readonly pending = new Map<string, Promise<OrderReceipt>>();
  private readonly positions = new Map<string, PaperPosition>();
  private readonly random: () => number;
  private readonly historyLength: number;
  private readonly candleMs: number;
  private balance: number;

  constructor(private readonly config: PaperGatewayConfig) {
    this.random = config.random ?? Math.random;
    this.historyLength = config.historyLength ?? 60;
    this.candleMs = config.candleMs ?? 60_000;
    this.balance = config.initialBalance;

    const start = Date.now() - this.historyLength * this.candleMs;
    for (const seed of config.instruments) {
      this.instruments.set(
        seed.id,
        Object.freeze({ id: seed.id, minSize: seed.minSize, liquidityTier: seed.liquidityTier })
      );
      const candles: Candle[] = [];
      let close = seed.basePrice;
      for (let i = 0; i < this.historyLength; i++) {
        const candle = this.nextCandle(close, start + i * this.candleMs);
        candles.push(candle);
        close = candle.close;
      }
      this.history.set(seed.id, candles);
    }
  }

  async listInstruments(): Promise<Instrument[]> {
    return [...this.instruments.values()];
  }

  async getMarketData(instrumentId: string): Promise<MarketData> {
    const candles = this.history.get(instrumentId);
    const last = candles?.[candles.length - 1];
    if (!candles || !last) {
      throw new RejectedByVenueError("NotFound", `Unknown instrument ${instrumentId}`);
    }

    const next = this.nextCandle(last.close, Date.now());
    candles.push(next);
    if (candles.length > this.historyLength) candles.shift();

    const spread = Math.max(next.close * 0.0002, 1e-8);
    return {
      instrument: instrumentId,
      price: next.close,
      bid: next.close - spread / 2,
      ask: next.close + spread / 2,
      candles: [...candles],
      ts: next.ts
    };
  }

  async placeOrder(request: OrderRequest): Promise<OrderReceipt> {
    const existing = this.receipts.get(request.clientOrderId) ?? this.pending.get(request.clientOrderId);
    if (existing) return existing;

    const fill = this.fill(request).finally(() => this.pending.delete(request.clientOrderId));
    this.pending.set(request.clientOrderId, fill);
    return fill;
  }

  private async fill(request: OrderRequest): Promise<OrderReceipt> {
    const instrument = this.instruments.get(request.instrument);
    if (!instrument) {
      throw new RejectedByVenueError("NotFound", `Unknown instrument ${request.instrument}`);
    }
    if (request.size < instrument.minSize) {
      throw new RejectedByVenueError("Rejected", `Size ${request.size} below venue minimum ${instrument.minSize}`);
    }
    if (request.size > this.freeBalance()) {
      throw new RejectedByVenueError("InsufficientFunds", `Size ${request.size} exceeds free balance`);
    }

    await sleep(this.config.latencyMs);

    const mark = this.markPrice(request.instrument);
    const slip = (this.random() - 0.5) * 0.0006;
    const fillPrice = mark * (1 + slip);
    const receipt: OrderReceipt = {
      orderId: newId("pos"),
      clientOrderId: request.clientOrderId,
      instrument: request.instrument,
      fillPrice,
      filledAt: Date.now()
    };

    this.receipts.set(request.clientOrderId, receipt);
    this.positions.set(receipt.orderId, {
      id: receipt.orderId,
      instrument: request.instrument,
      direction: request.direction,
      size: request.size,
      entryPrice: fillPrice,
      open: true
    });
    return receipt;
  }

  async closePosition(positionId: string): Promise<CloseConfirmation> {
    const position = this.positions.get(positionId);
    if (!position || !position.open) {
      throw new RejectedByVenueError("AlreadyClosed", `Position ${positionId} is not open`);
    }

    await sleep(this.config.latencyMs);

    const exitPrice = this.markPrice(position.instrument);
    const move = (exitPrice - position.entryPrice) / position.entryPrice;
    const gross = position.size * (position.direction === "long" ? move : -move);
    const fee = position.size * this.config.takerFee * 2;

    position.open = false;
    this.balance = Math.max(0, this.balance + Math.max(gross, -position.size) - fee);

    return { positionId, exitPrice, fee, closedAt: Date.now() };
  }

  async getBalance(): Promise<number> {
    return this.balance;
  }

  private freeBalance(): number {
    let committed = 0;
    for (const p of this.positions.values()) {
      if (p.open) committed += p.size;
    }
    return this.balance - committed;
  }

  private markPrice(instrument: string): number {
    const candles = this.history.get(instrument);
    return candles?.[candles.length - 1]?.close ?? 0;
  }

  private nextCandle(prevClose: number, ts: number): Candle {
    const drift = (this.random() - 0.5) * prevClose * 0.006;
    const spike = this.random() > 0.97 ? (this.random() - 0.5) * prevClose * 0.03 : 0;
    const close = Math.max(prevClose * 0.5, prevClose + drift + spike);
    const wick = Math.abs(close - prevClose) * this.random() + prevClose * 0.0005;
    return {
      open: prevClose,
      high: Math.max(prevClose, close) + wick,
      low: Math.max(1e-8, Math.min(prevClose, close) - wick),
      close,
      volume: 1000 + this.random() * 50_000,
      ts
    };
  }
}
