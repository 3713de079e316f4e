import type { MarketGateway } from "../gateway/marketGateway";
import { atr, ema, momentum, rsi } from "../strategy/indicators";
import type { Features, Instrument, MarketData, ScanResult } from "../types/market";
import type { TypedEventBus } from "../types/module";
import { errorKind, errorMessage } from "../utils/errors";
import { rootCause, withRetry, type RetryOptions } from "../utils/retry";

interface ScannerConfig {
  minCandles: number;
  retry: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
}

export interface ScanStats {
  scanned: number;
  skipped: number;
}

export function deriveFeatures(data: MarketData): Features {
  const closes = data.candles.map((c) => c.close);
  const mid = (data.bid + data.ask) / 2;
  return {
    price: data.price,
    momentum: momentum(closes, 5),
    emaFast: ema(closes, 8),
    emaSlow: ema(closes, 21),
    rsi: rsi(closes, 14),
    volatility: data.price > 0 ? atr(data.candles, 14) / data.price : 0,
    spread: mid > 0 ? (data.ask - data.bid) / mid : 0
  };
}

export class Scanner {
  constructor(
    private readonly bus: TypedEventBus,
    private readonly gateway: MarketGateway,
    private readonly config: ScannerConfig
  ) {}

  async *scan(instruments: readonly Instrument[], stats?: ScanStats): AsyncGenerator<ScanResult> {
    for (const instrument of instruments) {
      const data = await this.fetch(instrument);
      if (!data) {
        if (stats) stats.skipped += 1;
        continue;
      }
      if (data.candles.length < this.config.minCandles) {
        this.bus.log("WARN", `Skipping ${instrument.id}: ${data.candles.length} candles`);
        if (stats) stats.skipped += 1;
        continue;
      }
      if (stats) stats.scanned += 1;
      yield { instrument, features: deriveFeatures(data) };
    }
  }

  private async fetch(instrument: Instrument): Promise<MarketData | undefined> {
    try {
      const { value } = await withRetry(() => this.gateway.getMarketData(instrument.id), this.config.retry);
      return value;
    } catch (error) {
      const cause = rootCause(error);
      this.bus.log("WARN", `Skipping ${instrument.id}: ${errorKind(cause)} ${errorMessage(cause)}`);
      return undefined;
    }
  }
}
