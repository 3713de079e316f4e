export type Direction = "long" | "short";

export interface Instrument {
  readonly id: string;
  readonly minSize: number;
  readonly liquidityTier: number;
}

export interface Candle {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  ts: number;
}

export interface MarketData {
  instrument: string;
  price: number;
  bid: number;
  ask: number;
  candles: readonly Candle[];
  ts: number;
}

export interface Features {
  price: number;
  momentum: number;
  emaFast: number;
  emaSlow: number;
  rsi: number;
  volatility: number;
  spread: number;
}

export interface ScanResult {
  instrument: Instrument;
  features: Features;
}

export interface Opportunity {
  instrument: Instrument;
  direction: Direction;
  score: number;
  confidence: number;
  entryPrice: number;
  ts: number;
}
