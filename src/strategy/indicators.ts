import type { Candle } from "../types/market";

export function ema(values: readonly number[], period: number): number {
  const first = values[0];
  if (first === undefined) return 0;
  const k = 2 / (period + 1);
  let acc = first;
  for (let i = 1; i < values.length; i++) {
    acc = (values[i] ?? acc) * k + acc * (1 - k);
  }
  return acc;
}

// 50 when there is not enough data.
export function rsi(values: readonly number[], period = 14): number {
  if (values.length <= period) return 50;
  let gains = 0;
  let losses = 0;
  for (let i = values.length - period; i < values.length; i++) {
    const delta = (values[i] ?? 0) - (values[i - 1] ?? 0);
    if (delta > 0) gains += delta;
    else losses -= delta;
  }
  if (losses === 0) return gains === 0 ? 50 : 100;
  const rs = gains / losses;
  return 100 - 100 / (1 + rs);
}

export function atr(candles: readonly Candle[], period = 14): number {
  if (candles.length < 2) return 0;
  const start = Math.max(1, candles.length - period);
  let total = 0;
  let n = 0;
  for (let i = start; i < candles.length; i++) {
    const cur = candles[i];
    const prev = candles[i - 1];
    if (!cur || !prev) continue;
    total += Math.max(cur.high - cur.low, Math.abs(cur.high - prev.close), Math.abs(cur.low - prev.close));
    n += 1;
  }
  return n === 0 ? 0 : total / n;
}

export function momentum(values: readonly number[], lookback = 5): number {
  const last = values[values.length - 1];
  const base = values[values.length - lookback];
  if (last === undefined || base === undefined || base === 0) return 0;
  return (last - base) / base;
}
