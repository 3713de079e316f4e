import type { Features, Instrument, Opportunity } from "../types/market";
import { clamp, round } from "../utils/math";

const TREND_WEIGHT = 0.3;
const PUSH_WEIGHT = 0.3;
const PUSH_THRESHOLD = 0.01;
const STRETCH_WEIGHT = 0.2;
const MAX_RAW = TREND_WEIGHT + PUSH_WEIGHT + STRETCH_WEIGHT;
const SPREAD_CEILING = 0.005;
const SPREAD_PENALTY = 0.25;
const VOLATILITY_CAP = 0.05;
const VOLATILITY_BOOST = 10;

function sign(value: number): number {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

export function rawSignal(features: Features): number {
  const trend = sign(features.emaFast - features.emaSlow) * TREND_WEIGHT;
  const push = Math.abs(features.momentum) > PUSH_THRESHOLD ? sign(features.momentum) * PUSH_WEIGHT : 0;

  let stretch: number;
  if (features.rsi >= 70) stretch = -STRETCH_WEIGHT;
  else if (features.rsi <= 30) stretch = STRETCH_WEIGHT;
  else stretch = sign(trend) * STRETCH_WEIGHT;

  return clamp(trend + push + stretch, -1, 1);
}

export function scoreFeatures(instrument: Instrument, features: Features, ts: number): Opportunity | undefined {
  const raw = round(rawSignal(features), 6);
  if (raw === 0) return undefined;

  const strength = Math.abs(raw);
  const spreadPenalty = Math.min(1, features.spread / SPREAD_CEILING) * SPREAD_PENALTY;
  const confidence = clamp(strength / MAX_RAW - spreadPenalty, 0, 1);
  const score = strength * (1 + Math.min(features.volatility, VOLATILITY_CAP) * VOLATILITY_BOOST);

  return {
    instrument,
    direction: raw > 0 ? "long" : "short",
    score: round(score, 6),
    confidence: round(confidence, 6),
    entryPrice: features.price,
    ts
  };
}

// Total order: score desc, then liquidity tier desc, then instrument id asc.
export function compareOpportunities(a: Opportunity, b: Opportunity): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.instrument.liquidityTier !== b.instrument.liquidityTier) {
    return b.instrument.liquidityTier - a.instrument.liquidityTier;
  }
  if (a.instrument.id < b.instrument.id) return -1;
  if (a.instrument.id > b.instrument.id) return 1;
  return 0;
}

export function rankOpportunities(opportunities: readonly Opportunity[], minConfidence: number): Opportunity[] {
  return opportunities.filter((opp) => opp.confidence >= minConfidence).sort(compareOpportunities);
}
