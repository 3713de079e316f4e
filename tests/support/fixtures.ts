import type { RiskManager } from "../../src/modules/riskManager";
import type { Direction, Opportunity } from "../../src/types/market";
import type { ClosedTrade, Position } from "../../src/types/portfolio";
import type { RiskLimits } from "../../src/types/risk";
import { instrument } from "./fakeGateway";

export const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);
export const DAY_MS = 24 * 60 * 60 * 1000;

export const LIMITS: RiskLimits = {
  maxConcurrentTrades: 8,
  dailyLossLimit: 0.1,
  maxDrawdownLimit: 0.2,
  circuitBreakerLimit: 0.15,
  minPositionSize: 5,
  maxPositionSize: 15,
  scalpTakeProfit: 0.015,
  scalpStopLoss: 0.01,
  maxHoldTimeSec: 300
};

export function opportunity(
  id: string,
  confidence: number,
  overrides: Partial<Omit<Opportunity, "instrument">> & { minSize?: number; tier?: number } = {}
): Opportunity {
  const { minSize, tier, ...rest } = overrides;
  return {
    instrument: instrument(id, tier ?? 1, minSize ?? 5),
    direction: "long",
    score: 1,
    confidence,
    entryPrice: 100,
    ts: NOW,
    ...rest
  };
}

export function position(id: string, overrides: Partial<Position> = {}): Position {
  return {
    id,
    clientOrderId: `${id}:${NOW}`,
    instrument: id.toUpperCase(),
    direction: "long",
    entryPrice: 100,
    size: 10,
    stopLoss: 99,
    takeProfit: 101.5,
    openedAt: NOW,
    status: "open",
    forceClose: false,
    ...overrides
  };
}

/** Admits and confirms a position at `entryPrice`; fails the test if admission is rejected. */
export async function openPosition(
  risk: RiskManager,
  id: string,
  confidence: number,
  entryPrice = 100,
  direction: Direction = "long"
): Promise<Position> {
  const decision = await risk.admit(opportunity(id, confidence, { direction }));
  if (decision.kind !== "approved") throw new Error(`${id} rejected: ${decision.reason}`);
  return risk.confirmOpen(
    decision.reservationId,
    position(`pos-${id}`, { instrument: id, entryPrice, direction, size: decision.size })
  );
}

export async function closeAt(risk: RiskManager, positionId: string, exitPrice: number): Promise<ClosedTrade> {
  await risk.beginClose(positionId);
  const trade = await risk.settleClose(positionId, { exitPrice, fee: 0, closedAt: NOW }, "manual");
  if (!trade) throw new Error(`${positionId} was not closing`);
  return trade;
}
