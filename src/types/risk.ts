export type RiskState = "normal" | "day-limit" | "halted";

export type RejectionReason =
  | "ConcurrencyCapReached"
  | "DailyLimitReached"
  | "CircuitBreakerHalted"
  | "SizeBelowMinimum";

export type AdmissionDecision =
  | { kind: "approved"; size: number; reservationId: string }
  | { kind: "rejected"; reason: RejectionReason };

export interface RiskLimits {
  readonly maxConcurrentTrades: number;
  readonly dailyLossLimit: number;
  readonly maxDrawdownLimit: number;
  readonly circuitBreakerLimit: number;
  readonly minPositionSize: number;
  readonly maxPositionSize: number;
  readonly scalpTakeProfit: number;
  readonly scalpStopLoss: number;
  readonly maxHoldTimeSec: number;
}

export interface RiskDecisionEvent {
  instrument: string;
  score: number;
  decision: AdmissionDecision;
  ts: number;
}

export interface RiskStateEvent {
  from: RiskState;
  to: RiskState;
  reason: string;
  ts: number;
}
