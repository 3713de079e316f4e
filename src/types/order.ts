import type { Direction } from "./market";

export interface OrderRequest {
  clientOrderId: string;
  instrument: string;
  direction: Direction;
  size: number;
  stopLoss: number;
  takeProfit: number;
}

export interface OrderReceipt {
  orderId: string;
  clientOrderId: string;
  instrument: string;
  fillPrice: number;
  filledAt: number;
}

export interface CloseConfirmation {
  positionId: string;
  exitPrice: number;
  fee: number;
  closedAt: number;
}

export interface OrderFailedEvent {
  clientOrderId: string;
  instrument: string;
  kind: string;
  message: string;
  attempts: number;
  ts: number;
}
