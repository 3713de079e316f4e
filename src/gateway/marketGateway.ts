import type { Instrument, MarketData } from "../types/market";
import type { CloseConfirmation, OrderReceipt, OrderRequest } from "../types/order";

/**
 * What the trading core needs from a venue. Implementations signal failures with
 * {@link TransientGatewayError} (Timeout, RateLimited) or {@link RejectedByVenueError}
 * (Rejected, InsufficientFunds, NotFound, AlreadyClosed).
 *
 * `placeOrder` must treat `clientOrderId` as an idempotency key: resubmitting the same
 * key returns the original receipt instead of opening a second position.
 */
export interface MarketGateway {
  listInstruments(): Promise<Instrument[]>;
  getMarketData(instrumentId: string): Promise<MarketData>;
  placeOrder(request: OrderRequest): Promise<OrderReceipt>;
  closePosition(positionId: string): Promise<CloseConfirmation>;
  getBalance(): Promise<number>;
}
