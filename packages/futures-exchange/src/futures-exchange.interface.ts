import type {
  AccountState,
  FuturesSymbol,
  MarginMode,
  OrderSide,
  PositionSizes
} from "@sigtrader/futures-core";

export type PlaceOrderRequest = {
  symbol: FuturesSymbol;
  side: OrderSide;
  qty: number;
  reduceOnly?: boolean;
  marginMode?: MarginMode;
};

/**
 * Venue seen by the trading core. Implementations throw on failure; the
 * market-data cache and the execution engine turn those throws into
 * sentinel snapshots and failed outcomes.
 */
export interface FuturesExchange {
  getAccountState(): Promise<AccountState>;
  getTickerPrice(symbol: FuturesSymbol): Promise<number>;
  getPositionSizes(symbol: FuturesSymbol): Promise<PositionSizes>;
  setLeverage(symbol: FuturesSymbol, leverage: number, marginMode: MarginMode): Promise<void>;
  placeOrder(req: PlaceOrderRequest): Promise<{ orderId: string }>;
  getServerTime(): Promise<number>;
}
