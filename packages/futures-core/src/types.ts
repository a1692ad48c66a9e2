export type MarginMode = "isolated" | "cross";
export type PositionSide = "long" | "short";
export type Stance = PositionSide | "flat";
export type OrderSide = "buy" | "sell";

export type FuturesSymbol = string;

export type AccountState = {
  equity: number;
  availableMargin?: number;
};

export type PositionSizes = {
  longSize: number;
  shortSize: number;
};

// price <= 0 marks a snapshot that must not be acted upon
export type MarketSnapshot = {
  readonly balance: number;
  readonly price: number;
  readonly longSize: number;
  readonly shortSize: number;
  readonly fetchedAt: number;
};

export type InboundSignal = {
  stance: Stance;
  prevStance: Stance | null;
  timeframe: string;
  canonical: string;
};
