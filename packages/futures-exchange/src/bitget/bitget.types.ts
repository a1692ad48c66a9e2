import type { BitgetPositionMode, BitgetProductType } from "./bitget.constants.js";

export type HttpMethod = "GET" | "POST";

export type BitgetApiResponse<T> = {
  code?: string;
  msg?: string;
  requestTime?: number;
  data: T;
};

export type BitgetLogEntry = {
  at: string;
  endpoint: string;
  method: HttpMethod;
  durationMs: number;
  attempt: number;
  status?: number;
  code?: string;
  ok: boolean;
  message?: string;
  requestId?: string;
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type BitgetAdapterConfig = {
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
  restBaseUrl?: string;
  timeoutMs?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  productType?: BitgetProductType;
  marginCoin?: string;
  positionMode?: BitgetPositionMode;
  log?: (entry: BitgetLogEntry) => void;
  fetch?: FetchLike;
};

export type BitgetAccountRaw = {
  marginCoin?: string;
  available?: string;
  accountEquity?: string;
};

export type BitgetTickerRaw = {
  symbol?: string;
  lastPr?: string;
  markPrice?: string;
};

export type BitgetPositionRaw = {
  symbol?: string;
  holdSide?: string;
  total?: string;
};

export type BitgetOrderPlaceRequest = {
  symbol: string;
  productType: BitgetProductType;
  marginMode: "isolated" | "crossed";
  marginCoin: string;
  size: string;
  side: "buy" | "sell";
  tradeSide?: "open" | "close";
  orderType: "market";
  reduceOnly?: "YES" | "NO";
};

export type BitgetServerTimeRaw = {
  serverTime?: string;
};
