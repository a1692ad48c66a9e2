import type {
  AccountState,
  MarginMode,
  OrderSide,
  PositionSizes
} from "@sigtrader/futures-core";
import { enforceLeverageBounds } from "@sigtrader/futures-core";
import type { FuturesExchange, PlaceOrderRequest } from "../futures-exchange.interface.js";
import {
  BITGET_DEFAULT_MARGIN_COIN,
  BITGET_DEFAULT_PRODUCT_TYPE,
  type BitgetPositionMode,
  type BitgetProductType
} from "./bitget.constants.js";
import { BitgetAccountApi } from "./bitget.account.api.js";
import { BitgetApiError, BitgetInvalidParamsError } from "./bitget.errors.js";
import { BitgetMarketApi } from "./bitget.market.api.js";
import { BitgetPositionApi } from "./bitget.position.api.js";
import { BitgetRestClient } from "./bitget.rest.js";
import { BitgetTradeApi } from "./bitget.trade.api.js";
import type { BitgetAdapterConfig, BitgetPositionRaw } from "./bitget.types.js";

function toNumber(value: unknown): number | null {
  if (value === undefined || value === null || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function mapMarginMode(mode: MarginMode): "isolated" | "crossed" {
  return mode === "isolated" ? "isolated" : "crossed";
}

function isMarginModeLockedError(error: unknown): boolean {
  const text = String(error ?? "").toLowerCase();
  return (
    text.includes("margin mode cannot be adjusted") ||
    text.includes("currently holding positions or orders")
  );
}

function normalizeSymbol(symbol: string): string {
  return symbol.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
}

function oppositeSide(side: OrderSide): OrderSide {
  return side === "buy" ? "sell" : "buy";
}

export function summarizePositionSizes(rows: BitgetPositionRaw[], symbol: string): PositionSizes {
  const target = normalizeSymbol(symbol);
  let longSize = 0;
  let shortSize = 0;

  for (const row of rows) {
    if (normalizeSymbol(String(row.symbol ?? "")) !== target) continue;
    const total = Math.abs(toNumber(row.total) ?? 0);
    const holdSide = String(row.holdSide ?? "").toLowerCase();
    if (holdSide === "long") longSize += total;
    else if (holdSide === "short") shortSize += total;
  }

  return { longSize, shortSize };
}

export class BitgetFuturesAdapter implements FuturesExchange {
  readonly rest: BitgetRestClient;
  readonly marketApi: BitgetMarketApi;
  readonly accountApi: BitgetAccountApi;
  readonly positionApi: BitgetPositionApi;
  readonly tradeApi: BitgetTradeApi;

  readonly productType: BitgetProductType;
  readonly marginCoin: string;
  readonly positionMode: BitgetPositionMode;

  constructor(config: BitgetAdapterConfig = {}) {
    this.productType = config.productType ?? BITGET_DEFAULT_PRODUCT_TYPE;
    this.marginCoin = config.marginCoin ?? BITGET_DEFAULT_MARGIN_COIN;
    this.positionMode = config.positionMode ?? "one-way";

    this.rest = new BitgetRestClient(config);
    this.marketApi = new BitgetMarketApi(this.rest);
    this.accountApi = new BitgetAccountApi(this.rest);
    this.positionApi = new BitgetPositionApi(this.rest);
    this.tradeApi = new BitgetTradeApi(this.rest);
  }

  async getAccountState(): Promise<AccountState> {
    const accounts = await this.accountApi.getAccounts(this.productType);
    const preferred =
      accounts.find((row) => String(row.marginCoin ?? "").toUpperCase() === this.marginCoin.toUpperCase()) ??
      null;

    return {
      equity: toNumber(preferred?.accountEquity) ?? 0,
      availableMargin: toNumber(preferred?.available) ?? undefined
    };
  }

  async getTickerPrice(symbol: string): Promise<number> {
    const rows = await this.marketApi.getTicker(normalizeSymbol(symbol), this.productType);
    const row = rows[0];
    const price = toNumber(row?.lastPr) ?? toNumber(row?.markPrice);
    if (price === null || price <= 0) {
      throw new BitgetApiError(`Bitget ticker for ${symbol} has no usable price`, {
        endpoint: "/api/v2/mix/market/ticker",
        method: "GET",
        responseBody: rows
      });
    }
    return price;
  }

  async getPositionSizes(symbol: string): Promise<PositionSizes> {
    const rows = await this.positionApi.getSinglePosition({
      symbol: normalizeSymbol(symbol),
      productType: this.productType,
      marginCoin: this.marginCoin
    });
    return summarizePositionSizes(rows, symbol);
  }

  async setLeverage(symbol: string, leverage: number, marginMode: MarginMode): Promise<void> {
    const exchangeSymbol = normalizeSymbol(symbol);
    enforceLeverageBounds(leverage, exchangeSymbol);

    try {
      await this.accountApi.setMarginMode({
        symbol: exchangeSymbol,
        marginMode: mapMarginMode(marginMode),
        marginCoin: this.marginCoin,
        productType: this.productType
      });
    } catch (error) {
      // Bitget rejects margin-mode changes while orders/positions are open.
      if (!isMarginModeLockedError(error)) throw error;
    }

    await this.accountApi.setLeverage({
      symbol: exchangeSymbol,
      leverage,
      marginCoin: this.marginCoin,
      productType: this.productType
    });
  }

  async placeOrder(req: PlaceOrderRequest): Promise<{ orderId: string }> {
    const hedge = this.positionMode === "hedge";
    const placed = await this.tradeApi.placeOrder({
      symbol: normalizeSymbol(req.symbol),
      productType: this.productType,
      marginCoin: this.marginCoin,
      marginMode: mapMarginMode(req.marginMode ?? "cross"),
      // hedge mode names the position side on close orders: buy+close closes a long
      side: hedge && req.reduceOnly ? oppositeSide(req.side) : req.side,
      tradeSide: hedge ? (req.reduceOnly ? "close" : "open") : undefined,
      orderType: "market",
      size: String(req.qty),
      reduceOnly: !hedge && req.reduceOnly ? "YES" : undefined
    });

    const orderId = placed.orderId?.trim();
    if (!orderId) {
      throw new BitgetInvalidParamsError("Bitget place-order did not return orderId", {
        endpoint: "/api/v2/mix/order/place-order",
        method: "POST",
        responseBody: placed
      });
    }

    return { orderId };
  }

  async getServerTime(): Promise<number> {
    const raw = await this.marketApi.getServerTime();
    const serverTime = toNumber(raw.serverTime);
    if (serverTime === null) {
      throw new BitgetApiError("Bitget server time missing", {
        endpoint: "/api/v2/public/time",
        method: "GET",
        responseBody: raw
      });
    }
    return serverTime;
  }
}
