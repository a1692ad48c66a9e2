import { BITGET_DEFAULT_PRODUCT_TYPE, type BitgetProductType } from "./bitget.constants.js";
import { BitgetRestClient } from "./bitget.rest.js";
import type { BitgetServerTimeRaw, BitgetTickerRaw } from "./bitget.types.js";

export class BitgetMarketApi {
  constructor(private readonly rest: BitgetRestClient) {}

  getTicker(symbol: string, productType: BitgetProductType = BITGET_DEFAULT_PRODUCT_TYPE): Promise<BitgetTickerRaw[]> {
    return this.rest.requestPublic("GET", "/api/v2/mix/market/ticker", {
      symbol,
      productType
    });
  }

  getServerTime(): Promise<BitgetServerTimeRaw> {
    return this.rest.requestPublic("GET", "/api/v2/public/time");
  }
}
