import { BitgetRestClient } from "./bitget.rest.js";
import type { BitgetOrderPlaceRequest } from "./bitget.types.js";

export class BitgetTradeApi {
  constructor(private readonly rest: BitgetRestClient) {}

  // Sent once: a market order that timed out may already be filled.
  placeOrder(payload: BitgetOrderPlaceRequest): Promise<{ orderId?: string }> {
    return this.rest.requestPrivate({
      method: "POST",
      endpoint: "/api/v2/mix/order/place-order",
      body: payload,
      retry: false
    });
  }
}
