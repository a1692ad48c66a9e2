export const BITGET_DEFAULT_REST_BASE_URL = "https://api.bitget.com";

export const BITGET_DEFAULT_PRODUCT_TYPE = "USDT-FUTURES";
export const BITGET_DEFAULT_MARGIN_COIN = "USDT";

export const BITGET_DEFAULT_TIMEOUT_MS = 10_000;
export const BITGET_DEFAULT_RETRY_ATTEMPTS = 3;
export const BITGET_DEFAULT_RETRY_BASE_DELAY_MS = 300;

export const BITGET_SUCCESS_CODE = "00000";

export const BITGET_PRODUCT_TYPES = [
  "USDT-FUTURES",
  "USDC-FUTURES",
  "COIN-FUTURES"
] as const;

export type BitgetProductType = (typeof BITGET_PRODUCT_TYPES)[number];

export const BITGET_POSITION_MODES = ["one-way", "hedge"] as const;

export type BitgetPositionMode = (typeof BITGET_POSITION_MODES)[number];
