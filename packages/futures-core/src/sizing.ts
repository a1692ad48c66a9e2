import { LeverageOutOfRangeError, QtyOutOfRangeError } from "./errors.js";
import type { PositionSide } from "./types.js";

export type ValidationResult =
  | { ok: true }
  | { ok: false; error: Error };

export type OrderQuantityInput = {
  balance: number;
  price: number;
  positionSizeFraction: number;
  leverage: number;
  minOrderValue: number;
};

export type OrderQuantity = {
  qty: number;
  exposureUsd: number;
  reason: "ok" | "invalid_input" | "below_min_order_value";
};

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Whole-contract market order size for the capital share `positionSizeFraction`
 * of `balance`, levered by `leverage`. A quantity of 0 means "do not trade".
 */
export function computeOrderQuantity(input: OrderQuantityInput): OrderQuantity {
  if (
    !isPositiveFinite(input.balance) ||
    !isPositiveFinite(input.price) ||
    !isPositiveFinite(input.positionSizeFraction) ||
    !isPositiveFinite(input.leverage)
  ) {
    return { qty: 0, exposureUsd: 0, reason: "invalid_input" };
  }

  const exposureUsd = input.balance * input.positionSizeFraction * input.leverage;
  if (exposureUsd < input.minOrderValue) {
    return { qty: 0, exposureUsd, reason: "below_min_order_value" };
  }

  return {
    qty: Math.floor(exposureUsd / input.price),
    exposureUsd,
    reason: "ok"
  };
}

/**
 * Converts a capital-at-risk fraction into an absolute stop price:
 * with 4x leverage a 7% capital stop sits 1.75% away from entry.
 */
export function stopLossPriceFor(params: {
  side: PositionSide;
  entryPrice: number;
  stopLossPct: number;
  leverage: number;
}): number {
  const distance = params.stopLossPct / params.leverage;
  return params.side === "long"
    ? params.entryPrice * (1 - distance)
    : params.entryPrice * (1 + distance);
}

// Unleveraged profit fraction of moving from `from` to `to` in the direction of `side`.
export function directionalReturn(side: PositionSide, from: number, to: number): number {
  if (!isPositiveFinite(from) || !Number.isFinite(to)) return 0;
  return side === "long" ? (to - from) / from : (from - to) / from;
}

export function toLeveragedPct(fraction: number, leverage: number): number {
  return fraction * leverage * 100;
}

export function formatPct(pct: number): string {
  return `${pct.toFixed(2)}%`;
}

export function validateQty(qty: number, symbol: string): ValidationResult {
  if (!Number.isFinite(qty) || qty <= 0) {
    return {
      ok: false,
      error: new QtyOutOfRangeError(symbol, `Quantity ${qty} is invalid for ${symbol}`)
    };
  }

  if (!Number.isInteger(qty)) {
    return {
      ok: false,
      error: new QtyOutOfRangeError(symbol, `Quantity ${qty} is not a whole contract count for ${symbol}`)
    };
  }

  return { ok: true };
}

// Closes send the venue-reported size back unchanged, which may be fractional.
export function validateCloseQty(qty: number, symbol: string): ValidationResult {
  if (!Number.isFinite(qty) || qty <= 0) {
    return {
      ok: false,
      error: new QtyOutOfRangeError(symbol, `Quantity ${qty} is invalid for ${symbol}`)
    };
  }
  return { ok: true };
}

export function enforceLeverageBounds(
  leverage: number,
  symbol: string,
  bounds: { min: number; max: number } = { min: 1, max: 125 }
): number {
  if (!Number.isFinite(leverage) || leverage <= 0) {
    throw new LeverageOutOfRangeError(symbol, `Leverage ${leverage} is invalid`);
  }

  if (leverage < bounds.min) {
    throw new LeverageOutOfRangeError(symbol, `Leverage ${leverage} below minLeverage ${bounds.min}`);
  }

  if (leverage > bounds.max) {
    throw new LeverageOutOfRangeError(symbol, `Leverage ${leverage} above maxLeverage ${bounds.max}`);
  }

  return leverage;
}
