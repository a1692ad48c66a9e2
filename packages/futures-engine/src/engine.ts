import type { MarginMode, OrderSide, PositionSide } from "@sigtrader/futures-core";
import { validateCloseQty, validateQty } from "@sigtrader/futures-core";
import type { FuturesExchange } from "@sigtrader/futures-exchange";

export type EngineRiskEvent = {
  type: "KILL_SWITCH_BLOCK" | "ORDER_VALIDATION_BLOCK" | "ORDER_FAILED";
  symbol: string;
  timestamp: string;
  message: string;
  meta: Record<string, unknown>;
};

export type EngineExecutionResult =
  | { status: "accepted"; orderId: string }
  | { status: "blocked"; reason: "kill_switch" | "validation" }
  | { status: "failed"; reason: string };

export type FuturesEngineOptions = {
  symbol: string;
  marginMode?: MarginMode;
  isTradingEnabled?: () => boolean | Promise<boolean>;
  emitRiskEvent?: (event: EngineRiskEvent) => void | Promise<void>;
};

type OrderIntent = {
  action: "open" | "close";
  positionSide: PositionSide;
  qty: number;
};

function normalize(raw: string | null | undefined): string {
  return (raw ?? "").trim().toLowerCase();
}

function toOrderSide(intent: OrderIntent): OrderSide {
  const entrySide: OrderSide = intent.positionSide === "long" ? "buy" : "sell";
  if (intent.action === "open") return entrySide;
  return entrySide === "buy" ? "sell" : "buy";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isGlobalTradingEnabled(
  raw: string | null | undefined = process.env.GLOBAL_TRADING_ENABLED
): boolean {
  const normalized = normalize(raw);
  if (normalized === "off" || normalized === "false" || normalized === "0") return false;
  return true;
}

/**
 * Single entry point for orders. Venue errors come back as `failed` results,
 * so callers branch on `status` and never on exceptions.
 */
export class FuturesEngine {
  constructor(
    private readonly ex: FuturesExchange,
    private readonly options: FuturesEngineOptions
  ) {}

  get symbol(): string {
    return this.options.symbol;
  }

  open(side: PositionSide, qty: number): Promise<EngineExecutionResult> {
    return this.execute({ action: "open", positionSide: side, qty });
  }

  // Reduce-only order on the opposite order side of `side`.
  close(side: PositionSide, qty: number): Promise<EngineExecutionResult> {
    return this.execute({ action: "close", positionSide: side, qty });
  }

  private async resolveTradingEnabled(): Promise<boolean> {
    if (typeof this.options.isTradingEnabled === "function") return await this.options.isTradingEnabled();
    return isGlobalTradingEnabled();
  }

  private async emitRiskEvent(event: Omit<EngineRiskEvent, "symbol" | "timestamp">) {
    if (!this.options.emitRiskEvent) return;
    await this.options.emitRiskEvent({
      ...event,
      symbol: this.options.symbol,
      timestamp: new Date().toISOString()
    });
  }

  private async execute(intent: OrderIntent): Promise<EngineExecutionResult> {
    const meta = { action: intent.action, side: intent.positionSide, qty: intent.qty };

    const tradingEnabled = await this.resolveTradingEnabled();
    if (!tradingEnabled) {
      await this.emitRiskEvent({
        type: "KILL_SWITCH_BLOCK",
        message: "Global kill switch is engaged. Trading action blocked.",
        meta
      });
      return { status: "blocked", reason: "kill_switch" };
    }

    const validation =
      intent.action === "open"
        ? validateQty(intent.qty, this.options.symbol)
        : validateCloseQty(intent.qty, this.options.symbol);
    if (!validation.ok) {
      await this.emitRiskEvent({
        type: "ORDER_VALIDATION_BLOCK",
        message: validation.error.message,
        meta: { ...meta, errorName: validation.error.name }
      });
      return { status: "blocked", reason: "validation" };
    }

    try {
      const placed = await this.ex.placeOrder({
        symbol: this.options.symbol,
        side: toOrderSide(intent),
        qty: intent.qty,
        reduceOnly: intent.action === "close" ? true : undefined,
        marginMode: this.options.marginMode ?? "cross"
      });
      return { status: "accepted", orderId: placed.orderId };
    } catch (error) {
      const reason = errorMessage(error);
      await this.emitRiskEvent({
        type: "ORDER_FAILED",
        message: reason,
        meta: { ...meta, errorName: error instanceof Error ? error.name : "unknown" }
      });
      return { status: "failed", reason };
    }
  }
}
