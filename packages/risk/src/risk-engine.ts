import type { MarketSnapshot, PositionSide } from "@sigtrader/futures-core";
import { computeOrderQuantity, directionalReturn } from "@sigtrader/futures-core";
import { applyExternalClose, applyReentryAttempt, type PositionRecord } from "./position.js";

export type RiskConfig = {
  leverage: number;
  stopLossFraction: number;
  trailingDropFraction: number;
  trailingActivationFraction: number;
  reentryThreshold: number;
  maxReentryAttempts: number;
  checkIntervalMs: number;
  actionCooldownMs: number;
  positionSizeFraction: number;
  minOrderValue: number;
};

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  leverage: 4,
  stopLossFraction: 0.07,
  trailingDropFraction: 0.25,
  trailingActivationFraction: 0.008,
  reentryThreshold: 0.003,
  maxReentryAttempts: 3,
  checkIntervalMs: 500,
  actionCooldownMs: 3_000,
  positionSizeFraction: 0.96,
  minOrderValue: 5
};

export type RiskAction =
  | { type: "none"; reason?: string }
  | { type: "reconcile_external_close"; side: PositionSide }
  | { type: "stop_loss"; side: PositionSide; qty: number; price: number }
  | {
      type: "lock_profit";
      side: PositionSide;
      qty: number;
      price: number;
      pnl: number;
      peakProfitPct: number;
      drawdown: number;
    }
  | { type: "reenter"; side: PositionSide; qty: number; price: number; gainFromClose: number };

export type RiskDecision = {
  record: PositionRecord;
  action: RiskAction;
};

const NONE: RiskAction = { type: "none" };

// ratios landing exactly on a threshold must trigger despite float rounding
const RATIO_EPSILON = 1e-9;

function reaches(value: number, threshold: number): boolean {
  return value + RATIO_EPSILON >= threshold;
}

function hold(record: PositionRecord, reason?: string): RiskDecision {
  return { record, action: reason ? { type: "none", reason } : NONE };
}

function isValidPrice(snapshot: MarketSnapshot): boolean {
  return Number.isFinite(snapshot.price) && snapshot.price > 0;
}

function venueSizeFor(side: PositionSide, snapshot: MarketSnapshot): number {
  return side === "long" ? snapshot.longSize : snapshot.shortSize;
}

/**
 * OPEN only: a LOCKED record holds no venue size on purpose and must not be
 * mistaken for an external close.
 */
export function evaluateStopLoss(
  record: PositionRecord,
  snapshot: MarketSnapshot,
  config: RiskConfig,
  now: number
): RiskDecision {
  if (!record.signalActive) return hold(record);
  if (record.phase !== "OPEN" || record.side === "flat" || record.stopLossPrice === null) return hold(record);
  if (now - record.lastCheckAt.stopLoss < config.checkIntervalMs) return hold(record);
  if (!isValidPrice(snapshot)) return hold(record);

  const side = record.side;
  const checked: PositionRecord = { ...record, lastCheckAt: { ...record.lastCheckAt, stopLoss: now } };
  const venueSize = venueSizeFor(side, snapshot);

  if (venueSize <= 0) {
    return { record: applyExternalClose(checked), action: { type: "reconcile_external_close", side } };
  }

  const hit = side === "long" ? snapshot.price <= record.stopLossPrice : snapshot.price >= record.stopLossPrice;
  if (!hit) return hold(checked);

  return { record: checked, action: { type: "stop_loss", side, qty: venueSize, price: snapshot.price } };
}

export function evaluateTrailingProfit(
  record: PositionRecord,
  snapshot: MarketSnapshot,
  config: RiskConfig,
  now: number
): RiskDecision {
  if (!record.signalActive) return hold(record);
  if (record.phase !== "OPEN" || record.side === "flat") return hold(record);
  if (now - record.lastCheckAt.trailing < config.checkIntervalMs) return hold(record);
  if (now - record.lastProtectiveActionAt < config.actionCooldownMs) return hold(record);
  if (!isValidPrice(snapshot)) return hold(record);

  const side = record.side;
  const pnl = directionalReturn(side, record.entryPrice, snapshot.price);
  const peakProfitPct = pnl > record.peakProfitPct ? pnl : record.peakProfitPct;
  const next: PositionRecord = {
    ...record,
    peakProfitPct,
    lastCheckAt: { ...record.lastCheckAt, trailing: now }
  };

  if (!reaches(peakProfitPct, config.trailingActivationFraction)) return hold(next);

  const drawdown = (peakProfitPct - pnl) / peakProfitPct;
  if (!reaches(drawdown, config.trailingDropFraction)) return hold(next);

  // reconciliation belongs to the stop-loss check
  const venueSize = venueSizeFor(side, snapshot);
  if (venueSize <= 0) return hold(next);

  return {
    record: next,
    action: { type: "lock_profit", side, qty: venueSize, price: snapshot.price, pnl, peakProfitPct, drawdown }
  };
}

/**
 * The attempt is counted as soon as the threshold is met, so a failed order
 * or an order too small to place still consumes one of the attempts.
 */
export function evaluateReentry(
  record: PositionRecord,
  snapshot: MarketSnapshot,
  config: RiskConfig,
  now: number
): RiskDecision {
  if (!record.signalActive) return hold(record);
  if (record.phase !== "LOCKED" || record.side === "flat" || record.reentryPrice === null) return hold(record);
  if (record.reentryAttempts >= config.maxReentryAttempts) return hold(record);
  if (now - record.lastProtectiveActionAt < config.actionCooldownMs) return hold(record);
  if (!isValidPrice(snapshot)) return hold(record);

  const side = record.side;
  const gainFromClose = directionalReturn(side, record.reentryPrice, snapshot.price);
  if (!reaches(gainFromClose, config.reentryThreshold)) return hold(record);

  const counted = applyReentryAttempt(record, now);
  const sizing = computeOrderQuantity({
    balance: snapshot.balance,
    price: snapshot.price,
    positionSizeFraction: config.positionSizeFraction,
    leverage: config.leverage,
    minOrderValue: config.minOrderValue
  });
  if (sizing.qty <= 0) return hold(counted, `reentry_${sizing.reason}`);

  return {
    record: counted,
    action: { type: "reenter", side, qty: sizing.qty, price: snapshot.price, gainFromClose }
  };
}

/**
 * Stop-loss first; the other checks only run when it produced no action.
 * Trailing and re-entry are mutually exclusive by phase.
 */
export function evaluateRisk(
  record: PositionRecord,
  snapshot: MarketSnapshot,
  config: RiskConfig,
  now: number
): RiskDecision {
  const stop = evaluateStopLoss(record, snapshot, config, now);
  if (stop.action.type !== "none") return stop;

  if (stop.record.phase === "OPEN") return evaluateTrailingProfit(stop.record, snapshot, config, now);
  if (stop.record.phase === "LOCKED") return evaluateReentry(stop.record, snapshot, config, now);
  return stop;
}
