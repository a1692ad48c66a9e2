import type { PositionSide, Stance } from "@sigtrader/futures-core";

export type PositionPhase = "FLAT" | "OPEN" | "LOCKED";

export type PositionRecord = Readonly<{
  side: Stance;
  size: number;
  entryPrice: number;
  stopLossPrice: number | null;
  peakProfitPct: number;
  phase: PositionPhase;
  reentryPrice: number | null;
  reentryAttempts: number;
  lastCheckAt: Readonly<{ stopLoss: number; trailing: number }>;
  lastProtectiveActionAt: number;
  signalActive: boolean;
  externalStance: Stance;
  revision: number;
}>;

/**
 * Fields describing the tracked leg. Cleared on every transition to FLAT,
 * while the signal gate and check stamps survive.
 */
const FLAT_LEG = {
  side: "flat",
  size: 0,
  entryPrice: 0,
  stopLossPrice: null,
  peakProfitPct: 0,
  phase: "FLAT",
  reentryPrice: null,
  reentryAttempts: 0
} as const;

function bump(record: PositionRecord, patch: Partial<PositionRecord>): PositionRecord {
  return { ...record, ...patch, revision: record.revision + 1 };
}

export function createFlatRecord(): PositionRecord {
  return {
    ...FLAT_LEG,
    lastCheckAt: { stopLoss: 0, trailing: 0 },
    lastProtectiveActionAt: 0,
    signalActive: false,
    externalStance: "flat",
    revision: 0
  };
}

export function trackedSide(record: PositionRecord): PositionSide | null {
  return record.side === "flat" ? null : record.side;
}

// A directional signal arms protective logic whether or not an order follows.
export function applySignalStance(record: PositionRecord, stance: PositionSide): PositionRecord {
  return bump(record, { signalActive: true, externalStance: stance });
}

export function applyOpen(
  record: PositionRecord,
  params: { side: PositionSide; size: number; entryPrice: number; stopLossPrice: number; now: number }
): PositionRecord {
  return bump(record, {
    side: params.side,
    size: params.size,
    entryPrice: params.entryPrice,
    stopLossPrice: params.stopLossPrice,
    peakProfitPct: 0,
    phase: "OPEN",
    reentryPrice: null,
    reentryAttempts: 0,
    lastProtectiveActionAt: params.now
  });
}

// The tracked leg was closed to make room for the opposite stance.
export function applyFlipClose(record: PositionRecord): PositionRecord {
  return bump(record, FLAT_LEG);
}

export function applyStopLoss(record: PositionRecord): PositionRecord {
  return bump(record, FLAT_LEG);
}

// The venue no longer holds the tracked side: someone closed it outside this process.
export function applyExternalClose(record: PositionRecord): PositionRecord {
  return bump(record, FLAT_LEG);
}

export function applyProfitLock(record: PositionRecord, params: { price: number; now: number }): PositionRecord {
  return bump(record, {
    phase: "LOCKED",
    reentryPrice: params.price,
    reentryAttempts: 0,
    lastProtectiveActionAt: params.now
  });
}

export function applyReentryAttempt(record: PositionRecord, now: number): PositionRecord {
  return bump(record, {
    reentryAttempts: record.reentryAttempts + 1,
    lastProtectiveActionAt: now
  });
}

/**
 * LOCKED -> OPEN. `entryPrice` stays the original entry so the peak keeps
 * measuring profit of the whole trade; the stop follows the new fill.
 */
export function applyReentry(
  record: PositionRecord,
  params: { size: number; stopLossPrice: number; peakProfitPct: number; now: number }
): PositionRecord {
  return bump(record, {
    size: params.size,
    stopLossPrice: params.stopLossPrice,
    peakProfitPct: Math.max(0, params.peakProfitPct),
    phase: "OPEN",
    reentryPrice: null,
    lastProtectiveActionAt: params.now
  });
}

export function applyFlatSignal(record: PositionRecord): PositionRecord {
  return bump(record, {
    ...FLAT_LEG,
    signalActive: false,
    externalStance: "flat"
  });
}
