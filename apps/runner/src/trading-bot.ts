import type { MarketSnapshot, PositionSide, Stance } from "@sigtrader/futures-core";
import {
  computeOrderQuantity,
  directionalReturn,
  formatPct,
  stopLossPriceFor,
  toLeveragedPct
} from "@sigtrader/futures-core";
import type { EngineExecutionResult, FuturesEngine } from "@sigtrader/futures-engine";
import type { FuturesExchange } from "@sigtrader/futures-exchange";
import {
  applyFlatSignal,
  applyFlipClose,
  applyOpen,
  applyProfitLock,
  applyReentry,
  applySignalStance,
  applyStopLoss,
  createFlatRecord,
  evaluateRisk,
  type PositionPhase,
  type PositionRecord,
  type RiskAction,
  type RiskConfig
} from "@sigtrader/risk";
import type { RuntimeHealth, RuntimeHealthTracker } from "./health.js";
import { silentLogger, type LogMeta, type Logger } from "./logger.js";
import type { MarketDataCache } from "./market-data-cache.js";
import { SerialLock } from "./serial-lock.js";
import { parseSignal } from "./signal.js";
import type { WebhookDeduplicator } from "./webhook-dedup.js";

const MAX_SNAPSHOT_ATTEMPTS = 3;

export type SignalAction = "opened" | "already_positioned" | "flattened" | "open_skipped" | "open_failed";

export type SignalOutcome =
  | { status: "ok"; action: SignalAction; detail?: string }
  | { status: "duplicate" }
  | { status: "invalid"; message: string }
  | { status: "error"; message: string }
  | { status: "close_failed"; message: string };

export type RiskCycleOutcome =
  | { ran: false; reason: "signal_inactive" }
  | { ran: true; action: RiskAction["type"]; executed: boolean };

export type StatusReport = {
  signalActive: boolean;
  externalStance: Stance;
  actualPosition: Stance;
  phase: PositionPhase;
  side: Stance;
  size: number;
  entryPrice: number;
  currentPrice: number;
  stopLossPrice: number | null;
  balance: number;
  reentryAttempts: number;
  peakProfit?: string;
  pnl?: string;
  pnlLeveraged?: string;
  runtime?: RuntimeHealth;
};

export type CredentialReport = {
  serverTime: number | null;
  serverTimeError?: string;
  credentialsLoaded: boolean;
  apiKeyLength: number;
  apiSecretLength: number;
  apiPassphraseLength: number;
  balanceTest: "success" | "failed";
  balance: number | null;
  balanceError?: string;
};

export type TradingBotDeps = {
  exchange: FuturesExchange;
  engine: FuturesEngine;
  cache: MarketDataCache;
  dedup: WebhookDeduplicator;
  risk: RiskConfig;
  credentials?: { apiKey: string; apiSecret: string; apiPassphrase: string };
  flipSettleMs?: number;
  health?: RuntimeHealthTracker;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function opposite(side: PositionSide): PositionSide {
  return side === "long" ? "short" : "long";
}

function venueSize(snapshot: MarketSnapshot, side: PositionSide): number {
  return side === "long" ? snapshot.longSize : snapshot.shortSize;
}

function actualPosition(snapshot: MarketSnapshot): Stance {
  if (snapshot.longSize > 0) return "long";
  if (snapshot.shortSize > 0) return "short";
  return "flat";
}

function describeOrder(result: EngineExecutionResult): string {
  if (result.status === "accepted") return `accepted ${result.orderId}`;
  return `${result.status}: ${result.reason}`;
}

/**
 * Owns the position record. Every read-decide-mutate sequence runs inside one
 * SerialLock task; market data is fetched before the lock and re-validated
 * against the record revision once inside.
 */
export class TradingBot {
  private record: PositionRecord = createFlatRecord();
  private readonly lock = new SerialLock();

  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: TradingBotDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get position(): PositionRecord {
    return this.record;
  }

  async handleSignal(payload: unknown): Promise<SignalOutcome> {
    if (!this.deps.dedup.accept(payload, this.now())) {
      this.logger.info("webhook duplicate skipped");
      return { status: "duplicate" };
    }

    const parsed = parseSignal(payload);
    if (!parsed.ok) {
      this.logger.warn("webhook rejected", { reason: parsed.message });
      return { status: "invalid", message: parsed.message };
    }

    const signal = parsed.signal;
    this.deps.health?.noteWebhook();
    this.logger.info("webhook signal", {
      stance: signal.stance,
      prevStance: signal.prevStance,
      timeframe: signal.timeframe
    });

    return this.withFreshSnapshot(async (snapshot): Promise<SignalOutcome> => {
      if (snapshot.price <= 0 || snapshot.balance <= 0) {
        this.logger.error("invalid market data", { price: snapshot.price, balance: snapshot.balance });
        return { status: "error", message: "invalid market data" };
      }
      if (signal.stance === "flat") return this.flatten(snapshot);
      return this.enter(signal.stance, snapshot);
    });
  }

  async runRiskCycle(): Promise<RiskCycleOutcome> {
    if (!this.record.signalActive) return { ran: false, reason: "signal_inactive" };

    return this.withFreshSnapshot(async (snapshot): Promise<RiskCycleOutcome> => {
      // a flat signal may have landed while we were fetching
      if (!this.record.signalActive) return { ran: false, reason: "signal_inactive" };

      const now = this.now();
      const decision = evaluateRisk(this.record, snapshot, this.deps.risk, now);
      const before = this.record;
      this.record = decision.record;

      const executed = await this.executeRiskAction(before, decision.action, now);
      this.deps.health?.noteRiskCycle();
      return { ran: true, action: decision.action.type, executed };
    });
  }

  async getStatus(): Promise<StatusReport> {
    const snapshot = await this.deps.cache.get();

    return this.lock.run(() => {
      const record = this.record;
      const report: StatusReport = {
        signalActive: record.signalActive,
        externalStance: record.externalStance,
        actualPosition: actualPosition(snapshot),
        phase: record.phase,
        side: record.side,
        size: record.size,
        entryPrice: record.entryPrice,
        currentPrice: snapshot.price,
        stopLossPrice: record.stopLossPrice,
        balance: snapshot.balance,
        reentryAttempts: record.reentryAttempts,
        runtime: this.deps.health?.snapshot()
      };

      if (record.side !== "flat" && snapshot.price > 0) {
        const pnl = directionalReturn(record.side, record.entryPrice, snapshot.price);
        report.pnl = formatPct(toLeveragedPct(pnl, 1));
        report.pnlLeveraged = formatPct(toLeveragedPct(pnl, this.deps.risk.leverage));
        report.peakProfit = formatPct(toLeveragedPct(record.peakProfitPct, 1));
      }

      return report;
    });
  }

  async testCredentials(): Promise<CredentialReport> {
    const credentials = this.deps.credentials ?? { apiKey: "", apiSecret: "", apiPassphrase: "" };
    const report: CredentialReport = {
      serverTime: null,
      credentialsLoaded: Boolean(credentials.apiKey && credentials.apiSecret && credentials.apiPassphrase),
      apiKeyLength: credentials.apiKey.length,
      apiSecretLength: credentials.apiSecret.length,
      apiPassphraseLength: credentials.apiPassphrase.length,
      balanceTest: "failed",
      balance: null
    };

    try {
      report.serverTime = await this.deps.exchange.getServerTime();
    } catch (error) {
      report.serverTimeError = errorMessage(error);
    }

    try {
      const account = await this.deps.exchange.getAccountState();
      report.balance = account.availableMargin ?? account.equity;
      report.balanceTest = "success";
    } catch (error) {
      report.balanceError = errorMessage(error);
    }

    return report;
  }

  /**
   * Fetch outside the lock, then confirm nothing transitioned meanwhile.
   * The last attempt fetches while holding the lock so the caller always
   * gets an answer.
   */
  private async withFreshSnapshot<T>(fn: (snapshot: MarketSnapshot) => Promise<T>): Promise<T> {
    for (let attempt = 1; attempt < MAX_SNAPSHOT_ATTEMPTS; attempt += 1) {
      const observed = this.record.revision;
      const snapshot = await this.deps.cache.refresh();

      const result = await this.lock.run(async () => {
        if (this.record.revision !== observed) return null;
        return { value: await fn(snapshot) };
      });
      if (result) return result.value;

      this.logger.debug("position changed during fetch, refetching", { attempt });
    }

    return this.lock.run(async () => fn(await this.deps.cache.refresh()));
  }

  private transition(next: PositionRecord, reason: string, meta: LogMeta = {}) {
    const prev = this.record;
    this.record = next;
    this.logger.info("position_transition", {
      from: prev.phase,
      to: next.phase,
      reason,
      side: next.side === "flat" ? prev.side : next.side,
      revision: next.revision,
      ...meta
    });
  }

  private async enter(side: PositionSide, snapshot: MarketSnapshot): Promise<SignalOutcome> {
    this.record = applySignalStance(this.record, side);

    if (venueSize(snapshot, side) > 0) {
      this.logger.info("already positioned", { side, size: venueSize(snapshot, side) });
      return { status: "ok", action: "already_positioned" };
    }

    const other = opposite(side);
    const otherSize = venueSize(snapshot, other);
    if (otherSize > 0) {
      const closed = await this.deps.engine.close(other, otherSize);
      if (closed.status !== "accepted") {
        this.logger.error("close before flip failed", { side: other, qty: otherSize, result: describeOrder(closed) });
        return { status: "close_failed", message: `failed to close ${other} before opening ${side}` };
      }
      this.transition(applyFlipClose(this.record), "signal_flip", { closedSide: other, qty: otherSize });
      await this.sleep(this.deps.flipSettleMs ?? 500);
    }

    const risk = this.deps.risk;
    const sizing = computeOrderQuantity({
      balance: snapshot.balance,
      price: snapshot.price,
      positionSizeFraction: risk.positionSizeFraction,
      leverage: risk.leverage,
      minOrderValue: risk.minOrderValue
    });
    if (sizing.qty <= 0) {
      this.logger.warn("order size rejected", { side, reason: sizing.reason, exposureUsd: sizing.exposureUsd });
      return { status: "ok", action: "open_skipped", detail: sizing.reason };
    }

    const opened = await this.deps.engine.open(side, sizing.qty);
    if (opened.status !== "accepted") {
      this.logger.error("open failed", { side, qty: sizing.qty, result: describeOrder(opened) });
      return { status: "ok", action: "open_failed", detail: describeOrder(opened) };
    }

    const stopLossPrice = stopLossPriceFor({
      side,
      entryPrice: snapshot.price,
      stopLossPct: risk.stopLossFraction,
      leverage: risk.leverage
    });
    this.transition(
      applyOpen(this.record, { side, size: sizing.qty, entryPrice: snapshot.price, stopLossPrice, now: this.now() }),
      "signal_open",
      { qty: sizing.qty, entryPrice: snapshot.price, stopLossPrice, orderId: opened.orderId }
    );
    return { status: "ok", action: "opened" };
  }

  private async flatten(snapshot: MarketSnapshot): Promise<SignalOutcome> {
    const failed: PositionSide[] = [];

    for (const side of ["long", "short"] as const) {
      const size = venueSize(snapshot, side);
      if (size <= 0) continue;
      const closed = await this.deps.engine.close(side, size);
      if (closed.status !== "accepted") {
        this.logger.error("flat close failed", { side, qty: size, result: describeOrder(closed) });
        failed.push(side);
      }
    }

    this.transition(applyFlatSignal(this.record), "signal_flat", { protections: "disabled" });

    if (failed.length > 0) {
      return { status: "close_failed", message: `failed to close ${failed.join(", ")}` };
    }
    return { status: "ok", action: "flattened" };
  }

  /**
   * `before` is the record the decision was taken on; the current record
   * already carries the check stamps of this cycle.
   */
  private async executeRiskAction(before: PositionRecord, action: RiskAction, now: number): Promise<boolean> {
    const leverage = this.deps.risk.leverage;

    switch (action.type) {
      case "none":
        if (action.reason) {
          this.logger.warn("reentry declined", {
            reason: action.reason,
            attempts: this.record.reentryAttempts
          });
        }
        return false;

      case "reconcile_external_close":
        this.logger.warn("position closed outside the bot", { side: action.side, size: before.size });
        this.logger.info("position_transition", {
          from: before.phase,
          to: this.record.phase,
          reason: "external_close",
          side: action.side,
          revision: this.record.revision
        });
        return true;

      case "stop_loss": {
        const closed = await this.deps.engine.close(action.side, action.qty);
        if (closed.status !== "accepted") {
          this.logger.error("stop-loss close failed", { side: action.side, result: describeOrder(closed) });
          return false;
        }
        this.transition(applyStopLoss(this.record), "stop_loss", {
          price: action.price,
          stopLossPrice: before.stopLossPrice,
          pnlLeveraged: formatPct(
            toLeveragedPct(directionalReturn(action.side, before.entryPrice, action.price), leverage)
          )
        });
        return true;
      }

      case "lock_profit": {
        const closed = await this.deps.engine.close(action.side, action.qty);
        if (closed.status !== "accepted") {
          this.logger.error("profit lock close failed", { side: action.side, result: describeOrder(closed) });
          return false;
        }
        this.transition(applyProfitLock(this.record, { price: action.price, now }), "trailing_profit", {
          price: action.price,
          pnlLeveraged: formatPct(toLeveragedPct(action.pnl, leverage)),
          peakLeveraged: formatPct(toLeveragedPct(action.peakProfitPct, leverage)),
          drawdown: formatPct(action.drawdown * 100)
        });
        return true;
      }

      case "reenter": {
        const opened = await this.deps.engine.open(action.side, action.qty);
        if (opened.status !== "accepted") {
          this.logger.warn("reentry order failed", {
            side: action.side,
            attempts: this.record.reentryAttempts,
            result: describeOrder(opened)
          });
          return false;
        }
        const stopLossPrice = stopLossPriceFor({
          side: action.side,
          entryPrice: action.price,
          stopLossPct: this.deps.risk.stopLossFraction,
          leverage
        });
        const peakProfitPct = directionalReturn(action.side, this.record.entryPrice, action.price);
        this.transition(
          applyReentry(this.record, { size: action.qty, stopLossPrice, peakProfitPct, now }),
          "reentry",
          {
            qty: action.qty,
            price: action.price,
            stopLossPrice,
            attempts: this.record.reentryAttempts,
            gainFromClose: formatPct(action.gainFromClose * 100)
          }
        );
        return true;
      }
    }
  }
}
