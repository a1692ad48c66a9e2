import assert from "node:assert/strict";
import test from "node:test";
import { FuturesEngine } from "@sigtrader/futures-engine";
import { DEFAULT_RISK_CONFIG } from "@sigtrader/risk";
import { RuntimeHealthTracker } from "./health.js";
import { createLogger } from "./logger.js";
import { MarketDataCache } from "./market-data-cache.js";
import { FakeVenue } from "./testing/fake-venue.js";
import { TradingBot } from "./trading-bot.js";
import { WebhookDeduplicator } from "./webhook-dedup.js";

const SYMBOL = "WLFIUSDT";

function setup(options: { tradingEnabled?: boolean } = {}) {
  const venue = new FakeVenue();
  const clock = { now: 1_000_000 };
  const now = () => clock.now;
  const lines: string[] = [];
  const sleeps: number[] = [];
  const logger = createLogger({ level: "debug", write: (line) => lines.push(line), now });
  const health = new RuntimeHealthTracker(now);

  const bot = new TradingBot({
    exchange: venue,
    engine: new FuturesEngine(venue, { symbol: SYMBOL, isTradingEnabled: () => options.tradingEnabled ?? true }),
    cache: new MarketDataCache(venue, { symbol: SYMBOL, ttlMs: 100, now, logger }),
    dedup: new WebhookDeduplicator(2_000),
    risk: DEFAULT_RISK_CONFIG,
    credentials: { apiKey: "test-key", apiSecret: "test-secret", apiPassphrase: "test-pass" },
    flipSettleMs: 500,
    health,
    logger,
    now,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });

  const orders = () => venue.orders.map((order) => [order.side, order.qty, order.reduceOnly === true]);
  const logged = () => lines.map((line) => JSON.parse(line));
  const transitions = () =>
    logged()
      .filter((entry) => entry.msg === "position_transition")
      .map((entry) => `${entry.from}->${entry.to}:${entry.reason}`);

  return { venue, clock, bot, health, sleeps, orders, logged, transitions };
}

function signal(marketPosition: string, timeframe = "15") {
  return { marketPosition, prevMarketPosition: "flat", timeframe };
}

test("long signal from flat opens a sized position with its stop", async () => {
  const { bot, orders, transitions } = setup();

  const outcome = await bot.handleSignal(signal("long"));

  assert.deepEqual(outcome, { status: "ok", action: "opened" });
  assert.deepEqual(orders(), [["buy", 3840, false]]);
  assert.equal(bot.position.phase, "OPEN");
  assert.equal(bot.position.side, "long");
  assert.equal(bot.position.size, 3840);
  assert.equal(bot.position.entryPrice, 1);
  assert.equal(bot.position.stopLossPrice, 0.9825);
  assert.equal(bot.position.signalActive, true);
  assert.deepEqual(transitions(), ["FLAT->OPEN:signal_open"]);
});

test("identical payload within the window is a duplicate and changes nothing", async () => {
  const { bot, clock, orders } = setup();

  await bot.handleSignal(signal("long"));
  const revision = bot.position.revision;
  clock.now += 1_500;

  assert.deepEqual(await bot.handleSignal(signal("long")), { status: "duplicate" });
  assert.equal(bot.position.revision, revision);
  assert.equal(orders().length, 1);
});

test("same direction with venue size held is a no-op", async () => {
  const { bot, orders } = setup();

  await bot.handleSignal(signal("long", "15"));
  const outcome = await bot.handleSignal(signal("long", "60"));

  assert.deepEqual(outcome, { status: "ok", action: "already_positioned" });
  assert.equal(orders().length, 1);
});

test("opposite signal closes the held side, settles, then opens", async () => {
  const { bot, venue, orders, sleeps, transitions } = setup();

  await bot.handleSignal(signal("long"));
  const outcome = await bot.handleSignal(signal("short"));

  assert.deepEqual(outcome, { status: "ok", action: "opened" });
  assert.deepEqual(orders(), [
    ["buy", 3840, false],
    ["sell", 3840, true],
    ["sell", 3840, false]
  ]);
  assert.deepEqual(sleeps, [500]);
  assert.equal(venue.shortSize, 3840);
  assert.equal(bot.position.side, "short");
  assert.equal(bot.position.stopLossPrice, 1.0175);
  assert.deepEqual(transitions(), ["FLAT->OPEN:signal_open", "OPEN->FLAT:signal_flip", "FLAT->OPEN:signal_open"]);
});

test("failed close of the opposing side aborts the open", async () => {
  const { bot, venue, orders } = setup();

  await bot.handleSignal(signal("long"));
  venue.rejectOrder = (req) => req.reduceOnly === true;

  const outcome = await bot.handleSignal(signal("short"));

  assert.deepEqual(outcome, { status: "close_failed", message: "failed to close long before opening short" });
  assert.deepEqual(orders(), [["buy", 3840, false]]);
  assert.equal(bot.position.side, "long");
  assert.equal(bot.position.externalStance, "short");
});

test("invalid stance is rejected before touching the venue", async () => {
  const { bot, orders } = setup();

  const outcome = await bot.handleSignal({ marketPosition: "sideways" });

  assert.deepEqual(outcome, { status: "invalid", message: "marketPosition must be long, short or flat" });
  assert.equal(orders().length, 0);
  assert.equal(bot.position.revision, 0);
});

test("invalid market data answers with an error and no mutation", async () => {
  const { bot, venue } = setup();
  venue.priceError = new Error("Bitget request timed out after 10000ms");

  assert.deepEqual(await bot.handleSignal(signal("long")), { status: "error", message: "invalid market data" });
  assert.equal(bot.position.signalActive, false);
  assert.equal(bot.position.revision, 0);
});

test("order below the minimum value is skipped", async () => {
  const { bot, venue, orders } = setup();
  venue.balance = 1;

  const outcome = await bot.handleSignal(signal("long"));

  assert.deepEqual(outcome, { status: "ok", action: "open_skipped", detail: "below_min_order_value" });
  assert.equal(orders().length, 0);
  assert.equal(bot.position.signalActive, true);
  assert.equal(bot.position.phase, "FLAT");
});

test("kill switch turns an open into a reported failure", async () => {
  const { bot, orders } = setup({ tradingEnabled: false });

  const outcome = await bot.handleSignal(signal("long"));

  assert.deepEqual(outcome, { status: "ok", action: "open_failed", detail: "blocked: kill_switch" });
  assert.equal(orders().length, 0);
});

test("flat signal closes everything and disarms protections", async () => {
  const { bot, orders, venue, clock } = setup();

  await bot.handleSignal(signal("long"));
  const outcome = await bot.handleSignal(signal("flat"));

  assert.deepEqual(outcome, { status: "ok", action: "flattened" });
  assert.deepEqual(orders(), [
    ["buy", 3840, false],
    ["sell", 3840, true]
  ]);
  assert.equal(bot.position.phase, "FLAT");
  assert.equal(bot.position.signalActive, false);
  assert.equal(bot.position.stopLossPrice, null);

  venue.price = 0.5;
  clock.now += 10_000;
  assert.deepEqual(await bot.runRiskCycle(), { ran: false, reason: "signal_inactive" });
  assert.equal(orders().length, 2);
});

test("risk cycle closes on stop-loss and keeps the signal armed", async () => {
  const { bot, venue, clock, orders, transitions, health } = setup();

  await bot.handleSignal(signal("long"));
  venue.price = 0.98;
  clock.now += 1_000;

  assert.deepEqual(await bot.runRiskCycle(), { ran: true, action: "stop_loss", executed: true });
  assert.deepEqual(orders(), [
    ["buy", 3840, false],
    ["sell", 3840, true]
  ]);
  assert.equal(bot.position.phase, "FLAT");
  assert.equal(bot.position.signalActive, true);
  assert.deepEqual(transitions(), ["FLAT->OPEN:signal_open", "OPEN->FLAT:stop_loss"]);
  assert.equal(health.snapshot().riskCycles, 1);
});

test("stop-loss closes a fractional venue size", async () => {
  const { bot, venue, clock, orders } = setup();

  await bot.handleSignal(signal("long"));
  venue.longSize = 3840.5;
  venue.price = 0.98;
  clock.now += 1_000;

  assert.deepEqual(await bot.runRiskCycle(), { ran: true, action: "stop_loss", executed: true });
  assert.deepEqual(orders()[1], ["sell", 3840.5, true]);
  assert.equal(venue.longSize, 0);
  assert.equal(bot.position.phase, "FLAT");
});

test("flat signal closes a fractional venue size", async () => {
  const { bot, venue, clock } = setup();

  await bot.handleSignal(signal("long"));
  venue.longSize = 3840.5;
  clock.now += 5_000;

  assert.deepEqual(await bot.handleSignal(signal("flat")), { status: "ok", action: "flattened" });
  assert.equal(venue.longSize, 0);
});

test("failed stop-loss close leaves the position open for the next check", async () => {
  const { bot, venue, clock } = setup();

  await bot.handleSignal(signal("long"));
  venue.price = 0.98;
  venue.rejectOrder = () => true;
  clock.now += 1_000;

  assert.deepEqual(await bot.runRiskCycle(), { ran: true, action: "stop_loss", executed: false });
  assert.equal(bot.position.phase, "OPEN");
});

test("trailing lock then re-entry against the original entry", async () => {
  const { bot, venue, clock, orders, transitions } = setup();
  await bot.handleSignal(signal("long"));

  venue.price = 1.01;
  clock.now += 5_000;
  assert.deepEqual(await bot.runRiskCycle(), { ran: true, action: "none", executed: false });

  venue.price = 1.0075;
  clock.now += 500;
  assert.deepEqual(await bot.runRiskCycle(), { ran: true, action: "lock_profit", executed: true });
  assert.equal(bot.position.phase, "LOCKED");
  assert.equal(bot.position.reentryPrice, 1.0075);
  assert.equal(venue.longSize, 0);

  venue.price = 1.012;
  clock.now += 3_000;
  assert.deepEqual(await bot.runRiskCycle(), { ran: true, action: "reenter", executed: true });
  assert.equal(bot.position.phase, "OPEN");
  assert.equal(bot.position.size, 3794);
  assert.equal(bot.position.entryPrice, 1);
  assert.equal(bot.position.reentryAttempts, 1);
  assert.equal(bot.position.stopLossPrice, 0.99429);

  assert.deepEqual(orders(), [
    ["buy", 3840, false],
    ["sell", 3840, true],
    ["buy", 3794, false]
  ]);
  assert.deepEqual(transitions(), [
    "FLAT->OPEN:signal_open",
    "OPEN->LOCKED:trailing_profit",
    "LOCKED->OPEN:reentry"
  ]);
});

test("venue closing the tracked side is reconciled to flat", async () => {
  const { bot, venue, clock, logged } = setup();

  await bot.handleSignal(signal("long"));
  venue.longSize = 0;
  clock.now += 1_000;

  assert.deepEqual(await bot.runRiskCycle(), { ran: true, action: "reconcile_external_close", executed: true });
  assert.equal(bot.position.phase, "FLAT");
  assert.equal(bot.position.signalActive, true);
  assert.equal(
    logged().some((entry) => entry.level === "warn" && entry.msg === "position closed outside the bot"),
    true
  );
});

test("a signal landing during a risk cycle is re-validated instead of racing it", async () => {
  const { bot, venue, clock, orders, logged } = setup();

  await bot.handleSignal(signal("long"));
  venue.price = 0.98;
  clock.now += 1_000;

  const [cycle, flat] = await Promise.all([bot.runRiskCycle(), bot.handleSignal(signal("flat"))]);

  assert.deepEqual(cycle, { ran: true, action: "stop_loss", executed: true });
  assert.deepEqual(flat, { status: "ok", action: "flattened" });
  assert.deepEqual(orders(), [
    ["buy", 3840, false],
    ["sell", 3840, true]
  ]);
  assert.equal(bot.position.signalActive, false);
  assert.equal(
    logged().some((entry) => entry.msg === "position changed during fetch, refetching"),
    true
  );
});

test("status reports tracked and venue state with percentage strings", async () => {
  const { bot, venue, clock } = setup();

  await bot.handleSignal(signal("long"));
  venue.price = 1.01;
  clock.now += 200;

  const status = await bot.getStatus();

  assert.equal(status.signalActive, true);
  assert.equal(status.externalStance, "long");
  assert.equal(status.actualPosition, "long");
  assert.equal(status.phase, "OPEN");
  assert.equal(status.size, 3840);
  assert.equal(status.currentPrice, 1.01);
  assert.equal(status.balance, 1000);
  assert.equal(status.pnl, "1.00%");
  assert.equal(status.pnlLeveraged, "4.00%");
  assert.equal(status.runtime?.webhooks, 1);
});

test("status without a tracked position has no pnl", async () => {
  const { bot } = setup();

  const status = await bot.getStatus();

  assert.equal(status.actualPosition, "flat");
  assert.equal(status.pnl, undefined);
  assert.equal(status.stopLossPrice, null);
});

test("credential check reports lengths and a trial balance", async () => {
  const { bot, venue } = setup();

  assert.deepEqual(await bot.testCredentials(), {
    serverTime: 1_700_000_000_000,
    credentialsLoaded: true,
    apiKeyLength: 8,
    apiSecretLength: 11,
    apiPassphraseLength: 9,
    balanceTest: "success",
    balance: 1000
  });

  venue.accountError = new Error("Missing Bitget credentials");
  const failed = await bot.testCredentials();
  assert.equal(failed.balanceTest, "failed");
  assert.equal(failed.balance, null);
  assert.equal(failed.balanceError, "Missing Bitget credentials");
});
