import assert from "node:assert/strict";
import type { Server } from "node:http";
import test from "node:test";
import { FuturesEngine } from "@sigtrader/futures-engine";
import { DEFAULT_RISK_CONFIG } from "@sigtrader/risk";
import { RuntimeHealthTracker } from "./health.js";
import { MarketDataCache } from "./market-data-cache.js";
import { createApp } from "./server.js";
import { FakeVenue } from "./testing/fake-venue.js";
import { TradingBot } from "./trading-bot.js";
import { WebhookDeduplicator } from "./webhook-dedup.js";

const SYMBOL = "WLFIUSDT";

async function withServer(fn: (ctx: { baseUrl: string; venue: FakeVenue; bot: TradingBot }) => Promise<void>) {
  const venue = new FakeVenue();
  const clock = { now: 5_000_000 };
  const now = () => clock.now;
  const health = new RuntimeHealthTracker(now);
  const bot = new TradingBot({
    exchange: venue,
    engine: new FuturesEngine(venue, { symbol: SYMBOL }),
    cache: new MarketDataCache(venue, { symbol: SYMBOL, ttlMs: 0, now }),
    dedup: new WebhookDeduplicator(2_000),
    risk: DEFAULT_RISK_CONFIG,
    credentials: { apiKey: "test-key", apiSecret: "test-secret", apiPassphrase: "test-pass" },
    health,
    now,
    sleep: async () => undefined
  });

  const server: Server = createApp({ bot, health }).listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server did not bind a port");

  try {
    await fn({ baseUrl: `http://127.0.0.1:${address.port}`, venue, bot });
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

function postJson(url: string, body: string) {
  return fetch(url, { method: "POST", headers: { "Content-Type": "application/json" }, body });
}

test("webhook opens a position and answers ok", async () => {
  await withServer(async ({ baseUrl, venue }) => {
    const res = await postJson(
      `${baseUrl}/webhook`,
      JSON.stringify({ marketPosition: "LONG", prevMarketPosition: "flat", timeframe: "15" })
    );

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { status: "ok", action: "opened" });
    assert.equal(venue.longSize, 3840);
  });
});

test("repeated webhook is reported as duplicate", async () => {
  await withServer(async ({ baseUrl, venue }) => {
    const body = JSON.stringify({ marketPosition: "short", prevMarketPosition: "flat", timeframe: "5" });
    await postJson(`${baseUrl}/webhook`, body);
    const res = await postJson(`${baseUrl}/webhook`, body);

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { status: "duplicate" });
    assert.equal(venue.orders.length, 1);
  });
});

test("invalid stance answers 400", async () => {
  await withServer(async ({ baseUrl, venue }) => {
    const res = await postJson(`${baseUrl}/webhook`, JSON.stringify({ marketPosition: "sideways" }));

    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), {
      status: "error",
      message: "marketPosition must be long, short or flat"
    });
    assert.equal(venue.orders.length, 0);
  });
});

test("malformed JSON answers 400", async () => {
  await withServer(async ({ baseUrl }) => {
    const res = await postJson(`${baseUrl}/webhook`, "{not json");

    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), { status: "error", message: "invalid JSON body" });
  });
});

test("invalid market data answers 500", async () => {
  await withServer(async ({ baseUrl, venue }) => {
    venue.priceError = new Error("Bitget request timed out after 10000ms");
    const res = await postJson(`${baseUrl}/webhook`, JSON.stringify({ marketPosition: "long" }));

    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { status: "error", message: "invalid market data" });
  });
});

test("failed opposing close answers 502", async () => {
  await withServer(async ({ baseUrl, venue }) => {
    await postJson(`${baseUrl}/webhook`, JSON.stringify({ marketPosition: "long" }));
    venue.rejectOrder = (req) => req.reduceOnly === true;

    const res = await postJson(`${baseUrl}/webhook`, JSON.stringify({ marketPosition: "short" }));

    assert.equal(res.status, 502);
    assert.deepEqual(await res.json(), {
      status: "error",
      message: "failed to close long before opening short"
    });
  });
});

test("health runs the risk cycle and always answers OK", async () => {
  await withServer(async ({ baseUrl, venue, bot }) => {
    const idle = await fetch(`${baseUrl}/health`);
    assert.equal(idle.status, 200);
    assert.equal(await idle.text(), "OK");

    await postJson(`${baseUrl}/webhook`, JSON.stringify({ marketPosition: "long" }));
    venue.price = 0.98;

    const res = await fetch(`${baseUrl}/health`);
    assert.equal(res.status, 200);
    assert.equal(await res.text(), "OK");
    assert.equal(bot.position.phase, "FLAT");
    assert.equal(venue.longSize, 0);
  });
});

test("status returns the position report", async () => {
  await withServer(async ({ baseUrl }) => {
    await postJson(`${baseUrl}/webhook`, JSON.stringify({ marketPosition: "long" }));

    const res = await fetch(`${baseUrl}/status`);
    const body = JSON.parse(await res.text());

    assert.equal(res.status, 200);
    assert.equal(body.phase, "OPEN");
    assert.equal(body.actualPosition, "long");
    assert.equal(body.stopLossPrice, 0.9825);
    assert.equal(body.pnl, "0.00%");
    assert.equal(body.runtime.webhooks, 1);
  });
});

test("test-credentials reports lengths only", async () => {
  await withServer(async ({ baseUrl }) => {
    const res = await fetch(`${baseUrl}/test-credentials`);

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      serverTime: 1_700_000_000_000,
      credentialsLoaded: true,
      apiKeyLength: 8,
      apiSecretLength: 11,
      apiPassphraseLength: 9,
      balanceTest: "success",
      balance: 1000
    });
  });
});

test("unknown routes answer 404", async () => {
  await withServer(async ({ baseUrl }) => {
    const res = await fetch(`${baseUrl}/nope`);

    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { error: "not_found" });
  });
});
