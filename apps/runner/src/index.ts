import "dotenv/config";
import { FuturesEngine } from "@sigtrader/futures-engine";
import { BitgetFuturesAdapter } from "@sigtrader/futures-exchange";
import { ConfigError, describeConfig, hasCredentials, loadConfig, type AppConfig } from "./config.js";
import { RuntimeHealthTracker } from "./health.js";
import { createLogger, type Logger } from "./logger.js";
import { MarketDataCache } from "./market-data-cache.js";
import { RiskScheduler } from "./scheduler.js";
import { createApp } from "./server.js";
import { TradingBot } from "./trading-bot.js";
import { WebhookDeduplicator } from "./webhook-dedup.js";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      createLogger().error("invalid configuration", { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }
}

async function applyLeverage(exchange: BitgetFuturesAdapter, config: AppConfig, log: Logger) {
  const { symbol, risk } = config.trading;
  try {
    await exchange.setLeverage(symbol, risk.leverage, "cross");
    log.info("leverage applied", { symbol, leverage: risk.leverage });
  } catch (error) {
    log.error("leverage setup failed", { symbol, err: String(error) });
  }
}

async function main() {
  const config = readConfig();
  const log = createLogger({ level: config.runtime.logLevel });

  log.info("configuration loaded", describeConfig(config));
  if (!hasCredentials(config)) {
    log.error("Bitget credentials missing, private endpoints will fail", {
      apiKeyLength: config.bitget.apiKey.length,
      apiSecretLength: config.bitget.apiSecret.length,
      apiPassphraseLength: config.bitget.apiPassphrase.length
    });
  }

  const exchange = new BitgetFuturesAdapter({
    apiKey: config.bitget.apiKey,
    apiSecret: config.bitget.apiSecret,
    apiPassphrase: config.bitget.apiPassphrase,
    restBaseUrl: config.bitget.baseUrl,
    productType: config.bitget.productType,
    marginCoin: config.bitget.marginCoin,
    positionMode: config.bitget.positionMode,
    timeoutMs: config.bitget.timeoutMs,
    retryAttempts: config.bitget.retryAttempts,
    retryBaseDelayMs: config.bitget.retryBaseDelayMs,
    log: (entry) => {
      if (entry.ok) {
        log.debug("bitget request", { ...entry });
        return;
      }
      log.warn("bitget request failed", { ...entry });
    }
  });

  const engine = new FuturesEngine(exchange, {
    symbol: config.trading.symbol,
    isTradingEnabled: () => config.trading.globalTradingEnabled,
    emitRiskEvent: (event) => {
      log.warn("order gateway event", { ...event });
    }
  });

  const health = new RuntimeHealthTracker();
  const bot = new TradingBot({
    exchange,
    engine,
    cache: new MarketDataCache(exchange, {
      symbol: config.trading.symbol,
      ttlMs: config.runtime.marketCacheTtlMs,
      logger: log
    }),
    dedup: new WebhookDeduplicator(config.runtime.webhookDedupWindowMs),
    risk: config.trading.risk,
    credentials: {
      apiKey: config.bitget.apiKey,
      apiSecret: config.bitget.apiSecret,
      apiPassphrase: config.bitget.apiPassphrase
    },
    flipSettleMs: config.runtime.flipSettleMs,
    health,
    logger: log
  });

  if (config.trading.applyLeverageOnStart) await applyLeverage(exchange, config, log);

  const scheduler = new RiskScheduler({
    intervalMs: config.runtime.riskTickMs,
    tick: () => bot.runRiskCycle(),
    logger: log,
    onError: (reason) => health.noteError(reason)
  });

  const server = createApp({ bot, logger: log, health }).listen(config.server.port, "0.0.0.0", () => {
    log.info("signal trader listening", { port: config.server.port, symbol: config.trading.symbol });
  });
  scheduler.start();

  process.on("unhandledRejection", (reason) => {
    log.error("unhandled rejection", { err: String(reason) });
  });
  process.on("uncaughtException", (error) => {
    log.error("uncaught exception", { err: error.message, stack: error.stack });
  });

  await new Promise<void>((resolve) => {
    let closing = false;

    const shutdown = async (signal: string) => {
      if (closing) return;
      closing = true;
      log.info("shutdown requested", { signal });

      await scheduler.stop();
      await new Promise<void>((done) => server.close(() => done()));
      resolve();
    };

    process.once("SIGTERM", () => {
      void shutdown("SIGTERM");
    });
    process.once("SIGINT", () => {
      void shutdown("SIGINT");
    });
  });
}

main().catch((error) => {
  createLogger().error("signal trader crashed", { err: String(error) });
  process.exit(1);
});
