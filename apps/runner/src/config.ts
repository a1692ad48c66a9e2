import {
  BITGET_DEFAULT_MARGIN_COIN,
  BITGET_DEFAULT_PRODUCT_TYPE,
  BITGET_DEFAULT_REST_BASE_URL,
  BITGET_POSITION_MODES,
  BITGET_PRODUCT_TYPES,
  type BitgetPositionMode,
  type BitgetProductType
} from "@sigtrader/futures-exchange";
import { isGlobalTradingEnabled } from "@sigtrader/futures-engine";
import type { RiskConfig } from "@sigtrader/risk";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export type AppConfig = {
  server: { port: number };
  bitget: {
    apiKey: string;
    apiSecret: string;
    apiPassphrase: string;
    baseUrl: string;
    productType: BitgetProductType;
    marginCoin: string;
    positionMode: BitgetPositionMode;
    timeoutMs: number;
    retryAttempts: number;
    retryBaseDelayMs: number;
  };
  trading: {
    symbol: string;
    globalTradingEnabled: boolean;
    applyLeverageOnStart: boolean;
    risk: RiskConfig;
  };
  runtime: {
    marketCacheTtlMs: number;
    webhookDedupWindowMs: number;
    flipSettleMs: number;
    riskTickMs: number;
    logLevel: LogLevel;
  };
};

const SWITCH_VALUES = ["on", "off", "true", "false", "1", "0"] as const;

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function lowered(value: unknown): unknown {
  const blank = blankToUndefined(value);
  return typeof blank === "string" ? blank.toLowerCase() : blank;
}

function uppered(value: unknown): unknown {
  const blank = blankToUndefined(value);
  return typeof blank === "string" ? blank.toUpperCase() : blank;
}

function isOn(value: (typeof SWITCH_VALUES)[number]): boolean {
  return value === "on" || value === "true" || value === "1";
}

const int = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const fraction = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().gt(0).max(1).default(fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const switchFlag = (fallback: (typeof SWITCH_VALUES)[number]) =>
  z.preprocess(lowered, z.enum(SWITCH_VALUES).default(fallback));

const envSchema = z.object({
  PORT: int(10_000, 1, 65_535),

  BITGET_API_KEY: text(""),
  BITGET_API_SECRET: text(""),
  BITGET_API_PASSPHRASE: text(""),
  BITGET_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(BITGET_DEFAULT_REST_BASE_URL)),
  BITGET_PRODUCT_TYPE: z.preprocess(uppered, z.enum(BITGET_PRODUCT_TYPES).default(BITGET_DEFAULT_PRODUCT_TYPE)),
  BITGET_MARGIN_COIN: z.preprocess(uppered, z.string().min(1).default(BITGET_DEFAULT_MARGIN_COIN)),
  BITGET_POSITION_MODE: z.preprocess(lowered, z.enum(BITGET_POSITION_MODES).default("one-way")),
  REQUEST_TIMEOUT_MS: int(10_000, 1),
  REQUEST_RETRY_ATTEMPTS: int(3, 1, 10),
  REQUEST_RETRY_BASE_DELAY_MS: int(300, 0),

  TRADING_SYMBOL: z.preprocess(uppered, z.string().min(1).default("WLFIUSDT")),
  LEVERAGE: z.preprocess(blankToUndefined, z.coerce.number().gt(0).max(125).default(4)),
  POSITION_SIZE_FRACTION: fraction(0.96),
  MIN_ORDER_VALUE: z.preprocess(blankToUndefined, z.coerce.number().min(0).default(5)),
  STOP_LOSS_FRACTION: fraction(0.07),
  TRAILING_DROP_FRACTION: fraction(0.25),
  TRAILING_ACTIVATION_FRACTION: fraction(0.008),
  REENTRY_THRESHOLD: fraction(0.003),
  MAX_REENTRY_ATTEMPTS: int(3, 0, 10),
  CHECK_INTERVAL_MS: int(500, 0),
  ACTION_COOLDOWN_MS: int(3_000, 0),
  MARKET_CACHE_TTL_MS: int(100, 0),
  WEBHOOK_DEDUP_WINDOW_MS: int(2_000, 0),
  FLIP_SETTLE_MS: int(500, 0),
  RISK_TICK_MS: int(1_000, 0),
  GLOBAL_TRADING_ENABLED: switchFlag("on"),
  APPLY_LEVERAGE_ON_START: switchFlag("false"),
  LOG_LEVEL: z.preprocess(lowered, z.enum(LOG_LEVELS).default("info"))
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    server: { port: e.PORT },
    bitget: {
      apiKey: e.BITGET_API_KEY,
      apiSecret: e.BITGET_API_SECRET,
      apiPassphrase: e.BITGET_API_PASSPHRASE,
      baseUrl: e.BITGET_BASE_URL,
      productType: e.BITGET_PRODUCT_TYPE,
      marginCoin: e.BITGET_MARGIN_COIN,
      positionMode: e.BITGET_POSITION_MODE,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
      retryAttempts: e.REQUEST_RETRY_ATTEMPTS,
      retryBaseDelayMs: e.REQUEST_RETRY_BASE_DELAY_MS
    },
    trading: {
      symbol: e.TRADING_SYMBOL,
      globalTradingEnabled: isGlobalTradingEnabled(e.GLOBAL_TRADING_ENABLED),
      applyLeverageOnStart: isOn(e.APPLY_LEVERAGE_ON_START),
      risk: {
        leverage: e.LEVERAGE,
        stopLossFraction: e.STOP_LOSS_FRACTION,
        trailingDropFraction: e.TRAILING_DROP_FRACTION,
        trailingActivationFraction: e.TRAILING_ACTIVATION_FRACTION,
        reentryThreshold: e.REENTRY_THRESHOLD,
        maxReentryAttempts: e.MAX_REENTRY_ATTEMPTS,
        checkIntervalMs: e.CHECK_INTERVAL_MS,
        actionCooldownMs: e.ACTION_COOLDOWN_MS,
        positionSizeFraction: e.POSITION_SIZE_FRACTION,
        minOrderValue: e.MIN_ORDER_VALUE
      }
    },
    runtime: {
      marketCacheTtlMs: e.MARKET_CACHE_TTL_MS,
      webhookDedupWindowMs: e.WEBHOOK_DEDUP_WINDOW_MS,
      flipSettleMs: e.FLIP_SETTLE_MS,
      riskTickMs: e.RISK_TICK_MS,
      logLevel: e.LOG_LEVEL
    }
  };
}

// Safe to log: secrets are reduced to their lengths.
export function describeConfig(config: AppConfig): Record<string, unknown> {
  const { apiKey, apiSecret, apiPassphrase, ...bitget } = config.bitget;
  return {
    port: config.server.port,
    bitget: {
      ...bitget,
      apiKeyLength: apiKey.length,
      apiSecretLength: apiSecret.length,
      apiPassphraseLength: apiPassphrase.length
    },
    trading: config.trading,
    runtime: config.runtime
  };
}

export function hasCredentials(config: AppConfig): boolean {
  return Boolean(config.bitget.apiKey && config.bitget.apiSecret && config.bitget.apiPassphrase);
}
