import type { MarketSnapshot } from "@sigtrader/futures-core";
import type { FuturesExchange } from "@sigtrader/futures-exchange";
import { silentLogger, type Logger } from "./logger.js";

export type MarketDataCacheOptions = {
  symbol: string;
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
};

function reasonOf(result: PromiseSettledResult<unknown>): string | null {
  if (result.status === "fulfilled") return null;
  return result.reason instanceof Error ? result.reason.message : String(result.reason);
}

/**
 * Short-lived snapshot of balance, price and venue sizes for one symbol.
 * A failed leg yields `price = 0`, which every consumer treats as "skip".
 */
export class MarketDataCache {
  private snapshot: MarketSnapshot | null = null;
  private inflight: Promise<MarketSnapshot> | null = null;
  private generation = 0;

  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly ex: FuturesExchange,
    private readonly options: MarketDataCacheOptions
  ) {
    this.ttlMs = options.ttlMs ?? 100;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  peek(): MarketSnapshot | null {
    return this.snapshot;
  }

  invalidate(): void {
    this.snapshot = null;
    this.inflight = null;
    this.generation += 1;
  }

  get(): Promise<MarketSnapshot> {
    const cached = this.snapshot;
    if (cached && this.now() - cached.fetchedAt < this.ttlMs) return Promise.resolve(cached);
    if (this.inflight) return this.inflight;

    const generation = this.generation;
    const inflight = this.fetchSnapshot().then((snapshot) => {
      if (generation === this.generation) {
        this.snapshot = snapshot;
        this.inflight = null;
      }
      return snapshot;
    });
    this.inflight = inflight;
    return inflight;
  }

  refresh(): Promise<MarketSnapshot> {
    this.invalidate();
    return this.get();
  }

  private async fetchSnapshot(): Promise<MarketSnapshot> {
    const symbol = this.options.symbol;
    const [account, price, sizes] = await Promise.allSettled([
      this.ex.getAccountState(),
      this.ex.getTickerPrice(symbol),
      this.ex.getPositionSizes(symbol)
    ]);

    const balance = account.status === "fulfilled" ? account.value.availableMargin ?? account.value.equity : 0;
    const longSize = sizes.status === "fulfilled" ? sizes.value.longSize : 0;
    const shortSize = sizes.status === "fulfilled" ? sizes.value.shortSize : 0;
    const failures = {
      account: reasonOf(account),
      price: reasonOf(price),
      positions: reasonOf(sizes)
    };

    const failed = Object.values(failures).some((reason) => reason !== null);
    if (failed) {
      this.logger.warn("market data fetch failed", { symbol, ...failures });
    }

    return {
      balance,
      price: !failed && price.status === "fulfilled" ? price.value : 0,
      longSize,
      shortSize,
      fetchedAt: this.now()
    };
  }
}
