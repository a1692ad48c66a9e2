import { silentLogger, type Logger } from "./logger.js";

export type RiskSchedulerOptions = {
  intervalMs: number;
  tick: () => Promise<unknown>;
  logger?: Logger;
  onError?: (reason: string) => void;
};

/**
 * Drives the risk cycle on a timer. A tick that is still running when the
 * next one is due makes that one a skip, so ticks never overlap.
 */
export class RiskScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<void> | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: RiskSchedulerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  start(): boolean {
    if (this.timer || this.options.intervalMs <= 0) return false;
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    this.timer.unref();
    this.logger.info("risk scheduler started", { intervalMs: this.options.intervalMs });
    return true;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.running;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  async runOnce(): Promise<boolean> {
    if (this.running) {
      this.logger.debug("risk tick skipped, previous tick still running");
      return false;
    }

    const run = (async () => {
      try {
        await this.options.tick();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error("risk tick failed", { err: reason });
        this.options.onError?.(reason);
      } finally {
        this.running = null;
      }
    })();
    this.running = run;
    await run;
    return true;
  }
}
