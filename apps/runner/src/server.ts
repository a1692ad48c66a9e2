import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { RuntimeHealthTracker } from "./health.js";
import { silentLogger, type Logger } from "./logger.js";
import type { SignalOutcome, TradingBot } from "./trading-bot.js";

export type AppDeps = {
  bot: TradingBot;
  logger?: Logger;
  health?: RuntimeHealthTracker;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function webhookResponse(outcome: SignalOutcome): { status: number; body: Record<string, unknown> } {
  switch (outcome.status) {
    case "ok":
      return { status: 200, body: { ...outcome } };
    case "duplicate":
      return { status: 200, body: { status: "duplicate" } };
    case "invalid":
      return { status: 400, body: { status: "error", message: outcome.message } };
    case "error":
      return { status: 500, body: { status: "error", message: outcome.message } };
    case "close_failed":
      return { status: 502, body: { status: "error", message: outcome.message } };
  }
}

export function createApp(deps: AppDeps) {
  const { bot, health } = deps;
  const logger = deps.logger ?? silentLogger;
  const app = express();

  app.use(express.json());

  app.get("/", (_req, res) => {
    res.type("text/plain").send("signal trader running");
  });

  // Uptime pingers hit this; a failed cycle is logged and retried on the next tick.
  app.get("/health", async (_req, res) => {
    try {
      await bot.runRiskCycle();
    } catch (error) {
      const reason = errorMessage(error);
      logger.error("risk cycle failed", { err: reason, trigger: "health" });
      health?.noteError(reason);
    }
    res.type("text/plain").send("OK");
  });

  app.get("/status", async (_req, res) => {
    try {
      res.json(await bot.getStatus());
    } catch (error) {
      logger.error("status failed", { err: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.post("/webhook", async (req, res) => {
    try {
      const outcome = await bot.handleSignal(req.body ?? {});
      const response = webhookResponse(outcome);
      res.status(response.status).json(response.body);
    } catch (error) {
      const reason = errorMessage(error);
      logger.error("webhook failed", { err: reason });
      health?.noteError(reason);
      res.status(500).json({ status: "error", message: reason });
    }
  });

  app.get("/test-credentials", async (_req, res) => {
    try {
      res.json(await bot.testCredentials());
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ status: "error", message: "invalid JSON body" });
      return;
    }
    const reason = errorMessage(err);
    logger.error("unhandled route error", { err: reason });
    health?.noteError(reason);
    res.status(500).json({ error: "internal_error" });
  });

  return app;
}
