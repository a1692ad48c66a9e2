import type { InboundSignal, Stance } from "@sigtrader/futures-core";
import { stableStringify } from "@sigtrader/futures-core";
import { z } from "zod";

const STANCES = ["long", "short", "flat"] as const;

function toStance(raw: string | null | undefined): Stance | null {
  const normalized = (raw ?? "").trim().toLowerCase();
  return STANCES.find((stance) => stance === normalized) ?? null;
}

export const webhookBodySchema = z.object({
  marketPosition: z
    .string({ required_error: "marketPosition is required" })
    .trim()
    .toLowerCase()
    .pipe(z.enum(STANCES, { errorMap: () => ({ message: "marketPosition must be long, short or flat" }) })),
  prevMarketPosition: z.string().nullish().transform(toStance),
  timeframe: z
    .union([z.string(), z.number()])
    .optional()
    .transform((value) => (value === undefined || value === "" ? "?" : String(value)))
});

export type WebhookBody = z.infer<typeof webhookBodySchema>;

export type ParsedSignal = { ok: true; signal: InboundSignal } | { ok: false; message: string };

export function parseSignal(payload: unknown): ParsedSignal {
  const parsed = webhookBodySchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, message: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }

  return {
    ok: true,
    signal: {
      stance: parsed.data.marketPosition,
      prevStance: parsed.data.prevMarketPosition,
      timeframe: parsed.data.timeframe,
      canonical: stableStringify(payload)
    }
  };
}
