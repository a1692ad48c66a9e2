import { stableStringify } from "@sigtrader/futures-core";

/**
 * Drops a payload identical to the last accepted one inside the window.
 * Only accepted payloads move the window.
 */
export class WebhookDeduplicator {
  private last: { at: number; canonical: string } | null = null;

  constructor(private readonly windowMs = 2_000) {}

  accept(payload: unknown, now = Date.now()): boolean {
    const canonical = stableStringify(payload);
    if (this.last && this.last.canonical === canonical && now - this.last.at < this.windowMs) {
      return false;
    }
    this.last = { at: now, canonical };
    return true;
  }
}
