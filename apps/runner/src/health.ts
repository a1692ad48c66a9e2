export type RuntimeHealth = {
  startedAt: number;
  lastRiskCycleAt: number;
  lastWebhookAt: number;
  riskCycles: number;
  webhooks: number;
  lastErrorAt: number;
  lastErrorReason: string | null;
};

export class RuntimeHealthTracker {
  private readonly state: RuntimeHealth;

  constructor(private readonly now: () => number = Date.now) {
    this.state = {
      startedAt: now(),
      lastRiskCycleAt: 0,
      lastWebhookAt: 0,
      riskCycles: 0,
      webhooks: 0,
      lastErrorAt: 0,
      lastErrorReason: null
    };
  }

  noteRiskCycle() {
    this.state.lastRiskCycleAt = this.now();
    this.state.riskCycles += 1;
  }

  noteWebhook() {
    this.state.lastWebhookAt = this.now();
    this.state.webhooks += 1;
  }

  noteError(reason: string) {
    this.state.lastErrorAt = this.now();
    this.state.lastErrorReason = reason;
  }

  snapshot(): RuntimeHealth {
    return { ...this.state };
  }
}
