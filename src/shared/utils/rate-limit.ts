interface SessionRateState {
  timestamps: number[];
}

export interface RateLimitDecision {
  allowed: boolean;
  retryAfterSeconds: number;
}

export interface RateLimiterOptions {
  windowMs?: number;
  maxMessagesPerWindow?: number;
  now?: () => number;
}

export class SessionRateLimiter {
  private readonly state = new Map<string, SessionRateState>();
  private readonly windowMs: number;
  private readonly maxMessagesPerWindow: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.windowMs = options.windowMs ?? 30_000;
    this.maxMessagesPerWindow = options.maxMessagesPerWindow ?? 10;
    this.now = options.now ?? Date.now;
  }

  checkAndConsume(sessionId: string): RateLimitDecision {
    const now = this.now();
    const current = this.state.get(sessionId) ?? { timestamps: [] };
    const filtered = current.timestamps.filter((timestamp) => now - timestamp < this.windowMs);

    if (filtered.length >= this.maxMessagesPerWindow) {
      const oldestInWindow = filtered[0] ?? now;
      const retryMs = Math.max(1_000, this.windowMs - (now - oldestInWindow));
      this.state.set(sessionId, { timestamps: filtered });
      return {
        allowed: false,
        retryAfterSeconds: Math.ceil(retryMs / 1_000),
      };
    }

    filtered.push(now);
    this.state.set(sessionId, { timestamps: filtered });
    return {
      allowed: true,
      retryAfterSeconds: 0,
    };
  }

  forget(sessionId: string): void {
    this.state.delete(sessionId);
  }
}
