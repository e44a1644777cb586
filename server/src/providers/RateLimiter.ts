// Simple token bucket rate limiter per upstream
export class RateLimiter {
  private capacity: number;
  private refillPerMs: number; // tokens per ms
  private tokens: number;
  private last: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(rpm: number, private readonly now: () => number = Date.now) {
    const perMinute = Math.max(1, rpm);
    this.capacity = perMinute;
    this.refillPerMs = perMinute / 60000;
    this.tokens = perMinute;
    this.last = this.now();
  }

  take(cost = 1): boolean {
    this.refill();
    if (this.tokens >= cost) { this.tokens -= cost; return true; }
    return false;
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill() {
    const now = this.now();
    const delta = now - this.last;
    if (delta <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + delta * this.refillPerMs);
    this.last = now;
  }

  /** Waiters are served in arrival order so a burst cannot starve an earlier caller. */
  waitFor(cost = 1): Promise<void> {
    const turn = this.queue.then(() => this.acquire(cost));
    this.queue = turn;
    return turn;
  }

  private async acquire(cost: number): Promise<void> {
    while (!this.take(cost)) {
      const needed = cost - this.tokens;
      const ms = Math.max(1, Math.ceil(needed / this.refillPerMs));
      await new Promise(res => setTimeout(res, ms));
    }
  }
}
