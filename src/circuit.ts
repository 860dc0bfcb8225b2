export type BreakerState = 'closed' | 'open' | 'half-open';

export type BreakerOptions = {
  threshold?: number; // consecutive failures before opening
  cooldownMs?: number;
  closeAfter?: number; // consecutive successes after cooldown before fully closing
  now?: () => number;
};

export class Breaker {
  private fails = 0;
  private openedUntil = 0;
  private tripped = false;
  private successStreak = 0;
  private lastTransitionTs: number;
  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly closeAfter: number;
  private readonly now: () => number;

  constructor(opts: BreakerOptions = {}) {
    this.threshold = Math.max(1, opts.threshold ?? 3);
    this.cooldownMs = Math.max(0, opts.cooldownMs ?? 60_000);
    this.closeAfter = Math.max(1, opts.closeAfter ?? 3);
    this.now = opts.now ?? Date.now;
    this.lastTransitionTs = this.now();
  }

  allow(): boolean { return this.now() >= this.openedUntil; }

  success() {
    if (!this.allow()) return;
    this.fails = 0;
    if (!this.tripped) return;
    this.successStreak++;
    if (this.successStreak >= this.closeAfter) {
      this.tripped = false;
      this.successStreak = 0;
      this.openedUntil = 0;
      this.lastTransitionTs = this.now();
    }
  }

  fail() {
    this.fails += 1;
    this.successStreak = 0;
    // a failure while half-open re-opens immediately
    if (this.fails >= this.threshold || this.tripped) {
      this.openedUntil = this.now() + this.cooldownMs;
      this.tripped = true;
      this.fails = 0;
      this.lastTransitionTs = this.now();
    }
  }

  state(): BreakerState {
    if (!this.allow()) return 'open';
    return this.tripped ? 'half-open' : 'closed';
  }

  lastTransitionAt() { return this.lastTransitionTs; }
}
