/**
 * Consecutive-failure circuit breaker.
 *
 * closed: requests pass, failures are counted.
 * open: requests are refused until `openMs` has elapsed.
 * half_open: a single probe passes; its outcome closes or reopens the circuit.
 */

export type CircuitBreakerConfig = {
  enabled?: boolean;
  /** Open after N consecutive failures (default: 5). */
  failureThreshold?: number;
  /** How long to stay open before allowing a single probe request (default: 30000ms). */
  openMs?: number;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
};

type State =
  | { mode: 'closed'; failures: number }
  | { mode: 'open'; openedAt: number }
  | { mode: 'half_open'; probeInFlight: boolean };

export type CircuitBreakerSnapshot = {
  mode: State['mode'];
  openForMs?: number;
  failures?: number;
};

export class CircuitBreaker {
  private state: State = { mode: 'closed', failures: 0 };
  private readonly failureThreshold: number;
  private readonly openMs: number;
  private readonly clock: () => number;

  constructor(cfg: Omit<CircuitBreakerConfig, 'enabled'> = {}) {
    this.failureThreshold = Math.max(1, cfg.failureThreshold ?? 5);
    this.openMs = Math.max(1, cfg.openMs ?? 30_000);
    this.clock = cfg.clock ?? Date.now;
  }

  /** Enabled unless `enabled: false` is passed */
  static fromConfig(cfg?: CircuitBreakerConfig): CircuitBreaker | null {
    if (cfg?.enabled === false) return null;
    return new CircuitBreaker(cfg);
  }

  get mode(): State['mode'] {
    return this.state.mode;
  }

  canRequest(): boolean {
    if (this.state.mode === 'closed') return true;

    if (this.state.mode === 'open') {
      if (this.clock() - this.state.openedAt < this.openMs) return false;
      this.state = { mode: 'half_open', probeInFlight: false };
    }

    return !this.state.probeInFlight;
  }

  onStart(): void {
    if (this.state.mode === 'half_open') {
      this.state.probeInFlight = true;
    }
  }

  onSuccess(): void {
    this.state = { mode: 'closed', failures: 0 };
  }

  onFailure(): void {
    if (this.state.mode === 'half_open') {
      this.state = { mode: 'open', openedAt: this.clock() };
      return;
    }

    if (this.state.mode === 'closed') {
      const failures = this.state.failures + 1;
      this.state =
        failures >= this.failureThreshold
          ? { mode: 'open', openedAt: this.clock() }
          : { mode: 'closed', failures };
    }
  }

  getSnapshot(): CircuitBreakerSnapshot {
    if (this.state.mode === 'open') {
      return {
        mode: 'open',
        openForMs: Math.max(0, this.openMs - (this.clock() - this.state.openedAt)),
      };
    }
    if (this.state.mode === 'closed') {
      return { mode: 'closed', failures: this.state.failures };
    }
    return { mode: 'half_open' };
  }
}
