/**
 * Per-server circuit breaker.
 *
 * Classic closed → open → half_open state machine driven by tickets: a
 * caller asks {@link CircuitBreaker.tryAcquire} before contacting the
 * server and reports the outcome on the returned ticket. Only outcomes of
 * tickets issued in the current phase move the machine, so an attempt that
 * started before the breaker opened cannot close it again.
 */

export type CircuitState = "closed" | "open" | "half_open";

/** Snapshot describing the breaker internals for diagnostics and tests. */
export interface CircuitBreakerSnapshot {
  readonly state: CircuitState;
  readonly consecutiveFailures: number;
  /** Epoch ms of the last closed → open or half_open → open transition. */
  readonly openedAt: number | null;
  /** Epoch ms from which a probe is allowed while open. */
  readonly retryAt: number | null;
  readonly probeInFlight: boolean;
}

/** Ticket returned by {@link CircuitBreaker.tryAcquire}. */
export interface CircuitBreakerTicket {
  readonly allowed: boolean;
  readonly state: CircuitState;
  readonly retryAt: number | null;
  /** The server answered. */
  succeed(): void;
  /** The attempt failed in a way that counts against the server. */
  fail(): void;
  /** Give the slot back without an outcome (cancellation). */
  release(): void;
}

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the breaker. */
  readonly failureThreshold: number;
  /** Time spent open before a probe is allowed. */
  readonly recoveryTimeoutMs: number;
  /** Clock override used by tests. */
  readonly now?: () => number;
}

export type CircuitStateListener = (
  next: CircuitState,
  previous: CircuitState,
  snapshot: CircuitBreakerSnapshot
) => void;

const DENIED_NOOP = (): void => {};

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly now: () => number;
  private readonly listeners: CircuitStateListener[] = [];

  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private probeInFlight = false;
  /** Bumped on every transition; tickets from an older phase are ignored. */
  private phase = 0;

  constructor(options: CircuitBreakerOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      throw new TypeError("failureThreshold must be a positive integer");
    }
    if (!Number.isFinite(options.recoveryTimeoutMs) || options.recoveryTimeoutMs < 0) {
      throw new TypeError("recoveryTimeoutMs must be a non-negative number");
    }
    this.failureThreshold = options.failureThreshold;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      retryAt: this.retryAt(),
      probeInFlight: this.probeInFlight,
    };
  }

  /** Register a listener called after every state transition. */
  onStateChange(listener: CircuitStateListener): void {
    this.listeners.push(listener);
  }

  /**
   * Whether `tryAcquire()` would currently be allowed, without reserving a
   * slot or moving the state machine.
   */
  wouldAllow(): boolean {
    switch (this.state) {
      case "closed":
        return true;
      case "half_open":
        return !this.probeInFlight;
      case "open":
        return this.cooldownElapsed();
    }
  }

  /**
   * Reserve an attempt. When open and the recovery timeout has elapsed this
   * call moves the breaker to half_open and hands out the single probe.
   * Callers must settle an allowed ticket with exactly one of `succeed()`,
   * `fail()` or `release()`; later calls on the same ticket are ignored.
   */
  tryAcquire(): CircuitBreakerTicket {
    if (this.state === "open" && this.cooldownElapsed()) {
      this.transition("half_open");
    }

    if (this.state === "open" || (this.state === "half_open" && this.probeInFlight)) {
      return {
        allowed: false,
        state: this.state,
        retryAt: this.retryAt(),
        succeed: DENIED_NOOP,
        fail: DENIED_NOOP,
        release: DENIED_NOOP,
      };
    }

    const isProbe = this.state === "half_open";
    if (isProbe) {
      this.probeInFlight = true;
    }

    const phase = this.phase;
    let done = false;
    const settle = (outcome: "success" | "failure" | "release"): void => {
      if (done) return;
      done = true;
      if (isProbe && phase === this.phase) {
        this.probeInFlight = false;
      }
      if (outcome === "release" || phase !== this.phase) return;
      if (outcome === "success") {
        this.recordSuccess();
      } else {
        this.recordFailure();
      }
    };

    return {
      allowed: true,
      state: this.state,
      retryAt: null,
      succeed: () => settle("success"),
      fail: () => settle("failure"),
      release: () => settle("release"),
    };
  }

  /** Force the breaker back to closed with a zero failure count. */
  reset(): void {
    this.consecutiveFailures = 0;
    if (this.state !== "closed") {
      this.transition("closed");
    }
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state === "half_open") {
      this.transition("closed");
    }
  }

  private recordFailure(): void {
    if (this.state === "half_open") {
      this.transition("open");
      return;
    }
    if (this.state !== "closed") return;

    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.failureThreshold) {
      this.transition("open");
    }
  }

  private transition(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.phase += 1;
    this.probeInFlight = false;

    if (next === "open") {
      this.openedAt = this.now();
      this.consecutiveFailures = 0;
    } else if (next === "closed") {
      this.openedAt = null;
      this.consecutiveFailures = 0;
    }

    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(next, previous, snapshot);
    }
  }

  private cooldownElapsed(): boolean {
    return this.openedAt !== null && this.now() - this.openedAt >= this.recoveryTimeoutMs;
  }

  private retryAt(): number | null {
    return this.state === "open" && this.openedAt !== null
      ? this.openedAt + this.recoveryTimeoutMs
      : null;
  }
}
