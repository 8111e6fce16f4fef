/**
 * Periodic liveness probe for one session.
 *
 * Runs `probe()` every `intervalMs`, never overlapping two probes, and
 * reports the streak of consecutive failures. The monitor knows nothing
 * about transports or breakers; the connection manager supplies the probe
 * and decides what a failure means.
 */

import type { Logger } from "../logger.js";
import { errorMessage } from "../errors.js";

export interface HeartbeatMonitorOptions {
  readonly intervalMs: number;
  /** Consecutive failures before `onDegraded` fires. */
  readonly failureThreshold: number;
  /**
   * One liveness check. Resolving `"skipped"` means no verdict (for example
   * the breaker refused the ping) and leaves the failure streak untouched.
   */
  readonly probe: () => Promise<"ok" | "skipped">;
  readonly onSuccess: (at: Date) => void;
  readonly onDegraded: (consecutiveFailures: number, error: unknown) => void;
  /** Called after every tick, whatever the outcome. */
  readonly onTick?: () => void;
  readonly logger: Logger;
}

export class HeartbeatMonitor {
  private readonly options: HeartbeatMonitorOptions;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private current: Promise<void> | null = null;
  private running = false;
  private failures = 0;

  constructor(options: HeartbeatMonitorOptions) {
    this.options = options;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
  }

  /** Stop ticking and wait for a probe that is still running. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current !== null) {
      await this.current;
    }
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.tick().finally(() => {
        this.current = null;
        this.schedule();
      });
    }, this.options.intervalMs);
  }

  private async tick(): Promise<void> {
    try {
      const verdict = await this.options.probe();
      if (verdict === "ok") {
        this.failures = 0;
        this.options.onSuccess(new Date());
      }
    } catch (error) {
      this.failures += 1;
      this.options.logger.debug(`Heartbeat failed (${this.failures} in a row)`, {
        error: errorMessage(error),
      });
      if (this.failures >= this.options.failureThreshold) {
        this.options.onDegraded(this.failures, error);
      }
    }
    this.options.onTick?.();
  }
}
