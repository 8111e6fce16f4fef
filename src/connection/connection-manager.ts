/**
 * Connection Manager: owns the link to one server.
 *
 * Requests are queued on a priority queue and sent by a single dispatcher
 * task that respects `maxConcurrentRequests`, so priority applies at the
 * moment a slot frees up. Urgent messages (heartbeats) are sent even when
 * every slot is taken. Each request is tracked as a pending entry with
 * an absolute deadline and settles exactly once: by response, deadline,
 * cancellation or close. Around every attempt the circuit breaker is
 * consulted, transient failures are retried with exponential backoff, and
 * the outcome feeds the breaker.
 *
 * Inbound messages (notifications and server requests) land on a second
 * queue drained by one router task, so handlers see them in arrival order.
 */

import {
  createErrorResponse,
  createNotification,
  createRequest,
  createResponse,
  METHOD_NOT_FOUND,
  parseMessage,
  unwrapResponse,
} from "../jsonrpc.js";
import type { ParsedMessage } from "../jsonrpc.js";
import {
  CircuitOpenError,
  QueueFullError,
  RemoteError,
  RequestCancelledError,
  RequestTimeoutError,
  SessionClosedError,
  TransportError,
  errorMessage,
  isRetryable,
} from "../errors.js";
import type { Logger } from "../logger.js";
import { PriorityMessageQueue } from "../queue/priority-queue.js";
import type { QueueStats } from "../queue/priority-queue.js";
import type { JsonRpcNotification, JsonRpcRequest, MessagePriority } from "../types.js";
import type { Transport } from "../transport/transport.js";
import type {
  CircuitBreakerConfigType,
  HeartbeatConfigType,
  RetryConfigType,
} from "../config-schema.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import type { CircuitBreakerSnapshot, CircuitBreakerTicket } from "./circuit-breaker.js";
import { computeBackoffDelay } from "./retry-policy.js";
import { HeartbeatMonitor } from "./heartbeat.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Method name of resource update notifications, routed ahead of the rest. */
export const RESOURCE_UPDATED_METHOD = "notifications/resources/updated";

export interface RequestOptions {
  /** Default: "normal". */
  readonly priority?: MessagePriority;
  /** Deadline measured from the call; defaults to the session's request timeout. */
  readonly timeoutMs?: number;
  /** Aborting rejects the request with RequestCancelledError. */
  readonly signal?: AbortSignal;
  /** Attempt budget for this request, overriding the retry policy. */
  readonly maxAttempts?: number;
}

/** Liveness of the session as judged by heartbeats. */
export type ConnectionHealth = "active" | "degraded";

export interface ConnectionManagerOptions {
  readonly serverName: string;
  readonly transport: Transport;
  readonly retry: RetryConfigType;
  readonly circuitBreaker: CircuitBreakerConfigType;
  readonly heartbeat: HeartbeatConfigType;
  readonly requestTimeoutMs: number;
  readonly maxConcurrentRequests: number;
  readonly queueMaxSize: number;
  /** Report a give-up once the breaker has stayed away from closed this long; 0 disables. */
  readonly giveUpAfterMs: number;
  readonly logger: Logger;
  /** Clock for the breaker and give-up window. Defaults to `Date.now`. */
  readonly now?: () => number;
  /** Jitter source. Defaults to `Math.random`. */
  readonly random?: () => number;
  /** Receives server notifications one at a time, in arrival order. */
  readonly onNotification?: (notification: JsonRpcNotification) => void | Promise<void>;
  readonly onHealthChange?: (health: ConnectionHealth, at: Date) => void;
  /** Called after every answered heartbeat, healthy or not before it. */
  readonly onHeartbeat?: (at: Date) => void;
  readonly onGiveUp?: (reason: string) => void;
}

export interface ConnectionStats {
  readonly totalRequests: number;
  readonly failedRequests: number;
  readonly timedOutRequests: number;
  /** Attempts that failed, retried or not. */
  readonly failedAttempts: number;
  readonly retries: number;
  readonly pendingRequests: number;
  readonly inFlight: number;
  readonly queue: QueueStats;
  readonly circuit: CircuitBreakerSnapshot;
  readonly health: ConnectionHealth;
  readonly lastHeartbeatAt: Date | null;
  readonly heartbeatFailures: number;
}

type Outcome = { readonly result: unknown } | { readonly error: Error };

type InboundMessage = Extract<ParsedMessage, { type: "request" | "notification" }>;

interface PendingRequest {
  readonly correlationId: number;
  readonly method: string;
  readonly params: Record<string, unknown> | undefined;
  readonly priority: MessagePriority;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly resolve: (result: unknown) => void;
  readonly reject: (error: Error) => void;
  settled: boolean;
  attempts: number;
  deadlineTimer: ReturnType<typeof setTimeout> | null;
  retryTimer: ReturnType<typeof setTimeout> | null;
  /** Aborts the transport call of the attempt in flight. */
  inFlight: AbortController | null;
  /** Breaker ticket held by the attempt in flight. */
  ticket: CircuitBreakerTicket | null;
  detachSignal: (() => void) | null;
}

// ---------------------------------------------------------------------------
// ConnectionManager
// ---------------------------------------------------------------------------

export class ConnectionManager {
  readonly serverName: string;

  private readonly options: ConnectionManagerOptions;
  private readonly transport: Transport;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly random: () => number;

  private readonly pending = new Map<number, PendingRequest>();
  private readonly outbound: PriorityMessageQueue<PendingRequest>;
  private readonly inbound: PriorityMessageQueue<InboundMessage>;
  private readonly attemptTasks = new Set<Promise<void>>();

  private dispatcher: Promise<void> = Promise.resolve();
  private router: Promise<void> = Promise.resolve();
  private slotWaiter: (() => void) | null = null;
  private heartbeat: HeartbeatMonitor | null = null;
  private closePromise: Promise<void> | null = null;
  private closeReason = "session closed";

  private started = false;
  private closing = false;
  private nextCorrelationId = 1;
  private inFlightCount = 0;
  private health: ConnectionHealth = "active";
  private lastHeartbeatAt: Date | null = null;
  /** When the breaker left closed; null while closed. */
  private unhealthySince: number | null = null;
  private gaveUp = false;

  private totalRequests = 0;
  private failedRequests = 0;
  private timedOutRequests = 0;
  private failedAttempts = 0;
  private retries = 0;

  constructor(options: ConnectionManagerOptions) {
    this.options = options;
    this.serverName = options.serverName;
    this.transport = options.transport;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;

    this.breaker = new CircuitBreaker({
      failureThreshold: options.circuitBreaker.failureThreshold,
      recoveryTimeoutMs: options.circuitBreaker.recoveryTimeoutMs,
      now: this.now,
    });
    this.breaker.onStateChange((next, previous) => {
      this.logger.info(`Circuit ${previous} -> ${next}`);
      if (next === "closed") {
        this.unhealthySince = null;
      } else if (previous === "closed") {
        this.unhealthySince = this.now();
      }
    });

    this.outbound = new PriorityMessageQueue({ maxSize: options.queueMaxSize });
    this.inbound = new PriorityMessageQueue({ maxSize: options.queueMaxSize });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Start the transport and the dispatcher and router tasks.
   *
   * @throws {TransportError} If the transport cannot start.
   */
  async start(): Promise<void> {
    if (this.started) return;
    if (this.closing) {
      throw new SessionClosedError(this.serverName, this.closeReason);
    }
    this.started = true;

    this.transport.onMessage((serialized) => this.receive(serialized));
    await this.transport.start();

    this.dispatcher = this.runDispatcher();
    this.router = this.runRouter();
  }

  /** Open the server-initiated message channel. */
  async listen(): Promise<void> {
    await this.transport.listen();
  }

  /** Begin periodic pings, if heartbeats are enabled. */
  startHeartbeat(): void {
    if (!this.options.heartbeat.enabled || this.heartbeat !== null || this.closing) return;

    this.heartbeat = new HeartbeatMonitor({
      intervalMs: this.options.heartbeat.intervalMs,
      failureThreshold: this.options.heartbeat.failureThreshold,
      probe: () => this.ping(),
      onSuccess: (at) => {
        this.lastHeartbeatAt = at;
        this.setHealth("active", at);
        this.options.onHeartbeat?.(at);
      },
      onDegraded: (failures, error) => {
        if (this.health !== "degraded") {
          this.logger.warn(`Session degraded after ${failures} failed heartbeats`, {
            error: errorMessage(error),
          });
        }
        this.setHealth("degraded", new Date());
      },
      onTick: () => this.checkGiveUp(),
      logger: this.logger,
    });
    this.heartbeat.start();
  }

  /**
   * Tear the connection down. Every pending request rejects with
   * SessionClosedError; both queues close; the transport closes last.
   * Safe to call more than once.
   */
  close(reason = "session closed"): Promise<void> {
    if (this.closePromise === null) {
      this.closePromise = this.shutdown(reason);
    }
    return this.closePromise;
  }

  get isClosed(): boolean {
    return this.closing;
  }

  // -------------------------------------------------------------------------
  // Requests
  // -------------------------------------------------------------------------

  /**
   * Send a request and wait for its result.
   *
   * Rejects without touching the transport when the session is closing or
   * the breaker refuses calls.
   *
   * @returns The `result` member of the response.
   * @throws {CircuitOpenError} When the breaker is open or its probe is taken.
   * @throws {SessionClosedError} When the connection is closing.
   * @throws {RequestTimeoutError} When the deadline passes first.
   * @throws {RequestCancelledError} When the signal aborts first.
   * @throws {RemoteError} When the server answers with an error object.
   * @throws {TransportError} When attempts are exhausted on connectivity failures.
   * @throws {ProtocolError} When the answer is not a valid response.
   * @throws {QueueFullError} When the outbound queue is at capacity.
   */
  request(
    method: string,
    params?: Record<string, unknown>,
    options: RequestOptions = {}
  ): Promise<unknown> {
    if (this.closing) {
      return Promise.reject(new SessionClosedError(this.serverName, this.closeReason));
    }
    if (!this.breaker.wouldAllow()) {
      this.checkGiveUp();
      const snapshot = this.breaker.snapshot();
      return Promise.reject(
        new CircuitOpenError(this.serverName, snapshot.state, snapshot.retryAt)
      );
    }
    const { signal } = options;
    if (signal?.aborted === true) {
      return Promise.reject(new RequestCancelledError(method, signal.reason));
    }

    this.totalRequests += 1;
    const timeoutMs = options.timeoutMs ?? this.options.requestTimeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      const pending: PendingRequest = {
        correlationId: this.nextCorrelationId++,
        method,
        params,
        priority: options.priority ?? "normal",
        timeoutMs,
        maxAttempts: options.maxAttempts ?? this.options.retry.maxAttempts,
        resolve,
        reject,
        settled: false,
        attempts: 0,
        deadlineTimer: null,
        retryTimer: null,
        inFlight: null,
        ticket: null,
        detachSignal: null,
      };
      this.pending.set(pending.correlationId, pending);
      pending.deadlineTimer = setTimeout(() => this.expire(pending), timeoutMs);

      if (signal !== undefined) {
        const onAbort = (): void => this.cancel(pending, signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });
        pending.detachSignal = () => signal.removeEventListener("abort", onAbort);
      }

      this.enqueue(pending);
    });
  }

  /** Send a notification; no answer is expected. */
  async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    if (this.closing) {
      throw new SessionClosedError(this.serverName, this.closeReason);
    }
    await this.transport.post(JSON.stringify(createNotification(method, params)));
  }

  // -------------------------------------------------------------------------
  // Observability
  // -------------------------------------------------------------------------

  get circuit(): CircuitBreakerSnapshot {
    return this.breaker.snapshot();
  }

  get currentHealth(): ConnectionHealth {
    return this.health;
  }

  get lastHeartbeat(): Date | null {
    return this.lastHeartbeatAt;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  stats(): ConnectionStats {
    return {
      totalRequests: this.totalRequests,
      failedRequests: this.failedRequests,
      timedOutRequests: this.timedOutRequests,
      failedAttempts: this.failedAttempts,
      retries: this.retries,
      pendingRequests: this.pending.size,
      inFlight: this.inFlightCount,
      queue: this.outbound.stats(),
      circuit: this.breaker.snapshot(),
      health: this.health,
      lastHeartbeatAt: this.lastHeartbeatAt,
      heartbeatFailures: this.heartbeat?.consecutiveFailures ?? 0,
    };
  }

  // -------------------------------------------------------------------------
  // Outbound
  // -------------------------------------------------------------------------

  private enqueue(pending: PendingRequest): void {
    try {
      this.outbound.enqueue(pending, pending.priority, "outbound");
      if (pending.priority === "urgent") this.releaseSlot();
    } catch (error) {
      const failure =
        error instanceof QueueFullError
          ? error
          : new SessionClosedError(this.serverName, this.closeReason);
      this.settle(pending, { error: failure });
    }
  }

  private async runDispatcher(): Promise<void> {
    for (;;) {
      await this.waitForSlot();
      if (this.closing) return;

      // Past the cap only urgent messages go out; waitForSlot saw one at the head.
      const atCapacity = this.inFlightCount >= this.options.maxConcurrentRequests;
      const message = atCapacity ? this.outbound.tryDequeue() : await this.outbound.dequeue();
      if (message === undefined) {
        if (atCapacity) continue;
        return;
      }

      const pending = message.payload;
      if (pending.settled) continue;

      this.inFlightCount += 1;
      const task: Promise<void> = this.attempt(pending).finally(() => {
        this.inFlightCount -= 1;
        this.attemptTasks.delete(task);
        this.releaseSlot();
      });
      this.attemptTasks.add(task);
    }
  }

  /** Resolves once a slot is free or an urgent message is at the head. */
  private async waitForSlot(): Promise<void> {
    while (
      !this.closing &&
      this.inFlightCount >= this.options.maxConcurrentRequests &&
      this.outbound.peek()?.priority !== "urgent"
    ) {
      await new Promise<void>((resolve) => {
        this.slotWaiter = resolve;
      });
    }
  }

  private releaseSlot(): void {
    const waiter = this.slotWaiter;
    this.slotWaiter = null;
    waiter?.();
  }

  /** One attempt of one request. Never rejects. */
  private async attempt(pending: PendingRequest): Promise<void> {
    const ticket = this.breaker.tryAcquire();
    if (!ticket.allowed) {
      this.settle(pending, {
        error: new CircuitOpenError(this.serverName, ticket.state, ticket.retryAt),
      });
      return;
    }

    const controller = new AbortController();
    pending.ticket = ticket;
    pending.inFlight = controller;
    pending.attempts += 1;

    const request = createRequest(pending.method, pending.params, pending.correlationId);
    let outcome: Outcome;
    try {
      const serialized = await this.transport.send(JSON.stringify(request), {
        signal: controller.signal,
      });
      outcome = { result: unwrapResponse(serialized, pending.correlationId) };
    } catch (error) {
      outcome = { error: error instanceof Error ? error : new TransportError(String(error)) };
    }
    pending.ticket = null;
    pending.inFlight = null;

    if (pending.settled) {
      // Deadline, cancellation or close got there first and did the accounting.
      ticket.release();
      this.logger.debug(`Discarding late outcome of "${pending.method}"`, {
        id: pending.correlationId,
      });
      return;
    }

    if ("result" in outcome) {
      ticket.succeed();
      this.settle(pending, outcome);
      return;
    }
    this.handleAttemptFailure(pending, ticket, outcome.error);
  }

  private handleAttemptFailure(
    pending: PendingRequest,
    ticket: CircuitBreakerTicket,
    error: Error
  ): void {
    if (error instanceof RemoteError) {
      // The server answered, so it is alive.
      ticket.succeed();
      this.settle(pending, { error });
      return;
    }

    ticket.fail();
    this.failedAttempts += 1;
    this.checkGiveUp();

    if (!isRetryable(error) || pending.attempts >= pending.maxAttempts || this.closing) {
      this.settle(pending, { error });
      return;
    }

    const delay = computeBackoffDelay(pending.attempts - 1, this.options.retry, this.random);
    this.retries += 1;
    this.logger.warn(
      `"${pending.method}" failed (attempt ${pending.attempts}/${pending.maxAttempts}); retrying in ${Math.round(delay)}ms`,
      { error: error.message }
    );
    pending.retryTimer = setTimeout(() => {
      pending.retryTimer = null;
      if (!pending.settled) this.enqueue(pending);
    }, delay);
  }

  // -------------------------------------------------------------------------
  // Settlement
  // -------------------------------------------------------------------------

  private expire(pending: PendingRequest): void {
    if (pending.settled) return;
    const ticket = pending.ticket;
    pending.ticket = null;

    this.timedOutRequests += 1;
    this.settle(pending, {
      error: new RequestTimeoutError(
        `Request "${pending.method}" to "${this.serverName}" timed out after ${pending.timeoutMs}ms`,
        pending.timeoutMs
      ),
    });

    if (ticket !== null) {
      this.failedAttempts += 1;
      ticket.fail();
      this.checkGiveUp();
    }
  }

  private cancel(pending: PendingRequest, reason: unknown): void {
    if (pending.settled) return;
    pending.ticket?.release();
    pending.ticket = null;
    this.settle(pending, { error: new RequestCancelledError(pending.method, reason) });
  }

  /** Resolve or reject a pending request. Later calls are no-ops. */
  private settle(pending: PendingRequest, outcome: Outcome): void {
    if (pending.settled) return;
    pending.settled = true;

    if (pending.deadlineTimer !== null) clearTimeout(pending.deadlineTimer);
    if (pending.retryTimer !== null) clearTimeout(pending.retryTimer);
    pending.deadlineTimer = null;
    pending.retryTimer = null;
    pending.detachSignal?.();
    pending.inFlight?.abort();
    this.pending.delete(pending.correlationId);
    this.outbound.remove((message) => message.payload === pending);

    if ("error" in outcome) {
      this.failedRequests += 1;
      pending.reject(outcome.error);
    } else {
      pending.resolve(outcome.result);
    }
  }

  // -------------------------------------------------------------------------
  // Inbound
  // -------------------------------------------------------------------------

  private receive(serialized: string): void {
    if (this.closing) return;

    let parsed: ParsedMessage;
    try {
      parsed = parseMessage(serialized);
    } catch (error) {
      this.logger.warn("Ignoring malformed inbound message", { error: errorMessage(error) });
      return;
    }
    if (parsed.type === "response") {
      this.logger.debug("Ignoring unsolicited response", { id: parsed.message.id });
      return;
    }

    const priority: MessagePriority =
      parsed.type === "notification" && parsed.message.method === RESOURCE_UPDATED_METHOD
        ? "high"
        : "normal";
    try {
      this.inbound.enqueue(parsed, priority, "inbound");
    } catch (error) {
      this.logger.warn("Dropping inbound message", { error: errorMessage(error) });
    }
  }

  private async runRouter(): Promise<void> {
    for (;;) {
      const message = await this.inbound.dequeue();
      if (message === undefined) return;

      const inbound = message.payload;
      try {
        if (inbound.type === "request") {
          await this.answerServerRequest(inbound.message);
        } else {
          await this.options.onNotification?.(inbound.message);
        }
      } catch (error) {
        this.logger.error(`Handling inbound "${inbound.message.method}" failed`, {
          error: errorMessage(error),
        });
      }
    }
  }

  /** Servers may ping the client; anything else is not offered. */
  private async answerServerRequest(request: JsonRpcRequest): Promise<void> {
    const reply =
      request.method === "ping"
        ? createResponse(request.id, {})
        : createErrorResponse(request.id, METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    await this.transport.post(JSON.stringify(reply));
  }

  // -------------------------------------------------------------------------
  // Health
  // -------------------------------------------------------------------------

  /** Heartbeat probe: one urgent attempt; a refusal by the breaker is no verdict. */
  private async ping(): Promise<"ok" | "skipped"> {
    try {
      await this.request("ping", undefined, {
        priority: "urgent",
        timeoutMs: this.options.heartbeat.timeoutMs,
        maxAttempts: 1,
      });
    } catch (error) {
      if (error instanceof RemoteError) return "ok";
      if (
        error instanceof CircuitOpenError ||
        error instanceof SessionClosedError ||
        error instanceof QueueFullError
      ) {
        return "skipped";
      }
      throw error;
    }
    return "ok";
  }

  private setHealth(health: ConnectionHealth, at: Date): void {
    if (this.health === health) return;
    this.health = health;
    this.options.onHealthChange?.(health, at);
  }

  private checkGiveUp(): void {
    const { giveUpAfterMs } = this.options;
    if (this.gaveUp || this.closing || giveUpAfterMs <= 0 || this.unhealthySince === null) return;
    const elapsed = this.now() - this.unhealthySince;
    if (elapsed < giveUpAfterMs) return;

    this.gaveUp = true;
    const reason = `circuit not closed for ${elapsed}ms`;
    this.logger.error(`Giving up on "${this.serverName}": ${reason}`);
    this.options.onGiveUp?.(reason);
  }

  private async shutdown(reason: string): Promise<void> {
    this.closing = true;
    this.closeReason = reason;

    for (const pending of [...this.pending.values()]) {
      pending.ticket?.release();
      pending.ticket = null;
      this.settle(pending, { error: new SessionClosedError(this.serverName, reason) });
    }
    this.outbound.clear();
    this.outbound.close();
    this.inbound.clear();
    this.inbound.close();
    this.releaseSlot();

    if (this.heartbeat !== null) {
      await this.heartbeat.stop();
    }
    await Promise.all([this.dispatcher, this.router, ...this.attemptTasks]);

    try {
      await this.transport.close();
    } catch (error) {
      this.logger.warn("Transport close failed", { error: errorMessage(error) });
    }
  }
}
