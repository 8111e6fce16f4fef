/**
 * Three-tier priority message queue.
 *
 * All "urgent" messages leave before any "high" one, all "high" before any
 * "normal" one, and messages of the same tier leave in arrival order.
 * Consumers wait on {@link PriorityMessageQueue.dequeue} without polling.
 */

import { QueueFullError } from "../errors.js";
import { MESSAGE_PRIORITIES } from "../types.js";
import type { MessageDirection, MessagePriority } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** An entry of the queue. */
export interface QueuedMessage<T> {
  /** Monotonic id, unique within one queue. */
  readonly id: number;
  readonly priority: MessagePriority;
  readonly direction: MessageDirection;
  readonly payload: T;
  /** Epoch milliseconds at enqueue time. */
  readonly enqueuedAt: number;
}

export interface PriorityQueueOptions {
  /** Maximum number of queued messages; unbounded when omitted. */
  readonly maxSize?: number;
  /** Clock used for `enqueuedAt`. Defaults to `Date.now`. */
  readonly now?: () => number;
}

/** Counters exposed for health reporting. */
export interface QueueStats {
  readonly size: number;
  readonly byPriority: Readonly<Record<MessagePriority, number>>;
  readonly totalEnqueued: number;
  readonly totalDequeued: number;
  /** Messages refused because the queue was full. */
  readonly totalDropped: number;
  /** Messages taken out by `remove()` or `clear()`. */
  readonly totalRemoved: number;
  readonly closed: boolean;
}

interface Waiter<T> {
  readonly resolve: (message: QueuedMessage<T> | undefined) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

// ---------------------------------------------------------------------------
// PriorityMessageQueue
// ---------------------------------------------------------------------------

export class PriorityMessageQueue<T> {
  private readonly tiers: Record<MessagePriority, QueuedMessage<T>[]> = {
    urgent: [],
    high: [],
    normal: [],
  };
  private readonly waiters: Waiter<T>[] = [];
  private readonly maxSize: number;
  private readonly now: () => number;

  private nextId = 1;
  private closed = false;
  private totalEnqueued = 0;
  private totalDequeued = 0;
  private totalDropped = 0;
  private totalRemoved = 0;

  constructor(options: PriorityQueueOptions = {}) {
    this.maxSize = options.maxSize ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? Date.now;
  }

  /**
   * Add a message. If a consumer is waiting it receives the message at once.
   *
   * @returns The queued entry.
   * @throws {QueueFullError} When the queue holds `maxSize` messages.
   * @throws {Error} When the queue was closed.
   */
  enqueue(
    payload: T,
    priority: MessagePriority = "normal",
    direction: MessageDirection = "outbound"
  ): QueuedMessage<T> {
    if (this.closed) {
      throw new Error("Cannot enqueue on a closed queue");
    }
    if (this.size >= this.maxSize) {
      this.totalDropped++;
      throw new QueueFullError(this.maxSize);
    }

    const message: QueuedMessage<T> = Object.freeze({
      id: this.nextId++,
      priority,
      direction,
      payload,
      enqueuedAt: this.now(),
    });
    this.totalEnqueued++;

    // Waiters only exist while the queue is empty, so handing the message
    // straight over cannot overtake a higher-priority entry.
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      if (waiter.timer !== null) clearTimeout(waiter.timer);
      this.totalDequeued++;
      waiter.resolve(message);
      return message;
    }

    this.tiers[priority].push(message);
    return message;
  }

  /**
   * Remove and return the highest-priority message, waiting for one if the
   * queue is empty.
   *
   * @param timeoutMs - Give up after this long; waits indefinitely when omitted.
   * @returns The message, or undefined on timeout or when the queue closes.
   */
  dequeue(timeoutMs?: number): Promise<QueuedMessage<T> | undefined> {
    const ready = this.tryDequeue();
    if (ready !== undefined || this.closed) {
      return Promise.resolve(ready);
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(undefined);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Remove and return the highest-priority message without waiting. */
  tryDequeue(): QueuedMessage<T> | undefined {
    for (const priority of MESSAGE_PRIORITIES) {
      const message = this.tiers[priority].shift();
      if (message !== undefined) {
        this.totalDequeued++;
        return message;
      }
    }
    return undefined;
  }

  /** The message `tryDequeue()` would return, left in place. */
  peek(): QueuedMessage<T> | undefined {
    for (const priority of MESSAGE_PRIORITIES) {
      const message = this.tiers[priority][0];
      if (message !== undefined) return message;
    }
    return undefined;
  }

  /**
   * Drop every message matching the predicate.
   *
   * @returns How many messages were removed.
   */
  remove(predicate: (message: QueuedMessage<T>) => boolean): number {
    let removed = 0;
    for (const priority of MESSAGE_PRIORITIES) {
      const tier = this.tiers[priority];
      const kept = tier.filter((message) => !predicate(message));
      removed += tier.length - kept.length;
      this.tiers[priority] = kept;
    }
    this.totalRemoved += removed;
    return removed;
  }

  /**
   * Drop every queued message.
   *
   * @returns The dropped messages, highest priority first.
   */
  clear(): QueuedMessage<T>[] {
    const dropped = MESSAGE_PRIORITIES.flatMap((priority) => this.tiers[priority]);
    for (const priority of MESSAGE_PRIORITIES) {
      this.tiers[priority] = [];
    }
    this.totalRemoved += dropped.length;
    return dropped;
  }

  /**
   * Refuse further messages and wake every waiting consumer with undefined.
   * Messages already queued can still be drained with `tryDequeue()`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timer !== null) clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.tiers.urgent.length + this.tiers.high.length + this.tiers.normal.length;
  }

  sizeOf(priority: MessagePriority): number {
    return this.tiers[priority].length;
  }

  stats(): QueueStats {
    return {
      size: this.size,
      byPriority: {
        urgent: this.tiers.urgent.length,
        high: this.tiers.high.length,
        normal: this.tiers.normal.length,
      },
      totalEnqueued: this.totalEnqueued,
      totalDequeued: this.totalDequeued,
      totalDropped: this.totalDropped,
      totalRemoved: this.totalRemoved,
      closed: this.closed,
    };
  }
}
