/**
 * Scriptable in-memory transport.
 *
 * Each request method gets a handler deciding the reply: a result, a
 * JSON-RPC error, a raw string, a thrown error (a transport failure), or a
 * promise that never settles until the attempt is aborted. Everything sent
 * is recorded for assertions; `emit()` pushes server-initiated messages.
 */

import {
  createErrorResponse,
  createNotification,
  createResponse,
  METHOD_NOT_FOUND,
  parseMessage,
} from "../../src/jsonrpc.js";
import { TransportError } from "../../src/errors.js";
import type { Transport, TransportSendOptions } from "../../src/transport/transport.js";
import type { JsonRpcMessage, JsonRpcRequest } from "../../src/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FakeReply =
  | { readonly result: unknown }
  | { readonly error: { readonly code: number; readonly message: string } }
  | { readonly raw: string };

export type FakeHandler = (
  request: JsonRpcRequest,
  signal: AbortSignal | undefined
) => FakeReply | Promise<FakeReply>;

export const DEFAULT_INITIALIZE_RESULT = {
  protocolVersion: "2025-03-26",
  capabilities: { tools: {}, resources: { subscribe: true } },
  serverInfo: { name: "fake-league-server", version: "1.0.0" },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A reply that never comes; the attempt fails once its signal aborts. */
export function hang(signal: AbortSignal | undefined): Promise<FakeReply> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new TransportError("aborted")), {
      once: true,
    });
  });
}

/** Resolve after `ms` real milliseconds. */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Let pending promise callbacks and zero-delay timers run. */
export async function flush(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

// ---------------------------------------------------------------------------
// FakeTransport
// ---------------------------------------------------------------------------

export class FakeTransport implements Transport {
  /** Requests in the order they reached the transport, retries included. */
  readonly sent: JsonRpcRequest[] = [];
  /** Notifications and responses posted by the client. */
  readonly posted: JsonRpcMessage[] = [];

  started = false;
  listening = false;
  closed = false;
  startError: Error | null = null;

  private readonly handlers = new Map<string, FakeHandler>();
  private messageHandler: ((serializedMessage: string) => void) | null = null;

  constructor(handlers: Record<string, FakeHandler> = {}) {
    this.handlers.set("initialize", () => ({ result: DEFAULT_INITIALIZE_RESULT }));
    this.handlers.set("ping", () => ({ result: {} }));
    this.handlers.set("tools/list", () => ({ result: { tools: [] } }));
    this.handlers.set("resources/list", () => ({ result: { resources: [] } }));
    for (const [method, handler] of Object.entries(handlers)) {
      this.handlers.set(method, handler);
    }
  }

  /** Replace the handler of a method. */
  on(method: string, handler: FakeHandler): void {
    this.handlers.set(method, handler);
  }

  /** Requests sent for one method. */
  requestsFor(method: string): JsonRpcRequest[] {
    return this.sent.filter((request) => request.method === method);
  }

  /** Push a server-initiated message to the client. */
  emit(message: object): void {
    this.messageHandler?.(JSON.stringify(message));
  }

  emitNotification(method: string, params?: Record<string, unknown>): void {
    this.emit(createNotification(method, params));
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  async start(): Promise<void> {
    if (this.startError !== null) throw this.startError;
    this.started = true;
  }

  async listen(): Promise<void> {
    this.listening = true;
  }

  async send(serializedRequest: string, options: TransportSendOptions = {}): Promise<string> {
    if (this.closed) throw new TransportError("Transport is closed");
    const parsed = parseMessage(serializedRequest);
    if (parsed.type !== "request") {
      throw new Error(`FakeTransport.send got a ${parsed.type}`);
    }
    const request = parsed.message;
    this.sent.push(request);

    const handler = this.handlers.get(request.method);
    if (handler === undefined) {
      return JSON.stringify(
        createErrorResponse(request.id, METHOD_NOT_FOUND, `Method not found: ${request.method}`)
      );
    }

    const reply = await handler(request, options.signal);
    if ("raw" in reply) return reply.raw;
    if ("error" in reply) {
      return JSON.stringify(createErrorResponse(request.id, reply.error.code, reply.error.message));
    }
    return JSON.stringify(createResponse(request.id, reply.result));
  }

  async post(serializedMessage: string): Promise<void> {
    if (this.closed) throw new TransportError("Transport is closed");
    this.posted.push(parseMessage(serializedMessage).message);
  }

  onMessage(handler: (serializedMessage: string) => void): void {
    this.messageHandler = handler;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
