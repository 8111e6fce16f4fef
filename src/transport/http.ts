/**
 * MCP Streamable HTTP transport.
 *
 * POST carries every client message; the answer is either a single
 * `application/json` body or a `text/event-stream` whose events may include
 * server notifications ahead of the response. GET opens the optional
 * server-initiated notification stream, resumed with `Last-Event-ID` after a
 * drop. DELETE terminates the session on close.
 *
 * @see https://modelcontextprotocol.io/specification/2025-03-26/basic/transports
 */

import { parseMessage, peekRequestId } from "../jsonrpc.js";
import {
  AuthRequiredError,
  ProtocolError,
  RequestTimeoutError,
  TransportError,
  errorMessage,
} from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep } from "../connection/retry-policy.js";
import { SSEParser } from "./sse-parser.js";
import type { SSEEvent } from "./sse-parser.js";
import type { Transport, TransportSendOptions } from "./transport.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Default timeout for one HTTP exchange in milliseconds. */
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Delay before reopening a dropped notification stream, unless the server set `retry:`. */
const DEFAULT_STREAM_RECONNECT_MS = 1_000;

export interface HttpTransportConfig {
  /** MCP server endpoint URL. */
  readonly url: string;
  /** Upper bound for one HTTP exchange, body included. Default: 30000. */
  readonly requestTimeoutMs?: number;
  /** Authorization header value (e.g., "Bearer <token>"). */
  readonly authorizationHeader?: string;
  /** Open the GET notification stream in `listen()`. Default: true. */
  readonly notificationStream?: boolean;
  readonly streamReconnectMs?: number;
}

/**
 * Determine the content type family from a Content-Type header value.
 *
 * @returns "json" for application/json, "sse" for text/event-stream, or "unknown".
 */
function classifyContentType(contentType: string | null): "json" | "sse" | "unknown" {
  if (contentType === null) return "unknown";
  const lower = contentType.toLowerCase();
  if (lower.includes("application/json")) return "json";
  if (lower.includes("text/event-stream")) return "sse";
  return "unknown";
}

// ---------------------------------------------------------------------------
// HttpTransport
// ---------------------------------------------------------------------------

export class HttpTransport implements Transport {
  private readonly url: string;
  private readonly requestTimeoutMs: number;
  private readonly authorizationHeader: string | null;
  private readonly notificationStream: boolean;
  private readonly streamReconnectMs: number;
  private readonly logger: Logger;

  /** The MCP session ID assigned by the server. */
  private sessionId: string | null = null;
  /** The last SSE event ID received, for resumability. */
  private lastEventId: string | null = null;

  private messageHandler: ((serializedMessage: string) => void) | null = null;
  private streamController: AbortController | null = null;
  private streamTask: Promise<void> | null = null;
  private closed = false;

  constructor(config: HttpTransportConfig, logger: Logger) {
    this.url = config.url;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.authorizationHeader = config.authorizationHeader ?? null;
    this.notificationStream = config.notificationStream ?? true;
    this.streamReconnectMs = config.streamReconnectMs ?? DEFAULT_STREAM_RECONNECT_MS;
    this.logger = logger;
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  /** HTTP is connectionless; starting only checks the transport is usable. */
  async start(): Promise<void> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
  }

  /** Open the notification stream in the background, once. */
  async listen(): Promise<void> {
    if (!this.notificationStream || this.streamTask !== null || this.closed) return;
    const controller = new AbortController();
    this.streamController = controller;
    this.streamTask = this.runNotificationStream(controller.signal);
  }

  /**
   * POST a request and return the serialized response with the same id.
   *
   * @throws {ProtocolError} If the request has no id, the status is a
   *   client error, or the body holds no usable response.
   * @throws {AuthRequiredError} On HTTP 401/403.
   * @throws {TransportError} On network failure, 408/429/5xx, or a stream
   *   that ends before the response.
   * @throws {RequestTimeoutError} If the exchange exceeds requestTimeoutMs.
   */
  async send(serializedRequest: string, options: TransportSendOptions = {}): Promise<string> {
    const id = peekRequestId(serializedRequest);
    if (id === undefined) {
      throw new ProtocolError("Cannot send a request without an id");
    }

    return this.exchange(serializedRequest, options.signal, async (response) => {
      const kind = classifyContentType(response.headers.get("Content-Type"));
      if (kind === "sse") {
        return this.readResponseFromStream(response, id);
      }
      const text = await response.text();
      if (text.trim().length === 0) {
        throw new ProtocolError(`Empty body in answer to request ${id}`);
      }
      return text;
    });
  }

  /** POST a notification or response; the server answers 202 without a body. */
  async post(serializedMessage: string): Promise<void> {
    await this.exchange(serializedMessage, undefined, async (response) => {
      // Drain so the connection can be reused.
      await response.arrayBuffer();
    });
  }

  /**
   * Register the handler for server-initiated messages.
   * Only one handler can be registered at a time.
   */
  onMessage(handler: (serializedMessage: string) => void): void {
    this.messageHandler = handler;
  }

  /** Stop the notification stream and terminate the server session. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.streamController?.abort();
    if (this.streamTask !== null) {
      await this.streamTask;
      this.streamTask = null;
    }

    await this.terminateSession();
  }

  /** The MCP session ID, or null before the server assigns one. */
  getSessionId(): string | null {
    return this.sessionId;
  }

  /** The last SSE event ID received, for stream resumability. */
  getLastEventId(): string | null {
    return this.lastEventId;
  }

  // -------------------------------------------------------------------------
  // Private Methods
  // -------------------------------------------------------------------------

  /**
   * Run one POST under the request timeout and the caller's signal, both of
   * which also cover reading the body in `consume`.
   */
  private async exchange<T>(
    body: string,
    signal: AbortSignal | undefined,
    consume: (response: Response) => Promise<T>
  ): Promise<T> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
    if (signal?.aborted === true) {
      throw new TransportError("Request aborted before it was sent");
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: this.buildHeaders("application/json, text/event-stream"),
        body,
        signal: controller.signal,
      });
      this.captureSessionId(response);
      await this.handleErrorStatus(response);
      return await consume(response);
    } catch (error) {
      if (timedOut) {
        throw new RequestTimeoutError(
          `HTTP exchange timed out after ${this.requestTimeoutMs}ms`,
          this.requestTimeoutMs
        );
      }
      if (error instanceof TransportError || error instanceof ProtocolError || error instanceof AuthRequiredError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new TransportError("Request aborted", error);
      }
      throw new TransportError(`HTTP request failed: ${errorMessage(error)}`, error);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Consume an event-stream answer until the response to `id` arrives.
   * Other messages on the stream go to the message handler.
   */
  private async readResponseFromStream(response: Response, id: string | number): Promise<string> {
    if (response.body === null) {
      throw new TransportError("Event-stream answer has no body");
    }

    const parser = new SSEParser();
    for await (const event of parser.parse(response.body)) {
      const matched = this.handleStreamEvent(event, id);
      if (matched !== null) {
        return matched;
      }
    }
    throw new TransportError(`Stream ended before the response to request ${id}`);
  }

  /**
   * Route one SSE event.
   *
   * @returns The event data when it is the response to `expectedId`, else null.
   */
  private handleStreamEvent(event: SSEEvent, expectedId?: string | number): string | null {
    if (event.id !== undefined) {
      this.lastEventId = event.id;
    }
    if (event.event !== "message") return null;

    let parsed: ReturnType<typeof parseMessage>;
    try {
      parsed = parseMessage(event.data);
    } catch (error) {
      this.logger.warn("Skipping malformed event-stream message", { error: errorMessage(error) });
      return null;
    }

    if (parsed.type === "response" && expectedId !== undefined && parsed.message.id === expectedId) {
      return event.data;
    }
    this.messageHandler?.(event.data);
    return null;
  }

  /** Keep the GET stream open, reopening it after drops until closed. */
  private async runNotificationStream(signal: AbortSignal): Promise<void> {
    while (!this.closed) {
      let delay = this.streamReconnectMs;
      try {
        const headers = this.buildHeaders("text/event-stream");
        if (this.lastEventId !== null) {
          headers["Last-Event-ID"] = this.lastEventId;
        }
        const response = await fetch(this.url, { method: "GET", headers, signal });

        if (response.status === 405) {
          this.logger.debug("Server offers no notification stream");
          return;
        }
        if (!response.ok || response.body === null) {
          throw new TransportError(`Notification stream refused with HTTP ${response.status}`);
        }

        const parser = new SSEParser();
        for await (const event of parser.parse(response.body)) {
          this.handleStreamEvent(event);
        }
        delay = parser.retryMs ?? delay;
        this.logger.debug("Notification stream ended; reopening");
      } catch (error) {
        if (this.closed) return;
        this.logger.warn("Notification stream lost", { error: errorMessage(error) });
      }
      await sleep(delay, signal);
    }
  }

  /** DELETE the session; failures are logged since the session is over anyway. */
  private async terminateSession(): Promise<void> {
    if (this.sessionId === null) return;
    const headers = this.buildHeaders("application/json");
    this.sessionId = null;
    try {
      const response = await fetch(this.url, { method: "DELETE", headers });
      await response.arrayBuffer();
    } catch (error) {
      this.logger.debug("Session termination failed", { error: errorMessage(error) });
    }
  }

  private buildHeaders(accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: accept,
    };
    if (this.sessionId !== null) {
      headers["Mcp-Session-Id"] = this.sessionId;
    }
    if (this.authorizationHeader !== null) {
      headers["Authorization"] = this.authorizationHeader;
    }
    return headers;
  }

  private captureSessionId(response: Response): void {
    const sessionId = response.headers.get("Mcp-Session-Id");
    if (sessionId !== null) {
      this.sessionId = sessionId;
    }
  }

  /**
   * Map a non-2xx status to the error taxonomy: 408, 429 and 5xx are
   * transient, 401/403 need credentials, other 4xx are protocol errors.
   * A 404 while holding a session id means the server forgot the session.
   * The body of a refused answer is read to the end so the socket is freed.
   */
  private async handleErrorStatus(response: Response): Promise<void> {
    if (response.ok) return;

    await response.arrayBuffer().catch((error: unknown) => {
      this.logger.debug("Could not drain error response body", { error: errorMessage(error) });
    });
    const status = response.status;
    if (status === 401 || status === 403) {
      throw new AuthRequiredError(`Server refused credentials (HTTP ${status})`, status);
    }
    if (status === 404 && this.sessionId !== null) {
      this.sessionId = null;
      throw new TransportError("Session expired: server returned 404");
    }
    if (status === 408 || status === 429 || status >= 500) {
      throw new TransportError(`HTTP ${status} ${response.statusText}`);
    }
    throw new ProtocolError(`HTTP ${status} ${response.statusText}`);
  }
}
