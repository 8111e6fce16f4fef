/**
 * Transport contract shared by the HTTP and stdio transports.
 *
 * A transport moves serialized JSON-RPC messages and nothing else: it does
 * not retry, does not interpret payloads beyond framing, and reports
 * connectivity problems as {@link TransportError}.
 */

export interface TransportSendOptions {
  /** Aborting the signal abandons the exchange with a TransportError. */
  readonly signal?: AbortSignal;
}

export interface Transport {
  /** Open the underlying channel. */
  start(): Promise<void>;

  /**
   * Begin receiving server-initiated messages. Called once the session is
   * initialized; a no-op for transports that always listen.
   */
  listen(): Promise<void>;

  /**
   * Send one serialized request and resolve with the serialized response
   * that answers it.
   *
   * @throws {TransportError} On refusal, reset, or loss of the channel.
   * @throws {RequestTimeoutError} When the transport's own timeout elapses.
   */
  send(serializedRequest: string, options?: TransportSendOptions): Promise<string>;

  /** Send one serialized notification or response; no answer is expected. */
  post(serializedMessage: string): Promise<void>;

  /** Register the handler for inbound messages that answer no `send()`. */
  onMessage(handler: (serializedMessage: string) => void): void;

  close(): Promise<void>;
}
