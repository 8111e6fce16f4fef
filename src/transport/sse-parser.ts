/**
 * Server-Sent Events (SSE) stream parser.
 *
 * Implements the event-stream interpretation algorithm of the WHATWG HTML
 * standard. Text is fed in arbitrary slices with {@link SSEParser.push};
 * {@link SSEParser.parse} wraps that for a byte stream such as a fetch
 * response body.
 *
 * @see https://html.spec.whatwg.org/multipage/server-sent-events.html#event-stream-interpretation
 */

/** A parsed Server-Sent Event. */
export interface SSEEvent {
  /** The `event:` field, "message" when absent. */
  readonly event: string;
  /** All `data:` lines of the event joined with "\n". */
  readonly data: string;
  readonly id?: string;
  /** Reconnection delay announced by the server, in milliseconds. */
  readonly retry?: number;
}

const LINE_BREAK = /\r\n|\r|\n/;

export class SSEParser {
  // Sticky across events.
  private retry: number | undefined;
  private lastId = "";

  // Current event.
  private type = "";
  private data: string[] = [];
  private id: string | undefined;

  /** Text after the last line break seen so far. */
  private partial = "";
  /** A "\r" ended the previous slice; a leading "\n" belongs to it. */
  private pendingCR = false;
  private readonly decoder = new TextDecoder();

  /** Last `retry:` value received, if any. */
  get retryMs(): number | undefined {
    return this.retry;
  }

  /** Last `id:` value received; "" before the first one. */
  get lastEventId(): string {
    return this.lastId;
  }

  /**
   * Feed a slice of text.
   *
   * @returns Events completed by this slice, in order.
   */
  push(text: string): SSEEvent[] {
    let chunk = text;
    if (this.pendingCR && chunk.startsWith("\n")) {
      chunk = chunk.slice(1);
    }
    this.pendingCR = chunk.endsWith("\r");

    const lines = (this.partial + chunk).split(LINE_BREAK);
    this.partial = lines.pop() ?? "";

    const events: SSEEvent[] = [];
    for (const line of lines) {
      const event = this.line(line);
      if (event !== null) events.push(event);
    }
    return events;
  }

  /**
   * Signal end of stream: an unterminated last line is processed and any
   * accumulated event dispatched.
   */
  finish(): SSEEvent[] {
    const events: SSEEvent[] = [];
    const tail = this.partial + this.decoder.decode();
    this.partial = "";
    if (tail.length > 0) {
      const event = this.line(tail);
      if (event !== null) events.push(event);
    }
    const last = this.dispatch();
    if (last !== null) events.push(last);
    return events;
  }

  /**
   * Parse a whole byte stream.
   *
   * @yields Events as soon as they are complete.
   */
  async *parse(input: AsyncIterable<Uint8Array>): AsyncGenerator<SSEEvent> {
    for await (const bytes of input) {
      yield* this.push(this.decoder.decode(bytes, { stream: true }));
    }
    yield* this.finish();
  }

  private line(line: string): SSEEvent | null {
    if (line === "") return this.dispatch();
    if (line.startsWith(":")) return null;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    if (field === "event") {
      this.type = value;
    } else if (field === "data") {
      this.data.push(value);
    } else if (field === "id" && !value.includes("\0")) {
      this.id = value;
      this.lastId = value;
    } else if (field === "retry" && /^\d+$/.test(value)) {
      this.retry = Number.parseInt(value, 10);
    }
    return null;
  }

  private dispatch(): SSEEvent | null {
    const hasData = this.data.length > 0;
    const event: SSEEvent = {
      event: this.type === "" ? "message" : this.type,
      data: this.data.join("\n"),
      ...(this.id !== undefined ? { id: this.id } : {}),
      ...(this.retry !== undefined ? { retry: this.retry } : {}),
    };
    this.type = "";
    this.data = [];
    this.id = undefined;
    return hasData ? event : null;
  }
}

/**
 * Parse an SSE byte stream without keeping the parser around.
 *
 * @yields Parsed events.
 */
export async function* parseSSEStream(
  input: AsyncIterable<Uint8Array>
): AsyncGenerator<SSEEvent> {
  yield* new SSEParser().parse(input);
}
