/**
 * stdio transport for MCP servers reached over a pair of byte streams.
 *
 * Messages are newline-delimited JSON. The streams are either those of a
 * spawned subprocess (stdin/stdout, with stderr forwarded to the logger and
 * bounded auto-restart on unexpected exit) or any readable/writable pair
 * handed in directly, such as the two ends of an in-process pipe.
 *
 * @see https://modelcontextprotocol.io/specification/2025-03-26/basic/transports
 */

import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { createInterface } from "node:readline";
import type { Interface as ReadlineInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import { parseMessage, peekRequestId } from "../jsonrpc.js";
import { ProtocolError, TransportError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Transport, TransportSendOptions } from "./transport.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** The two directions of a stdio link, seen from the client. */
export interface StdioChannel {
  /** Lines written by the server. */
  readonly input: Readable;
  /** Lines read by the server. */
  readonly output: Writable;
}

/** Spawn a subprocess and talk over its stdin/stdout. */
export interface StdioSpawnConfig {
  readonly kind: "spawn";
  /** The command to execute (e.g., "node", "npx"). */
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  /** Maximum number of automatic restart attempts on unexpected exit (default: 3). */
  readonly maxRestartAttempts?: number;
  /** Timeout in milliseconds to wait for graceful shutdown before SIGKILL (default: 5000). */
  readonly shutdownTimeoutMs?: number;
}

/** Use an existing stream pair. */
export interface StdioStreamConfig {
  readonly kind: "streams";
  readonly channel: StdioChannel;
}

export type StdioTransportConfig = StdioSpawnConfig | StdioStreamConfig;

const DEFAULT_MAX_RESTART_ATTEMPTS = 3;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

/** A `send()` waiting for the line that carries its response. */
interface PendingExchange {
  readonly resolve: (serializedResponse: string) => void;
  readonly reject: (error: Error) => void;
}

// ---------------------------------------------------------------------------
// StdioTransport
// ---------------------------------------------------------------------------

export class StdioTransport implements Transport {
  private readonly config: StdioTransportConfig;
  private readonly logger: Logger;

  private process: ChildProcess | null = null;
  private channel: StdioChannel | null = null;
  private stdoutReader: ReadlineInterface | null = null;
  private stderrReader: ReadlineInterface | null = null;
  private restartCount = 0;
  private stoppingIntentionally = false;

  private messageHandler: ((serializedMessage: string) => void) | null = null;
  private readonly pendingExchanges = new Map<string | number, PendingExchange>();

  constructor(config: StdioTransportConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Attach to the streams (spawning the subprocess when configured to).
   *
   * @throws {TransportError} If the transport was closed.
   */
  async start(): Promise<void> {
    if (this.channel !== null) return;
    if (this.stoppingIntentionally) {
      throw new TransportError("Transport is closed");
    }

    if (this.config.kind === "spawn") {
      this.spawnProcess(this.config);
    } else {
      this.attach(this.config.channel);
    }
  }

  /** Lines are read from the moment the transport starts. */
  async listen(): Promise<void> {}

  /**
   * Write a request line and wait for the line whose id matches.
   *
   * @throws {ProtocolError} If the request carries no id.
   * @throws {TransportError} If the channel is down, the write fails, the
   *   channel closes first, or the signal aborts.
   */
  send(serializedRequest: string, options: TransportSendOptions = {}): Promise<string> {
    const id = peekRequestId(serializedRequest);
    if (id === undefined) {
      return Promise.reject(new ProtocolError("Cannot send a request without an id"));
    }
    const { signal } = options;
    if (signal?.aborted === true) {
      return Promise.reject(new TransportError("Request aborted before it was written"));
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.pendingExchanges.delete(id)) {
          reject(new TransportError(`Request ${id} aborted`));
        }
      };
      this.pendingExchanges.set(id, {
        resolve: (line) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(line);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      });
      signal?.addEventListener("abort", onAbort, { once: true });

      this.writeLine(serializedRequest).catch((error: unknown) => {
        const pending = this.pendingExchanges.get(id);
        if (pending !== undefined) {
          this.pendingExchanges.delete(id);
          pending.reject(error instanceof Error ? error : new TransportError(String(error)));
        }
      });
    });
  }

  async post(serializedMessage: string): Promise<void> {
    await this.writeLine(serializedMessage);
  }

  /**
   * Register the handler for lines that answer no pending request.
   * Only one handler can be registered at a time.
   */
  onMessage(handler: (serializedMessage: string) => void): void {
    this.messageHandler = handler;
  }

  /**
   * Close the channel. Pending requests fail with TransportError; a spawned
   * subprocess gets SIGTERM, then SIGKILL after the shutdown timeout.
   */
  async close(): Promise<void> {
    this.stoppingIntentionally = true;
    this.rejectAllPending(new TransportError("Transport is shutting down"));
    this.cleanupReaders();

    const channel = this.channel;
    this.channel = null;
    if (channel !== null && !channel.output.destroyed) {
      channel.output.end();
    }

    const proc = this.process;
    this.process = null;
    if (proc === null || proc.exitCode !== null || proc.killed) return;

    const shutdownTimeoutMs =
      this.config.kind === "spawn"
        ? this.config.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS
        : DEFAULT_SHUTDOWN_TIMEOUT_MS;

    await new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        if (proc.exitCode === null) proc.kill("SIGKILL");
      }, shutdownTimeoutMs);
      proc.once("exit", () => {
        clearTimeout(killTimer);
        resolve();
      });
      proc.kill("SIGTERM");
    });
  }

  isRunning(): boolean {
    return this.channel !== null;
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private spawnProcess(config: StdioSpawnConfig): void {
    const child = spawn(config.command, [...config.args], {
      stdio: ["pipe", "pipe", "pipe"],
      env: { ...process.env, ...config.env },
    });
    this.process = child;

    child.on("error", (err: Error) => {
      this.logger.error(`Failed to spawn subprocess "${config.command}": ${err.message}`);
      this.handleChannelLoss(new TransportError(`Subprocess error: ${err.message}`, err));
    });

    child.on("exit", (code: number | null, signal: string | null) => {
      if (this.stoppingIntentionally) return;
      this.logger.warn(
        `Subprocess exited unexpectedly (code=${String(code)}, signal=${String(signal)})`
      );
      this.handleChannelLoss(new TransportError("Subprocess exited unexpectedly"));
    });

    if (child.stderr !== null) {
      this.stderrReader = createInterface({ input: child.stderr });
      this.stderrReader.on("line", (line: string) => {
        this.logger.debug(`stderr: ${line}`);
      });
    }

    if (child.stdin === null || child.stdout === null) {
      throw new TransportError(`Subprocess "${config.command}" has no stdio pipes`);
    }
    this.attach({ input: child.stdout, output: child.stdin });
  }

  private attach(channel: StdioChannel): void {
    this.channel = channel;
    this.stdoutReader = createInterface({ input: channel.input });
    this.stdoutReader.on("line", (line: string) => {
      this.handleLine(line);
    });
    if (this.config.kind === "streams") {
      channel.input.once("end", () => {
        if (!this.stoppingIntentionally) {
          this.handleChannelLoss(new TransportError("Input stream ended"));
        }
      });
    }
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (trimmed.length === 0) return;

    let parsed: ReturnType<typeof parseMessage>;
    try {
      parsed = parseMessage(trimmed);
    } catch (error) {
      this.logger.warn(`Ignoring invalid line: ${trimmed.substring(0, 200)}`, {
        error: errorMessage(error),
      });
      return;
    }

    if (parsed.type === "response" && parsed.message.id !== null) {
      const pending = this.pendingExchanges.get(parsed.message.id);
      if (pending !== undefined) {
        this.pendingExchanges.delete(parsed.message.id);
        pending.resolve(trimmed);
        return;
      }
      this.logger.debug(`Dropping response to unknown request ${parsed.message.id}`);
      return;
    }

    this.messageHandler?.(trimmed);
  }

  /** Fail whatever waits on the lost channel, then restart a subprocess if allowed. */
  private handleChannelLoss(error: TransportError): void {
    this.rejectAllPending(error);
    this.cleanupReaders();
    this.channel = null;
    this.process = null;

    if (this.stoppingIntentionally || this.config.kind !== "spawn") return;

    const maxRestartAttempts = this.config.maxRestartAttempts ?? DEFAULT_MAX_RESTART_ATTEMPTS;
    if (this.restartCount >= maxRestartAttempts) {
      this.logger.error(
        `Subprocess failed after ${maxRestartAttempts} restart attempts; giving up`
      );
      return;
    }
    this.restartCount += 1;
    this.spawnProcess(this.config);
  }

  private writeLine(serialized: string): Promise<void> {
    const channel = this.channel;
    if (channel === null || channel.output.destroyed || !channel.output.writable) {
      return Promise.reject(new TransportError("Cannot send message: channel is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      channel.output.write(`${serialized}\n`, "utf-8", (err) => {
        if (err) {
          reject(new TransportError(`Failed to write message: ${err.message}`, err));
        } else {
          resolve();
        }
      });
    });
  }

  private rejectAllPending(error: Error): void {
    const pending = [...this.pendingExchanges.values()];
    this.pendingExchanges.clear();
    for (const exchange of pending) {
      exchange.reject(error);
    }
  }

  private cleanupReaders(): void {
    if (this.stdoutReader !== null) {
      this.stdoutReader.close();
      this.stdoutReader = null;
    }
    if (this.stderrReader !== null) {
      this.stderrReader.close();
      this.stderrReader = null;
    }
  }
}
