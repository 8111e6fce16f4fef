/**
 * Session Manager: one live session per server name.
 *
 * `connect()` builds the transport for an endpoint, starts a
 * {@link ConnectionManager} on it, runs the MCP initialize handshake, opens
 * the notification channel and starts the heartbeat. Concurrent connects to
 * the same server share one attempt; connecting an already connected server
 * returns the existing session.
 */

import type {
  ClientConfig,
  ServerEndpointConfigType,
} from "../config-schema.js";
import { ConnectionManager } from "../connection/connection-manager.js";
import type { ConnectionStats } from "../connection/connection-manager.js";
import type { CircuitState } from "../connection/circuit-breaker.js";
import { ConfigError, SessionClosedError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  InitializeResult,
  MCP_PROTOCOL_VERSION,
  expectShape,
} from "../protocol-schema.js";
import type { MCPServerInfoType } from "../protocol-schema.js";
import { HttpTransport } from "../transport/http.js";
import { StdioTransport } from "../transport/stdio.js";
import type { Transport } from "../transport/transport.js";
import type { JsonRpcNotification } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SessionState = "connecting" | "active" | "degraded" | "closed";

/** A live session. `state` and `lastHeartbeatAt` change over its life. */
export interface Session {
  readonly sessionId: string;
  readonly serverName: string;
  readonly endpoint: ServerEndpointConfigType;
  readonly connection: ConnectionManager;
  readonly createdAt: Date;
  state: SessionState;
  lastHeartbeatAt: Date | null;
  serverInfo: MCPServerInfoType | null;
  protocolVersion: string | null;
  capabilities: Readonly<Record<string, unknown>>;
}

export interface SessionStatus {
  readonly sessionId: string;
  readonly serverName: string;
  readonly state: SessionState;
  readonly circuitState: CircuitState;
  readonly lastHeartbeatAt: Date | null;
  readonly consecutiveFailures: number;
  readonly pendingRequests: number;
  readonly queueDepth: number;
  readonly serverInfo: MCPServerInfoType | null;
}

/** Builds the transport for an endpoint; replaceable for tests. */
export type TransportFactory = (endpoint: ServerEndpointConfigType, logger: Logger) => Transport;

export type SessionClosedListener = (session: Session, reason: string) => void;

export interface SessionManagerOptions {
  readonly config: ClientConfig;
  readonly logger: Logger;
  readonly transportFactory?: TransportFactory;
  /** Receives each server notification, per session in arrival order. */
  readonly onNotification?: (
    serverName: string,
    notification: JsonRpcNotification
  ) => void | Promise<void>;
  readonly now?: () => number;
  readonly random?: () => number;
}

/** Capabilities the client advertises in the initialize handshake. */
const CLIENT_CAPABILITIES = {
  resources: { subscribe: true },
  tools: {},
} as const;

/**
 * Default transport factory: HTTP for `url` endpoints, a spawned subprocess
 * for stdio ones.
 */
export const defaultTransportFactory: TransportFactory = (endpoint, logger) => {
  if (endpoint.transport === "stdio") {
    if (endpoint.command === undefined) {
      throw new ConfigError(`Server "${endpoint.name}" uses stdio transport but has no command`);
    }
    return new StdioTransport(
      {
        kind: "spawn",
        command: endpoint.command,
        args: endpoint.args ?? [],
        env: endpoint.env ?? {},
      },
      logger
    );
  }
  if (endpoint.url === undefined) {
    throw new ConfigError(`Server "${endpoint.name}" uses http transport but has no url`);
  }
  return new HttpTransport(
    {
      url: endpoint.url,
      requestTimeoutMs: endpoint.requestTimeoutMs,
      authorizationHeader: endpoint.apiKey !== undefined ? `Bearer ${endpoint.apiKey}` : undefined,
      notificationStream: endpoint.notificationStream,
    },
    logger
  );
};

// ---------------------------------------------------------------------------
// SessionManager
// ---------------------------------------------------------------------------

export class SessionManager {
  private readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly transportFactory: TransportFactory;
  private readonly options: SessionManagerOptions;

  private readonly sessions = new Map<string, Session>();
  private readonly connecting = new Map<string, Promise<Session>>();
  private readonly closedListeners: SessionClosedListener[] = [];
  private sessionCounter = 0;

  constructor(options: SessionManagerOptions) {
    this.options = options;
    this.config = options.config;
    this.logger = options.logger;
    this.transportFactory = options.transportFactory ?? defaultTransportFactory;
  }

  /**
   * Connect to a server, or return its existing session.
   *
   * @returns The active session.
   * @throws {TransportError} If the server cannot be reached.
   * @throws {RemoteError} If the server rejects the handshake.
   * @throws {ProtocolError} If the handshake answer is malformed.
   */
  connect(endpoint: ServerEndpointConfigType): Promise<Session> {
    const inProgress = this.connecting.get(endpoint.name);
    if (inProgress !== undefined) return inProgress;

    const existing = this.sessions.get(endpoint.name);
    if (existing !== undefined) return Promise.resolve(existing);

    const attempt = this.openSession(endpoint).finally(() => {
      this.connecting.delete(endpoint.name);
    });
    this.connecting.set(endpoint.name, attempt);
    return attempt;
  }

  get(serverName: string): Session | undefined {
    return this.sessions.get(serverName);
  }

  /**
   * The session of a server that must be connected.
   *
   * @throws {SessionClosedError} If there is none or it is still connecting.
   */
  require(serverName: string): Session {
    const session = this.sessions.get(serverName);
    if (session === undefined || session.state === "connecting" || session.state === "closed") {
      throw new SessionClosedError(serverName, "not connected");
    }
    return session;
  }

  isConnected(serverName: string): boolean {
    const session = this.sessions.get(serverName);
    return session !== undefined && (session.state === "active" || session.state === "degraded");
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  getStatus(serverName: string): SessionStatus | undefined {
    const session = this.sessions.get(serverName);
    if (session === undefined) return undefined;
    const stats: ConnectionStats = session.connection.stats();
    return {
      sessionId: session.sessionId,
      serverName: session.serverName,
      state: session.state,
      circuitState: stats.circuit.state,
      lastHeartbeatAt: session.lastHeartbeatAt,
      consecutiveFailures: stats.circuit.consecutiveFailures,
      pendingRequests: stats.pendingRequests,
      queueDepth: stats.queue.size,
      serverInfo: session.serverInfo,
    };
  }

  /** Register a listener called after a session is torn down. */
  onSessionClosed(listener: SessionClosedListener): void {
    this.closedListeners.push(listener);
  }

  /**
   * Close a server's session. Pending requests reject with
   * SessionClosedError. Unknown names are ignored.
   */
  async disconnect(serverName: string, reason = "disconnected"): Promise<void> {
    const inProgress = this.connecting.get(serverName);
    if (inProgress !== undefined) {
      // Let the attempt finish so there is something to close.
      await inProgress.catch(() => undefined);
    }

    const session = this.sessions.get(serverName);
    if (session === undefined) return;
    this.sessions.delete(serverName);
    session.state = "closed";

    await session.connection.close(reason);
    this.logger.info(`Disconnected from "${serverName}" (${reason})`);

    for (const listener of this.closedListeners) {
      try {
        listener(session, reason);
      } catch (error) {
        this.logger.error("Session closed listener failed", { error: errorMessage(error) });
      }
    }
  }

  async disconnectAll(reason = "client closing"): Promise<void> {
    const names = new Set([...this.sessions.keys(), ...this.connecting.keys()]);
    await Promise.all([...names].map((name) => this.disconnect(name, reason)));
  }

  // -------------------------------------------------------------------------
  // Private Methods
  // -------------------------------------------------------------------------

  private async openSession(endpoint: ServerEndpointConfigType): Promise<Session> {
    const logger = this.logger.child(endpoint.name);
    const transport = this.transportFactory(endpoint, logger);
    const { session: settings } = this.config;

    // The session record is created after the connection; callbacks reach it late-bound.
    let current: Session | null = null;
    const connection = new ConnectionManager({
      serverName: endpoint.name,
      transport,
      retry: this.config.retry,
      circuitBreaker: this.config.circuitBreaker,
      heartbeat: this.config.heartbeat,
      requestTimeoutMs: endpoint.requestTimeoutMs ?? settings.requestTimeoutMs,
      maxConcurrentRequests: settings.maxConcurrentRequests,
      queueMaxSize: settings.queueMaxSize,
      giveUpAfterMs: settings.giveUpAfterMs,
      logger,
      now: this.options.now,
      random: this.options.random,
      onNotification: (notification) => this.options.onNotification?.(endpoint.name, notification),
      onHealthChange: (health) => {
        if (current === null || current.state === "closed") return;
        current.state = health;
      },
      onHeartbeat: (at) => {
        if (current === null || current.state === "closed") return;
        current.lastHeartbeatAt = at;
      },
      onGiveUp: (reason) => {
        this.disconnect(endpoint.name, `gave up: ${reason}`).catch((error: unknown) => {
          logger.error("Disconnect after give-up failed", { error: errorMessage(error) });
        });
      },
    });

    this.sessionCounter += 1;
    const session: Session = {
      sessionId: `${endpoint.name}-${this.sessionCounter}`,
      serverName: endpoint.name,
      endpoint,
      connection,
      createdAt: new Date(),
      state: "connecting",
      lastHeartbeatAt: null,
      serverInfo: null,
      protocolVersion: null,
      capabilities: {},
    };
    current = session;
    this.sessions.set(endpoint.name, session);

    try {
      await connection.start();
      if (endpoint.initialize) {
        await this.initialize(session, endpoint.connectTimeoutMs ?? settings.connectTimeoutMs);
      }
      await connection.listen();
      connection.startHeartbeat();
    } catch (error) {
      this.sessions.delete(endpoint.name);
      session.state = "closed";
      await connection.close("connect failed");
      logger.warn(`Connecting to "${endpoint.name}" failed`, { error: errorMessage(error) });
      throw error;
    }

    session.state = "active";
    logger.info(`Connected (${session.sessionId})`, {
      server: session.serverInfo?.name,
      protocolVersion: session.protocolVersion,
    });
    return session;
  }

  private async initialize(session: Session, timeoutMs: number): Promise<void> {
    const raw = await session.connection.request(
      "initialize",
      {
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: CLIENT_CAPABILITIES,
        clientInfo: {
          name: this.config.clientName,
          version: this.config.clientVersion,
        },
      },
      { priority: "urgent", timeoutMs }
    );
    const result = expectShape(InitializeResult, raw, "initialize result");

    session.serverInfo = result.serverInfo;
    session.protocolVersion = result.protocolVersion;
    session.capabilities = Object.freeze({ ...result.capabilities });

    await session.connection.notify("notifications/initialized");
  }
}
