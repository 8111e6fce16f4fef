/**
 * Client Core: the facade the agent layer talks to.
 *
 * Ties the session manager, tool registry and resource manager together.
 * Sessions discover tools (and resources, when offered) as they connect;
 * their descriptors and subscriptions go away when the session closes.
 * Server notifications are routed here: resource updates to the resource
 * manager, tool list changes to a rediscovery, everything else to the
 * listeners registered with {@link ClientCore.onNotification}.
 */

import type { ClientConfig, ServerEndpointConfigType } from "../config-schema.js";
import { toEndpoint } from "../config-schema.js";
import { RESOURCE_UPDATED_METHOD } from "../connection/connection-manager.js";
import type { ConnectionStats } from "../connection/connection-manager.js";
import type { LeagueEnvelopeType } from "../envelope.js";
import { timeoutForMessageType } from "../envelope.js";
import {
  ConfigError,
  RemoteError,
  SessionClosedError,
  ToolNotFoundError,
  errorMessage,
} from "../errors.js";
import { METHOD_NOT_FOUND } from "../jsonrpc.js";
import { createConsoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import {
  ResourcesListResult,
  ToolsCallResult,
  ToolsListResult,
  expectShape,
} from "../protocol-schema.js";
import type {
  MCPResourceType,
  MCPToolType,
  ToolsCallResultType,
} from "../protocol-schema.js";
import type { JsonRpcNotification, MessagePriority } from "../types.js";
import { ResourceManager } from "./resource-manager.js";
import type {
  ResourceCallback,
  ResourceManagerStats,
  ResourceReadOptions,
} from "./resource-manager.js";
import { SessionManager } from "./session-manager.js";
import type { Session, SessionStatus, TransportFactory } from "./session-manager.js";
import { NAMESPACE_SEPARATOR, ToolRegistry } from "./tool-registry.js";
import type { ServerRegistrationSummary, ToolDescriptor } from "./tool-registry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const TOOLS_LIST_CHANGED_METHOD = "notifications/tools/list_changed";
export const RESOURCES_LIST_CHANGED_METHOD = "notifications/resources/list_changed";

export interface ClientCoreOptions {
  /** Validated configuration, see `loadClientConfig`. */
  readonly config: ClientConfig;
  /** Defaults to a console logger honoring `config.debug`. */
  readonly logger?: Logger;
  readonly transportFactory?: TransportFactory;
  readonly now?: () => number;
  readonly random?: () => number;
}

export interface CallToolOptions {
  /** Default: "normal". */
  readonly priority?: MessagePriority;
  /** Deadline of the call; defaults to the session's request timeout. */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface SubscribeResourceOptions {
  /** Owning server; looked up in the resource catalog when omitted. */
  readonly serverName?: string;
  /** Defaults to `config.subscriberId`. */
  readonly subscriberId?: string;
}

export interface SubscriptionHandle {
  readonly uri: string;
  readonly subscriberId: string;
  readonly serverName: string;
  unsubscribe(): Promise<boolean>;
}

export type NotificationListener = (
  serverName: string,
  notification: JsonRpcNotification
) => void | Promise<void>;

export interface ServerHealth extends SessionStatus {
  readonly toolCount: number;
  /** Tool calls sent to this server through the client. */
  readonly toolCalls: number;
  readonly connection: ConnectionStats;
}

export interface HealthReport {
  readonly generatedAt: Date;
  /** Every session is active with a closed breaker. */
  readonly healthy: boolean;
  readonly servers: readonly ServerHealth[];
  readonly toolCount: number;
  /** Raw tool names offered by more than one server. */
  readonly ambiguousToolNames: readonly string[];
  readonly resources: ResourceManagerStats;
}

// ---------------------------------------------------------------------------
// ClientCore
// ---------------------------------------------------------------------------

export class ClientCore {
  readonly config: ClientConfig;
  readonly tools: ToolRegistry;
  readonly resources: ResourceManager;
  readonly sessions: SessionManager;

  private readonly logger: Logger;
  private readonly listeners = new Set<NotificationListener>();
  private readonly connecting = new Map<string, Promise<SessionStatus>>();
  private closed = false;

  constructor(options: ClientCoreOptions) {
    this.config = options.config;
    this.logger =
      options.logger ?? createConsoleLogger({ scope: "ClientCore", debug: options.config.debug });

    this.tools = new ToolRegistry(this.logger.child("tools"));
    this.resources = new ResourceManager({
      logger: this.logger.child("resources"),
      cacheTtlMs: this.config.resources.cacheTtlMs,
      now: options.now,
      rpc: (serverName, method, params) =>
        this.sessions.require(serverName).connection.request(method, params),
    });
    this.sessions = new SessionManager({
      config: this.config,
      logger: this.logger,
      transportFactory: options.transportFactory,
      now: options.now,
      random: options.random,
      onNotification: (serverName, notification) => this.route(serverName, notification),
    });
    this.sessions.onSessionClosed((session, reason) => this.forgetServer(session, reason));
  }

  // -------------------------------------------------------------------------
  // Connection Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Connect to a server and discover its tools and resources. A name refers
   * to an entry of `config.servers`.
   *
   * @returns Status of the connected session.
   * @throws {ConfigError} If a name is not configured.
   * @throws {TransportError | RemoteError | ProtocolError} If connecting or discovery fails.
   */
  connect(server: ServerEndpointConfigType | string): Promise<SessionStatus> {
    if (this.closed) {
      return Promise.reject(new SessionClosedError(this.nameOf(server), "client closed"));
    }

    let endpoint: ServerEndpointConfigType;
    try {
      endpoint = typeof server === "string" ? this.configuredEndpoint(server) : server;
    } catch (error) {
      return Promise.reject(error);
    }

    const inProgress = this.connecting.get(endpoint.name);
    if (inProgress !== undefined) return inProgress;

    const existing = this.sessions.getStatus(endpoint.name);
    if (existing !== undefined && this.sessions.isConnected(endpoint.name)) {
      return Promise.resolve(existing);
    }

    const attempt = this.openAndDiscover(endpoint).finally(() => {
      this.connecting.delete(endpoint.name);
    });
    this.connecting.set(endpoint.name, attempt);
    return attempt;
  }

  /**
   * Connect every enabled server of the configuration, at most
   * `maxConcurrentServers` at a time. Failures are logged, not thrown.
   *
   * @returns Names of the servers that connected.
   */
  async connectAll(): Promise<string[]> {
    const names = Object.entries(this.config.servers)
      .filter(([, server]) => server.enabled)
      .map(([name]) => name);

    const connected: string[] = [];
    for (let i = 0; i < names.length; i += this.config.maxConcurrentServers) {
      const batch = names.slice(i, i + this.config.maxConcurrentServers);
      await Promise.all(
        batch.map(async (name) => {
          try {
            await this.connect(name);
            connected.push(name);
          } catch (error) {
            this.logger.warn(`Failed to connect to "${name}"`, { error: errorMessage(error) });
          }
        })
      );
    }
    return connected.sort();
  }

  /** Close one server's session; its tools and subscriptions are dropped. */
  async disconnect(serverName: string): Promise<void> {
    await this.sessions.disconnect(serverName, "disconnected");
  }

  /** Close every session. The client cannot be used afterwards. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all([...this.connecting.values()].map((attempt) => attempt.catch(() => undefined)));
    await this.sessions.disconnectAll("client closed");
    this.listeners.clear();
  }

  // -------------------------------------------------------------------------
  // Tools
  // -------------------------------------------------------------------------

  listTools(serverName?: string): ToolDescriptor[] {
    return this.tools.listTools(serverName);
  }

  /**
   * Rediscover the tools of one server, or of every connected server.
   *
   * @returns What changed, per server.
   */
  async refreshTools(serverName?: string): Promise<Map<string, ServerRegistrationSummary>> {
    const names =
      serverName !== undefined
        ? [serverName]
        : this.sessions.list().map((session) => session.serverName);

    const summaries = new Map<string, ServerRegistrationSummary>();
    for (const name of names) {
      summaries.set(name, await this.discoverTools(this.sessions.require(name)));
    }
    return summaries;
  }

  /**
   * Call a tool by namespaced (`server.tool`) or unambiguous raw name. A
   * namespaced name of a configured server that is not connected yet
   * connects it first.
   *
   * @returns The `tools/call` result as the server sent it.
   * @throws {ToolNotFoundError | AmbiguousToolNameError} If the name does not resolve.
   * @throws {CircuitOpenError | RequestTimeoutError | RemoteError | TransportError} From the call.
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    options: CallToolOptions = {}
  ): Promise<ToolsCallResultType> {
    const tool = await this.resolveTool(name);
    const session = this.sessions.require(tool.serverName);

    this.tools.recordCall(tool.namespacedName);
    const raw = await session.connection.request(
      "tools/call",
      { name: tool.rawName, arguments: args },
      { priority: options.priority, timeoutMs: options.timeoutMs, signal: options.signal }
    );
    return expectShape(ToolsCallResult, raw, `tools/call result of "${tool.namespacedName}"`);
  }

  /**
   * Send a league envelope as the arguments of a tool call. The deadline
   * follows the envelope's `message_type` unless given.
   */
  sendEnvelope(
    toolName: string,
    envelope: LeagueEnvelopeType,
    options: CallToolOptions = {}
  ): Promise<ToolsCallResultType> {
    return this.callTool(
      toolName,
      { ...envelope },
      {
        ...options,
        timeoutMs: options.timeoutMs ?? timeoutForMessageType(envelope.message_type),
      }
    );
  }

  // -------------------------------------------------------------------------
  // Resources
  // -------------------------------------------------------------------------

  /**
   * Subscribe to updates of a resource.
   *
   * @throws {ResourceNotFoundError} If no server is known for the URI.
   */
  async subscribeResource(
    uri: string,
    callback: ResourceCallback,
    options: SubscribeResourceOptions = {}
  ): Promise<SubscriptionHandle> {
    const subscriberId = options.subscriberId ?? this.config.subscriberId;
    if (options.serverName !== undefined && !this.sessions.isConnected(options.serverName)) {
      await this.connect(options.serverName);
    }

    const subscription = await this.resources.subscribe(
      uri,
      subscriberId,
      callback,
      options.serverName
    );
    return {
      uri,
      subscriberId,
      serverName: subscription.serverName,
      unsubscribe: () => this.resources.unsubscribe(uri, subscriberId),
    };
  }

  /** @returns Whether the subscriber was subscribed. */
  unsubscribeResource(uri: string, options: { readonly subscriberId?: string } = {}): Promise<boolean> {
    return this.resources.unsubscribe(uri, options.subscriberId ?? this.config.subscriberId);
  }

  readResource(uri: string, options: ResourceReadOptions = {}): Promise<unknown> {
    return this.resources.read(uri, options);
  }

  // -------------------------------------------------------------------------
  // Status and notifications
  // -------------------------------------------------------------------------

  getSessionStatus(serverName: string): SessionStatus | undefined {
    return this.sessions.getStatus(serverName);
  }

  getHealthReport(): HealthReport {
    const servers: ServerHealth[] = [];
    for (const session of this.sessions.list()) {
      const status = this.sessions.getStatus(session.serverName);
      if (status === undefined) continue;
      servers.push({
        ...status,
        toolCount: this.tools.listTools(session.serverName).length,
        toolCalls: this.tools.getCallCount(session.serverName),
        connection: session.connection.stats(),
      });
    }
    servers.sort((a, b) => a.serverName.localeCompare(b.serverName));

    return {
      generatedAt: new Date(),
      healthy: servers.every(
        (server) => server.state === "active" && server.circuitState === "closed"
      ),
      servers,
      toolCount: this.tools.getToolCount(),
      ambiguousToolNames: [...this.tools.getCollisions().keys()].sort(),
      resources: this.resources.stats(),
    };
  }

  /**
   * Receive server notifications not handled by the client itself.
   *
   * @returns A function removing the listener.
   */
  onNotification(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // Private Methods
  // -------------------------------------------------------------------------

  private async openAndDiscover(endpoint: ServerEndpointConfigType): Promise<SessionStatus> {
    const session = await this.sessions.connect(endpoint);
    try {
      const summary = await this.discoverTools(session);
      if (session.capabilities["resources"] !== undefined) {
        await this.discoverResources(session);
      }
      this.logger.info(`"${endpoint.name}" ready with ${summary.added.length} tools`);
    } catch (error) {
      await this.sessions.disconnect(endpoint.name, "discovery failed");
      throw error;
    }

    const status = this.sessions.getStatus(endpoint.name);
    if (status === undefined) {
      throw new SessionClosedError(endpoint.name, "closed during discovery");
    }
    return status;
  }

  /** Page through `tools/list` and make the registry match it. */
  private async discoverTools(session: Session): Promise<ServerRegistrationSummary> {
    const tools: MCPToolType[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;
    do {
      let raw: unknown;
      try {
        raw = await session.connection.request(
          "tools/list",
          cursor !== undefined ? { cursor } : undefined,
          { priority: "high" }
        );
      } catch (error) {
        if (error instanceof RemoteError && error.code === METHOD_NOT_FOUND) {
          this.logger.debug(`"${session.serverName}" offers no tools`);
          break;
        }
        throw error;
      }
      const page = expectShape(ToolsListResult, raw, "tools/list result");
      tools.push(...page.tools);
      cursor = page.nextCursor;
      if (cursor !== undefined && seenCursors.has(cursor)) {
        this.logger.warn(`"${session.serverName}" repeated tools/list cursor ${cursor}`);
        break;
      }
      if (cursor !== undefined) seenCursors.add(cursor);
    } while (cursor !== undefined);

    const summary = this.tools.registerServer(session.serverName, tools);
    if (summary.removed.length > 0 || summary.updated.length > 0) {
      this.logger.info(`Tools of "${session.serverName}" changed`, {
        added: summary.added.length,
        updated: summary.updated.length,
        removed: summary.removed.length,
      });
    }
    return summary;
  }

  private async discoverResources(session: Session): Promise<void> {
    const resources: MCPResourceType[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;
    do {
      const raw = await session.connection.request(
        "resources/list",
        cursor !== undefined ? { cursor } : undefined,
        { priority: "high" }
      );
      const page = expectShape(ResourcesListResult, raw, "resources/list result");
      resources.push(...page.resources);
      cursor = page.nextCursor;
      if (cursor !== undefined && seenCursors.has(cursor)) break;
      if (cursor !== undefined) seenCursors.add(cursor);
    } while (cursor !== undefined);

    this.resources.registerServer(session.serverName, resources);
  }

  private async resolveTool(name: string): Promise<ToolDescriptor> {
    try {
      return this.tools.resolve(name);
    } catch (error) {
      if (!(error instanceof ToolNotFoundError)) throw error;
      const serverName = this.configuredServerOf(name);
      if (serverName === null || this.sessions.isConnected(serverName)) throw error;

      this.logger.debug(`Connecting "${serverName}" on first use of "${name}"`);
      await this.connect(serverName);
      return this.tools.resolve(name);
    }
  }

  /** The enabled, configured server a namespaced name points at, if any. */
  private configuredServerOf(name: string): string | null {
    const separator = name.indexOf(NAMESPACE_SEPARATOR);
    if (separator <= 0) return null;
    const serverName = name.slice(0, separator);
    const server = this.config.servers[serverName];
    return server !== undefined && server.enabled ? serverName : null;
  }

  private configuredEndpoint(serverName: string): ServerEndpointConfigType {
    const server = this.config.servers[serverName];
    if (server === undefined) {
      throw new ConfigError(`Server "${serverName}" is not configured`);
    }
    return toEndpoint(serverName, server);
  }

  private nameOf(server: ServerEndpointConfigType | string): string {
    return typeof server === "string" ? server : server.name;
  }

  private async route(serverName: string, notification: JsonRpcNotification): Promise<void> {
    switch (notification.method) {
      case RESOURCE_UPDATED_METHOD:
        await this.resources.handleUpdate(serverName, notification.params);
        return;
      case TOOLS_LIST_CHANGED_METHOD:
        await this.refreshTools(serverName);
        return;
      case RESOURCES_LIST_CHANGED_METHOD: {
        const session = this.sessions.get(serverName);
        if (session !== undefined) await this.discoverResources(session);
        return;
      }
      default:
        break;
    }

    for (const listener of [...this.listeners]) {
      try {
        await listener(serverName, notification);
      } catch (error) {
        this.logger.error(`Notification listener failed on "${notification.method}"`, {
          error: errorMessage(error),
        });
      }
    }
  }

  private forgetServer(session: Session, reason: string): void {
    const removed = this.tools.unregisterServer(session.serverName);
    this.resources.dropServer(session.serverName);
    this.logger.debug(`Forgot "${session.serverName}" (${reason}); ${removed} tools removed`);
  }
}
