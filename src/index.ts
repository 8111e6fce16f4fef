/**
 * Public entry point of the league MCP client core.
 *
 * Agents build a {@link ClientCore} from a validated configuration and use
 * it to call tools on league servers and follow their resources.
 *
 * @example
 * ```ts
 * const config = await readClientConfigFile("./league-client.json");
 * const client = new ClientCore({ config });
 * await client.connectAll();
 * const standings = await client.callTool("league_server.get_standings", {});
 * ```
 */

export { ClientCore, TOOLS_LIST_CHANGED_METHOD, RESOURCES_LIST_CHANGED_METHOD } from "./manager/client-core.js";
export type {
  CallToolOptions,
  ClientCoreOptions,
  HealthReport,
  NotificationListener,
  ServerHealth,
  SubscribeResourceOptions,
  SubscriptionHandle,
} from "./manager/client-core.js";

export { SessionManager, defaultTransportFactory } from "./manager/session-manager.js";
export type {
  Session,
  SessionClosedListener,
  SessionManagerOptions,
  SessionState,
  SessionStatus,
  TransportFactory,
} from "./manager/session-manager.js";

export { ToolRegistry, NAMESPACE_SEPARATOR, namespacedToolName } from "./manager/tool-registry.js";
export type {
  RegistrationOutcome,
  ServerRegistrationSummary,
  ToolDescriptor,
} from "./manager/tool-registry.js";

export { ResourceManager } from "./manager/resource-manager.js";
export type {
  CachedResource,
  ResourceCallback,
  ResourceInfo,
  ResourceManagerOptions,
  ResourceManagerStats,
  ResourceReadOptions,
  ResourceRpc,
  ResourceSubscription,
  ResourceUpdate,
} from "./manager/resource-manager.js";

export { ConnectionManager, RESOURCE_UPDATED_METHOD } from "./connection/connection-manager.js";
export type {
  ConnectionHealth,
  ConnectionManagerOptions,
  ConnectionStats,
  RequestOptions,
} from "./connection/connection-manager.js";
export { CircuitBreaker } from "./connection/circuit-breaker.js";
export type {
  CircuitBreakerOptions,
  CircuitBreakerSnapshot,
  CircuitBreakerTicket,
  CircuitState,
} from "./connection/circuit-breaker.js";
export { DEFAULT_RETRY_POLICY, computeBackoffDelay, sleep } from "./connection/retry-policy.js";
export type { RetryPolicy } from "./connection/retry-policy.js";
export { HeartbeatMonitor } from "./connection/heartbeat.js";
export type { HeartbeatMonitorOptions } from "./connection/heartbeat.js";

export { PriorityMessageQueue } from "./queue/priority-queue.js";
export type {
  PriorityQueueOptions,
  QueuedMessage,
  QueueStats,
} from "./queue/priority-queue.js";

export { HttpTransport } from "./transport/http.js";
export type { HttpTransportConfig } from "./transport/http.js";
export { StdioTransport } from "./transport/stdio.js";
export type { StdioChannel, StdioTransportConfig } from "./transport/stdio.js";
export { SSEParser, parseSSEStream } from "./transport/sse-parser.js";
export type { SSEEvent } from "./transport/sse-parser.js";
export type { Transport, TransportSendOptions } from "./transport/transport.js";

export {
  LEAGUE_PROTOCOL,
  LeagueEnvelope,
  MESSAGE_TYPE_TIMEOUTS_MS,
  DEFAULT_ENVELOPE_TIMEOUT_MS,
  createEnvelope,
  isLeagueEnvelope,
  timeoutForMessageType,
} from "./envelope.js";
export type {
  AgentTypeValue,
  CreateEnvelopeOptions,
  EnvelopeSenderType,
  LeagueEnvelopeType,
} from "./envelope.js";

export {
  clientConfigSchema,
  loadClientConfig,
  loadServerEndpoint,
  readClientConfigFile,
  toEndpoint,
} from "./config-schema.js";
export type {
  ClientConfig,
  MCPServerConfigType,
  ServerEndpointConfigType,
} from "./config-schema.js";

export * from "./errors.js";
export { MCPError, MESSAGE_PRIORITIES } from "./types.js";
export type {
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  MessageDirection,
  MessagePriority,
} from "./types.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, LogFields } from "./logger.js";
