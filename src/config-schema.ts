/**
 * TypeBox configuration schema for the league MCP client core.
 *
 * Defines per-server endpoint settings (transport, credential, timeouts)
 * and the policy knobs of the connection layer: retry, circuit breaker,
 * heartbeat, session limits and the resource cache. All durations are in
 * milliseconds. Defaults live in the schema and are applied by
 * {@link loadClientConfig}.
 */

import { readFile } from "node:fs/promises";
import { Type } from "@sinclair/typebox";
import type { Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, errorMessage } from "./errors.js";

/** Server names become tool prefixes, so they may not contain ".". */
export const SERVER_NAME_PATTERN = "^[A-Za-z0-9_-]+$";

/**
 * Configuration for a single MCP server connection.
 *
 * Covers HTTP and stdio transports, the opaque bearer credential and the
 * per-server timeout overrides.
 */
export const MCPServerConfig = Type.Object({
  /** Whether this server is enabled. */
  enabled: Type.Boolean({ default: true }),

  /** Transport type: HTTP (Streamable HTTP) or stdio (subprocess). */
  transport: Type.Union([Type.Literal("http"), Type.Literal("stdio")], {
    default: "http",
  }),

  /** MCP server endpoint URL (required for HTTP transport). */
  url: Type.Optional(
    Type.String({ pattern: "^https?://", description: "MCP server endpoint URL" })
  ),

  /** Command to run for stdio transport. */
  command: Type.Optional(Type.String({ minLength: 1 })),

  /** Arguments for the stdio command. */
  args: Type.Optional(Type.Array(Type.String())),

  /** Environment variables for the stdio subprocess. */
  env: Type.Optional(Type.Record(Type.String(), Type.String())),

  /** Opaque credential sent as a Bearer token. */
  apiKey: Type.Optional(Type.String()),

  /** Handshake timeout in milliseconds (falls back to session.connectTimeoutMs). */
  connectTimeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),

  /** Per-request timeout in milliseconds (falls back to session.requestTimeoutMs). */
  requestTimeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),

  /** Run the MCP initialize handshake after connecting. */
  initialize: Type.Boolean({ default: true }),

  /** Open the server-initiated notification stream (HTTP only). */
  notificationStream: Type.Boolean({ default: true }),
});

/** A server configuration together with its name, as accepted by `connect()`. */
export const ServerEndpointConfig = Type.Object({
  name: Type.String({ pattern: SERVER_NAME_PATTERN }),
  ...MCPServerConfig.properties,
});

export const RetryConfig = Type.Object(
  {
    /** Total attempts per request, the first one included. */
    maxAttempts: Type.Integer({ minimum: 1, default: 3 }),
    baseDelayMs: Type.Integer({ minimum: 0, default: 1000 }),
    maxDelayMs: Type.Integer({ minimum: 0, default: 30000 }),
    /** Jitter is uniform in [0, jitterRatio * exponential delay). */
    jitterRatio: Type.Number({ minimum: 0, maximum: 1, default: 0.1 }),
  },
  { default: {} }
);

export const CircuitBreakerConfig = Type.Object(
  {
    failureThreshold: Type.Integer({ minimum: 1, default: 5 }),
    recoveryTimeoutMs: Type.Integer({ minimum: 0, default: 30000 }),
  },
  { default: {} }
);

export const HeartbeatConfig = Type.Object(
  {
    enabled: Type.Boolean({ default: true }),
    intervalMs: Type.Integer({ minimum: 1, default: 10000 }),
    timeoutMs: Type.Integer({ minimum: 1, default: 5000 }),
    /** Consecutive failed pings before the session is marked degraded. */
    failureThreshold: Type.Integer({ minimum: 1, default: 3 }),
  },
  { default: {} }
);

export const SessionConfig = Type.Object(
  {
    requestTimeoutMs: Type.Integer({ minimum: 1, default: 30000 }),
    connectTimeoutMs: Type.Integer({ minimum: 1, default: 10000 }),
    maxConcurrentRequests: Type.Integer({ minimum: 1, default: 4 }),
    queueMaxSize: Type.Integer({ minimum: 1, default: 1000 }),
    /** Tear the session down after the circuit stays open this long; 0 disables. */
    giveUpAfterMs: Type.Integer({ minimum: 0, default: 120000 }),
  },
  { default: {} }
);

export const ResourceConfig = Type.Object(
  {
    /** Lifetime of a cached resource value read with `resources/read`. */
    cacheTtlMs: Type.Integer({ minimum: 0, default: 60000 }),
  },
  { default: {} }
);

/**
 * Top-level client configuration schema.
 *
 * Contains a map of named server configurations and the shared policy
 * settings applied to every session.
 */
export const clientConfigSchema = Type.Object({
  /** Name reported to servers in the initialize handshake. */
  clientName: Type.String({ default: "league-mcp-client" }),
  clientVersion: Type.String({ default: "0.1.0" }),

  /** Subscriber id used when a subscription does not name one. */
  subscriberId: Type.String({ minLength: 1, default: "default" }),

  /** Map of server name to server configuration. */
  servers: Type.Record(Type.String({ pattern: SERVER_NAME_PATTERN }), MCPServerConfig, {
    default: {},
    additionalProperties: false,
  }),

  retry: RetryConfig,
  circuitBreaker: CircuitBreakerConfig,
  heartbeat: HeartbeatConfig,
  session: SessionConfig,
  resources: ResourceConfig,

  /** Maximum number of servers connected at once by `connectAll()`. */
  maxConcurrentServers: Type.Integer({ minimum: 1, default: 20 }),

  /** Enable debug logging. */
  debug: Type.Boolean({ default: false }),
});

/** TypeScript type for a single MCP server configuration. */
export type MCPServerConfigType = Static<typeof MCPServerConfig>;

/** TypeScript type for a named server endpoint. */
export type ServerEndpointConfigType = Static<typeof ServerEndpointConfig>;

export type RetryConfigType = Static<typeof RetryConfig>;
export type CircuitBreakerConfigType = Static<typeof CircuitBreakerConfig>;
export type HeartbeatConfigType = Static<typeof HeartbeatConfig>;
export type SessionConfigType = Static<typeof SessionConfig>;

/** TypeScript type for the full, defaulted client configuration. */
export type ClientConfig = Static<typeof clientConfigSchema>;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Apply schema defaults to raw configuration and validate it.
 *
 * The input is cloned first, so the caller's object is never mutated.
 *
 * @param input - Parsed configuration, typically from JSON.
 * @returns The fully defaulted configuration.
 * @throws {ConfigError} Listing every schema violation.
 */
export function loadClientConfig(input: unknown): ClientConfig {
  const candidate = Value.Default(clientConfigSchema, Value.Clone(input ?? {}));

  if (!Value.Check(clientConfigSchema, candidate)) {
    const issues = [...Value.Errors(clientConfigSchema, candidate)].map(
      (error) => `${error.path || "/"}: ${error.message}`
    );
    throw new ConfigError("Invalid client configuration", issues);
  }

  for (const [name, server] of Object.entries(candidate.servers)) {
    assertTransportFields(name, server);
  }

  return candidate;
}

/**
 * Validate a single endpoint passed to `connect()` and apply its defaults.
 *
 * @throws {ConfigError} If the endpoint is malformed.
 */
export function loadServerEndpoint(input: unknown): ServerEndpointConfigType {
  const candidate = Value.Default(ServerEndpointConfig, Value.Clone(input ?? {}));

  if (!Value.Check(ServerEndpointConfig, candidate)) {
    const issues = [...Value.Errors(ServerEndpointConfig, candidate)].map(
      (error) => `${error.path || "/"}: ${error.message}`
    );
    throw new ConfigError("Invalid server endpoint", issues);
  }

  assertTransportFields(candidate.name, candidate);
  return candidate;
}

/**
 * Read a JSON configuration file and load it.
 *
 * @param path - Path of the JSON file.
 * @throws {ConfigError} If the file cannot be read, parsed, or validated.
 */
export async function readClientConfigFile(path: string): Promise<ClientConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}`, [errorMessage(error)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, [
      errorMessage(error),
    ]);
  }

  return loadClientConfig(parsed);
}

/** Combine a server entry of the configuration with its name. */
export function toEndpoint(
  name: string,
  server: MCPServerConfigType
): ServerEndpointConfigType {
  return { ...server, name };
}

function assertTransportFields(name: string, server: MCPServerConfigType): void {
  if (server.transport === "http" && server.url === undefined) {
    throw new ConfigError(`Server "${name}" uses http transport but has no url`);
  }
  if (server.transport === "stdio" && server.command === undefined) {
    throw new ConfigError(`Server "${name}" uses stdio transport but has no command`);
  }
}
