/**
 * Error taxonomy of the client core.
 *
 * Every error extends {@link MCPError}, so callers can branch on
 * `instanceof`, on the numeric `code`, or simply on `transient` to decide
 * whether trying again later makes sense.
 */

import { MCPError } from "./types.js";
import type { CircuitState } from "./connection/circuit-breaker.js";

// ---------------------------------------------------------------------------
// Application Error Codes
// ---------------------------------------------------------------------------

/** The server rejected the call because credentials are missing or invalid. */
export const AUTH_REQUIRED_CODE = -32001;

/** A request or transport operation exceeded its deadline. */
export const REQUEST_TIMEOUT_CODE = -32003;

/** Connectivity failure: refused, reset, or stream lost. */
export const TRANSPORT_ERROR_CODE = -32010;

/** The server sent something that is not a valid response for the request. */
export const PROTOCOL_ERROR_CODE = -32011;

/** The circuit breaker is rejecting calls to the server. */
export const CIRCUIT_OPEN_CODE = -32012;

/** The session was torn down (or never existed) while the call needed it. */
export const SESSION_CLOSED_CODE = -32013;

/** The caller aborted the request. */
export const REQUEST_CANCELLED_CODE = -32014;

/** The outbound queue is at capacity. */
export const QUEUE_FULL_CODE = -32015;

/** No registered tool matches the requested name. */
export const TOOL_NOT_FOUND_CODE = -32020;

/** An unqualified tool name matches tools on more than one server. */
export const AMBIGUOUS_TOOL_CODE = -32021;

/** No known server owns the requested resource URI. */
export const RESOURCE_NOT_FOUND_CODE = -32022;

/** The configuration does not satisfy the schema. */
export const CONFIG_ERROR_CODE = -32030;

// ---------------------------------------------------------------------------
// Transport and Protocol
// ---------------------------------------------------------------------------

/** Connectivity failure. Always transient. */
export class TransportError extends MCPError {
  constructor(message: string, cause?: unknown) {
    super(message, TRANSPORT_ERROR_CODE, { transient: true, cause });
    this.name = "TransportError";
  }
}

/** A deadline elapsed before the server answered. Always transient. */
export class RequestTimeoutError extends MCPError {
  /** The deadline that elapsed, in milliseconds. */
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, REQUEST_TIMEOUT_CODE, { transient: true });
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Malformed or unexpected message, or an explicit rejection by status. */
export class ProtocolError extends MCPError {
  constructor(message: string, cause?: unknown) {
    super(message, PROTOCOL_ERROR_CODE, { cause });
    this.name = "ProtocolError";
  }
}

/** HTTP 401/403 from the server. */
export class AuthRequiredError extends MCPError {
  /** HTTP status that triggered the error. */
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message, AUTH_REQUIRED_CODE);
    this.name = "AuthRequiredError";
    this.status = status;
  }
}

/**
 * The server answered with a JSON-RPC error object. The server is alive, so
 * this never counts against the circuit breaker.
 */
export class RemoteError extends MCPError {
  /** The `data` member of the JSON-RPC error, if any. */
  public readonly data: unknown;

  constructor(message: string, code: number, data?: unknown) {
    super(message, code);
    this.name = "RemoteError";
    this.data = data;
  }
}

// ---------------------------------------------------------------------------
// Connection and Session
// ---------------------------------------------------------------------------

/** The circuit breaker refused the call without reaching the transport. */
export class CircuitOpenError extends MCPError {
  public readonly serverName: string;
  public readonly state: CircuitState;
  /** Epoch milliseconds after which a probe will be allowed, if known. */
  public readonly retryAt: number | null;

  constructor(serverName: string, state: CircuitState, retryAt: number | null) {
    super(`Circuit ${state} for server "${serverName}"`, CIRCUIT_OPEN_CODE, {
      transient: true,
    });
    this.name = "CircuitOpenError";
    this.serverName = serverName;
    this.state = state;
    this.retryAt = retryAt;
  }
}

/** The session is gone. Reconnecting may help, hence transient. */
export class SessionClosedError extends MCPError {
  public readonly serverName: string;

  constructor(serverName: string, reason = "session closed") {
    super(`Session for server "${serverName}" unavailable: ${reason}`, SESSION_CLOSED_CODE, {
      transient: true,
    });
    this.name = "SessionClosedError";
    this.serverName = serverName;
  }
}

export class RequestCancelledError extends MCPError {
  constructor(method: string, reason?: unknown) {
    super(`Request "${method}" was cancelled`, REQUEST_CANCELLED_CODE, { cause: reason });
    this.name = "RequestCancelledError";
  }
}

export class QueueFullError extends MCPError {
  public readonly maxSize: number;

  constructor(maxSize: number) {
    super(`Queue is full (${maxSize} messages)`, QUEUE_FULL_CODE, { transient: true });
    this.name = "QueueFullError";
    this.maxSize = maxSize;
  }
}

// ---------------------------------------------------------------------------
// Registry and Resources
// ---------------------------------------------------------------------------

export class ToolNotFoundError extends MCPError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool not found: ${toolName}`, TOOL_NOT_FOUND_CODE);
    this.name = "ToolNotFoundError";
    this.toolName = toolName;
  }
}

/** An unqualified name matched several servers; `candidates` lists them all. */
export class AmbiguousToolNameError extends MCPError {
  public readonly toolName: string;
  /** Namespaced names of every match, sorted. */
  public readonly candidates: readonly string[];

  constructor(toolName: string, candidates: readonly string[]) {
    super(
      `Tool name "${toolName}" is ambiguous; use one of: ${candidates.join(", ")}`,
      AMBIGUOUS_TOOL_CODE
    );
    this.name = "AmbiguousToolNameError";
    this.toolName = toolName;
    this.candidates = candidates;
  }
}

export class ResourceNotFoundError extends MCPError {
  public readonly uri: string;

  constructor(uri: string) {
    super(`No connected server provides resource: ${uri}`, RESOURCE_NOT_FOUND_CODE);
    this.name = "ResourceNotFoundError";
    this.uri = uri;
  }
}

/** Configuration rejected by the schema; `issues` holds one line per problem. */
export class ConfigError extends MCPError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, CONFIG_ERROR_CODE);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Whether an error is worth another attempt against the same server.
 * Only connectivity failures and transport timeouts qualify.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransportError || error instanceof RequestTimeoutError;
}

/** Render any thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
