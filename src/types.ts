/**
 * Core type definitions for the league MCP client core.
 *
 * Includes JSON-RPC 2.0 message types, the shared priority and direction
 * vocabulary used by the queues, and the base error class every error of
 * the package extends.
 *
 * MCP result payloads are described as TypeBox schemas in
 * `protocol-schema.ts` so they can be validated at the wire boundary.
 *
 * @see https://www.jsonrpc.org/specification for JSON-RPC 2.0
 * @see https://modelcontextprotocol.io/specification/2025-03-26 for MCP
 */

// ---------------------------------------------------------------------------
// JSON-RPC 2.0 Types
// ---------------------------------------------------------------------------

/** A JSON-RPC 2.0 request object. */
export interface JsonRpcRequest {
  readonly jsonrpc: "2.0";
  readonly id: string | number;
  readonly method: string;
  readonly params?: Record<string, unknown> | unknown[];
}

/** A successful JSON-RPC 2.0 response object. */
export interface JsonRpcSuccessResponse {
  readonly jsonrpc: "2.0";
  readonly id: string | number | null;
  readonly result: unknown;
}

/** A JSON-RPC 2.0 error detail object. */
export interface JsonRpcErrorDetail {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}

/** A JSON-RPC 2.0 error response object. */
export interface JsonRpcErrorResponse {
  readonly jsonrpc: "2.0";
  readonly id: string | number | null;
  readonly error: JsonRpcErrorDetail;
}

/** A JSON-RPC 2.0 response, either success or error. */
export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/** A JSON-RPC 2.0 notification (a request with no id). */
export interface JsonRpcNotification {
  readonly jsonrpc: "2.0";
  readonly method: string;
  readonly params?: Record<string, unknown> | unknown[];
}

/** Union of all possible JSON-RPC 2.0 message types. */
export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcResponse
  | JsonRpcNotification;

// ---------------------------------------------------------------------------
// Queue Vocabulary
// ---------------------------------------------------------------------------

/**
 * Delivery tier of a queued message. Heartbeats always travel as "urgent";
 * resource updates arrive as "high"; everything else defaults to "normal".
 */
export type MessagePriority = "urgent" | "high" | "normal";

/** All priorities, highest first. */
export const MESSAGE_PRIORITIES: readonly MessagePriority[] = [
  "urgent",
  "high",
  "normal",
];

/** Whether a queued message leaves the client or was received from a server. */
export type MessageDirection = "outbound" | "inbound";

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/** Options accepted by {@link MCPError}. */
export interface MCPErrorOptions {
  /** True when retrying later may succeed. Defaults to false. */
  readonly transient?: boolean;
  /** The underlying error, when this one wraps another. */
  readonly cause?: unknown;
}

/**
 * Base error class for all client core errors.
 *
 * Extends the built-in Error with a numeric `code` field for JSON-RPC
 * error codes or application-specific error codes, and a `transient` flag
 * that lets callers tell "try again later" from "will never succeed".
 */
export class MCPError extends Error {
  /** Numeric error code (JSON-RPC or application-specific). */
  public readonly code: number;
  /** Whether the failure is expected to clear up on its own. */
  public readonly transient: boolean;

  /**
   * Create a new MCPError.
   *
   * @param message - Human-readable error description.
   * @param code - Numeric error code.
   * @param options - Transient flag and wrapped cause.
   */
  constructor(message: string, code: number, options: MCPErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "MCPError";
    this.code = code;
    this.transient = options.transient ?? false;
  }
}
