/**
 * JSON-RPC 2.0 framing helpers.
 *
 * Factory functions for outgoing messages, type guards, and a parser that
 * classifies one decoded message. Batches are not used by the client core
 * and are rejected by the parser.
 *
 * @see https://www.jsonrpc.org/specification
 */

import type {
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcNotification,
} from "./types.js";
import { ProtocolError, RemoteError } from "./errors.js";

// ---------------------------------------------------------------------------
// Standard JSON-RPC 2.0 Error Codes
// ---------------------------------------------------------------------------

/** Invalid JSON was received by the server. */
export const PARSE_ERROR = -32700 as const;

/** The method does not exist or is not available. */
export const METHOD_NOT_FOUND = -32601 as const;

/** Invalid method parameter(s). */
export const INVALID_PARAMS = -32602 as const;

// ---------------------------------------------------------------------------
// Factory Functions
// ---------------------------------------------------------------------------

/**
 * Build a JSON-RPC 2.0 request object.
 *
 * @param method - The RPC method name.
 * @param params - Optional parameters for the method.
 * @param id - Request identifier (string or number).
 * @returns A fully formed JsonRpcRequest.
 */
export function createRequest(
  method: string,
  params: Record<string, unknown> | unknown[] | undefined,
  id: string | number
): JsonRpcRequest {
  const request: JsonRpcRequest = params !== undefined
    ? { jsonrpc: "2.0", id, method, params }
    : { jsonrpc: "2.0", id, method };
  return request;
}

/**
 * Build a JSON-RPC 2.0 notification (a request without an id).
 *
 * @param method - The RPC method name.
 * @param params - Optional parameters for the method.
 * @returns A fully formed JsonRpcNotification.
 */
export function createNotification(
  method: string,
  params?: Record<string, unknown> | unknown[]
): JsonRpcNotification {
  const notification: JsonRpcNotification = params !== undefined
    ? { jsonrpc: "2.0", method, params }
    : { jsonrpc: "2.0", method };
  return notification;
}

/**
 * Build a JSON-RPC 2.0 success response.
 *
 * @param id - The request id this response corresponds to.
 * @param result - The result payload.
 * @returns A fully formed JsonRpcSuccessResponse.
 */
export function createResponse(
  id: string | number | null,
  result: unknown
): JsonRpcSuccessResponse {
  return { jsonrpc: "2.0", id, result };
}

/**
 * Build a JSON-RPC 2.0 error response.
 *
 * @param id - The request id this response corresponds to (null if unknown).
 * @param code - Numeric error code.
 * @param message - Human-readable error description.
 * @param data - Optional additional error data.
 * @returns A fully formed JsonRpcErrorResponse.
 */
export function createErrorResponse(
  id: string | number | null,
  code: number,
  message: string,
  data?: unknown
): JsonRpcErrorResponse {
  const error = data !== undefined
    ? { code, message, data }
    : { code, message };
  return { jsonrpc: "2.0", id, error };
}

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

/**
 * Check whether an unknown value is a plain object (non-null, non-array).
 *
 * @param value - The value to check.
 * @returns True if value is a plain object.
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check whether a value is a valid JSON-RPC 2.0 version tag.
 *
 * @param value - The value to check.
 * @returns True if value is the string "2.0".
 */
function isJsonRpc20(value: unknown): value is "2.0" {
  return value === "2.0";
}

/**
 * Type guard: checks whether a parsed message is a JSON-RPC 2.0 request.
 *
 * A request has `jsonrpc: "2.0"`, a `method` string, and an `id`.
 *
 * @param msg - The message to check.
 * @returns True if the message is a JsonRpcRequest.
 */
export function isRequest(msg: unknown): msg is JsonRpcRequest {
  if (!isPlainObject(msg)) return false;
  return (
    isJsonRpc20(msg["jsonrpc"]) &&
    typeof msg["method"] === "string" &&
    "id" in msg &&
    (typeof msg["id"] === "string" || typeof msg["id"] === "number")
  );
}

/**
 * Type guard: checks whether a parsed message is a JSON-RPC 2.0 notification.
 *
 * A notification has `jsonrpc: "2.0"`, a `method` string, and no `id`.
 *
 * @param msg - The message to check.
 * @returns True if the message is a JsonRpcNotification.
 */
export function isNotification(msg: unknown): msg is JsonRpcNotification {
  if (!isPlainObject(msg)) return false;
  return (
    isJsonRpc20(msg["jsonrpc"]) &&
    typeof msg["method"] === "string" &&
    !("id" in msg)
  );
}

/**
 * Type guard: checks whether a parsed message is a JSON-RPC 2.0 success response.
 *
 * A success response has `jsonrpc: "2.0"`, an `id`, and a `result` field.
 *
 * @param msg - The message to check.
 * @returns True if the message is a JsonRpcSuccessResponse.
 */
function isSuccessResponse(msg: unknown): msg is JsonRpcSuccessResponse {
  if (!isPlainObject(msg)) return false;
  return (
    isJsonRpc20(msg["jsonrpc"]) &&
    "id" in msg &&
    "result" in msg &&
    !("error" in msg)
  );
}

/**
 * Type guard: checks whether a parsed message is a JSON-RPC 2.0 error response.
 *
 * An error response has `jsonrpc: "2.0"`, an `id`, and an `error` object
 * with numeric `code` and string `message`.
 *
 * @param msg - The message to check.
 * @returns True if the message is a JsonRpcErrorResponse.
 */
export function isError(msg: unknown): msg is JsonRpcErrorResponse {
  if (!isPlainObject(msg)) return false;
  if (!isJsonRpc20(msg["jsonrpc"])) return false;
  if (!("id" in msg)) return false;
  if (!("error" in msg)) return false;
  const err = msg["error"];
  if (!isPlainObject(err)) return false;
  return typeof err["code"] === "number" && typeof err["message"] === "string";
}

/**
 * Type guard: checks whether a parsed message is a JSON-RPC 2.0 response
 * (either success or error).
 *
 * @param msg - The message to check.
 * @returns True if the message is a JsonRpcResponse.
 */
export function isResponse(msg: unknown): msg is JsonRpcResponse {
  return isSuccessResponse(msg) || isError(msg);
}

// ---------------------------------------------------------------------------
// Message Parsing
// ---------------------------------------------------------------------------

/** Result of parsing a JSON-RPC message string. */
export type ParsedMessage =
  | { readonly type: "request"; readonly message: JsonRpcRequest }
  | { readonly type: "notification"; readonly message: JsonRpcNotification }
  | { readonly type: "response"; readonly message: JsonRpcResponse };

/**
 * Parse and classify an incoming JSON-RPC message string.
 *
 * @param json - The raw JSON string to parse.
 * @returns A discriminated union describing the parsed message type.
 * @throws {ProtocolError} If the JSON is invalid, is a batch, or is not a
 *   JSON-RPC 2.0 request, notification, or response.
 */
export function parseMessage(json: string): ParsedMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ProtocolError("Parse error: invalid JSON", error);
  }

  if (Array.isArray(parsed)) {
    throw new ProtocolError("Unsupported message: JSON-RPC batches are not accepted");
  }

  if (isRequest(parsed)) {
    return { type: "request", message: parsed };
  }
  if (isNotification(parsed)) {
    return { type: "notification", message: parsed };
  }
  if (isResponse(parsed)) {
    return { type: "response", message: parsed };
  }

  throw new ProtocolError(
    "Invalid message: not a JSON-RPC 2.0 request, notification, or response"
  );
}

/**
 * Unwrap the response to a request.
 *
 * @param raw - Serialized response received for the request.
 * @param expectedId - Id of the request that was sent.
 * @returns The `result` member.
 * @throws {ProtocolError} If the message is not a response to `expectedId`.
 * @throws {RemoteError} If the server answered with an error object.
 */
export function unwrapResponse(raw: string, expectedId: string | number): unknown {
  const parsed = parseMessage(raw);
  if (parsed.type !== "response") {
    throw new ProtocolError(`Expected a response to request ${expectedId}, got a ${parsed.type}`);
  }

  const response = parsed.message;
  if (response.id !== expectedId) {
    throw new ProtocolError(
      `Response id ${String(response.id)} does not match request id ${expectedId}`
    );
  }

  if (isError(response)) {
    throw new RemoteError(response.error.message, response.error.code, response.error.data);
  }
  return response.result;
}

/**
 * Read the id of a serialized request without full validation.
 *
 * Used by stream transports to correlate a write with the line that
 * answers it.
 *
 * @returns The id, or undefined for notifications and unparsable input.
 */
export function peekRequestId(json: string): string | number | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return undefined;
  }
  if (!isPlainObject(parsed)) return undefined;
  const id = parsed["id"];
  return typeof id === "string" || typeof id === "number" ? id : undefined;
}
