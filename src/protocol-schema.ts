/**
 * TypeBox schemas for the MCP payloads the client core consumes.
 *
 * Results coming off the wire are checked against these schemas before
 * anything else touches them; a mismatch is a {@link ProtocolError}.
 * Objects stay open (extra members are allowed) so newer servers remain
 * compatible.
 *
 * @see https://modelcontextprotocol.io/specification/2025-03-26
 */

import { Type } from "@sinclair/typebox";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ProtocolError } from "./errors.js";

/** Protocol version the client offers in the initialize handshake. */
export const MCP_PROTOCOL_VERSION = "2025-03-26";

// ---------------------------------------------------------------------------
// Initialize
// ---------------------------------------------------------------------------

export const MCPServerInfo = Type.Object({
  name: Type.String(),
  version: Type.String(),
});

export const InitializeResult = Type.Object({
  protocolVersion: Type.String(),
  capabilities: Type.Record(Type.String(), Type.Unknown()),
  serverInfo: MCPServerInfo,
  instructions: Type.Optional(Type.String()),
});

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** JSON Schema of a tool's input parameters. */
export const MCPToolInput = Type.Object({
  type: Type.Literal("object"),
  properties: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  required: Type.Optional(Type.Array(Type.String())),
});

/** A single tool definition from tools/list. */
export const MCPTool = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String()),
  inputSchema: MCPToolInput,
});

export const ToolsListResult = Type.Object({
  tools: Type.Array(MCPTool),
  nextCursor: Type.Optional(Type.String()),
});

/** Content item within a tools/call result. */
export const MCPToolResultContent = Type.Object({
  type: Type.String(),
  text: Type.Optional(Type.String()),
  data: Type.Optional(Type.String()),
  mimeType: Type.Optional(Type.String()),
});

export const ToolsCallResult = Type.Object({
  content: Type.Array(MCPToolResultContent),
  isError: Type.Optional(Type.Boolean()),
});

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

export const MCPResource = Type.Object({
  uri: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  mimeType: Type.Optional(Type.String()),
});

export const ResourcesListResult = Type.Object({
  resources: Type.Array(MCPResource),
  nextCursor: Type.Optional(Type.String()),
});

export const MCPResourceContents = Type.Object({
  uri: Type.String(),
  mimeType: Type.Optional(Type.String()),
  text: Type.Optional(Type.String()),
  blob: Type.Optional(Type.String()),
});

export const ResourcesReadResult = Type.Object({
  contents: Type.Array(MCPResourceContents),
});

/** Params of `notifications/resources/updated`. */
export const ResourceUpdatedParams = Type.Object({
  uri: Type.String({ minLength: 1 }),
  /** Some servers push the new value inline; otherwise it is fetched. */
  value: Type.Optional(Type.Unknown()),
});

export type MCPServerInfoType = Static<typeof MCPServerInfo>;
export type InitializeResultType = Static<typeof InitializeResult>;
export type MCPToolType = Static<typeof MCPTool>;
export type ToolsListResultType = Static<typeof ToolsListResult>;
export type ToolsCallResultType = Static<typeof ToolsCallResult>;
export type MCPResourceType = Static<typeof MCPResource>;
export type ResourcesListResultType = Static<typeof ResourcesListResult>;
export type ResourcesReadResultType = Static<typeof ResourcesReadResult>;
export type ResourceUpdatedParamsType = Static<typeof ResourceUpdatedParams>;

/**
 * Check a decoded result against a schema.
 *
 * @param schema - Expected shape.
 * @param value - Decoded `result` member of a JSON-RPC response.
 * @param what - Label used in the error message, e.g. "tools/list result".
 * @returns The value, typed by the schema.
 * @throws {ProtocolError} Describing the first mismatch.
 */
export function expectShape<T extends TSchema>(
  schema: T,
  value: unknown,
  what: string
): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const first = Value.Errors(schema, value).First();
  const detail = first !== undefined ? `${first.path || "/"}: ${first.message}` : "shape mismatch";
  throw new ProtocolError(`Malformed ${what} (${detail})`);
}
