/**
 * Tool Registry: server-namespaced catalog of remote tools.
 *
 * Every tool is registered as `<serverName>.<toolName>`. Server names
 * cannot contain ".", so the namespaced name is unique by construction and
 * splits back unambiguously at its first dot. Unqualified lookups succeed
 * only when exactly one server offers the tool.
 */

import { Value } from "@sinclair/typebox/value";
import {
  AmbiguousToolNameError,
  ConfigError,
  ToolNotFoundError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { MCPToolType } from "../protocol-schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A registered tool. Descriptors are frozen and replaced, never mutated. */
export interface ToolDescriptor {
  /** Namespaced name: "serverName.toolName" */
  readonly namespacedName: string;
  /** Original tool name on the remote server */
  readonly rawName: string;
  readonly serverName: string;
  readonly description: string;
  /** JSON Schema for the tool's input parameters */
  readonly inputSchema: Readonly<Record<string, unknown>>;
  readonly registeredAt: Date;
  /** Calls dispatched through this client, kept across descriptor updates. */
  readonly callCount: number;
  readonly lastCalledAt: Date | null;
}

export type RegistrationOutcome = "added" | "unchanged" | "updated";

/** What a whole-server registration changed. */
export interface ServerRegistrationSummary {
  readonly added: readonly string[];
  readonly updated: readonly string[];
  readonly unchanged: readonly string[];
  readonly removed: readonly string[];
}

/** The separator used to join server name and tool name. */
export const NAMESPACE_SEPARATOR = ".";

/** Build the namespaced name of a tool. */
export function namespacedToolName(serverName: string, rawName: string): string {
  return `${serverName}${NAMESPACE_SEPARATOR}${rawName}`;
}

// ---------------------------------------------------------------------------
// ToolRegistry
// ---------------------------------------------------------------------------

export class ToolRegistry {
  private readonly logger: Logger;

  /** Server name → namespaced name → descriptor. The ownership structure. */
  private readonly serverTools = new Map<string, Map<string, ToolDescriptor>>();

  /** Namespaced name → descriptor. */
  private readonly toolIndex = new Map<string, ToolDescriptor>();

  /** Raw tool name → names of the servers offering it. */
  private readonly rawIndex = new Map<string, Set<string>>();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Register one tool of a server.
   *
   * Registering identical content again is a no-op; different content
   * replaces the descriptor and is logged.
   *
   * @throws {ConfigError} If the server name contains the namespace separator.
   */
  registerTool(serverName: string, tool: MCPToolType): RegistrationOutcome {
    if (serverName.length === 0 || serverName.includes(NAMESPACE_SEPARATOR)) {
      throw new ConfigError(`Invalid server name "${serverName}"`);
    }

    const namespacedName = namespacedToolName(serverName, tool.name);
    const description = tool.description ?? "";
    const inputSchema: Record<string, unknown> = { ...tool.inputSchema };

    const existing = this.toolIndex.get(namespacedName);
    if (
      existing !== undefined &&
      existing.description === description &&
      Value.Equal(existing.inputSchema, inputSchema)
    ) {
      return "unchanged";
    }

    const descriptor: ToolDescriptor = Object.freeze({
      namespacedName,
      rawName: tool.name,
      serverName,
      description,
      inputSchema: Object.freeze(inputSchema),
      registeredAt: new Date(),
      callCount: existing?.callCount ?? 0,
      lastCalledAt: existing?.lastCalledAt ?? null,
    });

    let owned = this.serverTools.get(serverName);
    if (owned === undefined) {
      owned = new Map();
      this.serverTools.set(serverName, owned);
    }
    owned.set(namespacedName, descriptor);
    this.toolIndex.set(namespacedName, descriptor);

    let servers = this.rawIndex.get(tool.name);
    if (servers === undefined) {
      servers = new Set();
      this.rawIndex.set(tool.name, servers);
    }
    servers.add(serverName);

    if (existing !== undefined) {
      this.logger.info(`Tool "${namespacedName}" changed; descriptor replaced`);
      return "updated";
    }
    if (servers.size > 1) {
      this.logger.debug(
        `Tool name "${tool.name}" is offered by ${[...servers].sort().join(", ")}; callers must qualify it`
      );
    }
    return "added";
  }

  /**
   * Make a server's registered tools exactly `tools`: new ones are added,
   * changed ones replaced, vanished ones dropped.
   */
  registerServer(serverName: string, tools: readonly MCPToolType[]): ServerRegistrationSummary {
    const added: string[] = [];
    const updated: string[] = [];
    const unchanged: string[] = [];
    const seen = new Set<string>();

    for (const tool of tools) {
      const outcome = this.registerTool(serverName, tool);
      const name = namespacedToolName(serverName, tool.name);
      seen.add(name);
      if (outcome === "added") added.push(name);
      else if (outcome === "updated") updated.push(name);
      else unchanged.push(name);
    }

    const removed: string[] = [];
    for (const name of [...(this.serverTools.get(serverName)?.keys() ?? [])]) {
      if (!seen.has(name)) {
        this.removeTool(serverName, name);
        removed.push(name);
      }
    }

    return { added, updated, unchanged, removed };
  }

  /**
   * Remove all tools of a server.
   *
   * @returns How many tools were removed.
   */
  unregisterServer(serverName: string): number {
    const owned = this.serverTools.get(serverName);
    if (owned === undefined) return 0;
    const names = [...owned.keys()];
    for (const name of names) {
      this.removeTool(serverName, name);
    }
    this.serverTools.delete(serverName);
    return names.length;
  }

  /**
   * Resolve a namespaced or unqualified tool name.
   *
   * @throws {ToolNotFoundError} If nothing matches.
   * @throws {AmbiguousToolNameError} If an unqualified name matches several servers.
   */
  resolve(name: string): ToolDescriptor {
    const direct = this.toolIndex.get(name);
    if (direct !== undefined) return direct;

    // A known server prefix means the caller asked for that server's tool.
    const separator = name.indexOf(NAMESPACE_SEPARATOR);
    if (separator > 0 && this.serverTools.has(name.slice(0, separator))) {
      throw new ToolNotFoundError(name);
    }

    const servers = [...(this.rawIndex.get(name) ?? [])];
    if (servers.length === 0) {
      throw new ToolNotFoundError(name);
    }
    if (servers.length > 1) {
      const candidates = servers.map((server) => namespacedToolName(server, name)).sort();
      throw new AmbiguousToolNameError(name, candidates);
    }

    const only = this.toolIndex.get(namespacedToolName(servers[0], name));
    if (only === undefined) {
      throw new ToolNotFoundError(name);
    }
    return only;
  }

  /**
   * Count a call of a registered tool.
   *
   * @returns The replaced descriptor, or undefined for an unknown name.
   */
  recordCall(namespacedName: string, at: Date = new Date()): ToolDescriptor | undefined {
    const current = this.toolIndex.get(namespacedName);
    if (current === undefined) return undefined;

    const descriptor: ToolDescriptor = Object.freeze({
      ...current,
      callCount: current.callCount + 1,
      lastCalledAt: at,
    });
    this.toolIndex.set(namespacedName, descriptor);
    this.serverTools.get(current.serverName)?.set(namespacedName, descriptor);
    return descriptor;
  }

  /** Total calls recorded for one server's tools, or for all of them. */
  getCallCount(serverName?: string): number {
    return this.listTools(serverName).reduce((sum, tool) => sum + tool.callCount, 0);
  }

  /** Look up a namespaced name without throwing. */
  get(namespacedName: string): ToolDescriptor | undefined {
    return this.toolIndex.get(namespacedName);
  }

  /** All descriptors, or one server's, sorted by namespaced name. */
  listTools(serverName?: string): ToolDescriptor[] {
    const source =
      serverName === undefined
        ? [...this.toolIndex.values()]
        : [...(this.serverTools.get(serverName)?.values() ?? [])];
    return source.sort((a, b) => a.namespacedName.localeCompare(b.namespacedName));
  }

  /**
   * Raw tool names offered by more than one server, with the namespaced
   * names that must be used instead.
   */
  getCollisions(): Map<string, string[]> {
    const collisions = new Map<string, string[]>();
    for (const [rawName, servers] of this.rawIndex) {
      if (servers.size > 1) {
        collisions.set(
          rawName,
          [...servers].map((server) => namespacedToolName(server, rawName)).sort()
        );
      }
    }
    return collisions;
  }

  getServerNames(): string[] {
    return [...this.serverTools.keys()];
  }

  getToolCount(): number {
    return this.toolIndex.size;
  }

  clear(): void {
    this.serverTools.clear();
    this.toolIndex.clear();
    this.rawIndex.clear();
  }

  private removeTool(serverName: string, namespacedName: string): void {
    const descriptor = this.toolIndex.get(namespacedName);
    this.toolIndex.delete(namespacedName);
    this.serverTools.get(serverName)?.delete(namespacedName);
    if (descriptor === undefined) return;

    const servers = this.rawIndex.get(descriptor.rawName);
    servers?.delete(serverName);
    if (servers !== undefined && servers.size === 0) {
      this.rawIndex.delete(descriptor.rawName);
    }
  }
}
