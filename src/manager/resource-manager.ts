/**
 * Resource Manager: catalog, cache and subscriptions for server resources.
 *
 * Subscriptions are counted per URI. The first subscriber of a URI causes
 * one upstream `resources/subscribe`, concurrent first subscribers share it,
 * and the last one to leave sends `resources/unsubscribe`. Updates replace
 * the cache entry as a whole and are delivered to the URI's callbacks one
 * at a time.
 */

import { ProtocolError, ResourceNotFoundError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  ResourceUpdatedParams,
  ResourcesReadResult,
  expectShape,
} from "../protocol-schema.js";
import type { MCPResourceType } from "../protocol-schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Sends one request to a named server and returns its `result`. */
export type ResourceRpc = (
  serverName: string,
  method: string,
  params: Record<string, unknown>
) => Promise<unknown>;

/** Delivered to subscribers on every change of a resource. */
export interface ResourceUpdate {
  readonly uri: string;
  readonly serverName: string;
  readonly value: unknown;
  /** Increases by one with every cached value of the URI. */
  readonly version: number;
  readonly updatedAt: Date;
}

export type ResourceCallback = (update: ResourceUpdate) => void | Promise<void>;

export interface ResourceInfo {
  readonly uri: string;
  readonly serverName: string;
  readonly name: string;
  readonly description: string;
  readonly mimeType: string;
}

export interface CachedResource {
  readonly uri: string;
  readonly serverName: string;
  readonly value: unknown;
  readonly mimeType: string;
  readonly version: number;
  readonly cachedAt: number;
}

export interface ResourceSubscription {
  readonly uri: string;
  readonly subscriberId: string;
  readonly serverName: string;
  readonly createdAt: Date;
  readonly lastValue: unknown;
  readonly lastUpdatedAt: Date | null;
}

export interface ResourceReadOptions {
  /** Serve a fresh cache entry instead of asking the server. Default: true. */
  readonly useCache?: boolean;
  /** Owning server, when the URI is not in the catalog. */
  readonly serverName?: string;
}

export interface ResourceManagerStats {
  readonly resources: number;
  readonly cached: number;
  readonly subscribedUris: number;
  readonly subscribers: number;
  readonly updatesDelivered: number;
  readonly callbackErrors: number;
}

export interface ResourceManagerOptions {
  readonly logger: Logger;
  readonly rpc: ResourceRpc;
  readonly cacheTtlMs: number;
  readonly now?: () => number;
}

interface Subscriber {
  readonly subscriberId: string;
  readonly callback: ResourceCallback;
  readonly createdAt: Date;
}

interface UriSubscriptions {
  readonly serverName: string;
  readonly subscribers: Map<string, Subscriber>;
  /** The upstream subscribe call; null until issued or after it failed. */
  upstream: Promise<void> | null;
}

const DEFAULT_MIME_TYPE = "application/json";

// ---------------------------------------------------------------------------
// ResourceManager
// ---------------------------------------------------------------------------

export class ResourceManager {
  private readonly logger: Logger;
  private readonly rpc: ResourceRpc;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;

  private readonly catalog = new Map<string, ResourceInfo>();
  private readonly cache = new Map<string, CachedResource>();
  private readonly subscriptions = new Map<string, UriSubscriptions>();
  /** Last queued upstream call per URI; settles without rejecting. */
  private readonly upstreamTails = new Map<string, Promise<void>>();

  private updatesDelivered = 0;
  private callbackErrors = 0;

  constructor(options: ResourceManagerOptions) {
    this.logger = options.logger;
    this.rpc = options.rpc;
    this.cacheTtlMs = options.cacheTtlMs;
    this.now = options.now ?? Date.now;
  }

  // -------------------------------------------------------------------------
  // Catalog
  // -------------------------------------------------------------------------

  /**
   * Replace the catalog entries of one server with `resources`.
   * A URI listed by two servers belongs to the one registered last.
   */
  registerServer(serverName: string, resources: readonly MCPResourceType[]): number {
    for (const [uri, info] of this.catalog) {
      if (info.serverName === serverName) this.catalog.delete(uri);
    }
    for (const resource of resources) {
      const previous = this.catalog.get(resource.uri);
      if (previous !== undefined && previous.serverName !== serverName) {
        this.logger.warn(
          `Resource ${resource.uri} moves from "${previous.serverName}" to "${serverName}"`
        );
      }
      this.catalog.set(
        resource.uri,
        Object.freeze({
          uri: resource.uri,
          serverName,
          name: resource.name ?? resource.uri,
          description: resource.description ?? "",
          mimeType: resource.mimeType ?? DEFAULT_MIME_TYPE,
        })
      );
    }
    this.logger.debug(`Registered ${resources.length} resources from "${serverName}"`);
    return resources.length;
  }

  /** Catalog entries, optionally of one server, sorted by URI. */
  listResources(serverName?: string): ResourceInfo[] {
    return [...this.catalog.values()]
      .filter((info) => serverName === undefined || info.serverName === serverName)
      .sort((a, b) => a.uri.localeCompare(b.uri));
  }

  getResourceInfo(uri: string): ResourceInfo | undefined {
    return this.catalog.get(uri);
  }

  // -------------------------------------------------------------------------
  // Subscriptions
  // -------------------------------------------------------------------------

  /**
   * Subscribe `subscriberId` to changes of `uri`. Subscribing twice with the
   * same id returns the existing subscription and keeps its first callback.
   *
   * @param serverName - Owning server; looked up in the catalog when omitted.
   * @throws {ResourceNotFoundError} If no server is known for the URI.
   */
  async subscribe(
    uri: string,
    subscriberId: string,
    callback: ResourceCallback,
    serverName?: string
  ): Promise<ResourceSubscription> {
    let entry = this.subscriptions.get(uri);
    if (entry === undefined) {
      entry = {
        serverName: this.ownerOf(uri, serverName),
        subscribers: new Map(),
        upstream: null,
      };
      this.subscriptions.set(uri, entry);
    }

    if (!entry.subscribers.has(subscriberId)) {
      entry.subscribers.set(subscriberId, { subscriberId, callback, createdAt: new Date() });
    }

    try {
      await this.ensureUpstream(uri, entry);
    } catch (error) {
      this.removeSubscriber(uri, subscriberId);
      throw error;
    }

    const subscriber = entry.subscribers.get(subscriberId);
    if (subscriber === undefined) {
      // Dropped while the upstream call was in flight, e.g. by dropServer.
      throw new ResourceNotFoundError(uri);
    }
    return this.describe(uri, entry.serverName, subscriber);
  }

  /**
   * Remove one subscriber. The last subscriber of a URI also cancels the
   * upstream subscription; a failure to do so is logged.
   *
   * @returns Whether the subscriber existed.
   */
  async unsubscribe(uri: string, subscriberId: string): Promise<boolean> {
    const entry = this.subscriptions.get(uri);
    if (entry === undefined || !entry.subscribers.has(subscriberId)) {
      return false;
    }
    this.removeSubscriber(uri, subscriberId);
    if (entry.subscribers.size > 0 || entry.upstream === null) {
      return true;
    }

    const subscribed = entry.upstream.then(
      () => true,
      () => false
    );
    try {
      await this.runUpstream(uri, async () => {
        if (await subscribed) {
          await this.rpc(entry.serverName, "resources/unsubscribe", { uri });
        }
      });
    } catch (error) {
      this.logger.warn(`Upstream unsubscribe of ${uri} failed`, { error: errorMessage(error) });
    }
    return true;
  }

  /** Every subscription, sorted by URI then subscriber id. */
  listSubscriptions(): ResourceSubscription[] {
    const result: ResourceSubscription[] = [];
    for (const [uri, entry] of this.subscriptions) {
      for (const subscriber of entry.subscribers.values()) {
        result.push(this.describe(uri, entry.serverName, subscriber));
      }
    }
    return result.sort(
      (a, b) => a.uri.localeCompare(b.uri) || a.subscriberId.localeCompare(b.subscriberId)
    );
  }

  /**
   * Apply a `notifications/resources/updated` from `serverName`.
   *
   * The new value comes from the notification when it carries one and from
   * `resources/read` otherwise. Callbacks run one after another; their
   * errors are logged and counted.
   *
   * @throws {ProtocolError} If the params are malformed.
   */
  async handleUpdate(serverName: string, params: unknown): Promise<void> {
    const { uri, value } = expectShape(ResourceUpdatedParams, params, "resources/updated params");
    const entry = this.subscriptions.get(uri);

    if (entry !== undefined && entry.serverName !== serverName) {
      this.logger.debug(`Ignoring update of ${uri} from "${serverName}"`);
      return;
    }
    if (entry === undefined && value === undefined) {
      // Nobody listens; the next read fetches a fresh value.
      this.cache.delete(uri);
      return;
    }

    const cached =
      value === undefined
        ? await this.fetch(serverName, uri)
        : this.store(serverName, uri, value, this.catalog.get(uri)?.mimeType ?? DEFAULT_MIME_TYPE);

    const current = this.subscriptions.get(uri);
    if (current === undefined) return;

    const update: ResourceUpdate = Object.freeze({
      uri,
      serverName,
      value: cached.value,
      version: cached.version,
      updatedAt: new Date(cached.cachedAt),
    });
    for (const subscriber of [...current.subscribers.values()]) {
      try {
        await subscriber.callback(update);
        this.updatesDelivered += 1;
      } catch (error) {
        this.callbackErrors += 1;
        this.logger.error(`Subscriber "${subscriber.subscriberId}" of ${uri} failed`, {
          error: errorMessage(error),
        });
      }
    }
  }

  // -------------------------------------------------------------------------
  // Reads and cache
  // -------------------------------------------------------------------------

  /**
   * Read a resource, from the cache while its entry is younger than the TTL.
   *
   * @throws {ResourceNotFoundError} If no server is known for the URI.
   * @throws {ProtocolError} If the read result is malformed.
   */
  async read(uri: string, options: ResourceReadOptions = {}): Promise<unknown> {
    const serverName = this.ownerOf(uri, options.serverName);
    if (options.useCache ?? true) {
      const cached = this.getCached(uri);
      if (cached !== undefined) return cached.value;
    }
    const fresh = await this.fetch(serverName, uri);
    return fresh.value;
  }

  /** The cache entry of a URI, unless missing or expired. */
  getCached(uri: string): CachedResource | undefined {
    const entry = this.cache.get(uri);
    if (entry === undefined) return undefined;
    if (this.now() - entry.cachedAt >= this.cacheTtlMs) {
      this.cache.delete(uri);
      return undefined;
    }
    return entry;
  }

  invalidate(uri: string): boolean {
    return this.cache.delete(uri);
  }

  /**
   * Forget everything that belongs to a server whose session closed:
   * catalog entries, cached values and subscriptions. Nothing is sent.
   */
  dropServer(serverName: string): void {
    let dropped = 0;
    for (const [uri, entry] of this.subscriptions) {
      if (entry.serverName === serverName) {
        dropped += entry.subscribers.size;
        this.subscriptions.delete(uri);
      }
    }
    for (const [uri, entry] of this.cache) {
      if (entry.serverName === serverName) this.cache.delete(uri);
    }
    for (const [uri, info] of this.catalog) {
      if (info.serverName === serverName) this.catalog.delete(uri);
    }
    if (dropped > 0) {
      this.logger.info(`Dropped ${dropped} subscriptions of "${serverName}"`);
    }
  }

  stats(): ResourceManagerStats {
    let subscribers = 0;
    for (const entry of this.subscriptions.values()) {
      subscribers += entry.subscribers.size;
    }
    return {
      resources: this.catalog.size,
      cached: this.cache.size,
      subscribedUris: this.subscriptions.size,
      subscribers,
      updatesDelivered: this.updatesDelivered,
      callbackErrors: this.callbackErrors,
    };
  }

  // -------------------------------------------------------------------------
  // Private Methods
  // -------------------------------------------------------------------------

  private ownerOf(uri: string, serverName: string | undefined): string {
    const owner =
      serverName ?? this.catalog.get(uri)?.serverName ?? this.subscriptions.get(uri)?.serverName;
    if (owner === undefined) {
      throw new ResourceNotFoundError(uri);
    }
    return owner;
  }

  /**
   * Run an upstream subscribe or unsubscribe of `uri` after the ones issued
   * before it, so the server sees them in the order they were made.
   */
  private runUpstream(uri: string, call: () => Promise<unknown>): Promise<void> {
    const previous = this.upstreamTails.get(uri) ?? Promise.resolve();
    const run = previous.then(async () => {
      await call();
    });
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.upstreamTails.get(uri) === tail) this.upstreamTails.delete(uri);
      });
    this.upstreamTails.set(uri, tail);
    return run;
  }

  private ensureUpstream(uri: string, entry: UriSubscriptions): Promise<void> {
    if (entry.upstream === null) {
      const serverName = entry.serverName;
      entry.upstream = this.runUpstream(uri, () =>
        this.rpc(serverName, "resources/subscribe", { uri })
      ).then(
        () => {
          this.logger.debug(`Subscribed to ${uri} on "${entry.serverName}"`);
        },
        (error: unknown) => {
          entry.upstream = null;
          throw error;
        }
      );
    }
    return entry.upstream;
  }

  private removeSubscriber(uri: string, subscriberId: string): void {
    const entry = this.subscriptions.get(uri);
    if (entry === undefined) return;
    entry.subscribers.delete(subscriberId);
    if (entry.subscribers.size === 0) {
      this.subscriptions.delete(uri);
    }
  }

  private async fetch(serverName: string, uri: string): Promise<CachedResource> {
    const raw = await this.rpc(serverName, "resources/read", { uri });
    const { contents } = expectShape(ResourcesReadResult, raw, "resources/read result");
    const content = contents.find((item) => item.uri === uri) ?? contents[0];
    if (content === undefined) {
      return this.store(serverName, uri, null, DEFAULT_MIME_TYPE);
    }

    const mimeType = content.mimeType ?? this.catalog.get(uri)?.mimeType ?? DEFAULT_MIME_TYPE;
    let value: unknown = content.text ?? content.blob ?? null;
    if (content.text !== undefined && mimeType.includes("json")) {
      try {
        value = JSON.parse(content.text);
      } catch (error) {
        throw new ProtocolError(`Resource ${uri} is not valid JSON`, error);
      }
    }
    return this.store(serverName, uri, value, mimeType);
  }

  private store(serverName: string, uri: string, value: unknown, mimeType: string): CachedResource {
    const previous = this.cache.get(uri);
    const entry: CachedResource = Object.freeze({
      uri,
      serverName,
      value,
      mimeType,
      version: (previous?.version ?? 0) + 1,
      cachedAt: this.now(),
    });
    this.cache.set(uri, entry);
    return entry;
  }

  private describe(uri: string, serverName: string, subscriber: Subscriber): ResourceSubscription {
    const cached = this.cache.get(uri);
    return {
      uri,
      subscriberId: subscriber.subscriberId,
      serverName,
      createdAt: subscriber.createdAt,
      lastValue: cached?.value,
      lastUpdatedAt: cached !== undefined ? new Date(cached.cachedAt) : null,
    };
  }
}
