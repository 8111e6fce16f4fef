/**
 * Unit tests for ResourceManager with a scripted rpc function.
 *
 * @see /src/manager/resource-manager.ts
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { ResourceManager } from "../../src/manager/resource-manager.js";
import type { ResourceUpdate } from "../../src/manager/resource-manager.js";
import { ProtocolError, ResourceNotFoundError, TransportError } from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";

const STANDINGS = "league://league_2025/standings";
const SCHEDULE = "league://league_2025/schedule";

interface RpcCall {
  readonly serverName: string;
  readonly method: string;
  readonly params: Record<string, unknown>;
}

function standingsText(points: number): string {
  return JSON.stringify({ standings: [{ player_id: "P01", points }] });
}

describe("ResourceManager", () => {
  let clock: number;
  let calls: RpcCall[];
  let replies: Map<string, () => Promise<unknown>>;
  let manager: ResourceManager;

  beforeEach(() => {
    clock = 1_000;
    calls = [];
    replies = new Map();
    replies.set("resources/subscribe", async () => ({}));
    replies.set("resources/unsubscribe", async () => ({}));
    replies.set("resources/read", async () => ({
      contents: [{ uri: STANDINGS, mimeType: "application/json", text: standingsText(3) }],
    }));

    manager = new ResourceManager({
      logger: silentLogger,
      cacheTtlMs: 60_000,
      now: () => clock,
      rpc: async (serverName, method, params) => {
        calls.push({ serverName, method, params });
        const reply = replies.get(method);
        if (reply === undefined) throw new Error(`unexpected ${method}`);
        return reply();
      },
    });
    manager.registerServer("league_server", [
      { uri: STANDINGS, name: "standings", mimeType: "application/json" },
      { uri: SCHEDULE },
    ]);
  });

  function methods(): string[] {
    return calls.map((call) => call.method);
  }

  // -------------------------------------------------------------------------
  // 1. Catalog
  // -------------------------------------------------------------------------

  describe("catalog", () => {
    it("fills in defaults for optional fields", () => {
      expect(manager.getResourceInfo(SCHEDULE)).toEqual({
        uri: SCHEDULE,
        serverName: "league_server",
        name: SCHEDULE,
        description: "",
        mimeType: "application/json",
      });
    });

    it("replaces a server's entries on re-registration", () => {
      manager.registerServer("league_server", [{ uri: SCHEDULE }]);

      expect(manager.listResources().map((info) => info.uri)).toEqual([SCHEDULE]);
    });

    it("gives a URI to the server registered last", () => {
      manager.registerServer("referee_REF01", [{ uri: STANDINGS }]);

      expect(manager.getResourceInfo(STANDINGS)?.serverName).toBe("referee_REF01");
      expect(manager.listResources("league_server").map((info) => info.uri)).toEqual([SCHEDULE]);
    });
  });

  // -------------------------------------------------------------------------
  // 2. Subscriptions
  // -------------------------------------------------------------------------

  describe("subscribe", () => {
    it("subscribes upstream once for the first subscriber", async () => {
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());
      await manager.subscribe(STANDINGS, "player-P02", vi.fn());

      expect(calls).toEqual([
        { serverName: "league_server", method: "resources/subscribe", params: { uri: STANDINGS } },
      ]);
      expect(manager.stats()).toMatchObject({ subscribedUris: 1, subscribers: 2 });
    });

    it("shares one upstream call between concurrent first subscribers", async () => {
      await Promise.all([
        manager.subscribe(STANDINGS, "player-P01", vi.fn()),
        manager.subscribe(STANDINGS, "player-P02", vi.fn()),
      ]);

      expect(methods()).toEqual(["resources/subscribe"]);
    });

    it("is idempotent per subscriber and keeps the first callback", async () => {
      const first = vi.fn();
      const second = vi.fn();
      await manager.subscribe(STANDINGS, "player-P01", first);
      await manager.subscribe(STANDINGS, "player-P01", second);

      await manager.handleUpdate("league_server", { uri: STANDINGS, value: { round: 1 } });

      expect(first).toHaveBeenCalledTimes(1);
      expect(second).not.toHaveBeenCalled();
      expect(manager.stats().subscribers).toBe(1);
    });

    it("throws ResourceNotFoundError for an unknown URI without a server", async () => {
      await expect(manager.subscribe("league://nowhere", "p", vi.fn())).rejects.toBeInstanceOf(
        ResourceNotFoundError
      );
      expect(calls).toEqual([]);
    });

    it("uses an explicit server for URIs outside the catalog", async () => {
      const subscription = await manager.subscribe(
        "league://match/M1",
        "player-P01",
        vi.fn(),
        "referee_REF01"
      );

      expect(subscription).toMatchObject({
        uri: "league://match/M1",
        serverName: "referee_REF01",
        lastValue: undefined,
        lastUpdatedAt: null,
      });
      expect(calls[0]?.serverName).toBe("referee_REF01");
    });

    it("removes the subscriber when the upstream call fails and retries next time", async () => {
      replies.set("resources/subscribe", async () => {
        throw new TransportError("connection refused");
      });

      await expect(manager.subscribe(STANDINGS, "player-P01", vi.fn())).rejects.toBeInstanceOf(
        TransportError
      );
      expect(manager.listSubscriptions()).toEqual([]);

      replies.set("resources/subscribe", async () => ({}));
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());
      expect(methods()).toEqual(["resources/subscribe", "resources/subscribe"]);
    });
  });

  describe("unsubscribe", () => {
    it("unsubscribes upstream only when the last subscriber leaves", async () => {
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());
      await manager.subscribe(STANDINGS, "player-P02", vi.fn());

      expect(await manager.unsubscribe(STANDINGS, "player-P01")).toBe(true);
      expect(methods()).toEqual(["resources/subscribe"]);

      expect(await manager.unsubscribe(STANDINGS, "player-P02")).toBe(true);
      expect(methods()).toEqual(["resources/subscribe", "resources/unsubscribe"]);
      expect(manager.stats().subscribedUris).toBe(0);
    });

    it("sends a resubscribe after the unsubscribe it follows", async () => {
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());

      const [left, joined] = await Promise.all([
        manager.unsubscribe(STANDINGS, "player-P01"),
        manager.subscribe(STANDINGS, "player-P02", vi.fn()),
      ]);

      expect(left).toBe(true);
      expect(joined.subscriberId).toBe("player-P02");
      expect(methods()).toEqual([
        "resources/subscribe",
        "resources/unsubscribe",
        "resources/subscribe",
      ]);
      expect(manager.listSubscriptions().map((s) => s.subscriberId)).toEqual(["player-P02"]);
    });

    it("skips the upstream unsubscribe when the subscribe failed", async () => {
      let failSubscribe: (error: Error) => void = () => undefined;
      replies.set(
        "resources/subscribe",
        () =>
          new Promise((_resolve, reject) => {
            failSubscribe = reject;
          })
      );
      const subscribing = manager.subscribe(STANDINGS, "player-P01", vi.fn());
      await vi.waitFor(() => expect(methods()).toEqual(["resources/subscribe"]));

      const leaving = manager.unsubscribe(STANDINGS, "player-P01");
      failSubscribe(new TransportError("refused"));

      await expect(subscribing).rejects.toThrow("refused");
      await expect(leaving).resolves.toBe(true);
      expect(methods()).toEqual(["resources/subscribe"]);
    });

    it("returns false for unknown subscribers", async () => {
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());

      expect(await manager.unsubscribe(STANDINGS, "player-P09")).toBe(false);
      expect(await manager.unsubscribe(SCHEDULE, "player-P01")).toBe(false);
    });

    it("swallows upstream unsubscribe failures after logging", async () => {
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());
      replies.set("resources/unsubscribe", async () => {
        throw new TransportError("gone");
      });

      await expect(manager.unsubscribe(STANDINGS, "player-P01")).resolves.toBe(true);
    });

    it("lists subscriptions sorted by URI and subscriber", async () => {
      await manager.subscribe(STANDINGS, "player-P02", vi.fn());
      await manager.subscribe(SCHEDULE, "player-P01", vi.fn());
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());

      expect(
        manager.listSubscriptions().map((s) => `${s.uri}#${s.subscriberId}`)
      ).toEqual([
        `${SCHEDULE}#player-P01`,
        `${STANDINGS}#player-P01`,
        `${STANDINGS}#player-P02`,
      ]);
    });
  });

  // -------------------------------------------------------------------------
  // 3. Updates
  // -------------------------------------------------------------------------

  describe("handleUpdate", () => {
    it("fetches the new value and delivers it to every subscriber", async () => {
      const seen: ResourceUpdate[] = [];
      await manager.subscribe(STANDINGS, "player-P01", (update) => {
        seen.push(update);
      });

      await manager.handleUpdate("league_server", { uri: STANDINGS });

      expect(methods()).toEqual(["resources/subscribe", "resources/read"]);
      expect(seen).toEqual([
        {
          uri: STANDINGS,
          serverName: "league_server",
          value: { standings: [{ player_id: "P01", points: 3 }] },
          version: 1,
          updatedAt: new Date(1_000),
        },
      ]);
    });

    it("uses an inline value and bumps the version", async () => {
      const versions: number[] = [];
      await manager.subscribe(STANDINGS, "player-P01", (update) => {
        versions.push(update.version);
      });

      await manager.handleUpdate("league_server", { uri: STANDINGS, value: { round: 1 } });
      await manager.handleUpdate("league_server", { uri: STANDINGS, value: { round: 2 } });

      expect(versions).toEqual([1, 2]);
      expect(manager.getCached(STANDINGS)?.value).toEqual({ round: 2 });
      expect(methods()).toEqual(["resources/subscribe"]);
    });

    it("keeps delivering after a callback fails", async () => {
      const good = vi.fn();
      await manager.subscribe(STANDINGS, "a-failing", () => {
        throw new Error("subscriber crashed");
      });
      await manager.subscribe(STANDINGS, "b-good", good);

      await manager.handleUpdate("league_server", { uri: STANDINGS, value: 1 });

      expect(good).toHaveBeenCalledTimes(1);
      expect(manager.stats()).toMatchObject({ updatesDelivered: 1, callbackErrors: 1 });
    });

    it("ignores updates from a server that does not own the subscription", async () => {
      const callback = vi.fn();
      await manager.subscribe(STANDINGS, "player-P01", callback);

      await manager.handleUpdate("referee_REF01", { uri: STANDINGS, value: 1 });

      expect(callback).not.toHaveBeenCalled();
      expect(manager.getCached(STANDINGS)).toBeUndefined();
    });

    it("only invalidates the cache when nobody listens", async () => {
      await manager.read(STANDINGS);
      expect(manager.getCached(STANDINGS)).toBeDefined();

      await manager.handleUpdate("league_server", { uri: STANDINGS });

      expect(manager.getCached(STANDINGS)).toBeUndefined();
      expect(methods()).toEqual(["resources/read"]);
    });

    it("rejects malformed params", async () => {
      await expect(manager.handleUpdate("league_server", { value: 1 })).rejects.toBeInstanceOf(
        ProtocolError
      );
    });
  });

  // -------------------------------------------------------------------------
  // 4. Reads and cache
  // -------------------------------------------------------------------------

  describe("read", () => {
    it("serves from the cache until the TTL passes", async () => {
      const first = await manager.read(STANDINGS);
      clock += 59_999;
      await manager.read(STANDINGS);
      expect(methods()).toEqual(["resources/read"]);

      clock += 1;
      await manager.read(STANDINGS);
      expect(methods()).toEqual(["resources/read", "resources/read"]);
      expect(first).toEqual({ standings: [{ player_id: "P01", points: 3 }] });
    });

    it("bypasses the cache on request", async () => {
      await manager.read(STANDINGS);
      await manager.read(STANDINGS, { useCache: false });

      expect(methods()).toEqual(["resources/read", "resources/read"]);
      expect(manager.getCached(STANDINGS)?.version).toBe(2);
    });

    it("returns text as is for non-JSON resources", async () => {
      replies.set("resources/read", async () => ({
        contents: [{ uri: SCHEDULE, mimeType: "text/plain", text: "round 1: P01 vs P02" }],
      }));

      await expect(manager.read(SCHEDULE)).resolves.toBe("round 1: P01 vs P02");
    });

    it("returns null for an empty contents list", async () => {
      replies.set("resources/read", async () => ({ contents: [] }));

      await expect(manager.read(SCHEDULE)).resolves.toBeNull();
    });

    it("throws ProtocolError for invalid JSON text", async () => {
      replies.set("resources/read", async () => ({
        contents: [{ uri: STANDINGS, text: "{not json" }],
      }));

      await expect(manager.read(STANDINGS)).rejects.toThrow(
        `Resource ${STANDINGS} is not valid JSON`
      );
    });

    it("invalidate drops the cache entry", async () => {
      await manager.read(STANDINGS);

      expect(manager.invalidate(STANDINGS)).toBe(true);
      expect(manager.invalidate(STANDINGS)).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // 5. Server teardown
  // -------------------------------------------------------------------------

  describe("dropServer", () => {
    it("forgets subscriptions, cache and catalog of the server without sending", async () => {
      await manager.subscribe(STANDINGS, "player-P01", vi.fn());
      await manager.read(STANDINGS);
      calls = [];

      manager.dropServer("league_server");

      expect(calls).toEqual([]);
      expect(manager.stats()).toEqual({
        resources: 0,
        cached: 0,
        subscribedUris: 0,
        subscribers: 0,
        updatesDelivered: 0,
        callbackErrors: 0,
      });
    });
  });
});
