/**
 * Tests for SessionManager over FakeTransport: the initialize handshake,
 * connect sharing, teardown, health tracking and give-up.
 *
 * @see /src/manager/session-manager.ts
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { SessionManager } from "../../src/manager/session-manager.js";
import type { Session, SessionManagerOptions } from "../../src/manager/session-manager.js";
import type { ClientConfig } from "../../src/config-schema.js";
import {
  ProtocolError,
  RemoteError,
  SessionClosedError,
  TransportError,
} from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";
import type { JsonRpcNotification } from "../../src/types.js";
import { testConfig, testEndpoint } from "../fixtures/config.js";
import { FakeTransport, flush, hang } from "../fixtures/fake-transport.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Harness {
  readonly sessions: SessionManager;
  readonly transports: Map<string, FakeTransport>;
  readonly factoryCalls: () => number;
}

const harnesses: Harness[] = [];

/**
 * A SessionManager whose transports are FakeTransports. `prepare` can
 * script a transport before the manager uses it.
 */
function makeSessions(
  config: ClientConfig = testConfig(),
  prepare: (name: string, transport: FakeTransport) => void = () => {},
  overrides: Partial<SessionManagerOptions> = {}
): Harness {
  const transports = new Map<string, FakeTransport>();
  let calls = 0;
  const sessions = new SessionManager({
    config,
    logger: silentLogger,
    transportFactory: (endpoint) => {
      calls += 1;
      const transport = new FakeTransport();
      prepare(endpoint.name, transport);
      transports.set(endpoint.name, transport);
      return transport;
    },
    ...overrides,
  });
  const harness = { sessions, transports, factoryCalls: () => calls };
  harnesses.push(harness);
  return harness;
}

function transportOf(harness: Harness, name: string): FakeTransport {
  const transport = harness.transports.get(name);
  if (transport === undefined) throw new Error(`no transport for ${name}`);
  return transport;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("SessionManager", () => {
  afterEach(async () => {
    await Promise.all(harnesses.splice(0).map((h) => h.sessions.disconnectAll("test done")));
  });

  // -------------------------------------------------------------------------
  // 1. Connect
  // -------------------------------------------------------------------------

  describe("connect", () => {
    it("runs the initialize handshake and opens the notification channel", async () => {
      const harness = makeSessions();

      const session = await harness.sessions.connect(testEndpoint("league_server"));

      const transport = transportOf(harness, "league_server");
      expect(transport.started).toBe(true);
      expect(transport.listening).toBe(true);
      expect(transport.requestsFor("initialize")[0]?.params).toEqual({
        protocolVersion: "2025-03-26",
        capabilities: { resources: { subscribe: true }, tools: {} },
        clientInfo: { name: "league-mcp-client", version: "0.1.0" },
      });
      expect(transport.posted).toEqual([
        { jsonrpc: "2.0", method: "notifications/initialized" },
      ]);
      expect(session).toMatchObject({
        sessionId: "league_server-1",
        serverName: "league_server",
        state: "active",
        protocolVersion: "2025-03-26",
        serverInfo: { name: "fake-league-server", version: "1.0.0" },
      });
      expect(harness.sessions.isConnected("league_server")).toBe(true);
    });

    it("shares one attempt between concurrent connects", async () => {
      const harness = makeSessions();
      const endpoint = testEndpoint("league_server");

      const [a, b] = await Promise.all([
        harness.sessions.connect(endpoint),
        harness.sessions.connect(endpoint),
      ]);

      expect(a).toBe(b);
      expect(harness.factoryCalls()).toBe(1);
    });

    it("returns the existing session when already connected", async () => {
      const harness = makeSessions();
      const first = await harness.sessions.connect(testEndpoint("league_server"));

      const second = await harness.sessions.connect(testEndpoint("league_server"));

      expect(second).toBe(first);
      expect(harness.factoryCalls()).toBe(1);
    });

    it("skips the handshake when initialize is off", async () => {
      const harness = makeSessions();

      const session = await harness.sessions.connect(
        testEndpoint("league_server", { initialize: false })
      );

      expect(transportOf(harness, "league_server").sent).toEqual([]);
      expect(session.serverInfo).toBeNull();
      expect(session.state).toBe("active");
    });

    it("cleans up when the server rejects the handshake", async () => {
      const harness = makeSessions(testConfig(), (_name, transport) => {
        transport.on("initialize", () => ({
          error: { code: -32602, message: "Unsupported protocol version" },
        }));
      });

      await expect(
        harness.sessions.connect(testEndpoint("league_server"))
      ).rejects.toBeInstanceOf(RemoteError);

      expect(transportOf(harness, "league_server").closed).toBe(true);
      expect(harness.sessions.get("league_server")).toBeUndefined();
      expect(() => harness.sessions.require("league_server")).toThrow(SessionClosedError);
    });

    it("rejects a malformed initialize result", async () => {
      const harness = makeSessions(testConfig(), (_name, transport) => {
        transport.on("initialize", () => ({ result: { protocolVersion: 7 } }));
      });

      await expect(harness.sessions.connect(testEndpoint("league_server"))).rejects.toThrow(
        ProtocolError
      );
    });

    it("surfaces a transport that cannot start", async () => {
      const harness = makeSessions(testConfig(), (_name, transport) => {
        transport.startError = new TransportError("connection refused");
      });

      await expect(harness.sessions.connect(testEndpoint("league_server"))).rejects.toThrow(
        "connection refused"
      );
      expect(harness.sessions.list()).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // 2. Status
  // -------------------------------------------------------------------------

  describe("status", () => {
    it("reports the session and its connection", async () => {
      const harness = makeSessions();
      await harness.sessions.connect(testEndpoint("league_server"));

      expect(harness.sessions.getStatus("league_server")).toEqual({
        sessionId: "league_server-1",
        serverName: "league_server",
        state: "active",
        circuitState: "closed",
        lastHeartbeatAt: null,
        consecutiveFailures: 0,
        pendingRequests: 0,
        queueDepth: 0,
        serverInfo: { name: "fake-league-server", version: "1.0.0" },
      });
      expect(harness.sessions.getStatus("unknown")).toBeUndefined();
    });

    it("forwards notifications with the server name", async () => {
      const received: Array<[string, JsonRpcNotification]> = [];
      const harness = makeSessions(testConfig(), () => {}, {
        onNotification: (serverName, notification) => {
          received.push([serverName, notification]);
        },
      });
      await harness.sessions.connect(testEndpoint("league_server"));

      transportOf(harness, "league_server").emitNotification("notifications/message", {
        level: "info",
        data: "round 1 started",
      });
      await flush();

      expect(received).toEqual([
        [
          "league_server",
          {
            jsonrpc: "2.0",
            method: "notifications/message",
            params: { level: "info", data: "round 1 started" },
          },
        ],
      ]);
    });

    it("tracks heartbeat health on the session", async () => {
      let pingFails = true;
      const harness = makeSessions(
        testConfig({
          heartbeat: { enabled: true, intervalMs: 10, timeoutMs: 50, failureThreshold: 2 },
          circuitBreaker: { failureThreshold: 1000 },
        }),
        (_name, transport) => {
          transport.on("ping", () => {
            if (pingFails) throw new TransportError("no route");
            return { result: {} };
          });
        }
      );
      const session = await harness.sessions.connect(testEndpoint("league_server"));

      await vi.waitFor(() => expect(session.state).toBe("degraded"), { timeout: 2000 });

      pingFails = false;
      await vi.waitFor(() => expect(session.state).toBe("active"), { timeout: 2000 });
      expect(session.lastHeartbeatAt).toBeInstanceOf(Date);
    });

    it("records every answered heartbeat on a session that stays healthy", async () => {
      const harness = makeSessions(
        testConfig({
          heartbeat: { enabled: true, intervalMs: 10, timeoutMs: 50, failureThreshold: 2 },
        }),
        (_name, transport) => {
          transport.on("ping", () => ({ result: {} }));
        }
      );
      await harness.sessions.connect(testEndpoint("league_server"));

      await vi.waitFor(
        () =>
          expect(harness.sessions.getStatus("league_server")?.lastHeartbeatAt).toBeInstanceOf(Date),
        { timeout: 2000 }
      );
      const first = harness.sessions.getStatus("league_server")?.lastHeartbeatAt?.getTime() ?? 0;

      await vi.waitFor(
        () =>
          expect(
            harness.sessions.getStatus("league_server")?.lastHeartbeatAt?.getTime()
          ).toBeGreaterThan(first),
        { timeout: 2000 }
      );
      expect(harness.sessions.getStatus("league_server")?.state).toBe("active");
    });
  });

  // -------------------------------------------------------------------------
  // 3. Teardown
  // -------------------------------------------------------------------------

  describe("disconnect", () => {
    it("rejects pending requests and notifies listeners", async () => {
      const harness = makeSessions(testConfig(), (_name, transport) => {
        transport.on("tools/call", (_request, signal) => hang(signal));
      });
      const closed: Array<[Session, string]> = [];
      harness.sessions.onSessionClosed((session, reason) => closed.push([session, reason]));
      const session = await harness.sessions.connect(testEndpoint("league_server"));

      const pending = session.connection.request("tools/call", { name: "get_standings" });
      await flush();
      await harness.sessions.disconnect("league_server", "league over");

      await expect(pending).rejects.toBeInstanceOf(SessionClosedError);
      expect(session.state).toBe("closed");
      expect(harness.sessions.isConnected("league_server")).toBe(false);
      expect(closed).toEqual([[session, "league over"]]);
      expect(transportOf(harness, "league_server").closed).toBe(true);
    });

    it("ignores unknown servers", async () => {
      const harness = makeSessions();

      await expect(harness.sessions.disconnect("nobody")).resolves.toBeUndefined();
    });

    it("disconnectAll closes every session", async () => {
      const harness = makeSessions();
      await harness.sessions.connect(testEndpoint("league_server"));
      await harness.sessions.connect(testEndpoint("referee_REF01"));

      await harness.sessions.disconnectAll();

      expect(harness.sessions.list()).toEqual([]);
      expect(transportOf(harness, "referee_REF01").closed).toBe(true);
    });

    it("disconnects a server whose breaker stays open too long", async () => {
      let clock = 0;
      const harness = makeSessions(
        testConfig({
          circuitBreaker: { failureThreshold: 1, recoveryTimeoutMs: 60_000 },
          session: { giveUpAfterMs: 50 },
        }),
        (_name, transport) => {
          transport.on("work", () => {
            throw new TransportError("down");
          });
        },
        { now: () => clock }
      );
      const reasons: string[] = [];
      harness.sessions.onSessionClosed((_session, reason) => reasons.push(reason));
      const session = await harness.sessions.connect(testEndpoint("league_server"));

      await expect(
        session.connection.request("work", undefined, { maxAttempts: 1 })
      ).rejects.toBeInstanceOf(TransportError);
      clock = 50;
      await expect(session.connection.request("work")).rejects.toThrow(
        'Circuit open for server "league_server"'
      );
      await vi.waitFor(() => expect(reasons).toEqual(["gave up: circuit not closed for 50ms"]));

      expect(harness.sessions.get("league_server")).toBeUndefined();
    });
  });
});
