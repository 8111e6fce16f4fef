/**
 * Unit tests for StdioTransport over an in-process pipe pair.
 *
 * A small line-oriented peer reads what the transport writes and answers on
 * the other stream, the way an MCP server would on its stdout.
 *
 * @see /src/transport/stdio.ts
 */

import { describe, it, expect, afterEach } from "vitest";
import { PassThrough } from "node:stream";
import { createInterface } from "node:readline";
import type { Interface as ReadlineInterface } from "node:readline";
import { StdioTransport } from "../../src/transport/stdio.js";
import { createNotification, createRequest, createResponse, parseMessage } from "../../src/jsonrpc.js";
import { ProtocolError, TransportError } from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";
import { delay } from "../fixtures/fake-transport.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Decides the line(s) the peer writes back for one received line. */
type Responder = (line: string) => string[];

/** Answers every request with `{ echo: method }`. */
const echo: Responder = (line) => {
  const parsed = parseMessage(line);
  if (parsed.type !== "request") return [];
  return [JSON.stringify(createResponse(parsed.message.id, { echo: parsed.message.method }))];
};

interface Peer {
  readonly transport: StdioTransport;
  /** Lines the transport wrote. */
  readonly received: string[];
  /** The stream the peer writes to. */
  readonly toClient: PassThrough;
  respond: Responder;
}

const readers: ReadlineInterface[] = [];
const transports: StdioTransport[] = [];

function makePeer(): Peer {
  const toServer = new PassThrough();
  const toClient = new PassThrough();
  const transport = new StdioTransport(
    { kind: "streams", channel: { input: toClient, output: toServer } },
    silentLogger
  );
  const peer: Peer = { transport, received: [], toClient, respond: echo };

  const reader = createInterface({ input: toServer });
  reader.on("line", (line) => {
    peer.received.push(line);
    for (const out of peer.respond(line)) {
      toClient.write(`${out}\n`);
    }
  });
  readers.push(reader);
  transports.push(transport);
  return peer;
}

function request(method: string, id: number): string {
  return JSON.stringify(createRequest(method, undefined, id));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("StdioTransport", () => {
  afterEach(async () => {
    await Promise.all(transports.splice(0).map((transport) => transport.close()));
    for (const reader of readers.splice(0)) reader.close();
  });

  // -------------------------------------------------------------------------
  // 1. Exchanges
  // -------------------------------------------------------------------------

  describe("send", () => {
    it("resolves with the line that answers the request", async () => {
      const peer = makePeer();
      await peer.transport.start();

      const answer = await peer.transport.send(request("tools/list", 1));

      expect(JSON.parse(answer)).toEqual({ jsonrpc: "2.0", id: 1, result: { echo: "tools/list" } });
      expect(peer.received).toEqual([request("tools/list", 1)]);
      expect(peer.transport.isRunning()).toBe(true);
    });

    it("matches responses arriving out of order", async () => {
      const peer = makePeer();
      const held: string[] = [];
      peer.respond = (line) => {
        const parsed = parseMessage(line);
        if (parsed.type !== "request") return [];
        const reply = JSON.stringify(createResponse(parsed.message.id, parsed.message.id));
        if (parsed.message.id === 1) {
          held.push(reply);
          return [];
        }
        // Answer 2 first, then the held answer to 1.
        return [reply, ...held.splice(0)];
      };
      await peer.transport.start();

      const first = peer.transport.send(request("a", 1));
      await delay(10);
      const second = peer.transport.send(request("b", 2));

      expect(JSON.parse(await second)).toMatchObject({ id: 2, result: 2 });
      expect(JSON.parse(await first)).toMatchObject({ id: 1, result: 1 });
    });

    it("rejects a request without an id", async () => {
      const peer = makePeer();
      await peer.transport.start();

      await expect(
        peer.transport.send(JSON.stringify(createNotification("notifications/initialized")))
      ).rejects.toBeInstanceOf(ProtocolError);
    });

    it("rejects with TransportError when the signal aborts", async () => {
      const peer = makePeer();
      peer.respond = () => [];
      await peer.transport.start();
      const controller = new AbortController();

      const pending = peer.transport.send(request("slow", 5), { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toThrow("Request 5 aborted");
    });
  });

  // -------------------------------------------------------------------------
  // 2. Inbound lines
  // -------------------------------------------------------------------------

  describe("inbound", () => {
    it("hands lines that answer no request to the message handler", async () => {
      const peer = makePeer();
      const inbound: string[] = [];
      peer.transport.onMessage((line) => inbound.push(line));
      await peer.transport.start();

      const notification = JSON.stringify(
        createNotification("notifications/resources/updated", { uri: "league://standings" })
      );
      peer.toClient.write("not json\n");
      peer.toClient.write("\n");
      peer.toClient.write(`${JSON.stringify(createResponse(99, null))}\n`);
      peer.toClient.write(`  ${notification}  \n`);
      await delay(20);

      expect(inbound).toEqual([notification]);
    });

    it("post writes one line", async () => {
      const peer = makePeer();
      await peer.transport.start();
      const line = JSON.stringify(createNotification("notifications/initialized"));

      await peer.transport.post(line);
      await delay(10);

      expect(peer.received).toEqual([line]);
    });
  });

  // -------------------------------------------------------------------------
  // 3. Channel loss and close
  // -------------------------------------------------------------------------

  describe("lifecycle", () => {
    it("fails pending requests when the input stream ends", async () => {
      const peer = makePeer();
      peer.respond = () => [];
      await peer.transport.start();

      const pending = peer.transport.send(request("work", 1));
      await delay(10);
      peer.toClient.end();

      await expect(pending).rejects.toThrow("Input stream ended");
      expect(peer.transport.isRunning()).toBe(false);
      await expect(peer.transport.send(request("work", 2))).rejects.toThrow(
        "Cannot send message: channel is not open"
      );
    });

    it("close fails pending requests and refuses to start again", async () => {
      const peer = makePeer();
      peer.respond = () => [];
      await peer.transport.start();

      const pending = peer.transport.send(request("work", 1));
      await peer.transport.close();

      await expect(pending).rejects.toBeInstanceOf(TransportError);
      await expect(pending).rejects.toThrow("Transport is shutting down");
      await expect(peer.transport.start()).rejects.toThrow("Transport is closed");
    });

    it("refuses to send before start", async () => {
      const peer = makePeer();

      await expect(peer.transport.send(request("work", 1))).rejects.toThrow(
        "channel is not open"
      );
    });
  });
});
