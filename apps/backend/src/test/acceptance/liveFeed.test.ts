/// <reference types="vitest" />
import pino from "pino";
import WebSocket, { type RawData } from "ws";
import { z } from "zod";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { LiveFeedServer } from "../../api/liveFeed";
import { createTestContext, type TestContext } from "../testContext";
import { startHttpHarness, type HttpHarness } from "./httpHarness";

const feedMessageSchema = z.object({
  type: z.string(),
  seq: z.number().optional(),
  id: z.string().optional(),
  payload: z.unknown(),
});

type FeedMessage = z.infer<typeof feedMessageSchema>;

describe("LiveFeedServer", () => {
  let ctx: TestContext;
  let http: HttpHarness;
  let feed: LiveFeedServer;
  let socket: WebSocket;
  let received: FeedMessage[];

  beforeEach(async () => {
    ctx = createTestContext();
    http = await startHttpHarness(ctx);
    feed = new LiveFeedServer(ctx.lineService, pino({ level: "silent" }), { heartbeatMs: 60_000 });
    feed.attach(http.server);

    received = [];
    socket = new WebSocket(`ws://127.0.0.1:${http.port}/ws`);
    socket.on("message", (data: RawData) => {
      received.push(feedMessageSchema.parse(JSON.parse(data.toString())));
    });
    await new Promise<void>((resolve, reject) => {
      socket.once("open", () => resolve());
      socket.once("error", reject);
    });
  });

  afterEach(async () => {
    socket.terminate();
    await feed.close();
    await http.close();
    ctx.db.close();
  });

  const types = () => received.map((m) => m.type);

  it("greets with connected, then a status snapshot", async () => {
    await vi.waitFor(() => expect(types()).toEqual(["connected", "snapshot"]));

    expect(received[1].payload).toMatchObject({ line_name: "Test Line", active_job: null, feed_seq: 0 });
    expect(feed.clientCount).toBe(1);
  });

  it("relays line events in order with their seq", async () => {
    await vi.waitFor(() => expect(types()).toHaveLength(2));

    await ctx.lineService.startJob({ job_id: "WS", expected_barcode: "OK" });
    await ctx.lineService.processScan("NOPE");

    await vi.waitFor(() => expect(types()).toHaveLength(5));
    expect(received.slice(2).map((m) => [m.type, m.seq])).toEqual([
      ["job_started", 1],
      ["scan", 2],
      ["line_lock", 3],
    ]);
    expect(received[4].payload).toMatchObject({ state: "LOCKED", line_halted: true });
  });

  it("answers ping, getStatus and unknown messages", async () => {
    await vi.waitFor(() => expect(types()).toHaveLength(2));

    socket.send(JSON.stringify({ type: "ping", id: "p1" }));
    socket.send(JSON.stringify({ type: "getStatus", id: "s1" }));
    socket.send(JSON.stringify({ type: "shout" }));
    socket.send("not json");

    await vi.waitFor(() => expect(types()).toHaveLength(6));
    expect(received.slice(2)).toEqual([
      { type: "pong", id: "p1" },
      expect.objectContaining({ type: "snapshot", id: "s1" }),
      { type: "error", payload: { message: "Unknown message type: shout" } },
      { type: "error", payload: { message: "Invalid message format" } },
    ]);
  });

  it("unsubscribes a client from the hub when it disconnects", async () => {
    await vi.waitFor(() => expect(ctx.lineService.hubStats().subscribers).toHaveLength(1));

    socket.close();

    await vi.waitFor(() => expect(feed.clientCount).toBe(0));
    expect(ctx.lineService.hubStats().subscribers).toEqual([]);
  });
});
