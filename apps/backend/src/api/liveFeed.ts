import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import type { Logger } from "pino";
import { z } from "zod";
import type { LineService } from "../services/lineService";
import { toWireMessage, type WireMessage } from "../services/lineEvents";

const clientMessageSchema = z.object({
  type: z.string(),
  id: z.string().optional(),
});

export interface LiveFeedOptions {
  path?: string;
  heartbeatMs: number;
}

interface FeedClient {
  socket: WebSocket;
  alive: boolean;
  abort: AbortController;
}

/**
 * WebSocket live feed. Each connection is one hub subscriber; events are
 * relayed in order, and a client that falls behind loses its oldest queued
 * events rather than slowing the line down.
 */
export class LiveFeedServer {
  private wss?: WebSocketServer;
  private readonly clients = new Map<string, FeedClient>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly lineService: LineService,
    private readonly logger: Logger,
    private readonly options: LiveFeedOptions,
  ) {}

  attach(server: HttpServer): void {
    this.wss = new WebSocketServer({ server, path: this.options.path ?? "/ws" });
    this.wss.on("connection", (socket) => this.handleConnection(socket));
    this.wss.on("error", (error) => this.logger.error({ err: error }, "Live feed server error"));

    // Terminate peers that missed a whole heartbeat interval.
    this.heartbeat = setInterval(() => {
      for (const [clientId, client] of this.clients) {
        if (!client.alive) {
          this.logger.info({ clientId }, "Terminating unresponsive live feed client");
          client.socket.terminate();
          continue;
        }
        client.alive = false;
        client.socket.ping();
      }
    }, this.options.heartbeatMs);
    this.heartbeat.unref();
  }

  get clientCount(): number {
    return this.clients.size;
  }

  async close(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    for (const client of this.clients.values()) {
      client.abort.abort();
      client.socket.close(1001, "Server shutting down");
    }
    const wss = this.wss;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
  }

  private handleConnection(socket: WebSocket): void {
    const clientId = randomUUID();
    const subscription = this.lineService.subscribe({ name: `ws:${clientId}` });
    const client: FeedClient = { socket, alive: true, abort: new AbortController() };
    this.clients.set(clientId, client);
    this.logger.info({ clientId, clients: this.clients.size }, "Live feed client connected");

    this.sendMessage(socket, { type: "connected", payload: { clientId, timestamp: new Date().toISOString() } });
    this.sendMessage(socket, { type: "snapshot", payload: this.lineService.getStatus() });

    socket.on("pong", () => {
      client.alive = true;
    });

    socket.on("message", (data: RawData) => this.handleMessage(clientId, socket, data));

    const teardown = () => {
      if (!this.clients.delete(clientId)) return;
      client.abort.abort();
      subscription.close();
      this.logger.info({ clientId, dropped: subscription.dropped }, "Live feed client disconnected");
    };
    socket.on("close", teardown);
    socket.on("error", (error) => {
      this.logger.warn({ err: error, clientId }, "Live feed client error");
      teardown();
    });

    this.pump(socket, subscription, client.abort.signal).catch((error: unknown) => {
      this.logger.error({ err: error, clientId }, "Live feed relay stopped");
      teardown();
    });
  }

  private async pump(
    socket: WebSocket,
    subscription: ReturnType<LineService["subscribe"]>,
    signal: AbortSignal,
  ): Promise<void> {
    for (;;) {
      const event = await subscription.next(signal);
      if (!event || socket.readyState !== WebSocket.OPEN) return;
      // Wait for the frame to be flushed so a slow reader backs up into its own queue.
      await new Promise<void>((resolve, reject) => {
        socket.send(JSON.stringify(toWireMessage(event)), (err) => (err ? reject(err) : resolve()));
      });
    }
  }

  private handleMessage(clientId: string, socket: WebSocket, data: RawData): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString());
    } catch {
      this.sendError(socket, "Invalid message format");
      return;
    }

    const message = clientMessageSchema.safeParse(parsed);
    if (!message.success) {
      this.sendError(socket, "Invalid message format");
      return;
    }

    const { type, id } = message.data;
    this.logger.debug({ clientId, type }, "Live feed message");
    switch (type) {
      case "ping":
        this.sendMessage(socket, { type: "pong", id });
        break;
      case "getStatus":
        this.sendMessage(socket, { type: "snapshot", payload: this.lineService.getStatus(), id });
        break;
      default:
        this.sendError(socket, `Unknown message type: ${type}`, id);
    }
  }

  private sendMessage(socket: WebSocket, message: WireMessage): void {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(message));
    }
  }

  private sendError(socket: WebSocket, error: string, id?: string): void {
    this.sendMessage(socket, { type: "error", payload: { message: error }, id });
  }
}
