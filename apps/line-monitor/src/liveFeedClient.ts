/**
 * Live feed consumer for the line backend's `/ws` endpoint.
 *
 * Keeps a connection open with exponential backoff, re-fetches the status
 * snapshot on every (re)connect and whenever the event `seq` skips, and
 * relays feed events to listeners.
 *
 * Events: `connected`, `disconnected` (code), `reconnecting` (delayMs),
 * `snapshot` (LineStatusSnapshot), `event` (FeedEvent),
 * `gap` ({ expected, received }), `failure` (Error).
 */

import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import { ReconnectBackoff } from "./backoff";
import { getJson } from "./httpClient";
import { feedMessageSchema, lineStatusSchema, type FeedEvent, type LineStatusSnapshot } from "./messages";

/** What the client needs from a socket; `ws` WebSockets satisfy it. */
export interface FeedSocket extends EventEmitter {
  close(): void;
}

export interface LiveFeedClientOptions {
  baseUrl: string;
  logger: Logger;
  createSocket: (url: string) => FeedSocket;
  fetchStatus?: () => Promise<LineStatusSnapshot>;
  backoff?: ReconnectBackoff;
  requestTimeoutMs?: number;
}

export interface FeedGap {
  expected: number;
  received: number;
}

export const feedUrlOf = (baseUrl: string): string => {
  const url = new URL("/ws", baseUrl);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  return url.toString();
};

const textOf = (data: unknown): string | null => {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  if (Array.isArray(data) && data.every((part) => Buffer.isBuffer(part))) {
    return Buffer.concat(data).toString("utf8");
  }
  return null;
};

export class LiveFeedClient extends EventEmitter {
  private readonly logger: Logger;
  private readonly backoff: ReconnectBackoff;
  private readonly createSocket: (url: string) => FeedSocket;
  private readonly fetchStatus: () => Promise<LineStatusSnapshot>;
  private readonly url: string;
  private socket: FeedSocket | null = null;
  private open = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = true;
  private refreshing = false;
  private seq: number | null = null;

  constructor(options: LiveFeedClientOptions) {
    super();
    this.logger = options.logger;
    this.backoff = options.backoff ?? new ReconnectBackoff();
    this.createSocket = options.createSocket;
    const timeoutMs = options.requestTimeoutMs ?? 5000;
    this.fetchStatus =
      options.fetchStatus ?? (() => getJson(options.baseUrl, "/api/status", lineStatusSchema, timeoutMs));
    this.url = feedUrlOf(options.baseUrl);
  }

  /** Last seq applied, or null before the first snapshot of a connection. */
  get lastSeq(): number | null {
    return this.seq;
  }

  get connected(): boolean {
    return this.open;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    // The close listener detaches the socket.
    this.socket?.close();
    this.logger.info("Live feed client stopped");
  }

  private connect(): void {
    this.reconnectTimer = null;
    this.logger.debug({ url: this.url }, "Connecting to live feed");

    const socket = this.createSocket(this.url);
    this.socket = socket;
    socket.on("open", () => {
      this.open = true;
      // A restarted backend numbers from zero again; the snapshot re-anchors.
      this.seq = null;
      this.backoff.reset();
      this.logger.info({ url: this.url }, "Live feed connected");
      this.emit("connected");
      void this.refreshSnapshot();
    });
    socket.on("message", (data: unknown) => this.handleMessage(data));
    socket.on("error", (error: Error) => this.fail(error));
    socket.on("close", (code: number) => {
      socket.removeAllListeners();
      if (this.socket !== socket) return;
      const wasOpen = this.open;
      this.socket = null;
      this.open = false;
      if (this.stopped) return;
      if (wasOpen) {
        this.logger.warn({ code }, "Live feed disconnected");
        this.emit("disconnected", code);
      }
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    const delayMs = this.backoff.next();
    this.logger.info({ delayMs, attempt: this.backoff.attempts }, "Reconnecting to live feed");
    this.emit("reconnecting", delayMs);
    this.reconnectTimer = setTimeout(() => this.connect(), delayMs);
  }

  private handleMessage(data: unknown): void {
    const text = textOf(data);
    let raw: unknown;
    try {
      raw = text === null ? null : JSON.parse(text);
    } catch (error) {
      this.fail(new Error("Unparseable live feed message", { cause: error }));
      return;
    }

    const message = feedMessageSchema.safeParse(raw);
    if (!message.success) {
      this.fail(new Error("Unexpected live feed message shape"));
      return;
    }

    const { type, seq, emitted_at, payload } = message.data;
    switch (type) {
      case "connected":
      case "pong":
        return;
      case "snapshot": {
        const status = lineStatusSchema.safeParse(payload);
        if (status.success) {
          this.applySnapshot(status.data);
        } else {
          this.fail(new Error("Invalid snapshot payload"));
        }
        return;
      }
      case "error":
        this.logger.warn({ payload }, "Live feed reported an error");
        return;
    }

    if (seq === undefined) {
      this.logger.debug({ type }, "Ignoring unsequenced live feed message");
      return;
    }
    this.handleEvent({ type, seq, emitted_at, payload });
  }

  private handleEvent(event: FeedEvent): void {
    if (this.seq !== null) {
      if (event.seq <= this.seq) {
        this.logger.debug({ seq: event.seq, lastSeq: this.seq }, "Skipping event already in snapshot");
        return;
      }
      if (event.seq > this.seq + 1) {
        const gap: FeedGap = { expected: this.seq + 1, received: event.seq };
        this.logger.warn(gap, "Live feed gap, refreshing snapshot");
        this.emit("gap", gap);
        void this.refreshSnapshot();
      }
    }
    this.seq = event.seq;
    this.emit("event", event);
  }

  private applySnapshot(status: LineStatusSnapshot): void {
    this.seq = this.seq === null ? status.feed_seq : Math.max(this.seq, status.feed_seq);
    this.emit("snapshot", status);
  }

  private async refreshSnapshot(): Promise<void> {
    if (this.refreshing) return;
    this.refreshing = true;
    try {
      const status = await this.fetchStatus();
      if (!this.stopped) this.applySnapshot(status);
    } catch (error) {
      this.fail(error instanceof Error ? error : new Error(String(error)));
    } finally {
      this.refreshing = false;
    }
  }

  private fail(error: Error): void {
    this.logger.warn({ err: error }, "Live feed problem");
    this.emit("failure", error);
  }
}
