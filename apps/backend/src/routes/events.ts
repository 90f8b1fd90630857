/**
 * Server-Sent Events live feed.
 *
 * GET /api/events streams `snapshot` once, then every hub event as
 * `event: <kind>` frames, with a comment heartbeat to keep proxies from
 * closing an idle stream.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { toWireMessage, type LineEvent } from "../services/lineEvents";
import type { Subscription } from "../services/broadcast/broadcastHub";

const frame = (event: string, data: unknown, id?: number): string =>
  `${id === undefined ? "" : `id: ${id}\n`}event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;

const waitForDrain = (res: Response, signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      signal.removeEventListener("abort", done);
      resolve();
    };
    res.on("drain", done);
    signal.addEventListener("abort", done, { once: true });
  });

async function relay(res: Response, subscription: Subscription<LineEvent>, signal: AbortSignal): Promise<void> {
  for (;;) {
    const event = await subscription.next(signal);
    if (!event) return;
    if (!res.write(frame(event.kind, toWireMessage(event), event.seq))) {
      await waitForDrain(res, signal);
    }
  }
}

export function registerEventRoutes(app: Express, ctx: AppContext): void {
  const { lineService, logger, config } = ctx;

  app.get("/api/events", (req: Request, res: Response) => {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });

    const subscription = lineService.subscribe({ name: `sse:${req.ip ?? "unknown"}` });
    const abort = new AbortController();
    res.write(frame("snapshot", { type: "snapshot", payload: lineService.getStatus() }));

    const heartbeat = setInterval(() => {
      res.write(": heartbeat\n\n");
    }, config.sseHeartbeatMs);

    const cleanup = () => {
      clearInterval(heartbeat);
      abort.abort();
      subscription.close();
      logger.debug({ subscriber: subscription.name, dropped: subscription.dropped }, "SSE client disconnected");
    };
    res.on("close", cleanup);

    relay(res, subscription, abort.signal).catch((error: unknown) => {
      logger.error({ err: error }, "SSE relay stopped");
      cleanup();
      res.end();
    });
  });
}
