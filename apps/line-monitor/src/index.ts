import pino from "pino";
import WebSocket from "ws";
import { monitorConfig } from "./config";
import { ReconnectBackoff } from "./backoff";
import { LiveFeedClient } from "./liveFeedClient";
import { describeEvent, type FeedEvent, type LineStatusSnapshot } from "./messages";

const logger = pino({ name: "line-monitor", level: monitorConfig.logLevel });

const client = new LiveFeedClient({
  baseUrl: monitorConfig.backendUrl,
  logger: logger.child({ component: "live-feed-client" }),
  createSocket: (url) => new WebSocket(url),
  backoff: new ReconnectBackoff(monitorConfig.reconnectInitialMs, monitorConfig.reconnectMaxMs),
  requestTimeoutMs: monitorConfig.requestTimeoutMs,
});

client.on("snapshot", (status: LineStatusSnapshot) => {
  logger.info(
    {
      line: status.line_name,
      job: status.active_job?.job_id ?? null,
      scans: status.active_job?.total_scans ?? 0,
      passRate: status.active_job?.pass_rate ?? null,
      shippersToday: status.shift.total_shippers,
      lock: status.lock.state,
      seq: status.feed_seq,
    },
    "Line snapshot",
  );
});

client.on("event", (event: FeedEvent) => {
  logger.info({ seq: event.seq, type: event.type }, describeEvent(event));
});

logger.info({ backendUrl: monitorConfig.backendUrl }, "Line monitor starting");
client.start();

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, "Line monitor stopping");
  client.stop();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
