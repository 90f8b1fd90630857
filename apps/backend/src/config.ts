import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

// Load .env from apps/backend directory, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
const envResult = loadEnv({ path: envPath });

if (!envResult.error) {
  console.log(`[config] Loaded environment from ${envPath}`);
}

const hourOfDay = z.coerce.number().int().min(0).max(23);

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),
    HOST: z.string().default("0.0.0.0"),
    SQLITE_DB: z.string().default("data/line.db"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    LOG_PRETTY: boolFromEnv(false),
    LINE_NAME: z.string().default("Line 1"),
    // Supervisor PIN used to unlock the line and to close a job
    SUPERVISOR_PIN: z.string().min(4).max(20).regex(/^[A-Za-z0-9]+$/).default("1234"),
    ADMIN_API_KEY: z.string().optional(),
    HARDWARE_SIGNALS: z.enum(["simulated", "off"]).default("simulated"),
    PIN_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    PIN_LOCKOUT_MINUTES: z.coerce.number().positive().default(15),
    RECENT_SCANS_WINDOW: z.coerce.number().int().min(1).max(100).default(8),
    SUBSCRIBER_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(50),
    SHIFT_START_HOUR: hourOfDay.default(8),
    SHIFT_END_HOUR: hourOfDay.default(20),
    SHIFT_ROLLOVER_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
    WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(30000),
    SSE_HEARTBEAT_MS: z.coerce.number().int().positive().default(15000),
    GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().positive().default(10000),
  })
  .refine((env) => env.SHIFT_START_HOUR <= env.SHIFT_END_HOUR, {
    message: "SHIFT_START_HOUR must not be after SHIFT_END_HOUR",
    path: ["SHIFT_START_HOUR"],
  });

export const toRuntimeConfig = (parsed: z.infer<typeof envSchema>) => ({
  port: parsed.PORT,
  host: parsed.HOST,
  sqlitePath: parsed.SQLITE_DB,
  logLevel: parsed.LOG_LEVEL,
  logPretty: parsed.LOG_PRETTY,
  lineName: parsed.LINE_NAME,
  supervisorPin: parsed.SUPERVISOR_PIN,
  adminApiKey: parsed.ADMIN_API_KEY ?? "",
  hardwareSignals: parsed.HARDWARE_SIGNALS,
  pinMaxAttempts: parsed.PIN_MAX_ATTEMPTS,
  pinLockoutMs: Math.round(parsed.PIN_LOCKOUT_MINUTES * 60_000),
  recentScansWindow: parsed.RECENT_SCANS_WINDOW,
  subscriberQueueCapacity: parsed.SUBSCRIBER_QUEUE_CAPACITY,
  shiftStartHour: parsed.SHIFT_START_HOUR,
  shiftEndHour: parsed.SHIFT_END_HOUR,
  shiftRolloverIntervalMs: parsed.SHIFT_ROLLOVER_INTERVAL_MS,
  wsHeartbeatMs: parsed.WS_HEARTBEAT_MS,
  sseHeartbeatMs: parsed.SSE_HEARTBEAT_MS,
  gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
});

export type RuntimeConfig = ReturnType<typeof toRuntimeConfig>;

export const runtimeConfig: RuntimeConfig = toRuntimeConfig(envSchema.parse(process.env));
