export const monitorConfig = {
  backendUrl: process.env.LINE_BACKEND_URL?.trim() || "http://127.0.0.1:5000",
  logLevel: process.env.LOG_LEVEL?.trim() || "info",
  requestTimeoutMs: numFromEnv("REQUEST_TIMEOUT_MS", 5000),
  reconnectInitialMs: numFromEnv("RECONNECT_INITIAL_MS", 1000),
  reconnectMaxMs: numFromEnv("RECONNECT_MAX_MS", 30000),
};

function numFromEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw == null) return defaultValue;
  const parsed = Number.parseInt(String(raw), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}
