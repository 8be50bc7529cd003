import path from "path";

function intFromEnv(name: string, fallback: number) {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`${name}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

export interface ServerConfig {
  port: number;
  dataDir: string;
  tickMs: number;
  alarmPollMs: number;
}

export function loadConfig(): ServerConfig {
  return {
    port: intFromEnv("PORT", 5174),
    dataDir: path.resolve(process.env.FOCUSCLOCK_DATA_DIR ?? path.resolve(__dirname, "../data")),
    tickMs: intFromEnv("FOCUSCLOCK_TICK_MS", 1000),
    alarmPollMs: intFromEnv("FOCUSCLOCK_ALARM_POLL_MS", 1000)
  };
}
