import type { LogLevel } from "@nestjs/common";

const LOG_LEVELS: LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export interface ServerConfig {
  port: number;
  host: string;
  logLevels: LogLevel[];
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw === "") return 3000;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

function parseLogLevels(raw: string | undefined): LogLevel[] {
  if (!raw) return ["log", "warn", "error"];
  const wanted = raw.split(",").map((level) => level.trim());
  return LOG_LEVELS.filter((level) => wanted.includes(level));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parsePort(env.PORT),
    host: env.HOST || "0.0.0.0",
    logLevels: parseLogLevels(env.LOG_LEVELS)
  };
}
