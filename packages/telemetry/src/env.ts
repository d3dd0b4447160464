import type { LogLevel } from "@argwire/types";

export type LogFormat = "json" | "human" | "auto";

export type TelemetryConfig = {
  serviceName: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
  /** Deployment platform; unset or `local` means a developer machine. */
  platform: string | null;
  redactKeys: string[];
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "human", "auto"];

export function readTelemetryEnv(env: NodeJS.ProcessEnv = process.env): TelemetryConfig {
  return {
    serviceName: env.ARGWIRE_SERVICE_NAME ?? "argwire-app",
    logLevel: oneOf(LOG_LEVELS, env.ARGWIRE_LOG_LEVEL) ?? "info",
    logFormat: oneOf(LOG_FORMATS, env.ARGWIRE_LOG_FORMAT) ?? "auto",
    logFilePath: env.ARGWIRE_LOG_FILE_PATH || null,
    platform: env.ARGWIRE_PLATFORM || null,
    redactKeys: splitList(env.ARGWIRE_LOG_REDACT_KEYS),
  };
}

function oneOf<T extends string>(allowed: readonly T[], raw: string | undefined): T | undefined {
  return allowed.find((value) => value === raw);
}

function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);
}
