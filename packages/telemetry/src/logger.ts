import pino from "pino";
import pretty from "pino-pretty";
import type { AppLogger, LogLevel } from "@argwire/types";
import type { TelemetryConfig } from "./env";

/**
 * Thin pino wrapper implementing AppLogger.
 * Every method delegates directly to the underlying pino instance.
 */
export class PinoAppLogger implements AppLogger {
  constructor(private pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    const fn = this.pinoLogger[level].bind(this.pinoLogger);
    if (attributes) fn(attributes, message);
    else fn(message);
  }

  child(name: string, attributes?: Record<string, unknown>): AppLogger {
    return new PinoAppLogger(this.pinoLogger.child({ name, ...attributes }));
  }

  withContext(attributes: Record<string, unknown>): AppLogger {
    return new PinoAppLogger(this.pinoLogger.child(attributes));
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }
}

export function isHumanFormat(config: TelemetryConfig): boolean {
  const isLocal = config.platform === null || config.platform === "local";
  return config.logFormat === "human" || (config.logFormat === "auto" && isLocal);
}

export function createLogger(config: TelemetryConfig): PinoAppLogger {
  const streams: pino.StreamEntry[] = [];

  if (isHumanFormat(config)) {
    // In-process pretty printer; a worker transport would outlive short-lived processes.
    streams.push({ level: config.logLevel, stream: pretty({ destination: 1, sync: true }) });
  } else {
    streams.push({ level: config.logLevel, stream: pino.destination(1) });
  }

  if (config.logFilePath) {
    streams.push({
      level: config.logLevel,
      stream: pino.destination({ dest: config.logFilePath, mkdir: true }),
    });
  }

  const logger = pino(
    {
      level: config.logLevel,
      base: { service: config.serviceName },
      redact:
        config.redactKeys.length > 0
          ? { paths: config.redactKeys, censor: "[REDACTED]" }
          : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  return new PinoAppLogger(logger);
}
