import { AsyncLocalStorage } from "node:async_hooks";
import type { AppLogger, LogLevel } from "@argwire/types";

type RequestStore = {
  logger: AppLogger;
};

export const requestStore = new AsyncLocalStorage<RequestStore>();

/** Runs `fn` with `root.withContext(attributes)` as the request logger. */
export function runWithRequestLogger<T>(
  root: AppLogger,
  attributes: Record<string, unknown>,
  fn: () => T,
): T {
  return requestStore.run({ logger: root.withContext(attributes) }, fn);
}

/**
 * Adds attributes to the current request logger for the rest of the request,
 * e.g. the matched route once routing is done. Returns the extended logger.
 */
export function extendRequestLogger(attributes: Record<string, unknown>): AppLogger {
  const store = requestStore.getStore();
  if (!store) {
    throw new Error("extendRequestLogger() was called outside a request");
  }
  store.logger = store.logger.withContext(attributes);
  return store.logger;
}

/** The request logger, or `undefined` outside a request. */
export function getRequestLogger(): AppLogger | undefined {
  return requestStore.getStore()?.logger;
}

/**
 * The logger handed out for injection: writes through the request logger inside
 * a request and through the root logger elsewhere, so a provider holding it
 * keeps logging with the current request's attributes.
 */
export class ContextAwareLogger implements AppLogger {
  constructor(private rootLogger: AppLogger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.write("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.write("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.write("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.write("error", message, attributes);
  }

  child(name: string, attributes?: Record<string, unknown>): AppLogger {
    return (getRequestLogger() ?? this.rootLogger).child(name, attributes);
  }

  withContext(attributes: Record<string, unknown>): AppLogger {
    return (getRequestLogger() ?? this.rootLogger).withContext(attributes);
  }

  private write(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    (getRequestLogger() ?? this.rootLogger)[level](message, attributes);
  }
}
