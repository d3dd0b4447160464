export { readTelemetryEnv } from "./env";
export type { TelemetryConfig, LogFormat } from "./env";
export { PinoAppLogger, createLogger, isHumanFormat } from "./logger";
export {
  requestStore,
  runWithRequestLogger,
  extendRequestLogger,
  getRequestLogger,
  ContextAwareLogger,
} from "./request-context";
