export { NimbusLoggerImpl, createLogger } from "./logger";
export { readLoggingEnv, isLocalPlatform } from "./env";
export type { LoggingConfig, LogFormat } from "./env";
export {
  ContextAwareLogger,
  requestStore,
  runWithRequestLogger,
  getRequestLogger,
} from "./request-context";
