import pino from "pino";
import type { NimbusLogger, LogLevel } from "@nimbus-fn/types";
import { isLocalPlatform, type LoggingConfig } from "./env";

/**
 * Thin pino wrapper implementing NimbusLogger.
 * Every method delegates directly to the underlying pino instance.
 */
export class NimbusLoggerImpl implements NimbusLogger {
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

  child(name: string, attributes?: Record<string, unknown>): NimbusLogger {
    return new NimbusLoggerImpl(this.pinoLogger.child({ name, ...attributes }));
  }

  withContext(attributes: Record<string, unknown>): NimbusLogger {
    return new NimbusLoggerImpl(this.pinoLogger.child(attributes));
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }
}

/**
 * Builds the root logger. When `destination` is given every record goes
 * there as JSON and the format and file settings are ignored.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): NimbusLoggerImpl {
  const streams: pino.StreamEntry[] = [];

  if (destination) {
    streams.push({ level: config.logLevel, stream: destination });
  } else {
    const useHumanFormat =
      config.logFormat === "human" || (config.logFormat === "auto" && isLocalPlatform());

    if (useHumanFormat) {
      // worker thread transport, local development only
      streams.push({
        level: config.logLevel,
        stream: pino.transport({ target: "pino-pretty", options: { destination: 1 } }),
      });
    } else {
      // synchronous stdout, safe to use on Lambda
      streams.push({ level: config.logLevel, stream: pino.destination(1) });
    }

    if (config.logFilePath) {
      streams.push({
        level: config.logLevel,
        stream: pino.destination(config.logFilePath),
      });
    }
  }

  const logger = pino(
    {
      level: config.logLevel,
      redact:
        config.redactKeys.length > 0
          ? { paths: config.redactKeys, censor: "[REDACTED]" }
          : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  return new NimbusLoggerImpl(logger);
}
