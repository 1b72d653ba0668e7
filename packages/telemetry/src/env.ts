import type { LogLevel } from "@nimbus-fn/types";

export type LogFormat = "json" | "human" | "auto";

export type LoggingConfig = {
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
  redactKeys: string[];
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "human", "auto"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

export function readLoggingEnv(): LoggingConfig {
  const rawLevel = process.env.NIMBUS_LOG_LEVEL;
  const rawFormat = process.env.NIMBUS_LOG_FORMAT;
  const rawRedact = process.env.NIMBUS_LOG_REDACT_KEYS;

  return {
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "auto",
    logFilePath: process.env.NIMBUS_LOG_FILE_PATH || null,
    redactKeys: rawRedact
      ? rawRedact
          .split(",")
          .map((key) => key.trim())
          .filter(Boolean)
      : [],
  };
}

/** Local unless the host says otherwise, or a Lambda runtime is present. */
export function isLocalPlatform(): boolean {
  if (process.env.AWS_LAMBDA_RUNTIME_API) return false;
  const platform = process.env.NIMBUS_PLATFORM;
  return !platform || platform === "local";
}
