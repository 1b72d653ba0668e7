import { AsyncLocalStorage } from "node:async_hooks";
import type { NimbusLogger } from "@nimbus-fn/types";

type RequestStore = {
  requestId: string;
  logger: NimbusLogger;
};

export const requestStore = new AsyncLocalStorage<RequestStore>();

/** Runs `fn` with `logger` as the request-scoped logger. */
export function runWithRequestLogger<T>(requestId: string, logger: NimbusLogger, fn: () => T): T {
  return requestStore.run({ requestId, logger }, fn);
}

/** The request-scoped logger, or `undefined` outside a request. */
export function getRequestLogger(): NimbusLogger | undefined {
  return requestStore.getStore()?.logger;
}

/**
 * Logger registered for constructor injection.
 *
 * Delegates to the request-scoped logger when called during a request
 * and to the root logger otherwise, so services constructed once still
 * log with the current request id.
 */
export class ContextAwareLogger implements NimbusLogger {
  constructor(private rootLogger: NimbusLogger) {}

  private get current(): NimbusLogger {
    return getRequestLogger() ?? this.rootLogger;
  }

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.current.debug(message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.current.info(message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.current.warn(message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.current.error(message, attributes);
  }

  child(name: string, attributes?: Record<string, unknown>): NimbusLogger {
    return this.current.child(name, attributes);
  }

  withContext(attributes: Record<string, unknown>): NimbusLogger {
    return this.current.withContext(attributes);
  }
}
