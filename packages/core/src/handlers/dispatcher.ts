import createDebug from "debug";
import type { HttpRequest, HttpResponse, NimbusLogger, ServiceContainer } from "@nimbus-fn/types";
import { MalformedPathError, matchRoute } from "@nimbus-fn/common";
import { runWithRequestLogger } from "@nimbus-fn/telemetry";
import type { FunctionRegistration } from "../bootstrap/registrations";
import { HttpException, RequestBindingException } from "../errors/http-exception";
import { FunctionInvocationError, type InvocationStage } from "../errors/nimbus-error";
import { activateFunction } from "./activator";
import { bindRequest } from "./binder";
import { errorResponse, serializeResult } from "./serializer";

const debug = createDebug("nimbus:core:dispatch");

export type DispatchOptions = {
  container: ServiceContainer;
  logger: NimbusLogger;
  /** Aborted by the transport when the request is abandoned. */
  signal?: AbortSignal;
};

class StageFailure extends Error {
  constructor(
    readonly stage: InvocationStage,
    readonly error: unknown,
  ) {
    super(`failed during ${stage}`);
  }
}

async function stage<T>(name: InvocationStage, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new StageFailure(name, error);
  }
}

/** Route captures from the path, overridden by any the transport already supplied. */
function capturePathParams(registration: FunctionRegistration, request: HttpRequest): Record<string, string> {
  try {
    return { ...matchRoute(registration.route, request.path), ...request.pathParams };
  } catch (error) {
    if (error instanceof MalformedPathError) throw new RequestBindingException(error.message);
    throw error;
  }
}

/**
 * Handles one request: resolve a fresh instance, bind the request, invoke
 * `handle` and serialize the result. Any failure short-circuits to an error
 * response: an `HttpException` gives its own status, anything else a 500
 * whose detail is only logged.
 */
export async function dispatchFunction(
  registration: FunctionRegistration,
  request: HttpRequest,
  options: DispatchOptions,
): Promise<HttpResponse> {
  const logger = options.logger.child(registration.name, { requestId: request.requestId });
  const signal = options.signal ?? new AbortController().signal;

  debug("%s %s → %s", request.method, request.path, registration.name);

  try {
    return await runWithRequestLogger(request.requestId, logger, async () => {
      const instance = await stage("resolve", () =>
        activateFunction(registration, options.container, logger),
      );
      const bound = await stage("bind", () =>
        bindRequest(registration.requestType, {
          ...request,
          pathParams: capturePathParams(registration, request),
        }),
      );
      const result = await stage("invoke", () =>
        instance.handle(bound, { signal, requestId: request.requestId, logger }),
      );
      return stage("serialize", () => serializeResult(result));
    });
  } catch (thrown) {
    const failure = thrown instanceof StageFailure ? thrown : new StageFailure("invoke", thrown);

    if (failure.error instanceof HttpException) {
      logger.debug("Request failed", {
        status: failure.error.statusCode,
        error: failure.error.message,
      });
      return errorResponse(failure.error.statusCode, failure.error.message);
    }

    const error = new FunctionInvocationError(registration.name, failure.stage, failure.error);
    logger.error(error.message, {
      stage: failure.stage,
      ...(failure.error instanceof Error && failure.error.stack
        ? { stack: failure.error.stack }
        : {}),
    });
    return errorResponse(500, "Internal server error");
  }
}
