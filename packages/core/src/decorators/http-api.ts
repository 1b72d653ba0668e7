import "reflect-metadata";
import type { FunctionOptions, HttpMethod, Type } from "@nimbus-fn/types";
import { normalizeRoute } from "@nimbus-fn/common";
import {
  FUNCTION_CONFIG_METADATA,
  HTTP_API_METADATA,
  INJECTABLE_METADATA,
} from "../metadata/constants";

export type HttpApiOptions = {
  /** Request shape the incoming request is bound to. */
  request?: Type<object>;
  /** Response shape, recorded for resource listings only. */
  response?: Type;
};

export type HttpApiMetadata = {
  method: HttpMethod;
  route: string;
  requestType?: Type<object>;
  responseType?: Type;
};

/**
 * Marks a class as an HTTP function served at `method route`.
 * Routes use `{name}` placeholders, e.g. `/orders/{id}`.
 *
 * @example
 * ```ts
 * @HttpApi("GET", "/orders/{id}", { request: GetOrderRequest })
 * export class GetOrder implements HttpFunction<GetOrderRequest, Order> { ... }
 * ```
 */
export function HttpApi(method: HttpMethod, route: string, options: HttpApiOptions = {}): ClassDecorator {
  return (target) => {
    const metadata: HttpApiMetadata = { method, route: normalizeRoute(route) };
    if (options.request) metadata.requestType = options.request;
    if (options.response) metadata.responseType = options.response;
    Reflect.defineMetadata(HTTP_API_METADATA, metadata, target);
    Reflect.defineMetadata(INJECTABLE_METADATA, true, target);
  };
}

/** Per-function resource settings, overriding the application defaults. */
export function FunctionConfig(options: Partial<FunctionOptions>): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(FUNCTION_CONFIG_METADATA, { ...options }, target);
  };
}

export function getHttpApiMetadata(target: object): HttpApiMetadata | undefined {
  return Reflect.getOwnMetadata(HTTP_API_METADATA, target);
}

export function getFunctionConfig(target: object): Partial<FunctionOptions> | undefined {
  return Reflect.getOwnMetadata(FUNCTION_CONFIG_METADATA, target);
}
