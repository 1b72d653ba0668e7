export type {
  Type,
  InjectionToken,
  CloseHook,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  Provider,
  ServiceDescriptor,
} from "./common";

export type { HttpMethod, HttpRequest, HttpResponse } from "./http";

export type { ServiceContainer } from "./container";

export type {
  FunctionContext,
  HttpFunction,
  FunctionOptions,
  BillingMode,
  TableOptions,
} from "./function";

export type { Table, TableCallOptions } from "./table";

export type { LogLevel, NimbusLogger } from "./telemetry";
