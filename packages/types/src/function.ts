import type { NimbusLogger } from "./telemetry";

/** Per-invocation context passed alongside the bound request. */
export type FunctionContext = {
  /** Aborted when the transport gives up on the request (client disconnect, invocation timeout). */
  signal: AbortSignal;
  requestId: string;
  logger: NimbusLogger;
};

/**
 * An HTTP-triggered function. Implementations are classes marked with `@HttpApi`;
 * a fresh instance is constructed for every request.
 */
export interface HttpFunction<TRequest, TResponse> {
  handle(request: TRequest, context: FunctionContext): Promise<TResponse>;
}

export type FunctionOptions = {
  memoryMb: number;
  timeoutSeconds: number;
};

export type BillingMode = "PAY_PER_REQUEST" | "PROVISIONED";

export type TableOptions = {
  tableName: string;
  billingMode: BillingMode;
};
