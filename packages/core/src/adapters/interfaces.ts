import type { ExecutionMode } from "@nimbus-fn/config";
import type { ApplicationContext } from "../application/context";

/** Hosts the application for one execution mode. */
export interface Runtime {
  readonly mode: ExecutionMode;
  run(context: ApplicationContext): Promise<void>;
}

/** Builds the entry point a serverless host invokes. */
export interface ServerlessAdapter<THandler> {
  createHandler(context: ApplicationContext): THandler;
}
