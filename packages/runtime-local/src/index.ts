export { LocalRuntime } from "./local-runtime";
export type { LocalRuntimeOptions, RunningServer } from "./local-runtime";
export { createLocalServer } from "./server";
export type { LocalServer } from "./server";
export { mapExpressRequest } from "./request-mapper";
