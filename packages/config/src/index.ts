export { NimbusEnv, FUNCTION_NAME_ENV, tableEnvVarName } from "./env";
export { detectModeAndCommand, detectMode } from "./mode";
export type { ExecutionMode, CliCommand, ModeAndCommand } from "./mode";
