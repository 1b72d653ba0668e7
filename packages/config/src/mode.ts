import { NimbusEnv } from "./env";

export type ExecutionMode = "local" | "lambda" | "deploy";

export type CliCommand = "none" | "list" | "deploy" | "synth" | "destroy" | "diff";

export type ModeAndCommand = {
  mode: ExecutionMode;
  command: CliCommand;
};

const DEPLOY_COMMANDS: readonly CliCommand[] = ["deploy", "synth", "destroy", "diff"];

/**
 * Works out where the application is running and what it was asked to do.
 * A Lambda host always wins; otherwise the first deploy verb found in the
 * arguments selects deploy mode, and `list` selects resource listing.
 */
export function detectModeAndCommand(args: readonly string[]): ModeAndCommand {
  if (NimbusEnv.isLambdaHost()) {
    return { mode: "lambda", command: "none" };
  }

  for (const command of DEPLOY_COMMANDS) {
    if (args.includes(command)) {
      return { mode: "deploy", command };
    }
  }

  if (args.includes("list")) {
    return { mode: "local", command: "list" };
  }

  return { mode: "local", command: "none" };
}

export function detectMode(args: readonly string[]): ExecutionMode {
  return detectModeAndCommand(args).mode;
}
