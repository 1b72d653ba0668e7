import type { NimbusLogger } from "@nimbus-fn/types";
import { NimbusApplication, type ApplicationBuilder } from "@nimbus-fn/core";
import { LocalRuntime } from "@nimbus-fn/runtime-local";
import { AwsDeployRuntime } from "@nimbus-fn/deploy-aws";
import * as functions from "./functions";
import * as models from "./models";
import { OrderIds } from "./services/order-ids";

export type BuildAppOptions = {
  logger?: NimbusLogger;
  /** Runs last, before the application is built. */
  configure?: (builder: ApplicationBuilder) => void;
};

export function buildApp(
  args: readonly string[] = process.argv.slice(2),
  options: BuildAppOptions = {},
): NimbusApplication {
  const builder = NimbusApplication.createBuilder(args);

  builder.addFunctions().fromModule(functions);
  builder.addTables().fromModule(models);
  builder.services.addClass(OrderIds);
  builder.configureDefaults((defaults) => {
    defaults.lambda.timeoutSeconds = 10;
  });

  builder.useRuntime(new LocalRuntime()).useRuntime(new AwsDeployRuntime());
  if (options.logger) builder.useLogger(options.logger);
  options.configure?.(builder);

  return builder.build();
}
