import type { NimbusLogger, ServiceDescriptor } from "@nimbus-fn/types";
import type { CliCommand, ExecutionMode } from "@nimbus-fn/config";
import type { FunctionRegistration, TableRegistration } from "../bootstrap/registrations";
import type { CloudDefaults } from "./cloud-defaults";

/** Everything a runtime needs to serve or deploy the application. Frozen once built. */
export type ApplicationContext = Readonly<{
  args: readonly string[];
  mode: ExecutionMode;
  command: CliCommand;
  functions: readonly FunctionRegistration[];
  tables: readonly TableRegistration[];
  defaults: Readonly<CloudDefaults>;
  services: readonly ServiceDescriptor[];
  logger: NimbusLogger;
}>;
