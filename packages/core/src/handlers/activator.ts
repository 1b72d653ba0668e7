import type { HttpFunction, NimbusLogger, ServiceContainer } from "@nimbus-fn/types";
import { getConstructorDependencies } from "../di/dependency-tokens";
import { LOGGER } from "../di/tokens";
import { ConfigurationError } from "../errors/nimbus-error";
import type { FunctionRegistration } from "../bootstrap/registrations";

/**
 * Constructs a fresh function instance. The logger token gets `logger`;
 * every other dependency comes from the container.
 */
export async function activateFunction(
  registration: FunctionRegistration,
  container: ServiceContainer,
  logger: NimbusLogger,
): Promise<HttpFunction<unknown, unknown>> {
  const args: unknown[] = [];
  for (const dep of getConstructorDependencies(registration.functionType)) {
    if (dep.token === LOGGER) {
      args.push(logger);
    } else if (dep.token === undefined) {
      throw new ConfigurationError(
        `Cannot determine the type of parameter '${dep.name}' of ${registration.name}`,
      );
    } else {
      args.push(await container.resolve(dep.token));
    }
  }
  return new registration.functionType(...args);
}
