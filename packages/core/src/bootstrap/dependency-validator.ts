import type { InjectionToken, NimbusLogger, Type } from "@nimbus-fn/types";
import { getConstructorDependencies } from "../di/dependency-tokens";
import { LOGGER, entityOfTableToken, tokenToString } from "../di/tokens";
import { DependencyValidationError, type DependencyViolation } from "../errors/nimbus-error";
import type { FunctionRegistration, TableRegistration } from "./registrations";

export type ServiceLookup = {
  has(token: InjectionToken): boolean;
};

/**
 * Checks every function's constructor parameters. Tables and the logger are
 * always supplied; anything else must be registered. All violations are
 * collected and thrown together, in function then parameter order.
 */
export function validateFunctionDependencies(
  functions: readonly FunctionRegistration[],
  tables: readonly TableRegistration[],
  services: ServiceLookup,
  logger?: NimbusLogger,
): void {
  const registeredEntities = new Set<Type<object>>(tables.map((table) => table.entityType));
  const violations: DependencyViolation[] = [];

  for (const fn of functions) {
    for (const dep of getConstructorDependencies(fn.functionType)) {
      if (dep.token === LOGGER) continue;

      if (dep.token === undefined) {
        violations.push({ functionName: fn.name, dependency: "unknown", parameter: dep.name });
        continue;
      }

      const entity = entityOfTableToken(dep.token);
      if (entity) {
        if (!registeredEntities.has(entity)) {
          logger?.warn(`${fn.name} injects the table for ${entity.name}, which is not registered`, {
            function: fn.name,
            parameter: dep.name,
          });
        }
        continue;
      }

      if (!services.has(dep.token)) {
        violations.push({
          functionName: fn.name,
          dependency: tokenToString(dep.token),
          parameter: dep.name,
        });
      }
    }
  }

  if (violations.length > 0) {
    throw new DependencyValidationError(violations);
  }
}
