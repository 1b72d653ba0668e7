import type { Table } from "@nimbus-fn/types";
import { ContextAwareLogger } from "@nimbus-fn/telemetry";
import { Container } from "../di/container";
import { LOGGER, tableToken } from "../di/tokens";
import type { TableRegistration } from "../bootstrap/registrations";
import type { ApplicationContext } from "./context";

export type TableFactory = (registration: TableRegistration) => Table<object>;

/**
 * A container holding the application's services, one table handle per
 * registered entity and the logger.
 */
export function createServiceContainer(context: ApplicationContext, createTable: TableFactory): Container {
  const container = new Container();
  for (const descriptor of context.services) {
    container.register(descriptor.provide, descriptor);
  }
  for (const table of context.tables) {
    container.registerValue(tableToken(table.entityType), createTable(table));
  }
  container.registerValue(LOGGER, new ContextAwareLogger(context.logger));
  return container;
}
