import type { Type } from "@nimbus-fn/types";
import { NimbusError } from "@nimbus-fn/core";

/** What a table needs to know about its entity. A `TableRegistration` satisfies it. */
export type TableSchema<T extends object> = {
  readonly entityType: Type<T>;
  readonly tableName: string;
  readonly partitionKey: string;
  readonly sortKey?: string;
};

export function readKey(entity: object, field: string, entityName: string): string {
  const value: unknown = Reflect.get(entity, field);
  if (typeof value !== "string" || value === "") {
    throw new NimbusError(
      `${entityName}.${field} must be a non-empty string key, got ${value === undefined ? "undefined" : JSON.stringify(value)}`,
    );
  }
  return value;
}

/** A detached instance of the entity class carrying a deep copy of `data`. */
export function copyEntity<T extends object>(entityType: Type<T>, data: object): T {
  return Object.assign(new entityType(), structuredClone({ ...data }));
}
