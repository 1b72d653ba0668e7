import createDebug from "debug";
import type { Type } from "@nimbus-fn/types";
import { getHttpApiMetadata } from "../decorators/http-api";
import { getEntityOptions } from "../decorators/entity";
import { createCloudDefaults, type CloudDefaults } from "../application/cloud-defaults";
import {
  createFunctionRegistration,
  createTableRegistration,
  type FunctionRegistration,
  type HttpFunctionType,
  type TableRegistration,
} from "./registrations";

const debug = createDebug("nimbus:core:discovery");

/**
 * A unit of code to scan: a module namespace (the result of `import()` or
 * `import * as`) or a list of classes.
 */
export type CodeUnit = Readonly<Record<string, unknown>> | readonly unknown[];

export type FunctionFilter = (type: HttpFunctionType) => boolean;

function exportedValues(units: readonly CodeUnit[]): unknown[] {
  return units.flatMap((unit) => (Array.isArray(unit) ? [...unit] : Object.values(unit)));
}

function isClass(value: unknown): value is Type {
  return typeof value === "function" && typeof value.prototype === "object";
}

export function isHttpFunctionClass(value: unknown): value is HttpFunctionType {
  return (
    isClass(value) &&
    getHttpApiMetadata(value) !== undefined &&
    typeof value.prototype.handle === "function"
  );
}

export function isEntityClass(value: unknown): value is Type<object> {
  return isClass(value) && getEntityOptions(value) !== undefined;
}

/**
 * HTTP function classes exported by the units, in the order they are found.
 * Values without `@HttpApi()` or a `handle` method are skipped, as are
 * classes the filter rejects. A class reached twice is kept once.
 */
export function findFunctionTypes(units: readonly CodeUnit[], filter?: FunctionFilter): HttpFunctionType[] {
  const found = new Set<HttpFunctionType>();
  for (const value of exportedValues(units)) {
    if (!isHttpFunctionClass(value) || found.has(value)) continue;
    if (filter && !filter(value)) {
      debug("filtered out %s", value.name);
      continue;
    }
    found.add(value);
  }
  return [...found];
}

/** Entity classes exported by the units; duplicates keep their first position. */
export function findEntityTypes(units: readonly CodeUnit[]): Type<object>[] {
  const found = new Set<Type<object>>();
  for (const value of exportedValues(units)) {
    if (isEntityClass(value)) found.add(value);
  }
  return [...found];
}

export function discoverFunctions(
  units: readonly CodeUnit[],
  filter?: FunctionFilter,
  defaults: CloudDefaults = createCloudDefaults(),
): FunctionRegistration[] {
  const registrations = findFunctionTypes(units, filter).map((type) =>
    createFunctionRegistration(type, defaults),
  );
  debug("discovered %d functions", registrations.length);
  return registrations;
}

export function discoverTables(
  units: readonly CodeUnit[],
  defaults: CloudDefaults = createCloudDefaults(),
): TableRegistration[] {
  const registrations = findEntityTypes(units).map((entity) =>
    createTableRegistration(entity, defaults),
  );
  debug("discovered %d tables", registrations.length);
  return registrations;
}
