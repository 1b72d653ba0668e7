import type { HttpMethod } from "@nimbus-fn/types";
import { getConstructorDependencies } from "../di/dependency-tokens";
import { tokenToString } from "../di/tokens";
import type { ApplicationContext } from "./context";

export type FunctionResource = {
  name: string;
  method: HttpMethod;
  route: string;
  requestType: string | null;
  responseType: string | null;
  memoryMb: number;
  timeoutSeconds: number;
  dependencies: string[];
};

export type TableResource = {
  name: string;
  tableName: string;
  partitionKey: string;
  sortKey: string | null;
  billingMode: string;
};

export type ResourceManifest = {
  functions: FunctionResource[];
  tables: TableResource[];
};

/** JSON-serialisable description of the application's functions and tables. */
export function describeResources(context: ApplicationContext): ResourceManifest {
  return {
    functions: context.functions.map((fn) => ({
      name: fn.name,
      method: fn.method,
      route: fn.route,
      requestType: fn.requestType?.name ?? null,
      responseType: fn.responseType?.name ?? null,
      memoryMb: fn.options.memoryMb,
      timeoutSeconds: fn.options.timeoutSeconds,
      dependencies: getConstructorDependencies(fn.functionType).map((dep) =>
        dep.token === undefined ? "unknown" : tokenToString(dep.token),
      ),
    })),
    tables: context.tables.map((table) => ({
      name: table.name,
      tableName: table.tableName,
      partitionKey: table.partitionKey,
      sortKey: table.sortKey ?? null,
      billingMode: table.options.billingMode,
    })),
  };
}

/** Human-readable listing printed by the `list` command. */
export function formatResourceList(context: ApplicationContext): string {
  const lines = [`Functions (${context.functions.length}):`];
  for (const fn of context.functions) {
    lines.push(`  ${fn.method.padEnd(7)} ${fn.route} -> ${fn.name}`);
  }

  lines.push(`Tables (${context.tables.length}):`);
  for (const table of context.tables) {
    const keys = table.sortKey
      ? `partition key: ${table.partitionKey}, sort key: ${table.sortKey}`
      : `partition key: ${table.partitionKey}`;
    lines.push(`  ${table.name} -> ${table.tableName} (${keys})`);
  }

  return `${lines.join("\n")}\n`;
}
