import createDebug from "debug";
import type { FunctionOptions, NimbusLogger, TableOptions, Type } from "@nimbus-fn/types";
import { detectModeAndCommand } from "@nimbus-fn/config";
import { createLogger, readLoggingEnv } from "@nimbus-fn/telemetry";
import {
  findEntityTypes,
  findFunctionTypes,
  type CodeUnit,
  type FunctionFilter,
} from "../bootstrap/discovery";
import {
  createFunctionRegistration,
  createTableRegistration,
  type FunctionRegistration,
  type HttpFunctionType,
  type TableRegistration,
} from "../bootstrap/registrations";
import { validateFunctionDependencies } from "../bootstrap/dependency-validator";
import { ServiceCollection } from "../di/service-collection";
import { ConfigurationError } from "../errors/nimbus-error";
import type { Runtime } from "../adapters/interfaces";
import { createCloudDefaults, freezeDefaults, type CloudDefaults } from "./cloud-defaults";
import type { ApplicationContext } from "./context";
import { NimbusApplication } from "./application";

const debug = createDebug("nimbus:core:builder");

/** Scans code units for HTTP functions. Returned by `ApplicationBuilder.addFunctions()`. */
export class FunctionScan {
  private readonly units: CodeUnit[] = [];
  private filter?: FunctionFilter;

  fromModule(unit: CodeUnit): this {
    this.units.push(unit);
    return this;
  }

  withFilter(filter: FunctionFilter): this {
    this.filter = filter;
    return this;
  }

  /** @internal */
  collect(): HttpFunctionType[] {
    return findFunctionTypes(this.units, this.filter);
  }
}

/** Scans code units for entities. Returned by `ApplicationBuilder.addTables()`. */
export class TableScan {
  private readonly units: CodeUnit[] = [];

  fromModule(unit: CodeUnit): this {
    this.units.push(unit);
    return this;
  }

  /** @internal */
  collect(): Type<object>[] {
    return findEntityTypes(this.units);
  }
}

type Source<TScan, TType, TOptions> =
  | { kind: "scan"; scan: TScan }
  | { kind: "type"; type: TType; options?: Partial<TOptions> };

/** Merges scanned and explicit entries in registration order; explicit options stack per class. */
function collectSources<TType, TOptions>(
  sources: readonly Source<{ collect(): TType[] }, TType, TOptions>[],
): Map<TType, Partial<TOptions>> {
  const collected = new Map<TType, Partial<TOptions>>();
  for (const source of sources) {
    if (source.kind === "scan") {
      for (const type of source.scan.collect()) {
        if (!collected.has(type)) collected.set(type, {});
      }
    } else {
      collected.set(source.type, { ...collected.get(source.type), ...source.options });
    }
  }
  return collected;
}

function routeKey(fn: FunctionRegistration): string {
  return `${fn.method} ${fn.route.replaceAll(/\{[^}]+\}/g, "{}")}`;
}

function ensureUniqueFunctions(functions: readonly FunctionRegistration[]): void {
  const byRoute = new Map<string, string>();
  const names = new Set<string>();
  for (const fn of functions) {
    const key = routeKey(fn);
    const existing = byRoute.get(key);
    if (existing) {
      throw new ConfigurationError(
        `${fn.method} ${fn.route} is claimed by both ${existing} and ${fn.name}`,
      );
    }
    byRoute.set(key, fn.name);

    if (names.has(fn.name)) {
      throw new ConfigurationError(`Two different functions are named ${fn.name}`);
    }
    names.add(fn.name);
  }
}

function ensureUniqueTables(tables: readonly TableRegistration[]): void {
  const byName = new Map<string, string>();
  for (const table of tables) {
    const existing = byName.get(table.tableName);
    if (existing) {
      throw new ConfigurationError(
        `Table name ${table.tableName} is used by both ${existing} and ${table.name}`,
      );
    }
    byName.set(table.tableName, table.name);
  }
}

/**
 * Collects functions, tables, services and runtimes, then builds an
 * immutable application.
 *
 * @example
 * ```ts
 * const builder = NimbusApplication.createBuilder(process.argv.slice(2));
 * builder.addFunctions().fromModule(functions);
 * builder.addTables().fromModule(entities);
 * builder.useRuntime(new LocalRuntime());
 * await builder.build().run();
 * ```
 */
export class ApplicationBuilder {
  /** Services functions may depend on. */
  readonly services = new ServiceCollection();

  private readonly functionSources: Source<FunctionScan, HttpFunctionType, FunctionOptions>[] = [];
  private readonly tableSources: Source<TableScan, Type<object>, TableOptions>[] = [];
  private readonly runtimes: Runtime[] = [];
  private readonly defaults: CloudDefaults = createCloudDefaults();
  private logger?: NimbusLogger;

  constructor(private readonly args: readonly string[]) {}

  addFunctions(): FunctionScan {
    const scan = new FunctionScan();
    this.functionSources.push({ kind: "scan", scan });
    return scan;
  }

  addTables(): TableScan {
    const scan = new TableScan();
    this.tableSources.push({ kind: "scan", scan });
    return scan;
  }

  addFunction(type: HttpFunctionType, options?: Partial<FunctionOptions>): this {
    this.functionSources.push({ kind: "type", type, options });
    return this;
  }

  addTable(entity: Type<object>, options?: Partial<TableOptions>): this {
    this.tableSources.push({ kind: "type", type: entity, options });
    return this;
  }

  /** Adjusts the built-in defaults every resource option falls back to. */
  configureDefaults(configure: (defaults: CloudDefaults) => void): this {
    configure(this.defaults);
    return this;
  }

  useRuntime(runtime: Runtime): this {
    this.runtimes.push(runtime);
    return this;
  }

  useLogger(logger: NimbusLogger): this {
    this.logger = logger;
    return this;
  }

  build(): NimbusApplication {
    const { mode, command } = detectModeAndCommand(this.args);
    const logger = this.logger ?? createLogger(readLoggingEnv());

    const functions = [...collectSources(this.functionSources)].map(([type, options]) =>
      createFunctionRegistration(type, this.defaults, options),
    );
    const tables = [...collectSources(this.tableSources)].map(([entity, options]) =>
      createTableRegistration(entity, this.defaults, options),
    );
    ensureUniqueFunctions(functions);
    ensureUniqueTables(tables);

    logger.info("Application built", {
      mode,
      command,
      functions: functions.length,
      tables: tables.length,
    });

    if (command === "list") {
      debug("skipping dependency validation for list");
    } else {
      validateFunctionDependencies(functions, tables, this.services, logger);
    }

    const context: ApplicationContext = Object.freeze({
      args: Object.freeze([...this.args]),
      mode,
      command,
      functions: Object.freeze(functions),
      tables: Object.freeze(tables),
      defaults: freezeDefaults(this.defaults),
      services: Object.freeze(this.services.toArray()),
      logger,
    });

    return new NimbusApplication(context, [...this.runtimes]);
  }
}
