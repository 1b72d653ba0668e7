import type {
  FunctionOptions,
  HttpFunction,
  HttpMethod,
  TableOptions,
  Type,
} from "@nimbus-fn/types";
import { simplePlural } from "@nimbus-fn/common";
import { getFunctionConfig, getHttpApiMetadata } from "../decorators/http-api";
import { getEntityOptions, getPartitionKeyField, getSortKeyField } from "../decorators/entity";
import { getFields } from "../decorators/field";
import { ConfigurationError } from "../errors/nimbus-error";
import type { CloudDefaults } from "../application/cloud-defaults";
import { isQueryBoundMethod } from "../handlers/binder";

export type HttpFunctionType = Type<HttpFunction<unknown, unknown>>;

export type FunctionRegistration = Readonly<{
  name: string;
  functionType: HttpFunctionType;
  requestType?: Type<object>;
  responseType?: Type;
  method: HttpMethod;
  route: string;
  options: Readonly<FunctionOptions>;
}>;

export type TableRegistration = Readonly<{
  name: string;
  entityType: Type<object>;
  tableName: string;
  partitionKey: string;
  sortKey?: string;
  options: Readonly<TableOptions>;
}>;

const MEMORY_RANGE = [128, 10_240] as const;
const TIMEOUT_RANGE = [1, 900] as const;

function checkRange(owner: string, option: string, value: number, [min, max]: readonly [number, number]): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(
      `${owner}: ${option} must be an integer between ${min} and ${max}, got ${value}`,
    );
  }
}

/** Layers function options: defaults, then the `@FunctionConfig` marker, then explicit overrides. */
export function resolveFunctionOptions(
  type: Type,
  defaults: CloudDefaults,
  explicit: Partial<FunctionOptions> = {},
): FunctionOptions {
  const marker = getFunctionConfig(type) ?? {};
  const options: FunctionOptions = {
    memoryMb: explicit.memoryMb ?? marker.memoryMb ?? defaults.lambda.memoryMb,
    timeoutSeconds: explicit.timeoutSeconds ?? marker.timeoutSeconds ?? defaults.lambda.timeoutSeconds,
  };
  checkRange(type.name, "memoryMb", options.memoryMb, MEMORY_RANGE);
  checkRange(type.name, "timeoutSeconds", options.timeoutSeconds, TIMEOUT_RANGE);
  return options;
}

export function createFunctionRegistration(
  type: HttpFunctionType,
  defaults: CloudDefaults,
  explicit?: Partial<FunctionOptions>,
): FunctionRegistration {
  const api = getHttpApiMetadata(type);
  if (!api) {
    throw new ConfigurationError(`${type.name} is not marked with @HttpApi()`);
  }

  if (api.requestType && isQueryBoundMethod(api.method)) {
    for (const field of getFields(api.requestType)) {
      if (field.array || typeof field.type === "function") {
        throw new ConfigurationError(
          `${type.name}: field '${field.property}' of ${api.requestType.name} cannot be bound ` +
            `from the route or query string of a ${api.method} request`,
        );
      }
    }
  }

  return Object.freeze({
    name: type.name,
    functionType: type,
    requestType: api.requestType,
    responseType: api.responseType,
    method: api.method,
    route: api.route,
    options: Object.freeze(resolveFunctionOptions(type, defaults, explicit)),
  });
}

/**
 * Physical table name: explicit override, then the `@Entity` marker, then the
 * entity name plus "s". Names that do not pluralise with a plain "s" must be
 * given explicitly.
 */
export function resolveTableName(entity: Type, explicit?: string): string {
  const name = explicit ?? getEntityOptions(entity)?.tableName;
  if (name !== undefined) {
    if (!name.trim()) throw new ConfigurationError(`${entity.name}: table name must not be empty`);
    return name;
  }

  const plural = simplePlural(entity.name);
  if (!plural) {
    throw new ConfigurationError(
      `Cannot derive a table name for ${entity.name}. ` +
        `Set one with @Entity({ tableName: "..." }) or builder.addTable(${entity.name}, { tableName: "..." }).`,
    );
  }
  return plural;
}

export function createTableRegistration(
  entity: Type<object>,
  defaults: CloudDefaults,
  explicit: Partial<TableOptions> = {},
): TableRegistration {
  const partitionKey = getPartitionKeyField(entity);
  if (!partitionKey) {
    throw new ConfigurationError(`${entity.name} has no field marked with @PartitionKey()`);
  }

  const sortKey = getSortKeyField(entity);
  if (sortKey === partitionKey) {
    throw new ConfigurationError(`${entity.name}: '${sortKey}' cannot be both partition key and sort key`);
  }

  const tableName = resolveTableName(entity, explicit.tableName);
  return Object.freeze({
    name: entity.name,
    entityType: entity,
    tableName,
    partitionKey,
    sortKey,
    options: Object.freeze({
      tableName,
      billingMode: explicit.billingMode ?? defaults.dynamoDb.billingMode,
    }),
  });
}
