import "reflect-metadata";

// Decorators
export { HttpApi, FunctionConfig, getHttpApiMetadata, getFunctionConfig } from "./decorators/http-api";
export type { HttpApiOptions, HttpApiMetadata } from "./decorators/http-api";
export { Entity, PartitionKey, SortKey, getEntityOptions } from "./decorators/entity";
export type { EntityOptions } from "./decorators/entity";
export { Field, getFields } from "./decorators/field";
export type { FieldType, ScalarFieldType, FieldOptions, FieldMetadata } from "./decorators/field";
export { Injectable, Inject, InjectTable, InjectLogger } from "./decorators/injectable";

// DI
export { Container } from "./di/container";
export { ServiceCollection } from "./di/service-collection";
export { LOGGER, tableToken, entityOfTableToken, tokenToString } from "./di/tokens";
export { getConstructorDependencies } from "./di/dependency-tokens";
export type { ConstructorDependency } from "./di/dependency-tokens";
export { getConstructorParameterNames } from "./di/parameter-names";

// Errors
export {
  HttpException,
  BadRequestException,
  RequestBindingException,
  NotFoundException,
  ConflictException,
  InternalServerErrorException,
} from "./errors/http-exception";
export {
  NimbusError,
  ConfigurationError,
  DependencyValidationError,
  FunctionInvocationError,
  DeploymentError,
} from "./errors/nimbus-error";
export type {
  DependencyViolation,
  InvocationStage,
  DeploymentStage,
} from "./errors/nimbus-error";

// Discovery and registrations
export {
  discoverFunctions,
  discoverTables,
  findFunctionTypes,
  findEntityTypes,
  isHttpFunctionClass,
  isEntityClass,
} from "./bootstrap/discovery";
export type { CodeUnit, FunctionFilter } from "./bootstrap/discovery";
export {
  createFunctionRegistration,
  createTableRegistration,
  resolveFunctionOptions,
  resolveTableName,
} from "./bootstrap/registrations";
export type {
  FunctionRegistration,
  TableRegistration,
  HttpFunctionType,
} from "./bootstrap/registrations";
export { validateFunctionDependencies } from "./bootstrap/dependency-validator";

// Request handling
export { bindRequest, buildValueMap, isQueryBoundMethod } from "./handlers/binder";
export { dispatchFunction } from "./handlers/dispatcher";
export type { DispatchOptions } from "./handlers/dispatcher";
export { activateFunction } from "./handlers/activator";
export { serializeJson, serializeResult, errorResponse } from "./handlers/serializer";
export { FunctionRegistry } from "./handlers/registry";
export type { MatchedFunction } from "./handlers/registry";

// Application
export { NimbusApplication } from "./application/application";
export type { RunOptions } from "./application/application";
export { ApplicationBuilder, FunctionScan, TableScan } from "./application/builder";
export type { ApplicationContext } from "./application/context";
export { createCloudDefaults } from "./application/cloud-defaults";
export type { CloudDefaults, LambdaArchitecture } from "./application/cloud-defaults";
export { createServiceContainer } from "./application/container-factory";
export type { TableFactory } from "./application/container-factory";
export { describeResources, formatResourceList } from "./application/resources";
export type { ResourceManifest, FunctionResource, TableResource } from "./application/resources";

// Runtimes
export type { Runtime, ServerlessAdapter } from "./adapters/interfaces";

// Testing
export { TestingApplication, mockRequest } from "./testing/test-app";
export type { MockRequestOptions } from "./testing/test-app";
