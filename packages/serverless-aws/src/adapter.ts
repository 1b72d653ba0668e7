import createDebug from "debug";
import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from "aws-lambda";
import type { HttpRequest } from "@nimbus-fn/types";
import { FUNCTION_NAME_ENV, NimbusEnv } from "@nimbus-fn/config";
import {
  ConfigurationError,
  FunctionRegistry,
  HttpException,
  createServiceContainer,
  dispatchFunction,
  errorResponse,
  type ApplicationContext,
  type ServerlessAdapter,
  type TableFactory,
} from "@nimbus-fn/core";
import { dynamoDbTables } from "@nimbus-fn/storage";
import { mapApiGatewayV2Event, mapHttpResponseToResult } from "./event-mapper";

const debug = createDebug("nimbus:serverless-aws");

/** Time kept back from the invocation deadline so a cancelled function can still answer. */
const DEADLINE_MARGIN_MS = 500;

export type LambdaHttpHandler = (
  event: APIGatewayProxyEventV2,
  context: Context,
) => Promise<APIGatewayProxyStructuredResultV2>;

export type AwsLambdaAdapterOptions = {
  /** Defaults to one DynamoDB table per entity. */
  createTable?: TableFactory;
};

/**
 * Builds the handler for a Lambda that serves exactly one function, named
 * by `NIMBUS_FUNCTION_NAME`. Every invocation goes to that function whatever
 * its path; API Gateway has already routed it.
 */
export class AwsLambdaAdapter implements ServerlessAdapter<LambdaHttpHandler> {
  constructor(private readonly options: AwsLambdaAdapterOptions = {}) {}

  createHandler(context: ApplicationContext): LambdaHttpHandler {
    const functionName = NimbusEnv.getFunctionName();
    if (!functionName) {
      throw new ConfigurationError(
        `${FUNCTION_NAME_ENV} is not set. It names the function this Lambda serves and is set by the deploy template.`,
      );
    }

    const registry = new FunctionRegistry(context.functions);
    const registration = registry.getByName(functionName);
    if (!registration) {
      throw new ConfigurationError(
        `${FUNCTION_NAME_ENV} is ${functionName}, which is not a registered function ` +
          `(registered: ${registry.names().join(", ") || "none"})`,
      );
    }

    const container = createServiceContainer(context, this.options.createTable ?? dynamoDbTables());
    context.logger.info("Lambda handler ready", { function: registration.name });

    return async (event, lambdaContext) => {
      let request: HttpRequest;
      try {
        request = mapApiGatewayV2Event(event);
      } catch (error) {
        if (error instanceof HttpException) {
          return mapHttpResponseToResult(errorResponse(error.statusCode, error.message));
        }
        throw error;
      }
      debug("%s %s → %s", request.method, request.path, registration.name);

      const remaining = lambdaContext.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS;
      const response = await dispatchFunction(registration, request, {
        container,
        logger: context.logger,
        signal: AbortSignal.timeout(Math.max(remaining, 1)),
      });
      return mapHttpResponseToResult(response);
    };
  }
}
