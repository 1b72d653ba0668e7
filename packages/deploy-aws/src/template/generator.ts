import { FUNCTION_NAME_ENV, tableEnvVarName } from "@nimbus-fn/config";
import type { ApplicationContext, FunctionRegistration, TableRegistration } from "@nimbus-fn/core";
import { deriveFunctionName, deriveLogicalId } from "../identity";
import type { CfnResource, CfnValue, StackTemplate } from "./types";

export type StackTemplateOptions = {
  stackName: string;
  /** Directory holding the bundled code, relative to the template; uploaded by `cloudformation package`. */
  codeDir: string;
  /** Handler in `file.export` form. */
  handler: string;
};

const ROLE_ID = "FunctionRole";
const API_ID = "HttpApi";
const PROVISIONED_CAPACITY = { ReadCapacityUnits: 5, WriteCapacityUnits: 5 };

const ref = (logicalId: string): CfnValue => ({ Ref: logicalId });
const getAtt = (logicalId: string, attribute: string): CfnValue => ({
  "Fn::GetAtt": [logicalId, attribute],
});

function tableResource(table: TableRegistration): CfnResource {
  const attributes: CfnValue[] = [{ AttributeName: table.partitionKey, AttributeType: "S" }];
  const keySchema: CfnValue[] = [{ AttributeName: table.partitionKey, KeyType: "HASH" }];
  if (table.sortKey) {
    attributes.push({ AttributeName: table.sortKey, AttributeType: "S" });
    keySchema.push({ AttributeName: table.sortKey, KeyType: "RANGE" });
  }

  const properties: Record<string, CfnValue> = {
    TableName: table.tableName,
    AttributeDefinitions: attributes,
    KeySchema: keySchema,
    BillingMode: table.options.billingMode,
  };
  if (table.options.billingMode === "PROVISIONED") {
    properties.ProvisionedThroughput = PROVISIONED_CAPACITY;
  }

  return {
    Type: "AWS::DynamoDB::Table",
    DeletionPolicy: "Delete",
    UpdateReplacePolicy: "Delete",
    Properties: properties,
  };
}

function roleResource(tables: readonly TableRegistration[]): CfnResource {
  const properties: Record<string, CfnValue> = {
    AssumeRolePolicyDocument: {
      Version: "2012-10-17",
      Statement: [
        {
          Effect: "Allow",
          Principal: { Service: "lambda.amazonaws.com" },
          Action: "sts:AssumeRole",
        },
      ],
    },
    ManagedPolicyArns: [
      { "Fn::Sub": "arn:${AWS::Partition}:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole" },
    ],
  };

  if (tables.length > 0) {
    properties.Policies = [
      {
        PolicyName: "TableAccess",
        PolicyDocument: {
          Version: "2012-10-17",
          Statement: [
            {
              Effect: "Allow",
              Action: [
                "dynamodb:GetItem",
                "dynamodb:PutItem",
                "dynamodb:DeleteItem",
                "dynamodb:Query",
                "dynamodb:Scan",
              ],
              Resource: tables.map((table) => getAtt(deriveLogicalId(table.name, "Table"), "Arn")),
            },
          ],
        },
      },
    ];
  }

  return { Type: "AWS::IAM::Role", Properties: properties };
}

function functionResource(
  context: ApplicationContext,
  fn: FunctionRegistration,
  options: StackTemplateOptions,
): CfnResource {
  const variables: Record<string, CfnValue> = { [FUNCTION_NAME_ENV]: fn.name };
  for (const table of context.tables) {
    variables[tableEnvVarName(table.name)] = ref(deriveLogicalId(table.name, "Table"));
  }

  return {
    Type: "AWS::Lambda::Function",
    Properties: {
      FunctionName: deriveFunctionName(options.stackName, fn.name),
      Runtime: context.defaults.lambda.runtime,
      Handler: options.handler,
      Code: options.codeDir,
      MemorySize: fn.options.memoryMb,
      Timeout: fn.options.timeoutSeconds,
      Architectures: [context.defaults.lambda.architecture],
      Role: getAtt(ROLE_ID, "Arn"),
      Environment: { Variables: variables },
    },
  };
}

function routeResources(fn: FunctionRegistration): Record<string, CfnResource> {
  const functionId = deriveLogicalId(fn.name, "Function");
  const integrationId = deriveLogicalId(fn.name, "Integration");

  return {
    [integrationId]: {
      Type: "AWS::ApiGatewayV2::Integration",
      Properties: {
        ApiId: ref(API_ID),
        IntegrationType: "AWS_PROXY",
        IntegrationUri: getAtt(functionId, "Arn"),
        PayloadFormatVersion: "2.0",
      },
    },
    [deriveLogicalId(fn.name, "Route")]: {
      Type: "AWS::ApiGatewayV2::Route",
      Properties: {
        ApiId: ref(API_ID),
        RouteKey: `${fn.method} ${fn.route}`,
        Target: { "Fn::Join": ["/", ["integrations", ref(integrationId)]] },
      },
    },
    [deriveLogicalId(fn.name, "InvokePermission")]: {
      Type: "AWS::Lambda::Permission",
      Properties: {
        Action: "lambda:InvokeFunction",
        FunctionName: ref(functionId),
        Principal: "apigateway.amazonaws.com",
        SourceArn: {
          "Fn::Sub": "arn:${AWS::Partition}:execute-api:${AWS::Region}:${AWS::AccountId}:${HttpApi}/*/*",
        },
      },
    },
  };
}

/**
 * CloudFormation template for the application: a table per entity, one
 * execution role, a function per HTTP function wired to an HTTP API route,
 * and the API URL as output.
 */
export function generateStackTemplate(
  context: ApplicationContext,
  options: StackTemplateOptions,
): StackTemplate {
  const resources: Record<string, CfnResource> = {};

  for (const table of context.tables) {
    resources[deriveLogicalId(table.name, "Table")] = tableResource(table);
  }

  resources[ROLE_ID] = roleResource(context.tables);

  resources[API_ID] = {
    Type: "AWS::ApiGatewayV2::Api",
    Properties: { Name: `${options.stackName}-api`, ProtocolType: "HTTP" },
  };
  resources.HttpApiDefaultStage = {
    Type: "AWS::ApiGatewayV2::Stage",
    Properties: { ApiId: ref(API_ID), StageName: "$default", AutoDeploy: true },
  };

  for (const fn of context.functions) {
    resources[deriveLogicalId(fn.name, "Function")] = functionResource(context, fn, options);
    Object.assign(resources, routeResources(fn));
  }

  return {
    AWSTemplateFormatVersion: "2010-09-09",
    Description: `${options.stackName}: ${context.functions.length} functions, ${context.tables.length} tables`,
    Resources: resources,
    Outputs: {
      ApiUrl: {
        Description: "HTTP API endpoint URL",
        Value: getAtt(API_ID, "ApiEndpoint"),
      },
    },
  };
}
