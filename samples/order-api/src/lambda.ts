import { AwsLambdaAdapter } from "@nimbus-fn/serverless-aws";
import { buildApp } from "./app";

export const handler = buildApp([]).lambdaHandler(new AwsLambdaAdapter());
