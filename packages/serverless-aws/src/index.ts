export { AwsLambdaAdapter } from "./adapter";
export type { AwsLambdaAdapterOptions, LambdaHttpHandler } from "./adapter";
export { mapApiGatewayV2Event, mapHttpResponseToResult } from "./event-mapper";
