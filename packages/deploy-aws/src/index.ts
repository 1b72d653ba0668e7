export { AwsDeployRuntime } from "./deploy-runtime";
export type { AwsDeployRuntimeOptions } from "./deploy-runtime";
export { generateStackTemplate } from "./template/generator";
export type { StackTemplateOptions } from "./template/generator";
export type { StackTemplate, CfnResource, CfnOutput, CfnValue } from "./template/types";
export { spawnCommand } from "./command-runner";
export type { CommandRunner, CommandResult, CommandOptions } from "./command-runner";
export { deriveLogicalId, deriveStackName, deriveFunctionName } from "./identity";
