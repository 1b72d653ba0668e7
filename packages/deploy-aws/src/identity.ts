import { basename } from "node:path";

/**
 * Derives a CloudFormation logical id: alphanumerics only, followed by the
 * resource kind.
 *
 * @example deriveLogicalId("CreateOrder", "Function") => "CreateOrderFunction"
 */
export function deriveLogicalId(name: string, kind: string): string {
  return `${name.replaceAll(/[^A-Za-z0-9]/g, "")}${kind}`;
}

/**
 * Derives a stack name from a directory: letters, digits and hyphens,
 * starting with a letter.
 *
 * @example deriveStackName("/work/order_api") => "order-api"
 */
export function deriveStackName(directory: string): string {
  const name = basename(directory)
    .replaceAll(/[^A-Za-z0-9-]+/g, "-")
    .replaceAll(/^-+|-+$/g, "");
  return /^[A-Za-z]/.test(name) ? name : `nimbus-${name || "app"}`;
}

/**
 * Derives the deployed function's name.
 *
 * @example deriveFunctionName("order-api", "CreateOrder") => "order-api-CreateOrder"
 */
export function deriveFunctionName(stackName: string, functionName: string): string {
  return `${stackName}-${functionName}`;
}
