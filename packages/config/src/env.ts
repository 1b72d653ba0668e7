import { toEnvSegment } from "@nimbus-fn/common";

export const FUNCTION_NAME_ENV = "NIMBUS_FUNCTION_NAME";

const DEFAULT_PORT = 5000;

/** Environment variable the deploy template sets to a table's physical name. */
export function tableEnvVarName(entityName: string): string {
  return `TABLE_${toEnvSegment(entityName)}`;
}

/** Typed readers over the process environment. */
export class NimbusEnv {
  /** Name of the single function a pinned host instance dispatches to. */
  static getFunctionName(): string | undefined {
    const value = process.env[FUNCTION_NAME_ENV]?.trim();
    return value ? value : undefined;
  }

  static getTableName(entityName: string): string | undefined {
    const value = process.env[tableEnvVarName(entityName)];
    return value ? value : undefined;
  }

  static isLambdaHost(): boolean {
    return process.env.AWS_LAMBDA_RUNTIME_API !== undefined;
  }

  static getPort(): number {
    const raw = process.env.NIMBUS_PORT;
    const port = raw ? Number(raw) : Number.NaN;
    return Number.isInteger(port) && port >= 0 && port < 65536 ? port : DEFAULT_PORT;
  }

  static getStackName(): string | undefined {
    return process.env.NIMBUS_STACK_NAME || undefined;
  }

  static getDeployBucket(): string | undefined {
    return process.env.NIMBUS_DEPLOY_BUCKET || undefined;
  }

  static getDeployCodeDir(): string {
    return process.env.NIMBUS_DEPLOY_CODE_DIR || "dist";
  }

  static getDeployOutDir(): string {
    return process.env.NIMBUS_DEPLOY_OUT_DIR || "nimbus.out";
  }

  static getLambdaHandler(): string {
    return process.env.NIMBUS_LAMBDA_HANDLER || "lambda.handler";
  }
}
