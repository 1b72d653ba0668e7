import type { BillingMode } from "@nimbus-fn/types";

export type LambdaArchitecture = "arm64" | "x86_64";

export type CloudDefaults = {
  lambda: {
    memoryMb: number;
    timeoutSeconds: number;
    runtime: string;
    architecture: LambdaArchitecture;
  };
  dynamoDb: {
    billingMode: BillingMode;
  };
};

/** Built-in defaults, the lowest layer of every resource option. */
export function createCloudDefaults(): CloudDefaults {
  return {
    lambda: {
      memoryMb: 256,
      timeoutSeconds: 30,
      runtime: "nodejs20.x",
      architecture: "arm64",
    },
    dynamoDb: {
      billingMode: "PAY_PER_REQUEST",
    },
  };
}

export function freezeDefaults(defaults: CloudDefaults): Readonly<CloudDefaults> {
  return Object.freeze({
    lambda: Object.freeze({ ...defaults.lambda }),
    dynamoDb: Object.freeze({ ...defaults.dynamoDb }),
  });
}
