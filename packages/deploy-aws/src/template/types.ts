/** A CloudFormation intrinsic or literal value. */
export type CfnValue =
  | string
  | number
  | boolean
  | null
  | CfnValue[]
  | { [key: string]: CfnValue };

export type CfnResource = {
  Type: string;
  Properties: Record<string, CfnValue>;
  DependsOn?: string[];
  DeletionPolicy?: "Delete" | "Retain";
  UpdateReplacePolicy?: "Delete" | "Retain";
};

export type CfnOutput = {
  Description: string;
  Value: CfnValue;
};

export type StackTemplate = {
  AWSTemplateFormatVersion: "2010-09-09";
  Description: string;
  Resources: Record<string, CfnResource>;
  Outputs: Record<string, CfnOutput>;
};
