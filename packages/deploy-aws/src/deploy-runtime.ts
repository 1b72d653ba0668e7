import { mkdir, writeFile } from "node:fs/promises";
import { join, relative, resolve } from "node:path";
import createDebug from "debug";
import type { NimbusLogger } from "@nimbus-fn/types";
import { NimbusEnv } from "@nimbus-fn/config";
import {
  DeploymentError,
  type ApplicationContext,
  type DeploymentStage,
  type Runtime,
} from "@nimbus-fn/core";
import { spawnCommand, type CommandResult, type CommandRunner } from "./command-runner";
import { deriveStackName } from "./identity";
import { generateStackTemplate } from "./template/generator";

const debug = createDebug("nimbus:deploy-aws");

const TEMPLATE_FILE = "template.json";
const PACKAGED_TEMPLATE_FILE = "packaged.json";

export type AwsDeployRuntimeOptions = {
  /** Defaults to `NIMBUS_STACK_NAME`, then a name derived from the working directory. */
  stackName?: string;
  /** S3 bucket for packaged code. Defaults to `NIMBUS_DEPLOY_BUCKET`. */
  bucket?: string;
  /** Defaults to `NIMBUS_DEPLOY_CODE_DIR`, then "dist". */
  codeDir?: string;
  /** Defaults to `NIMBUS_DEPLOY_OUT_DIR`, then "nimbus.out". */
  outDir?: string;
  /** Defaults to `NIMBUS_LAMBDA_HANDLER`, then "lambda.handler". */
  handler?: string;
  cwd?: string;
  runner?: CommandRunner;
};

type ResolvedSettings = {
  stackName: string;
  bucket: string | undefined;
  codeDir: string;
  outDir: string;
  handler: string;
  cwd: string;
};

/**
 * Generates the stack template and drives the AWS CLI for the `synth`,
 * `diff`, `deploy` and `destroy` commands.
 */
export class AwsDeployRuntime implements Runtime {
  readonly mode = "deploy";
  private readonly runner: CommandRunner;

  constructor(private readonly options: AwsDeployRuntimeOptions = {}) {
    this.runner = options.runner ?? spawnCommand;
  }

  async run(context: ApplicationContext): Promise<void> {
    const logger = context.logger.child("deploy");
    const settings = this.resolveSettings();
    debug("run: %s on stack %s", context.command, settings.stackName);

    await this.checkPrerequisites(settings);

    switch (context.command) {
      case "synth":
        await this.synth(context, settings, logger);
        return;
      case "diff": {
        const template = await this.synth(context, settings, logger);
        const packaged = await this.package(template, settings, logger);
        await this.preview(packaged, settings, logger);
        return;
      }
      case "destroy":
        await this.destroy(settings, logger);
        return;
      default: {
        const template = await this.synth(context, settings, logger);
        const packaged = await this.package(template, settings, logger);
        await this.deploy(packaged, settings, logger);
      }
    }
  }

  private resolveSettings(): ResolvedSettings {
    const cwd = this.options.cwd ?? process.cwd();
    return {
      stackName: this.options.stackName ?? NimbusEnv.getStackName() ?? deriveStackName(cwd),
      bucket: this.options.bucket ?? NimbusEnv.getDeployBucket(),
      codeDir: this.options.codeDir ?? NimbusEnv.getDeployCodeDir(),
      outDir: resolve(cwd, this.options.outDir ?? NimbusEnv.getDeployOutDir()),
      handler: this.options.handler ?? NimbusEnv.getLambdaHandler(),
      cwd,
    };
  }

  private async checkPrerequisites(settings: ResolvedSettings): Promise<void> {
    try {
      const result = await this.runner("aws", ["--version"], { cwd: settings.cwd });
      if (result.exitCode !== 0) {
        throw new DeploymentError("prerequisites", "The AWS CLI is not working correctly.");
      }
    } catch (error) {
      if (error instanceof DeploymentError) throw error;
      throw new DeploymentError(
        "prerequisites",
        "The AWS CLI is required but was not found. Install it and configure credentials.",
        { cause: error },
      );
    }
  }

  /** Writes the template and returns its path. */
  private async synth(
    context: ApplicationContext,
    settings: ResolvedSettings,
    logger: NimbusLogger,
  ): Promise<string> {
    const template = generateStackTemplate(context, {
      stackName: settings.stackName,
      codeDir: relative(settings.outDir, resolve(settings.cwd, settings.codeDir)),
      handler: settings.handler,
    });
    const path = join(settings.outDir, TEMPLATE_FILE);

    try {
      await mkdir(settings.outDir, { recursive: true });
      await writeFile(path, `${JSON.stringify(template, null, 2)}\n`);
    } catch (error) {
      throw new DeploymentError("synth", `Could not write ${path}`, { cause: error });
    }

    logger.info("Template written", {
      path,
      resources: Object.keys(template.Resources).length,
    });
    return path;
  }

  /** Uploads the code and returns the packaged template's path. */
  private async package(template: string, settings: ResolvedSettings, logger: NimbusLogger): Promise<string> {
    if (!settings.bucket) {
      throw new DeploymentError(
        "package",
        "No deployment bucket. Set NIMBUS_DEPLOY_BUCKET to an S3 bucket the code can be uploaded to.",
      );
    }

    const packaged = join(settings.outDir, PACKAGED_TEMPLATE_FILE);
    await this.aws("package", settings, logger, [
      "cloudformation",
      "package",
      "--template-file",
      template,
      "--s3-bucket",
      settings.bucket,
      "--output-template-file",
      packaged,
      "--use-json",
    ]);
    return packaged;
  }

  private async preview(packaged: string, settings: ResolvedSettings, logger: NimbusLogger): Promise<void> {
    logger.info("Creating change set", { stack: settings.stackName });
    await this.aws("preview", settings, logger, [
      ...this.deployArgs(packaged, settings),
      "--no-execute-changeset",
    ]);
  }

  private async deploy(packaged: string, settings: ResolvedSettings, logger: NimbusLogger): Promise<void> {
    logger.info("Deploying stack", { stack: settings.stackName });
    await this.aws("deploy", settings, logger, [
      ...this.deployArgs(packaged, settings),
      "--no-fail-on-empty-changeset",
    ]);

    const outputs = await this.aws("deploy", settings, logger, [
      "cloudformation",
      "describe-stacks",
      "--stack-name",
      settings.stackName,
      "--query",
      "Stacks[0].Outputs",
      "--output",
      "json",
    ]);
    logger.info("Deployment complete", { stack: settings.stackName, outputs: outputs.trim() });
  }

  private async destroy(settings: ResolvedSettings, logger: NimbusLogger): Promise<void> {
    logger.info("Deleting stack", { stack: settings.stackName });
    const stackArgs = ["--stack-name", settings.stackName];
    await this.aws("destroy", settings, logger, ["cloudformation", "delete-stack", ...stackArgs]);
    await this.aws("destroy", settings, logger, [
      "cloudformation",
      "wait",
      "stack-delete-complete",
      ...stackArgs,
    ]);
    logger.info("Stack deleted", { stack: settings.stackName });
  }

  private deployArgs(packaged: string, settings: ResolvedSettings): string[] {
    return [
      "cloudformation",
      "deploy",
      "--template-file",
      packaged,
      "--stack-name",
      settings.stackName,
      "--capabilities",
      "CAPABILITY_IAM",
    ];
  }

  /** Runs one AWS CLI call and returns its stdout. */
  private async aws(
    stage: DeploymentStage,
    settings: ResolvedSettings,
    logger: NimbusLogger,
    args: string[],
  ): Promise<string> {
    const commandLine = `aws ${args.slice(0, 2).join(" ")}`;
    let result: CommandResult;
    try {
      result = await this.runner("aws", args, {
        cwd: settings.cwd,
        onLine: (line) => logger.debug(line, { stage }),
      });
    } catch (error) {
      throw new DeploymentError(stage, `${commandLine} could not be started`, { cause: error });
    }

    if (result.exitCode !== 0) {
      throw new DeploymentError(
        stage,
        `${commandLine} failed (exit code ${result.exitCode}): ${result.stderr.trim()}`,
      );
    }
    return result.stdout;
  }
}
