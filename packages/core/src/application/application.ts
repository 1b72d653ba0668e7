import createDebug from "debug";
import type { ServerlessAdapter, Runtime } from "../adapters/interfaces";
import { ConfigurationError } from "../errors/nimbus-error";
import type { ApplicationContext } from "./context";
import { ApplicationBuilder } from "./builder";
import { describeResources, formatResourceList, type ResourceManifest } from "./resources";

const debug = createDebug("nimbus:core:application");

export type RunOptions = {
  /** Where the `list` command prints. Defaults to stdout. */
  write?: (text: string) => void;
};

export class NimbusApplication {
  constructor(
    readonly context: ApplicationContext,
    private readonly runtimes: readonly Runtime[],
  ) {}

  static createBuilder(args: readonly string[] = process.argv.slice(2)): ApplicationBuilder {
    return new ApplicationBuilder(args);
  }

  /**
   * Lists resources for the `list` command, otherwise hands the application
   * to the runtime registered for the current mode.
   */
  async run(options: RunOptions = {}): Promise<void> {
    const { mode, command } = this.context;

    if (command === "list") {
      const write = options.write ?? ((text: string) => process.stdout.write(text));
      write(formatResourceList(this.context));
      return;
    }

    const runtime = this.runtimes.find((candidate) => candidate.mode === mode);
    if (!runtime) {
      throw new ConfigurationError(
        `No runtime registered for ${mode} mode. Register one with builder.useRuntime().`,
      );
    }

    debug("run: %s mode, command %s", mode, command);
    await runtime.run(this.context);
  }

  /** The handler a serverless host invokes, pinned by the adapter to one function. */
  lambdaHandler<THandler>(adapter: ServerlessAdapter<THandler>): THandler {
    return adapter.createHandler(this.context);
  }

  describe(): ResourceManifest {
    return describeResources(this.context);
  }
}
