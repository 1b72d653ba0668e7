import type { Server } from "node:http";
import { NimbusEnv } from "@nimbus-fn/config";
import type { ApplicationContext, Runtime, TableFactory } from "@nimbus-fn/core";
import { createLocalServer } from "./server";

export type LocalRuntimeOptions = {
  /** Defaults to `NIMBUS_PORT`, then 5000. Use 0 for any free port. */
  port?: number;
  host?: string;
  createTable?: TableFactory;
};

export type RunningServer = {
  url: string;
  port: number;
  close(): Promise<void>;
};

/** Serves the application over HTTP on the developer's machine. */
export class LocalRuntime implements Runtime {
  readonly mode = "local";

  constructor(private readonly options: LocalRuntimeOptions = {}) {}

  /** Starts listening and resolves once the port is bound. */
  async start(context: ApplicationContext): Promise<RunningServer> {
    const { app, container } = createLocalServer(context, this.options.createTable);
    const host = this.options.host ?? "127.0.0.1";
    const port = this.options.port ?? NimbusEnv.getPort();

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(port, host, () => resolve(listening));
      listening.once("error", reject);
    });

    const address = server.address();
    const boundPort = typeof address === "object" && address ? address.port : port;
    const url = `http://${host}:${boundPort}`;
    context.logger.info("Local server listening", { url });

    return {
      url,
      port: boundPort,
      close: async () => {
        await new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        });
        await container.closeAll();
        context.logger.info("Local server stopped");
      },
    };
  }

  /** Serves until the process receives SIGINT or SIGTERM. */
  async run(context: ApplicationContext): Promise<void> {
    const running = await this.start(context);
    await new Promise<void>((resolve, reject) => {
      const shutdown = () => {
        process.off("SIGINT", shutdown);
        process.off("SIGTERM", shutdown);
        running.close().then(resolve, reject);
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
  }
}
