import createDebug from "debug";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { HttpResponse } from "@nimbus-fn/types";
import { toExpressPath } from "@nimbus-fn/common";
import {
  createServiceContainer,
  dispatchFunction,
  type ApplicationContext,
  type Container,
  type FunctionRegistration,
  type TableFactory,
} from "@nimbus-fn/core";
import { inMemoryTables } from "@nimbus-fn/storage";
import { mapExpressRequest } from "./request-mapper";

const debug = createDebug("nimbus:runtime-local");

const ROUTE_METHODS = {
  GET: "get",
  POST: "post",
  PUT: "put",
  PATCH: "patch",
  DELETE: "delete",
  HEAD: "head",
  OPTIONS: "options",
} as const;

export type LocalServer = {
  app: Express;
  container: Container;
};

function sendResponse(res: Response, response: HttpResponse): void {
  res.status(response.status);
  if (response.headers) res.set(response.headers);
  if (response.body === undefined) {
    res.end();
  } else {
    res.send(response.body);
  }
}

function statusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

function createRouteHandler(
  registration: FunctionRegistration,
  context: ApplicationContext,
  container: Container,
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    void dispatchFunction(registration, mapExpressRequest(req, registration.method), {
      container,
      logger: context.logger,
      signal: controller.signal,
    })
      .then((response) => sendResponse(res, response))
      .catch(next);
  };
}

/**
 * Express app serving every registered function on its route, with one
 * table per entity from `createTable` (in-memory by default).
 */
export function createLocalServer(
  context: ApplicationContext,
  createTable: TableFactory = inMemoryTables(),
): LocalServer {
  const container = createServiceContainer(context, createTable);
  const app = express();
  app.disable("x-powered-by");
  app.set("query parser", "simple");
  app.use(express.text({ type: "*/*", limit: "6mb" }));

  for (const registration of context.functions) {
    const path = toExpressPath(registration.route);
    context.logger.info("Mapping route", {
      method: registration.method,
      route: registration.route,
      function: registration.name,
    });
    app.route(path)[ROUTE_METHODS[registration.method]](
      createRouteHandler(registration, context, container),
    );
  }

  app.use((req: Request, res: Response) => {
    debug("no route for %s %s", req.method, req.path);
    res.status(404).json({ error: `No function found for ${req.method} ${req.path}` });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(error);
    if (status >= 500) {
      context.logger.error("Unhandled error in local server", {
        path: req.path,
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(status).json({ error: "Internal server error" });
      return;
    }
    res.status(status).json({ error: error instanceof Error ? error.message : "Bad request" });
  });

  return { app, container };
}
