import "reflect-metadata";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { HttpFunction, Table } from "@nimbus-fn/types";
import { NimbusApplication } from "../../src/application/application";
import type { ApplicationContext } from "../../src/application/context";
import type { Runtime, ServerlessAdapter } from "../../src/adapters/interfaces";
import { HttpApi } from "../../src/decorators/http-api";
import { Injectable } from "../../src/decorators/injectable";
import { ConfigurationError, DependencyValidationError } from "../../src/errors/nimbus-error";
import { TestingApplication, mockRequest } from "../../src/testing/test-app";
import { MapTable } from "../fixtures/memory-table";
import { createRecordingLogger } from "../fixtures/logger";
import * as orders from "../fixtures/orders";

@Injectable()
class Clock {}

@HttpApi("GET", "/time")
class GetTime implements HttpFunction<object, string> {
  constructor(private readonly clock: Clock) {}

  async handle(): Promise<string> {
    return String(this.clock);
  }
}

@HttpApi("GET", "/orders/{orderId}")
class ShadowGetOrder implements HttpFunction<object, string> {
  async handle(): Promise<string> {
    return "shadow";
  }
}

function mapTableFactory(registration: { partitionKey: string }): Table<object> {
  return new MapTable<object>((entity) => String(Reflect.get(entity, registration.partitionKey)));
}

describe("ApplicationBuilder", () => {
  let savedRuntimeApi: string | undefined;

  beforeEach(() => {
    savedRuntimeApi = process.env.AWS_LAMBDA_RUNTIME_API;
    delete process.env.AWS_LAMBDA_RUNTIME_API;
  });

  afterEach(() => {
    if (savedRuntimeApi !== undefined) process.env.AWS_LAMBDA_RUNTIME_API = savedRuntimeApi;
  });

  it("builds a frozen context from scanned modules", () => {
    // Arrange
    const logger = createRecordingLogger();
    const builder = NimbusApplication.createBuilder([]).useLogger(logger);
    builder.addFunctions().fromModule(orders);
    builder.addTables().fromModule(orders);

    // Act
    const app = builder.build();

    // Assert
    const { context } = app;
    expect(context.mode).toBe("local");
    expect(context.command).toBe("none");
    expect(context.functions.map((fn) => fn.name)).toEqual(["CreateOrder", "GetOrder"]);
    expect(context.tables.map((t) => t.tableName)).toEqual(["Orders", "order_lines"]);
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.functions)).toBe(true);
    expect(logger.records[0]).toEqual({
      level: "info",
      message: "Application built",
      attributes: { mode: "local", command: "none", functions: 2, tables: 2 },
      name: undefined,
    });
  });

  it("applies scan filters and explicit option overrides", () => {
    const builder = NimbusApplication.createBuilder([]).useLogger(createRecordingLogger());
    builder
      .addFunctions()
      .fromModule(orders)
      .withFilter((type) => type !== orders.GetOrder);
    builder.addFunction(orders.CreateOrder, { timeoutSeconds: 5 });
    builder.addTable(orders.Order, { tableName: "prod_orders", billingMode: "PROVISIONED" });

    const { context } = builder.build();

    expect(context.functions).toHaveLength(1);
    expect(context.functions[0]?.options).toEqual({ memoryMb: 512, timeoutSeconds: 5 });
    expect(context.tables[0]?.options).toEqual({ tableName: "prod_orders", billingMode: "PROVISIONED" });
  });

  it("applies adjusted defaults", () => {
    const { context } = NimbusApplication.createBuilder([])
      .useLogger(createRecordingLogger())
      .configureDefaults((defaults) => {
        defaults.lambda.memoryMb = 1024;
        defaults.dynamoDb.billingMode = "PROVISIONED";
      })
      .addFunction(orders.GetOrder)
      .addTable(orders.Order)
      .build();

    expect(context.functions[0]?.options.memoryMb).toBe(1024);
    expect(context.tables[0]?.options.billingMode).toBe("PROVISIONED");
    expect(context.defaults.lambda.memoryMb).toBe(1024);
    expect(Object.isFrozen(context.defaults.lambda)).toBe(true);
  });

  it("fails when two functions claim the same route", () => {
    const builder = NimbusApplication.createBuilder([])
      .useLogger(createRecordingLogger())
      .addFunction(orders.GetOrder)
      .addFunction(ShadowGetOrder);

    expect(() => builder.build()).toThrow(
      new ConfigurationError("GET /orders/{orderId} is claimed by both GetOrder and ShadowGetOrder"),
    );
  });

  it("validates dependencies at build time", () => {
    const builder = NimbusApplication.createBuilder([]).useLogger(createRecordingLogger()).addFunction(GetTime);

    expect(() => builder.build()).toThrow(DependencyValidationError);

    builder.services.addClass(Clock);
    expect(() => builder.build()).not.toThrow();
  });

  it("skips dependency validation for the list command", () => {
    const builder = NimbusApplication.createBuilder(["list"]).useLogger(createRecordingLogger()).addFunction(GetTime);

    expect(builder.build().context.command).toBe("list");
  });

  it("detects deploy commands from the arguments", () => {
    const { context } = NimbusApplication.createBuilder(["synth"]).useLogger(createRecordingLogger()).build();

    expect(context.mode).toBe("deploy");
    expect(context.command).toBe("synth");
  });
});

describe("NimbusApplication", () => {
  beforeEach(() => {
    delete process.env.AWS_LAMBDA_RUNTIME_API;
  });

  it("prints resources for the list command", async () => {
    // Arrange
    const builder = NimbusApplication.createBuilder(["list"]).useLogger(createRecordingLogger());
    builder.addFunctions().fromModule(orders);
    builder.addTables().fromModule(orders);
    const output: string[] = [];

    // Act
    await builder.build().run({ write: (text) => output.push(text) });

    // Assert
    expect(output).toEqual([
      "Functions (2):\n" +
        "  POST    /orders -> CreateOrder\n" +
        "  GET     /orders/{id} -> GetOrder\n" +
        "Tables (2):\n" +
        "  Order -> Orders (partition key: id)\n" +
        "  OrderLine -> order_lines (partition key: orderId, sort key: lineNo)\n",
    ]);
  });

  it("runs the runtime registered for the mode", async () => {
    const local: Runtime = { mode: "local", run: vi.fn(async () => undefined) };
    const deploy: Runtime = { mode: "deploy", run: vi.fn(async () => undefined) };
    const app = NimbusApplication.createBuilder([])
      .useLogger(createRecordingLogger())
      .useRuntime(deploy)
      .useRuntime(local)
      .build();

    await app.run();

    expect(local.run).toHaveBeenCalledWith(app.context);
    expect(deploy.run).not.toHaveBeenCalled();
  });

  it("fails when no runtime is registered for the mode", async () => {
    const app = NimbusApplication.createBuilder(["deploy"]).useLogger(createRecordingLogger()).build();

    await expect(app.run()).rejects.toThrow(
      "No runtime registered for deploy mode. Register one with builder.useRuntime().",
    );
  });

  it("builds a serverless handler through the adapter", () => {
    const handler = vi.fn();
    const adapter: ServerlessAdapter<typeof handler> = {
      createHandler: vi.fn((_context: ApplicationContext) => handler),
    };
    const app = NimbusApplication.createBuilder([]).useLogger(createRecordingLogger()).build();

    expect(app.lambdaHandler(adapter)).toBe(handler);
    expect(adapter.createHandler).toHaveBeenCalledWith(app.context);
  });

  it("describes its resources", () => {
    const app = NimbusApplication.createBuilder([])
      .useLogger(createRecordingLogger())
      .addFunction(orders.CreateOrder)
      .addTable(orders.OrderLine)
      .addTable(orders.Order)
      .build();

    expect(app.describe()).toEqual({
      functions: [
        {
          name: "CreateOrder",
          method: "POST",
          route: "/orders",
          requestType: "CreateOrderRequest",
          responseType: "Order",
          memoryMb: 512,
          timeoutSeconds: 30,
          dependencies: ["Table<Order>", "nimbus:logger"],
        },
      ],
      tables: [
        {
          name: "OrderLine",
          tableName: "order_lines",
          partitionKey: "orderId",
          sortKey: "lineNo",
          billingMode: "PAY_PER_REQUEST",
        },
        {
          name: "Order",
          tableName: "Orders",
          partitionKey: "id",
          sortKey: null,
          billingMode: "PAY_PER_REQUEST",
        },
      ],
    });
  });
});

describe("TestingApplication", () => {
  beforeEach(() => {
    delete process.env.AWS_LAMBDA_RUNTIME_API;
  });

  it("routes requests by method and path", async () => {
    // Arrange
    const builder = NimbusApplication.createBuilder([]).useLogger(createRecordingLogger());
    builder.addFunctions().fromModule(orders);
    builder.addTables().fromModule(orders);
    const testing = new TestingApplication(builder.build(), mapTableFactory);

    // Act
    const created = await testing.inject(
      mockRequest("POST", "/orders", { body: { name: "Bob", total: 10 } }),
    );
    const found = await testing.inject(mockRequest("GET", "/orders/order-bob"));
    const missing = await testing.inject(mockRequest("GET", "/orders/nope"));

    // Assert
    expect(created.status).toBe(200);
    expect(found.body).toBe('{"id":"order-bob","name":"Bob","total":10}');
    expect(missing).toEqual({
      status: 404,
      headers: { "content-type": "application/json" },
      body: '{"error":"Order nope not found"}',
    });
    await testing.close();
  });

  it("throws for a path no function serves", async () => {
    const testing = new TestingApplication(
      NimbusApplication.createBuilder([]).useLogger(createRecordingLogger()).build(),
      mapTableFactory,
    );

    await expect(testing.inject(mockRequest("GET", "/nowhere"))).rejects.toThrow(
      "No function found for GET /nowhere",
    );
  });
});
