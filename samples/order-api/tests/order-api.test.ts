import request from "supertest";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { TestingApplication, mockRequest } from "@nimbus-fn/core";
import { createLocalServer, type LocalServer } from "@nimbus-fn/runtime-local";
import { inMemoryTables } from "@nimbus-fn/storage";
import { buildTestApp } from "./fixtures/app";

describe("order API", () => {
  describe("application", () => {
    it("discovers every function and table", async () => {
      // Arrange
      const output: string[] = [];
      const app = buildTestApp(["list"]);

      // Act
      await app.run({ write: (text) => output.push(text) });

      // Assert
      expect(output.join("")).toBe(
        "Functions (4):\n" +
          "  DELETE  /orders/{id} -> CancelOrder\n" +
          "  POST    /orders -> CreateOrder\n" +
          "  GET     /orders/{id} -> GetOrder\n" +
          "  GET     /orders -> ListOrders\n" +
          "Tables (1):\n" +
          "  Order -> Orders (partition key: id)\n",
      );
    });

    it("applies the configured defaults and the per-function override", () => {
      const { functions } = buildTestApp().context;

      expect(functions.map((fn) => [fn.name, fn.options])).toEqual([
        ["CancelOrder", { memoryMb: 256, timeoutSeconds: 10 }],
        ["CreateOrder", { memoryMb: 512, timeoutSeconds: 10 }],
        ["GetOrder", { memoryMb: 256, timeoutSeconds: 10 }],
        ["ListOrders", { memoryMb: 256, timeoutSeconds: 10 }],
      ]);
    });
  });

  describe("in process", () => {
    let testing: TestingApplication;

    beforeEach(() => {
      testing = new TestingApplication(buildTestApp(), inMemoryTables());
    });

    afterEach(async () => {
      await testing.close();
    });

    it("creates an order and reads it back", async () => {
      // Act
      const created = await testing.inject(
        mockRequest("POST", "/orders", { body: { customer: "alice", total: 42.5 } }),
      );
      const fetched = await testing.inject(mockRequest("GET", "/orders/ord_1"));

      // Assert
      expect(created.status).toBe(200);
      expect(fetched.status).toBe(200);
      expect(JSON.parse(fetched.body ?? "")).toMatchObject({
        id: "ord_1",
        customer: "alice",
        total: 42.5,
        status: "open",
      });
    });

    it("serves concurrent first requests that share a service", async () => {
      // Act
      const responses = await Promise.all([
        testing.inject(mockRequest("POST", "/orders", { body: { customer: "alice", total: 1 } })),
        testing.inject(mockRequest("POST", "/orders", { body: { customer: "bob", total: 2 } })),
      ]);

      // Assert
      expect(responses.map((response) => response.status)).toEqual([200, 200]);
      expect(responses.map((response) => JSON.parse(response.body ?? "").id).sort()).toEqual([
        "ord_1",
        "ord_2",
      ]);
    });

    it("rejects a negative total", async () => {
      const response = await testing.inject(
        mockRequest("POST", "/orders", { body: { customer: "alice", total: -1 } }),
      );

      expect(response.status).toBe(400);
      expect(response.body).toBe('{"error":"total must not be negative"}');
    });
  });

  describe("over HTTP", () => {
    let server: LocalServer;

    beforeEach(() => {
      server = createLocalServer(buildTestApp().context, inMemoryTables());
    });

    afterEach(async () => {
      await server.container.closeAll();
    });

    it("lists a customer's orders", async () => {
      // Arrange
      await request(server.app).post("/orders").send({ customer: "alice", total: 10 }).expect(200);
      await request(server.app).post("/orders").send({ customer: "bob", total: 20 }).expect(200);
      await request(server.app).post("/orders").send({ customer: "alice", total: 30 }).expect(200);

      // Act
      const response = await request(server.app).get("/orders").query({ customer: "alice" });

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toEqual([
        expect.objectContaining({ id: "ord_1", total: 10 }),
        expect.objectContaining({ id: "ord_3", total: 30 }),
      ]);
    });

    it("cancels an order once", async () => {
      await request(server.app).post("/orders").send({ customer: "alice", total: 10 }).expect(200);

      await request(server.app).delete("/orders/ord_1").expect(204);
      const again = await request(server.app).delete("/orders/ord_1");
      const fetched = await request(server.app).get("/orders/ord_1");

      expect(again.status).toBe(409);
      expect(again.body).toEqual({ error: "Order ord_1 is already cancelled" });
      expect(fetched.body).toMatchObject({ status: "cancelled" });
    });

    it("answers 404 for an unknown order", async () => {
      const response = await request(server.app).get("/orders/ord_404");

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: "Order ord_404 not found" });
    });

    it("answers 400 when a required field is missing", async () => {
      const response = await request(server.app).post("/orders").send({ total: 5 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: "Field 'customer': is required" });
    });
  });
});
