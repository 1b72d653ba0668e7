import "reflect-metadata";
import { describe, it, expect, beforeEach, vi } from "vitest";
import { Container } from "../../src/di/container";
import { Injectable, Inject } from "../../src/decorators/injectable";
import { ConfigurationError } from "../../src/errors/nimbus-error";

// ---------------------------------------------------------------------------
// Test services
// ---------------------------------------------------------------------------

@Injectable()
class Clock {
  now() {
    return 1;
  }
}

@Injectable()
class IdGenerator {
  next() {
    return "id-1";
  }
}

@Injectable()
class OrderNumbers {
  constructor(
    public clock: Clock,
    public ids: IdGenerator,
  ) {}
}

const IDS_TOKEN = Symbol("IDS_TOKEN");

@Injectable()
class InvoiceNumbers {
  constructor(
    public clock: Clock,
    @Inject(IDS_TOKEN) public ids: IdGenerator,
  ) {}
}

class Undecorated {
  constructor(public clock: Clock) {}
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Container", () => {
  let container: Container;

  beforeEach(() => {
    container = new Container();
  });

  describe("registerValue", () => {
    it("should register and resolve a value", async () => {
      // Arrange
      const token = Symbol("config");
      const config = { port: 3000 };

      // Act
      container.registerValue(token, config);
      const resolved = await container.resolve(token);

      // Assert
      expect(resolved).toBe(config);
    });

    it("should resolve a string-token value", async () => {
      container.registerValue("API_KEY", "test-secret");

      expect(await container.resolve<string>("API_KEY")).toBe("test-secret");
    });
  });

  describe("register", () => {
    it("should resolve a value provider", async () => {
      const token = Symbol("val");
      container.register(token, { useValue: 42 });

      expect(await container.resolve<number>(token)).toBe(42);
    });

    it("should resolve a class provider once and cache the instance", async () => {
      // Arrange
      container.register(Clock, { useClass: Clock });

      // Act
      const first = await container.resolve<Clock>(Clock);
      const second = await container.resolve<Clock>(Clock);

      // Assert
      expect(first).toBeInstanceOf(Clock);
      expect(second).toBe(first);
    });

    it("should inject dependencies into an async factory provider", async () => {
      // Arrange
      container.register(Clock, { useClass: Clock });
      const token = Symbol("withDeps");
      container.register(token, {
        useFactory: async (clock: Clock) => ({ clock }),
        inject: [Clock],
      });

      // Act
      const result = await container.resolve<{ clock: Clock }>(token);

      // Assert
      expect(result.clock).toBeInstanceOf(Clock);
    });

    it("should report has() for registered tokens only", () => {
      container.register("a", { useValue: 1 });
      container.registerValue("b", 2);

      expect(container.has("a")).toBe(true);
      expect(container.has("b")).toBe(true);
      expect(container.has("c")).toBe(false);
    });
  });

  describe("constructor injection", () => {
    it("should auto-resolve constructor dependencies via design:paramtypes", async () => {
      const numbers = await container.resolve<OrderNumbers>(OrderNumbers);

      expect(numbers.clock).toBeInstanceOf(Clock);
      expect(numbers.ids).toBeInstanceOf(IdGenerator);
    });

    it("should use @Inject token overrides during resolution", async () => {
      // Arrange
      const custom = new IdGenerator();
      container.registerValue(IDS_TOKEN, custom);

      // Act
      const numbers = await container.resolve<InvoiceNumbers>(InvoiceNumbers);

      // Assert
      expect(numbers.ids).toBe(custom);
    });

    it("should refuse to construct an undecorated class with parameters", async () => {
      await expect(container.resolve(Undecorated)).rejects.toThrow(
        "Class Undecorated has constructor parameters but is not decorated with @Injectable()",
      );
    });

    it("should fail for an unregistered non-class token", async () => {
      await expect(container.resolve("missing")).rejects.toBeInstanceOf(ConfigurationError);
      await expect(container.resolve("missing")).rejects.toThrow(
        "No provider registered for missing",
      );
    });

    it("should detect circular factory dependencies", async () => {
      container.register("a", { useFactory: (b: unknown) => ({ b }), inject: ["b"] });
      container.register("b", { useFactory: (a: unknown) => ({ a }), inject: ["a"] });

      await expect(container.resolve("a")).rejects.toThrow("Circular dependency detected: a → b → a");
    });

    it("should share one construction between concurrent first resolutions", async () => {
      // Arrange
      const factory = vi.fn(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return { id: "shared" };
      });
      container.register("slow", { useFactory: factory });

      // Act
      const [first, second] = await Promise.all([
        container.resolve("slow"),
        container.resolve("slow"),
      ]);

      // Assert
      expect(factory).toHaveBeenCalledTimes(1);
      expect(first).toBe(second);
    });

    it("should resolve a dependency shared by two concurrent chains", async () => {
      container.register("config", {
        useFactory: async () => {
          await new Promise((resolve) => setTimeout(resolve, 5));
          return { region: "local" };
        },
      });
      container.register("left", { useFactory: (config: unknown) => ({ config }), inject: ["config"] });
      container.register("right", { useFactory: (config: unknown) => ({ config }), inject: ["config"] });

      const [left, right] = await Promise.all([
        container.resolve<{ config: unknown }>("left"),
        container.resolve<{ config: unknown }>("right"),
      ]);

      expect(left.config).toBe(right.config);
    });
  });

  describe("closeAll", () => {
    it("should close tracked services in reverse registration order", async () => {
      // Arrange
      const order: string[] = [];
      container.registerValue("first", { close: () => order.push("first") });
      container.registerValue("second", { end: async () => order.push("second") });

      // Act
      await container.closeAll();

      // Assert
      expect(order).toEqual(["second", "first"]);
    });

    it("should use a provider's onClose hook", async () => {
      const onClose = vi.fn();
      container.register("conn", { useFactory: () => ({ id: 1 }), onClose });
      await container.resolve("conn");

      await container.closeAll();

      expect(onClose).toHaveBeenCalledWith({ id: 1 });
    });

    it("should keep closing after a failure", async () => {
      const closed = vi.fn();
      container.registerValue("ok", { close: closed });
      container.registerValue("broken", {
        close: () => {
          throw new Error("boom");
        },
      });

      await expect(container.closeAll()).resolves.toBeUndefined();
      expect(closed).toHaveBeenCalledTimes(1);
    });
  });
});
