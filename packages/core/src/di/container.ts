import "reflect-metadata";
import createDebug from "debug";
import type {
  Type,
  InjectionToken,
  Provider,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  ServiceContainer,
  CloseHook,
} from "@nimbus-fn/types";
import { INJECTABLE_METADATA } from "../metadata/constants";
import { ConfigurationError } from "../errors/nimbus-error";
import { getConstructorDependencies } from "./dependency-tokens";
import { tokenToString } from "./tokens";

const debug = createDebug("nimbus:core:di");

type CloseEntry = {
  token: InjectionToken;
  close: () => Promise<void> | void;
};

const CLOSE_METHODS = ["close", "end", "quit", "disconnect", "destroy"] as const;

function isClassProvider<T>(p: Provider<T>): p is ClassProvider<T> {
  return "useClass" in p;
}

function isFactoryProvider<T>(p: Provider<T>): p is FactoryProvider<T> {
  return "useFactory" in p;
}

function isValueProvider<T>(p: Provider<T>): p is ValueProvider<T> {
  return "useValue" in p;
}

function detectCloseMethod(value: unknown): (() => Promise<void> | void) | null {
  if (typeof value !== "object" || value === null) return null;

  for (const method of CLOSE_METHODS) {
    const fn: unknown = Reflect.get(value, method);
    if (typeof fn === "function") {
      return () => Reflect.apply(fn, value, []);
    }
  }

  return null;
}

// Providers of every type share one map.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyProvider = Provider<any>;

/**
 * Singleton service container. Services are constructed once on first
 * resolution; functions are not registered here but constructed per request
 * from these services.
 */
export class Container implements ServiceContainer {
  private providers = new Map<InjectionToken, AnyProvider>();
  private instances = new Map<InjectionToken, unknown>();
  private pending = new Map<InjectionToken, Promise<unknown>>();
  private closeStack: CloseEntry[] = [];
  private trackedTokens = new Set<InjectionToken>();

  register<T>(token: InjectionToken, provider: Provider<T>): void {
    const type = isClassProvider(provider)
      ? "class"
      : isFactoryProvider(provider)
        ? "factory"
        : "value";
    debug("register %s (%s)", tokenToString(token), type);
    this.providers.set(token, provider);

    if (isValueProvider(provider)) {
      this.trackCloseable(token, provider.useValue, provider.onClose);
    }
  }

  registerValue<T>(token: InjectionToken, value: T): void {
    debug("registerValue %s", tokenToString(token));
    this.instances.set(token, value);
    this.trackCloseable(token, value);
  }

  resolve<T>(token: InjectionToken): Promise<T> {
    return this.resolveInChain<T>(token, []);
  }

  /**
   * `chain` holds the tokens whose construction led here. A token already in
   * it is a cycle; a token being constructed for another caller is awaited.
   */
  private async resolveInChain<T>(token: InjectionToken, chain: readonly InjectionToken[]): Promise<T> {
    const name = tokenToString(token);
    if (this.instances.has(token)) {
      debug("resolve %s → cached", name);
      return this.instances.get(token) as T;
    }

    if (chain.includes(token)) {
      const path = [...chain, token].map(tokenToString).join(" → ");
      throw new ConfigurationError(`Circular dependency detected: ${path}`);
    }

    const inFlight = this.pending.get(token);
    if (inFlight) {
      debug("resolve %s → pending", name);
      return (await inFlight) as T;
    }

    debug("resolve %s → constructing", name);
    const creation = this.create<T>(token, [...chain, token]);
    this.pending.set(token, creation);
    try {
      return await creation;
    } finally {
      this.pending.delete(token);
    }
  }

  private async create<T>(token: InjectionToken, chain: readonly InjectionToken[]): Promise<T> {
    const provider = this.providers.get(token);
    if (!provider) {
      if (typeof token === "function") {
        return this.constructClass(token as Type<T>, chain);
      }
      throw new ConfigurationError(
        `No provider registered for ${tokenToString(token)}. Register it on builder.services.`,
      );
    }

    const instance = await this.createFromProvider<T>(provider, chain);
    this.instances.set(token, instance);

    if (!isValueProvider(provider)) {
      this.trackCloseable(token, instance, provider.onClose);
    }

    return instance;
  }

  has(token: InjectionToken): boolean {
    return this.instances.has(token) || this.providers.has(token);
  }

  async closeAll(): Promise<void> {
    debug("closeAll: %d resources", this.closeStack.length);
    const entries = [...this.closeStack].reverse();
    for (const entry of entries) {
      try {
        debug("closing %s", tokenToString(entry.token));
        await entry.close();
      } catch (error) {
        // keep closing the rest
        debug("closing %s failed: %O", tokenToString(entry.token), error);
      }
    }
    this.closeStack = [];
    this.trackedTokens.clear();
  }

  private async resolveDependencies(target: Type, chain: readonly InjectionToken[]): Promise<unknown[]> {
    const deps: unknown[] = [];
    for (const dep of getConstructorDependencies(target)) {
      if (dep.token === undefined) {
        throw new ConfigurationError(
          `Cannot determine the type of parameter '${dep.name}' of ${target.name}. ` +
            "Add an @Inject() decorator naming its token.",
        );
      }
      deps.push(await this.resolveInChain(dep.token, chain));
    }
    return deps;
  }

  private async constructClass<T>(target: Type<T>, chain: readonly InjectionToken[]): Promise<T> {
    const isInjectable = Reflect.getOwnMetadata(INJECTABLE_METADATA, target) === true;
    if (!isInjectable && target.length > 0) {
      throw new ConfigurationError(
        `Class ${target.name} has constructor parameters but is not decorated with @Injectable(). ` +
          "Add @Injectable() to enable dependency injection, or use a factory provider.",
      );
    }

    const deps = await this.resolveDependencies(target, chain);
    debug("construct %s with %d dependencies", target.name, deps.length);

    const instance = new target(...deps);
    this.instances.set(target, instance);
    this.trackCloseable(target, instance);
    return instance;
  }

  private trackCloseable<T>(
    token: InjectionToken,
    value: T,
    onClose?: CloseHook<T>,
  ): void {
    if (this.trackedTokens.has(token)) return;

    if (onClose) {
      this.closeStack.push({ token, close: () => onClose(value) });
      this.trackedTokens.add(token);
      return;
    }

    const closeFn = detectCloseMethod(value);
    if (closeFn) {
      this.closeStack.push({ token, close: closeFn });
      this.trackedTokens.add(token);
    }
  }

  private async createFromProvider<T>(provider: AnyProvider, chain: readonly InjectionToken[]): Promise<T> {
    if (isValueProvider(provider)) {
      return provider.useValue;
    }

    if (isClassProvider(provider)) {
      return this.constructClass(provider.useClass, chain);
    }

    const deps = provider.inject
      ? await Promise.all(provider.inject.map((t) => this.resolveInChain(t, chain)))
      : [];
    return provider.useFactory(...deps);
  }
}
