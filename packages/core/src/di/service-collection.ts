import type { InjectionToken, Provider, ServiceDescriptor, Type } from "@nimbus-fn/types";

/**
 * Services registered by the application before it is built. Functions may
 * depend on any token registered here, besides tables and the logger.
 */
export class ServiceCollection {
  private readonly providers = new Map<InjectionToken, ServiceDescriptor>();

  add<T>(token: InjectionToken, provider: Provider<T>): this {
    // Provider<T> is invariant in T through onClose.
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    const descriptor: ServiceDescriptor<any> = { ...provider, provide: token };
    this.providers.set(token, descriptor);
    return this;
  }

  addValue<T>(token: InjectionToken, value: T): this {
    return this.add(token, { useValue: value });
  }

  addClass<T>(type: Type<T>, token: InjectionToken = type): this {
    return this.add(token, { useClass: type });
  }

  has(token: InjectionToken): boolean {
    return this.providers.has(token);
  }

  get size(): number {
    return this.providers.size;
  }

  toArray(): ServiceDescriptor[] {
    return [...this.providers.values()];
  }
}
