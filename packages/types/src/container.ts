import type { InjectionToken, Provider } from "./common";

/**
 * The per-runtime container functions are activated from. One instance lives
 * as long as the server or Lambda environment; `closeAll` releases tables and
 * services when it shuts down.
 */
export interface ServiceContainer {
  resolve<T>(token: InjectionToken): Promise<T>;
  register<T>(token: InjectionToken, provider: Provider<T>): void;
  has(token: InjectionToken): boolean;
  closeAll(): Promise<void>;
}
