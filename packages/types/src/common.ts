/**
 * A class constructor. Parameters stay `any[]` so that classes with typed
 * constructor parameters are assignable.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

/** What a dependency is registered and resolved under. Tables use symbol tokens. */
export type InjectionToken = string | symbol | Type;

/** Runs when the owning container is closed, in reverse creation order. */
export type CloseHook<T> = (value: T) => Promise<void> | void;

export type ClassProvider<T = unknown> = {
  useClass: Type<T>;
  onClose?: CloseHook<T>;
};

export type FactoryProvider<T = unknown> = {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory: (...args: any[]) => T | Promise<T>;
  /** Resolved in order and passed to `useFactory`. */
  inject?: InjectionToken[];
  onClose?: CloseHook<T>;
};

export type ValueProvider<T = unknown> = {
  useValue: T;
  onClose?: CloseHook<T>;
};

export type Provider<T = unknown> = ClassProvider<T> | FactoryProvider<T> | ValueProvider<T>;

/** A provider bound to the token it satisfies, as held in a service collection. */
export type ServiceDescriptor<T = unknown> = Provider<T> & { provide: InjectionToken };
