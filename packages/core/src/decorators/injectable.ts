import "reflect-metadata";
import type { InjectionToken, Type } from "@nimbus-fn/types";
import { INJECTABLE_METADATA, INJECT_METADATA } from "../metadata/constants";
import { LOGGER, tableToken } from "../di/tokens";

export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA, true, target);
  };
}

export function Inject(token: InjectionToken): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: Map<number, InjectionToken> =
      Reflect.getOwnMetadata(INJECT_METADATA, target) ?? new Map();
    existing.set(parameterIndex, token);
    Reflect.defineMetadata(INJECT_METADATA, existing, target);
  };
}

/** Injects the `Table<T>` handle for an entity. */
export function InjectTable(entity: Type<object>): ParameterDecorator {
  return Inject(tableToken(entity));
}

/** Injects the logger, scoped to the function and the current request. */
export function InjectLogger(): ParameterDecorator {
  return Inject(LOGGER);
}
