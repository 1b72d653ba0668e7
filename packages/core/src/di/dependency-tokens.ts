import "reflect-metadata";
import type { Type, InjectionToken } from "@nimbus-fn/types";
import { INJECT_METADATA } from "../metadata/constants";
import { getConstructorParameterNames } from "./parameter-names";

function isClassType(value: unknown): value is Type {
  return typeof value === "function" && value !== Object;
}

export type ConstructorDependency = {
  index: number;
  name: string;
  /** `undefined` when neither metadata nor an injection decorator identifies the type. */
  token: InjectionToken | undefined;
};

/**
 * Enumerates a class's constructor parameters with the token each one resolves to.
 * `@Inject()` overrides win over `design:paramtypes`; interface and `Object`
 * parameter types carry no usable token.
 *
 * Pure function, reads metadata only.
 */
export function getConstructorDependencies(target: Type): ConstructorDependency[] {
  const paramTypes: unknown[] = Reflect.getMetadata("design:paramtypes", target) ?? [];
  const injectOverrides: Map<number, InjectionToken> =
    Reflect.getMetadata(INJECT_METADATA, target) ?? new Map();
  const names = getConstructorParameterNames(target);

  const count = Math.max(
    paramTypes.length,
    names.length,
    ...[...injectOverrides.keys()].map((index) => index + 1),
  );

  const dependencies: ConstructorDependency[] = [];
  for (let index = 0; index < count; index++) {
    const paramType = paramTypes[index];
    const token = injectOverrides.get(index) ?? (isClassType(paramType) ? paramType : undefined);
    dependencies.push({ index, name: names[index] ?? `arg${index}`, token });
  }
  return dependencies;
}
