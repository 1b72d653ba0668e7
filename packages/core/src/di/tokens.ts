import type { InjectionToken, Type } from "@nimbus-fn/types";

/** Token for the `NimbusLogger`, always available to functions and services. */
export const LOGGER = Symbol.for("nimbus:logger");

const tokensByEntity = new WeakMap<Type<object>, symbol>();
const entitiesByToken = new Map<symbol, Type<object>>();

/** Token under which the `Table<T>` handle for `entity` is registered. */
export function tableToken(entity: Type<object>): symbol {
  let token = tokensByEntity.get(entity);
  if (!token) {
    token = Symbol(`Table<${entity.name}>`);
    tokensByEntity.set(entity, token);
    entitiesByToken.set(token, entity);
  }
  return token;
}

/** The entity a table token stands for, or `undefined` for any other token. */
export function entityOfTableToken(token: InjectionToken): Type<object> | undefined {
  return typeof token === "symbol" ? entitiesByToken.get(token) : undefined;
}

export function tokenToString(token: InjectionToken): string {
  if (typeof token === "function") return token.name;
  if (typeof token === "symbol") return token.description ?? token.toString();
  return token;
}
