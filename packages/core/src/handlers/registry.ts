import { matchRoute } from "@nimbus-fn/common";
import type { HttpMethod } from "@nimbus-fn/types";
import type { FunctionRegistration } from "../bootstrap/registrations";

export type MatchedFunction = {
  registration: FunctionRegistration;
  pathParams: Record<string, string>;
};

/** Lookup over the registered functions by name or by method and path. */
export class FunctionRegistry {
  private readonly byName: ReadonlyMap<string, FunctionRegistration>;

  constructor(private readonly functions: readonly FunctionRegistration[]) {
    this.byName = new Map(functions.map((fn) => [fn.name, fn]));
  }

  getByName(name: string): FunctionRegistration | undefined {
    return this.byName.get(name);
  }

  match(method: HttpMethod, path: string): MatchedFunction | undefined {
    for (const registration of this.functions) {
      if (registration.method !== method) continue;
      const pathParams = matchRoute(registration.route, path);
      if (pathParams) return { registration, pathParams };
    }
    return undefined;
  }

  getAll(): readonly FunctionRegistration[] {
    return this.functions;
  }

  names(): string[] {
    return [...this.byName.keys()];
  }
}
