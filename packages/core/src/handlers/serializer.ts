import type { HttpResponse } from "@nimbus-fn/types";
import { toCamelCase } from "@nimbus-fn/common";

const JSON_HEADERS = { "content-type": "application/json" } as const;

function camelCaseKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value;
  const out: Record<string, unknown> = {};
  const sources = new Map<string, string>();
  for (const [key, nested] of Object.entries(value)) {
    const name = toCamelCase(key);
    const previous = sources.get(name);
    if (previous !== undefined) {
      throw new TypeError(`Properties '${previous}' and '${key}' both serialize as '${name}'`);
    }
    sources.set(name, key);
    out[name] = nested;
  }
  return out;
}

/**
 * JSON with every object key camel-cased. Two keys of one object that
 * camel-case to the same name are an error.
 */
export function serializeJson(value: unknown): string {
  return JSON.stringify(value, camelCaseKeys);
}

/** 200 with the JSON result, or 204 with no body for `undefined` and `null`. */
export function serializeResult(result: unknown): HttpResponse {
  if (result === undefined || result === null) {
    return { status: 204 };
  }
  return { status: 200, headers: { ...JSON_HEADERS }, body: serializeJson(result) };
}

export function errorResponse(status: number, message: string): HttpResponse {
  return { status, headers: { ...JSON_HEADERS }, body: JSON.stringify({ error: message }) };
}
