import type { HttpMethod, HttpRequest, Type } from "@nimbus-fn/types";
import { getFields, type FieldMetadata, type ScalarFieldType } from "../decorators/field";
import { RequestBindingException } from "../errors/http-exception";

const QUERY_BOUND_METHODS: ReadonlySet<HttpMethod> = new Set(["GET", "DELETE", "HEAD", "OPTIONS"]);

/** Methods whose request is bound from route captures and the query string rather than a body. */
export function isQueryBoundMethod(method: HttpMethod): boolean {
  return QUERY_BOUND_METHODS.has(method);
}

/**
 * Route captures and query parameters as one map keyed by lower-cased name.
 * Route captures win over query parameters; a repeated query key keeps its
 * first value.
 */
export function buildValueMap(
  pathParams: Readonly<Record<string, string>>,
  query: Readonly<Record<string, string | string[]>>,
): Map<string, string> {
  const values = new Map<string, string>();

  for (const [key, raw] of Object.entries(query)) {
    const value = Array.isArray(raw) ? raw[0] : raw;
    const lower = key.toLowerCase();
    if (value !== undefined && !values.has(lower)) values.set(lower, value);
  }

  for (const [key, value] of Object.entries(pathParams)) {
    values.set(key.toLowerCase(), value);
  }

  return values;
}

function bindingError(field: string, message: string): RequestBindingException {
  return new RequestBindingException(`Field '${field}': ${message}`, field);
}

function coerceString(type: ScalarFieldType, field: string, value: string): unknown {
  switch (type) {
    case "number": {
      const parsed = value.trim() === "" ? Number.NaN : Number(value);
      if (!Number.isFinite(parsed)) throw bindingError(field, `'${value}' is not a valid number`);
      return parsed;
    }
    case "integer": {
      const parsed = /^[+-]?\d+$/.test(value.trim()) ? Number(value) : Number.NaN;
      if (!Number.isSafeInteger(parsed)) throw bindingError(field, `'${value}' is not a valid integer`);
      return parsed;
    }
    case "boolean": {
      const lower = value.trim().toLowerCase();
      if (lower !== "true" && lower !== "false") {
        throw bindingError(field, `'${value}' is not a valid boolean`);
      }
      return lower === "true";
    }
    case "date":
      return parseDate(field, value);
    case "string":
    case "json":
      return value;
  }
}

function parseDate(field: string, value: string): Date {
  const date = new Date(value);
  if (value.trim() === "" || Number.isNaN(date.getTime())) {
    throw bindingError(field, `'${value}' is not a valid date`);
  }
  return date;
}

function describeJson(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function coerceJsonScalar(type: ScalarFieldType, field: string, value: unknown): unknown {
  switch (type) {
    case "string":
      if (typeof value === "string") return value;
      break;
    case "number":
      if (typeof value === "number" && Number.isFinite(value)) return value;
      break;
    case "integer":
      if (typeof value === "number" && Number.isSafeInteger(value)) return value;
      break;
    case "boolean":
      if (typeof value === "boolean") return value;
      break;
    case "date":
      if (typeof value === "string") return parseDate(field, value);
      break;
    case "json":
      return value;
  }
  throw bindingError(field, `expected ${type} but got ${describeJson(value)}`);
}

function coerceJson(field: FieldMetadata, path: string, value: unknown): unknown {
  if (typeof field.type === "function") {
    if (!isJsonObject(value)) {
      throw bindingError(path, `expected object but got ${describeJson(value)}`);
    }
    return bindObject(field.type, value, `${path}.`);
  }
  return coerceJsonScalar(field.type, path, value);
}

/** Exact-name match first, then case-insensitive. */
function lookup(source: Record<string, unknown>, name: string): unknown {
  if (Object.hasOwn(source, name)) return source[name];
  const lower = name.toLowerCase();
  const key = Object.keys(source).find((candidate) => candidate.toLowerCase() === lower);
  return key === undefined ? undefined : source[key];
}

function bindObject<T extends object>(type: Type<T>, source: Record<string, unknown>, prefix: string): T {
  const instance = new type();

  for (const field of getFields(type)) {
    const path = `${prefix}${field.wireName}`;
    const value = lookup(source, field.wireName);

    if (value === undefined || value === null) {
      if (field.required) throw bindingError(path, "is required");
      continue;
    }

    if (field.array) {
      if (!Array.isArray(value)) {
        throw bindingError(path, `expected array but got ${describeJson(value)}`);
      }
      const items: unknown[] = value;
      Reflect.set(
        instance,
        field.property,
        items.map((item, index) => coerceJson(field, `${path}[${index}]`, item)),
      );
    } else {
      Reflect.set(instance, field.property, coerceJson(field, path, value));
    }
  }

  return instance;
}

function bindFromValues<T extends object>(type: Type<T>, values: Map<string, string>): T {
  const instance = new type();

  for (const field of getFields(type)) {
    const value = values.get(field.wireName.toLowerCase());
    if (value === undefined) {
      if (field.required) throw bindingError(field.wireName, "is required");
      continue;
    }
    if (typeof field.type === "function" || field.array) {
      throw bindingError(field.wireName, "cannot be bound from the route or query string");
    }
    Reflect.set(instance, field.property, coerceString(field.type, field.wireName, value));
  }

  return instance;
}

function parseBody(text: string | null): Record<string, unknown> | null {
  if (text === null || text.trim() === "") return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new RequestBindingException(`Malformed JSON body: ${detail}`);
  }

  if (!isJsonObject(parsed)) {
    throw new RequestBindingException(
      `Request body must be a JSON object, got ${describeJson(parsed)}`,
    );
  }
  return parsed;
}

/**
 * Binds a request to an instance of `type`.
 *
 * GET, DELETE, HEAD and OPTIONS requests bind from route captures and the
 * query string, coercing each string to the field's type. Other methods bind
 * from the JSON body, whose values must already have the field's JSON type;
 * an empty body gives a default-constructed instance. Without a request
 * shape the result is an empty object.
 */
export function bindRequest(type: Type<object> | undefined, request: HttpRequest): object {
  if (!type) return {};

  if (isQueryBoundMethod(request.method)) {
    return bindFromValues(type, buildValueMap(request.pathParams, request.query));
  }

  const body = parseBody(request.textBody);
  return body === null ? new type() : bindObject(type, body, "");
}
