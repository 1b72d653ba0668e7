/**
 * Normalises a route template: leading slash, no duplicate or trailing slashes.
 * Templates use the `{param}` placeholder format (matching API Gateway).
 *
 * @example
 * normalizeRoute("orders//{id}/") => "/orders/{id}"
 * normalizeRoute("") => "/"
 */
export function normalizeRoute(route: string): string {
  return `/${route}`.replaceAll(/\/+/g, "/").replace(/\/$/, "") || "/";
}

/**
 * Joins a route prefix with a relative route.
 *
 * @example
 * joinRoute("/api/v1", "/users") => "/api/v1/users"
 * joinRoute("/", "/health") => "/health"
 */
export function joinRoute(prefix: string, route: string): string {
  return normalizeRoute(`${prefix}/${route}`);
}

/** A path segment that is not valid percent-encoding. */
export class MalformedPathError extends Error {
  constructor(
    readonly segment: string,
    options?: { cause?: unknown },
  ) {
    super(`Malformed percent-encoding in path segment '${segment}'`, options);
    this.name = "MalformedPathError";
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    throw new MalformedPathError(segment, { cause: error });
  }
}

const PLACEHOLDER = /^\{([A-Za-z_][A-Za-z0-9_]*)(\+)?\}$/;

/** Names of the placeholders in a route template, in order. */
export function routeParamNames(route: string): string[] {
  const names: string[] = [];
  for (const segment of normalizeRoute(route).split("/")) {
    const match = PLACEHOLDER.exec(segment);
    if (match?.[1]) names.push(match[1]);
  }
  return names;
}

/**
 * Matches a concrete path against a route template and returns the captured
 * placeholder values, or `null` when the path does not match.
 * A greedy `{name+}` placeholder must be the last segment and captures the rest of the path.
 * Throws `MalformedPathError` when a captured segment cannot be decoded.
 */
export function matchRoute(pattern: string, actual: string): Record<string, string> | null {
  const patternParts = normalizeRoute(pattern).split("/").filter(Boolean);
  const actualParts = normalizeRoute(actual).split("/").filter(Boolean);
  const captures: Record<string, string> = {};

  for (let i = 0; i < patternParts.length; i++) {
    const part = patternParts[i] ?? "";
    const match = PLACEHOLDER.exec(part);

    if (match?.[1] && match[2]) {
      if (i !== patternParts.length - 1 || actualParts.length <= i) return null;
      captures[match[1]] = actualParts.slice(i).map(decodeSegment).join("/");
      return captures;
    }

    const value = actualParts[i];
    if (value === undefined) return null;

    if (match?.[1]) {
      captures[match[1]] = decodeSegment(value);
    } else if (part !== value) {
      return null;
    }
  }

  return patternParts.length === actualParts.length ? captures : null;
}

/**
 * Converts a `{param}` route template into Express path syntax.
 *
 * @example
 * toExpressPath("/orders/{id}") => "/orders/:id"
 * toExpressPath("/files/{path+}") => "/files/:path(*)"
 */
export function toExpressPath(route: string): string {
  return normalizeRoute(route)
    .split("/")
    .map((segment) => {
      const match = PLACEHOLDER.exec(segment);
      if (!match?.[1]) return segment;
      return match[2] ? `:${match[1]}(*)` : `:${match[1]}`;
    })
    .join("/");
}
