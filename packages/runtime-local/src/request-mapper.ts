import { randomUUID } from "node:crypto";
import type { Request } from "express";
import type { HttpMethod, HttpRequest } from "@nimbus-fn/types";

function parseQuery(query: Request["query"]): Record<string, string | string[]> {
  const parsed: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === "string") {
      parsed[key] = value;
    } else if (Array.isArray(value)) {
      parsed[key] = value.filter((item): item is string => typeof item === "string");
    }
  }
  return parsed;
}

function parseHeaders(req: Request): Record<string, string | string[]> {
  const headers: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    if (value !== undefined) headers[key] = value;
  }
  return headers;
}

function parseBody(req: Request): string | null {
  const body: unknown = req.body;
  return typeof body === "string" && body.length > 0 ? body : null;
}

/** Maps an Express request, with its body read as text, to the transport-neutral shape. */
export function mapExpressRequest(req: Request, method: HttpMethod): HttpRequest {
  return {
    method,
    path: req.path,
    pathParams: { ...req.params },
    query: parseQuery(req.query),
    headers: parseHeaders(req),
    textBody: parseBody(req),
    contentType: req.get("content-type") ?? null,
    requestId: req.get("x-request-id") ?? randomUUID(),
    requestTime: new Date().toISOString(),
    clientIp: req.ip ?? null,
  };
}
