import type { HttpMethod, HttpRequest, HttpResponse } from "@nimbus-fn/types";
import { BadRequestException } from "@nimbus-fn/core";
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";

const HTTP_METHODS: ReadonlySet<string> = new Set([
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
]);

function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.has(method);
}

function parseBody(event: APIGatewayProxyEventV2): string | null {
  if (!event.body) return null;
  if (event.isBase64Encoded) return Buffer.from(event.body, "base64").toString("utf8");
  return event.body;
}

function parseHeaders(event: APIGatewayProxyEventV2): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!event.headers) return headers;

  for (const [key, value] of Object.entries(event.headers)) {
    if (value !== undefined) {
      headers[key.toLowerCase()] = value;
    }
  }
  return headers;
}

function parseStringMap(map: Record<string, string | undefined> | undefined): Record<string, string> {
  const parsed: Record<string, string> = {};
  if (!map) return parsed;

  for (const [key, value] of Object.entries(map)) {
    if (value !== undefined) {
      parsed[key] = value;
    }
  }
  return parsed;
}

/**
 * Maps an API Gateway HTTP API (payload v2) event to the transport-neutral
 * request. Base64 bodies are decoded to text; repeated query keys arrive
 * comma-joined, as API Gateway sends them.
 */
export function mapApiGatewayV2Event(event: APIGatewayProxyEventV2): HttpRequest {
  const method = event.requestContext.http.method.toUpperCase();
  if (!isHttpMethod(method)) {
    throw new BadRequestException(`Unsupported HTTP method ${method}`);
  }
  const headers = parseHeaders(event);

  return {
    method,
    path: event.rawPath,
    pathParams: parseStringMap(event.pathParameters),
    query: parseStringMap(event.queryStringParameters),
    headers,
    textBody: parseBody(event),
    contentType: headers["content-type"] ?? null,
    requestId: event.requestContext.requestId,
    requestTime: event.requestContext.time ?? new Date().toISOString(),
    clientIp: event.requestContext.http.sourceIp,
  };
}

export function mapHttpResponseToResult(response: HttpResponse): APIGatewayProxyStructuredResultV2 {
  const result: APIGatewayProxyStructuredResultV2 = {
    statusCode: response.status,
  };

  if (response.headers) {
    result.headers = response.headers;
  }

  if (response.body !== undefined) {
    result.body = response.body;
  }

  return result;
}
