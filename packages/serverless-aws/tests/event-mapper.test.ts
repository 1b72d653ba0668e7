import { describe, it, expect } from "vitest";
import { BadRequestException } from "@nimbus-fn/core";
import { mapApiGatewayV2Event, mapHttpResponseToResult } from "../src/event-mapper";
import { createApiGatewayEvent } from "./fixtures/events";

describe("mapApiGatewayV2Event", () => {
  it("maps the request line and context", () => {
    // Arrange
    const event = createApiGatewayEvent("get", "/orders/o-1", {
      pathParameters: { id: "o-1" },
      queryStringParameters: { expand: "lines", tags: "a,b" },
    });

    // Act
    const request = mapApiGatewayV2Event(event);

    // Assert
    expect(request).toEqual({
      method: "GET",
      path: "/orders/o-1",
      pathParams: { id: "o-1" },
      query: { expand: "lines", tags: "a,b" },
      headers: { "content-type": "application/json", host: "api.example.com" },
      textBody: null,
      contentType: "application/json",
      requestId: "req-abc-123",
      requestTime: "15/Jan/2026:10:30:00 +0000",
      clientIp: "192.168.1.1",
    });
  });

  it("keeps a plain text body as is", () => {
    const event = createApiGatewayEvent("POST", "/orders", { body: '{"name":"Alice"}' });

    expect(mapApiGatewayV2Event(event).textBody).toBe('{"name":"Alice"}');
  });

  it("decodes a base64 body to text", () => {
    const event = createApiGatewayEvent("POST", "/orders", {
      body: Buffer.from('{"name":"Zoë"}').toString("base64"),
      isBase64Encoded: true,
    });

    expect(mapApiGatewayV2Event(event).textBody).toBe('{"name":"Zoë"}');
  });

  it("treats an empty body as absent", () => {
    const event = createApiGatewayEvent("POST", "/orders", { body: "" });

    expect(mapApiGatewayV2Event(event).textBody).toBeNull();
  });

  it("drops parameters without a value", () => {
    const event = createApiGatewayEvent("GET", "/orders", {
      headers: { accept: "application/json", "x-empty": undefined },
      queryStringParameters: { page: "2", size: undefined },
    });

    const request = mapApiGatewayV2Event(event);

    expect(request.headers).toEqual({ accept: "application/json" });
    expect(request.query).toEqual({ page: "2" });
    expect(request.contentType).toBeNull();
  });

  it("rejects methods functions cannot be marked with", () => {
    const event = createApiGatewayEvent("TRACE", "/orders");

    expect(() => mapApiGatewayV2Event(event)).toThrow(BadRequestException);
  });
});

describe("mapHttpResponseToResult", () => {
  it("maps status, headers and body", () => {
    const result = mapHttpResponseToResult({
      status: 201,
      headers: { "content-type": "application/json" },
      body: '{"ok":true}',
    });

    expect(result).toEqual({
      statusCode: 201,
      headers: { "content-type": "application/json" },
      body: '{"ok":true}',
    });
  });

  it("omits the body of an empty response", () => {
    expect(mapHttpResponseToResult({ status: 204 })).toEqual({ statusCode: 204 });
  });
});
