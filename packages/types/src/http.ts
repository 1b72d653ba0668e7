export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

/** Transport-neutral request handed to the dispatcher by every runtime. */
export type HttpRequest = {
  method: HttpMethod;
  path: string;
  pathParams: Record<string, string>;
  query: Record<string, string | string[]>;
  headers: Record<string, string | string[]>;
  textBody: string | null;
  contentType: string | null;
  requestId: string;
  requestTime: string;
  clientIp: string | null;
};

export type HttpResponse = {
  status: number;
  headers?: Record<string, string>;
  body?: string;
};
