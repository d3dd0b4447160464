import type { HttpMethod, HttpRequest } from "@argwire/types";

export type MockRequestOptions = {
  pathParams?: Record<string, string>;
  query?: Record<string, string | string[]>;
  headers?: Record<string, string | string[]>;
  body?: unknown;
  requestId?: string;
};

/** Builds an HttpRequest for driving `HttpApp.handle` in tests. Bodies are sent as JSON. */
export function mockRequest(
  method: HttpMethod,
  path: string,
  options: MockRequestOptions = {},
): HttpRequest {
  return {
    method,
    path,
    pathParams: options.pathParams ?? {},
    query: options.query ?? {},
    headers: {
      ...(options.body !== undefined ? { "content-type": "application/json" } : {}),
      ...options.headers,
    },
    body: options.body !== undefined ? JSON.stringify(options.body) : null,
    requestId: options.requestId ?? "test-request-id",
  };
}
