import { AsyncLocalStorage } from "node:async_hooks";
import type { AppLogger, HttpMethod, HttpRequest, HttpResponse } from "@argwire/types";
import { BadRequestException, RequestScopeError } from "./errors";

export type RequestScope = {
  request: HttpRequest;
  response: HttpResponse;
  logger: AppLogger;
};

export const scopeStore = new AsyncLocalStorage<RequestScope>();

export function currentScope(what = "The current request"): RequestScope {
  const scope = scopeStore.getStore();
  if (!scope) throw new RequestScopeError(what);
  return scope;
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Case-insensitive header lookup returning the first value. */
export function findHeader(
  headers: Record<string, string | string[]>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  const key = Object.keys(headers).find((k) => k.toLowerCase() === wanted);
  return key === undefined ? undefined : firstValue(headers[key]);
}

/**
 * The request being handled by the current async context. One instance is
 * registered for injection and shared by every request.
 */
export class LocalRequest {
  private get current(): HttpRequest {
    return currentScope("request").request;
  }

  get method(): HttpMethod {
    return this.current.method;
  }

  get path(): string {
    return this.current.path;
  }

  get params(): Readonly<Record<string, string>> {
    return this.current.pathParams;
  }

  get query(): Readonly<Record<string, string | string[]>> {
    return this.current.query;
  }

  get headers(): Readonly<Record<string, string | string[]>> {
    return this.current.headers;
  }

  get body(): string | null {
    return this.current.body;
  }

  get requestId(): string {
    return this.current.requestId;
  }

  header(name: string): string | undefined {
    return findHeader(this.current.headers, name);
  }

  /** Parses the body as JSON. `undefined` when there is no body. */
  json(): unknown {
    const body = this.current.body;
    if (body === null || body === "") return undefined;
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new BadRequestException("Request body is not valid JSON", {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/** The response being built for the current request. */
export class LocalResponse {
  private get current(): HttpResponse {
    return currentScope("response").response;
  }

  get status(): number {
    return this.current.status;
  }

  set status(status: number) {
    this.current.status = status;
  }

  get headers(): Readonly<Record<string, string>> {
    return this.current.headers;
  }

  setHeader(name: string, value: string): void {
    this.current.headers[name.toLowerCase()] = value;
  }

  get body(): string | undefined {
    return this.current.body;
  }

  set body(body: string | undefined) {
    this.current.body = body;
  }
}

export const request = new LocalRequest();
export const response = new LocalResponse();
