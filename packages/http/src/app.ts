import createDebug from "debug";
import type { AppLogger, Callable, HttpMethod, HttpRequest, HttpResponse } from "@argwire/types";
import {
  createLogger,
  extendRequestLogger,
  getRequestLogger,
  readTelemetryEnv,
  runWithRequestLogger,
} from "@argwire/telemetry";
import { readAppConfig, type AppConfig } from "./config";
import { scopeStore } from "./context";
import { HttpException, NotFoundException } from "./errors";
import { joinHandlerPath, matchRoute } from "./path";

const debug = createDebug("argwire:http");

/** Route callbacks are called without arguments; plugins supply what they need. */
export type RouteHandler = Callable;

export type Route = {
  method: HttpMethod;
  path: string;
  /** The handler as registered. */
  callback: RouteHandler;
  /** The handler after every installed plugin has been applied. */
  handler: RouteHandler;
};

export interface Plugin {
  readonly name: string;
  setup?(app: HttpApp): void;
  apply(handler: RouteHandler, route: Route): RouteHandler;
}

export type HttpAppOptions = {
  config?: AppConfig;
  logger?: AppLogger;
  /** Prefix joined to every route path. */
  prefix?: string;
};

export class HttpApp {
  readonly config: AppConfig;
  readonly logger: AppLogger;
  private readonly prefix: string;
  private readonly routes: Route[] = [];
  private readonly plugins: Plugin[] = [];

  constructor(options: HttpAppOptions = {}) {
    this.config = options.config ?? readAppConfig();
    this.logger = options.logger ?? createLogger(readTelemetryEnv());
    this.prefix = options.prefix ?? "";
  }

  route(method: HttpMethod, path: string, callback: RouteHandler): this {
    const route: Route = {
      method,
      path: joinHandlerPath(this.prefix, path),
      callback,
      handler: callback,
    };
    route.handler = this.applyPlugins(route);
    this.routes.push(route);
    debug("route %s %s", method, route.path);
    return this;
  }

  get(path: string, callback: RouteHandler): this {
    return this.route("GET", path, callback);
  }

  post(path: string, callback: RouteHandler): this {
    return this.route("POST", path, callback);
  }

  getRoutes(): readonly Route[] {
    return this.routes;
  }

  /** Runs the plugin's setup and applies it to every route, current and future. */
  install(plugin: Plugin): this {
    debug("install %s", plugin.name);
    plugin.setup?.(this);
    this.plugins.push(plugin);
    for (const route of this.routes) {
      route.handler = this.applyPlugins(route);
    }
    return this;
  }

  async handle(request: HttpRequest): Promise<HttpResponse> {
    const response: HttpResponse = { status: 200, headers: {} };

    return runWithRequestLogger(this.logger, { requestId: request.requestId }, async () => {
      try {
        const { route, params } = this.match(request);
        const logger = extendRequestLogger({ route: `${route.method} ${route.path}` });
        const scoped: HttpRequest = { ...request, pathParams: { ...request.pathParams, ...params } };
        const result = await scopeStore.run({ request: scoped, response, logger }, () =>
          route.handler(),
        );
        return writeResult(response, result);
      } catch (error) {
        return this.handleError(error, getRequestLogger() ?? this.logger);
      }
    });
  }

  private match(request: HttpRequest): { route: Route; params: Record<string, string> } {
    for (const route of this.routes) {
      if (route.method !== request.method) continue;
      const params = matchRoute(route.path, request.path);
      if (params) return { route, params };
    }
    throw new NotFoundException(`No handler found for ${request.method} ${request.path}`);
  }

  private applyPlugins(route: Route): RouteHandler {
    return this.plugins.reduce((handler, plugin) => plugin.apply(handler, route), route.callback);
  }

  private handleError(error: unknown, logger: AppLogger): HttpResponse {
    if (error instanceof HttpException) {
      return {
        status: error.statusCode,
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          message: error.message,
          ...(error.details ? { details: error.details } : {}),
        }),
      };
    }
    logger.error("Unhandled error in route handler", {
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof Error && error.stack ? { stack: error.stack } : {}),
    });
    return {
      status: 500,
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ message: "Internal Server Error" }),
    };
  }
}

function writeResult(response: HttpResponse, result: unknown): HttpResponse {
  if (typeof result === "string") {
    response.headers["content-type"] ??= "text/plain; charset=utf-8";
    response.body = result;
  } else if (result !== undefined) {
    response.headers["content-type"] ??= "application/json";
    response.body = JSON.stringify(result);
  }
  return response;
}
