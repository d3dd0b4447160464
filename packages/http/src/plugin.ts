import { Injector } from "@argwire/core";
import { ContextAwareLogger } from "@argwire/telemetry";
import type { HttpApp, Plugin, RouteHandler } from "./app";
import { currentScope, findHeader, request, response } from "./context";

/**
 * Registers the application's injectables on an injector and wraps every route
 * handler with it.
 *
 * Values: `injector`, `config`, `app`, `request` (`req`, `rq`), `response`
 * (`res`, `rs`) and `logger` (`log`). Resolvers: `param`, `query` and `header`,
 * each taking the key to read as its first parameter, or returning the whole
 * mapping without one.
 *
 * @example
 * app.install(new InjectionPlugin());
 * app.get("/orders/{id}", (db: Database, id = inject("param", { parameters: ["id"] })) => db.order(id));
 */
export class InjectionPlugin implements Plugin {
  readonly name = "inject";

  constructor(readonly injector: Injector = new Injector({ name: "http" })) {}

  setup(app: HttpApp): void {
    const injector = this.injector;
    injector.addValue("injector", injector);
    injector.addValue("config", app.config);
    injector.addValue("app", app);
    injector.addValue("request", request, ["req", "rq"]);
    injector.addValue("response", response, ["res", "rs"]);
    injector.addValue("logger", new ContextAwareLogger(app.logger), ["log"]);

    injector.addResolver("param", (key: string | null = null) => () => {
      const params = currentScope("param").request.pathParams;
      return key === null ? params : params[key];
    });
    injector.addResolver("query", (key: string | null = null) => () => {
      const query = currentScope("query").request.query;
      return key === null ? query : query[key];
    });
    injector.addResolver("header", (key: string | null = null) => () => {
      const headers = currentScope("header").request.headers;
      return key === null ? headers : findHeader(headers, key);
    });
  }

  apply(handler: RouteHandler): RouteHandler {
    return this.injector.wrap(handler);
  }
}
