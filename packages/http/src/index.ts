export { HttpApp } from "./app";
export type { HttpAppOptions, Plugin, Route, RouteHandler } from "./app";
export { InjectionPlugin } from "./plugin";
export {
  LocalRequest,
  LocalResponse,
  request,
  response,
  currentScope,
  findHeader,
  scopeStore,
} from "./context";
export type { RequestScope } from "./context";
export { readAppConfig } from "./config";
export type { AppConfig } from "./config";
export { joinHandlerPath, matchRoute } from "./path";
export {
  HttpException,
  BadRequestException,
  NotFoundException,
  RequestScopeError,
} from "./errors";
export { mockRequest } from "./testing";
export type { MockRequestOptions } from "./testing";
