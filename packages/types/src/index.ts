export type {
  Callable,
  Constructable,
  Injectable,
  Provider,
  Resolver,
  InjectOptions,
  NamedArguments,
} from "./common";

export type { DependencyInjector } from "./container";

export type { HttpMethod, HttpRequest, HttpResponse } from "./http";

export type { LogLevel, AppLogger } from "./telemetry";
