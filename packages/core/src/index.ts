import "reflect-metadata";

// Engine
export { Injector, getInjector, INJECTOR } from "./di/injector";
export { ResolverRegistry } from "./di/registry";
export { ResolutionCache } from "./di/cache";
export { bindArguments } from "./di/arguments";

// Declaring injection points
export { InjectionPoint, inject } from "./injection-point";
export { Inject, annotate } from "./decorators/inject";

// Signature inspection
export { SignatureInspector, DEFAULT_NEVER_INJECT } from "./signature/inspector";
export { readSignature } from "./signature/signature";
export { ORIGINAL_CALLABLE, unwrap, wraps, isClass } from "./signature/callables";
export { MARKER_FUNCTION } from "./signature/parameters";

// Errors
export {
  InjectError,
  UnresolvedDependencyError,
  InvalidConfigurationError,
  UnknownRemovalError,
  InvalidMarkerError,
} from "./errors";

// Metadata constants
export { INJECT_METADATA, ANNOTATIONS_METADATA } from "./metadata/constants";

export type { InjectorOptions } from "./di/injector";
export type { ResolvedDependency, Resolution } from "./di/cache";
export type { CallableDescription, InjectionSite } from "./signature/inspector";
export type { Signature } from "./signature/signature";
export type { ParameterInfo, ParameterKind } from "./signature/parameters";

export type {
  Callable,
  Constructable,
  Injectable,
  Provider,
  Resolver,
  InjectOptions,
  NamedArguments,
  DependencyInjector,
} from "@argwire/types";
