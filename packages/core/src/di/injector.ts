import createDebug from "debug";
import type {
  DependencyInjector,
  Injectable,
  NamedArguments,
  Provider,
  Resolver,
} from "@argwire/types";
import type { InjectionPoint } from "../injection-point";
import { InvalidConfigurationError, UnresolvedDependencyError } from "../errors";
import { DEFAULT_NEVER_INJECT, SignatureInspector } from "../signature/inspector";
import { invoke, isClass, isInjectable, wraps } from "../signature/callables";
import { bindArguments } from "./arguments";
import { ResolutionCache, type Resolution, type ResolvedDependency } from "./cache";
import { ResolverRegistry } from "./registry";

const debug = createDebug("argwire:core:injector");

/** Back-reference from a wrapped callable to the injector that wrapped it. */
export const INJECTOR = Symbol.for("argwire:injector");

export type InjectorOptions = {
  /** Label used in debug output. */
  name?: string;
  /** Parameter names never injected implicitly. Defaults to `["self"]`. */
  neverInject?: Iterable<string>;
};

export class Injector implements DependencyInjector {
  readonly name: string;
  private readonly cache = new ResolutionCache();
  private readonly registry = new ResolverRegistry(() => this.cache.clear());
  private readonly inspector: SignatureInspector;
  private readonly wrappers = new WeakSet<Injectable>();
  // Wrapper about to be invoked by execute() with its arguments already bound.
  private prebound: Injectable | null = null;

  constructor(options: InjectorOptions = {}) {
    this.name = options.name ?? "default";
    this.inspector = new SignatureInspector(options.neverInject ?? DEFAULT_NEVER_INJECT);
  }

  /**
   * Registers a resolver. A resolver receives an injection point's parameters
   * and config and returns the provider for that injection point. It is called
   * once per injection point and callable until the registry changes.
   */
  addResolver(name: string, resolver: Resolver, aliases: Iterable<string> = []): void {
    debug("%s: addResolver %s", this.name, name);
    this.registry.addResolver(name, resolver, aliases);
  }

  /** Registers a provider, called with no arguments every time the dependency is injected. */
  addProvider(name: string, provider: Provider, aliases: Iterable<string> = []): void {
    debug("%s: addProvider %s", this.name, name);
    this.registry.addProvider(name, provider, aliases);
  }

  /** Registers a value injected as-is (the same object every time). */
  addValue(name: string, value: unknown, aliases: Iterable<string> = []): void {
    debug("%s: addValue %s", this.name, name);
    this.registry.addValue(name, value, aliases);
  }

  remove(name: string): void {
    debug("%s: remove %s", this.name, name);
    this.registry.remove(name);
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  /**
   * Returns a function that registers its argument as a provider and returns it.
   *
   * @example
   * const connect = injector.provider("db")(() => pool.connect());
   */
  provider(name: string, aliases: Iterable<string> = []): <P extends Provider>(provider: P) => P {
    return (provider) => {
      this.addProvider(name, provider, aliases);
      return provider;
    };
  }

  /** Like {@link provider}, for resolvers. */
  resolver(name: string, aliases: Iterable<string> = []): <R extends Resolver>(resolver: R) => R {
    return (resolver) => {
      this.addResolver(name, resolver, aliases);
      return resolver;
    };
  }

  inspect(target: Injectable): Map<string, InjectionPoint> {
    return this.inspector.inspect(target);
  }

  /** The (parameter, provider) pairs needed to call `target`, memoized until the registry changes. */
  resolveDependencies(target: Injectable): readonly ResolvedDependency[] {
    return this.resolve(target).dependencies;
  }

  /**
   * Looks up and invokes the resolver for `point`, returning a zero-argument
   * function that calls the resolved provider (with its own dependencies injected).
   */
  prime(point: InjectionPoint): () => unknown {
    const resolver = this.registry.get(point.name);
    if (!resolver) {
      throw new UnresolvedDependencyError(point);
    }

    debug("%s: prime %s", this.name, point.toString());
    const provider: unknown = this.callInject(resolver, point.parameters, point.config);
    if (!isInjectable(provider)) {
      throw new InvalidConfigurationError(
        point.name,
        `The resolver for ${point.toString()} returned ${typeof provider} instead of a provider function`,
      );
    }

    const wrapped = this.wrap(provider);
    return () => invoke(wrapped, undefined, []);
  }

  /**
   * Calls `target` (or constructs it, for a class), injecting every injectable
   * parameter the caller did not supply positionally or by name.
   */
  callInject<R>(
    target: Injectable<R>,
    args: readonly unknown[] = [],
    named: NamedArguments = {},
  ): R {
    return this.execute(target, undefined, args, named);
  }

  /**
   * Turns `target` into a callable that injects its dependencies on every call.
   * Returns `target` itself when it has no injectable parameters.
   */
  wrap<A extends unknown[], R>(target: (...args: A) => R): (...args: Partial<A>) => R;
  wrap<A extends unknown[], R>(target: new (...args: A) => R): new (...args: Partial<A>) => R;
  wrap<R>(target: Injectable<R>): Injectable<R>;
  wrap<R>(target: Injectable<R>): Injectable<R> {
    if (this.inspector.describe(target).injections.length === 0) {
      return target;
    }

    // eslint-disable-next-line @typescript-eslint/no-this-alias
    const injector = this;
    const wrapped = function (this: unknown, ...args: unknown[]): R {
      if (injector.prebound === wrapped) {
        injector.prebound = null;
        return invoke(target, this, args, new.target);
      }
      return injector.execute(target, this, args, {}, new.target);
    };

    Object.defineProperty(wrapped, "name", { value: target.name, configurable: true });
    Object.defineProperty(wrapped, "length", { value: target.length, configurable: true });
    if (isClass(target)) {
      wrapped.prototype = target.prototype;
    }
    Object.defineProperty(wrapped, INJECTOR, { value: this });
    this.wrappers.add(wrapped);
    return wraps(wrapped, target);
  }

  private execute<R>(
    target: Injectable<R>,
    thisArg: unknown,
    args: readonly unknown[],
    named: NamedArguments,
    // eslint-disable-next-line @typescript-eslint/no-unsafe-function-type
    newTarget?: Function,
  ): R {
    const bound = bindArguments(target, this.resolve(target), args, named);
    // A wrapper of ours would bind the same parameters again; hand it the result as-is.
    this.prebound = this.wrappers.has(target) ? target : null;
    try {
      return invoke(target, thisArg, bound, newTarget);
    } finally {
      this.prebound = null;
    }
  }

  private resolve(target: Injectable): Resolution {
    const cached = this.cache.get(target);
    if (cached) return cached;

    const version = this.cache.version;
    const { signature, injections } = this.inspector.describe(target);
    const dependencies = injections.map(({ parameter, index, point }) =>
      Object.freeze({ parameter, index, point, provider: this.prime(point) }),
    );
    const resolution: Resolution = Object.freeze({
      signature,
      dependencies: Object.freeze(dependencies),
    });

    if (this.cache.install(target, resolution, version)) {
      debug(
        "%s: resolved %s [%s]",
        this.name,
        target.name || "<anonymous>",
        dependencies.map((d) => d.parameter).join(", "),
      );
    } else {
      debug("%s: registry changed while resolving %s, not caching", this.name, target.name);
    }
    return resolution;
  }
}

/** The injector that produced a wrapped callable, if any. */
export function getInjector(target: Injectable): Injector | undefined {
  const owner: unknown = Object.hasOwn(target, INJECTOR) ? Reflect.get(target, INJECTOR) : undefined;
  return owner instanceof Injector ? owner : undefined;
}
