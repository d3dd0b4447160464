// Callable shapes accepted by the injector. Parameters are typed `never[]` so that
// any function or class is assignable; the injector binds the actual arguments at
// runtime from parameter names.
export type Callable<R = unknown> = (...args: never[]) => R;

export type Constructable<R = unknown> = new (...args: never[]) => R;

/** Anything the injector can inspect, call or wrap. */
export type Injectable<R = unknown> = Callable<R> | Constructable<R>;

/**
 * Produces the value to inject. Invoked with no explicit arguments once per
 * injection; any parameters it declares are themselves injected.
 */
export type Provider<T = unknown> = Callable<T>;

/**
 * Receives an injection point's parameters (positionally) and config (by
 * parameter name) and returns the provider to use for that injection point.
 */
export type Resolver<T = unknown> = Callable<Provider<T>>;

/** Resolver arguments carried by an explicit injection point. */
export type InjectOptions = {
  parameters?: readonly unknown[];
  config?: Readonly<Record<string, unknown>>;
};

/** Keyword-style arguments, matched to parameters by name. */
export type NamedArguments = Readonly<Record<string, unknown>>;
