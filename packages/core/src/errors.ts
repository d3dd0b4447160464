import type { InjectionPoint } from "./injection-point";

export class InjectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InjectError";
  }
}

/** An injection point names a dependency that has no registered resolver. */
export class UnresolvedDependencyError extends InjectError {
  constructor(public readonly point: InjectionPoint) {
    super(`Could not resolve provider for injection point ${point.toString()}`);
    this.name = "UnresolvedDependencyError";
  }
}

/** Parameters or config were handed to a dependency that does not accept them. */
export class InvalidConfigurationError extends InjectError {
  constructor(
    public readonly dependency: string,
    message: string,
  ) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

export class UnknownRemovalError extends InjectError {
  constructor(public readonly dependency: string) {
    super(`No dependency registered under "${dependency}"`);
    this.name = "UnknownRemovalError";
  }
}

/** An `inject(...)` parameter default whose arguments are not literals. */
export class InvalidMarkerError extends InjectError {
  constructor(
    public readonly parameter: string,
    reason: string,
  ) {
    super(
      `Cannot read the inject() default of parameter "${parameter}": ${reason}. ` +
        "Use literal arguments, or declare the injection point with annotate() or @Inject().",
    );
    this.name = "InvalidMarkerError";
  }
}
