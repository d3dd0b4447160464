import { isDeepStrictEqual } from "node:util";
import type { InjectOptions } from "@argwire/types";

/**
 * A named request for a dependency, plus the arguments handed to the resolver
 * registered under that name.
 *
 * Implicit points are inferred from a required parameter's own name; explicit
 * ones come from {@link inject}, `@Inject()` or `annotate()`.
 */
export class InjectionPoint {
  readonly parameters: readonly unknown[];
  readonly config: Readonly<Record<string, unknown>>;

  constructor(
    readonly name: string,
    options: InjectOptions = {},
    readonly implicit = false,
  ) {
    this.parameters = Object.freeze([...(options.parameters ?? [])]);
    this.config = Object.freeze({ ...options.config });
  }

  /** Value equality on name, parameters and config. `implicit` is ignored. */
  equals(other: unknown): boolean {
    if (!(other instanceof InjectionPoint)) return false;
    return (
      this.name === other.name &&
      isDeepStrictEqual(this.parameters, other.parameters) &&
      isDeepStrictEqual(this.config, other.config)
    );
  }

  toString(): string {
    const details: string[] = [];
    if (this.parameters.length > 0) {
      details.push(`parameters: ${JSON.stringify(this.parameters)}`);
    }
    if (Object.keys(this.config).length > 0) {
      details.push(`config: ${JSON.stringify(this.config)}`);
    }
    const name = JSON.stringify(this.name);
    return details.length > 0 ? `${name} (${details.join(", ")})` : name;
  }
}

/**
 * Marks a parameter as an injection point for the dependency `name`.
 *
 * Use it as a parameter default, with `annotate()`, or through `@Inject()`.
 * Defaults must use literal arguments, since they are read from source text.
 * A parameter with a marker default can never receive `undefined` (the runtime
 * would substitute the default), so injecting or passing `undefined` to it
 * throws `InvalidConfigurationError`. Use `annotate()` or `@Inject()` for
 * dependencies that may be `undefined`.
 *
 * @example
 * function handler(db = inject("database"), page = inject("paginator", { config: { size: 20 } })) {}
 */
export function inject(name: string, options: InjectOptions = {}): InjectionPoint {
  return new InjectionPoint(name, options);
}
