import type { Provider, Resolver } from "@argwire/types";
import { InvalidConfigurationError, UnknownRemovalError } from "../errors";

/**
 * Wraps a provider in a resolver that accepts no resolver arguments, so that
 * values, providers and resolvers share one registry shape.
 */
function createNullResolver(name: string, provider: Provider): Resolver {
  return (...args: unknown[]) => {
    if (args.length > 0) {
      throw new InvalidConfigurationError(
        name,
        `The dependency provider for "${name}" does not accept configuration (it is not a resolver)`,
      );
    }
    return provider;
  };
}

/**
 * Maps injection point names to resolvers. Every mutation calls `onChange`,
 * which the injector uses to drop all memoized resolutions.
 */
export class ResolverRegistry {
  private readonly resolvers = new Map<string, Resolver>();

  constructor(private readonly onChange: () => void) {}

  addResolver(name: string, resolver: Resolver, aliases: Iterable<string> = []): void {
    this.resolvers.set(name, resolver);
    for (const alias of aliases) {
      this.resolvers.set(alias, resolver);
    }
    this.onChange();
  }

  addProvider(name: string, provider: Provider, aliases: Iterable<string> = []): void {
    this.addResolver(name, createNullResolver(name, provider), aliases);
  }

  addValue(name: string, value: unknown, aliases: Iterable<string> = []): void {
    this.addProvider(name, () => value, aliases);
  }

  remove(name: string): void {
    if (!this.resolvers.delete(name)) {
      throw new UnknownRemovalError(name);
    }
    this.onChange();
  }

  get(name: string): Resolver | undefined {
    return this.resolvers.get(name);
  }

  has(name: string): boolean {
    return this.resolvers.has(name);
  }

  names(): string[] {
    return [...this.resolvers.keys()];
  }
}
