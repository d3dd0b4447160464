import type { Injectable, NamedArguments, Provider, Resolver } from "./common";

/** Registration and invocation contract consumed by framework integrations. */
export interface DependencyInjector {
  addResolver(name: string, resolver: Resolver, aliases?: Iterable<string>): void;
  addProvider(name: string, provider: Provider, aliases?: Iterable<string>): void;
  addValue(name: string, value: unknown, aliases?: Iterable<string>): void;
  remove(name: string): void;
  has(name: string): boolean;
  callInject<R>(target: Injectable<R>, args?: readonly unknown[], named?: NamedArguments): R;
}
