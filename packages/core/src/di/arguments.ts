import type { Injectable, NamedArguments } from "@argwire/types";
import { InvalidConfigurationError } from "../errors";
import { describeCallable } from "../signature/callables";
import type { Resolution } from "./cache";

/**
 * Builds the positional argument list for a call: named arguments go to the
 * parameter of the same name, then every injectable parameter the caller left
 * empty is filled from its provider.
 *
 * A positional `undefined` counts as not supplied. Named arguments matching no
 * parameter are passed as one trailing object when the callable is variadic.
 *
 * A parameter whose default is an `inject(...)` marker cannot receive
 * `undefined`: the call would evaluate the default and pass the marker instead.
 */
export function bindArguments(
  target: Injectable,
  { signature, dependencies }: Resolution,
  args: readonly unknown[],
  named: NamedArguments,
): unknown[] {
  const bound = [...args];
  const unmatched: [string, unknown][] = [];

  for (const [key, value] of Object.entries(named)) {
    const parameter = signature.parameters.find((p) => p.name === key && p.kind !== "rest");
    if (!parameter) {
      if (!signature.variadic) {
        throw new TypeError(`${describeCallable(target)} got an unexpected argument "${key}"`);
      }
      unmatched.push([key, value]);
      continue;
    }
    if (bound[parameter.index] !== undefined) {
      throw new TypeError(`${describeCallable(target)} got multiple values for argument "${key}"`);
    }
    bound[parameter.index] = value;
  }

  for (const { parameter, index, provider } of dependencies) {
    if (Object.hasOwn(named, parameter) || bound[index] !== undefined) continue;
    bound[index] = provider();
  }

  for (const { name, index, marker } of signature.parameters) {
    if (marker === undefined || name === null || bound[index] !== undefined) continue;
    throw new InvalidConfigurationError(
      marker.name,
      `${describeCallable(target)} received undefined for parameter "${name}", ` +
        "whose default is an inject() marker. Declare the injection point with " +
        "annotate() or @Inject() instead of a default value to pass undefined.",
    );
  }

  if (unmatched.length > 0) {
    const positional = signature.parameters.filter((p) => p.kind !== "rest").length;
    while (bound.length < positional) bound.push(undefined);
    bound.push(Object.fromEntries(unmatched));
  }
  return bound;
}
