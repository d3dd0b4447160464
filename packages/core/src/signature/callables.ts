import type { Constructable, Injectable } from "@argwire/types";

/**
 * Back-reference from a wrapper to the callable it wraps. The inspector follows
 * it to reach the parameter list of the underlying definition.
 */
export const ORIGINAL_CALLABLE = Symbol.for("argwire:original-callable");

const CLASS_SOURCE = /^class\b/;

export function isInjectable(value: unknown): value is Injectable {
  return typeof value === "function";
}

export function isClass<R>(target: Injectable<R>): target is Constructable<R> {
  return CLASS_SOURCE.test(Function.prototype.toString.call(target));
}

/** Follows `ORIGINAL_CALLABLE` links until reaching a callable without one. */
export function unwrap(target: Injectable): Injectable {
  const seen = new Set<Injectable>();
  let current = target;
  while (Object.hasOwn(current, ORIGINAL_CALLABLE) && !seen.has(current)) {
    seen.add(current);
    const original: unknown = Reflect.get(current, ORIGINAL_CALLABLE);
    if (!isInjectable(original)) break;
    current = original;
  }
  return current;
}

/**
 * Declares `wrapper` as a decoration layer around `original`, so that injection
 * reads the original parameter list.
 *
 * @example
 * const timed = wraps((...args: unknown[]) => measure(() => handler(...args)), handler);
 */
export function wraps<W extends Injectable>(wrapper: W, original: Injectable): W {
  Object.defineProperty(wrapper, ORIGINAL_CALLABLE, { value: original, configurable: true });
  return wrapper;
}

export function describeCallable(target: Injectable): string {
  return target.name ? `${target.name}()` : "anonymous function";
}

/** Calls `target`, or constructs it when it is a class or `newTarget` is given. */
export function invoke<R>(
  target: Injectable<R>,
  thisArg: unknown,
  args: readonly unknown[],
  // eslint-disable-next-line @typescript-eslint/no-unsafe-function-type
  newTarget?: Function,
): R {
  if (isClass(target)) {
    return Reflect.construct(target, args, newTarget ?? target);
  }
  if (newTarget !== undefined) {
    return Reflect.construct(target, args, newTarget);
  }
  return Reflect.apply(target, thisArg, args);
}
