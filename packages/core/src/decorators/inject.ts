import "reflect-metadata";
import type { Injectable, InjectOptions } from "@argwire/types";
import { ANNOTATIONS_METADATA, INJECT_METADATA } from "../metadata/constants";
import { inject, type InjectionPoint } from "../injection-point";
import { isInjectable, unwrap } from "../signature/callables";

/**
 * Declares an explicit injection point on a constructor or method parameter.
 *
 * @example
 * class OrderService {
 *   constructor(@Inject("database") private readonly db: Database) {}
 * }
 */
export function Inject(name: string, options?: InjectOptions): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    // Constructor parameters decorate the class; method parameters decorate the
    // method function itself, which is what gets wrapped and inspected.
    const owner: unknown =
      propertyKey === undefined
        ? target
        : Object.getOwnPropertyDescriptor(target, propertyKey)?.value;
    if (!isInjectable(owner)) {
      throw new TypeError("@Inject() can only decorate constructor and method parameters");
    }

    const points = new Map(getInjectMetadata(owner));
    points.set(parameterIndex, inject(name, options));
    Reflect.defineMetadata(INJECT_METADATA, points, owner);
  };
}

/**
 * Declares explicit injection points on a plain function, keyed by parameter
 * name. Takes effect for callables resolved after the call.
 *
 * @example
 * const report = annotate((db: Database, range: DateRange) => db.report(range), {
 *   range: inject("dateRange", { config: { days: 7 } }),
 * });
 */
export function annotate<T extends Injectable>(
  target: T,
  points: Readonly<Record<string, InjectionPoint>>,
): T {
  const owner = unwrap(target);
  const annotations = new Map(getAnnotations(owner));
  for (const [parameter, point] of Object.entries(points)) {
    annotations.set(parameter, point);
  }
  Reflect.defineMetadata(ANNOTATIONS_METADATA, annotations, owner);
  return target;
}

export function getInjectMetadata(target: Injectable): ReadonlyMap<number, InjectionPoint> {
  const points: Map<number, InjectionPoint> | undefined = Reflect.getOwnMetadata(
    INJECT_METADATA,
    target,
  );
  return points ?? new Map();
}

export function getAnnotations(target: Injectable): ReadonlyMap<string, InjectionPoint> {
  const points: Map<string, InjectionPoint> | undefined = Reflect.getOwnMetadata(
    ANNOTATIONS_METADATA,
    target,
  );
  return points ?? new Map();
}
