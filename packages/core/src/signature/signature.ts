import createDebug from "debug";
import type { Injectable } from "@argwire/types";
import { isInjectable, unwrap } from "./callables";
import { parseCallableSource, toParameters, type ParameterInfo } from "./parameters";

const debug = createDebug("argwire:core:inspector");

export type Signature = {
  /** The function whose parameter list was read. Holds the decorator metadata. */
  owner: Injectable;
  parameters: readonly ParameterInfo[];
  /** True when the callable accepts a rest parameter (or its source is unreadable). */
  variadic: boolean;
};

// Source text never changes, so parsed signatures live as long as their function.
const signatures = new WeakMap<Injectable, Signature>();

export function readSignature(target: Injectable): Signature {
  const cached = signatures.get(target);
  if (cached) return cached;

  const signature = parseSignature(target);
  signatures.set(target, signature);
  return signature;
}

function parseSignature(target: Injectable): Signature {
  const shape = parseCallableSource(Function.prototype.toString.call(target));
  if (shape === null) {
    debug("%s has no readable source, treating it as variadic", target.name || "<anonymous>");
    return freeze({ owner: target, parameters: [], variadic: true });
  }

  if (shape.type === "class" && shape.constructorParams === null) {
    // Without its own constructor a class takes its parent's arguments.
    const parent: unknown = Object.getPrototypeOf(target);
    if (shape.derived && isInjectable(parent)) {
      return readSignature(unwrap(parent));
    }
    return freeze({ owner: target, parameters: [], variadic: false });
  }

  const params = shape.type === "class" ? (shape.constructorParams ?? []) : shape.params;
  const parameters = toParameters(params);
  debug(
    "parsed %s(%s)",
    target.name || "<anonymous>",
    parameters.map((p) => p.name ?? "{}").join(", "),
  );
  return freeze({
    owner: target,
    parameters,
    variadic: parameters.some((p) => p.kind === "rest"),
  });
}

function freeze(signature: Signature): Signature {
  Object.freeze(signature.parameters);
  return Object.freeze(signature);
}
