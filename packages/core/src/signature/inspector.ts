import type { Injectable } from "@argwire/types";
import { InjectionPoint } from "../injection-point";
import { getAnnotations, getInjectMetadata } from "../decorators/inject";
import { unwrap } from "./callables";
import { readSignature, type Signature } from "./signature";

/** Parameter names that are never injected implicitly. */
export const DEFAULT_NEVER_INJECT: readonly string[] = ["self"];

export type InjectionSite = {
  parameter: string;
  index: number;
  point: InjectionPoint;
};

export type CallableDescription = {
  signature: Signature;
  injections: readonly InjectionSite[];
};

/**
 * Derives the injection points of a callable from its parameter list.
 *
 * Required parameters become implicit points named after themselves. Explicit
 * points come, in order of precedence, from `@Inject()`, `annotate()` and
 * `inject(...)` parameter defaults. Rest and destructured parameters, and
 * optional parameters without a marker, are left to the caller.
 */
export class SignatureInspector {
  private readonly neverInject: ReadonlySet<string>;

  constructor(neverInject: Iterable<string> = DEFAULT_NEVER_INJECT) {
    this.neverInject = new Set(neverInject);
  }

  inspect(target: Injectable): Map<string, InjectionPoint> {
    return new Map(this.describe(target).injections.map((site) => [site.parameter, site.point]));
  }

  describe(target: Injectable): CallableDescription {
    const signature = readSignature(unwrap(target));
    const decorated = getInjectMetadata(signature.owner);
    const annotated = getAnnotations(signature.owner);

    const injections: InjectionSite[] = [];
    for (const { name, index, kind, marker } of signature.parameters) {
      if (name === null || kind === "rest" || kind === "pattern") continue;

      const explicit = decorated.get(index) ?? annotated.get(name) ?? marker;
      if (explicit) {
        injections.push({ parameter: name, index, point: explicit });
      } else if (kind === "required" && !this.neverInject.has(name)) {
        injections.push({ parameter: name, index, point: new InjectionPoint(name, {}, true) });
      }
    }
    return { signature, injections };
  }
}
